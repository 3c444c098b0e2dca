import { describe, it, expect, afterEach } from 'vitest';
import { Logger, errorMessage, isLogLevel } from '../../../src/shared/Logger.js';

describe('Logger', () => {
  const lines: string[] = [];

  afterEach(() => {
    lines.length = 0;
    Logger.setSink();
    Logger.setDefaultLevel('warn');
  });

  it('should write one JSON line with context and extra fields', () => {
    Logger.setSink((line) => lines.push(line));
    new Logger('Test', 'debug').info('hello', { sessionId: 'abc' });

    expect(lines).toHaveLength(1);
    const entry: unknown = JSON.parse(lines[0]);
    expect(entry).toMatchObject({ level: 'info', context: 'Test', message: 'hello', sessionId: 'abc' });
  });

  it('should drop entries below the default level', () => {
    Logger.setSink((line) => lines.push(line));
    const logger = new Logger('Test');

    logger.info('hidden');
    logger.warn('shown');

    expect(lines).toHaveLength(1);
    expect(JSON.parse(lines[0])).toMatchObject({ level: 'warn', message: 'shown' });
  });

  it('should follow setDefaultLevel for loggers created earlier', () => {
    Logger.setSink((line) => lines.push(line));
    const logger = new Logger('Test');

    Logger.setDefaultLevel('debug');
    logger.debug('now visible');

    expect(lines).toHaveLength(1);
  });

  it('should recognize valid levels', () => {
    expect(isLogLevel('error')).toBe(true);
    expect(isLogLevel('trace')).toBe(false);
  });

  it('should extract messages from any thrown value', () => {
    expect(errorMessage(new Error('bad'))).toBe('bad');
    expect(errorMessage('plain')).toBe('plain');
  });
});
