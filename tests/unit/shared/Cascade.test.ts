import { describe, it, expect, vi } from 'vitest';
import { firstAvailable } from '../../../src/shared/Cascade.js';

/**
 * Feature: 依序嘗試多個來源，取第一個可用的值
 */
describe('firstAvailable', () => {
  function step(id: string, run: () => Promise<string | undefined>) {
    return { id, run: vi.fn(run) };
  }

  it('should return the first defined value and skip later steps', async () => {
    const a = step('a', async () => undefined);
    const b = step('b', async () => 'from-b');
    const c = step('c', async () => 'from-c');

    const hit = await firstAvailable([a, b, c], { name: 'test' });

    expect(hit).toEqual({ value: 'from-b', stepId: 'b', attempted: ['a', 'b'] });
    expect(c.run).not.toHaveBeenCalled();
  });

  it('should treat a throwing step as absent', async () => {
    const a = step('a', async () => { throw new Error('boom'); });
    const b = step('b', async () => 'ok');

    const hit = await firstAvailable([a, b], { name: 'test' });

    expect(hit?.value).toBe('ok');
    expect(hit?.attempted).toEqual(['a', 'b']);
  });

  it('should reject values that fail the accept predicate', async () => {
    const a = step('a', async () => '   ');
    const b = step('b', async () => 'text');

    const hit = await firstAvailable([a, b], { name: 'test', accept: (v) => v.trim().length > 0 });

    expect(hit?.stepId).toBe('b');
  });

  it('should return undefined when every step fails', async () => {
    const hit = await firstAvailable(
      [step('a', async () => undefined), step('b', async () => { throw new Error('x'); })],
      { name: 'test' },
    );

    expect(hit).toBeUndefined();
  });

  it('should return undefined for an empty step list', async () => {
    expect(await firstAvailable<string>([], { name: 'empty' })).toBeUndefined();
  });
});
