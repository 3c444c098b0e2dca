import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { expandHome, loadConfig, loadDotEnv, requireApiKey, supportsImageInput } from '../../../src/config/ConfigLoader.js';

describe('ConfigLoader', () => {
  let tmpDir: string;
  let emptyFile: string;

  function writeConfig(name: string, data: unknown): string {
    const file = path.join(tmpDir, name);
    fs.writeFileSync(file, JSON.stringify(data));
    return file;
  }

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'clipchat-config-'));
    emptyFile = writeConfig('empty.json', {});
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it('should return defaults with home directories expanded', () => {
    const config = loadConfig({ configPath: emptyFile, env: {} });

    expect(config.api.model).toBe('openrouter/sonoma-sky-alpha');
    expect(config.api.translateModel).toBe('nvidia/nemotron-nano-9b-v2:free');
    expect(config.api.apiKey).toBe('');
    expect(config.server.port).toBe(8085);
    expect(config.logLevel).toBe('warn');
    expect(config.storage.historyDir).toBe(path.join(os.homedir(), '.copyq_chat_history'));
    expect(config.storage.screenshotDir).toBe(path.join(os.homedir(), '.copyq_screenshots'));
  });

  it('should merge in the order file < env < overrides', () => {
    const file = writeConfig('config.json', {
      api: { model: 'file/model', timeoutMs: 30000 },
      server: { port: 9000 },
      logLevel: 'info',
    });

    const config = loadConfig({
      configPath: file,
      env: { OPENROUTER_MODEL: 'env/model', CLIPCHAT_PORT: '9100', OPENROUTER_API_KEY: 'test-secret' },
      overrides: { api: { model: 'cli/model' } },
    });

    expect(config.api.model).toBe('cli/model');
    expect(config.api.timeoutMs).toBe(30000);
    expect(config.api.apiKey).toBe('test-secret');
    expect(config.server.port).toBe(9100);
    expect(config.logLevel).toBe('info');
  });

  it('should ignore blank environment variables', () => {
    const config = loadConfig({ configPath: emptyFile, env: { OPENROUTER_MODEL: '  ' } });

    expect(config.api.model).toBe('openrouter/sonoma-sky-alpha');
  });

  it('should read storage directories from the environment', () => {
    const config = loadConfig({
      configPath: emptyFile,
      env: { CLIPCHAT_HISTORY_DIR: '/data/history', CLIPCHAT_SCREENSHOT_DIR: '~/shots' },
    });

    expect(config.storage).toEqual({
      historyDir: '/data/history',
      screenshotDir: path.join(os.homedir(), 'shots'),
    });
  });

  it('should fail when an explicit config file is missing', () => {
    const missing = path.join(tmpDir, 'missing.json');

    expect(() => loadConfig({ configPath: missing, env: {} })).toThrow(`Config file not found: ${missing}`);
  });

  it('should reject config files with wrong types', () => {
    const file = writeConfig('bad.json', { server: { port: 'eighty' } });

    expect(() => loadConfig({ configPath: file, env: {} })).toThrow(`Invalid config file ${file}`);
  });

  it('should validate the port', () => {
    expect(() => loadConfig({ configPath: emptyFile, env: { CLIPCHAT_PORT: 'abc' } }))
      .toThrow('port must be an integer between 1 and 65535');
    expect(() => loadConfig({ configPath: emptyFile, env: {}, overrides: { server: { port: 70000 } } }))
      .toThrow('port must be an integer between 1 and 65535');
  });

  it('should validate timeouts', () => {
    expect(() => loadConfig({ configPath: emptyFile, env: {}, overrides: { capture: { uploadTimeoutMs: 0 } } }))
      .toThrow('timeouts must be positive integers');
  });

  it('should validate the log level', () => {
    expect(() => loadConfig({ configPath: emptyFile, env: { CLIPCHAT_LOG_LEVEL: 'verbose' } }))
      .toThrow('logLevel must be one of debug, info, warn, error');
  });

  it('should require an API key only on demand', () => {
    const config = loadConfig({ configPath: emptyFile, env: {} });

    expect(() => requireApiKey(config)).toThrow('OPENROUTER_API_KEY is not set');
    expect(requireApiKey({ ...config, api: { ...config.api, apiKey: 'test-secret' } })).toBe('test-secret');
  });

  it('should decide image input from the multimodal model list', () => {
    expect(supportsImageInput(loadConfig({ configPath: emptyFile, env: {} }))).toBe(true);
    expect(supportsImageInput(loadConfig({
      configPath: emptyFile,
      env: { OPENROUTER_MODEL: 'mistralai/mistral-7b-instruct' },
    }))).toBe(false);

    const config = loadConfig({
      configPath: emptyFile,
      env: {
        OPENROUTER_MODEL: 'mistralai/mistral-7b-instruct',
        CLIPCHAT_MULTIMODAL_MODELS: 'openai/gpt-4o, mistralai/mistral-7b-instruct,',
      },
    });
    expect(config.api.multimodalModels).toEqual(['openai/gpt-4o', 'mistralai/mistral-7b-instruct']);
    expect(supportsImageInput(config)).toBe(true);
  });

  it('should expand only a leading tilde', () => {
    expect(expandHome('~')).toBe(os.homedir());
    expect(expandHome('~/x')).toBe(path.join(os.homedir(), 'x'));
    expect(expandHome('/a/~/b')).toBe('/a/~/b');
  });

  it('should load .env.local before .env without overriding existing variables', () => {
    fs.writeFileSync(path.join(tmpDir, '.env.local'), 'CLIPCHAT_TEST_LOCAL=local\nCLIPCHAT_TEST_SHARED=from-local\n');
    fs.writeFileSync(path.join(tmpDir, '.env'), 'CLIPCHAT_TEST_SHARED=from-env\nCLIPCHAT_TEST_BASE=base\n');

    try {
      loadDotEnv(tmpDir);

      expect(process.env.CLIPCHAT_TEST_LOCAL).toBe('local');
      expect(process.env.CLIPCHAT_TEST_SHARED).toBe('from-local');
      expect(process.env.CLIPCHAT_TEST_BASE).toBe('base');
    } finally {
      delete process.env.CLIPCHAT_TEST_LOCAL;
      delete process.env.CLIPCHAT_TEST_SHARED;
      delete process.env.CLIPCHAT_TEST_BASE;
    }
  });
});
