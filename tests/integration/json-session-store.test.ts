import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs';
import path from 'node:path';
import os from 'node:os';
import { JsonSessionStore, formatSessionTimestamp } from '../../src/infrastructure/session/JsonSessionStore.js';
import {
  NoTextAvailableError,
  SessionNotFoundError,
  SessionReadError,
  SessionWriteError,
} from '../../src/domain/errors/DomainErrors.js';
import { renderSeed } from '../../src/domain/value-objects/SeedTemplate.js';

/**
 * Feature: 以 JSON 檔保存 session
 */
describe('JsonSessionStore', () => {
  let tmpDir: string;
  let historyDir: string;
  const created = new Date(2024, 2, 5, 9, 8, 7);

  function storeWith(suffixes: string[] = ['a1b2c3']): JsonSessionStore {
    const queue = [...suffixes];
    return new JsonSessionStore(historyDir, {
      clock: () => created,
      randomSuffix: () => queue.shift() ?? 'ffffff',
    });
  }

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'clipchat-store-'));
    historyDir = path.join(tmpDir, 'history');
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it('should format ids from local time', () => {
    expect(formatSessionTimestamp(created)).toBe('20240305_090807');
  });

  /**
   * Scenario: 建立 session 時寫入 seed
   */
  it('should create the history file with the seed message', async () => {
    const store = storeWith();

    const session = await store.create({ text: 'hello world', screenshotPath: '/shots/a.png' });

    expect(session.sessionId).toBe('20240305_090807_a1b2c3');
    const file = path.join(historyDir, 'chat_20240305_090807_a1b2c3.json');
    expect(store.locationOf(session.sessionId)).toBe(file);

    const onDisk: unknown = JSON.parse(fs.readFileSync(file, 'utf-8'));
    expect(onDisk).toEqual({
      sessionId: '20240305_090807_a1b2c3',
      createdAt: created.toISOString(),
      capturedContent: { text: 'hello world', screenshotPath: '/shots/a.png' },
      messages: [{ role: 'user', content: renderSeed('hello world'), timestamp: created.toISOString() }],
    });
  });

  it('should refuse to create a session without text', async () => {
    await expect(storeWith().create({ text: ' \n' })).rejects.toBeInstanceOf(NoTextAvailableError);
    expect(fs.existsSync(historyDir)).toBe(false);
  });

  it('should skip ids that already have a file', async () => {
    const store = storeWith(['aaaaaa', 'aaaaaa', 'bbbbbb']);
    await store.create({ text: 'first' });

    expect(await store.nextSessionId()).toBe('20240305_090807_bbbbbb');
  });

  it('should give up after repeated collisions', async () => {
    const store = storeWith(['cccccc', 'cccccc', 'cccccc', 'cccccc', 'cccccc', 'cccccc']);
    await store.create({ text: 'first' });

    await expect(store.nextSessionId()).rejects.toBeInstanceOf(SessionWriteError);
  });

  /**
   * Scenario: append 與 clear 回傳寫入後的版本
   */
  it('should append messages and clear them', async () => {
    const store = storeWith();
    const session = await store.create({ text: 'hello' });

    const withQuestion = await store.append(session, { role: 'user', content: 'q', timestamp: 't1' });
    const withReply = await store.append(withQuestion, { role: 'assistant', content: 'a', timestamp: 't2' });

    expect(withReply.messages.map((m) => m.content)).toEqual([renderSeed('hello'), 'q', 'a']);
    expect(await store.load(session.sessionId)).toEqual(withReply);

    const cleared = await store.clear(withReply);
    expect(cleared.messages).toEqual([]);
    expect(cleared.capturedContent).toEqual({ text: 'hello' });
    expect((await store.load(session.sessionId)).messages).toEqual([]);
  });

  it('should serialize concurrent appends', async () => {
    const store = storeWith();
    const session = await store.create({ text: 'hello' });

    await Promise.all([
      store.append(session, { role: 'user', content: 'one', timestamp: 't' }),
      store.append(session, { role: 'user', content: 'two', timestamp: 't' }),
      store.append(session, { role: 'user', content: 'three', timestamp: 't' }),
    ]);

    const loaded = await store.load(session.sessionId);
    expect(loaded.messages.slice(1).map((m) => m.content)).toEqual(['one', 'two', 'three']);
  });

  it('should raise SessionNotFoundError for unknown ids', async () => {
    await expect(storeWith().load('20990101_000000_000000')).rejects.toBeInstanceOf(SessionNotFoundError);
  });

  it('should raise SessionReadError for corrupt files', async () => {
    fs.mkdirSync(historyDir, { recursive: true });
    fs.writeFileSync(path.join(historyDir, 'chat_broken.json'), '{"sessionId":');
    fs.writeFileSync(path.join(historyDir, 'chat_shape.json'), '{"sessionId":"shape"}');

    await expect(storeWith().load('broken')).rejects.toBeInstanceOf(SessionReadError);
    await expect(storeWith().load('shape')).rejects.toThrow('Session "shape" has an invalid shape');
  });

  /**
   * Scenario: 寫入失敗不留下暫存檔
   */
  it('should raise SessionWriteError and remove the temp file when the write fails', async () => {
    const target = path.join(historyDir, 'chat_blocked.json');
    fs.mkdirSync(path.join(target, 'occupied'), { recursive: true });

    await expect(storeWith().create({ text: 'hello' }, 'blocked')).rejects.toBeInstanceOf(SessionWriteError);
    expect(fs.readdirSync(historyDir)).toEqual(['chat_blocked.json']);
  });

  it('should list summaries newest first and skip unreadable files', async () => {
    const early = new JsonSessionStore(historyDir, { clock: () => new Date('2024-01-01T00:00:00.000Z') });
    const late = new JsonSessionStore(historyDir, { clock: () => new Date('2024-02-01T00:00:00.000Z') });
    const long = 'word '.repeat(20);
    const first = await early.create({ text: 'older  text\nwith lines' }, 'older');
    await late.create({ text: long, screenshotPath: '/shots/x.png' }, 'newer');
    await early.append(first, { role: 'user', content: 'q', timestamp: 't' });
    fs.writeFileSync(path.join(historyDir, 'chat_corrupt.json'), 'not json');
    fs.writeFileSync(path.join(historyDir, 'notes.txt'), 'ignored');

    const summaries = await early.list();

    expect(summaries).toEqual([
      {
        sessionId: 'newer',
        createdAt: '2024-02-01T00:00:00.000Z',
        messageCount: 1,
        hasScreenshot: true,
        preview: `${'word '.repeat(12)}...`,
      },
      {
        sessionId: 'older',
        createdAt: '2024-01-01T00:00:00.000Z',
        messageCount: 2,
        hasScreenshot: false,
        preview: 'older text with lines',
      },
    ]);
  });

  it('should list nothing when the history directory does not exist', async () => {
    expect(await storeWith().list()).toEqual([]);
  });
});
