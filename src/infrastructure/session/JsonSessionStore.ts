import fs from 'node:fs/promises';
import path from 'node:path';
import { randomBytes } from 'node:crypto';
import { z } from 'zod';
import type { CapturedContent, Message, Session, SessionSummary } from '../../domain/entities/Session.js';
import type { SessionStorePort } from '../../domain/ports/SessionStorePort.js';
import {
  NoTextAvailableError,
  SessionNotFoundError,
  SessionReadError,
  SessionWriteError,
} from '../../domain/errors/DomainErrors.js';
import { renderSeed } from '../../domain/value-objects/SeedTemplate.js';
import { SerialQueue } from '../../shared/SerialQueue.js';
import { Logger, errorMessage } from '../../shared/Logger.js';

const ContentPartSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('text'), text: z.string() }),
  z.object({ kind: z.literal('image'), url: z.string() }),
]);

const MessageSchema = z.object({
  role: z.enum(['user', 'assistant', 'system']),
  content: z.union([z.string(), z.array(ContentPartSchema)]),
  timestamp: z.string(),
});

const SessionSchema = z.object({
  sessionId: z.string().min(1),
  createdAt: z.string(),
  capturedContent: z.object({
    text: z.string(),
    screenshotPath: z.string().optional(),
    screenshotURL: z.string().optional(),
  }),
  messages: z.array(MessageSchema),
});

const FILE_PATTERN = /^chat_(.+)\.json$/;
const MAX_ID_ATTEMPTS = 5;
const PREVIEW_CHARS = 60;

export interface JsonSessionStoreOptions {
  clock?: () => Date;
  /** sessionId 的隨機尾碼 */
  randomSuffix?: () => string;
}

function pad(n: number): string {
  return String(n).padStart(2, '0');
}

/** 本地時間 YYYYMMDD_HHMMSS */
export function formatSessionTimestamp(date: Date): string {
  return `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}`
    + `_${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
}

function errnoCode(err: unknown): string | undefined {
  if (err instanceof Error && 'code' in err && typeof err.code === 'string') {
    return err.code;
  }
  return undefined;
}

/**
 * 每個 session 一個 JSON 檔：<historyDir>/chat_<sessionId>.json
 *
 * - 所有讀寫經過 SerialQueue，同一行程內不會交錯
 * - 寫入先寫同目錄的暫存檔再 rename，外部讀取者不會看到寫到一半的檔案
 * - append / clear 以磁碟上的版本為準（read-modify-write），回傳寫入後的 Session
 */
export class JsonSessionStore implements SessionStorePort {
  private readonly queue = new SerialQueue();
  private readonly logger = new Logger('JsonSessionStore');
  private readonly clock: () => Date;
  private readonly randomSuffix: () => string;

  constructor(
    private readonly historyDir: string,
    options: JsonSessionStoreOptions = {},
  ) {
    this.clock = options.clock ?? (() => new Date());
    this.randomSuffix = options.randomSuffix ?? (() => randomBytes(3).toString('hex'));
  }

  locationOf(sessionId: string): string {
    return path.join(this.historyDir, `chat_${sessionId}.json`);
  }

  async nextSessionId(): Promise<string> {
    const stamp = formatSessionTimestamp(this.clock());
    let candidate = '';
    for (let attempt = 0; attempt < MAX_ID_ATTEMPTS; attempt++) {
      candidate = `${stamp}_${this.randomSuffix()}`;
      if (!(await this.exists(candidate))) return candidate;
    }
    throw new SessionWriteError(`Could not allocate a unique session id after ${MAX_ID_ATTEMPTS} attempts`, candidate);
  }

  async create(content: CapturedContent, sessionId?: string): Promise<Session> {
    if (!content.text.trim()) throw new NoTextAvailableError();

    const id = sessionId ?? await this.nextSessionId();
    const now = this.clock().toISOString();
    const session: Session = {
      sessionId: id,
      createdAt: now,
      capturedContent: { ...content },
      messages: [{ role: 'user', content: renderSeed(content.text), timestamp: now }],
    };

    await this.queue.run(() => this.write(session));
    this.logger.info('Session created', { sessionId: id, screenshot: Boolean(content.screenshotURL) });
    return session;
  }

  append(session: Session, message: Message): Promise<Session> {
    return this.queue.run(async () => {
      const current = await this.read(session.sessionId);
      const next: Session = { ...current, messages: [...current.messages, message] };
      await this.write(next);
      return next;
    });
  }

  clear(session: Session): Promise<Session> {
    return this.queue.run(async () => {
      const current = await this.read(session.sessionId);
      const next: Session = { ...current, messages: [] };
      await this.write(next);
      return next;
    });
  }

  load(sessionId: string): Promise<Session> {
    return this.queue.run(() => this.read(sessionId));
  }

  async list(): Promise<SessionSummary[]> {
    let entries: string[];
    try {
      entries = await fs.readdir(this.historyDir);
    } catch (err) {
      if (errnoCode(err) === 'ENOENT') return [];
      throw err;
    }

    const summaries: SessionSummary[] = [];
    for (const entry of entries) {
      const match = FILE_PATTERN.exec(entry);
      if (!match) continue;
      try {
        summaries.push(this.summarize(await this.read(match[1])));
      } catch (err) {
        this.logger.warn('Skipping unreadable session file', { file: entry, error: errorMessage(err) });
      }
    }

    return summaries.sort((a, b) =>
      b.createdAt.localeCompare(a.createdAt) || b.sessionId.localeCompare(a.sessionId));
  }

  private summarize(session: Session): SessionSummary {
    const flat = session.capturedContent.text.replace(/\s+/g, ' ').trim();
    return {
      sessionId: session.sessionId,
      createdAt: session.createdAt,
      messageCount: session.messages.length,
      hasScreenshot: Boolean(session.capturedContent.screenshotPath),
      preview: flat.length > PREVIEW_CHARS ? `${flat.slice(0, PREVIEW_CHARS)}...` : flat,
    };
  }

  private async exists(sessionId: string): Promise<boolean> {
    try {
      await fs.access(this.locationOf(sessionId));
      return true;
    } catch {
      return false;
    }
  }

  private async read(sessionId: string): Promise<Session> {
    const file = this.locationOf(sessionId);

    let raw: string;
    try {
      raw = await fs.readFile(file, 'utf-8');
    } catch (err) {
      if (errnoCode(err) === 'ENOENT') throw new SessionNotFoundError(sessionId, { cause: err });
      throw new SessionReadError(`Failed to read session "${sessionId}": ${errorMessage(err)}`, sessionId, { cause: err });
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (err) {
      throw new SessionReadError(`Session "${sessionId}" is not valid JSON`, sessionId, { cause: err });
    }

    const parsed = SessionSchema.safeParse(json);
    if (!parsed.success) {
      throw new SessionReadError(`Session "${sessionId}" has an invalid shape`, sessionId, { cause: parsed.error });
    }
    return parsed.data;
  }

  /** 暫存檔 + rename；失敗時清掉暫存檔並丟出 SessionWriteError */
  private async write(session: Session): Promise<void> {
    const target = this.locationOf(session.sessionId);
    const tmp = `${target}.${process.pid}.${randomBytes(4).toString('hex')}.tmp`;

    try {
      await fs.mkdir(this.historyDir, { recursive: true });
      await fs.writeFile(tmp, JSON.stringify(session, null, 2) + '\n', 'utf-8');
      await fs.rename(tmp, target);
    } catch (err) {
      await fs.rm(tmp, { force: true }).catch((rmErr: unknown) => {
        this.logger.warn('Failed to remove temp file', { file: tmp, error: errorMessage(rmErr) });
      });
      this.logger.error('Session write failed', { sessionId: session.sessionId, error: errorMessage(err) });
      throw new SessionWriteError(
        `Failed to write session "${session.sessionId}": ${errorMessage(err)}`,
        session.sessionId,
        { cause: err },
      );
    }
  }
}
