import type { CapturedContent, Message, Session } from '../domain/entities/Session.js';
import type { CompletionPort } from '../domain/ports/CompletionPort.js';
import type { ChatPresenter } from '../domain/ports/PresenterPort.js';
import type { SessionStorePort } from '../domain/ports/SessionStorePort.js';
import { ApiError, StoreError, TransportFailureError } from '../domain/errors/DomainErrors.js';
import { Logger, errorMessage } from '../shared/Logger.js';
import type { MessageBuilder } from './MessageBuilder.js';

export type ChatState = 'idle' | 'awaiting-input' | 'processing' | 'terminated';

export type ChatCommand = 'help' | 'history' | 'clear';

export type TerminationReason = 'cancelled' | 'exit-command' | 'store-failure';

export type TurnOutcome =
  | { kind: 'terminated'; reason: TerminationReason }
  | { kind: 'command'; command: ChatCommand }
  | { kind: 'ignored' }
  | { kind: 'replied'; reply: string }
  | { kind: 'api-error'; error: ApiError };

export type ChatTermination = Extract<TurnOutcome, { kind: 'terminated' }>;

/** 大小寫敏感 */
export const EXIT_COMMANDS: readonly string[] = ['exit', 'quit', 'bye'];

export const HELP_TEXT = [
  'Available commands:',
  'exit/quit/bye - End chat session',
  'help - Show this help',
  'history - Show chat history',
  'clear - Clear current conversation',
].join('\n');

export interface ChatUseCaseOptions {
  clock?: () => Date;
}

/**
 * 對話用例：回合制的互動狀態機
 *
 * idle → awaiting-input → processing → awaiting-input … → terminated
 *
 * - 手上的 Session 一律是 store 回傳的版本，不自行修改
 * - API 失敗只影響當回合（使用者訊息仍保留），迴圈繼續
 * - store 失敗直接結束 session，不在不一致的狀態下繼續
 */
export class ChatUseCase {
  private readonly logger = new Logger('ChatUseCase');
  private readonly clock: () => Date;
  private currentState: ChatState = 'idle';
  private current?: Session;

  constructor(
    private readonly store: SessionStorePort,
    private readonly builder: MessageBuilder,
    private readonly completion: CompletionPort,
    private readonly presenter: ChatPresenter,
    options: ChatUseCaseOptions = {},
  ) {
    this.clock = options.clock ?? (() => new Date());
  }

  get state(): ChatState {
    return this.currentState;
  }

  get session(): Session | undefined {
    return this.current;
  }

  /** 以擷取內容建立新 session（seed 訊息由 store 寫入） */
  async start(content: CapturedContent, sessionId?: string): Promise<Session> {
    this.assertState('idle');
    return this.open(await this.store.create(content, sessionId));
  }

  /** 接續既有的 session */
  async resume(sessionId: string): Promise<Session> {
    this.assertState('idle');
    return this.open(await this.store.load(sessionId));
  }

  /** 反覆讀取輸入直到結束 */
  async run(): Promise<ChatTermination> {
    for (;;) {
      const outcome = await this.handleInput(await this.presenter.readInput());
      if (outcome.kind === 'terminated') return outcome;
    }
  }

  /**
   * 處理一次輸入
   * @param input - undefined 代表使用者取消
   */
  async handleInput(input: string | undefined): Promise<TurnOutcome> {
    this.assertState('awaiting-input');

    if (input === undefined) return this.terminate('cancelled');

    const text = input.trim();
    if (!text) return { kind: 'ignored' };
    if (EXIT_COMMANDS.includes(text)) return this.terminate('exit-command');

    switch (text) {
      case 'help':
        await this.presenter.showHelp(HELP_TEXT);
        return { kind: 'command', command: 'help' };
      case 'history':
        await this.presenter.showHistory(this.requireSession());
        return { kind: 'command', command: 'history' };
      case 'clear':
        return this.clearConversation();
      default:
        return this.converse(text);
    }
  }

  private async open(session: Session): Promise<Session> {
    this.current = session;
    this.currentState = 'awaiting-input';
    await this.presenter.onTranscriptChanged(session);
    return session;
  }

  private async clearConversation(): Promise<TurnOutcome> {
    try {
      await this.commit(await this.store.clear(this.requireSession()));
    } catch (err) {
      return this.abortOnStoreFailure(err);
    }
    await this.presenter.onNotice('Conversation cleared.', 'info');
    return { kind: 'command', command: 'clear' };
  }

  private async converse(text: string): Promise<TurnOutcome> {
    this.currentState = 'processing';

    try {
      await this.commit(await this.store.append(this.requireSession(), this.message('user', text)));
    } catch (err) {
      return this.abortOnStoreFailure(err);
    }

    await this.presenter.onNotice('Getting AI response...', 'info');

    let reply: string;
    try {
      reply = await this.completion.complete(this.builder.build(this.requireSession()));
    } catch (err) {
      const error = err instanceof ApiError
        ? err
        : new TransportFailureError(`Failed to get response from API: ${errorMessage(err)}`, undefined, { cause: err });
      this.logger.warn('Completion failed', { code: error.code, error: error.message });
      this.currentState = 'awaiting-input';
      await this.presenter.onNotice(error.message, 'error');
      return { kind: 'api-error', error };
    }

    try {
      await this.commit(await this.store.append(this.requireSession(), this.message('assistant', reply)));
    } catch (err) {
      return this.abortOnStoreFailure(err);
    }

    this.currentState = 'awaiting-input';
    return { kind: 'replied', reply };
  }

  private message(role: Message['role'], content: string): Message {
    return { role, content, timestamp: this.clock().toISOString() };
  }

  private async commit(session: Session): Promise<void> {
    this.current = session;
    await this.presenter.onTranscriptChanged(session);
  }

  private async terminate(reason: 'cancelled' | 'exit-command'): Promise<ChatTermination> {
    this.currentState = 'terminated';
    const location = this.store.locationOf(this.requireSession().sessionId);
    await this.presenter.onNotice(`Session ended. History saved to: ${location}`, 'info');
    return { kind: 'terminated', reason };
  }

  private async abortOnStoreFailure(err: unknown): Promise<ChatTermination> {
    this.currentState = 'terminated';
    if (!(err instanceof StoreError)) throw err;

    this.logger.error('Session store failed, ending session', { code: err.code, error: err.message });
    await this.presenter.onNotice(`Session aborted: ${err.message}`, 'error');
    return { kind: 'terminated', reason: 'store-failure' };
  }

  private requireSession(): Session {
    if (!this.current) throw new Error('No active session');
    return this.current;
  }

  private assertState(expected: ChatState): void {
    if (this.currentState !== expected) {
      throw new Error(`Chat is ${this.currentState}, expected ${expected}`);
    }
  }
}
