import readline from 'node:readline';
import type { Session } from '../../domain/entities/Session.js';
import type { ChatPresenter, DesktopNotifier, NoticeSeverity } from '../../domain/ports/PresenterPort.js';
import { OutputFormatter, formatMessageLine } from '../formatters/OutputFormatter.js';

export interface TerminalPresenterOptions {
  input?: NodeJS.ReadableStream;
  output?: NodeJS.WritableStream;
  /** 有提供時 warning / error 也送到桌面通知 */
  notifier?: DesktopNotifier;
  prompt?: string;
}

const NOTICE_PREFIX: Record<NoticeSeverity, string> = {
  info: '',
  warning: 'Warning: ',
  error: 'Error: ',
};

/**
 * 終端機版的對話視窗
 *
 * - 只輸出新增的訊息；訊息數變少（clear）時重印整份 transcript
 * - stdin 關閉（Ctrl+D）視為取消
 * - 沒有人在等輸入時收到的行先排隊，下一次 readInput 依序取出
 */
export class TerminalPresenter implements ChatPresenter {
  private readonly rl: readline.Interface;
  private readonly output: NodeJS.WritableStream;
  private readonly formatter = new OutputFormatter();
  private readonly notifier?: DesktopNotifier;
  private readonly prompt: string;
  private rendered = 0;
  private headerShown = false;
  private closed = false;
  private readonly pendingLines: string[] = [];
  private waiting?: (line: string | undefined) => void;

  constructor(options: TerminalPresenterOptions = {}) {
    this.output = options.output ?? process.stdout;
    this.notifier = options.notifier;
    this.prompt = options.prompt ?? 'Your question: ';
    this.rl = readline.createInterface({
      input: options.input ?? process.stdin,
      output: this.output,
      terminal: false,
    });
    this.rl.on('line', (line) => {
      const waiting = this.waiting;
      if (waiting) {
        this.waiting = undefined;
        waiting(line);
      } else {
        this.pendingLines.push(line);
      }
    });
    this.rl.once('close', () => {
      this.closed = true;
      const waiting = this.waiting;
      this.waiting = undefined;
      waiting?.(undefined);
    });
  }

  readInput(): Promise<string | undefined> {
    const queued = this.pendingLines.shift();
    if (queued !== undefined) return Promise.resolve(queued);
    if (this.closed) return Promise.resolve(undefined);

    this.output.write(this.prompt);
    return new Promise((resolve) => {
      this.waiting = resolve;
    });
  }

  async onTranscriptChanged(session: Session): Promise<void> {
    if (!this.headerShown || session.messages.length < this.rendered) {
      this.write(this.formatter.formatTranscript(session));
      this.headerShown = true;
    } else {
      for (const message of session.messages.slice(this.rendered)) {
        this.write(`\n${formatMessageLine(message.role, message.content)}`);
      }
    }
    this.rendered = session.messages.length;
  }

  async showHelp(text: string): Promise<void> {
    this.write(text);
  }

  async showHistory(session: Session): Promise<void> {
    this.write(this.formatter.formatTranscript(session));
  }

  async onNotice(message: string, severity: NoticeSeverity): Promise<void> {
    this.write(`${NOTICE_PREFIX[severity]}${message}`);
    if (this.notifier && severity !== 'info') {
      await this.notifier.notify('clipchat', message, { urgency: severity === 'error' ? 'critical' : 'normal' });
    }
  }

  close(): void {
    this.rl.close();
  }

  private write(text: string): void {
    this.output.write(text + '\n');
  }
}
