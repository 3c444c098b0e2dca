export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

export type LogSink = (line: string) => void;

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 0, info: 1, warn: 2, error: 3,
};

const stderrSink: LogSink = (line) => {
  process.stderr.write(line + '\n');
};

// 互動式終端機預設只輸出 warn 以上，CLI 會依設定調整
let defaultMinLevel: LogLevel = 'warn';
let sink: LogSink = stderrSink;

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/** 從任意 thrown value 取出訊息 */
export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}

/** 結構化 JSON logger */
export class Logger {
  static setDefaultLevel(level: LogLevel): void {
    defaultMinLevel = level;
  }

  /** 測試用：替換輸出目的地，不帶參數則還原為 stderr */
  static setSink(next?: LogSink): void {
    sink = next ?? stderrSink;
  }

  constructor(
    private readonly context: string,
    private readonly minLevel?: LogLevel,
  ) {}

  private shouldLog(level: LogLevel): boolean {
    return LEVEL_RANK[level] >= LEVEL_RANK[this.minLevel ?? defaultMinLevel];
  }

  private log(level: LogLevel, message: string, data?: Record<string, unknown>): void {
    if (!this.shouldLog(level)) return;
    const entry = {
      timestamp: new Date().toISOString(),
      level,
      context: this.context,
      message,
      ...data,
    };
    sink(JSON.stringify(entry));
  }

  debug(msg: string, data?: Record<string, unknown>) { this.log('debug', msg, data); }
  info(msg: string, data?: Record<string, unknown>) { this.log('info', msg, data); }
  warn(msg: string, data?: Record<string, unknown>) { this.log('warn', msg, data); }
  error(msg: string, data?: Record<string, unknown>) { this.log('error', msg, data); }
}
