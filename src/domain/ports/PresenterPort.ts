import type { Session } from '../entities/Session.js';

export type NoticeSeverity = 'info' | 'warning' | 'error';

export interface NoticePort {
  onNotice(message: string, severity: NoticeSeverity): Promise<void>;
}

/**
 * 對話視窗的邊界
 *
 * readInput 回傳 undefined 代表使用者取消（唯一的取消點）。
 */
export interface ChatPresenter extends NoticePort {
  readInput(): Promise<string | undefined>;
  /** 每次 session 變動後呼叫 */
  onTranscriptChanged(session: Session): Promise<void>;
  showHelp(text: string): Promise<void>;
  showHistory(session: Session): Promise<void>;
}

export interface NotifyOptions {
  timeoutMs?: number;
  urgency?: 'low' | 'normal' | 'critical';
}

/** 桌面通知 */
export interface DesktopNotifier {
  notify(title: string, body: string, options?: NotifyOptions): Promise<void>;
}
