import type { CapturedContent, Message, Session, SessionSummary } from '../entities/Session.js';

/**
 * Session 紀錄的唯一擁有者
 *
 * 所有回傳的 Session 都是剛寫入（或讀出）磁碟的版本，
 * 呼叫端應以回傳值取代手上的副本。
 */
export interface SessionStorePort {
  /** 配置新的 sessionId（保證目前沒有對應檔案） */
  nextSessionId(): Promise<string>;
  create(content: CapturedContent, sessionId?: string): Promise<Session>;
  append(session: Session, message: Message): Promise<Session>;
  clear(session: Session): Promise<Session>;
  load(sessionId: string): Promise<Session>;
  list(): Promise<SessionSummary[]>;
  /** 紀錄檔路徑，用於結束通知 */
  locationOf(sessionId: string): string;
}
