export type MessageRole = 'user' | 'assistant' | 'system';

/** 多模態訊息的單一片段 */
export type ContentPart =
  | { kind: 'text'; text: string }
  | { kind: 'image'; url: string };

export type MessageContent = string | ContentPart[];

export interface Message {
  role: MessageRole;
  content: MessageContent;
  /** ISO-8601 */
  timestamp: string;
}

/** 建立 session 時擷取的內容，建立後不再變動 */
export interface CapturedContent {
  text: string;
  screenshotPath?: string;
  /** 只有在 screenshotPath 存在且上傳成功時才會設定 */
  screenshotURL?: string;
}

export interface Session {
  sessionId: string;
  /** ISO-8601 */
  createdAt: string;
  capturedContent: CapturedContent;
  messages: Message[];
}

/** history list 使用的摘要 */
export interface SessionSummary {
  sessionId: string;
  createdAt: string;
  messageCount: number;
  hasScreenshot: boolean;
  preview: string;
}
