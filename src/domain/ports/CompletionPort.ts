import type { MessageRole } from '../entities/Session.js';

/** OpenAI-compatible 的訊息片段格式 */
export type WirePart =
  | { type: 'text'; text: string }
  | { type: 'image_url'; image_url: { url: string } };

export interface WireMessage {
  role: MessageRole;
  content: string | WirePart[];
}

/**
 * Chat completion 抽象介面
 *
 * 失敗一律丟出 ApiError 子類別（MalformedResponse / TransportFailure / Unauthorized）。
 */
export interface CompletionPort {
  readonly model: string;
  complete(messages: WireMessage[]): Promise<string>;
}
