import type { MessageContent, Session } from '../domain/entities/Session.js';
import type { WireMessage, WirePart } from '../domain/ports/CompletionPort.js';
import { isSeedMessage } from '../domain/value-objects/SeedTemplate.js';

function toWireContent(content: MessageContent): string | WirePart[] {
  if (typeof content === 'string') return content;
  return content.map((part): WirePart => (part.kind === 'text'
    ? { type: 'text', text: part.text }
    : { type: 'image_url', image_url: { url: part.url } }));
}

export interface MessageBuilderOptions {
  /** 模型不支援圖片時為 false，URL 改以文字附在 seed 後面 */
  imageParts?: boolean;
}

/**
 * 將儲存的歷史轉成 completion API 的訊息格式
 *
 * 有 screenshotURL 時只有 seed 訊息會附上圖片（文字片段 + 圖片片段），
 * 每次 build 都重新投影，不回寫到 session。
 */
export class MessageBuilder {
  private readonly imageParts: boolean;

  constructor(options: MessageBuilderOptions = {}) {
    this.imageParts = options.imageParts ?? true;
  }

  build(session: Session): WireMessage[] {
    const url = session.capturedContent.screenshotURL;

    return session.messages.map((message, index): WireMessage => {
      if (url && isSeedMessage(message, index) && typeof message.content === 'string') {
        if (!this.imageParts) {
          return { role: message.role, content: `${message.content}\n\n[Screenshot available at: ${url}]` };
        }
        return {
          role: message.role,
          content: [
            { type: 'text', text: message.content },
            { type: 'image_url', image_url: { url } },
          ],
        };
      }
      return { role: message.role, content: toWireContent(message.content) };
    });
  }
}
