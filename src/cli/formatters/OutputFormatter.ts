import type { MessageContent, MessageRole, Session, SessionSummary } from '../../domain/entities/Session.js';

export type OutputFormat = 'json' | 'text';

const ROLE_LABELS: Record<MessageRole, string> = {
  user: 'YOU',
  assistant: 'ASSISTANT',
  system: 'SYSTEM',
};

/** 多模態內容轉成可讀文字，圖片以 [image: url] 表示 */
export function contentToText(content: MessageContent): string {
  if (typeof content === 'string') return content;
  return content
    .map((part) => (part.kind === 'text' ? part.text : `[image: ${part.url}]`))
    .join('\n');
}

export function formatMessageLine(role: MessageRole, content: MessageContent): string {
  return `${ROLE_LABELS[role]}: ${contentToText(content)}`;
}

/**
 * CLI 與 transcript server 共用的格式化器
 *
 * - formatTranscript：對話視窗的完整內容（header + 每則訊息）
 * - formatSessionList：history list 的輸出
 * - formatObject：任意物件（health report 等）
 */
export class OutputFormatter {
  formatTranscript(session: Session): string {
    const { capturedContent } = session;
    const header = [
      '=== clipchat ===',
      `Session ID: ${session.sessionId}`,
      `Selected text: ${capturedContent.text}`,
      `Screenshot: ${capturedContent.screenshotPath ?? '(none)'}`,
      `Screenshot URL: ${capturedContent.screenshotURL ?? '(none)'}`,
    ];

    const body = session.messages.length === 0
      ? ['(no messages)']
      : session.messages.map((m) => formatMessageLine(m.role, m.content));

    return [...header, '', '=== Chat History ===', body.join('\n\n')].join('\n');
  }

  formatSessionList(sessions: SessionSummary[], format: OutputFormat): string {
    if (format === 'json') {
      return JSON.stringify({ sessions, count: sessions.length }, null, 2);
    }
    if (sessions.length === 0) return 'No sessions found.';

    return sessions
      .map((s) => {
        const flags = s.hasScreenshot ? ' [screenshot]' : '';
        return `${s.sessionId}  ${s.createdAt}  ${s.messageCount} msgs${flags}  ${s.preview}`;
      })
      .join('\n');
  }

  formatObject(data: unknown, format: OutputFormat): string {
    if (format === 'json') {
      return JSON.stringify(data, null, 2);
    }
    return this.flattenToText(data);
  }

  /** 將任意物件平展為人類可讀文字 */
  private flattenToText(data: unknown, indent: number = 0): string {
    if (data === null || data === undefined) return '';
    if (typeof data !== 'object') return String(data);

    const prefix = '  '.repeat(indent);
    if (Array.isArray(data)) {
      return data.map((item, i) => `${prefix}[${i}] ${this.flattenToText(item, indent + 1)}`).join('\n');
    }

    return Object.entries(data)
      .map(([key, val]) => {
        if (typeof val === 'object' && val !== null) {
          return `${prefix}${key}:\n${this.flattenToText(val, indent + 1)}`;
        }
        return `${prefix}${key}: ${val}`;
      })
      .join('\n');
  }
}

export function parseOutputFormat(value: string): OutputFormat {
  if (value === 'json' || value === 'text') return value;
  throw new Error(`Invalid format "${value}". Use json or text.`);
}
