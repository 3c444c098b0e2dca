import type { Message } from '../entities/Session.js';

/** 用來辨識 seed 訊息的固定標記 */
export const SEED_MARKER = 'I have selected the following text:';

/**
 * 以擷取到的文字建立 seed 訊息內容
 * 文字原樣嵌入，不截斷、不跳脫
 */
export function renderSeed(text: string): string {
  return [
    `${SEED_MARKER} "${text}"`,
    '',
    'I also took a screenshot of my current screen (if available).',
    '',
    'Please help me understand or discuss this content. You can ask me questions about it, explain it, or help me with any related tasks. I\'ll be asking you questions about this content.',
  ].join('\n');
}

/**
 * seed 只看第一則訊息：必須是 user、純文字、且含標記
 * 之後的訊息即使含有標記字串也不算
 */
export function isSeedMessage(message: Message, index: number): boolean {
  return index === 0
    && message.role === 'user'
    && typeof message.content === 'string'
    && message.content.includes(SEED_MARKER);
}
