import OpenAI from 'openai';
import { z } from 'zod';
import type { CompletionPort, WireMessage } from '../../domain/ports/CompletionPort.js';
import {
  MalformedResponseError,
  TransportFailureError,
  UnauthorizedError,
  type ApiError,
} from '../../domain/errors/DomainErrors.js';
import { Logger, errorMessage } from '../../shared/Logger.js';

/**
 * HTTP Completion Adapter
 *
 * 透過 OpenAI-compatible API（預設 OpenRouter）送出非串流的 chat completion。
 * 不重試：失敗回報一次，由呼叫端決定下一步。
 */

export interface HttpCompletionConfig {
  baseUrl: string;
  apiKey: string;
  model: string;
  /** 請求逾時（毫秒），預設 60 秒 */
  timeoutMs?: number;
}

const CompletionResponse = z.object({
  choices: z.array(z.unknown()).min(1),
});

const FirstChoice = z.object({
  message: z.object({ content: z.string() }),
});

/** 取出 choices[0].message.content；任何不符都回傳 undefined */
export function extractCompletionContent(response: unknown): string | undefined {
  const parsed = CompletionResponse.safeParse(response);
  if (!parsed.success) return undefined;

  const choice = FirstChoice.safeParse(parsed.data.choices[0]);
  if (!choice.success) return undefined;

  const content = choice.data.message.content;
  return content.trim() ? content : undefined;
}

function statusOf(err: unknown): number | undefined {
  if (typeof err === 'object' && err !== null && 'status' in err && typeof err.status === 'number') {
    return err.status;
  }
  return undefined;
}

function flattenText(content: WireMessage['content']): string {
  if (typeof content === 'string') return content;
  return content
    .map((part) => (part.type === 'text' ? part.text : `[image: ${part.image_url.url}]`))
    .join('\n');
}

/** system / assistant 只接受文字，圖片片段只保留在 user 訊息 */
function toChatParam(message: WireMessage): OpenAI.Chat.ChatCompletionMessageParam {
  switch (message.role) {
    case 'user':
      return { role: 'user', content: message.content };
    case 'assistant':
      return { role: 'assistant', content: flattenText(message.content) };
    case 'system':
      return { role: 'system', content: flattenText(message.content) };
  }
}

export class HttpCompletionAdapter implements CompletionPort {
  readonly model: string;
  private readonly client: OpenAI;
  private readonly logger = new Logger('HttpCompletionAdapter');

  constructor(config: HttpCompletionConfig) {
    this.model = config.model;
    this.client = new OpenAI({
      apiKey: config.apiKey,
      baseURL: config.baseUrl,
      maxRetries: 0,
      timeout: config.timeoutMs ?? 60000,
    });
  }

  async complete(messages: WireMessage[]): Promise<string> {
    let response: unknown;
    try {
      response = await this.client.chat.completions.create({
        model: this.model,
        messages: messages.map(toChatParam),
        stream: false,
      });
    } catch (err) {
      throw this.classify(err);
    }

    const content = extractCompletionContent(response);
    if (content === undefined) {
      this.logger.warn('Malformed completion response', { model: this.model });
      throw new MalformedResponseError('Failed to get response from API: malformed completion response');
    }
    return content;
  }

  private classify(err: unknown): ApiError {
    const status = statusOf(err);
    this.logger.warn('Completion request failed', { model: this.model, status, error: errorMessage(err) });

    if (status === 401 || status === 403) {
      return new UnauthorizedError(`API rejected the credentials (HTTP ${status})`, { cause: err });
    }
    return new TransportFailureError(
      `Failed to get response from API: ${errorMessage(err)}`,
      status,
      { cause: err },
    );
  }
}
