import type { ClipboardWriter } from '../domain/ports/CapturePort.js';
import type { CompletionPort } from '../domain/ports/CompletionPort.js';
import type { DesktopNotifier } from '../domain/ports/PresenterPort.js';
import { Logger, errorMessage } from '../shared/Logger.js';
import type { CaptureUseCase } from './CaptureUseCase.js';

export const TRANSLATE_PROMPT = 'Translate, please, in to russian if word is in english or any other language. '
  + 'If its in russian, translate to english. Also, provide some context examples. Word: ';

const SUMMARY_LINES = 3;

export interface TranslationResult {
  source: string;
  /** 模型原始回覆 */
  translation: string;
  /** 去除 markdown 強調與分隔線 */
  cleaned: string;
  /** 通知用的短版 */
  summary: string;
  copied: boolean;
}

/** 移除 **、* 與 --- */
export function cleanTranslation(text: string): string {
  return text.replace(/\*\*/g, '').replace(/\*/g, '').replace(/---/g, '');
}

/** 前三行以空白連接，連續空白壓成一個 */
export function summarizeTranslation(cleaned: string): string {
  return cleaned.split('\n').slice(0, SUMMARY_LINES).join(' ').replace(/ {2,}/g, ' ').trim();
}

/**
 * 翻譯用例：擷取選取文字 → 單次 completion → 桌面通知 + 寫回 CopyQ
 */
export class TranslateUseCase {
  private readonly logger = new Logger('TranslateUseCase');

  constructor(
    private readonly capture: CaptureUseCase,
    private readonly completion: CompletionPort,
    private readonly notifier: DesktopNotifier,
    /** 未提供則不寫回剪貼簿 */
    private readonly clipboard?: ClipboardWriter,
  ) {}

  async translate(): Promise<TranslationResult> {
    const source = await this.capture.resolveText();

    await this.notifier.notify('Translation', 'Calling translation API...', { timeoutMs: 2000 });
    const translation = await this.completion.complete([
      { role: 'user', content: `${TRANSLATE_PROMPT}${source}` },
    ]);

    const cleaned = cleanTranslation(translation);
    const summary = summarizeTranslation(cleaned);
    await this.notifier.notify('Translation', summary, { timeoutMs: 8000 });

    let copied = false;
    if (this.clipboard) {
      try {
        await this.clipboard.write(translation);
        copied = true;
      } catch (err) {
        this.logger.warn('Could not copy translation to clipboard', { error: errorMessage(err) });
      }
    }

    return { source, translation, cleaned, summary, copied };
  }
}
