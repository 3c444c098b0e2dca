import { Logger, errorMessage } from './Logger.js';

/**
 * Cascade 的單一步驟
 * 回傳 undefined 或丟出錯誤都視為「此來源不存在」，改試下一個
 */
export interface CascadeStep<T> {
  readonly id: string;
  run(): Promise<T | undefined>;
}

export interface CascadeOptions<T> {
  /** 用於 log 的 cascade 名稱 */
  name: string;
  /** 額外驗證；未通過的值視同不存在 */
  accept?: (value: T) => boolean;
  logger?: Logger;
}

export interface CascadeHit<T> {
  value: T;
  stepId: string;
  /** 依序嘗試過的步驟（含命中的那一步） */
  attempted: string[];
}

const defaultLogger = new Logger('Cascade');

/**
 * 依序執行步驟，回傳第一個可用的值
 * 命中後不再呼叫後續步驟；全部失敗時回傳 undefined
 */
export async function firstAvailable<T>(
  steps: readonly CascadeStep<T>[],
  options: CascadeOptions<T>,
): Promise<CascadeHit<T> | undefined> {
  const logger = options.logger ?? defaultLogger;
  const attempted: string[] = [];

  for (const step of steps) {
    attempted.push(step.id);

    let value: T | undefined;
    try {
      value = await step.run();
    } catch (err) {
      logger.debug('Cascade step failed', {
        cascade: options.name, step: step.id, error: errorMessage(err),
      });
      continue;
    }

    if (value === undefined || (options.accept && !options.accept(value))) {
      logger.debug('Cascade step yielded nothing', { cascade: options.name, step: step.id });
      continue;
    }

    logger.debug('Cascade step succeeded', { cascade: options.name, step: step.id });
    return { value, stepId: step.id, attempted };
  }

  logger.debug('Cascade exhausted', { cascade: options.name, attempted });
  return undefined;
}
