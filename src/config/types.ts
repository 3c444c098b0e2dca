import type { LogLevel } from '../shared/Logger.js';

/** Completion API 設定（OpenAI-compatible endpoint，預設 OpenRouter） */
export interface ApiConfig {
  /** 必填，但只有 chat / translate 需要 */
  apiKey: string;
  baseUrl: string;
  /** chat 使用的模型 */
  model: string;
  /** translate 使用的模型 */
  translateModel: string;
  /** 可接收圖片的模型；其他模型改以文字附上截圖 URL */
  multimodalModels: string[];
  /** 單次請求逾時（毫秒），逾時視為 transport failure */
  timeoutMs: number;
}

/** 紀錄與截圖的存放位置 */
export interface StorageConfig {
  historyDir: string;
  screenshotDir: string;
}

/** 擷取設定 */
export interface CaptureConfig {
  /** 是否嘗試截圖 */
  screenshot: boolean;
  /** 每個外部指令的逾時（毫秒） */
  commandTimeoutMs: number;
  /** 每個圖床上傳的逾時（毫秒） */
  uploadTimeoutMs: number;
}

/** transcript 檢視伺服器設定 */
export interface ServerConfig {
  port: number;
}

/** 完整設定 */
export interface ClipChatConfig {
  api: ApiConfig;
  storage: StorageConfig;
  capture: CaptureConfig;
  server: ServerConfig;
  logLevel: LogLevel;
}

/** 部分設定（用於 merge） */
export interface PartialConfig {
  api?: Partial<ApiConfig>;
  storage?: Partial<StorageConfig>;
  capture?: Partial<CaptureConfig>;
  server?: Partial<ServerConfig>;
  logLevel?: string;
}
