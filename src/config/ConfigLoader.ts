import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { config as loadDotEnvFile } from 'dotenv';
import { z } from 'zod';
import { isLogLevel, LOG_LEVELS } from '../shared/Logger.js';
import { DEFAULT_CONFIG, DEFAULT_CONFIG_FILE } from './defaults.js';
import type { ClipChatConfig, PartialConfig } from './types.js';

export type { ClipChatConfig, PartialConfig } from './types.js';

const FileConfigSchema = z.object({
  api: z.object({
    apiKey: z.string(),
    baseUrl: z.string(),
    model: z.string(),
    translateModel: z.string(),
    multimodalModels: z.array(z.string()),
    timeoutMs: z.number(),
  }).partial().optional(),
  storage: z.object({
    historyDir: z.string(),
    screenshotDir: z.string(),
  }).partial().optional(),
  capture: z.object({
    screenshot: z.boolean(),
    commandTimeoutMs: z.number(),
    uploadTimeoutMs: z.number(),
  }).partial().optional(),
  server: z.object({
    port: z.number(),
  }).partial().optional(),
  logLevel: z.string().optional(),
});

export interface LoadConfigOptions {
  /** 設定檔路徑；未指定時使用 ~/.clipchat.json（不存在則略過） */
  configPath?: string;
  /** CLI 層級的覆蓋值（優先於環境變數與設定檔） */
  overrides?: PartialConfig;
  env?: NodeJS.ProcessEnv;
}

/** 展開開頭的 ~ */
export function expandHome(p: string): string {
  if (p === '~') return os.homedir();
  if (p.startsWith('~/')) return path.join(os.homedir(), p.slice(2));
  return p;
}

/** 讀取工作目錄下的 .env.local 與 .env（已存在的環境變數不會被覆蓋） */
export function loadDotEnv(cwd: string = process.cwd()): void {
  const localEnvPath = path.resolve(cwd, '.env.local');
  if (fs.existsSync(localEnvPath)) {
    loadDotEnvFile({ path: localEnvPath });
  }
  loadDotEnvFile({ path: path.resolve(cwd, '.env') });
}

function readConfigFile(configPath: string | undefined): PartialConfig {
  const explicit = configPath !== undefined;
  const resolved = expandHome(configPath ?? DEFAULT_CONFIG_FILE);

  if (!fs.existsSync(resolved)) {
    if (explicit) throw new Error(`Config file not found: ${resolved}`);
    return {};
  }

  const raw: unknown = JSON.parse(fs.readFileSync(resolved, 'utf-8'));
  const parsed = FileConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new Error(`Invalid config file ${resolved}: ${issues}`);
  }
  return parsed.data;
}

/** 環境變數 → 部分設定；空字串視為未設定 */
function readEnv(env: NodeJS.ProcessEnv): PartialConfig {
  const value = (name: string): string | undefined => {
    const v = env[name]?.trim();
    return v ? v : undefined;
  };
  const port = value('CLIPCHAT_PORT');
  const multimodal = value('CLIPCHAT_MULTIMODAL_MODELS');

  return {
    api: {
      apiKey: value('OPENROUTER_API_KEY'),
      model: value('OPENROUTER_MODEL'),
      baseUrl: value('OPENROUTER_BASE_URL'),
      translateModel: value('CLIPCHAT_TRANSLATE_MODEL'),
      multimodalModels: multimodal?.split(',').map((m) => m.trim()).filter((m) => m.length > 0),
    },
    storage: {
      historyDir: value('CLIPCHAT_HISTORY_DIR'),
      screenshotDir: value('CLIPCHAT_SCREENSHOT_DIR'),
    },
    server: {
      port: port === undefined ? undefined : Number(port),
    },
    logLevel: value('CLIPCHAT_LOG_LEVEL'),
  };
}

/** partial 覆蓋 base，undefined 欄位保留 base 的值 */
function merge(base: ClipChatConfig, partial: PartialConfig): ClipChatConfig {
  const api = partial.api ?? {};
  const storage = partial.storage ?? {};
  const capture = partial.capture ?? {};
  const server = partial.server ?? {};

  return {
    api: {
      apiKey: api.apiKey ?? base.api.apiKey,
      baseUrl: api.baseUrl ?? base.api.baseUrl,
      model: api.model ?? base.api.model,
      translateModel: api.translateModel ?? base.api.translateModel,
      multimodalModels: api.multimodalModels ?? base.api.multimodalModels,
      timeoutMs: api.timeoutMs ?? base.api.timeoutMs,
    },
    storage: {
      historyDir: storage.historyDir ?? base.storage.historyDir,
      screenshotDir: storage.screenshotDir ?? base.storage.screenshotDir,
    },
    capture: {
      screenshot: capture.screenshot ?? base.capture.screenshot,
      commandTimeoutMs: capture.commandTimeoutMs ?? base.capture.commandTimeoutMs,
      uploadTimeoutMs: capture.uploadTimeoutMs ?? base.capture.uploadTimeoutMs,
    },
    server: {
      port: server.port ?? base.server.port,
    },
    logLevel: resolveLogLevel(partial.logLevel, base),
  };
}

function resolveLogLevel(value: string | undefined, base: ClipChatConfig): ClipChatConfig['logLevel'] {
  if (value === undefined) return base.logLevel;
  if (!isLogLevel(value)) {
    throw new Error(`logLevel must be one of ${LOG_LEVELS.join(', ')}`);
  }
  return value;
}

function isPositiveInteger(n: number): boolean {
  return Number.isInteger(n) && n > 0;
}

/** 驗證設定值的合法性 */
function validate(config: ClipChatConfig): void {
  const { port } = config.server;
  if (!Number.isInteger(port) || port < 1 || port > 65535) {
    throw new Error('port must be an integer between 1 and 65535');
  }

  const timeouts = [
    config.api.timeoutMs,
    config.capture.commandTimeoutMs,
    config.capture.uploadTimeoutMs,
  ];
  if (!timeouts.every(isPositiveInteger)) {
    throw new Error('timeouts must be positive integers');
  }
}

/**
 * 載入設定
 * 合併順序：defaults < 設定檔 < 環境變數 < overrides
 * 目錄路徑在回傳前展開 ~
 */
export function loadConfig(options: LoadConfigOptions = {}): ClipChatConfig {
  const env = options.env ?? process.env;

  let merged = merge(DEFAULT_CONFIG, readConfigFile(options.configPath));
  merged = merge(merged, readEnv(env));
  if (options.overrides) {
    merged = merge(merged, options.overrides);
  }

  merged.storage = {
    historyDir: expandHome(merged.storage.historyDir),
    screenshotDir: expandHome(merged.storage.screenshotDir),
  };

  validate(merged);
  return merged;
}

/** chat 模型是否可接收圖片片段 */
export function supportsImageInput(config: ClipChatConfig): boolean {
  return config.api.multimodalModels.includes(config.api.model);
}

/** 呼叫 API 的指令才需要 key */
export function requireApiKey(config: ClipChatConfig): string {
  if (!config.api.apiKey) {
    throw new Error('OPENROUTER_API_KEY is not set');
  }
  return config.api.apiKey;
}
