import fs from 'node:fs/promises';
import type { ClipChatConfig } from '../config/types.js';
import { findOnPath } from '../infrastructure/capture/CommandRunner.js';

export type ToolPurpose = 'text' | 'screenshot' | 'notification';

export interface ToolStatus {
  command: string;
  purpose: ToolPurpose;
  available: boolean;
  path?: string;
}

export interface DirectoryStatus {
  path: string;
  writable: boolean;
}

export interface HealthReport {
  healthy: boolean;
  apiKeyConfigured: boolean;
  directories: DirectoryStatus[];
  tools: ToolStatus[];
  /** 造成 unhealthy 的問題 */
  issues: string[];
  /** 只會降級的問題 */
  warnings: string[];
}

/** 所有會被呼叫的外部程式 */
export const EXTERNAL_TOOLS: ReadonlyArray<{ command: string; purpose: ToolPurpose }> = [
  { command: 'xclip', purpose: 'text' },
  { command: 'copyq', purpose: 'text' },
  { command: 'xsel', purpose: 'text' },
  { command: 'import', purpose: 'screenshot' },
  { command: 'scrot', purpose: 'screenshot' },
  { command: 'gnome-screenshot', purpose: 'screenshot' },
  { command: 'notify-send', purpose: 'notification' },
];

export type CommandLocator = (command: string) => Promise<string | undefined>;

/**
 * 健康檢查用例：確認執行環境
 *
 * 檢查項目：
 * 1. API key 是否設定
 * 2. 紀錄與截圖目錄是否可寫（不存在會先建立）
 * 3. 外部程式是否在 PATH 上
 *
 * healthy 需要 API key、目錄可寫、至少一個文字來源，以及 copyq
 */
export class HealthCheckUseCase {
  constructor(
    private readonly config: ClipChatConfig,
    private readonly locate: CommandLocator = (command) => findOnPath(command),
  ) {}

  async check(): Promise<HealthReport> {
    const issues: string[] = [];
    const warnings: string[] = [];

    const apiKeyConfigured = this.config.api.apiKey.length > 0;
    if (!apiKeyConfigured) issues.push('OPENROUTER_API_KEY is not set');

    const directories = await Promise.all([
      this.checkDirectory(this.config.storage.historyDir),
      this.checkDirectory(this.config.storage.screenshotDir),
    ]);
    for (const dir of directories) {
      if (!dir.writable) issues.push(`Directory not writable: ${dir.path}`);
    }

    const tools = await Promise.all(EXTERNAL_TOOLS.map(async ({ command, purpose }): Promise<ToolStatus> => {
      const found = await this.locate(command);
      return found ? { command, purpose, available: true, path: found } : { command, purpose, available: false };
    }));

    const available = (purpose: ToolPurpose) => tools.some((t) => t.purpose === purpose && t.available);
    if (!available('text')) issues.push('No selection reader found (xclip, xsel or copyq)');
    if (!tools.some((t) => t.command === 'copyq' && t.available)) issues.push('copyq not found on PATH');
    if (!available('screenshot')) warnings.push('No screenshot tool found; sessions will be text-only');
    if (!available('notification')) warnings.push('notify-send not found; desktop notifications are disabled');

    return {
      healthy: issues.length === 0,
      apiKeyConfigured,
      directories,
      tools,
      issues,
      warnings,
    };
  }

  private async checkDirectory(dirPath: string): Promise<DirectoryStatus> {
    try {
      await fs.mkdir(dirPath, { recursive: true });
      await fs.access(dirPath, fs.constants.W_OK);
      return { path: dirPath, writable: true };
    } catch {
      return { path: dirPath, writable: false };
    }
  }
}
