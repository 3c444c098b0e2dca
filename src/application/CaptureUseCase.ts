import fs from 'node:fs/promises';
import path from 'node:path';
import type { CapturedContent } from '../domain/entities/Session.js';
import type { ImageHost, ScreenshotTool, TextSource } from '../domain/ports/CapturePort.js';
import type { NoticePort } from '../domain/ports/PresenterPort.js';
import {
  NoTextAvailableError,
  ScreenshotUnavailableError,
  UploadUnavailableError,
  type CaptureWarning,
} from '../domain/errors/DomainErrors.js';
import { firstAvailable } from '../shared/Cascade.js';
import { Logger, errorMessage } from '../shared/Logger.js';

export interface CaptureSources {
  text: TextSource[];
  screenshot: ScreenshotTool[];
  hosts: ImageHost[];
}

export interface CaptureOptions {
  /** 截圖目標路徑；未指定則不截圖 */
  screenshotPath?: string;
}

const ERROR_MARKERS = ['error', 'failed', 'invalid'];

/** 上傳結果必須是 http(s) URL 且不含錯誤字樣 */
export function isUsableUploadUrl(candidate: string): boolean {
  const lower = candidate.toLowerCase();
  return /^https?:\/\//.test(candidate) && !ERROR_MARKERS.some((marker) => lower.includes(marker));
}

async function isNonEmptyFile(filePath: string): Promise<boolean> {
  const stat = await fs.stat(filePath);
  return stat.isFile() && stat.size > 0;
}

/**
 * 擷取用例：決定使用者「指的是哪段內容」
 *
 * 1. 文字：依序嘗試各來源，第一個非空者勝出；全部為空則 NoTextAvailableError
 * 2. 截圖：依序嘗試各截圖工具，第一個產生非空檔案者勝出；全部失敗只降級
 * 3. 上傳：依序嘗試各圖床，第一個通過 URL 驗證者勝出；全部失敗只降級
 */
export class CaptureUseCase {
  private readonly logger = new Logger('CaptureUseCase');

  constructor(
    private readonly sources: CaptureSources,
    private readonly notices?: NoticePort,
  ) {}

  async resolve(options: CaptureOptions = {}): Promise<CapturedContent> {
    const text = await this.resolveText();
    const content: CapturedContent = { text };

    if (!options.screenshotPath) return content;

    const screenshotPath = await this.captureScreenshot(options.screenshotPath);
    if (!screenshotPath) return content;
    content.screenshotPath = screenshotPath;

    const url = await this.uploadScreenshot(screenshotPath);
    if (url) content.screenshotURL = url;

    return content;
  }

  async resolveText(): Promise<string> {
    const hit = await firstAvailable(
      this.sources.text.map((source) => ({ id: source.id, run: () => source.read() })),
      { name: 'text', accept: (value) => value.trim().length > 0, logger: this.logger },
    );

    if (!hit) {
      this.logger.warn('No text available from any source', {
        sources: this.sources.text.map((s) => s.id),
      });
      throw new NoTextAvailableError();
    }

    this.logger.info('Text captured', { source: hit.stepId, length: hit.value.length });
    return hit.value;
  }

  async captureScreenshot(targetPath: string): Promise<string | undefined> {
    try {
      await fs.mkdir(path.dirname(targetPath), { recursive: true });
    } catch (err) {
      this.logger.warn('Screenshot directory unavailable', { path: targetPath, error: errorMessage(err) });
      await this.warn(new ScreenshotUnavailableError({ cause: err }));
      return undefined;
    }

    await this.notices?.onNotice('Taking screenshot...', 'info');
    const hit = await firstAvailable(
      this.sources.screenshot.map((tool) => ({
        id: tool.id,
        run: async () => ((await tool.capture(targetPath)) && (await isNonEmptyFile(targetPath))
          ? targetPath
          : undefined),
      })),
      { name: 'screenshot', logger: this.logger },
    );

    if (!hit) {
      await this.warn(new ScreenshotUnavailableError());
      return undefined;
    }

    this.logger.info('Screenshot captured', { tool: hit.stepId, path: targetPath });
    return hit.value;
  }

  async uploadScreenshot(filePath: string): Promise<string | undefined> {
    await this.notices?.onNotice('Uploading screenshot...', 'info');
    const hit = await firstAvailable(
      this.sources.hosts.map((host) => ({ id: host.id, run: () => host.upload(filePath) })),
      { name: 'upload', accept: isUsableUploadUrl, logger: this.logger },
    );

    if (!hit) {
      await this.warn(new UploadUnavailableError(filePath));
      return undefined;
    }

    this.logger.info('Screenshot uploaded', { host: hit.stepId, url: hit.value });
    await this.notices?.onNotice(`Screenshot uploaded: ${hit.value}`, 'info');
    return hit.value;
  }

  private async warn(warning: CaptureWarning): Promise<void> {
    this.logger.warn(warning.message, { code: warning.code });
    await this.notices?.onNotice(warning.message, 'warning');
  }
}
