import { openAsBlob } from 'node:fs';
import path from 'node:path';
import { z } from 'zod';
import type { ImageHost } from '../../domain/ports/CapturePort.js';

/** 從回應 body 取出候選 URL */
export type UploadResponseParser = (body: string) => string | undefined;

/**
 * 以 multipart/form-data（欄位 file）上傳到暫存圖床
 * HTTP 非 2xx 丟出錯誤；URL 是否可用由 CaptureUseCase 驗證
 */
export class MultipartImageHost implements ImageHost {
  constructor(
    readonly id: string,
    private readonly endpoint: string,
    private readonly parse: UploadResponseParser,
    private readonly timeoutMs: number,
  ) {}

  async upload(filePath: string): Promise<string | undefined> {
    const file = await openAsBlob(filePath, { type: 'image/png' });
    const form = new FormData();
    form.append('file', file, path.basename(filePath));

    const response = await fetch(this.endpoint, {
      method: 'POST',
      headers: { 'User-Agent': 'clipchat' },
      body: form,
      signal: AbortSignal.timeout(this.timeoutMs),
    });

    if (!response.ok) {
      throw new Error(`${this.id} returned ${response.status}`);
    }
    return this.parse(await response.text());
  }
}

const FileIoResponse = z.object({ link: z.string() });
const TmpFilesResponse = z.object({ data: z.object({ url: z.string() }) });

/** 0x0.st：body 即為 URL */
export const parsePlainTextUrl: UploadResponseParser = (body) => body.trim() || undefined;

/** file.io：{ "link": "..." } */
export const parseFileIoResponse: UploadResponseParser = (body) => {
  const parsed = FileIoResponse.safeParse(JSON.parse(body));
  return parsed.success ? parsed.data.link : undefined;
};

/** tmpfiles.org：{ "data": { "url": "..." } }，http 轉為 https */
export const parseTmpFilesResponse: UploadResponseParser = (body) => {
  const parsed = TmpFilesResponse.safeParse(JSON.parse(body));
  if (!parsed.success) return undefined;
  const url = parsed.data.data.url;
  return url.startsWith('http://') ? `https://${url.slice('http://'.length)}` : url;
};

/** 依優先順序：0x0.st → file.io → tmpfiles.org */
export function createDefaultImageHosts(timeoutMs: number): ImageHost[] {
  return [
    new MultipartImageHost('0x0.st', 'https://0x0.st', parsePlainTextUrl, timeoutMs),
    new MultipartImageHost('file.io', 'https://file.io', parseFileIoResponse, timeoutMs),
    new MultipartImageHost('tmpfiles.org', 'https://tmpfiles.org/api/v1/upload', parseTmpFilesResponse, timeoutMs),
  ];
}
