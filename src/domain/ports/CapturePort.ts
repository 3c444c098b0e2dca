/**
 * 擷取相關的外部能力
 *
 * 每個實作都是 cascade 中的一個步驟：失敗時回傳 undefined / false，
 * 或丟出錯誤（由 cascade 降級為「不存在」），不應中止整個擷取流程。
 */

/** 文字來源（primary selection、CopyQ selection、xsel、CopyQ clipboard） */
export interface TextSource {
  readonly id: string;
  read(): Promise<string | undefined>;
}

/** 截圖工具：回傳工具是否回報成功，實際檔案由呼叫端驗證 */
export interface ScreenshotTool {
  readonly id: string;
  capture(targetPath: string): Promise<boolean>;
}

/** 暫存圖床：回傳候選 URL，是否可用由呼叫端驗證 */
export interface ImageHost {
  readonly id: string;
  upload(filePath: string): Promise<string | undefined>;
}

/** 寫回剪貼簿管理器 */
export interface ClipboardWriter {
  write(text: string): Promise<void>;
}
