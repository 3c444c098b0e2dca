/**
 * - degradable：功能降級但流程繼續（截圖、上傳失敗）
 * - recoverable：本回合失敗，互動迴圈繼續（API 錯誤）
 * - fatal：中止目前流程（擷取不到文字、紀錄讀寫失敗）
 */
export type ErrorClassification = 'degradable' | 'recoverable' | 'fatal';

/** 所有 clipchat domain 錯誤的基底類別 */
export abstract class ClipChatError extends Error {
  abstract readonly classification: ErrorClassification;
  abstract readonly code: string;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = this.constructor.name;
  }
}

// --- Capture ---

export abstract class CaptureError extends ClipChatError {}

export class NoTextAvailableError extends CaptureError {
  readonly classification = 'fatal' as const;
  readonly code = 'NO_TEXT_AVAILABLE';

  constructor(options?: ErrorOptions) {
    super('No text selected or clipboard empty. Please select some text and try again.', options);
  }
}

export abstract class CaptureWarning extends ClipChatError {
  readonly classification = 'degradable' as const;
}

export class ScreenshotUnavailableError extends CaptureWarning {
  readonly code = 'SCREENSHOT_UNAVAILABLE';

  constructor(options?: ErrorOptions) {
    super('Could not take screenshot, continuing with text only', options);
  }
}

export class UploadUnavailableError extends CaptureWarning {
  readonly code = 'UPLOAD_UNAVAILABLE';

  constructor(
    public readonly screenshotPath: string,
    options?: ErrorOptions,
  ) {
    super('Could not upload screenshot, continuing with text only', options);
  }
}

// --- Completion API ---

export abstract class ApiError extends ClipChatError {
  readonly classification = 'recoverable' as const;
}

export class MalformedResponseError extends ApiError {
  readonly code = 'API_MALFORMED_RESPONSE';
}

export class TransportFailureError extends ApiError {
  readonly code = 'API_TRANSPORT_FAILURE';

  constructor(
    message: string,
    public readonly status?: number,
    options?: ErrorOptions,
  ) {
    super(message, options);
  }
}

export class UnauthorizedError extends ApiError {
  readonly code = 'API_UNAUTHORIZED';
}

// --- Session store ---

export abstract class StoreError extends ClipChatError {
  readonly classification = 'fatal' as const;

  constructor(
    message: string,
    public readonly sessionId: string,
    options?: ErrorOptions,
  ) {
    super(message, options);
  }
}

export class SessionNotFoundError extends StoreError {
  readonly code = 'SESSION_NOT_FOUND';

  constructor(sessionId: string, options?: ErrorOptions) {
    super(`Session "${sessionId}" not found.`, sessionId, options);
  }
}

export class SessionReadError extends StoreError {
  readonly code = 'SESSION_UNREADABLE';
}

export class SessionWriteError extends StoreError {
  readonly code = 'SESSION_WRITE_FAILED';
}
