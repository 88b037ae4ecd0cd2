export class NotFoundError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'NotFoundError';
  }
}

export class BadRequestError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'BadRequestError';
  }
}

export type UploadStage = 'config' | 'bucket-setup' | 'decode' | 'upload' | 'close';

/**
 * Failure of the multipart-to-S3 pipeline. `stage` tells where it happened so
 * callers can branch on it without matching messages.
 */
export class MultipartUploadError extends Error {
  readonly stage: UploadStage;

  constructor(stage: UploadStage, message: string, cause?: unknown) {
    super(message, { cause });
    this.name = 'MultipartUploadError';
    this.stage = stage;
  }
}

export const asUploadError = (error: unknown, stage: UploadStage, message: string): MultipartUploadError =>
  error instanceof MultipartUploadError ? error : new MultipartUploadError(stage, message, error);
