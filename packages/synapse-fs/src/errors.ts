export type SynapseFsErrorCode =
  | 'INVALID_PATH'
  | 'INVALID_ARGUMENT'
  | 'NOT_A_FOLDER'
  | 'NOT_A_FILE'
  | 'NO_FILE_HANDLE'
  | 'NOT_FOUND'
  | 'ACCESS_DENIED'
  | 'AUTHENTICATION_FAILED'
  | 'AUTH_NOT_CONFIGURED'
  | 'FILE_TOO_LARGE'
  | 'PART_UPLOAD_FAILED'
  | 'UNSUPPORTED_OPERATION'
  | 'UNSUPPORTED_SEEK'
  | 'CHANNEL_CLOSED'
  | 'REQUEST_FAILED';

export interface SynapseFsErrorOptions {
  cause?: unknown;
  /** HTTP status of the response that produced the error, when there was one. */
  status?: number;
}

export class SynapseFsError extends Error {
  readonly code: SynapseFsErrorCode;

  readonly status?: number;

  readonly cause?: unknown;

  constructor(message: string, code: SynapseFsErrorCode, options: SynapseFsErrorOptions = {}) {
    super(message);
    this.name = 'SynapseFsError';
    this.code = code;
    this.status = options.status;
    this.cause = options.cause;
  }
}

export class PartUploadError extends SynapseFsError {
  readonly partNumber: number;

  constructor(message: string, partNumber: number, options: SynapseFsErrorOptions = {}) {
    super(message, 'PART_UPLOAD_FAILED', options);
    this.name = 'PartUploadError';
    this.partNumber = partNumber;
  }
}

export const isSynapseFsError = (error: unknown): error is SynapseFsError => {
  return error instanceof SynapseFsError;
};

export const unsupported = (message: string): SynapseFsError =>
  new SynapseFsError(message, 'UNSUPPORTED_OPERATION');
