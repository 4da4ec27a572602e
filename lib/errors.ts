/**
 * Extended Error class that preserves error context and details
 *
 * Usage:
 * ```ts
 * throw new ExtendedError({
 *   message: 'Failed to upload file',
 *   cause: originalError,
 *   details: {
 *     fileName: 'report.pdf',
 *     statusCode: 403,
 *   }
 * });
 * ```
 */

export interface ExtendedErrorOptions {
  message: string;
  cause?: unknown;
  details?: Record<string, unknown>;
}

export class ExtendedError extends Error {
  public readonly cause?: unknown;
  public readonly details?: Record<string, unknown>;

  constructor(options: ExtendedErrorOptions) {
    super(options.message);
    this.name = new.target.name;
    this.cause = options.cause;
    this.details = options.details;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }
}

/**
 * Startup configuration is missing or invalid; the process must not start.
 */
export class ConfigError extends ExtendedError {
  constructor(message: string, issues: string[]) {
    super({ message, details: { issues } });
  }
}

/**
 * No usable credential is stored. Recovered only by the operator completing
 * the consent flow; `authorizationUrl` is set when one could be built.
 */
export class AuthenticationRequiredError extends ExtendedError {
  readonly authorizationUrl?: string;

  constructor(options: { reason: string; authorizationUrl?: string; cause?: unknown }) {
    super({
      message: `Google Drive authorization required: ${options.reason}`,
      cause: options.cause,
      details: options.authorizationUrl
        ? { authorizationUrl: options.authorizationUrl }
        : undefined,
    });
    this.authorizationUrl = options.authorizationUrl;
  }
}

/**
 * A stored credential could not be refreshed and was discarded.
 */
export class AuthenticationExpiredError extends ExtendedError {
  constructor(cause: unknown) {
    super({
      message: 'Google Drive credential could not be refreshed; re-authorization required',
      cause,
    });
  }
}

export class FileTooLargeError extends ExtendedError {
  readonly size: number;
  readonly maxBytes: number;

  constructor(options: { fileName: string; size: number; maxBytes: number }) {
    super({
      message: `File '${options.fileName}' is ${options.size} bytes, above the ${options.maxBytes} byte limit`,
      details: { ...options },
    });
    this.size = options.size;
    this.maxBytes = options.maxBytes;
  }
}

export type UploadFailureStage = 'download' | 'upload' | 'share';

/**
 * Any transport or Drive failure while moving bytes or sharing the result.
 * A `share` failure leaves the object in Drive without an emitted link.
 */
export class UploadFailedError extends ExtendedError {
  readonly stage: UploadFailureStage;
  readonly fileId?: string;

  constructor(options: {
    stage: UploadFailureStage;
    fileName: string;
    cause: unknown;
    fileId?: string;
  }) {
    super({
      message: `Upload of '${options.fileName}' failed during ${options.stage}`,
      cause: options.cause,
      details: {
        stage: options.stage,
        fileName: options.fileName,
        ...(options.fileId ? { fileId: options.fileId } : {}),
      },
    });
    this.stage = options.stage;
    this.fileId = options.fileId;
  }
}

/**
 * The upload succeeded but could not be written to the ledger.
 */
export class LedgerWriteFailedError extends ExtendedError {
  constructor(options: { fileId: string; cause: unknown }) {
    super({
      message: 'Failed to record upload in ledger',
      cause: options.cause,
      details: { fileId: options.fileId },
    });
  }
}

export function isAuthenticationError(
  error: unknown
): error is AuthenticationRequiredError | AuthenticationExpiredError {
  return (
    error instanceof AuthenticationRequiredError ||
    error instanceof AuthenticationExpiredError
  );
}
