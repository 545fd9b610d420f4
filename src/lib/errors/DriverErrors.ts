/**
 * Base error class for driver check and update failures
 */
export abstract class DriverCheckError extends Error {
  public readonly code: string;
  public readonly category: ErrorCategory;
  public readonly retryable: boolean;

  constructor(message: string, code: string, category: ErrorCategory, retryable: boolean = false) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.category = category;
    this.retryable = retryable;
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Error categories for classification
 */
export enum ErrorCategory {
  /**
   * Network hiccups, timeouts: running the tool again may succeed
   */
  TRANSIENT = 'transient',

  /**
   * Bad configuration, installer rejected, missing binaries
   */
  PERMANENT = 'permanent'
}

/**
 * Why an HTTP step failed
 */
export type FetchFailureReason = 'network' | 'timeout' | 'http-status' | 'empty-body' | 'unparseable';

export type DownloadFailureReason = 'network' | 'timeout' | 'http-status' | 'empty-body' | 'write';

/**
 * nvidia-smi is missing, exited nonzero or hung
 */
export class DetectionUnavailableError extends DriverCheckError {
  public readonly command: string;

  constructor(command: string, detail: string) {
    super(`Driver detection via '${command}' unavailable: ${detail}`, 'DETECTION_UNAVAILABLE', ErrorCategory.PERMANENT, false);
    this.command = command;
  }
}

/**
 * Resolving the latest published version failed
 */
export class FetchError extends DriverCheckError {
  public readonly url: string;
  public readonly reason: FetchFailureReason;
  public readonly status?: number;

  constructor(url: string, reason: FetchFailureReason, detail: string, status?: number) {
    const retryable = reason === 'network' || reason === 'timeout';
    super(
      `Could not fetch latest driver version from ${url}: ${detail}`,
      'FETCH_ERROR',
      retryable ? ErrorCategory.TRANSIENT : ErrorCategory.PERMANENT,
      retryable
    );
    this.url = url;
    this.reason = reason;
    this.status = status;
  }
}

/**
 * Transferring the installer artifact failed
 */
export class DownloadError extends DriverCheckError {
  public readonly url: string;
  public readonly reason: DownloadFailureReason;
  public readonly bytesTransferred: number;

  constructor(url: string, reason: DownloadFailureReason, detail: string, bytesTransferred: number = 0) {
    const retryable = reason === 'network' || reason === 'timeout';
    super(
      `Download failed: ${detail}`,
      'DOWNLOAD_ERROR',
      retryable ? ErrorCategory.TRANSIENT : ErrorCategory.PERMANENT,
      retryable
    );
    this.url = url;
    this.reason = reason;
    this.bytesTransferred = bytesTransferred;
  }
}

/**
 * Any outcome of a confirmed install other than success
 */
export abstract class InstallError extends DriverCheckError {
  public readonly artifactPath: string;

  constructor(artifactPath: string, message: string, code: string, category: ErrorCategory) {
    super(message, code, category, false);
    this.artifactPath = artifactPath;
  }
}

export class InstallFailedError extends InstallError {
  public readonly exitCode: number;

  constructor(artifactPath: string, exitCode: number) {
    super(artifactPath, `Installation failed with exit code: ${exitCode}`, 'INSTALL_FAILED', ErrorCategory.PERMANENT);
    this.exitCode = exitCode;
  }
}

export class InstallTimedOutError extends InstallError {
  public readonly timeoutMs: number;

  constructor(artifactPath: string, timeoutMs: number) {
    super(artifactPath, `Installation timed out after ${timeoutMs / 1000}s`, 'INSTALL_TIMEOUT', ErrorCategory.TRANSIENT);
    this.timeoutMs = timeoutMs;
  }
}

/**
 * The elevation command itself could not be started (e.g. sudo missing)
 */
export class InstallLaunchError extends InstallError {
  public readonly originalError: Error;

  constructor(artifactPath: string, originalError: Error) {
    super(artifactPath, `Installation error: ${originalError.message}`, 'INSTALL_LAUNCH', ErrorCategory.PERMANENT);
    this.originalError = originalError;
  }
}

/**
 * Configuration validation error
 */
export class ConfigError extends DriverCheckError {
  public readonly field: string;

  constructor(field: string, reason: string) {
    super(`Invalid configuration for '${field}': ${reason}`, 'CONFIG_ERROR', ErrorCategory.PERMANENT, false);
    this.field = field;
  }
}

/**
 * Reads the Node system error code (ENOENT, ETIMEDOUT, ...) off an unknown value
 */
export function getErrorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

/**
 * Message of an error including its cause, which is where undici puts the
 * actual socket/DNS failure behind a generic "fetch failed"
 */
export function describeError(error: unknown): string {
  if (!(error instanceof Error)) {
    return String(error);
  }
  if (error.cause instanceof Error && error.cause.message !== error.message) {
    return `${error.message} (${error.cause.message})`;
  }
  return error.message;
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
