/**
 * Custom Error Classes
 */

/**
 * Base error class for all hls-kit errors
 */
export class HlsKitError extends Error {
  public readonly code: string;
  public readonly details?: Record<string, unknown>;

  constructor(
    message: string,
    code: string,
    details?: Record<string, unknown>,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'HlsKitError';
    this.code = code;
    this.details = details;
    
    // Maintains proper stack trace
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Validation error for invalid inputs
 */
export class ValidationError extends HlsKitError {
  constructor(field: string, message: string) {
    super(
      `Validation failed for ${field}: ${message}`,
      'VALIDATION_ERROR',
      { field, message }
    );
    this.name = 'ValidationError';
  }
}

/**
 * The input media file is missing. Raised before any probing happens.
 */
export class InputNotFoundError extends HlsKitError {
  constructor(filePath: string) {
    super(
      `Input file not found: ${filePath}`,
      'INPUT_NOT_FOUND',
      { filePath }
    );
    this.name = 'InputNotFoundError';
  }
}

/**
 * Metadata tool could not run, timed out, or printed something unusable
 */
export class ProbeError extends HlsKitError {
  constructor(filePath: string, reason: string, cause?: unknown) {
    super(
      `Probe failed for ${filePath}: ${reason}`,
      'PROBE_ERROR',
      { filePath, reason },
      { cause }
    );
    this.name = 'ProbeError';
  }
}

/**
 * No candidate codec passed detection; the caller falls back to an unverified default
 */
export class EncoderUnavailableError extends HlsKitError {
  constructor(kind: 'video' | 'audio', tested: string[], fallback: string) {
    super(
      `No ${kind} encoder passed detection, falling back to ${fallback}`,
      'ENCODER_UNAVAILABLE',
      { kind, tested, fallback }
    );
    this.name = 'EncoderUnavailableError';
  }
}

/**
 * One rendition or subtitle job failed
 */
export class JobError extends HlsKitError {
  public readonly jobName: string;
  public readonly exitCode: number | null;

  constructor(
    jobName: string,
    message: string,
    exitCode: number | null = null,
    cause?: unknown
  ) {
    super(message, 'JOB_ERROR', { jobName, exitCode }, { cause });
    this.name = 'JobError';
    this.jobName = jobName;
    this.exitCode = exitCode;
  }
}

/**
 * The master playlist could not be written; nothing usable was produced
 */
export class ManifestWriteError extends HlsKitError {
  constructor(filePath: string, cause: unknown) {
    super(
      `Failed to write master playlist ${filePath}: ${cause instanceof Error ? cause.message : String(cause)}`,
      'MANIFEST_WRITE_ERROR',
      { filePath },
      { cause }
    );
    this.name = 'ManifestWriteError';
  }
}

/**
 * A configuration file exists but cannot be read or does not match the schema
 */
export class ConfigFileError extends HlsKitError {
  constructor(filePath: string, reason: string, cause?: unknown) {
    super(
      `Invalid configuration file ${filePath}: ${reason}`,
      'CONFIG_FILE_ERROR',
      { filePath, reason },
      { cause }
    );
    this.name = 'ConfigFileError';
  }
}
