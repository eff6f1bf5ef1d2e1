/**
 * Application Error Hierarchy
 *
 * All errors raised by the capture loop, the storage layer and the video
 * pipeline extend AppError so they carry a stable code and can be logged
 * as structured data.
 */

/**
 * Base application error class
 */
export class AppError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly cause?: Error,
    public readonly metadata?: Record<string, unknown>
  ) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);

    // Maintain proper prototype chain
    Object.setPrototypeOf(this, new.target.prototype);
  }

  /**
   * Convert error to JSON for logging
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      cause: this.cause
        ? {
            name: this.cause.name,
            message: this.cause.message,
          }
        : undefined,
      metadata: this.metadata,
    };
  }

  /**
   * Check if error is of a specific type
   */
  static isAppError(error: unknown): error is AppError {
    return error instanceof AppError;
  }
}

/**
 * Normalize anything thrown into an Error
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * Transient screenshot failure (no display, locked screen).
 * The tick is skipped and retried.
 */
export class CaptureError extends AppError {
  constructor(message: string, cause?: Error, metadata?: Record<string, unknown>) {
    super(message, "CAPTURE_ERROR", cause, metadata);
  }
}

/**
 * Configuration errors
 */
export class ConfigError extends AppError {
  constructor(message: string, cause?: Error, metadata?: Record<string, unknown>) {
    super(message, "CONFIG_ERROR", cause, metadata);
  }
}

/**
 * File system errors
 */
export class FileSystemError extends AppError {
  constructor(message: string, cause?: Error, metadata?: Record<string, unknown>) {
    super(message, "FILE_SYSTEM_ERROR", cause, metadata);
  }
}

/**
 * A frame was about to be written over an existing one. The frame counter
 * only moves forward, so this means the directory and the counter disagree.
 */
export class FrameSlotTakenError extends AppError {
  constructor(public readonly filePath: string) {
    super(`Refusing to overwrite existing frame ${filePath}`, "FRAME_SLOT_TAKEN", undefined, {
      filePath,
    });
  }
}

/**
 * No frame files in a directory that was expected to hold some
 */
export class NoFramesError extends AppError {
  constructor(dir: string, extension: string) {
    super(`No frames found in ${dir} with extension .${extension}`, "NO_FRAMES", undefined, {
      dir,
      extension,
    });
  }
}

/**
 * Metadata sidecar could not be read or parsed
 */
export class MetadataError extends AppError {
  constructor(message: string, cause?: Error, metadata?: Record<string, unknown>) {
    super(message, "METADATA_ERROR", cause, metadata);
  }
}

/**
 * Video encoder failed to start or exited non-zero
 */
export class EncoderError extends AppError {
  constructor(
    message: string,
    public readonly exitCode: number | null = null,
    public readonly lastStderrLine: string | null = null,
    cause?: Error
  ) {
    super(message, "ENCODER_ERROR", cause, { exitCode, lastStderrLine });
  }
}

/**
 * The encoder cannot write the configured container
 */
export class MuxerUnavailableError extends AppError {
  constructor(public readonly extension: string) {
    super(
      `Invalid video type, ffmpeg doesn't know how to make '${extension}' files`,
      "MUXER_UNAVAILABLE",
      undefined,
      { extension }
    );
  }
}

/**
 * Listing the dates that have frames or videos failed
 */
export class CoverageError extends AppError {
  constructor(message: string, cause?: Error, metadata?: Record<string, unknown>) {
    super(message, "COVERAGE_ERROR", cause, metadata);
  }
}
