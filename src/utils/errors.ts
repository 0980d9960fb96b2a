/**
 * Standard error classes for colsynth
 */

export enum ErrorCode {
  GENERAL_ERROR = "GENERAL_ERROR",
  FILE_IO_ERROR = "FILE_IO_ERROR",
  CONFIG_ERROR = "CONFIG_ERROR",
  VALIDATION_ERROR = "VALIDATION_ERROR",
  INFERENCE_ERROR = "INFERENCE_ERROR",
  INVALID_OPERATION = "INVALID_OPERATION",
}

export class ColSynthError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string,
    public readonly details?: unknown,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = "ColSynthError";
  }

  /**
   * Convert error to a format suitable for CLI output
   */
  toResponse(phase: string) {
    return {
      status: "error",
      phase,
      error: {
        code: this.code,
        message: this.message,
        ...(this.details ? { details: this.details } : {}),
        ...(this.cause ? { cause: String(this.cause) } : {}),
      },
    };
  }
}

export class ConfigError extends ColSynthError {
  constructor(message: string, details?: unknown, options?: ErrorOptions) {
    super(ErrorCode.CONFIG_ERROR, message, details, options);
    this.name = "ConfigError";
  }
}

export class FileIOError extends ColSynthError {
  constructor(message: string, details?: unknown, options?: ErrorOptions) {
    super(ErrorCode.FILE_IO_ERROR, message, details, options);
    this.name = "FileIOError";
  }
}

export class ValidationError extends ColSynthError {
  constructor(message: string, details?: unknown, options?: ErrorOptions) {
    super(ErrorCode.VALIDATION_ERROR, message, details, options);
    this.name = "ValidationError";
  }
}

/**
 * Raised when a column carries no usable value to infer a pattern from
 */
export class InferenceError extends ColSynthError {
  constructor(message: string, details?: unknown, options?: ErrorOptions) {
    super(ErrorCode.INFERENCE_ERROR, message, details, options);
    this.name = "InferenceError";
  }
}

/**
 * Raised when an operation is not defined for an attribute's kind or mode
 */
export class InvalidOperationError extends ColSynthError {
  constructor(message: string, details?: unknown, options?: ErrorOptions) {
    super(ErrorCode.INVALID_OPERATION, message, details, options);
    this.name = "InvalidOperationError";
  }
}
