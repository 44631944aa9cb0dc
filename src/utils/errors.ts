/**
 * Standard error classes for shortcut-args
 */

export enum ErrorCode {
  GENERAL_ERROR = "GENERAL_ERROR",
  CONFIG_ERROR = "CONFIG_ERROR",
  EXPRESSION_ERROR = "EXPRESSION_ERROR",
  VALIDATION_ERROR = "VALIDATION_ERROR",
  FILE_IO_ERROR = "FILE_IO_ERROR",
}

export type ErrorDetails = Record<string, unknown>;

export class ShortcutError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string,
    public readonly details?: ErrorDetails,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = "ShortcutError";
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

/**
 * Hint cardinality violations, unknown shortcut names, malformed descriptors
 */
export class ConfigurationError extends ShortcutError {
  constructor(message: string, details?: ErrorDetails, options?: ErrorOptions) {
    super(ErrorCode.CONFIG_ERROR, message, details, options);
    this.name = "ConfigurationError";
  }
}

export class ExpressionEvaluationError extends ShortcutError {
  constructor(message: string, details?: ErrorDetails, options?: ErrorOptions) {
    super(ErrorCode.EXPRESSION_ERROR, message, details, options);
    this.name = "ExpressionEvaluationError";
  }
}

export class ValidationError extends ShortcutError {
  constructor(message: string, details?: ErrorDetails, options?: ErrorOptions) {
    super(ErrorCode.VALIDATION_ERROR, message, details, options);
    this.name = "ValidationError";
  }
}

export class FileIOError extends ShortcutError {
  constructor(message: string, details?: ErrorDetails, options?: ErrorOptions) {
    super(ErrorCode.FILE_IO_ERROR, message, details, options);
    this.name = "FileIOError";
  }
}
