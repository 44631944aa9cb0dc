/**
 * Error reporting shared by CLI commands
 */

import { ErrorCode, ShortcutError } from "../utils/errors.js";

export function toShortcutError(error: unknown): ShortcutError {
  if (error instanceof ShortcutError) {
    return error;
  }
  return new ShortcutError(
    ErrorCode.GENERAL_ERROR,
    error instanceof Error ? error.message : String(error),
    undefined,
    { cause: error },
  );
}

export function exitCodeFor(error: ShortcutError): number {
  switch (error.code) {
    case ErrorCode.FILE_IO_ERROR:
      return 4;
    case ErrorCode.VALIDATION_ERROR:
    case ErrorCode.CONFIG_ERROR:
    case ErrorCode.EXPRESSION_ERROR:
      return 2;
    default:
      return 1;
  }
}

/**
 * Print the JSON error response to stderr and exit
 */
export function failCommand(error: unknown, phase: string): never {
  const shortcutError = toShortcutError(error);
  console.error(JSON.stringify(shortcutError.toResponse(phase), null, 2));
  process.exit(exitCodeFor(shortcutError));
}
