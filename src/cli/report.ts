/**
 * CLI result and error reporting
 */

import { ColSynthError, ErrorCode } from "../utils/errors.js";
import { logger } from "../utils/logger.js";

export function errorResponse(phase: string, error: unknown) {
  if (error instanceof ColSynthError) {
    return error.toResponse(phase);
  }
  return {
    status: "error",
    phase,
    error: {
      code: ErrorCode.GENERAL_ERROR,
      message: error instanceof Error ? error.message : String(error),
    },
  };
}

/**
 * Log a failed phase and print its JSON error response on stderr
 */
export function reportError(phase: string, error: unknown): void {
  const response = errorResponse(phase, error);
  logger.error(`${phase} failed`, { code: response.error.code, message: response.error.message });
  console.error(JSON.stringify(response, null, 2));
}
