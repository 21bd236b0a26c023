import type { ErrorCode } from "../constants";
import type { LedgerError } from "../types";

/**
 * Helper functions for error handling
 */
export const ErrorUtils = {
  /**
   * Creates a LedgerError with the given code and message
   */
  createError(
    code: ErrorCode,
    message: string,
    details?: Record<string, unknown>
  ): LedgerError {
    return Object.assign(new Error(message), { code, details });
  },

  /**
   * Narrows an unknown value to a LedgerError, optionally of a given code
   */
  isLedgerError(value: unknown, code?: ErrorCode): value is LedgerError {
    if (!(value instanceof Error)) return false;
    if (!("code" in value) || typeof value.code !== "number") return false;
    return code === undefined || value.code === code;
  },
};
