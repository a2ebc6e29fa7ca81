/**
 * packages/core/src/errors.ts - Error type for construction-time violations.
 *
 * Why: Event dispatch never throws; stale ids and malformed payloads are
 * dropped where they are found. Invalid input handed to the core up front
 * (configuration, shortcut tables, id strings) is rejected with a UiError
 * carrying a stable code instead.
 */

// =============================================================================
// UiErrorCode Union
// =============================================================================

/**
 * Deterministic error codes surfaced as UiError instances.
 */
export type UiErrorCode =
  | "TRELLIS_INVALID_CONFIG"
  | "TRELLIS_INVALID_SHORTCUT"
  | "TRELLIS_INVALID_ID"
  | "TRELLIS_INVALID_STATE";

// =============================================================================
// UiError Class
// =============================================================================

/**
 * Error class for all deterministic construction-time violations.
 * The `code` property identifies the specific violation.
 */
export class UiError extends Error {
  override readonly name = "UiError";
  readonly code: UiErrorCode;

  constructor(code: UiErrorCode, message?: string) {
    super(message ?? code);
    this.code = code;

    // Maintain proper stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, UiError);
    }
  }
}

export function invalidConfig(detail: string): UiError {
  return new UiError("TRELLIS_INVALID_CONFIG", `resolveEventConfig: ${detail}`);
}

export function describeThrown(v: unknown): string {
  if (v instanceof Error) return `${v.name}: ${v.message}`;
  try {
    return String(v);
  } catch {
    return "[unstringifiable thrown value]";
  }
}
