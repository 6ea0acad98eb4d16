/**
 * Canonical error shape: configuration and encoding failures are both
 * expressed as an AppError so callers handle a single structure.
 */

export const ErrorCode = {
  VALIDATION: "VALIDATION",
  ENCODING: "ENCODING",
} as const;

export type ErrorCode = (typeof ErrorCode)[keyof typeof ErrorCode];

export interface AppError {
  readonly code: ErrorCode;
  readonly message: string;
  readonly details?: Record<string, unknown>;
  readonly cause?: unknown;
}

/**
 * Failure of the JSON encoder. `partial` holds the best-effort line that
 * was produced instead, so a sink can still write something.
 */
export interface FormatError extends AppError {
  readonly code: typeof ErrorCode.ENCODING;
  readonly partial: Uint8Array;
}

/** Factory helpers */
export const appError = (
  code: ErrorCode,
  message: string,
  details?: Record<string, unknown>,
  cause?: unknown,
): AppError => {
  const error: AppError = { code, message };
  if (details !== undefined) {
    return cause === undefined ? { ...error, details } : { ...error, details, cause };
  }
  if (cause !== undefined) {
    return { ...error, cause };
  }
  return error;
};

export const validation = (details: Record<string, unknown>, msg = "Validation failed"): AppError =>
  appError(ErrorCode.VALIDATION, msg, details);

export const encodingError = (partial: Uint8Array, cause: unknown): FormatError => ({
  code: ErrorCode.ENCODING,
  message: `JSON encoding failed: ${describeCause(cause)}`,
  cause,
  partial,
});

const describeCause = (cause: unknown): string =>
  cause instanceof Error ? cause.message : String(cause);
