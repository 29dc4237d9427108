import type { AppError } from "../../ports/error"

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null
}

/**
 * Structural check for {@link AppError}; also accepts errors built by another
 * copy of this package.
 */
export function isAppError(e: unknown): e is AppError {
  if (!isRecord(e)) return false

  const { code, context, isRetryable, isOperational, timestamp, message, name } = e

  return (
    typeof code === "string" &&
    isRecord(context) &&
    typeof isRetryable === "boolean" &&
    typeof isOperational === "boolean" &&
    timestamp instanceof Date &&
    Number.isFinite(timestamp.valueOf()) &&
    typeof message === "string" &&
    typeof name === "string"
  )
}
