import type { ErrorCode } from "../../ports/error"
import { BaseError, type BaseErrorOptions } from "../base-error"

/**
 * Build a {@link BaseError} without declaring a subclass.
 *
 * @example
 * ```ts
 * throw createError("smtp_greeting_timeout", "Server did not greet", {
 *   context: { host: "mail.example.com" },
 *   isRetryable: true,
 * })
 * ```
 */
export function createError<C extends ErrorCode>(
  code: C,
  message: string,
  options?: Omit<BaseErrorOptions<C>, "code">,
): BaseError<C> {
  return new BaseError(message, { code, ...options })
}
