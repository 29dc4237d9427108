export type ErrorCode = Lowercase<string>

/** Structured data attached to an error (addresses, paths, counts). */
export type ErrorContext = Readonly<Record<string, unknown>>

export interface AppError extends Error {
  readonly code: ErrorCode

  readonly context: ErrorContext

  /** `true` when the same call could succeed if repeated unchanged. */
  readonly isRetryable: boolean

  /**
   * `true` for expected runtime failures (bad input, a server refusing a
   * command), `false` for invariant violations.
   *
   * @default true
   */
  readonly isOperational: boolean

  readonly timestamp: Date

  readonly cause?: unknown
}

/** JSON-safe error shape used by loggers. */
export type SerializedError = Readonly<{
  name: string
  code: string
  message: string
  context: Record<string, unknown>
  timestamp: string
  isOperational: boolean
  cause?: SerializedError
  stack?: string
}>

export type SerializeOptions = Readonly<{
  /** Default: false */
  includeStack?: boolean
}>
