export type LogContext = {
  service: string
  module: string
  env: string

  /** SMTP host the message is delivered to. */
  server: string
  port: number

  sender: string
  recipients: number
  attachment: string

  durationMs: number
}

export type LogEvent = {
  err: unknown
}

export type LogMeta<TContext extends LogContext = LogContext> = Partial<TContext> &
  Partial<LogEvent>

/**
 * A partial overlay applied to an existing log context.
 * Used by child() to add or override context fields.
 */
export type LogContextPatch = Partial<LogContext> & Record<string, unknown>
