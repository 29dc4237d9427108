import { createPinoLogger } from "./adapters/pino/pino-logger"
import type { LogContext, LogContextPatch } from "./ports/log-context"
import type { Logger } from "./ports/logger"
import type { LoggerOptions } from "./ports/logger-options"

/** Process logger writing JSON lines to stdout, or pretty output when `prettify` is set. */
export function createLogger<TContext extends LogContext = LogContext>(
  opts: LoggerOptions,
  context: LogContextPatch = {},
): Logger<TContext> {
  return createPinoLogger<TContext>({}, opts, context)
}
