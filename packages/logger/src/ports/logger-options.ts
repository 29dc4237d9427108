import type { LogLevelName } from "./log-level"

export type LoggerOptions = {
  /** Entries below this level are dropped. */
  level: LogLevelName

  /**
   * Human-readable output for local use. Leave off where logs are shipped
   * as JSON lines.
   */
  prettify?: boolean
}
