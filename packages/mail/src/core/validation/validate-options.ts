import type { MailMessageOptions } from "../../ports/message"
import { MailError } from "../errors"

export const DEFAULT_SMTP_PORT = 25

export function validateOptions(options: MailMessageOptions): void {
  if (!options.server) throw MailError.missingServer()
  if (!options.sender) throw MailError.missingSender()
  if (options.recipients.length === 0) throw MailError.missingRecipients()
}

export function normalizePort(port: number | undefined): number {
  if (port === undefined || !Number.isFinite(port) || port <= 0) return DEFAULT_SMTP_PORT

  return port
}
