import { createLogger } from "@postwire/logger"
import { MailMessage } from "../core/mail-message"
import type { MailMessageDeps } from "../ports/message"
import type { MailConfig } from "./schema"

/**
 * Builds a message addressed and routed as `config` says. Without a
 * `logger` in `deps`, one is created from `config.logging`.
 */
export function composeMessage(config: MailConfig, deps: MailMessageDeps = {}): MailMessage {
  const logger =
    deps.logger ??
    createLogger(
      { level: config.logging.level, prettify: config.logging.prettify },
      { service: config.logging.serviceName },
    )

  const message = new MailMessage(
    {
      server: config.smtp.server,
      port: config.smtp.port,
      useTls: config.smtp.useTls,
      tlsFallback: config.smtp.tlsFallback,
      sender: config.message.sender,
      recipients: config.message.recipients,
      layout: config.message.layout,
    },
    { ...deps, logger },
  )

  if (config.message.subject) message.setSubject(config.message.subject)

  return message
}
