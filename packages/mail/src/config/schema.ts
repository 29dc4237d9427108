import { type LogLevelName, logLevelNames } from "@postwire/logger"
import { z } from "zod/mini"
import { type MessageLayout, messageLayouts } from "../ports/message"

const addressList = z.pipe(
  z.pipe(
    z.string(),
    z.transform((value) =>
      value
        .split(",")
        .map((address) => address.trim())
        .filter((address) => address.length > 0),
    ),
  ),
  z.array(z.string()).check(z.minLength(1)),
)

export const mailEnvSchema = z.object({
  SMTP_SERVER: z.string().check(z.minLength(1)),
  SMTP_PORT: z._default(z.coerce.number(), 25),
  SMTP_TLS: z._default(z.stringbool(), false),
  SMTP_TLS_FALLBACK: z._default(z.stringbool(), false),

  MAIL_FROM: z.string().check(z.minLength(1)),
  MAIL_TO: addressList,
  MAIL_SUBJECT: z.optional(z.string()),
  MAIL_LAYOUT: z._default(z.enum(messageLayouts), "per-attachment"),

  SERVICE_NAME: z._default(z.string(), "postwire"),
  LOG_LEVEL: z._default(z.enum(logLevelNames), "info"),
  LOG_PRETTY: z._default(z.stringbool(), false),
})

export type MailEnv = z.infer<typeof mailEnvSchema>

export type MailConfig = {
  smtp: {
    server: string
    port: number
    useTls: boolean
    tlsFallback: boolean
  }

  message: {
    sender: string
    recipients: string[]
    layout: MessageLayout
    subject?: string
  }

  logging: {
    level: LogLevelName
    prettify: boolean
    serviceName: string
  }
}
