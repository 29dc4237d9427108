import { type ConfigSource, DotenvSource, EnvSource, loadConfig } from "@postwire/config"
import { type MailConfig, type MailEnv, mailEnvSchema } from "./schema"

export function mapEnvToConfig(env: MailEnv): MailConfig {
  return {
    smtp: {
      server: env.SMTP_SERVER,
      port: env.SMTP_PORT,
      useTls: env.SMTP_TLS,
      tlsFallback: env.SMTP_TLS_FALLBACK,
    },
    message: {
      sender: env.MAIL_FROM,
      recipients: env.MAIL_TO,
      layout: env.MAIL_LAYOUT,
      ...(env.MAIL_SUBJECT !== undefined && { subject: env.MAIL_SUBJECT }),
    },
    logging: {
      level: env.LOG_LEVEL,
      prettify: env.LOG_PRETTY,
      serviceName: env.SERVICE_NAME,
    },
  }
}

/** Reads `.env.<NODE_ENV>` from `cwd` when present, then `env`, which wins. */
export async function loadMailConfig(
  env: NodeJS.ProcessEnv,
  cwd: string = process.cwd(),
): Promise<MailConfig> {
  const sources: ConfigSource[] = [new EnvSource({ env })]

  if (env.NODE_ENV) {
    sources.unshift(new DotenvSource({ file: `.env.${env.NODE_ENV}`, required: false, cwd }))
  }

  const result = await loadConfig({ schema: mailEnvSchema, sources })

  return mapEnvToConfig(result.value)
}
