import { hostname } from "node:os"
import { isSmtpRejection, SmtpError } from "../../core/delivery/smtp-error"
import type {
  DataStream,
  DeliveryClient,
  DeliverySession,
  DialTarget,
  TlsUpgrade,
} from "../../ports/delivery-client"
import { DotStuffer } from "./dot-stuffer"
import { toMailPath } from "./mail-path"
import { SmtpChannel } from "./smtp-channel"
import type { SmtpReply } from "./smtp-reply-parser"

export type SmtpDeliveryClientOptions = {
  /** Hostname sent with EHLO. Defaults to the machine's hostname. */
  name?: string
  connectionTimeout?: number
  greetingTimeout?: number
  socketTimeout?: number
}

const DEFAULT_CONNECTION_TIMEOUT = 120_000
const DEFAULT_GREETING_TIMEOUT = 30_000
const DEFAULT_SOCKET_TIMEOUT = 600_000

/** Plain SMTP over TCP, one command per session call. */
export class SmtpDeliveryClient implements DeliveryClient {
  readonly name = "smtp"

  constructor(private readonly opts: SmtpDeliveryClientOptions = {}) {}

  async dial(target: DialTarget): Promise<DeliverySession> {
    const greetingTimeout = this.opts.greetingTimeout ?? DEFAULT_GREETING_TIMEOUT
    const channel = await SmtpChannel.connect(target, {
      connectionTimeout: this.opts.connectionTimeout ?? DEFAULT_CONNECTION_TIMEOUT,
      socketTimeout: this.opts.socketTimeout ?? DEFAULT_SOCKET_TIMEOUT,
    })

    const timer = setTimeout(
      () => channel.destroy(SmtpError.timeout("greeting", greetingTimeout)),
      greetingTimeout,
    )

    try {
      await channel.expect("greeting", [220])
      clearTimeout(timer)

      const session = new SmtpDeliverySession(channel, this.opts.name ?? hostname())
      await session.greet()

      return session
    } catch (err) {
      clearTimeout(timer)
      await channel.close()
      throw err
    }
  }
}

const extensionsOf = (reply: SmtpReply): Set<string> =>
  new Set(
    reply.lines
      .slice(1)
      .map((line) => line.split(" ")[0]?.toUpperCase() ?? "")
      .filter((keyword) => keyword.length > 0),
  )

class SmtpDeliverySession implements DeliverySession {
  private extensions = new Set<string>()

  constructor(
    private readonly channel: SmtpChannel,
    private readonly name: string,
  ) {}

  /** EHLO, or HELO for servers that refuse it. */
  async greet(): Promise<void> {
    try {
      const reply = await this.channel.command("EHLO", `EHLO ${this.name}`, [250])
      this.extensions = extensionsOf(reply)
    } catch (err) {
      if (!isSmtpRejection(err)) throw err

      await this.channel.command("HELO", `HELO ${this.name}`, [250])
      this.extensions = new Set()
    }
  }

  supportsExtension(name: string): boolean {
    return this.extensions.has(name.toUpperCase())
  }

  async startTls(options: TlsUpgrade): Promise<void> {
    await this.channel.command("STARTTLS", "STARTTLS", [220])
    await this.channel.upgrade(options)
    await this.greet()
  }

  async setSender(address: string): Promise<void> {
    await this.channel.command("MAIL FROM", `MAIL FROM:${toMailPath(address)}`, [250])
  }

  async addRecipient(address: string): Promise<void> {
    await this.channel.command("RCPT TO", `RCPT TO:${toMailPath(address)}`, [250, 251])
  }

  async openDataStream(): Promise<DataStream> {
    await this.channel.command("DATA", "DATA", [354])

    return new SmtpDataStream(this.channel)
  }

  async reset(): Promise<void> {
    await this.channel.command("RSET", "RSET", [250])
  }

  async quit(): Promise<void> {
    if (this.channel.isClosed) return

    try {
      await this.channel.command("QUIT", "QUIT", [221])
    } finally {
      await this.channel.close()
    }
  }
}

class SmtpDataStream implements DataStream {
  private readonly stuffer = new DotStuffer()
  private ended = false

  constructor(private readonly channel: SmtpChannel) {}

  async write(chunk: Uint8Array): Promise<void> {
    if (this.ended) throw new Error("Data stream already closed")

    await this.channel.send(this.stuffer.push(chunk))
  }

  async close(): Promise<string> {
    if (this.ended) throw new Error("Data stream already closed")
    this.ended = true

    await this.channel.send(this.stuffer.end())
    const reply = await this.channel.expect("end of data", [250])

    return `${reply.code} ${reply.text}`
  }
}
