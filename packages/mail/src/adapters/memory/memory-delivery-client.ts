import { SmtpError } from "../../core/delivery/smtp-error"
import type {
  DataStream,
  DeliveryClient,
  DeliverySession,
  DialTarget,
  TlsUpgrade,
} from "../../ports/delivery-client"

export type MemoryDeliveryCall =
  | { op: "dial"; target: DialTarget }
  | { op: "starttls"; tls: TlsUpgrade }
  | { op: "mail"; from: string }
  | { op: "rcpt"; to: string }
  | { op: "data" }
  | { op: "reset" }
  | { op: "quit" }

export type DeliveredMessage = {
  target: DialTarget
  envelope: { from: string; to: string[] }
  data: Buffer
  secure: boolean
}

export type MemoryDeliveryFailures = {
  dial?: Error
  startTls?: Error
  mail?: Error
  data?: Error
  reset?: Error
  quit?: Error

  /** Recipients the fake server answers RCPT TO with a 550. */
  rejectRecipients?: readonly string[]

  /** EHLO keywords. Defaults to `["STARTTLS"]`. */
  extensions?: readonly string[]
}

/**
 * In-process stand-in for an SMTP server. Records every command and keeps
 * the messages it accepted.
 */
export class MemoryDeliveryClient implements DeliveryClient {
  readonly name = "memory"
  readonly calls: MemoryDeliveryCall[] = []
  readonly delivered: DeliveredMessage[] = []

  constructor(private failures: MemoryDeliveryFailures = {}) {}

  /** Replaces the scripted failures for subsequent calls. */
  script(failures: MemoryDeliveryFailures): void {
    this.failures = failures
  }

  async dial(target: DialTarget): Promise<DeliverySession> {
    this.calls.push({ op: "dial", target: { ...target } })

    if (this.failures.dial) throw this.failures.dial

    return new MemoryDeliverySession(this, target)
  }

  get scripted(): MemoryDeliveryFailures {
    return this.failures
  }

  /** @internal */
  record(call: MemoryDeliveryCall): MemoryDeliveryFailures {
    this.calls.push(call)

    return this.failures
  }
}

const badSequence = (command: string) =>
  SmtpError.rejected(command, { code: 503, text: "5.5.1 Bad sequence of commands" })

class MemoryDeliverySession implements DeliverySession {
  private closed = false
  private secure = false
  private from: string | undefined
  private to: string[] = []

  constructor(
    private readonly client: MemoryDeliveryClient,
    private readonly target: DialTarget,
  ) {}

  supportsExtension(name: string): boolean {
    const extensions = this.client.scripted.extensions ?? ["STARTTLS"]

    return extensions.some((ext) => ext.toUpperCase() === name.toUpperCase())
  }

  async startTls(tls: TlsUpgrade): Promise<void> {
    const failures = this.client.record({ op: "starttls", tls: { ...tls } })

    this.assertOpen()
    if (failures.startTls) {
      this.closed = true
      throw failures.startTls
    }

    this.secure = true
  }

  async setSender(address: string): Promise<void> {
    const failures = this.client.record({ op: "mail", from: address })

    this.assertOpen()
    if (failures.mail) throw failures.mail
    if (this.from !== undefined) throw badSequence("MAIL FROM")

    this.from = address
  }

  async addRecipient(address: string): Promise<void> {
    const failures = this.client.record({ op: "rcpt", to: address })

    this.assertOpen()
    if (this.from === undefined) throw badSequence("RCPT TO")
    if (failures.rejectRecipients?.includes(address)) {
      throw SmtpError.rejected("RCPT TO", { code: 550, text: "5.1.1 Mailbox unavailable" })
    }

    this.to.push(address)
  }

  async openDataStream(): Promise<DataStream> {
    const failures = this.client.record({ op: "data" })

    this.assertOpen()
    if (failures.data) throw failures.data
    if (this.from === undefined || this.to.length === 0) throw badSequence("DATA")

    const envelope = { from: this.from, to: this.to }
    const chunks: Buffer[] = []
    let open = true

    return {
      write: async (chunk) => {
        if (!open) throw new Error("Data stream closed")
        chunks.push(Buffer.from(chunk))
      },
      close: async () => {
        open = false
        this.client.delivered.push({
          target: this.target,
          envelope,
          data: Buffer.concat(chunks),
          secure: this.secure,
        })
        this.clearEnvelope()

        return "250 2.0.0 OK: message queued"
      },
    }
  }

  async reset(): Promise<void> {
    const failures = this.client.record({ op: "reset" })

    this.assertOpen()
    if (failures.reset) throw failures.reset

    this.clearEnvelope()
  }

  async quit(): Promise<void> {
    const failures = this.client.record({ op: "quit" })

    if (this.closed) return
    this.closed = true

    if (failures.quit) throw failures.quit
  }

  private clearEnvelope(): void {
    this.from = undefined
    this.to = []
  }

  private assertOpen(): void {
    if (this.closed) throw SmtpError.closed()
  }
}
