import fs from "node:fs/promises"
import path from "node:path"
import { createNullLogger, type Logger } from "@postwire/logger"
import { SystemClock } from "../adapters/clock/system-clock"
import { base36Boundaries } from "../adapters/nanoid/base36-boundaries"
import { SmtpDeliveryClient } from "../adapters/smtp/smtp-delivery-client"
import type { BoundaryGenerator } from "../ports/boundary-generator"
import type { TimeSource } from "../ports/clock"
import type { DeliveryClient, DeliveryReceipt } from "../ports/delivery-client"
import type {
  AttachmentRecord,
  AttachmentSummary,
  MailMessageDeps,
  MailMessageOptions,
  MessageLayout,
} from "../ports/message"
import { deliver } from "./delivery/deliver"
import { MailError } from "./errors"
import { serializeMessage } from "./mime/serialize-message"
import { normalizePort, validateOptions } from "./validation/validate-options"

export const DEFAULT_CONTENT_TYPE = "text/plain"
export const SUBJECT_PREFIX = "postwire"

/**
 * A mail message being composed. Fields can change until the first
 * successful {@link MailMessage.toBytes}; the serialized form is cached
 * from then on and later changes do not reach it.
 */
export class MailMessage {
  readonly sender: string
  readonly recipients: readonly string[]
  readonly server: string
  readonly port: number
  readonly useTls: boolean
  readonly tlsFallback: boolean
  readonly layout: MessageLayout

  private subjectLine: string
  private currentContentType = DEFAULT_CONTENT_TYPE
  private readonly body: Buffer[] = []
  private readonly attachmentsByName = new Map<string, AttachmentRecord>()
  private readonly boundary: string
  private built: Buffer | undefined

  private readonly logger: Logger
  private readonly clock: TimeSource
  private readonly boundaries: BoundaryGenerator
  private readonly readFile: (filePath: string) => Promise<Uint8Array>
  private readonly delivery: DeliveryClient

  static create(options: MailMessageOptions, deps: MailMessageDeps = {}): MailMessage {
    return new MailMessage(options, deps)
  }

  constructor(options: MailMessageOptions, deps: MailMessageDeps = {}) {
    validateOptions(options)

    this.server = options.server
    this.port = normalizePort(options.port)
    this.sender = options.sender
    this.recipients = Object.freeze([...options.recipients])
    this.useTls = options.useTls ?? false
    this.tlsFallback = options.tlsFallback ?? false
    this.layout = options.layout ?? "per-attachment"

    this.clock = deps.clock ?? new SystemClock()
    this.boundaries = deps.boundaries ?? base36Boundaries()
    this.readFile = deps.readFile ?? ((filePath) => fs.readFile(filePath))
    this.delivery = deps.delivery ?? new SmtpDeliveryClient()
    this.logger = (deps.logger ?? createNullLogger()).child({
      module: "mail",
      server: this.server,
      port: this.port,
      sender: this.sender,
      recipients: this.recipients.length,
    })

    this.subjectLine = `${SUBJECT_PREFIX} - ${this.clock.now().toISOString()}`
    this.boundary = this.boundaries.generate()
  }

  get subject(): string {
    return this.subjectLine
  }

  get contentType(): string {
    return this.currentContentType
  }

  get attachments(): AttachmentSummary[] {
    return [...this.attachmentsByName.values()].map(({ name, encodedLength, boundary }) => ({
      name,
      encodedLength,
      boundary,
    }))
  }

  get isBuilt(): boolean {
    return this.built !== undefined
  }

  setBody(text: string): void {
    if (text.length > 0) this.body.push(Buffer.from(text, "utf8"))
  }

  setBodyBytes(bytes: Uint8Array): void {
    if (bytes.length > 0) this.body.push(Buffer.from(bytes))
  }

  /** An empty value restores `text/plain`. */
  setContentType(value: string): void {
    this.currentContentType = value || DEFAULT_CONTENT_TYPE
  }

  setSubject(value: string): void {
    if (value) this.subjectLine = value
  }

  /**
   * Reads the file and stores it base64-encoded under its base name. A file
   * with the same base name as an earlier attachment replaces it.
   */
  async addAttachment(filePath: string): Promise<void> {
    if (!filePath) throw MailError.missingAttachmentPath()

    const name = path.basename(filePath)
    const content = await this.readFile(filePath)
    const encoded = Buffer.from(content).toString("base64")

    this.attachmentsByName.delete(name)
    this.attachmentsByName.set(name, {
      name,
      encoded,
      encodedLength: encoded.length,
      boundary: this.boundaries.generate(),
    })

    this.logger.debug("attachment added", { attachment: name })
  }

  /** Returns a fresh copy of the cached serialization on every call. */
  toBytes(): Uint8Array {
    return Buffer.from(this.serialize())
  }

  private serialize(): Buffer {
    if (this.built) return this.built

    if (this.body.length === 0) throw MailError.emptyBody()

    this.built = serializeMessage({
      recipients: this.recipients,
      subject: this.subjectLine,
      contentType: this.currentContentType,
      body: Buffer.concat(this.body),
      attachments: [...this.attachmentsByName.values()],
      layout: this.layout,
      boundary: this.boundary,
    })

    this.logger.debug("message built")

    return this.built
  }

  async send(): Promise<DeliveryReceipt> {
    const message = this.serialize()
    const startedAt = this.clock.now().getTime()

    try {
      const receipt = await deliver(
        this.delivery,
        {
          server: this.server,
          port: this.port,
          useTls: this.useTls,
          tlsFallback: this.tlsFallback,
          envelope: { from: this.sender, to: this.recipients },
          message,
        },
        this.logger,
      )

      this.logger.info("message sent", { durationMs: this.elapsedSince(startedAt) })

      return receipt
    } catch (err) {
      this.logger.warn("message delivery failed", { err, durationMs: this.elapsedSince(startedAt) })
      throw err
    }
  }

  private elapsedSince(startedAt: number): number {
    return this.clock.now().getTime() - startedAt
  }
}
