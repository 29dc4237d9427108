import type { Logger } from "@postwire/logger"
import type { BoundaryGenerator } from "./boundary-generator"
import type { TimeSource } from "./clock"
import type { DeliveryClient } from "./delivery-client"

/**
 * - `per-attachment`: every attachment declares its own `multipart/mixed`
 *   header ahead of the body. Byte-compatible with older senders.
 * - `multipart`: one message-level boundary governs the body and all
 *   attachments.
 */
export type MessageLayout = "per-attachment" | "multipart"

export const messageLayouts = ["per-attachment", "multipart"] as const satisfies readonly MessageLayout[]

export type MailMessageOptions = {
  server: string

  /** Values of 0 or below mean the SMTP default, 25. */
  port?: number

  sender: string
  recipients: readonly string[]

  useTls?: boolean
  tlsFallback?: boolean
  layout?: MessageLayout
}

export type MailMessageDeps = {
  logger?: Logger
  clock?: TimeSource
  boundaries?: BoundaryGenerator
  readFile?: (filePath: string) => Promise<Uint8Array>
  delivery?: DeliveryClient
}

export type AttachmentRecord = {
  name: string

  /** Unwrapped standard base64 of the file content. */
  encoded: string
  encodedLength: number
  boundary: string
}

export type AttachmentSummary = Readonly<Pick<AttachmentRecord, "name" | "encodedLength" | "boundary">>
