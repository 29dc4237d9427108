import type { AttachmentRecord, MessageLayout } from "../../ports/message"

export const CRLF = "\r\n"

export type SerializableMessage = {
  recipients: readonly string[]
  subject: string
  contentType: string
  body: Uint8Array
  attachments: readonly AttachmentRecord[]
  layout: MessageLayout

  /** Message-level boundary, used by the `multipart` layout only. */
  boundary: string
}

export function serializeMessage(message: SerializableMessage): Buffer {
  const lines =
    message.layout === "multipart" ? multipartLines(message) : perAttachmentLines(message)

  return Buffer.from(lines.join(CRLF) + CRLF, "utf8")
}

function headerLines(message: SerializableMessage): string[] {
  return [`To: ${message.recipients.join(", ")}`, `Subject: ${message.subject}`]
}

function encodeBody(body: Uint8Array): string {
  return Buffer.from(body).toString("base64")
}

function attachmentPart(attachment: AttachmentRecord): string[] {
  const { name } = attachment

  return [
    `Content-Type: application/octet-stream; name="${name}"`,
    `Content-Description: ${name}`,
    `Content-Disposition: attachment; filename="${name}"; size=${attachment.encodedLength}`,
    "Content-Transfer-Encoding: base64",
    "",
    attachment.encoded,
  ]
}

function perAttachmentLines(message: SerializableMessage): string[] {
  const lines = headerLines(message)

  for (const { boundary } of message.attachments) {
    lines.push(`Content-Type: multipart/mixed; boundary="${boundary}"`, `--${boundary}`)
  }

  lines.push(
    "Content-Transfer-Encoding: base64",
    "MIME-Version: 1.0;",
    `Content-Type: ${message.contentType}; charset="utf-8";`,
    "",
    encodeBody(message.body),
  )

  for (const attachment of message.attachments) {
    lines.push("", `--${attachment.boundary}`, ...attachmentPart(attachment), `--${attachment.boundary}--`)
  }

  return lines
}

function multipartLines(message: SerializableMessage): string[] {
  const lines = [...headerLines(message), "MIME-Version: 1.0"]
  const textPart = [
    `Content-Type: ${message.contentType}; charset="utf-8"`,
    "Content-Transfer-Encoding: base64",
    "",
    encodeBody(message.body),
  ]

  if (message.attachments.length === 0) return [...lines, ...textPart]

  const { boundary } = message

  lines.push(`Content-Type: multipart/mixed; boundary="${boundary}"`, "", `--${boundary}`, ...textPart)

  for (const attachment of message.attachments) {
    lines.push(`--${boundary}`, ...attachmentPart(attachment))
  }

  lines.push(`--${boundary}--`)

  return lines
}
