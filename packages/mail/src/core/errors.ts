import { BaseError } from "@postwire/errors"
import type { SmtpError } from "./delivery/smtp-error"

export type MailErrorCode =
  | "missing_server"
  | "missing_sender"
  | "missing_recipients"
  | "empty_body"
  | "missing_attachment_path"
  | "recipient_rejected"

export type RequiredField = "server" | "sender" | "recipients"

export class MailError extends BaseError<MailErrorCode> {
  static missingServer(): MailError {
    return MailError.missingField("server", "missing_server", "SMTP server required")
  }

  static missingSender(): MailError {
    return MailError.missingField("sender", "missing_sender", "SMTP sender required")
  }

  static missingRecipients(): MailError {
    return MailError.missingField(
      "recipients",
      "missing_recipients",
      "At least one mail recipient required",
    )
  }

  static emptyBody(): MailError {
    return new MailError("Message body is empty", { code: "empty_body" })
  }

  static missingAttachmentPath(): MailError {
    return new MailError("No attachment path specified", { code: "missing_attachment_path" })
  }

  /** The server refused `recipient` at RCPT TO; no data was sent. */
  static recipientRejected(input: {
    recipient: string
    accepted: readonly string[]
    cause: SmtpError
  }): MailError {
    return new MailError(`Server rejected recipient ${input.recipient}`, {
      code: "recipient_rejected",
      context: {
        recipient: input.recipient,
        accepted: [...input.accepted],
        response: input.cause.context.response,
      },
      cause: input.cause,
      isRetryable: input.cause.isRetryable,
    })
  }

  private static missingField(
    field: RequiredField,
    code: MailErrorCode,
    message: string,
  ): MailError {
    return new MailError(message, { code, context: { field } })
  }
}
