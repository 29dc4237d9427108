import { BaseError } from "@postwire/errors"

export type SmtpErrorCode =
  | "smtp_rejected"
  | "smtp_closed"
  | "smtp_timeout"
  | "smtp_invalid_command"
  | "smtp_protocol"

/** A server reply as the delivery clients report it. */
export type SmtpReplyInfo = {
  code: number
  text: string
}

/**
 * Failure of one step of an SMTP conversation. `smtp_rejected` means the
 * server answered with an unexpected reply code; 4xx replies are retryable.
 */
export class SmtpError extends BaseError<SmtpErrorCode> {
  static rejected(command: string, reply: SmtpReplyInfo): SmtpError {
    const response = `${reply.code} ${reply.text}`

    return new SmtpError(`${command} rejected: ${response}`, {
      code: "smtp_rejected",
      context: { command, replyCode: reply.code, response },
      isRetryable: reply.code >= 400 && reply.code < 500,
    })
  }

  static closed(): SmtpError {
    return new SmtpError("SMTP connection closed", { code: "smtp_closed", isRetryable: true })
  }

  static timeout(phase: string, ms: number): SmtpError {
    return new SmtpError(`SMTP ${phase} timed out after ${ms}ms`, {
      code: "smtp_timeout",
      context: { phase, timeoutMs: ms },
      isRetryable: true,
    })
  }

  static invalidCommand(command: string): SmtpError {
    return new SmtpError(`${command} argument contains a line break`, {
      code: "smtp_invalid_command",
      context: { command },
    })
  }

  static malformedReply(line: string): SmtpError {
    return new SmtpError(`Malformed SMTP reply: ${JSON.stringify(line)}`, {
      code: "smtp_protocol",
      context: { line },
    })
  }
}

export function isSmtpRejection(err: unknown): err is SmtpError {
  return err instanceof SmtpError && err.code === "smtp_rejected"
}
