import { SmtpError, type SmtpReplyInfo } from "../../core/delivery/smtp-error"

export type SmtpReply = SmtpReplyInfo & {
  /** Text of each line of a multi-line reply, code stripped. */
  lines: string[]
}

const REPLY_LINE = /^(\d{3})([ -]?)(.*)$/

/**
 * Splits the server's byte stream into replies. A multi-line reply
 * (`250-first`, `250-second`, `250 last`) is complete once a line with a
 * space after the code arrives.
 */
export class SmtpReplyParser {
  private buffer = ""
  private lines: string[] = []

  push(chunk: string): SmtpReply[] {
    this.buffer += chunk

    const replies: SmtpReply[] = []
    let end = this.buffer.indexOf("\n")

    while (end !== -1) {
      const line = this.buffer.slice(0, end).replace(/\r$/, "")
      this.buffer = this.buffer.slice(end + 1)

      const match = REPLY_LINE.exec(line)
      if (!match) throw SmtpError.malformedReply(line)

      const [, code = "", separator = "", text = ""] = match
      this.lines.push(text)

      if (separator !== "-") {
        replies.push({ code: Number(code), text: this.lines.join(" "), lines: this.lines })
        this.lines = []
      }

      end = this.buffer.indexOf("\n")
    }

    return replies
  }
}
