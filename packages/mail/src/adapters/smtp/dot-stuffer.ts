const DOT = 0x2e
const CR = 0x0d
const LF = 0x0a

/**
 * Escapes message data for DATA: a line starting with `.` gets a second
 * one. Tracks line starts across chunks.
 */
export class DotStuffer {
  private atLineStart = true
  private endsWithCrlf = false
  private previous = -1
  private written = false

  push(chunk: Uint8Array): Buffer {
    const parts: Buffer[] = []
    let start = 0

    for (const [index, byte] of chunk.entries()) {
      if (this.atLineStart && byte === DOT) {
        parts.push(Buffer.from(chunk.subarray(start, index)), Buffer.from("."))
        start = index
      }

      this.atLineStart = byte === LF
      this.endsWithCrlf = this.previous === CR && byte === LF
      this.previous = byte
    }

    parts.push(Buffer.from(chunk.subarray(start)))
    if (chunk.length > 0) this.written = true

    return Buffer.concat(parts)
  }

  /** The terminating `.` line, preceded by a CRLF when the data lacks one. */
  end(): Buffer {
    return Buffer.from(!this.written || this.endsWithCrlf ? ".\r\n" : "\r\n.\r\n")
  }
}
