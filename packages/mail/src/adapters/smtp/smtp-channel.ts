import net from "node:net"
import tls from "node:tls"
import { SmtpError } from "../../core/delivery/smtp-error"
import type { DialTarget, TlsUpgrade } from "../../ports/delivery-client"
import { type SmtpReply, SmtpReplyParser } from "./smtp-reply-parser"

export type SmtpChannelOptions = {
  connectionTimeout: number
  socketTimeout: number
}

type Waiter = {
  resolve: (reply: SmtpReply) => void
  reject: (err: Error) => void
}

/**
 * A socket speaking SMTP: writes command lines and hands out server replies
 * in order. Any socket error fails every pending and later read.
 */
export class SmtpChannel {
  private parser = new SmtpReplyParser()
  private readonly replies: SmtpReply[] = []
  private readonly waiters: Waiter[] = []
  private readonly closeListeners: (() => void)[] = []
  private failure: Error | undefined
  private closed = false
  private detach: () => void = () => undefined

  static connect(target: DialTarget, options: SmtpChannelOptions): Promise<SmtpChannel> {
    return new Promise((resolve, reject) => {
      const socket = net.connect({ host: target.host, port: target.port })

      const onError = (err: Error) => {
        clearTimeout(timer)
        reject(err)
      }
      const timer = setTimeout(() => {
        socket.off("error", onError)
        socket.destroy()
        reject(SmtpError.timeout("connection", options.connectionTimeout))
      }, options.connectionTimeout)

      socket.once("error", onError)
      socket.once("connect", () => {
        clearTimeout(timer)
        socket.off("error", onError)
        resolve(new SmtpChannel(socket, options.socketTimeout))
      })
    })
  }

  private constructor(
    private socket: net.Socket,
    private readonly socketTimeout: number,
  ) {
    this.attach(socket)
  }

  get isClosed(): boolean {
    return this.closed
  }

  /** Sends one command line and waits for a reply with one of the `expected` codes. */
  async command(label: string, line: string, expected: readonly number[]): Promise<SmtpReply> {
    if (/[\r\n]/.test(line)) throw SmtpError.invalidCommand(label)

    if (!this.failure) this.socket.write(`${line}\r\n`)

    return this.expect(label, expected)
  }

  async expect(label: string, expected: readonly number[]): Promise<SmtpReply> {
    const reply = await this.read()

    if (!expected.includes(reply.code)) throw SmtpError.rejected(label, reply)

    return reply
  }

  /** Writes raw bytes, resolving once they are handed to the socket. */
  send(bytes: Uint8Array): Promise<void> {
    return new Promise((resolve, reject) => {
      if (this.failure) return reject(this.failure)

      this.socket.write(bytes, (err) => (err ? reject(err) : resolve()))
    })
  }

  /** Wraps the socket in TLS in place, after the server accepted STARTTLS. */
  async upgrade(options: TlsUpgrade): Promise<void> {
    if (this.failure) throw this.failure

    this.detach()

    const plain = this.socket
    plain.on("error", (err) => this.fail(err))

    const secure = tls.connect({
      socket: plain,
      rejectUnauthorized: false,
      ...(options.servername !== undefined && { servername: options.servername }),
    })

    let settle: (err?: Error) => void = () => undefined
    const onError = (err: Error) => settle(err)
    const onTimeout = () => settle(SmtpError.timeout("TLS handshake", this.socketTimeout))
    const onClose = () => settle(SmtpError.closed())

    secure.setTimeout(this.socketTimeout)
    secure.on("error", onError)
    secure.on("timeout", onTimeout)
    secure.on("close", onClose)

    const failure = await new Promise<Error | undefined>((resolve) => {
      settle = resolve
      secure.once("secureConnect", () => resolve(undefined))
    })

    secure.off("timeout", onTimeout)
    secure.off("close", onClose)
    this.socket = secure

    if (failure) {
      secure.destroy()
      plain.destroy()
      this.markClosed(failure)
      throw failure
    }

    secure.off("error", onError)
    this.parser = new SmtpReplyParser()
    this.replies.length = 0
    this.attach(secure)
  }

  /** Tears the connection down and resolves once the socket is closed. */
  close(): Promise<void> {
    if (this.closed) return Promise.resolve()

    return new Promise((resolve) => {
      this.closeListeners.push(resolve)
      this.socket.destroy()
    })
  }

  destroy(err: Error): void {
    this.socket.destroy(err)
  }

  private read(): Promise<SmtpReply> {
    const next = this.replies.shift()

    if (next) return Promise.resolve(next)
    if (this.failure) return Promise.reject(this.failure)

    return new Promise((resolve, reject) => this.waiters.push({ resolve, reject }))
  }

  private attach(socket: net.Socket): void {
    const onData = (chunk: Buffer) => this.receive(chunk)
    const onError = (err: Error) => this.fail(err)
    const onClose = () => this.markClosed(SmtpError.closed())
    const onTimeout = () => socket.destroy(SmtpError.timeout("socket", this.socketTimeout))

    socket.setTimeout(this.socketTimeout)
    socket.on("data", onData)
    socket.on("error", onError)
    socket.on("close", onClose)
    socket.on("timeout", onTimeout)

    this.detach = () => {
      socket.setTimeout(0)
      socket.off("data", onData)
      socket.off("error", onError)
      socket.off("close", onClose)
      socket.off("timeout", onTimeout)
    }
  }

  private receive(chunk: Buffer): void {
    let replies: SmtpReply[]
    try {
      replies = this.parser.push(chunk.toString("latin1"))
    } catch (err) {
      this.socket.destroy(err instanceof Error ? err : undefined)
      return
    }

    for (const reply of replies) {
      const waiter = this.waiters.shift()

      if (waiter) waiter.resolve(reply)
      else this.replies.push(reply)
    }
  }

  private fail(err: Error): void {
    const failure = this.failure ?? err
    this.failure = failure

    for (const waiter of this.waiters.splice(0)) waiter.reject(failure)
  }

  private markClosed(err: Error): void {
    this.fail(err)
    this.closed = true

    for (const listener of this.closeListeners.splice(0)) listener()
  }
}
