import net from "node:net"

export type ScriptedStartTls =
  /** Not advertised. */
  | "none"
  /** Advertised, answered with 454. */
  | "refuse"
  /** Advertised and accepted, then answered with bytes that are not TLS. */
  | "break"

export type ScriptedSmtpServerOptions = {
  startTls?: ScriptedStartTls
  /** Answer EHLO with 502 so clients fall back to HELO. */
  refuseEhlo?: boolean
  /** Replies that replace the default for a verb, e.g. `{ MAIL: "451 4.3.0 busy" }`. */
  replies?: Partial<Record<"MAIL" | "RCPT" | "DATA" | "RSET" | "QUIT", string>>
}

export type ScriptedMail = {
  from: string
  to: string[]
  data: string
}

export type ScriptedSmtpServer = {
  host: string
  port: number
  /** Command lines from every connection, in arrival order. */
  commands: string[]
  received: ScriptedMail[]
  connections: () => number
  close: () => Promise<void>
}

const pathOf = (line: string) => /<([^>]*)>/.exec(line)?.[1] ?? ""

/**
 * Minimal line-based SMTP server on 127.0.0.1 for exercising what a full
 * server cannot be told to do, such as failing STARTTLS.
 */
export async function startScriptedSmtpServer(
  opts: ScriptedSmtpServerOptions = {},
): Promise<ScriptedSmtpServer> {
  const startTls = opts.startTls ?? "none"
  const commands: string[] = []
  const received: ScriptedMail[] = []
  const sockets = new Set<net.Socket>()
  const overrides: Partial<Record<string, string>> = opts.replies ?? {}
  let connections = 0

  const server = net.createServer((socket) => {
    connections += 1
    sockets.add(socket)
    socket.on("close", () => sockets.delete(socket))
    socket.on("error", () => socket.destroy())

    let mode: "command" | "data" | "tls" = "command"
    let pending = ""
    let envelope: { from: string; to: string[] } = { from: "", to: [] }
    let lines: string[] = []

    const reply = (...replyLines: string[]) => socket.write(replyLines.map((l) => `${l}\r\n`).join(""))

    const handle = (line: string) => {
      if (mode === "data") {
        if (line === ".") {
          received.push({ ...envelope, data: lines.map((l) => `${l}\r\n`).join("") })
          envelope = { from: "", to: [] }
          mode = "command"
          reply("250 2.0.0 OK: queued as scripted")
        } else {
          lines.push(line.startsWith(".") ? line.slice(1) : line)
        }
        return
      }

      commands.push(line)
      const verb = (line.split(" ")[0] ?? "").toUpperCase()

      const override = overrides[verb]
      if (override) return reply(override)

      switch (verb) {
        case "EHLO": {
          if (opts.refuseEhlo) return reply("502 5.5.2 Command not recognized")

          const keywords = ["scripted.test", ...(startTls === "none" ? [] : ["STARTTLS"]), "8BITMIME"]
          return reply(...keywords.map((k, i) => `250${i === keywords.length - 1 ? " " : "-"}${k}`))
        }
        case "HELO":
          return reply("250 scripted.test")
        case "STARTTLS":
          if (startTls === "refuse") return reply("454 4.7.0 TLS not available")
          if (startTls === "break") {
            mode = "tls"
            return reply("220 2.0.0 Ready to start TLS")
          }
          return reply("502 5.5.2 Command not recognized")
        case "MAIL":
          envelope = { from: pathOf(line), to: [] }
          return reply("250 2.1.0 OK")
        case "RCPT":
          envelope.to.push(pathOf(line))
          return reply("250 2.1.5 OK")
        case "DATA":
          mode = "data"
          lines = []
          return reply("354 End data with <CR><LF>.<CR><LF>")
        case "RSET":
          envelope = { from: "", to: [] }
          return reply("250 2.0.0 OK")
        case "QUIT":
          socket.end("221 2.0.0 Bye\r\n")
          return
        default:
          return reply("502 5.5.2 Command not recognized")
      }
    }

    socket.on("data", (chunk: Buffer) => {
      if (mode === "tls") {
        socket.end("this is not a TLS record\r\n")
        return
      }

      pending += chunk.toString("latin1")

      let end = pending.indexOf("\r\n")
      while (end !== -1 && mode !== "tls") {
        const line = pending.slice(0, end)
        pending = pending.slice(end + 2)
        handle(line)
        end = pending.indexOf("\r\n")
      }
    })

    reply("220 scripted.test ESMTP")
  })

  await new Promise<void>((resolve) => server.listen(0, "127.0.0.1", () => resolve()))

  const address = server.address()

  if (address === null || typeof address === "string") {
    throw new Error("Scripted SMTP server is not listening on a TCP port")
  }

  return {
    host: "127.0.0.1",
    port: address.port,
    commands,
    received,
    connections: () => connections,
    close: () =>
      new Promise<void>((resolve) => {
        for (const socket of sockets) socket.destroy()
        server.close(() => resolve())
      }),
  }
}
