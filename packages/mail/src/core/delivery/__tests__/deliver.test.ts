import { createNullLogger } from "@postwire/logger"
import { MemoryDeliveryClient } from "../../../adapters/memory/memory-delivery-client"
import { RecordingLogger } from "../../../tests/utils/recording-logger"
import { MailError } from "../../errors"
import { type DeliveryRequest, deliver } from "../deliver"
import { SmtpError } from "../smtp-error"

function request(overrides: Partial<DeliveryRequest> = {}): DeliveryRequest {
  return {
    server: "mail.example.com",
    port: 25,
    useTls: false,
    tlsFallback: false,
    envelope: { from: "a@x.com", to: ["b@x.com", "c@x.com"] },
    message: Buffer.from("Subject: hi\r\n\r\nhello\r\n"),
    ...overrides,
  }
}

const ops = (client: MemoryDeliveryClient) => client.calls.map((call) => call.op)

describe("deliver", () => {
  it("sends the envelope one command at a time and quits", async () => {
    const client = new MemoryDeliveryClient()

    const receipt = await deliver(client, request(), createNullLogger())

    expect(receipt).toEqual({
      accepted: ["b@x.com", "c@x.com"],
      response: "250 2.0.0 OK: message queued",
    })
    expect(client.calls).toEqual([
      { op: "dial", target: { host: "mail.example.com", port: 25 } },
      { op: "mail", from: "a@x.com" },
      { op: "rcpt", to: "b@x.com" },
      { op: "rcpt", to: "c@x.com" },
      { op: "data" },
      { op: "quit" },
    ])
    expect(client.delivered[0]?.data.toString()).toBe("Subject: hi\r\n\r\nhello\r\n")
    expect(client.delivered[0]?.secure).toBe(false)
  })

  it("dials the port named in the server value", async () => {
    const client = new MemoryDeliveryClient()

    await deliver(client, request({ server: "mail.example.com:2525" }), createNullLogger())

    expect(client.calls[0]).toEqual({
      op: "dial",
      target: { host: "mail.example.com", port: 2525 },
    })
  })

  it("rethrows a dial error without touching a session", async () => {
    const refused = new Error("connect ECONNREFUSED")
    const client = new MemoryDeliveryClient({ dial: refused })

    await expect(deliver(client, request(), createNullLogger())).rejects.toBe(refused)
    expect(ops(client)).toEqual(["dial"])
  })

  it("stops at the first refused recipient before any data is sent", async () => {
    const client = new MemoryDeliveryClient({ rejectRecipients: ["b@x.com"] })

    const err = await deliver(client, request(), createNullLogger()).catch((e: unknown) => e)

    expect(err).toBeInstanceOf(MailError)
    expect(err).toMatchObject({
      code: "recipient_rejected",
      context: {
        recipient: "b@x.com",
        accepted: [],
        response: "550 5.1.1 Mailbox unavailable",
      },
    })
    expect(ops(client)).toEqual(["dial", "mail", "rcpt", "reset", "quit"])
    expect(client.delivered).toEqual([])
  })

  it("reports the recipients accepted before the refused one", async () => {
    const client = new MemoryDeliveryClient({ rejectRecipients: ["c@x.com"] })

    const err = await deliver(client, request(), createNullLogger()).catch((e: unknown) => e)

    expect(err).toMatchObject({
      code: "recipient_rejected",
      context: { recipient: "c@x.com", accepted: ["b@x.com"] },
    })
    expect(ops(client)).toEqual(["dial", "mail", "rcpt", "rcpt", "reset", "quit"])
    expect(client.delivered).toEqual([])
  })

  it("resets and quits before rethrowing a sender error unchanged", async () => {
    const failure = SmtpError.rejected("MAIL FROM", { code: 451, text: "4.3.0 try again later" })
    const client = new MemoryDeliveryClient({ mail: failure })

    await expect(deliver(client, request(), createNullLogger())).rejects.toBe(failure)
    expect(ops(client)).toEqual(["dial", "mail", "reset", "quit"])
  })

  it("resets and quits before rethrowing a data error", async () => {
    const failure = new Error("write EPIPE")
    const client = new MemoryDeliveryClient({ data: failure })

    await expect(deliver(client, request(), createNullLogger())).rejects.toBe(failure)
    expect(ops(client)).toEqual(["dial", "mail", "rcpt", "rcpt", "data", "reset", "quit"])
  })

  it("keeps the original error when reset and quit fail too", async () => {
    const failure = new Error("554 transaction failed")
    const client = new MemoryDeliveryClient({
      mail: failure,
      reset: new Error("reset failed"),
      quit: new Error("quit failed"),
    })
    const logger = new RecordingLogger()

    await expect(deliver(client, request(), logger)).rejects.toBe(failure)
    expect(logger.entries.filter((e) => e.level === "debug").map((e) => e.message)).toEqual([
      "dialing SMTP server",
      "SMTP reset failed",
      "SMTP quit failed",
    ])
  })

  it("resolves even when the final quit fails", async () => {
    const client = new MemoryDeliveryClient({ quit: new Error("socket hang up") })

    await expect(deliver(client, request(), createNullLogger())).resolves.toMatchObject({
      accepted: ["b@x.com", "c@x.com"],
    })
  })

  describe("STARTTLS", () => {
    it("upgrades when asked and advertised", async () => {
      const client = new MemoryDeliveryClient()

      await deliver(client, request({ useTls: true }), createNullLogger())

      expect(client.calls[1]).toEqual({ op: "starttls", tls: { servername: "mail.example.com" } })
      expect(client.delivered[0]?.secure).toBe(true)
    })

    it("sends no server name for an IP literal", async () => {
      const client = new MemoryDeliveryClient()

      await deliver(client, request({ server: "127.0.0.1:2525", useTls: true }), createNullLogger())

      expect(client.calls[1]).toEqual({ op: "starttls", tls: {} })
    })

    it("stays in plain text when the server does not advertise it", async () => {
      const client = new MemoryDeliveryClient({ extensions: ["8BITMIME"] })

      await deliver(client, request({ useTls: true }), createNullLogger())

      expect(ops(client)).not.toContain("starttls")
      expect(client.delivered[0]?.secure).toBe(false)
    })

    it("aborts the send when the upgrade fails", async () => {
      const failure = SmtpError.rejected("STARTTLS", { code: 454, text: "4.7.0 TLS not available" })
      const client = new MemoryDeliveryClient({ startTls: failure })

      await expect(
        deliver(client, request({ useTls: true }), createNullLogger()),
      ).rejects.toBe(failure)
      expect(ops(client)).toEqual(["dial", "starttls", "reset", "quit"])
      expect(client.delivered).toEqual([])
    })

    it("redials and delivers without TLS when fallback is allowed", async () => {
      const handshake = new Error("handshake failed")
      const client = new MemoryDeliveryClient({ startTls: handshake })
      const logger = new RecordingLogger()

      await deliver(client, request({ useTls: true, tlsFallback: true }), logger)

      expect(ops(client)).toEqual([
        "dial",
        "starttls",
        "reset",
        "quit",
        "dial",
        "mail",
        "rcpt",
        "rcpt",
        "data",
        "quit",
      ])
      expect(client.delivered[0]?.secure).toBe(false)
      expect(logger.find("STARTTLS failed, delivering without TLS")?.level).toBe("warn")
      expect(logger.find("STARTTLS failed, delivering without TLS")?.fields.err).toBe(handshake)
    })
  })
})
