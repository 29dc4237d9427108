import { createNullLogger } from "@postwire/logger"
import { MemoryDeliveryClient } from "../../adapters/memory/memory-delivery-client"
import { FakeClock } from "../../tests/utils/fake-clock"
import { sequenceBoundaries } from "../../tests/utils/sequence-boundaries"
import { composeMessage } from "../compose-message"
import type { MailConfig } from "../schema"

const config: MailConfig = {
  smtp: { server: "mail.example.com", port: 2525, useTls: true, tlsFallback: true },
  message: { sender: "a@x.com", recipients: ["b@x.com", "c@x.com"], layout: "multipart" },
  logging: { level: "error", prettify: false, serviceName: "test" },
}

describe("composeMessage", () => {
  it("addresses and routes the message from config", () => {
    const message = composeMessage(config, { logger: createNullLogger(), clock: new FakeClock() })

    expect(message.server).toBe("mail.example.com")
    expect(message.port).toBe(2525)
    expect(message.useTls).toBe(true)
    expect(message.tlsFallback).toBe(true)
    expect(message.sender).toBe("a@x.com")
    expect(message.recipients).toEqual(["b@x.com", "c@x.com"])
    expect(message.layout).toBe("multipart")
    expect(message.subject).toBe("postwire - 2026-01-02T03:04:05.000Z")
  })

  it("applies the configured subject", () => {
    const message = composeMessage(
      { ...config, message: { ...config.message, subject: "Nightly report" } },
      { logger: createNullLogger() },
    )

    expect(message.subject).toBe("Nightly report")
  })

  it("sends through the injected delivery client", async () => {
    const delivery = new MemoryDeliveryClient()
    const message = composeMessage(config, {
      logger: createNullLogger(),
      boundaries: sequenceBoundaries(),
      delivery,
    })
    message.setBody("hello")

    await message.send()

    expect(delivery.delivered[0]?.target).toMatchObject({ host: "mail.example.com", port: 2525 })
  })

  it("creates a logger from config when none is given", () => {
    expect(() => composeMessage(config)).not.toThrow()
  })
})
