import type { Logger } from "@postwire/logger"
import type {
  DeliveryClient,
  DeliveryReceipt,
  DeliverySession,
  Envelope,
} from "../../ports/delivery-client"
import { MailError } from "../errors"
import {
  type DialAddress,
  formatDialAddress,
  resolveDialAddress,
  tlsUpgradeFor,
} from "./resolve-dial-address"
import { isSmtpRejection } from "./smtp-error"

export type DeliveryRequest = {
  server: string
  port: number
  useTls: boolean
  tlsFallback: boolean
  envelope: Envelope
  message: Uint8Array
}

/**
 * Runs one SMTP transaction. A dial failure is rethrown as is. Any later
 * failure first resets the session and quits, then rethrows the original
 * error; a refused recipient stops the transaction before DATA.
 *
 * With `useTls` the session is upgraded when the server advertises
 * STARTTLS. If the upgrade fails the send is aborted, unless `tlsFallback`
 * is set: then the connection is dropped and the message goes over a fresh
 * unencrypted one.
 */
export async function deliver(
  client: DeliveryClient,
  request: DeliveryRequest,
  logger: Logger,
): Promise<DeliveryReceipt> {
  const address = resolveDialAddress(request.server, request.port)

  let session = await dial(client, address, logger)

  if (request.useTls && session.supportsExtension("STARTTLS")) {
    try {
      await session.startTls(tlsUpgradeFor(address.host))
    } catch (err) {
      await abandon(session, logger)

      if (!request.tlsFallback) throw err

      logger.warn("STARTTLS failed, delivering without TLS", { err })
      session = await dial(client, address, logger)
    }
  }

  let receipt: DeliveryReceipt
  try {
    receipt = await transmit(session, request)
  } catch (err) {
    await abandon(session, logger)
    throw err
  }

  await attempt("quit", () => session.quit(), logger)

  return receipt
}

function dial(client: DeliveryClient, address: DialAddress, logger: Logger) {
  logger.debug("dialing SMTP server", { server: formatDialAddress(address) })

  return client.dial(address)
}

async function transmit(
  session: DeliverySession,
  { envelope, message }: DeliveryRequest,
): Promise<DeliveryReceipt> {
  await session.setSender(envelope.from)

  for (const [index, recipient] of envelope.to.entries()) {
    try {
      await session.addRecipient(recipient)
    } catch (err) {
      if (!isSmtpRejection(err)) throw err

      throw MailError.recipientRejected({
        recipient,
        accepted: envelope.to.slice(0, index),
        cause: err,
      })
    }
  }

  const data = await session.openDataStream()
  await data.write(message)
  const response = await data.close()

  return { accepted: [...envelope.to], response }
}

async function abandon(session: DeliverySession, logger: Logger): Promise<void> {
  await attempt("reset", () => session.reset(), logger)
  await attempt("quit", () => session.quit(), logger)
}

async function attempt(step: string, run: () => Promise<void>, logger: Logger): Promise<void> {
  try {
    await run()
  } catch (err) {
    logger.debug(`SMTP ${step} failed`, { err })
  }
}
