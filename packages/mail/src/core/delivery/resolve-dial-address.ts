import { isIP } from "node:net"
import type { TlsUpgrade } from "../../ports/delivery-client"

export type DialAddress = {
  host: string
  port: number
}

const HOST_WITH_PORT = /^(\[[^\]]+\]|[^:]+):(\d+)$/

const unbracket = (host: string): string =>
  host.startsWith("[") && host.endsWith("]") ? host.slice(1, -1) : host

/**
 * A server value that already names a port (`mail.example.com:2525`,
 * `[::1]:2525`) is used as given and `port` is ignored.
 */
export function resolveDialAddress(server: string, port: number): DialAddress {
  const match = HOST_WITH_PORT.exec(server)

  if (match?.[1] && match[2]) {
    return { host: unbracket(match[1]), port: Number(match[2]) }
  }

  return { host: unbracket(server), port }
}

export function formatDialAddress({ host, port }: DialAddress): string {
  return host.includes(":") ? `[${host}]:${port}` : `${host}:${port}`
}

/** SNI only carries host names, so IP literals get none. */
export function tlsUpgradeFor(host: string): TlsUpgrade {
  return isIP(host) === 0 ? { servername: host } : {}
}
