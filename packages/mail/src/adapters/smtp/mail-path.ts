import addressparser from "nodemailer/lib/addressparser"

type ParsedAddress = {
  address?: string
  group?: readonly ParsedAddress[]
}

function firstAddress(entries: readonly ParsedAddress[]): string | undefined {
  for (const entry of entries) {
    const found = entry.group ? firstAddress(entry.group) : entry.address
    if (found) return found
  }

  return undefined
}

/**
 * Reverse or forward path for MAIL FROM and RCPT TO. Display names are
 * dropped: `Ann <a@x.com>` becomes `<a@x.com>`.
 */
export function toMailPath(address: string): string {
  const parsed: readonly ParsedAddress[] = addressparser(address)

  return `<${firstAddress(parsed) ?? address.trim()}>`
}
