/** SMTP envelope: who the server is told the message is from and to. */
export type Envelope = {
  from: string
  to: readonly string[]
}

export type DialTarget = {
  host: string
  port: number
}

export type TlsUpgrade = {
  /** SNI name. Left out for IP literals. Certificates are not verified. */
  servername?: string
}

export type DeliveryReceipt = {
  accepted: string[]

  /** Final server reply to the message data, e.g. `"250 2.0.0 queued"`. */
  response: string
}

/** The body of one DATA command. */
export interface DataStream {
  write(chunk: Uint8Array): Promise<void>

  /** Terminates the data and resolves with the server's reply. */
  close(): Promise<string>
}

/**
 * One open SMTP connection, past the greeting. Each method is one command;
 * a non-success reply rejects with an `SmtpError` coded `smtp_rejected`.
 */
export interface DeliverySession {
  supportsExtension(name: string): boolean
  startTls(options: TlsUpgrade): Promise<void>
  setSender(address: string): Promise<void>
  addRecipient(address: string): Promise<void>
  openDataStream(): Promise<DataStream>
  reset(): Promise<void>

  /** Sends QUIT and resolves once the connection is closed. */
  quit(): Promise<void>
}

export interface DeliveryClient {
  readonly name: string
  dial(target: DialTarget): Promise<DeliverySession>
}
