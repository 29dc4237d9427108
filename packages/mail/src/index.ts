export { SystemClock } from "./adapters/clock/system-clock"
export {
  type DeliveredMessage,
  MemoryDeliveryClient,
  type MemoryDeliveryCall,
  type MemoryDeliveryFailures,
} from "./adapters/memory/memory-delivery-client"
export { BASE36_ALPHABET, base36Boundaries } from "./adapters/nanoid/base36-boundaries"
export {
  SmtpDeliveryClient,
  type SmtpDeliveryClientOptions,
} from "./adapters/smtp/smtp-delivery-client"
export { composeMessage } from "./config/compose-message"
export { loadMailConfig, mapEnvToConfig } from "./config/load-mail-config"
export { type MailConfig, type MailEnv, mailEnvSchema } from "./config/schema"
export { type DeliveryRequest, deliver } from "./core/delivery/deliver"
export {
  type DialAddress,
  formatDialAddress,
  resolveDialAddress,
  tlsUpgradeFor,
} from "./core/delivery/resolve-dial-address"
export {
  isSmtpRejection,
  SmtpError,
  type SmtpErrorCode,
  type SmtpReplyInfo,
} from "./core/delivery/smtp-error"
export { MailError, type MailErrorCode, type RequiredField } from "./core/errors"
export { DEFAULT_CONTENT_TYPE, MailMessage, SUBJECT_PREFIX } from "./core/mail-message"
export { type SerializableMessage, serializeMessage } from "./core/mime/serialize-message"
export { DEFAULT_SMTP_PORT, normalizePort } from "./core/validation/validate-options"
export type { BoundaryGenerator } from "./ports/boundary-generator"
export type { TimeSource } from "./ports/clock"
export type {
  DataStream,
  DeliveryClient,
  DeliveryReceipt,
  DeliverySession,
  DialTarget,
  Envelope,
  TlsUpgrade,
} from "./ports/delivery-client"
export {
  type AttachmentRecord,
  type AttachmentSummary,
  type MailMessageDeps,
  type MailMessageOptions,
  type MessageLayout,
  messageLayouts,
} from "./ports/message"
