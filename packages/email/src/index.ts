export {
  type SmtpClient,
  type SmtpClientFactory,
  SmtpTransport,
  type SmtpTransportDeps,
  toTransportOptions,
} from "./adapters/smtp/smtp-transport"
export {
  formatAddress,
  parseAddress,
  parseAddressList,
  parseSingleAddress,
} from "./core/address/parse-address-list"
export {
  InvalidAddressError,
  InvalidMessageError,
  TransportError,
  type TransportErrorOptions,
  type TransportStage,
  TransportTimeoutError,
} from "./core/errors/email-errors"
export { validateMessage } from "./core/validation/validate-message"
export type { EmailAddress } from "./ports/address"
export type { Attachment, EmailContent, EmailMessage } from "./ports/message"
export {
  DEFAULT_SMTP_TRANSPORT_STRATEGY,
  type SmtpSettings,
  type SmtpTransportStrategy,
  smtpTransportStrategies,
} from "./ports/smtp-settings"
export type { MailTransport, SendResult } from "./ports/transport"
