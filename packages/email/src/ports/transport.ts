import type { EmailMessage } from "./message"
import type { SmtpSettings } from "./smtp-settings"

export type SendResult = {
  /** Message-ID assigned to the delivered message. */
  messageId: string
  accepted: string[]
  rejected: string[]
}

/**
 * Delivers one message per call. Implementations open a session from
 * `settings`, and close it before the returned promise settles.
 */
export interface MailTransport {
  send(message: EmailMessage, settings: SmtpSettings): Promise<SendResult>
}
