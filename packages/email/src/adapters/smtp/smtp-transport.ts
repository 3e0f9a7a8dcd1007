import type { Logger } from "@mailtask/logger"
import { createTransport } from "nodemailer"
import type Mail from "nodemailer/lib/mailer"
import type SMTPTransport from "nodemailer/lib/smtp-transport"
import { formatAddress } from "../../core/address/parse-address-list"
import { TransportError } from "../../core/errors/email-errors"
import { validateMessage } from "../../core/validation/validate-message"
import type { Attachment, EmailMessage } from "../../ports/message"
import {
  DEFAULT_SMTP_TRANSPORT_STRATEGY,
  type SmtpSettings,
} from "../../ports/smtp-settings"
import type { MailTransport, SendResult } from "../../ports/transport"
import { toTransportError } from "./map-smtp-error"

/** The slice of a nodemailer transporter one session needs. */
export interface SmtpClient {
  sendMail(options: Mail.Options): Promise<SMTPTransport.SentMessageInfo>
  close(): void
}

export type SmtpClientFactory = (options: SMTPTransport.Options) => SmtpClient

export type SmtpTransportDeps = {
  /** Builds one client per send. Defaults to nodemailer's `createTransport`. */
  createClient?: SmtpClientFactory
  logger?: Logger
}

/**
 * SMTP delivery through nodemailer. Every `send` opens its own session and
 * closes it before returning or throwing.
 */
export class SmtpTransport implements MailTransport {
  private readonly createClient: SmtpClientFactory

  constructor(private readonly deps: SmtpTransportDeps = {}) {
    this.createClient = deps.createClient ?? ((options) => createTransport(options))
  }

  async send(message: EmailMessage, settings: SmtpSettings): Promise<SendResult> {
    validateMessage(message)

    const client = this.createClient(toTransportOptions(settings))
    let response: SMTPTransport.SentMessageInfo

    this.deps.logger?.debug("Opening SMTP session", {
      host: settings.host,
      port: settings.port,
      strategy: settings.strategy ?? DEFAULT_SMTP_TRANSPORT_STRATEGY,
    })

    try {
      response = await client.sendMail(this.toMailOptions(message))
    } catch (err) {
      throw toTransportError(err, settings)
    } finally {
      client.close()
    }

    if (!response.messageId) {
      throw new TransportError("SMTP server did not return a message ID", {
        stage: "send",
        host: settings.host,
        port: settings.port,
        isRetryable: false,
      })
    }

    return {
      messageId: response.messageId,
      accepted: toAddressStrings(response.accepted),
      rejected: toAddressStrings(response.rejected),
    }
  }

  private toMailOptions(message: EmailMessage): Mail.Options {
    return {
      from: formatAddress(message.from),
      to: message.to.map(formatAddress),
      ...(message.cc && { cc: message.cc.map(formatAddress) }),
      subject: message.subject,
      ...(message.text && { text: message.text }),
      ...(message.html && { html: message.html }),
      ...(message.headers && { headers: { ...message.headers } }),
      ...(message.attachments && {
        attachments: message.attachments.map(toNodemailerAttachment),
      }),
    }
  }
}

export function toTransportOptions(settings: SmtpSettings): SMTPTransport.Options {
  const strategy = settings.strategy ?? DEFAULT_SMTP_TRANSPORT_STRATEGY
  const timeoutMs = settings.timeoutMs ?? 0

  return {
    host: settings.host,
    port: settings.port,
    secure: strategy === "smtps",
    ...(strategy === "plain" && { ignoreTLS: true }),
    ...(strategy === "starttls" && { requireTLS: true }),
    ...(settings.username && {
      auth: { user: settings.username, pass: settings.password ?? "" },
    }),
    ...(timeoutMs > 0 && {
      connectionTimeout: timeoutMs,
      greetingTimeout: timeoutMs,
      socketTimeout: timeoutMs,
    }),
  }
}

function toNodemailerAttachment(attachment: Attachment): Mail.Attachment {
  return {
    filename: attachment.filename,
    content: Buffer.from(attachment.content),
    ...(attachment.contentType && { contentType: attachment.contentType }),
    ...(attachment.disposition && { contentDisposition: attachment.disposition }),
    ...(attachment.contentId && { cid: attachment.contentId }),
  }
}

// nodemailer reports recipients as strings or `{ name, address }` objects.
function toAddressStrings(addresses: ReadonlyArray<string | Mail.Address>): string[] {
  return addresses.map((a) => (typeof a === "string" ? a : a.address))
}
