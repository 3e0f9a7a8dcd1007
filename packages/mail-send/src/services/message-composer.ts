import {
  type Attachment,
  type EmailAddress,
  type EmailMessage,
  formatAddress,
  parseAddressList,
  parseSingleAddress,
} from "@mailtask/email"
import type { ResolvedAttachment, SendRequest } from "../model/send-request.model"

export const PLAIN_TEXT_FALLBACK = "Please view this email in a modern email client!"

export type ComposedMessage = Readonly<EmailMessage>

export class MessageComposer {
  compose(
    request: SendRequest,
    attachments: readonly ResolvedAttachment[],
    embeddedImages: readonly ResolvedAttachment[],
  ): ComposedMessage {
    const from = parseSingleAddress(request.from)
    const to = parseAddressList(request.to)
    const cc = parseOptionalList(request.cc)
    const sender = formatAddress(from)

    const parts: Attachment[] = [
      ...attachments.map((a) => toPart(a, "attachment")),
      ...embeddedImages.map((i) => toPart(i, "inline")),
    ]

    return Object.freeze({
      from: Object.freeze(from),
      to: freezeAll(to),
      ...(cc && { cc: freezeAll(cc) }),
      subject: request.subject,
      text: PLAIN_TEXT_FALLBACK,
      html: request.htmlBody,
      headers: Object.freeze({
        "Disposition-Notification-To": sender,
        "Return-Receipt-To": sender,
      }),
      ...(parts.length > 0 && { attachments: freezeAll(parts) }),
    })
  }
}

// Attachment bytes stay writable: typed arrays with elements cannot be frozen.
function freezeAll<T extends object>(items: readonly T[]): readonly T[] {
  return Object.freeze(items.map((item) => Object.freeze(item)))
}

// Blank and absent cc lists both mean "no Cc header".
function parseOptionalList(raw: string | undefined): EmailAddress[] | undefined {
  if (raw === undefined || raw.split(";").every((token) => token.trim() === "")) {
    return undefined
  }

  return parseAddressList(raw)
}

function toPart(
  resolved: ResolvedAttachment,
  disposition: "attachment" | "inline",
): Attachment {
  return {
    filename: resolved.name,
    content: resolved.content,
    contentType: resolved.contentType,
    disposition,
    ...(disposition === "inline" && { contentId: resolved.name }),
  }
}
