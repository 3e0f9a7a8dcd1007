import { InvalidMessageError } from "../errors/email-errors"
import type { EmailMessage } from "../../ports/message"

export function validateMessage(message: EmailMessage): void {
  if (!message.text && !message.html) {
    throw new InvalidMessageError("requires at least one of text or html")
  }

  if (!message.from.email.trim()) {
    throw new InvalidMessageError("requires a sender")
  }

  if (message.to.length === 0) {
    throw new InvalidMessageError("requires at least one recipient")
  }

  for (const a of message.attachments ?? []) {
    if (!a.filename) {
      throw new InvalidMessageError("attachments require a filename")
    }

    if (a.disposition === "inline" && !a.contentId) {
      throw new InvalidMessageError("inline attachments require a contentId")
    }
  }
}

