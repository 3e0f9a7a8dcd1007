import type { EmailAddress } from "./address"

export type Attachment = {
  filename: string
  content: Uint8Array
  contentType?: string
  disposition?: "attachment" | "inline"
  /** Inline parts are referenced from the HTML body as `cid:<contentId>`. */
  contentId?: string
}

/** At least one body is required; clients pick the richest they can show. */
export type EmailContent =
  | { text: string; html?: string }
  | { text?: string; html: string }

export type EmailMessage = EmailContent & {
  from: EmailAddress
  to: readonly EmailAddress[]
  cc?: readonly EmailAddress[]
  subject: string
  headers?: Readonly<Record<string, string>>
  attachments?: readonly Attachment[]
}
