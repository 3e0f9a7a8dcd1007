import { DEFAULT_SMTP_TRANSPORT_STRATEGY, smtpTransportStrategies } from "@mailtask/email"
import { z } from "zod"
import { InvalidSendRequestError } from "./mail-send.errors"

export const DEFAULT_ATTACHMENT_CONTENT_TYPE = "application/octet-stream"
export const DEFAULT_SESSION_TIMEOUT_MS = 1000
export const MAX_PORT = 65_535
// Longer delays overflow Node's timers and fire immediately.
export const MAX_SESSION_TIMEOUT_MS = 2_147_483_647

export const attachmentRefSchema = z.object({
  uri: z.string().min(1),
  name: z.string().min(1),
  contentType: z.string().min(1).default(DEFAULT_ATTACHMENT_CONTENT_TYPE),
})

export const sendRequestSchema = z.object({
  host: z.string().trim().min(1),
  port: z.number().int().positive().max(MAX_PORT),
  username: z.string().optional(),
  password: z.string().optional(),
  transportStrategy: z.enum(smtpTransportStrategies).default(DEFAULT_SMTP_TRANSPORT_STRATEGY),
  sessionTimeoutMs: z
    .number()
    .int()
    .nonnegative()
    .max(MAX_SESSION_TIMEOUT_MS)
    .default(DEFAULT_SESSION_TIMEOUT_MS),

  from: z.string().trim().min(1),
  to: z.string().trim().min(1),
  cc: z.string().optional(),
  subject: z.string().default(""),
  htmlBody: z.string().default(""),

  attachments: z.array(attachmentRefSchema).default([]),
  embeddedImages: z.array(attachmentRefSchema).default([]),
})

/** Reference to bytes held in task storage, e.g. `storage://executions/42/report.pdf`. */
export type AttachmentRef = Readonly<z.output<typeof attachmentRefSchema>>

/** Fully rendered, validated and frozen parameters for one send. */
export type SendRequest = Readonly<
  Omit<z.output<typeof sendRequestSchema>, "attachments" | "embeddedImages"> & {
    attachments: readonly AttachmentRef[]
    embeddedImages: readonly AttachmentRef[]
  }
>

export type SendRequestInit = z.input<typeof sendRequestSchema>

export type ResolvedAttachment = {
  name: string
  contentType: string
  content: Uint8Array
}

export function createSendRequest(init: SendRequestInit): SendRequest {
  const result = sendRequestSchema.safeParse(init)

  if (!result.success) {
    throw new InvalidSendRequestError(
      z.prettifyError(result.error),
      result.error.issues.map((issue) => issue.path.map(String).join(".")),
    )
  }

  const { attachments, embeddedImages, ...fields } = result.data

  return Object.freeze({
    ...fields,
    attachments: Object.freeze(attachments.map((a) => Object.freeze(a))),
    embeddedImages: Object.freeze(embeddedImages.map((a) => Object.freeze(a))),
  })
}
