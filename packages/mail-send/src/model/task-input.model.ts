import { smtpTransportStrategies } from "@mailtask/email"
import { z } from "zod"
import { InvalidSendRequestError } from "./mail-send.errors"

const attachmentInputSchema = z.object({
  uri: z.string(),
  name: z.string(),
  contentType: z.string().optional(),
})

/**
 * Task configuration as the host supplies it. String fields are templates
 * rendered against the task's variables before use.
 */
export const mailSendTaskInputSchema = z.object({
  host: z.string(),
  port: z.union([z.number(), z.string()]),
  username: z.string().optional(),
  password: z.string().optional(),
  transportStrategy: z.enum(smtpTransportStrategies).optional(),
  sessionTimeoutMs: z.number().int().nonnegative().optional(),

  from: z.string(),
  to: z.string(),
  cc: z.string().optional(),
  subject: z.string().optional(),
  htmlBody: z.string().optional(),

  /** Name of a bundled HTML template. When set it replaces `htmlBody`. */
  templateUri: z.string().optional(),
  templateVariables: z.record(z.string(), z.unknown()).optional(),

  attachments: z.array(attachmentInputSchema).optional(),
  embeddedImages: z.array(attachmentInputSchema).optional(),
})

export type MailSendTaskInput = z.infer<typeof mailSendTaskInputSchema>
export type AttachmentInput = z.infer<typeof attachmentInputSchema>

export type TaskContext = {
  /** Values visible to `{{...}}` expressions in the input. */
  variables: Record<string, unknown>
  executionId?: string
  taskId?: string
}

export function parseTaskInput(input: unknown): MailSendTaskInput {
  const result = mailSendTaskInputSchema.safeParse(input)

  if (!result.success) {
    throw new InvalidSendRequestError(
      z.prettifyError(result.error),
      result.error.issues.map((issue) => issue.path.map(String).join(".")),
    )
  }

  return result.data
}
