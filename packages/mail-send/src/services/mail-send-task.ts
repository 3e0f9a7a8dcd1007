import { type Clock, startStopwatch } from "@mailtask/clock"
import type { MailTransport, SmtpSettings } from "@mailtask/email"
import { serializeError } from "@mailtask/errors"
import type { Logger } from "@mailtask/logger"
import {
  type AttachmentRef,
  createSendRequest,
  type SendRequest,
} from "../model/send-request.model"
import {
  type AttachmentInput,
  type MailSendTaskInput,
  parseTaskInput,
  type TaskContext,
} from "../model/task-input.model"
import type { BlobStore } from "../ports/blob-store"
import type { VariableRenderer } from "../ports/variable-renderer"
import type { AttachmentResolver } from "./attachment-resolver"
import type { MessageComposer } from "./message-composer"
import type { TemplateExpander } from "./template-expander"

export type MailSendTaskDeps = {
  logger: Logger
  clock: Clock
  renderer: VariableRenderer
  templateExpander: TemplateExpander
  attachmentResolver: AttachmentResolver
  blobStore: BlobStore
  composer: MessageComposer
  transport: MailTransport
}

export class MailSendTask {
  constructor(private readonly deps: MailSendTaskDeps) {}

  /**
   * Renders the input against `context.variables`, resolves attachments,
   * composes the message and sends it once. Failures are logged and rethrown
   * as they were raised.
   */
  async run(input: MailSendTaskInput, context: TaskContext): Promise<void> {
    const logger = this.deps.logger.child({
      taskType: "mail-send",
      ...(context.executionId !== undefined && { executionId: context.executionId }),
      ...(context.taskId !== undefined && { taskId: context.taskId }),
    })
    const stopwatch = startStopwatch(this.deps.clock)

    try {
      const request = await this.buildRequest(parseTaskInput(input), context.variables)

      const attachments = await this.deps.attachmentResolver.resolve(
        request.attachments,
        this.deps.blobStore,
      )
      const embeddedImages = await this.deps.attachmentResolver.resolve(
        request.embeddedImages,
        this.deps.blobStore,
      )

      const message = this.deps.composer.compose(request, attachments, embeddedImages)

      logger.debug("Sending email", {
        to: request.to,
        host: request.host,
        port: request.port,
        strategy: request.transportStrategy,
        attachments: attachments.length,
        embeddedImages: embeddedImages.length,
      })

      const result = await this.deps.transport.send(message, toSmtpSettings(request))

      logger.info("Email sent", {
        messageId: result.messageId,
        durationMs: stopwatch.elapsedMs(),
      })
    } catch (err) {
      const { code, isRetryable } = serializeError(err)

      logger.error("Email send failed", {
        err,
        code,
        isRetryable,
        durationMs: stopwatch.elapsedMs(),
      })

      throw err
    }
  }

  private async buildRequest(
    input: MailSendTaskInput,
    variables: Record<string, unknown>,
  ): Promise<SendRequest> {
    const render = (template: string) => this.deps.renderer.render(template, variables)

    const body =
      input.templateUri !== undefined
        ? await this.deps.templateExpander.expand(input.templateUri, input.templateVariables)
        : input.htmlBody

    return createSendRequest({
      host: render(input.host),
      port: typeof input.port === "number" ? input.port : parsePort(render(input.port)),
      ...(input.username !== undefined && { username: render(input.username) }),
      ...(input.password !== undefined && { password: render(input.password) }),
      ...(input.transportStrategy !== undefined && {
        transportStrategy: input.transportStrategy,
      }),
      ...(input.sessionTimeoutMs !== undefined && {
        sessionTimeoutMs: input.sessionTimeoutMs,
      }),
      from: render(input.from),
      to: render(input.to),
      ...(input.cc !== undefined && { cc: render(input.cc) }),
      ...(input.subject !== undefined && { subject: render(input.subject) }),
      ...(body !== undefined && { htmlBody: render(body) }),
      attachments: (input.attachments ?? []).map((a) => renderAttachment(a, render)),
      embeddedImages: (input.embeddedImages ?? []).map((a) => renderAttachment(a, render)),
    })
  }
}

// Decimal digits only; hex, exponents and signs leave NaN for the schema to reject.
function parsePort(raw: string): number {
  const trimmed = raw.trim()
  return /^\d+$/.test(trimmed) ? Number(trimmed) : Number.NaN
}

function renderAttachment(
  input: AttachmentInput,
  render: (template: string) => string,
): Omit<AttachmentRef, "contentType"> & { contentType?: string } {
  return {
    uri: render(input.uri),
    name: render(input.name),
    ...(input.contentType !== undefined && { contentType: render(input.contentType) }),
  }
}

function toSmtpSettings(request: SendRequest): SmtpSettings {
  return {
    host: request.host,
    port: request.port,
    ...(request.username !== undefined && { username: request.username }),
    ...(request.password !== undefined && { password: request.password }),
    strategy: request.transportStrategy,
    timeoutMs: request.sessionTimeoutMs,
  }
}
