import { type Clock, SystemClock } from "@mailtask/clock"
import { type MailTransport, SmtpTransport } from "@mailtask/email"
import { createPinoLogger, type Logger } from "@mailtask/logger"
import { FileSystemStorage, type StoragePort } from "@mailtask/storage"
import { DirectoryTemplateSource } from "./adapters/directory-template-source"
import { HandlebarsRenderer } from "./adapters/handlebars-renderer"
import { StorageBlobStore } from "./adapters/storage-blob-store"
import type { MailSendConfig } from "./config/schema"
import type { BlobStore } from "./ports/blob-store"
import type { TemplateSource } from "./ports/template-source"
import type { VariableRenderer } from "./ports/variable-renderer"
import { AttachmentResolver } from "./services/attachment-resolver"
import { MailSendTask } from "./services/mail-send-task"
import { MessageComposer } from "./services/message-composer"
import { TemplateExpander } from "./services/template-expander"

export type MailSendServices = {
  logger: Logger
  clock: Clock
  renderer: VariableRenderer
  templateSource: TemplateSource
  storage: StoragePort
  blobStore: BlobStore
  transport: MailTransport

  templateExpander: TemplateExpander
  attachmentResolver: AttachmentResolver
  composer: MessageComposer
  task: MailSendTask
}

export type MailSendServiceOverrides = Partial<
  Pick<
    MailSendServices,
    "logger" | "clock" | "renderer" | "templateSource" | "storage" | "blobStore" | "transport"
  >
>

export function createMailSendServices(
  config: MailSendConfig,
  overrides: MailSendServiceOverrides = {},
): MailSendServices {
  const clock = overrides.clock ?? new SystemClock()

  const logger =
    overrides.logger ??
    createPinoLogger(
      {},
      { level: config.logging.level, prettify: config.logging.prettify },
      { service: config.logging.serviceName, env: config.app.env },
    )

  const renderer = overrides.renderer ?? new HandlebarsRenderer()

  const templateSource =
    overrides.templateSource ??
    new DirectoryTemplateSource({
      ...(config.templates.rootDir !== undefined && { rootDir: config.templates.rootDir }),
    })

  const storage = overrides.storage ?? new FileSystemStorage({ rootDir: config.storage.rootDir })

  const blobStore =
    overrides.blobStore ?? new StorageBlobStore({ storage, scheme: config.storage.uriScheme })

  const transport =
    overrides.transport ?? new SmtpTransport({ logger: logger.child({ module: "smtp" }) })

  const templateExpander = new TemplateExpander({ source: templateSource, renderer })
  const attachmentResolver = new AttachmentResolver({
    logger: logger.child({ module: "attachments" }),
  })
  const composer = new MessageComposer()

  const task = new MailSendTask({
    logger,
    clock,
    renderer,
    templateExpander,
    attachmentResolver,
    blobStore,
    composer,
    transport,
  })

  return {
    logger,
    clock,
    renderer,
    templateSource,
    storage,
    blobStore,
    transport,
    templateExpander,
    attachmentResolver,
    composer,
    task,
  }
}
