export {
  BUNDLED_TEMPLATES_DIR,
  DirectoryTemplateSource,
  type DirectoryTemplateSourceOptions,
} from "./adapters/directory-template-source"
export { HandlebarsRenderer } from "./adapters/handlebars-renderer"
export { StorageBlobStore, type StorageBlobStoreDeps } from "./adapters/storage-blob-store"
export {
  createMailSendServices,
  type MailSendServiceOverrides,
  type MailSendServices,
} from "./composition"
export { loadMailSendConfig, mapEnvToConfig } from "./config/load-mail-send-config"
export { type EnvConfig, envSchema, type MailSendConfig } from "./config/schema"
export {
  AttachmentResolutionError,
  BlobNotFoundError,
  InvalidSendRequestError,
  TemplateNotFoundError,
  TemplateRenderError,
  TemplateSyntaxError,
  UndefinedVariableError,
} from "./model/mail-send.errors"
export {
  type AttachmentRef,
  createSendRequest,
  DEFAULT_ATTACHMENT_CONTENT_TYPE,
  DEFAULT_SESSION_TIMEOUT_MS,
  MAX_PORT,
  MAX_SESSION_TIMEOUT_MS,
  type ResolvedAttachment,
  type SendRequest,
  type SendRequestInit,
} from "./model/send-request.model"
export {
  type AttachmentInput,
  type MailSendTaskInput,
  mailSendTaskInputSchema,
  parseTaskInput,
  type TaskContext,
} from "./model/task-input.model"
export type { BlobStore } from "./ports/blob-store"
export type { TemplateSource } from "./ports/template-source"
export type { RenderContext, VariableRenderer } from "./ports/variable-renderer"
export {
  AttachmentResolver,
  type AttachmentResolverDeps,
} from "./services/attachment-resolver"
export { MailSendTask, type MailSendTaskDeps } from "./services/mail-send-task"
export {
  type ComposedMessage,
  MessageComposer,
  PLAIN_TEXT_FALLBACK,
} from "./services/message-composer"
export { TemplateExpander, type TemplateExpanderDeps } from "./services/template-expander"
