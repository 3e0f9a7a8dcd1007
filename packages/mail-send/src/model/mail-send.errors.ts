import { BaseError } from "@mailtask/errors"

export class TemplateNotFoundError extends BaseError<"template_not_found"> {
  constructor(templateUri: string, cause?: unknown) {
    super(`Template "${templateUri}" could not be found`, {
      code: "template_not_found",
      context: { templateUri },
      ...(cause !== undefined && { cause }),
    })
  }
}

export class TemplateRenderError extends BaseError<"template_render_failed"> {
  constructor(templateUri: string, cause: unknown) {
    super(`Template "${templateUri}" could not be rendered`, {
      code: "template_render_failed",
      context: { templateUri },
      cause,
    })
  }
}

export class UndefinedVariableError extends BaseError<"undefined_variable"> {
  readonly variable: string

  constructor(template: string, variable: string, cause?: unknown) {
    super(`Variable "${variable}" is not defined`, {
      code: "undefined_variable",
      context: { template, variable },
      ...(cause !== undefined && { cause }),
    })

    this.variable = variable
  }
}

export class TemplateSyntaxError extends BaseError<"template_syntax_invalid"> {
  constructor(template: string, cause: unknown) {
    super("Template expression could not be parsed", {
      code: "template_syntax_invalid",
      context: { template },
      cause,
    })
  }
}

export class BlobNotFoundError extends BaseError<"blob_not_found"> {
  constructor(uri: string) {
    super(`No object stored at "${uri}"`, {
      code: "blob_not_found",
      context: { uri },
    })
  }
}

export class AttachmentResolutionError extends BaseError<"attachment_resolution_failed"> {
  constructor(uri: string, cause: unknown) {
    super(`Attachment "${uri}" could not be read`, {
      code: "attachment_resolution_failed",
      context: { uri },
      cause,
    })
  }
}

export class InvalidSendRequestError extends BaseError<"invalid_send_request"> {
  constructor(details: string, fields: string[]) {
    super(`Invalid send request:\n${details}`, {
      code: "invalid_send_request",
      context: { fields },
    })
  }
}
