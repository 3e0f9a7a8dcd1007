import { BaseError } from "@mailtask/errors"

export type TransportStage = "connect" | "auth" | "send"

export class InvalidAddressError extends BaseError<"invalid_address"> {
  constructor(raw: string, reason: string, cause?: unknown) {
    super(`Invalid email address "${raw}": ${reason}`, {
      code: "invalid_address",
      context: { raw },
      ...(cause !== undefined && { cause }),
    })
  }
}

export class InvalidMessageError extends BaseError<"invalid_message"> {
  constructor(reason: string) {
    super(`EmailMessage ${reason}`, {
      code: "invalid_message",
      context: { reason },
    })
  }
}

export class TransportTimeoutError extends BaseError<"transport_timeout"> {
  constructor(host: string, port: number, timeoutMs: number, cause?: unknown) {
    super(`SMTP session with ${host}:${port} timed out`, {
      code: "transport_timeout",
      context: { host, port, timeoutMs },
      isRetryable: true,
      ...(cause !== undefined && { cause }),
    })
  }
}

export type TransportErrorOptions = {
  stage: TransportStage
  host: string
  port: number
  isRetryable: boolean
  responseCode?: number
  cause?: unknown
}

export class TransportError extends BaseError<"transport_failed"> {
  readonly stage: TransportStage

  constructor(message: string, options: TransportErrorOptions) {
    super(message, {
      code: "transport_failed",
      context: {
        stage: options.stage,
        host: options.host,
        port: options.port,
        ...(options.responseCode !== undefined && { responseCode: options.responseCode }),
      },
      isRetryable: options.isRetryable,
      ...(options.cause !== undefined && { cause: options.cause }),
    })

    this.stage = options.stage
  }
}
