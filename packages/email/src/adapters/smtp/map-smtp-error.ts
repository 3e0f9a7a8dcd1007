import type { BaseError } from "@mailtask/errors"
import {
  TransportError,
  TransportTimeoutError,
  type TransportStage,
} from "../../core/errors/email-errors"
import type { SmtpSettings } from "../../ports/smtp-settings"

const AUTH_CODES = new Set(["EAUTH", "ENOAUTH"])
const CONNECT_CODES = new Set(["ECONNECTION", "ESOCKET", "EDNS", "ETLS"])

/**
 * Maps a nodemailer failure onto the transport error taxonomy.
 *
 * - `ETIMEDOUT` at any stage → TransportTimeoutError
 * - auth failures are never retryable
 * - connect failures always are
 * - send failures are retryable only for 4xx replies
 */
export function toTransportError(err: unknown, settings: SmtpSettings): BaseError {
  const code = readString(err, "code")
  const command = readString(err, "command")
  const responseCode = readNumber(err, "responseCode")

  if (code === "ETIMEDOUT") {
    return new TransportTimeoutError(settings.host, settings.port, settings.timeoutMs ?? 0, err)
  }

  const stage: TransportStage =
    code && AUTH_CODES.has(code)
      ? "auth"
      : (code && CONNECT_CODES.has(code)) || command === "CONN"
        ? "connect"
        : "send"

  const isRetryable =
    stage === "connect" ||
    (stage === "send" && responseCode !== undefined && responseCode >= 400 && responseCode < 500)

  const reason = err instanceof Error ? err.message : String(err)

  return new TransportError(`SMTP ${stage} failed: ${reason}`, {
    stage,
    host: settings.host,
    port: settings.port,
    isRetryable,
    ...(responseCode !== undefined && { responseCode }),
    cause: err,
  })
}

function readString(err: unknown, field: string): string | undefined {
  const value: unknown = typeof err === "object" && err !== null ? Reflect.get(err, field) : undefined
  return typeof value === "string" ? value : undefined
}

function readNumber(err: unknown, field: string): number | undefined {
  const value: unknown = typeof err === "object" && err !== null ? Reflect.get(err, field) : undefined
  return typeof value === "number" ? value : undefined
}
