import type { Milliseconds } from "@mailtask/clock"

export const smtpTransportStrategies = ["plain", "starttls", "smtps"] as const

/**
 * - `plain`: no TLS at all
 * - `starttls`: plaintext connect, then a mandatory STARTTLS upgrade
 * - `smtps`: TLS from the first byte
 */
export type SmtpTransportStrategy = (typeof smtpTransportStrategies)[number]

export const DEFAULT_SMTP_TRANSPORT_STRATEGY: SmtpTransportStrategy = "smtps"

/** Connection settings for a single SMTP session. */
export type SmtpSettings = {
  host: string
  port: number
  username?: string
  password?: string
  strategy?: SmtpTransportStrategy
  /** Applied to connect, greeting and socket inactivity. `0` keeps the library defaults. */
  timeoutMs?: Milliseconds
}
