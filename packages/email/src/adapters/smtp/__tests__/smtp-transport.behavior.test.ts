import type SMTPTransport from "nodemailer/lib/smtp-transport"
import { type MockProxy, mock } from "vitest-mock-extended"
import { TransportError, TransportTimeoutError } from "../../../core/errors/email-errors"
import type { EmailMessage } from "../../../ports/message"
import type { SmtpSettings } from "../../../ports/smtp-settings"
import { createStreamSmtpClient } from "../../../tests/utils/create-stream-smtp-client"
import {
  rejectAuthScript,
  startScriptedSmtpServer,
} from "../../../tests/utils/start-scripted-smtp-server"
import { startSilentSmtpServer } from "../../../tests/utils/start-silent-smtp-server"
import { type SmtpClient, SmtpTransport, toTransportOptions } from "../smtp-transport"

const settings: SmtpSettings = { host: "smtp.test", port: 587, timeoutMs: 1000 }

function sentInfo(
  overrides: Partial<SMTPTransport.SentMessageInfo> = {},
): SMTPTransport.SentMessageInfo {
  return {
    messageId: "<m-1@smtp.test>",
    envelope: { from: "sender@example.com", to: ["recipient@example.com"] },
    accepted: ["recipient@example.com"],
    rejected: [],
    pending: [],
    response: "250 OK",
    ...overrides,
  }
}

function minimalMessage(overrides: Partial<EmailMessage> = {}): EmailMessage {
  return {
    from: { email: "sender@example.com", name: "Sender" },
    to: [{ email: "recipient@example.com", name: "Recipient" }],
    subject: "Test",
    text: "Hello",
    ...overrides,
  }
}

function smtpError(message: string, fields: Record<string, unknown>): Error {
  return Object.assign(new Error(message), fields)
}

describe("SmtpTransport behavior", () => {
  let client: MockProxy<SmtpClient>

  beforeEach(() => {
    client = mock<SmtpClient>()
    client.sendMail.mockResolvedValue(sentInfo())
  })

  describe("transport options", () => {
    it("defaults to implicit TLS", () => {
      expect(toTransportOptions({ host: "h", port: 465 })).toEqual({
        host: "h",
        port: 465,
        secure: true,
      })
    })

    it("maps plain to no TLS at all", () => {
      expect(toTransportOptions({ host: "h", port: 25, strategy: "plain" })).toEqual({
        host: "h",
        port: 25,
        secure: false,
        ignoreTLS: true,
      })
    })

    it("maps starttls to a required upgrade", () => {
      expect(toTransportOptions({ host: "h", port: 587, strategy: "starttls" })).toEqual({
        host: "h",
        port: 587,
        secure: false,
        requireTLS: true,
      })
    })

    it("applies the timeout to every phase", () => {
      expect(toTransportOptions({ host: "h", port: 465, timeoutMs: 1500 })).toMatchObject({
        connectionTimeout: 1500,
        greetingTimeout: 1500,
        socketTimeout: 1500,
      })
    })

    it("leaves library timeouts alone for 0", () => {
      expect(toTransportOptions({ host: "h", port: 465, timeoutMs: 0 })).not.toHaveProperty(
        "connectionTimeout",
      )
    })

    it("sends credentials only with a username", () => {
      expect(
        toTransportOptions({ host: "h", port: 465, username: "mailer", password: "test-secret" }),
      ).toMatchObject({ auth: { user: "mailer", pass: "test-secret" } })
      expect(toTransportOptions({ host: "h", port: 465, password: "test-secret" })).not.toHaveProperty(
        "auth",
      )
    })
  })

  describe("session lifecycle", () => {
    it("creates a client per send and closes it", async () => {
      const createClient = vi.fn(() => client)
      const transport = new SmtpTransport({ createClient })

      await transport.send(minimalMessage(), settings)
      await transport.send(minimalMessage(), settings)

      expect(createClient).toHaveBeenCalledTimes(2)
      expect(client.close).toHaveBeenCalledTimes(2)
    })

    it("closes the client when sending fails", async () => {
      client.sendMail.mockRejectedValueOnce(smtpError("boom", { code: "EMESSAGE" }))
      const transport = new SmtpTransport({ createClient: () => client })

      await expect(transport.send(minimalMessage(), settings)).rejects.toThrow(TransportError)
      expect(client.close).toHaveBeenCalledTimes(1)
    })

    it("validates before connecting", async () => {
      const createClient = vi.fn(() => client)
      const transport = new SmtpTransport({ createClient })

      await expect(transport.send(minimalMessage({ text: "" }), settings)).rejects.toThrow(
        /text or html/,
      )
      expect(createClient).not.toHaveBeenCalled()
    })
  })

  describe("error mapping", () => {
    it("maps ETIMEDOUT to a retryable timeout", async () => {
      client.sendMail.mockRejectedValueOnce(
        smtpError("Greeting never received", { code: "ETIMEDOUT", command: "CONN" }),
      )
      const transport = new SmtpTransport({ createClient: () => client })

      const err = await transport.send(minimalMessage(), settings).catch((e: unknown) => e)

      expect(err).toBeInstanceOf(TransportTimeoutError)
      expect(err).toMatchObject({
        code: "transport_timeout",
        isRetryable: true,
        context: { host: "smtp.test", port: 587, timeoutMs: 1000 },
      })
    })

    it.each([
      ["EAUTH", undefined, 535, "auth", false],
      ["ENOAUTH", undefined, undefined, "auth", false],
      ["ECONNECTION", "CONN", undefined, "connect", true],
      ["ESOCKET", undefined, undefined, "connect", true],
      ["EDNS", "CONN", undefined, "connect", true],
      ["EENVELOPE", "RCPT TO", 450, "send", true],
      ["EENVELOPE", "RCPT TO", 550, "send", false],
      ["EMESSAGE", "DATA", undefined, "send", false],
    ])("maps %s (%s, %s) to stage %s", async (code, command, responseCode, stage, retryable) => {
      client.sendMail.mockRejectedValueOnce(
        smtpError("failure", {
          code,
          ...(command && { command }),
          ...(responseCode && { responseCode }),
        }),
      )
      const transport = new SmtpTransport({ createClient: () => client })

      const err = await transport.send(minimalMessage(), settings).catch((e: unknown) => e)

      expect(err).toBeInstanceOf(TransportError)
      expect(err).toMatchObject({ code: "transport_failed", stage, isRetryable: retryable })
    })

    it("attaches the underlying error as cause", async () => {
      const cause = smtpError("Invalid login", { code: "EAUTH", responseCode: 535 })
      client.sendMail.mockRejectedValueOnce(cause)
      const transport = new SmtpTransport({ createClient: () => client })

      const err = await transport.send(minimalMessage(), settings).catch((e: unknown) => e)

      expect(err).toMatchObject({
        message: "SMTP auth failed: Invalid login",
        cause,
        context: { stage: "auth", host: "smtp.test", port: 587, responseCode: 535 },
      })
    })

    it("rejects a reply without message ID", async () => {
      client.sendMail.mockResolvedValueOnce(sentInfo({ messageId: "" }))
      const transport = new SmtpTransport({ createClient: () => client })

      await expect(transport.send(minimalMessage(), settings)).rejects.toThrow(
        "SMTP server did not return a message ID",
      )
    })
  })

  describe("message mapping", () => {
    it("formats named addresses", async () => {
      const transport = new SmtpTransport({ createClient: () => client })

      await transport.send(
        minimalMessage({
          from: { email: "from@example.com", name: "From Name" },
          to: [{ email: "to@example.com", name: "To Name" }, { email: "plain@example.com" }],
        }),
        settings,
      )

      expect(client.sendMail).toHaveBeenCalledWith(
        expect.objectContaining({
          from: "From Name <from@example.com>",
          to: ["To Name <to@example.com>", "plain@example.com"],
        }),
      )
    })

    it("maps attachments with disposition and cid", async () => {
      const transport = new SmtpTransport({ createClient: () => client })

      await transport.send(
        minimalMessage({
          html: '<img src="cid:logo.png" />',
          attachments: [
            {
              filename: "logo.png",
              content: new Uint8Array([1, 2, 3]),
              contentType: "image/png",
              disposition: "inline",
              contentId: "logo.png",
            },
          ],
        }),
        settings,
      )

      expect(client.sendMail).toHaveBeenCalledWith(
        expect.objectContaining({
          attachments: [
            {
              filename: "logo.png",
              content: Buffer.from([1, 2, 3]),
              contentType: "image/png",
              contentDisposition: "inline",
              cid: "logo.png",
            },
          ],
        }),
      )
    })

    it("extracts accepted and rejected recipients", async () => {
      client.sendMail.mockResolvedValueOnce(
        sentInfo({
          messageId: "id-123",
          accepted: ["a@example.com"],
          rejected: [{ name: "B", address: "b@example.com" }],
        }),
      )
      const transport = new SmtpTransport({ createClient: () => client })

      expect(await transport.send(minimalMessage(), settings)).toEqual({
        messageId: "id-123",
        accepted: ["a@example.com"],
        rejected: ["b@example.com"],
      })
    })
  })

  describe("with nodemailer stream transport", () => {
    it("writes headers and parts into the MIME output", async () => {
      const stream = createStreamSmtpClient()
      const transport = new SmtpTransport({ createClient: () => stream })

      await transport.send(
        minimalMessage({
          cc: [{ email: "cc@example.com" }],
          subject: "Quarterly report",
          headers: { "Disposition-Notification-To": "sender@example.com" },
        }),
        settings,
      )

      const raw = stream.sent[0] ?? ""
      expect(raw).toMatch(/^Subject: Quarterly report$/m)
      expect(raw).toMatch(/^Cc: cc@example.com$/m)
      expect(raw).toMatch(/^Disposition-Notification-To: sender@example.com$/m)
      expect(stream.closeCount()).toBe(1)
    })
  })

  describe("against a server that never greets", () => {
    it("times out and releases the session", async () => {
      const server = await startSilentSmtpServer()
      const transport = new SmtpTransport()

      try {
        await expect(
          transport.send(minimalMessage(), {
            host: "127.0.0.1",
            port: server.port,
            strategy: "plain",
            timeoutMs: 200,
          }),
        ).rejects.toBeInstanceOf(TransportTimeoutError)

        await expect(server.firstConnectionClosed).resolves.toBeUndefined()
      } finally {
        await server.stop()
      }
    })
  })

  describe("against a server that rejects credentials", () => {
    it("maps the 535 reply to a permanent auth failure", async () => {
      const server = await startScriptedSmtpServer(rejectAuthScript)
      const transport = new SmtpTransport()

      try {
        const err = await transport
          .send(minimalMessage(), {
            host: "127.0.0.1",
            port: server.port,
            strategy: "plain",
            username: "mailer",
            password: "test-secret",
            timeoutMs: 2000,
          })
          .catch((e: unknown) => e)

        expect(err).toBeInstanceOf(TransportError)
        expect(err).toMatchObject({
          code: "transport_failed",
          isRetryable: false,
          context: { stage: "auth", host: "127.0.0.1", port: server.port, responseCode: 535 },
        })
        expect(server.received.some((line) => line.startsWith("AUTH "))).toBe(true)
        expect(server.received.some((line) => line.startsWith("MAIL FROM"))).toBe(false)
      } finally {
        await server.stop()
      }
    })
  })

  describe("against a closed port", () => {
    it("maps the refused connection to a retryable connect failure", async () => {
      const server = await startSilentSmtpServer()
      const { port } = server
      await server.stop()
      const transport = new SmtpTransport()

      const err = await transport
        .send(minimalMessage(), { host: "127.0.0.1", port, strategy: "plain", timeoutMs: 2000 })
        .catch((e: unknown) => e)

      expect(err).toBeInstanceOf(TransportError)
      expect(err).toMatchObject({
        code: "transport_failed",
        isRetryable: true,
        context: { stage: "connect", port },
      })
    })
  })
})
