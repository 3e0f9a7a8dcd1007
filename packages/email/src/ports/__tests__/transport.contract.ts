import { InvalidMessageError } from "../../core/errors/email-errors"
import type { EmailMessage } from "../message"
import type { SmtpSettings } from "../smtp-settings"
import type { MailTransport, SendResult } from "../transport"

export type MailTransportHarness = {
  name: string
  make: () => Promise<{
    transport: MailTransport
    settings: SmtpSettings
    close?: () => Promise<void>
  }>
}

export function describeMailTransportContract(h: MailTransportHarness) {
  describe(`${h.name} (MailTransport contract)`, () => {
    let transport: MailTransport
    let settings: SmtpSettings
    let close: (() => Promise<void>) | undefined

    beforeEach(async () => {
      const created = await h.make()

      transport = created.transport
      settings = created.settings
      close = created.close
    })

    afterEach(async () => {
      await close?.()
    })

    it("returns the message ID and recipient outcome", async () => {
      assertSendResult(await transport.send(minimalMessage(), settings))
    })

    it("does not mutate the input message", async () => {
      const message: EmailMessage = {
        ...minimalMessage(),
        headers: { "Return-Receipt-To": "sender@example.com" },
        attachments: [
          {
            filename: "a.txt",
            content: new TextEncoder().encode("hello"),
            contentType: "text/plain",
            disposition: "attachment",
          },
        ],
      }

      const before = JSON.stringify(message)

      await transport.send(message, settings)

      expect(JSON.stringify(message)).toBe(before)
    })

    it("sends with both text and html bodies", async () => {
      assertSendResult(
        await transport.send(
          { ...minimalMessage(), text: "Plain", html: "<p>HTML</p>" },
          settings,
        ),
      )
    })

    it("sends to several recipients with cc", async () => {
      assertSendResult(
        await transport.send(
          {
            ...minimalMessage(),
            to: [{ email: "r1@example.com" }, { email: "r2@example.com", name: "R Two" }],
            cc: [{ email: "cc@example.com" }],
          },
          settings,
        ),
      )
    })

    it("sends with an inline image", async () => {
      assertSendResult(
        await transport.send(
          {
            ...minimalMessage(),
            html: '<p><img src="cid:logo.png" /></p>',
            attachments: [
              {
                filename: "logo.png",
                content: new Uint8Array([137, 80, 78, 71]),
                contentType: "image/png",
                disposition: "inline",
                contentId: "logo.png",
              },
            ],
          },
          settings,
        ),
      )
    })

    it("rejects an inline attachment without contentId", async () => {
      const message: EmailMessage = {
        ...minimalMessage(),
        attachments: [
          {
            filename: "logo.png",
            content: new Uint8Array([1, 2, 3]),
            disposition: "inline",
          },
        ],
      }

      await expect(transport.send(message, settings)).rejects.toBeInstanceOf(
        InvalidMessageError,
      )
    })
  })
}

function assertSendResult(result: SendResult) {
  expect(result).toEqual({
    messageId: expect.any(String),
    accepted: expect.any(Array),
    rejected: expect.any(Array),
  })
  expect(result.messageId.length).toBeGreaterThan(0)
}

function minimalMessage(): EmailMessage {
  return {
    from: { email: "sender@example.com" },
    to: [{ email: "recipient@example.com" }],
    subject: "Test",
    text: "Test content",
  }
}
