import type { EmailMessage } from "../../../ports/message"
import { InvalidMessageError } from "../../errors/email-errors"
import { validateMessage } from "../validate-message"

function validMessage(overrides: Partial<EmailMessage> = {}): EmailMessage {
  return {
    from: { email: "sender@example.com" },
    to: [{ email: "recipient@example.com" }],
    subject: "Report ready",
    text: "Hello",
    ...overrides,
  }
}

describe("validateMessage", () => {
  describe("content", () => {
    it("passes with html only", () => {
      expect(() =>
        validateMessage({
          from: { email: "sender@example.com" },
          to: [{ email: "recipient@example.com" }],
          subject: "s",
          html: "<p>Hello</p>",
        }),
      ).not.toThrow()
    })

    it("throws when neither text nor html is provided", () => {
      expect(() => validateMessage(validMessage({ text: "" }))).toThrow(
        "EmailMessage requires at least one of text or html",
      )
    })

    it("allows an empty subject", () => {
      expect(() => validateMessage(validMessage({ subject: "" }))).not.toThrow()
    })
  })

  describe("addressing", () => {
    it("throws when the sender is blank", () => {
      expect(() => validateMessage(validMessage({ from: { email: " " } }))).toThrow(
        "EmailMessage requires a sender",
      )
    })

    it("throws when the recipient list is empty", () => {
      expect(() => validateMessage(validMessage({ to: [] }))).toThrow(
        "EmailMessage requires at least one recipient",
      )
    })
  })

  describe("attachments", () => {
    it("passes with a valid inline attachment", () => {
      const message = validMessage({
        attachments: [
          {
            filename: "logo.png",
            content: new Uint8Array([1, 2, 3]),
            contentType: "image/png",
            disposition: "inline",
            contentId: "logo.png",
          },
        ],
      })

      expect(() => validateMessage(message)).not.toThrow()
    })

    it("throws when an inline attachment has no contentId", () => {
      const message = validMessage({
        attachments: [
          { filename: "ok.txt", content: new Uint8Array([1]) },
          {
            filename: "logo.png",
            content: new Uint8Array([1, 2, 3]),
            disposition: "inline",
          },
        ],
      })

      expect(() => validateMessage(message)).toThrow(
        "EmailMessage inline attachments require a contentId",
      )
    })

    it("throws when an attachment has no filename", () => {
      const message = validMessage({
        attachments: [{ filename: "", content: new Uint8Array([1]) }],
      })

      expect(() => validateMessage(message)).toThrow(
        "EmailMessage attachments require a filename",
      )
    })
  })

  it("raises InvalidMessageError with the reason in context", () => {
    try {
      validateMessage(validMessage({ to: [] }))
      expect.unreachable()
    } catch (err) {
      expect(err).toBeInstanceOf(InvalidMessageError)
      expect(err).toMatchObject({
        code: "invalid_message",
        context: { reason: "requires at least one recipient" },
        isRetryable: false,
      })
    }
  })
})
