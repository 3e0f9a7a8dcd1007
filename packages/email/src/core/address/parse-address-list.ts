import { z } from "zod"
import type { EmailAddress } from "../../ports/address"
import { InvalidAddressError } from "../errors/email-errors"

const addrSpec = z.email()

// `Display Name <addr>` or `"Quoted, Name" <addr>`
const NAMED_ADDRESS = /^(?:"((?:[^"\\]|\\.)*)"|([^<>"]*?))\s*<([^<>]*)>$/

export function parseAddress(raw: string): EmailAddress {
  const token = raw.trim()
  const named = NAMED_ADDRESS.exec(token)

  const email = (named ? (named[3] ?? "") : token).trim()
  const name = named ? (named[1]?.replace(/\\(.)/g, "$1") ?? named[2] ?? "").trim() : ""

  const result = addrSpec.safeParse(email)
  if (!result.success) {
    throw new InvalidAddressError(raw, "not a valid mailbox", result.error)
  }

  return name ? { email: result.data, name } : { email: result.data }
}

/**
 * Parses a `;`-separated address list. Blank entries are skipped; the first
 * malformed entry fails the whole list, and so does a list with no entries.
 */
export function parseAddressList(raw: string): EmailAddress[] {
  const tokens = raw
    .split(";")
    .map((t) => t.trim())
    .filter((t) => t.length > 0)

  if (tokens.length === 0) {
    throw new InvalidAddressError(raw, "no addresses")
  }

  return tokens.map(parseAddress)
}

export function parseSingleAddress(raw: string): EmailAddress {
  const [first, ...rest] = parseAddressList(raw)

  if (!first || rest.length > 0) {
    throw new InvalidAddressError(raw, "expected exactly one address")
  }

  return first
}

export function formatAddress(recipient: EmailAddress): string {
  if (!recipient.name) return recipient.email

  const name = /[",;<>@()]/.test(recipient.name)
    ? `"${recipient.name.replace(/(["\\])/g, "\\$1")}"`
    : recipient.name

  return `${name} <${recipient.email}>`
}
