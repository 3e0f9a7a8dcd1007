/** A single mailbox. `name` is the unquoted display name. */
export type EmailAddress = {
  readonly email: string
  readonly name?: string
}
