/** Epoch timestamp or duration, in milliseconds. */
export type Milliseconds = number
