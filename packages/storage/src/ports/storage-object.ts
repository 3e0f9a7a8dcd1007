import type { Readable } from "node:stream"

/** Body accepted by `put()`. Buffers are Uint8Arrays. */
export type StorageData = Readable | Uint8Array

/** Locates one object, e.g. bucket `executions`, key `42/report.csv`. */
export type ObjectRef = {
  readonly bucket: string
  readonly key: string
}

export type ObjectAttributes = {
  contentType?: string
  metadata?: Record<string, string>
}

export type ObjectInfo = ObjectAttributes & {
  key: string
  sizeInBytes: number
  lastModified: Date
  /** Quoted hex MD5 of the body. */
  etag: string
}

/** `body` belongs to the caller, who must read it to the end or destroy it. */
export type StorageObject = ObjectInfo & {
  body: Readable
}
