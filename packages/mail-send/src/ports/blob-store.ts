import type { Readable } from "node:stream"

export interface BlobStore {
  /** Opens the bytes behind `uri`. The caller owns the stream. */
  openStream(uri: string): Promise<Readable>
}
