import type { Readable } from "node:stream"
import {
  DEFAULT_OBJECT_URI_SCHEME,
  parseObjectUri,
  type StoragePort,
} from "@mailtask/storage"
import { BlobNotFoundError } from "../model/mail-send.errors"
import type { BlobStore } from "../ports/blob-store"

export type StorageBlobStoreDeps = {
  storage: StoragePort
  /** URI scheme accepted by `openStream`. Defaults to `storage`. */
  scheme?: string
}

/** Serves `<scheme>://<bucket>/<key>` URIs from a StoragePort. */
export class StorageBlobStore implements BlobStore {
  private readonly scheme: string

  constructor(private readonly deps: StorageBlobStoreDeps) {
    this.scheme = deps.scheme ?? DEFAULT_OBJECT_URI_SCHEME
  }

  async openStream(uri: string): Promise<Readable> {
    const object = await this.deps.storage.get(parseObjectUri(uri, this.scheme))

    if (!object) throw new BlobNotFoundError(uri)

    return object.body
  }
}
