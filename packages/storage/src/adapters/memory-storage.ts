import { createHash } from "node:crypto"
import { Readable } from "node:stream"
import { buffer } from "node:stream/consumers"
import type { Clock } from "@mailtask/clock"
import type { StoragePort } from "../ports/storage"
import type {
  ObjectAttributes,
  ObjectInfo,
  ObjectRef,
  StorageData,
  StorageObject,
} from "../ports/storage-object"

type Entry = ObjectAttributes & {
  body: Buffer
  etag: string
  lastModified: Date
}

export interface MemoryStorageDeps {
  clock: Clock
}

/** Process-local StoragePort. Every read and write copies the bytes. */
export class MemoryStorage implements StoragePort {
  private readonly entries = new Map<string, Entry>()

  constructor(private readonly deps: MemoryStorageDeps) {}

  async put(ref: ObjectRef, data: StorageData, attributes?: ObjectAttributes): Promise<void> {
    const body = data instanceof Uint8Array ? Buffer.from(data) : await buffer(data)

    this.entries.set(entryKey(ref), {
      body,
      etag: `"${createHash("md5").update(body).digest("hex")}"`,
      lastModified: this.deps.clock.now(),
      ...(attributes?.contentType && { contentType: attributes.contentType }),
      ...(attributes?.metadata && { metadata: { ...attributes.metadata } }),
    })
  }

  async head(ref: ObjectRef): Promise<ObjectInfo | null> {
    const entry = this.entries.get(entryKey(ref))

    return entry ? toInfo(ref, entry) : null
  }

  async exists(ref: ObjectRef): Promise<boolean> {
    return this.entries.has(entryKey(ref))
  }

  async get(ref: ObjectRef): Promise<StorageObject | null> {
    const entry = this.entries.get(entryKey(ref))
    if (!entry) return null

    return { ...toInfo(ref, entry), body: Readable.from([Buffer.from(entry.body)]) }
  }

  async delete(ref: ObjectRef): Promise<void> {
    this.entries.delete(entryKey(ref))
  }
}

// NUL cannot appear in a bucket name, so the joined key is unambiguous.
function entryKey(ref: ObjectRef): string {
  return `${ref.bucket}\u0000${ref.key}`
}

function toInfo(ref: ObjectRef, entry: Entry): ObjectInfo {
  return {
    key: ref.key,
    sizeInBytes: entry.body.length,
    lastModified: entry.lastModified,
    etag: entry.etag,
    ...(entry.contentType && { contentType: entry.contentType }),
    ...(entry.metadata && { metadata: { ...entry.metadata } }),
  }
}
