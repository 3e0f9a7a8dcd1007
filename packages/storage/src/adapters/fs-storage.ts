import { createHash } from "node:crypto"
import { createReadStream, createWriteStream } from "node:fs"
import * as fs from "node:fs/promises"
import * as path from "node:path"
import { pipeline } from "node:stream/promises"
import { StorageError } from "../core/storage-errors"
import type { StoragePort } from "../ports/storage"
import type {
  ObjectAttributes,
  ObjectInfo,
  ObjectRef,
  StorageData,
  StorageObject,
} from "../ports/storage-object"

type Sidecar = ObjectAttributes & { etag?: string }

export interface FsStorageOptions {
  rootDir: string
}

/**
 * Stores each object as a file under `<rootDir>/<bucket>/<key>`, with content
 * type and metadata kept in a `<file>.meta.json` sidecar.
 */
export class FileSystemStorage implements StoragePort {
  private readonly rootDir: string

  constructor(options: FsStorageOptions) {
    this.rootDir = path.resolve(options.rootDir)
  }

  async put(ref: ObjectRef, data: StorageData, attributes?: ObjectAttributes): Promise<void> {
    const filePath = this.resolveFilePath(ref)
    await fs.mkdir(path.dirname(filePath), { recursive: true })

    const etag = await this.write(filePath, data)

    const sidecar: Sidecar = {
      etag,
      ...(attributes?.contentType && { contentType: attributes.contentType }),
      ...(attributes?.metadata && { metadata: { ...attributes.metadata } }),
    }

    await fs.writeFile(sidecarPath(filePath), JSON.stringify(sidecar, null, 2))
  }

  async head(ref: ObjectRef): Promise<ObjectInfo | null> {
    const filePath = this.resolveFilePath(ref)

    try {
      return await this.describe(ref, filePath)
    } catch (err) {
      if (isNotFound(err)) return null
      throw err
    }
  }

  async exists(ref: ObjectRef): Promise<boolean> {
    return (await this.head(ref)) !== null
  }

  async get(ref: ObjectRef): Promise<StorageObject | null> {
    const filePath = this.resolveFilePath(ref)

    try {
      const meta = await this.describe(ref, filePath)
      return { ...meta, body: createReadStream(filePath) }
    } catch (err) {
      if (isNotFound(err)) return null
      throw err
    }
  }

  async delete(ref: ObjectRef): Promise<void> {
    const filePath = this.resolveFilePath(ref)

    await unlinkIfPresent(filePath)
    await unlinkIfPresent(sidecarPath(filePath))
  }

  private async describe(ref: ObjectRef, filePath: string): Promise<ObjectInfo> {
    const stat = await fs.stat(filePath)
    const sidecar = await this.loadSidecar(filePath)
    const etag = sidecar?.etag ?? md5(await fs.readFile(filePath))

    return {
      key: ref.key,
      sizeInBytes: stat.size,
      lastModified: stat.mtime,
      etag,
      ...(sidecar?.contentType && { contentType: sidecar.contentType }),
      ...(sidecar?.metadata && { metadata: { ...sidecar.metadata } }),
    }
  }

  private resolveFilePath(ref: ObjectRef): string {
    validateKey(ref.key)

    const encodedKey = ref.key.split("/").map(encodeURIComponent).join("/")
    const bucketDir = path.join(this.rootDir, encodeURIComponent(ref.bucket))
    const filePath = path.join(bucketDir, encodedKey)

    if (!path.resolve(filePath).startsWith(path.resolve(bucketDir) + path.sep)) {
      throw StorageError.invalidKey(ref.key, "escapes the bucket directory")
    }

    return filePath
  }

  private async write(filePath: string, data: StorageData): Promise<string> {
    if (data instanceof Uint8Array) {
      const buffer = Buffer.from(data)
      await fs.writeFile(filePath, buffer)
      return md5(buffer)
    }

    await pipeline(data, createWriteStream(filePath))

    return md5(await fs.readFile(filePath))
  }

  private async loadSidecar(filePath: string): Promise<Sidecar | null> {
    let raw: string

    try {
      raw = await fs.readFile(sidecarPath(filePath), "utf-8")
    } catch (err) {
      if (isNotFound(err)) return null
      throw err
    }

    const parsed: unknown = JSON.parse(raw)
    return isSidecar(parsed) ? parsed : null
  }
}

function validateKey(key: string): void {
  if (key.startsWith("/")) {
    throw StorageError.invalidKey(key, "must not start with '/'")
  }
  if (key.includes("\\")) {
    throw StorageError.invalidKey(key, "must not contain backslashes")
  }

  const segments = key.split("/")
  if (segments.some((s) => !s)) {
    throw StorageError.invalidKey(key, "must not be empty or contain empty segments")
  }
  if (segments.some((s) => s === "." || s === "..")) {
    throw StorageError.invalidKey(key, "must not contain '.' or '..' segments")
  }
}

function sidecarPath(filePath: string): string {
  return `${filePath}.meta.json`
}

function md5(content: Buffer): string {
  return `"${createHash("md5").update(content).digest("hex")}"`
}

function isSidecar(value: unknown): value is Sidecar {
  return typeof value === "object" && value !== null && !Array.isArray(value)
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT"
}

async function unlinkIfPresent(filePath: string): Promise<void> {
  try {
    await fs.unlink(filePath)
  } catch (err) {
    if (!isNotFound(err)) throw err
  }
}
