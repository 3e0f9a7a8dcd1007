import type { ObjectRef } from "../ports/storage-object"
import { StorageError } from "./storage-errors"

export const DEFAULT_OBJECT_URI_SCHEME = "storage"

/**
 * Parses `<scheme>://<bucket>/<key>` into an ObjectRef.
 * Path segments are percent-decoded; the key keeps its `/` separators.
 * A literal `?` or `#` is rejected: keys carry them percent-encoded.
 */
export function parseObjectUri(
  uri: string,
  scheme: string = DEFAULT_OBJECT_URI_SCHEME,
): ObjectRef {
  let url: URL

  try {
    url = new URL(uri)
  } catch (err) {
    throw StorageError.invalidUri(uri, "not a URI", err)
  }

  if (url.protocol !== `${scheme}:`) {
    throw StorageError.invalidUri(uri, `expected scheme "${scheme}"`)
  }

  // `url.search` is empty for a bare trailing `?`, so check the raw text.
  if (/[?#]/.test(uri)) {
    throw StorageError.invalidUri(uri, "query and fragment are not allowed")
  }

  if (!url.host) {
    throw StorageError.invalidUri(uri, "missing bucket")
  }

  const key = url.pathname.replace(/^\/+/, "")

  if (!key) {
    throw StorageError.invalidUri(uri, "missing object key")
  }

  try {
    return {
      bucket: decodeURIComponent(url.host),
      key: key.split("/").map(decodeURIComponent).join("/"),
    }
  } catch (err) {
    throw StorageError.invalidUri(uri, "malformed percent-encoding", err)
  }
}

export function toObjectUri(
  ref: ObjectRef,
  scheme: string = DEFAULT_OBJECT_URI_SCHEME,
): string {
  const key = ref.key.split("/").map(encodeURIComponent).join("/")

  return `${scheme}://${encodeURIComponent(ref.bucket)}/${key}`
}
