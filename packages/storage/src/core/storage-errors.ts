import { BaseError } from "@mailtask/errors"

export type StorageErrorCode = "invalid_storage_key" | "invalid_object_uri"

export class StorageError extends BaseError<StorageErrorCode> {
  static invalidKey(key: string, reason: string): StorageError {
    return new StorageError(`Storage key ${reason}`, {
      code: "invalid_storage_key",
      context: { key },
    })
  }

  static invalidUri(uri: string, reason: string, cause?: unknown): StorageError {
    return new StorageError(`Invalid object URI "${uri}": ${reason}`, {
      code: "invalid_object_uri",
      context: { uri },
      ...(cause !== undefined && { cause }),
    })
  }
}
