export { FileSystemStorage, type FsStorageOptions } from "./adapters/fs-storage"
export { MemoryStorage, type MemoryStorageDeps } from "./adapters/memory-storage"
export {
  DEFAULT_OBJECT_URI_SCHEME,
  parseObjectUri,
  toObjectUri,
} from "./core/object-uri"
export { StorageError, type StorageErrorCode } from "./core/storage-errors"
export type { StoragePort } from "./ports/storage"
export type {
  ObjectAttributes,
  ObjectInfo,
  ObjectRef,
  StorageData,
  StorageObject,
} from "./ports/storage-object"
