import type {
  ObjectAttributes,
  ObjectInfo,
  ObjectRef,
  StorageData,
  StorageObject,
} from "./storage-object"

/**
 * Object store holding execution outputs that a task may attach to a
 * message. Lookups of missing objects resolve to `null` or `false`; only
 * malformed refs and I/O failures reject.
 */
export interface StoragePort {
  /** Replaces any existing object at `ref`. */
  put(ref: ObjectRef, data: StorageData, attributes?: ObjectAttributes): Promise<void>
  head(ref: ObjectRef): Promise<ObjectInfo | null>
  exists(ref: ObjectRef): Promise<boolean>
  get(ref: ObjectRef): Promise<StorageObject | null>
  /** Idempotent. */
  delete(ref: ObjectRef): Promise<void>
}
