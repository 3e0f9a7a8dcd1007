import type { Readable } from "node:stream"
import { buffer } from "node:stream/consumers"
import type { Logger } from "@mailtask/logger"
import { AttachmentResolutionError } from "../model/mail-send.errors"
import type { AttachmentRef, ResolvedAttachment } from "../model/send-request.model"
import type { BlobStore } from "../ports/blob-store"

export type AttachmentResolverDeps = {
  logger: Logger
}

export class AttachmentResolver {
  constructor(private readonly deps: AttachmentResolverDeps) {}

  /**
   * Reads every referenced blob into memory, one at a time and in order.
   * The first failure aborts the whole batch.
   */
  async resolve(
    refs: readonly AttachmentRef[] | undefined,
    store: BlobStore,
  ): Promise<ResolvedAttachment[]> {
    const resolved: ResolvedAttachment[] = []

    for (const ref of refs ?? []) {
      resolved.push(await this.resolveOne(ref, store))
    }

    return resolved
  }

  private async resolveOne(ref: AttachmentRef, store: BlobStore): Promise<ResolvedAttachment> {
    let stream: Readable

    try {
      stream = await store.openStream(ref.uri)
    } catch (err) {
      throw new AttachmentResolutionError(ref.uri, err)
    }

    try {
      const content = await buffer(stream)

      this.deps.logger.debug("Attachment resolved", {
        uri: ref.uri,
        name: ref.name,
        sizeInBytes: content.length,
      })

      return { name: ref.name, contentType: ref.contentType, content }
    } catch (err) {
      stream.destroy()
      throw new AttachmentResolutionError(ref.uri, err)
    }
  }
}
