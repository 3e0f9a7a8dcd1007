import { readFile } from "node:fs/promises"
import path from "node:path"
import { fileURLToPath } from "node:url"
import type { TemplateSource } from "../ports/template-source"

/** Templates shipped with this package. */
export const BUNDLED_TEMPLATES_DIR = fileURLToPath(new URL("../../templates/", import.meta.url))

export type DirectoryTemplateSourceOptions = {
  rootDir?: string
}

/**
 * Loads UTF-8 templates from a directory. Names resolving outside the
 * directory are treated as unknown.
 */
export class DirectoryTemplateSource implements TemplateSource {
  private readonly rootDir: string

  constructor(options: DirectoryTemplateSourceOptions = {}) {
    this.rootDir = path.resolve(options.rootDir ?? BUNDLED_TEMPLATES_DIR)
  }

  async load(name: string): Promise<string | null> {
    const filePath = path.resolve(this.rootDir, name)

    if (!filePath.startsWith(this.rootDir + path.sep)) return null

    try {
      return await readFile(filePath, "utf-8")
    } catch (err) {
      if (isMissingFile(err)) return null
      throw err
    }
  }
}

function isMissingFile(err: unknown): boolean {
  return (
    err instanceof Error && "code" in err && (err.code === "ENOENT" || err.code === "EISDIR")
  )
}
