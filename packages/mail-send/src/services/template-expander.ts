import { TemplateNotFoundError, TemplateRenderError } from "../model/mail-send.errors"
import type { TemplateSource } from "../ports/template-source"
import type { VariableRenderer } from "../ports/variable-renderer"

export type TemplateExpanderDeps = {
  source: TemplateSource
  renderer: VariableRenderer
}

export class TemplateExpander {
  constructor(private readonly deps: TemplateExpanderDeps) {}

  /**
   * Loads `templateUri` and renders it against `variables`.
   * Templates are read on every call; nothing is cached.
   */
  async expand(
    templateUri: string | undefined,
    variables?: Record<string, unknown>,
  ): Promise<string> {
    if (templateUri === undefined) return ""

    let template: string | null

    try {
      template = await this.deps.source.load(templateUri)
    } catch (err) {
      throw new TemplateNotFoundError(templateUri, err)
    }

    if (template === null) {
      throw new TemplateNotFoundError(templateUri)
    }

    try {
      return this.deps.renderer.render(template, variables ?? {})
    } catch (err) {
      throw new TemplateRenderError(templateUri, err)
    }
  }
}
