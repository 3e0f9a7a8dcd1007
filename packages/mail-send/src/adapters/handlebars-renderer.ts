import Handlebars from "handlebars"
import { TemplateSyntaxError, UndefinedVariableError } from "../model/mail-send.errors"
import type { RenderContext, VariableRenderer } from "../ports/variable-renderer"

const MISSING_VARIABLE = /^"([^"]+)" not defined in/

/**
 * Handlebars in strict mode: a reference to a missing variable throws instead
 * of rendering as an empty string. Output is not HTML-escaped, so bodies and
 * subjects come out exactly as the variables hold them.
 */
export class HandlebarsRenderer implements VariableRenderer {
  private readonly hbs = Handlebars.create()

  render(template: string, context: RenderContext): string {
    try {
      return this.hbs.compile(template, { strict: true, noEscape: true })(context)
    } catch (err) {
      const missing = err instanceof Error ? MISSING_VARIABLE.exec(err.message) : null

      if (missing?.[1]) {
        throw new UndefinedVariableError(template, missing[1], err)
      }

      throw new TemplateSyntaxError(template, err)
    }
  }
}
