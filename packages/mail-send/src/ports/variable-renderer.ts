export type RenderContext = Readonly<Record<string, unknown>>

/**
 * Expands `{{name}}` expressions against a context.
 * Throws UndefinedVariableError when an expression names a missing variable.
 */
export interface VariableRenderer {
  render(template: string, context: RenderContext): string
}
