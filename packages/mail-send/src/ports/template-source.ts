export interface TemplateSource {
  /** Returns the template text, or null when no template has that name. */
  load(name: string): Promise<string | null>
}
