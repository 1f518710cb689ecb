import { BaselineError, BaselineErrorCode } from "../shared/errors.js";

export type TemplateVars = Readonly<Record<string, string>>;

/**
 * Placeholder syntax: `{{NAME}}` with an upper-case name. Other brace syntax, such as the
 * Go templates podman accepts in `--format "{{.Repository}}"`, is left alone.
 */
const PLACEHOLDER = /\{\{([A-Z][A-Z0-9_]*)\}\}/g;

/** Placeholder names a template declares, in first-appearance order. */
export function placeholdersOf(template: string): string[] {
  const names = new Set<string>();
  for (const match of template.matchAll(PLACEHOLDER)) names.add(match[1]);
  return [...names];
}

/**
 * Substitute every declared placeholder. Unknown vars are ignored; a placeholder with
 * no value is an error, so an unsubstituted placeholder never reaches the target.
 */
export function renderTemplate(template: string, vars: TemplateVars, name = "template"): string {
  const unresolved = placeholdersOf(template).filter((p) => !Object.prototype.hasOwnProperty.call(vars, p));
  if (unresolved.length > 0) {
    throw new BaselineError(BaselineErrorCode.TEMPLATE_UNRESOLVED, `Unresolved placeholders in ${name}: ${unresolved.join(", ")}`, {
      template: name,
      unresolved,
    });
  }
  return template.replace(PLACEHOLDER, (_match, key: string) => vars[key]);
}
