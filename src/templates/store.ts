import { readFileSync, existsSync } from "node:fs";
import { join } from "node:path";
import { BaselineError, BaselineErrorCode } from "../shared/errors.js";
import { renderTemplate, type TemplateVars } from "./renderer.js";

/** Loads named templates from the template directory, caching each one after first read. */
export class TemplateStore {
  private readonly cache = new Map<string, string>();

  constructor(readonly dir: string) {}

  has(name: string): boolean {
    return this.cache.has(name) || existsSync(join(this.dir, name));
  }

  /** Names from `names` with no file in the template directory. */
  missing(names: readonly string[]): string[] {
    return names.filter((n) => !this.has(n));
  }

  load(name: string): string {
    const cached = this.cache.get(name);
    if (cached !== undefined) return cached;
    const file = join(this.dir, name);
    if (!existsSync(file)) {
      throw new BaselineError(BaselineErrorCode.TEMPLATE_MISSING, `Template not found: ${name}`, { template: name, dir: this.dir });
    }
    const text = readFileSync(file, "utf-8");
    this.cache.set(name, text);
    return text;
  }

  render(name: string, vars: TemplateVars): string {
    return renderTemplate(this.load(name), vars, name);
  }
}
