// Read-only checks run before Setup touches anything (dry-run included).
import type { TargetEnvironment } from "../execution/target.js";
import type { HostEnvironment } from "../execution/host.js";
import type { TemplateStore } from "../templates/store.js";
import { requiredTemplates } from "../baseline/steps.js";
import { WSLCONFIG_TEMPLATE } from "../baseline/host-policy.js";
import { BaselineError, BaselineErrorCode } from "../shared/errors.js";
import { logger } from "../logger.js";

export interface PreconditionDeps {
  readonly target: TargetEnvironment;
  readonly host: HostEnvironment;
  readonly templates: TemplateStore;
}

/** Human-readable problems; empty when everything holds. */
export async function findPreconditionProblems(deps: PreconditionDeps): Promise<string[]> {
  const problems: string[] = [];

  const reach = await deps.target.run("true");
  if (reach.exitCode !== 0) {
    problems.push(`target ${deps.target.id} is not reachable (exit ${reach.exitCode})`);
  } else {
    const uid = await deps.target.run("id -u");
    if (uid.exitCode !== 0 || uid.stdout.trim() !== "0") {
      problems.push(`commands in ${deps.target.id} do not run as root (id -u: '${uid.stdout.trim()}')`);
    }
  }

  if (!(await deps.host.isElevated())) {
    problems.push("host process is not elevated (run from an Administrator shell)");
  }

  const missing = deps.templates.missing([...requiredTemplates(), WSLCONFIG_TEMPLATE]);
  if (missing.length > 0) {
    problems.push(`templates missing from ${deps.templates.dir}: ${missing.join(", ")}`);
  }
  return problems;
}

/** Throws PRECONDITION_FAILED, or with `skip` only warns. */
export async function checkPreconditions(deps: PreconditionDeps, skip: boolean): Promise<void> {
  const problems = await findPreconditionProblems(deps);
  if (problems.length === 0) {
    logger.info("Preconditions satisfied");
    return;
  }
  if (skip) {
    for (const problem of problems) logger.warn({ problem }, "Precondition failed (skipped by request)");
    return;
  }
  throw new BaselineError(BaselineErrorCode.PRECONDITION_FAILED, `Preconditions not met: ${problems.join("; ")}`, { problems });
}
