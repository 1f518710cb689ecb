// Verification Engine: a fixed battery of read-only checks against live target state.
// Checks are independent: one failing (or erroring) check never skips the rest.
import type { CheckResult, VerificationReport } from "../types/check.js";
import type { Endpoints, RunConfiguration } from "../types/config.js";
import type { TargetEnvironment } from "../execution/target.js";
import { CHECKS, checkPrelude, type CheckDefinition } from "./checks.js";
import { VERIFY_SCRIPT_PATH } from "../baseline/constants.js";
import { shellQuote } from "../shared/shell.js";
import { BaselineError, BaselineErrorCode } from "../shared/errors.js";
import { logger } from "../logger.js";

/** Produces check results for one run. Chosen once at startup. */
export interface VerifyProvider {
  readonly name: string;
  results(endpoints: Endpoints, config: RunConfiguration, checks?: readonly CheckDefinition[]): AsyncGenerator<CheckResult>;
}

/** Runs each predicate through the executor, one call per check. */
export class InlineVerifyProvider implements VerifyProvider {
  readonly name = "inline";
  constructor(private readonly target: TargetEnvironment) {}

  async *results(endpoints: Endpoints, config: RunConfiguration, checks: readonly CheckDefinition[] = CHECKS): AsyncGenerator<CheckResult> {
    const prelude = checkPrelude(endpoints, config);
    for (const check of checks) {
      const r = await this.target.run(`${prelude}\n${check.predicate}`);
      const passed = r.exitCode === 0;
      yield passed
        ? { id: check.id, name: check.name, passed }
        : { id: check.id, name: check.name, passed, detail: r.stderr.trim() || `exit ${r.exitCode}` };
    }
  }
}

/** Runs the verify script deployed by the maintenance step and parses its [PASS]/[FAIL] lines. */
export class DeployedScriptVerifyProvider implements VerifyProvider {
  readonly name = "deployed-script";
  constructor(
    private readonly target: TargetEnvironment,
    private readonly scriptPath: string = VERIFY_SCRIPT_PATH,
  ) {}

  async *results(endpoints: Endpoints, config: RunConfiguration, checks: readonly CheckDefinition[] = CHECKS): AsyncGenerator<CheckResult> {
    const r = await this.target.run(`${checkPrelude(endpoints, config)}\nexec ${shellQuote(this.scriptPath)}`);
    const reported = parseScriptOutput(r.stdout);
    for (const check of checks) {
      const outcome = reported.get(check.id);
      if (outcome === undefined) {
        yield { id: check.id, name: check.name, passed: false, detail: "not reported by deployed verify script" };
      } else {
        yield { id: check.id, name: check.name, passed: outcome };
      }
    }
  }
}

export function parseScriptOutput(stdout: string): Map<string, boolean> {
  const outcomes = new Map<string, boolean>();
  for (const line of stdout.split("\n")) {
    const m = line.trim().match(/^\[(PASS|FAIL)\]\s+(\S+)$/);
    if (m) outcomes.set(m[2], m[1] === "PASS");
  }
  return outcomes;
}

/** Prefer the deployed script when it exists and is executable; otherwise run checks inline. */
export async function selectVerifyProvider(target: TargetEnvironment): Promise<VerifyProvider> {
  const r = await target.run(`test -x ${shellQuote(VERIFY_SCRIPT_PATH)}`);
  const provider = r.exitCode === 0 ? new DeployedScriptVerifyProvider(target) : new InlineVerifyProvider(target);
  logger.debug({ provider: provider.name }, "Verify provider selected");
  return provider;
}

export interface VerifyDeps {
  readonly provider: VerifyProvider;
  readonly checks?: readonly CheckDefinition[];
}

/** Lazily yields one result per check, in catalog order. Each call starts a fresh run. */
export function runChecks(config: RunConfiguration, deps: VerifyDeps): AsyncGenerator<CheckResult> {
  if (config.endpoints === null) {
    throw new BaselineError(BaselineErrorCode.INVALID_CONFIG, "Verification needs the internal endpoints (mirror, registry, DNS, proxy)");
  }
  return deps.provider.results(config.endpoints, config, deps.checks);
}

export async function verify(config: RunConfiguration, deps: VerifyDeps): Promise<VerificationReport> {
  const results: CheckResult[] = [];
  for await (const result of runChecks(config, deps)) {
    logger[result.passed ? "info" : "warn"]({ check: result.id, passed: result.passed, detail: result.detail }, result.name);
    results.push(result);
  }
  const failed = results.filter((r) => !r.passed).length;
  return { passed: results.length - failed, failed, results };
}
