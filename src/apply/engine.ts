// Setup/Apply Engine: preconditions, backup, host policy, the eight target steps,
// verification, runtime reset. The backup is on disk before the first mutation.
import type { Action, StepOutcome } from "../types/action.js";
import type { RunConfiguration } from "../types/config.js";
import type { VerificationReport } from "../types/check.js";
import type { TargetEnvironment } from "../execution/target.js";
import type { HostEnvironment } from "../execution/host.js";
import type { TemplateStore } from "../templates/store.js";
import type { BackupProvider } from "../backup/engine.js";
import { ActionRunner } from "../execution/runner.js";
import { TARGET_STEPS, type StepContext } from "../baseline/steps.js";
import { hostPolicyActions } from "../baseline/host-policy.js";
import { RESET_RUNTIME_SCRIPT } from "../baseline/constants.js";
import { selectVerifyProvider, verify, type VerifyProvider } from "../verify/engine.js";
import { checkPreconditions } from "./preconditions.js";
import { BaselineError, BaselineErrorCode } from "../shared/errors.js";
import { logger } from "../logger.js";

export interface ApplyDeps {
  readonly target: TargetEnvironment;
  readonly host: HostEnvironment;
  readonly templates: TemplateStore;
  readonly backup: BackupProvider;
  /** Chosen after the target steps when omitted, so a freshly deployed verify script is picked up. */
  readonly verifier?: VerifyProvider;
}

export interface ApplyResult {
  readonly dryRun: boolean;
  /** In dry-run, the path the bundle would have been written to. */
  readonly bundlePath: string;
  readonly steps: readonly StepOutcome[];
  readonly verification: VerificationReport | null;
  readonly exitCode: number;
}

export const HOST_POLICY_STEP = "host-network-policy";
export const RUNTIME_RESET_STEP = "runtime-reset";

export async function apply(config: RunConfiguration, deps: ApplyDeps): Promise<ApplyResult> {
  const endpoints = config.endpoints;
  if (endpoints === null) {
    throw new BaselineError(BaselineErrorCode.INVALID_CONFIG, "apply needs the internal endpoints (mirror, registry, DNS, proxy)");
  }

  await checkPreconditions(deps, config.skipPreconditionCheck);

  const bundle = await deps.backup.capture(config, { includeHostArtifacts: true });
  logger.info({ bundlePath: bundle.path, written: bundle.written }, "Backup ready");

  const runner = new ActionRunner(deps.target, deps.host, config.dryRun);
  const ctx: StepContext = { config, endpoints, templates: deps.templates };
  const steps: StepOutcome[] = [];
  let halted = false;

  const plans: Array<{ step: string; plan: () => Action[] }> = [
    { step: HOST_POLICY_STEP, plan: () => hostPolicyActions(config, deps.templates) },
    ...TARGET_STEPS.map((s) => ({ step: s.id, plan: () => s.plan(ctx) })),
  ];

  for (const { step, plan } of plans) {
    if (halted) {
      steps.push({ step, status: "skipped", actions: [] });
      continue;
    }
    const outcome = await runner.runStep(step, plan);
    steps.push(outcome);
    if (outcome.status === "failed") {
      halted = true;
      logger.error({ step, bundlePath: bundle.path }, "Step failed — halting; the backup bundle remains valid for rollback");
    }
  }

  let verification: VerificationReport | null = null;
  if (!config.dryRun && !halted) {
    const verifier = deps.verifier ?? (await selectVerifyProvider(deps.target));
    verification = await verify(config, { provider: verifier });
  }

  steps.push(await runner.runStep(RUNTIME_RESET_STEP, () => [
    { kind: "host-run", description: "restart the WSL runtime so .wslconfig takes effect", script: RESET_RUNTIME_SCRIPT },
  ]));

  const failedSteps = steps.filter((s) => s.status === "failed").length;
  const exitCode = config.dryRun ? 0 : failedSteps + (verification?.failed ?? 0);
  logger.info({ failedSteps, failedChecks: verification?.failed ?? 0, exitCode }, "Apply finished");
  return { dryRun: config.dryRun, bundlePath: bundle.path, steps, verification, exitCode };
}
