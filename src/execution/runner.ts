import type { Action, ActionOutcome, StepOutcome } from "../types/action.js";
import type { TargetEnvironment } from "./target.js";
import type { HostEnvironment } from "./host.js";
import { formatMode, toBuffer } from "./target.js";
import { BaselineError, BaselineErrorCode } from "../shared/errors.js";
import { logger } from "../logger.js";

export function describeAction(action: Action): string {
  switch (action.kind) {
    case "target-write":
      return `write ${action.path} (${toBuffer(action.content).length} bytes, mode ${formatMode(action.mode)})`;
    case "target-remove":
      return `remove ${action.path}`;
    case "host-write":
      return `write host file ${action.path} (${toBuffer(action.content).length} bytes)`;
    case "host-remove":
      return `remove host file ${action.path}`;
    case "target-run":
    case "host-run":
      return action.bestEffort ? `${action.description} (best-effort)` : action.description;
  }
}

/**
 * Performs Actions against the target and host, or in dry-run mode only reports
 * what it would do. Mutating code never touches an environment directly.
 */
export class ActionRunner {
  constructor(
    private readonly target: TargetEnvironment,
    private readonly host: HostEnvironment,
    readonly dryRun: boolean,
  ) {}

  /**
   * Run actions in order, stopping at the first failure that is not best-effort.
   * Timeouts and other fatal errors propagate.
   */
  async runAll(actions: readonly Action[]): Promise<{ outcomes: ActionOutcome[]; failed: boolean }> {
    const outcomes: ActionOutcome[] = [];
    for (const action of actions) {
      const outcome = await this.run(action);
      outcomes.push(outcome);
      if (outcome.status === "failed") return { outcomes, failed: true };
    }
    return { outcomes, failed: false };
  }

  /**
   * Plan and run one named step. A plan that cannot be built (an unresolved template,
   * unreadable bundle content) fails the step the same way a failed action does.
   */
  async runStep(step: string, plan: () => Action[]): Promise<StepOutcome> {
    let actions: Action[];
    try {
      actions = plan();
    } catch (err) {
      if (!(err instanceof BaselineError)) throw err;
      logger.error({ step, code: err.code, context: err.context }, err.message);
      return { step, status: "failed", actions: [], error: err.message };
    }

    logger.info({ step, actions: actions.length }, this.dryRun ? "Planning step" : "Running step");
    const { outcomes, failed } = await this.runAll(actions);
    if (failed) {
      const last = outcomes[outcomes.length - 1];
      return { step, status: "failed", actions: outcomes, error: last?.detail ?? last?.description };
    }
    return { step, status: this.dryRun ? "planned" : "succeeded", actions: outcomes };
  }

  async run(action: Action): Promise<ActionOutcome> {
    const description = describeAction(action);
    if (this.dryRun) {
      logger.info({ action: action.kind }, `[dry-run] would ${description}`);
      return { description, status: "planned" };
    }

    try {
      switch (action.kind) {
        case "target-write":
          await this.target.writeFile(action.path, action.content, action.mode);
          break;
        case "target-remove":
          await this.target.remove(action.path);
          break;
        case "host-write":
          await this.host.writeFile(action.path, action.content);
          break;
        case "host-remove":
          await this.host.remove(action.path);
          break;
        case "target-run":
        case "host-run": {
          const r = action.kind === "target-run" ? await this.target.run(action.script) : await this.host.run(action.script);
          if (r.exitCode !== 0) {
            const detail = (r.stderr.trim() || r.stdout.trim()).slice(0, 500) || undefined;
            if (action.bestEffort) {
              logger.warn({ action: action.kind, exitCode: r.exitCode, detail }, `Best-effort action failed: ${description}`);
              return { description, status: "tolerated", exitCode: r.exitCode, detail };
            }
            logger.error({ action: action.kind, exitCode: r.exitCode, detail }, `Action failed: ${description}`);
            return { description, status: "failed", exitCode: r.exitCode, detail };
          }
          break;
        }
      }
    } catch (err) {
      if (!(err instanceof BaselineError) || err.code !== BaselineErrorCode.COMMAND_FAILED) throw err;
      const exitCode = typeof err.context?.exitCode === "number" ? err.context.exitCode : undefined;
      logger.error({ action: action.kind, exitCode, context: err.context }, err.message);
      return { description, status: "failed", exitCode, detail: err.message };
    }

    logger.debug({ action: action.kind }, `Done: ${description}`);
    return { description, status: "done" };
  }
}
