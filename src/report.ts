// Plain-text reports printed on stdout by the CLI. Logs go to stderr through pino.
import type { StepOutcome, ActionOutcome } from "./types/action.js";
import type { VerificationReport } from "./types/check.js";
import type { ApplyResult } from "./apply/engine.js";
import type { RollbackResult } from "./rollback/engine.js";
import type { BundleSummary } from "./backup/bundle.js";

const STEP_MARK: Record<StepOutcome["status"], string> = {
  succeeded: "[ OK ]",
  failed: "[FAIL]",
  skipped: "[SKIP]",
  planned: "[PLAN]",
};

const ACTION_MARK: Record<ActionOutcome["status"], string> = {
  done: "+",
  planned: "~",
  tolerated: "!",
  failed: "x",
};

export function formatSteps(steps: readonly StepOutcome[]): string {
  const lines: string[] = [];
  for (const s of steps) {
    lines.push(`${STEP_MARK[s.status]} ${s.step}${s.status === "failed" && s.error ? `: ${s.error}` : ""}`);
    for (const a of s.actions) {
      lines.push(`    ${ACTION_MARK[a.status]} ${a.description}${a.status === "tolerated" && a.exitCode !== undefined ? ` (exit ${a.exitCode}, tolerated)` : ""}`);
    }
  }
  return lines.join("\n");
}

export function formatVerification(report: VerificationReport): string {
  const lines = report.results.map((r) => `[${r.passed ? "PASS" : "FAIL"}] ${r.id}: ${r.name}${r.detail ? ` (${r.detail})` : ""}`);
  lines.push(`${report.passed} passed, ${report.failed} failed`);
  return lines.join("\n");
}

export function formatApply(result: ApplyResult): string {
  const lines = [
    result.dryRun ? `Dry run: bundle would be written to ${result.bundlePath}` : `Backup bundle: ${result.bundlePath}`,
    "",
    formatSteps(result.steps),
  ];
  if (result.verification) lines.push("", formatVerification(result.verification));
  else if (!result.dryRun) lines.push("", "Verification skipped: a step failed");
  lines.push("", result.dryRun ? "Dry run complete; nothing was changed." : `Exit code ${result.exitCode}`);
  return lines.join("\n");
}

export function formatRollback(result: RollbackResult): string {
  return [
    `Rolled back ${result.targetId} from ${result.bundlePath}${result.metadataFound ? "" : " (metadata missing: files only)"}`,
    "",
    formatSteps(result.steps),
    "",
    `${result.succeeded} succeeded, ${result.failed} failed`,
  ].join("\n");
}

export function formatBundleList(bundles: readonly BundleSummary[]): string {
  if (bundles.length === 0) return "No backup bundles.";
  return bundles
    .map((b) => {
      if (!b.metadata) return `${b.id}  (metadata missing or invalid)  ${b.path}`;
      const present = b.metadata.artifacts.filter((a) => a.status === "present").length;
      const host = b.metadata.includesHostArtifacts ? "target+host" : "target";
      return `${b.id}  ${b.metadata.targetId}  ${host}  ${present}/${b.metadata.artifacts.length} captured  ${b.path}`;
    })
    .join("\n");
}
