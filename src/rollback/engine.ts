// Rollback Engine: puts a target (and optionally the host) back the way a bundle found it.
// Every step is attempted independently: one failed restore never stops the others.
import fs from "node:fs/promises";
import type { Dirent } from "node:fs";
import path from "node:path";
import type { Action, StepOutcome } from "../types/action.js";
import type { ArtifactDefinition, FileArtifact, RestoreHook } from "../types/artifact.js";
import type { ArtifactCapture, BundleMetadata } from "../types/bundle.js";
import type { RunConfiguration } from "../types/config.js";
import type { TargetEnvironment } from "../execution/target.js";
import type { HostEnvironment } from "../execution/host.js";
import { ActionRunner } from "../execution/runner.js";
import { ARTIFACTS, CREATED_ARTIFACTS, findArtifact } from "../baseline/artifacts.js";
import { RESET_RUNTIME_SCRIPT } from "../baseline/constants.js";
import { removeHostRulesScript } from "../baseline/host-policy.js";
import { readBundleFile, readMetadata } from "../backup/bundle.js";
import { shellQuote } from "../shared/shell.js";
import { BaselineError, BaselineErrorCode } from "../shared/errors.js";
import { logger } from "../logger.js";

export type RollbackScope = "all" | "host" | "target";
export const ROLLBACK_SCOPES: readonly RollbackScope[] = ["all", "host", "target"];

export interface RollbackDeps {
  readonly config: RunConfiguration;
  readonly host: HostEnvironment;
  /** The target is only known once the bundle's metadata has been read. */
  readonly targetFor: (targetId: string) => TargetEnvironment;
}

export interface RollbackResult {
  readonly bundlePath: string;
  readonly targetId: string;
  readonly metadataFound: boolean;
  readonly steps: readonly StepOutcome[];
  readonly succeeded: number;
  readonly failed: number;
  readonly exitCode: number;
}

interface PlannedStep {
  readonly step: string;
  readonly plan: () => Action[];
}

export async function rollback(bundlePath: string, scope: RollbackScope, deps: RollbackDeps): Promise<RollbackResult> {
  await ensureBundleDir(bundlePath);

  let metadata: BundleMetadata | null = null;
  try {
    metadata = await readMetadata(bundlePath);
  } catch (err) {
    if (!(err instanceof BaselineError) || err.code !== BaselineErrorCode.BUNDLE_INVALID) throw err;
    logger.warn({ bundlePath, context: err.context }, err.message);
  }
  if (metadata === null) {
    logger.warn(
      { bundlePath, targetId: deps.config.targetId },
      "BUNDLE METADATA MISSING OR INVALID — restoring only files present in the bundle; nothing will be deleted",
    );
  }

  const targetId = metadata?.targetId ?? deps.config.targetId;
  const target = deps.targetFor(targetId);
  const runner = new ActionRunner(target, deps.host, deps.config.dryRun);
  logger.info({ bundlePath, targetId, scope }, "Rolling back");

  const planned: PlannedStep[] = [];
  if (scope !== "host") {
    planned.push(...(metadata ? await planTargetFromMetadata(bundlePath, metadata) : await planTargetFromFiles(bundlePath, deps.config)));
  }

  const hostIncluded = metadata ? metadata.includesHostArtifacts : await exists(path.join(bundlePath, "host"));
  const steps: StepOutcome[] = [];
  if (scope !== "target") {
    if (hostIncluded) {
      planned.push(...(await planHost(bundlePath, metadata, deps.config)));
    } else {
      logger.warn({ bundlePath }, "Bundle has no host artifacts — skipping host rollback");
      steps.push({ step: "host", status: "skipped", actions: [], error: "bundle has no host artifacts" });
    }
  }

  for (const { step, plan } of planned) {
    steps.push(await runner.runStep(step, plan));
  }
  steps.push(await runner.runStep("runtime-reset", () => [
    { kind: "host-run", description: "restart the WSL runtime", script: RESET_RUNTIME_SCRIPT },
  ]));

  const failed = steps.filter((s) => s.status === "failed").length;
  const succeeded = steps.filter((s) => s.status === "succeeded").length;
  logger.info({ bundlePath, succeeded, failed }, "Rollback finished");
  return { bundlePath, targetId, metadataFound: metadata !== null, steps, succeeded, failed, exitCode: failed };
}

// ── Target ─────────────────────────────────────────────────────────

async function planTargetFromMetadata(bundlePath: string, metadata: BundleMetadata): Promise<PlannedStep[]> {
  const steps: PlannedStep[] = [];
  const keep = new Set<string>();

  for (const capture of metadata.artifacts) {
    if (capture.scope !== "target") continue;
    const artifact = findArtifact(capture.name);
    if (!artifact) {
      logger.warn({ artifact: capture.name }, "Bundle lists an artifact this version does not know — skipping");
      continue;
    }
    if (capture.status === "failed") {
      logger.warn({ artifact: capture.name, error: capture.error }, "Capture had failed — leaving live artifact untouched");
      continue;
    }
    if (capture.status === "absent") {
      steps.push({ step: `delete-${capture.name}`, plan: () => deleteActions(artifact, capture) });
      continue;
    }
    if (artifact.kind === "directory") {
      for (const name of capture.files ?? []) keep.add(`${capture.path}/${name}`);
    } else {
      keep.add(capture.path);
    }
    steps.push(await restoreStep(bundlePath, artifact, capture));
  }

  const created = CREATED_ARTIFACTS.filter((c) => !keep.has(c.path));
  steps.push({
    step: "remove-created-artifacts",
    plan: () => [
      ...created.flatMap((c): Action[] =>
        c.cleanup ? [{ kind: "target-run", description: `stop ${c.description}`, script: c.cleanup, bestEffort: true }] : [],
      ),
      ...created.map((c): Action => ({ kind: "target-remove", path: c.path })),
      { kind: "target-run", description: "reload systemd", script: "systemctl daemon-reload", bestEffort: true },
    ],
  });
  return steps;
}

async function restoreStep(bundlePath: string, artifact: ArtifactDefinition, capture: ArtifactCapture): Promise<PlannedStep> {
  const step = `restore-${capture.name}`;
  const bundleFile = capture.bundleFile;
  if (bundleFile === undefined) {
    return { step, plan: () => { throw missingContent(capture.name, "(none recorded)"); } };
  }

  switch (artifact.kind) {
    case "file": {
      const content = await readBundleFile(bundlePath, bundleFile);
      return {
        step,
        plan: () => {
          if (content === null) throw missingContent(capture.name, bundleFile);
          return fileRestoreActions(artifact, capture.path, content);
        },
      };
    }
    case "directory": {
      const files = capture.files ?? [];
      const contents = new Map<string, Buffer | null>();
      for (const name of files) contents.set(name, await readBundleFile(bundlePath, `${bundleFile}/${name}`));
      return {
        step,
        plan: () => {
          const actions: Action[] = [];
          for (const [name, content] of contents) {
            if (content === null) throw missingContent(capture.name, `${bundleFile}/${name}`);
            actions.push({ kind: "target-write", path: `${capture.path}/${name}`, content, mode: artifact.mode });
          }
          actions.push({
            kind: "target-run",
            description: `remove ${artifact.suffix} files in ${capture.path} that were not there before`,
            script: pruneScript(capture.path, artifact.suffix, files),
          });
          return [...actions, ...hookActions(artifact.afterRestore)];
        },
      };
    }
    case "state": {
      const content = await readBundleFile(bundlePath, bundleFile);
      return {
        step,
        plan: () => {
          if (content === null) throw missingContent(capture.name, bundleFile);
          return [{ kind: "target-run", description: `restore ${artifact.description}`, script: artifact.restore(content.toString("utf-8")) }];
        },
      };
    }
    case "snapshot":
      return { step, plan: () => [] };
  }
}

function fileRestoreActions(artifact: FileArtifact, live: string, content: Buffer): Action[] {
  return [
    ...(artifact.immutable ? [clearImmutable(live)] : []),
    { kind: "target-write", path: live, content, mode: artifact.mode },
    ...hookActions(artifact.afterRestore),
  ];
}

function deleteActions(artifact: ArtifactDefinition, capture: ArtifactCapture): Action[] {
  switch (artifact.kind) {
    case "file":
      return [...(artifact.immutable ? [clearImmutable(capture.path)] : []), { kind: "target-remove", path: capture.path }];
    case "directory":
      return [{ kind: "target-remove", path: capture.path }];
    case "state":
      return [{ kind: "target-run", description: `reset ${artifact.description}`, script: artifact.reset }];
    case "snapshot":
      return [];
  }
}

/** No metadata: restore whatever target files the bundle physically holds, delete nothing. */
async function planTargetFromFiles(bundlePath: string, config: RunConfiguration): Promise<PlannedStep[]> {
  const root = path.join(bundlePath, "target");
  const relFiles = (await walk(root)).filter((rel) => !rel.startsWith("_state/"));
  const steps: PlannedStep[] = [];
  for (const rel of relFiles) {
    const live = `/${rel}`;
    const content = await readBundleFile(bundlePath, `target/${rel}`);
    const artifact = artifactForPath(live, config);
    steps.push({
      step: `restore-${live}`,
      plan: () => {
        if (content === null) throw missingContent(live, `target/${rel}`);
        if (artifact?.kind === "file") return fileRestoreActions(artifact, live, content);
        const mode = artifact?.kind === "directory" ? artifact.mode : 0o644;
        return [{ kind: "target-write", path: live, content, mode }];
      },
    });
  }
  return steps;
}

function artifactForPath(live: string, config: RunConfiguration): ArtifactDefinition | undefined {
  return ARTIFACTS.find((a) => {
    if (a.scope !== "target") return false;
    if (a.kind === "file") return a.locate(config) === live;
    if (a.kind === "directory") return path.posix.dirname(live) === a.locate(config);
    return false;
  });
}

// ── Host ───────────────────────────────────────────────────────────

async function planHost(bundlePath: string, metadata: BundleMetadata | null, config: RunConfiguration): Promise<PlannedStep[]> {
  const steps: PlannedStep[] = [
    {
      step: "host-firewall-rules",
      plan: () => [{
        kind: "host-run",
        description: `remove Hyper-V firewall rules named ${config.hostRulePrefix}*`,
        script: removeHostRulesScript(config.hostRulePrefix),
      }],
    },
  ];

  const capture = metadata?.artifacts.find((a) => a.name === "wslconfig");
  if (metadata && capture) {
    if (capture.status === "present" && capture.bundleFile !== undefined) {
      const bundleFile = capture.bundleFile;
      const content = await readBundleFile(bundlePath, bundleFile);
      steps.push({
        step: "restore-wslconfig",
        plan: () => {
          if (content === null) throw missingContent("wslconfig", bundleFile);
          return [{ kind: "host-write", path: capture.path, content }];
        },
      });
    } else if (capture.status === "absent") {
      steps.push({ step: "delete-wslconfig", plan: () => [{ kind: "host-remove", path: capture.path }] });
    } else {
      logger.warn({ artifact: "wslconfig", error: capture.error }, "Capture had failed — leaving .wslconfig untouched");
    }
  } else if (!metadata) {
    const name = path.win32.basename(config.wslConfigPath);
    const content = await readBundleFile(bundlePath, `host/${name}`);
    if (content !== null) {
      steps.push({ step: "restore-wslconfig", plan: () => [{ kind: "host-write", path: config.wslConfigPath, content }] });
    }
  }

  logger.info("Hyper-V rule snapshot is kept for audit only and is not restored");
  return steps;
}

// ── Helpers ────────────────────────────────────────────────────────

function clearImmutable(live: string): Action {
  return { kind: "target-run", description: `clear immutable flag on ${live}`, script: `chattr -i ${shellQuote(live)} 2>/dev/null; true`, bestEffort: true };
}

function hookActions(hooks: readonly RestoreHook[] | undefined): Action[] {
  return (hooks ?? []).map((h): Action => ({ kind: "target-run", description: h.description, script: h.script, bestEffort: h.bestEffort }));
}

function pruneScript(dir: string, suffix: string, keep: readonly string[]): string {
  const d = shellQuote(dir);
  return [
    `[ -d ${d} ] || exit 0`,
    `for f in ${d}/*${suffix}; do`,
    '  [ -f "$f" ] || continue',
    '  case "$(basename "$f")" in',
    ...(keep.length > 0 ? [`    ${keep.map(shellQuote).join("|")}) ;;`] : []),
    '    *) rm -f -- "$f" ;;',
    "  esac",
    "done",
  ].join("\n");
}

function missingContent(artifact: string, bundleFile: string): BaselineError {
  return new BaselineError(BaselineErrorCode.BUNDLE_INVALID, `Bundle content missing for ${artifact}: ${bundleFile}`, { artifact, bundleFile });
}

async function ensureBundleDir(bundlePath: string): Promise<void> {
  if (!(await exists(bundlePath))) {
    throw new BaselineError(BaselineErrorCode.BUNDLE_NOT_FOUND, `Backup bundle not found: ${bundlePath}`, { bundlePath });
  }
}

async function exists(p: string): Promise<boolean> {
  try {
    await fs.access(p);
    return true;
  } catch (err) {
    if ((err as NodeJS.ErrnoException).code === "ENOENT") return false;
    throw err;
  }
}

/** Bundle-relative file paths under `root`, forward-slashed and sorted. */
async function walk(root: string, prefix = ""): Promise<string[]> {
  let entries: Dirent[];
  try {
    entries = await fs.readdir(path.join(root, prefix), { withFileTypes: true });
  } catch (err) {
    if ((err as NodeJS.ErrnoException).code === "ENOENT") return [];
    throw err;
  }
  const files: string[] = [];
  for (const entry of entries) {
    const rel = prefix ? `${prefix}/${entry.name}` : entry.name;
    if (entry.isDirectory()) files.push(...(await walk(root, rel)));
    else if (entry.isFile()) files.push(rel);
  }
  return files.sort();
}
