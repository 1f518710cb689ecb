// Config Backup Engine: captures every catalogued artifact before Setup mutates anything.
// Only two things are fatal: an unwritable backup root and an unreachable target.
// Any single artifact that cannot be probed is recorded as "failed" and the capture moves on.
import fs from "node:fs/promises";
import { constants as fsConstants } from "node:fs";
import path from "node:path";
import { hostname, userInfo } from "node:os";
import type { ArtifactDefinition } from "../types/artifact.js";
import type { ArtifactCapture, BackupBundle, BundleMetadata } from "../types/bundle.js";
import type { RunConfiguration } from "../types/config.js";
import type { TargetEnvironment } from "../execution/target.js";
import type { HostEnvironment } from "../execution/host.js";
import { ABSENT_EXIT_CODE } from "../execution/target.js";
import { ARTIFACTS, bundleFileFor } from "../baseline/artifacts.js";
import { bundleId, writeBundleFile, writeMetadata } from "./bundle.js";
import { BaselineError, BaselineErrorCode } from "../shared/errors.js";
import { logger } from "../logger.js";

export interface BackupDeps {
  readonly target: TargetEnvironment;
  readonly host: HostEnvironment;
  readonly now?: () => Date;
}

export interface BackupOptions {
  readonly includeHostArtifacts: boolean;
}

export function artifactsInScope(includeHostArtifacts: boolean): ArtifactDefinition[] {
  return ARTIFACTS.filter((a) => a.scope === "target" || includeHostArtifacts);
}

export function livePath(artifact: ArtifactDefinition, config: RunConfiguration): string {
  switch (artifact.kind) {
    case "file":
    case "directory":
      return artifact.locate(config);
    case "state":
    case "snapshot":
      return artifact.description;
  }
}

/** Capture every in-scope artifact into a new bundle under config.backupRoot. */
export async function createBackup(config: RunConfiguration, deps: BackupDeps, options: BackupOptions): Promise<BackupBundle> {
  const now = (deps.now ?? (() => new Date()))();
  await ensureWritableRoot(config.backupRoot);
  await ensureReachable(deps.target);

  const id = bundleId(now);
  const bundlePath = path.join(config.backupRoot, id);
  try {
    await fs.mkdir(bundlePath);
  } catch (err) {
    throw new BaselineError(BaselineErrorCode.BACKUP_FAILED, `Cannot create bundle directory ${bundlePath}`, {
      bundlePath,
      cause: err instanceof Error ? err.message : String(err),
    });
  }
  logger.info({ bundlePath, includeHostArtifacts: options.includeHostArtifacts }, "Creating backup bundle");

  const artifacts: ArtifactCapture[] = [];
  for (const artifact of artifactsInScope(options.includeHostArtifacts)) {
    artifacts.push(await captureArtifact(artifact, config, deps, bundlePath));
  }

  const metadata: BundleMetadata = {
    formatVersion: 1,
    id,
    createdAt: now.toISOString(),
    targetId: config.targetId,
    creator: currentUser(),
    hostId: hostname(),
    includesHostArtifacts: options.includeHostArtifacts,
    artifacts,
  };
  await writeMetadata(bundlePath, metadata);

  const counts = countStatuses(artifacts);
  logger.info({ bundlePath, ...counts }, "Backup bundle complete");
  return { id, path: bundlePath, metadata, written: true };
}

/**
 * Standalone backup; host artifacts only when config.includeHostArtifacts is set.
 * Under dry-run nothing is read or written and the path is the one a real run would use.
 */
export async function backupOnly(config: RunConfiguration, deps: BackupDeps): Promise<string> {
  const bundle = await selectBackupProvider(config, deps).capture(config, { includeHostArtifacts: config.includeHostArtifacts });
  return bundle.path;
}

type Probed = { content: Buffer | string } | { files: string[]; contents: Map<string, Buffer> };

async function captureArtifact(
  artifact: ArtifactDefinition,
  config: RunConfiguration,
  deps: BackupDeps,
  bundlePath: string,
): Promise<ArtifactCapture> {
  const live = livePath(artifact, config);
  const base = { name: artifact.name, scope: artifact.scope, kind: artifact.kind, path: live };

  let probed: Probed | null;
  try {
    probed = await probe(artifact, config, deps, live);
  } catch (err) {
    if (err instanceof BaselineError && err.code === BaselineErrorCode.COMMAND_TIMEOUT) throw err;
    const message = err instanceof Error ? err.message : String(err);
    logger.warn({ artifact: artifact.name, path: live, error: message }, "Could not capture artifact — continuing");
    return { ...base, status: "failed", error: message };
  }

  if (probed === null) {
    logger.info({ artifact: artifact.name, path: live }, "Artifact absent");
    return { ...base, status: "absent" };
  }

  const bundleFile = bundleFileFor(artifact, live);
  try {
    if ("contents" in probed) {
      for (const [name, content] of probed.contents) await writeBundleFile(bundlePath, `${bundleFile}/${name}`, content);
      logger.info({ artifact: artifact.name, path: live, files: probed.files.length }, "Captured directory");
      return { ...base, status: "present", bundleFile, files: probed.files };
    }
    await writeBundleFile(bundlePath, bundleFile, probed.content);
  } catch (err) {
    throw new BaselineError(BaselineErrorCode.BACKUP_FAILED, `Cannot write ${bundleFile} into bundle`, {
      artifact: artifact.name,
      cause: err instanceof Error ? err.message : String(err),
    });
  }
  logger.info({ artifact: artifact.name, path: live }, "Captured artifact");
  return { ...base, status: "present", bundleFile };
}

/** Null when the artifact does not exist; throws when the probe itself fails. */
async function probe(
  artifact: ArtifactDefinition,
  config: RunConfiguration,
  deps: BackupDeps,
  live: string,
): Promise<Probed | null> {
  switch (artifact.kind) {
    case "file": {
      const content = artifact.scope === "target" ? await deps.target.readFile(live) : await deps.host.readFile(live);
      return content === null ? null : { content };
    }
    case "directory": {
      const names = await deps.target.listFiles(live, artifact.suffix);
      if (names === null) return null;
      const contents = new Map<string, Buffer>();
      for (const name of names) {
        const content = await deps.target.readFile(`${live}/${name}`);
        if (content !== null) contents.set(name, content);
      }
      return { files: [...contents.keys()], contents };
    }
    case "state": {
      const r = await deps.target.run(artifact.probe);
      if (r.exitCode === ABSENT_EXIT_CODE) return null;
      if (r.exitCode !== 0) throw new Error(`state probe exited ${r.exitCode}: ${r.stderr.trim()}`);
      return { content: r.stdout };
    }
    case "snapshot": {
      const r = await deps.host.run(artifact.probe(config));
      if (r.exitCode !== 0) throw new Error(`snapshot probe exited ${r.exitCode}: ${r.stderr.trim()}`);
      return { content: r.stdout };
    }
  }
}

async function ensureWritableRoot(root: string): Promise<void> {
  try {
    await fs.mkdir(root, { recursive: true });
    await fs.access(root, fsConstants.W_OK);
  } catch (err) {
    throw new BaselineError(BaselineErrorCode.BACKUP_FAILED, `Backup root is not writable: ${root}`, {
      root,
      cause: err instanceof Error ? err.message : String(err),
    });
  }
}

async function ensureReachable(target: TargetEnvironment): Promise<void> {
  const r = await target.run("true");
  if (r.exitCode !== 0) {
    throw new BaselineError(BaselineErrorCode.BACKUP_FAILED, `Target ${target.id} is unreachable (exit ${r.exitCode})`, {
      target: target.id,
      exitCode: r.exitCode,
      stderr: r.stderr.trim(),
    });
  }
}

function currentUser(): string {
  try {
    return userInfo().username;
  } catch {
    return process.env.USERNAME ?? process.env.USER ?? "unknown";
  }
}

function countStatuses(artifacts: readonly ArtifactCapture[]): Record<"present" | "absent" | "failed", number> {
  const counts = { present: 0, absent: 0, failed: 0 };
  for (const a of artifacts) counts[a.status]++;
  return counts;
}

// ── Providers ──────────────────────────────────────────────────────

/** How Apply obtains its pre-mutation snapshot. Chosen once at startup. */
export interface BackupProvider {
  readonly name: string;
  capture(config: RunConfiguration, options: BackupOptions): Promise<BackupBundle>;
}

export class EngineBackupProvider implements BackupProvider {
  readonly name = "engine";
  constructor(private readonly deps: BackupDeps) {}

  capture(config: RunConfiguration, options: BackupOptions): Promise<BackupBundle> {
    return createBackup(config, this.deps, options);
  }
}

/** Dry-run: describes the bundle Apply would create; reads and writes nothing. */
export class PlannedBackupProvider implements BackupProvider {
  readonly name = "planned";
  constructor(private readonly now: () => Date = () => new Date()) {}

  async capture(config: RunConfiguration, options: BackupOptions): Promise<BackupBundle> {
    const date = this.now();
    const id = bundleId(date);
    const bundlePath = path.join(config.backupRoot, id);
    logger.info({ bundlePath }, "[dry-run] would create backup bundle");
    return {
      id,
      path: bundlePath,
      written: false,
      metadata: {
        formatVersion: 1,
        id,
        createdAt: date.toISOString(),
        targetId: config.targetId,
        creator: currentUser(),
        hostId: hostname(),
        includesHostArtifacts: options.includeHostArtifacts,
        artifacts: [],
      },
    };
  }
}

export function selectBackupProvider(config: RunConfiguration, deps: BackupDeps): BackupProvider {
  return config.dryRun ? new PlannedBackupProvider(deps.now) : new EngineBackupProvider(deps);
}
