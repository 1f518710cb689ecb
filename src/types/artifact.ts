import type { RunConfiguration } from "./config.js";

export type ArtifactScope = "host" | "target";

/** Follow-up command run after an artifact is restored. */
export interface RestoreHook {
  readonly description: string;
  readonly script: string;
  /** Best-effort hooks are logged on failure; required hooks fail the restore step. */
  readonly bestEffort: boolean;
}

interface ArtifactBase {
  readonly name: string;
  readonly scope: ArtifactScope;
  readonly description: string;
}

/** A single managed file. */
export interface FileArtifact extends ArtifactBase {
  readonly kind: "file";
  readonly locate: (config: RunConfiguration) => string;
  readonly mode: number;
  /** File carries the immutable attribute once applied (chattr +i). */
  readonly immutable?: boolean;
  readonly afterRestore?: readonly RestoreHook[];
}

/** Every file with a given suffix in one directory, e.g. the *.repo definitions. */
export interface DirectoryArtifact extends ArtifactBase {
  readonly kind: "directory";
  readonly locate: (config: RunConfiguration) => string;
  readonly suffix: string;
  readonly mode: number;
  readonly afterRestore?: readonly RestoreHook[];
}

/** Live state read by a probe script and re-applied by a restore script. */
export interface StateArtifact extends ArtifactBase {
  readonly kind: "state";
  /** Exit 0 with the state on stdout; exit ABSENT_EXIT_CODE when the subsystem is not installed. */
  readonly probe: string;
  readonly restore: (captured: string) => string;
  readonly reset: string;
}

/** Captured for audit only; rollback never restores it. */
export interface SnapshotArtifact extends ArtifactBase {
  readonly kind: "snapshot";
  readonly probe: (config: RunConfiguration) => string;
}

export type ArtifactDefinition = FileArtifact | DirectoryArtifact | StateArtifact | SnapshotArtifact;

export type ArtifactKind = ArtifactDefinition["kind"];

/** A path Setup creates unconditionally with no prior counterpart to restore. */
export interface CreatedArtifact {
  readonly path: string;
  readonly description: string;
  readonly cleanup?: string;
}
