import type { ArtifactKind, ArtifactScope } from "./artifact.js";

export type CaptureStatus = "present" | "absent" | "failed";

/** One artifact's entry in metadata.json. */
export interface ArtifactCapture {
  readonly name: string;
  readonly scope: ArtifactScope;
  readonly kind: ArtifactKind;
  readonly path: string;
  readonly status: CaptureStatus;
  /** Bundle-relative location of the captured content (present file, state or snapshot). */
  readonly bundleFile?: string;
  /** Captured file names, for directory artifacts. */
  readonly files?: readonly string[];
  readonly error?: string;
}

export interface BundleMetadata {
  readonly formatVersion: 1;
  readonly id: string;
  readonly createdAt: string;
  readonly targetId: string;
  readonly creator: string;
  readonly hostId: string;
  readonly includesHostArtifacts: boolean;
  readonly artifacts: readonly ArtifactCapture[];
}

export interface BackupBundle {
  readonly id: string;
  readonly path: string;
  readonly metadata: BundleMetadata;
  /** False for a planned (dry-run) bundle that was never written. */
  readonly written: boolean;
}
