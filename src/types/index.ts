export type { Command, ExecResult } from "./command.js";
export type { FileConfig, RunOverrides, Endpoints, RunConfiguration } from "./config.js";
export type { ArtifactScope, RestoreHook, FileArtifact, DirectoryArtifact, StateArtifact, SnapshotArtifact, ArtifactDefinition, ArtifactKind, CreatedArtifact } from "./artifact.js";
export type { CaptureStatus, ArtifactCapture, BundleMetadata, BackupBundle } from "./bundle.js";
export type { CheckResult, VerificationReport } from "./check.js";
export type { Action, ActionStatus, ActionOutcome, StepStatus, StepOutcome } from "./action.js";
