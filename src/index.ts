export * from "./types/index.js";
export { BaselineError, BaselineErrorCode, describeError } from "./shared/errors.js";
export { loadConfig, buildRunConfig, DEFAULT_CONFIG } from "./config/loader.js";
export { ProcessExecutor, type CommandExecutor } from "./execution/executor.js";
export { WslTarget, ABSENT_EXIT_CODE, type TargetEnvironment } from "./execution/target.js";
export { WindowsHost, type HostEnvironment } from "./execution/host.js";
export { ActionRunner, describeAction } from "./execution/runner.js";
export { renderTemplate, placeholdersOf, type TemplateVars } from "./templates/renderer.js";
export { TemplateStore } from "./templates/store.js";
export { ARTIFACTS, CREATED_ARTIFACTS } from "./baseline/artifacts.js";
export { TARGET_STEPS } from "./baseline/steps.js";
export { CHECKS, buildVerifyScript } from "./verify/checks.js";
export {
  createBackup, backupOnly, selectBackupProvider, EngineBackupProvider, PlannedBackupProvider, type BackupProvider,
} from "./backup/engine.js";
export { listBundles, latestBundle, readMetadata } from "./backup/bundle.js";
export { apply, type ApplyResult } from "./apply/engine.js";
export {
  verify, runChecks, selectVerifyProvider, InlineVerifyProvider, DeployedScriptVerifyProvider, type VerifyProvider,
} from "./verify/engine.js";
export { rollback, type RollbackScope, type RollbackResult } from "./rollback/engine.js";
