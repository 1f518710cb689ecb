/**
 * A structured command ready for execution.
 * Engines never spawn processes directly: they go through a CommandExecutor.
 */
export interface Command {
  readonly argv: string[];
  readonly env?: Record<string, string>;
  readonly stdin?: string;
}

/** Result of command execution. */
export interface ExecResult {
  readonly stdout: string;
  readonly stderr: string;
  readonly exitCode: number;
  readonly durationMs: number;
}
