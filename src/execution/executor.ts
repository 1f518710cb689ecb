// Command execution layer: every target and host command passes through this module.
// ProcessExecutor.execute() is the hard boundary between engine code and the OS:
// changing timeout/buffer behavior here affects every step, capture and check.
import execa from "execa";
import type { Command, ExecResult } from "../types/command.js";
import { BaselineError, BaselineErrorCode } from "../shared/errors.js";
import { logger } from "../logger.js";

/** Executor interface: the only way engine code reaches a process. */
export interface CommandExecutor {
  execute(command: Command, timeoutMs: number): Promise<ExecResult>;
}

/** Spawn error codes reported in place of an exit status. */
const SPAWN_FAILED_EXIT = 127;

export class ProcessExecutor implements CommandExecutor {
  async execute(command: Command, timeoutMs: number): Promise<ExecResult> {
    const start = performance.now();
    const [cmd, ...args] = command.argv;
    const result = await execa(cmd, args, {
      input: command.stdin,
      env: command.env,
      timeout: timeoutMs,
      reject: false,
      // Captured file content must survive byte-for-byte.
      stripFinalNewline: false,
      windowsHide: true,
    });
    const durationMs = Math.round(performance.now() - start);

    if (result.timedOut) {
      // An unreachable target must not hang the run; a timeout is always fatal.
      throw new BaselineError(BaselineErrorCode.COMMAND_TIMEOUT, `Command timed out after ${timeoutMs}ms: ${cmd}`, {
        argv: command.argv.slice(0, 4),
        timeoutMs,
      });
    }

    const exitCode = typeof result.exitCode === "number" ? result.exitCode : SPAWN_FAILED_EXIT;
    logger.trace({ cmd, exitCode, durationMs }, "Command finished");
    return { stdout: result.stdout ?? "", stderr: result.stderr ?? "", exitCode, durationMs };
  }
}
