// HostEnvironment: the Windows machine running the tool.
// Firewall and runtime commands go through PowerShell; host files are local to this process.
import { readFile, writeFile, rm, mkdir } from "node:fs/promises";
import { dirname } from "node:path";
import type { ExecResult } from "../types/command.js";
import type { CommandExecutor } from "./executor.js";
import { BaselineError, BaselineErrorCode } from "../shared/errors.js";

export interface HostEnvironment {
  run(script: string): Promise<ExecResult>;
  /** True when the current process holds Administrator rights. */
  isElevated(): Promise<boolean>;
  readFile(path: string): Promise<Buffer | null>;
  writeFile(path: string, content: string | Buffer): Promise<void>;
  remove(path: string): Promise<void>;
}

const IS_ADMIN_SCRIPT =
  "([Security.Principal.WindowsPrincipal][Security.Principal.WindowsIdentity]::GetCurrent()).IsInRole([Security.Principal.WindowsBuiltInRole]::Administrator)";

export class WindowsHost implements HostEnvironment {
  constructor(
    private readonly executor: CommandExecutor,
    private readonly timeoutMs: number,
  ) {}

  run(script: string): Promise<ExecResult> {
    return this.executor.execute(
      { argv: ["powershell.exe", "-NoProfile", "-NonInteractive", "-ExecutionPolicy", "Bypass", "-Command", script] },
      this.timeoutMs,
    );
  }

  async isElevated(): Promise<boolean> {
    const r = await this.run(IS_ADMIN_SCRIPT);
    return r.exitCode === 0 && r.stdout.trim() === "True";
  }

  async readFile(path: string): Promise<Buffer | null> {
    try {
      return await readFile(path);
    } catch (err) {
      if ((err as NodeJS.ErrnoException).code === "ENOENT") return null;
      throw hostFileError("read", path, err);
    }
  }

  async writeFile(path: string, content: string | Buffer): Promise<void> {
    try {
      await mkdir(dirname(path), { recursive: true });
      await writeFile(path, content);
    } catch (err) {
      throw hostFileError("write", path, err);
    }
  }

  async remove(path: string): Promise<void> {
    try {
      await rm(path, { recursive: true, force: true });
    } catch (err) {
      throw hostFileError("remove", path, err);
    }
  }
}

function hostFileError(op: string, path: string, err: unknown): BaselineError {
  return new BaselineError(BaselineErrorCode.COMMAND_FAILED, `Failed to ${op} host file ${path}`, {
    path,
    cause: err instanceof Error ? err.message : String(err),
  });
}
