// TargetEnvironment: the WSL distribution being hardened.
// All file content crosses the wsl.exe boundary base64-encoded so captures and
// restores are byte-exact regardless of trailing newlines or encoding.
import type { ExecResult } from "../types/command.js";
import type { CommandExecutor } from "./executor.js";
import { BaselineError, BaselineErrorCode } from "../shared/errors.js";
import { shellQuote } from "../shared/shell.js";

/** Exit status a probe uses to say "does not exist" (as opposed to "probe failed"). */
export const ABSENT_EXIT_CODE = 44;

export interface RunOptions {
  readonly input?: string;
}

export interface TargetEnvironment {
  readonly id: string;
  /** Run a bash script as root inside the target. */
  run(script: string, options?: RunOptions): Promise<ExecResult>;
  /** File content, or null when the path does not exist. Throws when the read itself fails. */
  readFile(path: string): Promise<Buffer | null>;
  writeFile(path: string, content: string | Buffer, mode: number): Promise<void>;
  /** Recursive, and a no-op for a missing path. */
  remove(path: string): Promise<void>;
  /** Names of regular files in `dir` ending in `suffix`, sorted; null when `dir` does not exist. */
  listFiles(dir: string, suffix: string): Promise<string[] | null>;
}

export function toBuffer(content: string | Buffer): Buffer {
  return typeof content === "string" ? Buffer.from(content, "utf-8") : content;
}

export function formatMode(mode: number): string {
  return mode.toString(8).padStart(4, "0");
}

export class WslTarget implements TargetEnvironment {
  constructor(
    readonly id: string,
    private readonly executor: CommandExecutor,
    private readonly timeoutMs: number,
  ) {}

  run(script: string, options?: RunOptions): Promise<ExecResult> {
    return this.executor.execute(
      { argv: ["wsl.exe", "-d", this.id, "-u", "root", "--exec", "bash", "-c", script], stdin: options?.input },
      this.timeoutMs,
    );
  }

  async readFile(path: string): Promise<Buffer | null> {
    const p = shellQuote(path);
    const r = await this.run(`if [ -f ${p} ]; then base64 -w0 -- ${p}; elif [ -e ${p} ]; then echo 'not a regular file' >&2; exit 1; else exit ${ABSENT_EXIT_CODE}; fi`);
    if (r.exitCode === ABSENT_EXIT_CODE) return null;
    this.expectSuccess(r, `read ${path}`);
    return Buffer.from(r.stdout.trim(), "base64");
  }

  async writeFile(path: string, content: string | Buffer, mode: number): Promise<void> {
    const p = shellQuote(path);
    const r = await this.run(`set -e; mkdir -p -- "$(dirname -- ${p})"; base64 -d > ${p}; chmod ${formatMode(mode)} ${p}`, {
      input: toBuffer(content).toString("base64"),
    });
    this.expectSuccess(r, `write ${path}`);
  }

  async remove(path: string): Promise<void> {
    const r = await this.run(`rm -rf -- ${shellQuote(path)}`);
    this.expectSuccess(r, `remove ${path}`);
  }

  async listFiles(dir: string, suffix: string): Promise<string[] | null> {
    const d = shellQuote(dir);
    const r = await this.run(`[ -d ${d} ] || exit ${ABSENT_EXIT_CODE}; find ${d} -maxdepth 1 -type f -name ${shellQuote("*" + suffix)} -printf '%f\\n' | sort`);
    if (r.exitCode === ABSENT_EXIT_CODE) return null;
    this.expectSuccess(r, `list ${dir}`);
    return r.stdout.split("\n").map((l) => l.trim()).filter(Boolean);
  }

  private expectSuccess(r: ExecResult, what: string): void {
    if (r.exitCode !== 0) {
      throw new BaselineError(BaselineErrorCode.COMMAND_FAILED, `Failed to ${what} in ${this.id} (exit ${r.exitCode})`, {
        target: this.id,
        exitCode: r.exitCode,
        stderr: r.stderr.trim(),
      });
    }
  }
}
