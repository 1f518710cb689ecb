#!/usr/bin/env node

import { parseArgs } from "node:util";
import { createInterface } from "node:readline/promises";
import { z } from "zod";

import { logger } from "./logger.js";
import { loadConfig, buildRunConfig } from "./config/loader.js";
import { ProcessExecutor } from "./execution/executor.js";
import { WslTarget } from "./execution/target.js";
import { WindowsHost } from "./execution/host.js";
import { TemplateStore } from "./templates/store.js";
import { backupOnly, selectBackupProvider } from "./backup/engine.js";
import { latestBundle, listBundles } from "./backup/bundle.js";
import { apply } from "./apply/engine.js";
import { selectVerifyProvider, verify } from "./verify/engine.js";
import { rollback, ROLLBACK_SCOPES, type RollbackScope } from "./rollback/engine.js";
import { formatApply, formatBundleList, formatRollback, formatVerification } from "./report.js";
import { describeError } from "./shared/errors.js";
import type { RunOverrides } from "./types/config.js";

export const USAGE = `Usage: wsl-baseline <command> [options]

Commands:
  apply          back up, then apply the hardened baseline and verify it
  verify         run the baseline checks against the target
  backup         capture the current configuration into a new bundle
  rollback       restore a bundle (the newest one unless --bundle is given)
  list-backups   list bundles under the backup root, newest first

Options:
  --config <file>            YAML config (default ~/.config/wsl-baseline/config.yaml, or $WSL_BASELINE_CONFIG)
  --target <distro>          WSL distribution to manage
  --mirror-url <url>         internal package mirror
  --registry <host[:port]>   internal container registry
  --dns-server <ipv4>        internal DNS server
  --proxy-url <url>          outbound HTTP(S) proxy
  --backup-root <dir>        where bundles are written
  --bundle <dir>             bundle to roll back
  --scope <all|host|target>  rollback scope (default all)
  --dry-run                  describe every change without making it
  --skip-precondition-check  warn instead of failing on unmet preconditions
  --include-host-artifacts   also capture host artifacts in a standalone backup
  --force                    do not ask before rolling back
  -h, --help                 show this help
`;

const COMMANDS = ["apply", "verify", "backup", "rollback", "list-backups"] as const;
export type CommandName = (typeof COMMANDS)[number];

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

export interface ParsedCli {
  readonly command: CommandName | "help";
  readonly configPath?: string;
  readonly overrides: RunOverrides;
  readonly bundle?: string;
  readonly scope: RollbackScope;
}

const commandSchema = z.enum(COMMANDS);
const scopeSchema = z.enum(["all", "host", "target"]);

function readArgs(argv: readonly string[]) {
  try {
    return parseArgs({
      args: [...argv],
      allowPositionals: true,
      strict: true,
      options: {
        config: { type: "string" },
        target: { type: "string" },
        "mirror-url": { type: "string" },
        registry: { type: "string" },
        "dns-server": { type: "string" },
        "proxy-url": { type: "string" },
        "backup-root": { type: "string" },
        bundle: { type: "string" },
        scope: { type: "string" },
        "dry-run": { type: "boolean" },
        "skip-precondition-check": { type: "boolean" },
        "include-host-artifacts": { type: "boolean" },
        force: { type: "boolean" },
        help: { type: "boolean", short: "h" },
      },
    });
  } catch (err) {
    throw new UsageError(err instanceof Error ? err.message : String(err));
  }
}

export function parseCli(argv: readonly string[]): ParsedCli {
  const { values, positionals } = readArgs(argv);

  if (values.help || positionals.length === 0) {
    return { command: "help", overrides: {}, scope: "all" };
  }
  if (positionals.length > 1) throw new UsageError(`Unexpected argument: ${positionals[1]}`);

  const command = commandSchema.safeParse(positionals[0]);
  if (!command.success) throw new UsageError(`Unknown command: ${positionals[0]}`);

  const scope = scopeSchema.safeParse(values.scope ?? "all");
  if (!scope.success) throw new UsageError(`--scope must be one of ${ROLLBACK_SCOPES.join(", ")}`);
  if ((values.bundle !== undefined || values.scope !== undefined) && command.data !== "rollback") {
    throw new UsageError("--bundle and --scope apply to rollback only");
  }

  return {
    command: command.data,
    configPath: values.config,
    bundle: values.bundle,
    scope: scope.data,
    overrides: {
      targetId: values.target,
      mirrorUrl: values["mirror-url"],
      registryHost: values.registry,
      dnsServer: values["dns-server"],
      proxyUrl: values["proxy-url"],
      backupRoot: values["backup-root"],
      dryRun: values["dry-run"],
      skipPreconditionCheck: values["skip-precondition-check"],
      includeHostArtifacts: values["include-host-artifacts"],
      forceNoConfirm: values.force,
    },
  };
}

async function confirm(question: string): Promise<boolean> {
  const rl = createInterface({ input: process.stdin, output: process.stderr });
  try {
    const answer = await rl.question(`${question} [y/N] `);
    return /^y(es)?$/i.test(answer.trim());
  } finally {
    rl.close();
  }
}

/** Runs one command; resolves to the process exit code. */
export async function main(argv: readonly string[]): Promise<number> {
  let cli: ParsedCli;
  try {
    cli = parseCli(argv);
  } catch (err) {
    if (!(err instanceof UsageError)) throw err;
    process.stderr.write(`${err.message}\n\n${USAGE}`);
    return 2;
  }
  if (cli.command === "help") {
    process.stdout.write(USAGE);
    return 0;
  }

  try {
    // ── Phase 1: Load config ──────────────────────────────────────
    const { config: fileConfig, configPath, found } = loadConfig(cli.configPath);
    logger.debug({ configPath, found }, "Configuration source");
    const requireEndpoints = cli.command === "apply" || cli.command === "verify";
    const config = buildRunConfig(fileConfig, cli.overrides, { requireEndpoints });

    // ── Phase 2: Wire environments ────────────────────────────────
    const executor = new ProcessExecutor();
    const host = new WindowsHost(executor, config.commandTimeoutMs);
    const targetFor = (id: string) => new WslTarget(id, executor, config.commandTimeoutMs);
    const target = targetFor(config.targetId);

    // ── Phase 3: Dispatch ─────────────────────────────────────────
    switch (cli.command) {
      case "apply": {
        const result = await apply(config, {
          target,
          host,
          templates: new TemplateStore(config.templateDir),
          backup: selectBackupProvider(config, { target, host }),
        });
        process.stdout.write(formatApply(result) + "\n");
        return result.exitCode;
      }
      case "verify": {
        const report = await verify(config, { provider: await selectVerifyProvider(target) });
        process.stdout.write(formatVerification(report) + "\n");
        return report.failed;
      }
      case "backup": {
        const bundlePath = await backupOnly(config, { target, host });
        process.stdout.write(config.dryRun ? `Dry run: bundle would be written to ${bundlePath}\n` : `${bundlePath}\n`);
        return 0;
      }
      case "rollback": {
        const bundlePath = cli.bundle ?? (await latestBundle(config.backupRoot));
        if (!config.forceNoConfirm && !config.dryRun) {
          const ok = await confirm(`Roll back ${cli.scope === "all" ? "target and host" : cli.scope} from ${bundlePath}?`);
          if (!ok) {
            process.stderr.write("Rollback cancelled.\n");
            return 0;
          }
        }
        const result = await rollback(bundlePath, cli.scope, { config, host, targetFor });
        process.stdout.write(formatRollback(result) + "\n");
        return result.exitCode;
      }
      case "list-backups":
        process.stdout.write(formatBundleList(await listBundles(config.backupRoot)) + "\n");
        return 0;
    }
  } catch (err) {
    logger.error({ err }, "Fatal error");
    process.stderr.write(`wsl-baseline: ${describeError(err)}\n`);
    return 1;
  }
}

if (require.main === module) {
  main(process.argv.slice(2))
    .then((code) => {
      process.exitCode = code;
    })
    .catch((err: unknown) => {
      logger.fatal({ err }, "Unhandled error");
      process.exitCode = 1;
    });
}
