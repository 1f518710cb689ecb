// Config loader: reads ~/.config/wsl-baseline/config.yaml and deep-merges it over defaults,
// then overlays command-line values and validates the result into a frozen RunConfiguration.
// deepMerge lets operators override only the keys they specify; unset keys inherit defaults.
// Config shape is defined in src/types/config.ts: add new fields there and in DEFAULT_CONFIG.
import { readFileSync, existsSync } from "node:fs";
import { join } from "node:path";
import { homedir } from "node:os";
import { parse as parseYaml } from "yaml";
import { z } from "zod";
import type { FileConfig, RunConfiguration, RunOverrides } from "../types/config.js";
import { BaselineError, BaselineErrorCode } from "../shared/errors.js";
import { logger } from "../logger.js";

const DEFAULT_CONFIG_PATH = join(homedir(), ".config", "wsl-baseline", "config.yaml");

/** Hyper-V firewall creator id assigned to WSL. */
export const WSL_VM_CREATOR_ID = "{40E0AC32-46A5-438A-A0B2-2B479E8F2E90}";

export const DEFAULT_CONFIG: FileConfig = {
  target: { id: "FedoraLinux-42" },
  endpoints: { mirror_url: null, registry: null, dns_server: null, proxy_url: null },
  network: {
    search_domain: "internal.company.com",
    no_proxy: ["localhost", "127.0.0.1", ".internal.company.com", "10.0.0.0/8", "172.16.0.0/12", "192.168.0.0/16"],
  },
  ssh: { port: 22 },
  backup: { root: join(homedir(), "wsl-baseline", "backups") },
  host: {
    wslconfig_path: join(homedir(), ".wslconfig"),
    rule_prefix: "WSLBaseline-",
    vm_creator_id: WSL_VM_CREATOR_ID,
  },
  execution: { command_timeout_seconds: 120 },
  templates: { dir: null },
};

export interface ConfigResult {
  config: FileConfig;
  configPath: string;
  found: boolean;
}

export function loadConfig(explicitPath?: string): ConfigResult {
  const configPath = explicitPath ?? process.env.WSL_BASELINE_CONFIG ?? DEFAULT_CONFIG_PATH;

  if (!existsSync(configPath)) {
    // An explicitly named file must exist; the default location is optional.
    if (explicitPath) {
      throw new BaselineError(BaselineErrorCode.INVALID_CONFIG, `Config file not found: ${configPath}`, { configPath });
    }
    logger.debug({ configPath }, "No config file found — using defaults");
    return { config: DEFAULT_CONFIG, configPath, found: false };
  }

  let parsed: unknown;
  try {
    parsed = parseYaml(readFileSync(configPath, "utf-8"));
  } catch (err) {
    throw new BaselineError(BaselineErrorCode.INVALID_CONFIG, `Failed to parse config: ${configPath}`, {
      configPath,
      cause: err instanceof Error ? err.message : String(err),
    });
  }
  if (parsed !== null && parsed !== undefined && !isRecord(parsed)) {
    throw new BaselineError(BaselineErrorCode.INVALID_CONFIG, `Config root must be a mapping: ${configPath}`, { configPath });
  }

  const merged = deepMerge(toRecord(DEFAULT_CONFIG), isRecord(parsed) ? parsed : {});
  const result = fileConfigSchema.safeParse(merged);
  if (!result.success) {
    throw new BaselineError(BaselineErrorCode.INVALID_CONFIG, `Invalid config: ${formatIssues(result.error)}`, { configPath });
  }
  logger.debug({ configPath }, "Configuration loaded");
  return { config: result.data, configPath, found: true };
}

// ── Validation ─────────────────────────────────────────────────────

const ipv4 = z.string().regex(/^(25[0-5]|2[0-4]\d|1?\d?\d)(\.(25[0-5]|2[0-4]\d|1?\d?\d)){3}$/, "must be an IPv4 address");
const hostName = z.string().regex(/^[A-Za-z0-9.-]+(:\d{1,5})?$/, "must be a host name, optionally with :port");
const httpUrl = z.string().url().refine((u) => /^https?:\/\//.test(u), "must be an http(s) URL");

const fileConfigSchema: z.ZodType<FileConfig> = z.object({
  target: z.object({ id: z.string().min(1) }),
  endpoints: z.object({
    mirror_url: httpUrl.nullable(),
    registry: hostName.nullable(),
    dns_server: ipv4.nullable(),
    proxy_url: httpUrl.nullable(),
  }),
  network: z.object({
    search_domain: z.string().min(1),
    no_proxy: z.array(z.string().min(1)),
  }),
  ssh: z.object({ port: z.number().int().min(1).max(65535) }),
  backup: z.object({ root: z.string().min(1) }),
  host: z.object({
    wslconfig_path: z.string().min(1),
    rule_prefix: z.string().regex(/^[A-Za-z0-9_-]+$/, "must be letters, digits, '-' or '_'"),
    vm_creator_id: z.string().regex(/^\{[0-9A-Fa-f-]{36}\}$/, "must be a braced GUID"),
  }),
  execution: z.object({ command_timeout_seconds: z.number().positive() }),
  templates: z.object({ dir: z.string().min(1).nullable() }),
});

const endpointsSchema = z.object({
  mirrorUrl: httpUrl,
  registryHost: hostName,
  dnsServer: ipv4,
  proxyUrl: httpUrl,
});

export interface BuildOptions {
  /** apply and verify render or check endpoint values; backup and rollback do not. */
  requireEndpoints: boolean;
}

/** Combine file config and command-line overrides into the immutable run configuration. */
export function buildRunConfig(file: FileConfig, overrides: RunOverrides, options: BuildOptions): RunConfiguration {
  const candidate = {
    mirrorUrl: overrides.mirrorUrl ?? file.endpoints.mirror_url ?? undefined,
    registryHost: overrides.registryHost ?? file.endpoints.registry ?? undefined,
    dnsServer: overrides.dnsServer ?? file.endpoints.dns_server ?? undefined,
    proxyUrl: overrides.proxyUrl ?? file.endpoints.proxy_url ?? undefined,
  };

  let endpoints: RunConfiguration["endpoints"] = null;
  const parsed = endpointsSchema.safeParse(candidate);
  if (parsed.success) {
    endpoints = Object.freeze(parsed.data);
  } else if (options.requireEndpoints) {
    throw new BaselineError(BaselineErrorCode.INVALID_CONFIG, `Invalid endpoints: ${formatIssues(parsed.error)}`);
  }

  const targetId = overrides.targetId ?? file.target.id;
  if (!/^[A-Za-z0-9._-]+$/.test(targetId)) {
    throw new BaselineError(BaselineErrorCode.INVALID_CONFIG, `Invalid target id: ${targetId}`);
  }

  return Object.freeze({
    targetId,
    endpoints,
    backupRoot: overrides.backupRoot ?? file.backup.root,
    dryRun: overrides.dryRun ?? false,
    skipPreconditionCheck: overrides.skipPreconditionCheck ?? false,
    includeHostArtifacts: overrides.includeHostArtifacts ?? false,
    forceNoConfirm: overrides.forceNoConfirm ?? false,
    searchDomain: file.network.search_domain,
    noProxy: Object.freeze([...file.network.no_proxy]),
    sshPort: file.ssh.port,
    wslConfigPath: file.host.wslconfig_path,
    hostRulePrefix: file.host.rule_prefix,
    vmCreatorId: file.host.vm_creator_id,
    templateDir: file.templates.dir ?? defaultTemplateDir(),
    commandTimeoutMs: Math.round(file.execution.command_timeout_seconds * 1000),
  });
}

/** Templates ship at the package root, next to src/ (or dist/ once built). */
export function defaultTemplateDir(): string {
  const candidates = [join(__dirname, "..", "..", "templates"), join(__dirname, "..", "..", "..", "templates")];
  return candidates.find((dir) => existsSync(dir)) ?? candidates[0];
}

function formatIssues(error: z.ZodError): string {
  return error.issues.map((i) => `${i.path.join(".") || "(root)"} ${i.message}`).join("; ");
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function toRecord(config: FileConfig): Record<string, unknown> {
  const copy: unknown = JSON.parse(JSON.stringify(config));
  return isRecord(copy) ? copy : {};
}

/** Deep merge b into a (a provides defaults, b overrides). */
function deepMerge(a: Record<string, unknown>, b: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = { ...a };
  for (const key of Object.keys(b)) {
    const aVal = a[key];
    const bVal = b[key];
    if (isRecord(aVal) && isRecord(bVal)) {
      result[key] = deepMerge(aVal, bVal);
    } else if (bVal !== undefined) {
      result[key] = bVal;
    }
  }
  return result;
}
