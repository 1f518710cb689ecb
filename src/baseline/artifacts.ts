// Artifact catalog: the single fixed list of everything Setup modifies.
// Backup, rollback and both verify providers read from here; nothing is discovered dynamically
// except the file names inside a directory artifact.
import type { ArtifactDefinition, CreatedArtifact, RestoreHook, StateArtifact } from "../types/artifact.js";
import { ABSENT_EXIT_CODE } from "../execution/target.js";
import { shellQuote, psQuote } from "../shared/shell.js";
import { BaselineError, BaselineErrorCode } from "../shared/errors.js";
import {
  DISABLED_REPO_DIR, INSTALL_DIR, INTERNAL_REPO_FILE, LOG_DIR, REPO_DIR, SYSTEMD_DIR, UPDATE_UNIT,
} from "./constants.js";

const RESTART_SSHD: RestoreHook = {
  description: "restart sshd",
  script: "systemctl restart sshd 2>/dev/null || service sshd restart",
  bestEffort: false,
};

const APPLY_SELINUX_MODE: RestoreHook = {
  description: "reset the SELinux runtime mode from /etc/selinux/config",
  script: [
    "command -v setenforce >/dev/null 2>&1 || exit 0",
    `case "$(sed -n 's/^SELINUX=//p' /etc/selinux/config)" in`,
    "  enforcing) setenforce 1 ;;",
    "  permissive) setenforce 0 ;;",
    "esac",
  ].join("\n"),
  bestEffort: true,
};

export interface FirewallState {
  readonly defaultZone: string;
  readonly trustedSources: string[];
  /** Unit state as `systemctl is-enabled` / `is-active` reported it. */
  readonly enabled: boolean;
  readonly active: boolean;
}

const UNIT_LINE = /^(enabled|active)=(.*)$/;

/**
 * Parse firewalld probe output: default zone on the first line, trusted-zone sources after it,
 * then `enabled=` and `active=` lines. A missing unit line reads as enabled and active.
 */
export function parseFirewallState(captured: string): FirewallState {
  const unit = new Map<string, string>();
  const lines: string[] = [];
  for (const line of captured.split("\n")) {
    const m = UNIT_LINE.exec(line.trim());
    if (m) unit.set(m[1], m[2].trim());
    else lines.push(line);
  }
  const [zoneLine = "", ...rest] = lines;
  const defaultZone = zoneLine.trim();
  if (!/^[A-Za-z0-9_-]+$/.test(defaultZone)) {
    throw new BaselineError(BaselineErrorCode.BUNDLE_INVALID, `Unrecognised firewalld zone: '${defaultZone}'`, { defaultZone });
  }
  const trustedSources = rest.join(" ").split(/\s+/).filter(Boolean);
  return {
    defaultZone,
    trustedSources,
    enabled: (unit.get("enabled") ?? "enabled") === "enabled",
    active: (unit.get("active") ?? "active") === "active",
  };
}

const STRIP_TRUSTED_SOURCES =
  'for s in $(firewall-cmd --permanent --zone=trusted --list-sources); do firewall-cmd --permanent --zone=trusted --remove-source="$s" >/dev/null; done';

const firewalldState: StateArtifact = {
  name: "firewalld-state",
  scope: "target",
  kind: "state",
  description: "firewalld default zone, trusted-zone sources and unit state",
  probe: [
    `command -v firewall-cmd >/dev/null 2>&1 || exit ${ABSENT_EXIT_CODE}`,
    "if firewall-cmd --state >/dev/null 2>&1; then",
    "  { firewall-cmd --get-default-zone && firewall-cmd --permanent --zone=trusted --list-sources; } || exit 1",
    "else",
    "  { firewall-offline-cmd --get-default-zone && firewall-offline-cmd --zone=trusted --list-sources; } || exit 1",
    "fi",
    'echo "enabled=$(systemctl is-enabled firewalld 2>/dev/null)"',
    'echo "active=$(systemctl is-active firewalld 2>/dev/null)"',
  ].join("\n"),
  // firewall-cmd needs the daemon running; the recorded unit state is put back last.
  restore: (captured) => {
    const state = parseFirewallState(captured);
    return [
      "set -e",
      "systemctl start firewalld",
      `firewall-cmd --set-default-zone=${state.defaultZone}`,
      STRIP_TRUSTED_SOURCES,
      ...state.trustedSources.map((s) => `firewall-cmd --permanent --zone=trusted --add-source=${shellQuote(s)} >/dev/null`),
      "firewall-cmd --reload",
      state.enabled ? "systemctl enable firewalld" : "systemctl disable firewalld",
      ...(state.active ? [] : ["systemctl stop firewalld"]),
    ].join("\n");
  },
  // firewalld was not installed before Setup: put the defaults back and switch it off.
  reset: [
    "command -v firewall-cmd >/dev/null 2>&1 || exit 0",
    "if firewall-cmd --state >/dev/null 2>&1; then",
    "  firewall-cmd --set-default-zone=public",
    `  ${STRIP_TRUSTED_SOURCES}`,
    "  firewall-cmd --reload",
    "fi",
    "systemctl disable --now firewalld 2>/dev/null || true",
  ].join("\n"),
};

export const ARTIFACTS: readonly ArtifactDefinition[] = [
  { name: "sshd-config", scope: "target", kind: "file", description: "SSH daemon configuration", locate: () => "/etc/ssh/sshd_config", mode: 0o600, afterRestore: [RESTART_SSHD] },
  { name: "repo-definitions", scope: "target", kind: "directory", description: "package repository definitions", locate: () => REPO_DIR, suffix: ".repo", mode: 0o644 },
  { name: "dnf-conf", scope: "target", kind: "file", description: "package manager configuration", locate: () => "/etc/dnf/dnf.conf", mode: 0o644 },
  { name: "registries-conf", scope: "target", kind: "file", description: "container registry policy", locate: () => "/etc/containers/registries.conf", mode: 0o644 },
  { name: "containers-conf", scope: "target", kind: "file", description: "container engine defaults", locate: () => "/etc/containers/containers.conf", mode: 0o644 },
  { name: "image-policy", scope: "target", kind: "file", description: "image signature policy", locate: () => "/etc/containers/policy.json", mode: 0o644 },
  { name: "resolv-conf", scope: "target", kind: "file", description: "DNS resolver", locate: () => "/etc/resolv.conf", mode: 0o644, immutable: true },
  { name: "subuid", scope: "target", kind: "file", description: "subordinate user ids", locate: () => "/etc/subuid", mode: 0o644 },
  { name: "subgid", scope: "target", kind: "file", description: "subordinate group ids", locate: () => "/etc/subgid", mode: 0o644 },
  { name: "selinux-config", scope: "target", kind: "file", description: "SELinux mode", locate: () => "/etc/selinux/config", mode: 0o644, afterRestore: [APPLY_SELINUX_MODE] },
  { name: "environment", scope: "target", kind: "file", description: "system-wide environment (proxy variables)", locate: () => "/etc/environment", mode: 0o644 },
  firewalldState,
  { name: "wslconfig", scope: "host", kind: "file", description: "WSL runtime settings (.wslconfig)", locate: (c) => c.wslConfigPath, mode: 0o644 },
  {
    name: "hyperv-firewall-rules",
    scope: "host",
    kind: "snapshot",
    description: "Hyper-V firewall rules for WSL (audit only)",
    probe: (c) => `Get-NetFirewallHyperVRule -VMCreatorId ${psQuote(c.vmCreatorId)} -ErrorAction Stop | Select-Object Name,DisplayName,Direction,Action,Enabled | ConvertTo-Json -Depth 3`,
  },
];

export function findArtifact(name: string): ArtifactDefinition | undefined {
  return ARTIFACTS.find((a) => a.name === name);
}

/** Paths Setup creates with no prior counterpart; rollback deletes them unconditionally. */
export const CREATED_ARTIFACTS: readonly CreatedArtifact[] = [
  { path: `${SYSTEMD_DIR}/${UPDATE_UNIT}.timer`, description: "update timer unit", cleanup: `systemctl disable --now ${UPDATE_UNIT}.timer 2>/dev/null || true` },
  { path: `${SYSTEMD_DIR}/${UPDATE_UNIT}.service`, description: "update service unit" },
  { path: INSTALL_DIR, description: "maintenance scripts" },
  { path: `${REPO_DIR}/${INTERNAL_REPO_FILE}`, description: "internal mirror repository" },
  { path: DISABLED_REPO_DIR, description: "disabled repository definitions" },
  { path: LOG_DIR, description: "maintenance log directory" },
];

/** Bundle-relative file for a captured artifact. Host paths are Windows paths, so only the basename is kept. */
export function bundleFileFor(artifact: ArtifactDefinition, livePath: string): string {
  switch (artifact.kind) {
    case "file":
      return artifact.scope === "target" ? `target/${stripRoot(livePath)}` : `host/${hostBasename(livePath)}`;
    case "directory":
      return `target/${stripRoot(livePath)}`;
    case "state":
      return `${artifact.scope}/_state/${artifact.name}`;
    case "snapshot":
      return `${artifact.scope}/${artifact.name}.json`;
  }
}

function stripRoot(p: string): string {
  return p.replace(/^\/+/, "");
}

function hostBasename(p: string): string {
  const parts = p.split(/[\\/]/).filter(Boolean);
  return parts[parts.length - 1] ?? "unnamed";
}
