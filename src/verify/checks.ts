// Check catalog: one shell predicate per check, exit 0 = pass.
// Predicates read their inputs from the variables set by checkPrelude(), so the inline
// provider and the deployed verify script evaluate exactly the same thing against live config.
import type { Endpoints, RunConfiguration } from "../types/config.js";
import { shellQuote } from "../shared/shell.js";
import { MAINTENANCE_SCRIPTS, PUBLIC_REGISTRIES, REPO_DIR, INTERNAL_REPO_FILE, SCRIPT_DIR } from "../baseline/constants.js";

export interface CheckDefinition {
  readonly id: string;
  readonly name: string;
  readonly predicate: string;
}

const registryBlocked = (r: string): string =>
  `grep -A1 -Fx 'location = "${r}"' /etc/containers/registries.conf | grep -qx 'blocked = true'`;

export const CHECKS: readonly CheckDefinition[] = [
  {
    id: "ssh-loopback-only",
    name: "SSH listens on loopback only",
    predicate: `listeners=$(ss -tlnH "sport = :$SSH_PORT" | awk '{print $4}'); [ -n "$listeners" ] && ! printf '%s\\n' "$listeners" | grep -qvE "^(127\\.0\\.0\\.1|\\[::1\\]):$SSH_PORT$"`,
  },
  {
    id: "ssh-root-login-disabled",
    name: "SSH root login disabled",
    predicate: "grep -qE '^PermitRootLogin[[:space:]]+no$' /etc/ssh/sshd_config",
  },
  {
    id: "ssh-password-auth-disabled",
    name: "SSH password authentication disabled",
    predicate: "grep -qE '^PasswordAuthentication[[:space:]]+no$' /etc/ssh/sshd_config",
  },
  {
    id: "podman-rootless",
    name: "Podman runs rootless for the primary user",
    predicate: `u=$(getent passwd 1000 | cut -d: -f1); [ -n "$u" ] || u=podmanuser; runuser -l "$u" -c "podman info --format '{{.Host.Security.Rootless}}'" | grep -qx true`,
  },
  {
    id: "selinux-enforcing",
    name: "SELinux is enforcing",
    predicate: `! command -v getenforce >/dev/null 2>&1 || [ "$(getenforce)" = Enforcing ]`,
  },
  {
    id: "internal-mirror-only",
    name: "Only the internal mirror repository is enabled",
    predicate: `test -f ${REPO_DIR}/${INTERNAL_REPO_FILE} && [ -z "$(find ${REPO_DIR} -maxdepth 1 -type f -name '*.repo' ! -name ${INTERNAL_REPO_FILE})" ]`,
  },
  {
    id: "public-registries-blocked",
    name: "Public container registries blocked",
    predicate: PUBLIC_REGISTRIES.map(registryBlocked).join(" && "),
  },
  {
    id: "internal-registry-allowed",
    name: "Internal registry allowed",
    predicate: `grep -qFx "location = \\"$INTERNAL_REGISTRY\\"" /etc/containers/registries.conf`,
  },
  {
    id: "image-policy-default-reject",
    name: "Image policy rejects by default",
    predicate: `grep -q '"type": "reject"' /etc/containers/policy.json`,
  },
  {
    id: "firewall-default-drop",
    name: "Firewall default zone is drop",
    predicate: `[ "$(firewall-cmd --get-default-zone)" = drop ]`,
  },
  {
    id: "firewalld-active",
    name: "firewalld is active",
    predicate: "systemctl is-active --quiet firewalld",
  },
  {
    id: "dns-internal",
    name: "DNS resolver points at the internal server",
    predicate: `grep -qFx "nameserver $DNS_SERVER" /etc/resolv.conf && [ "$(grep -c '^nameserver' /etc/resolv.conf)" = 1 ]`,
  },
  {
    id: "dns-immutable",
    name: "resolv.conf is immutable",
    predicate: "lsattr -d /etc/resolv.conf | awk '{print $1}' | grep -q i",
  },
  {
    id: "proxy-configured",
    name: "Proxy configured in /etc/environment",
    predicate: `grep -qFx "HTTPS_PROXY=$PROXY_URL" /etc/environment`,
  },
  {
    id: "maintenance-scripts",
    name: "Maintenance scripts deployed and executable",
    predicate: MAINTENANCE_SCRIPTS.map((s) => `test -x ${SCRIPT_DIR}/${s}`).join(" && "),
  },
];

/** Variable assignments every predicate may reference. */
export function checkPrelude(endpoints: Endpoints, config: Pick<RunConfiguration, "sshPort">): string {
  return [
    `export SSH_PORT=${shellQuote(String(config.sshPort))}`,
    `export DNS_SERVER=${shellQuote(endpoints.dnsServer)}`,
    `export PROXY_URL=${shellQuote(endpoints.proxyUrl)}`,
    `export INTERNAL_REGISTRY=${shellQuote(endpoints.registryHost)}`,
  ].join("\n");
}

/** The verify script deployed to the target; prints one [PASS]/[FAIL] line per check and exits with the failed count. */
export function buildVerifyScript(checks: readonly CheckDefinition[] = CHECKS): string {
  const lines = [
    "#!/bin/bash",
    "# wsl-baseline - baseline verification",
    "# Expects SSH_PORT, DNS_SERVER, PROXY_URL and INTERNAL_REGISTRY in the environment.",
    "FAIL=0",
  ];
  for (const check of checks) {
    lines.push(`if ( ${check.predicate} ) >/dev/null 2>&1; then echo "[PASS] ${check.id}"; else echo "[FAIL] ${check.id}"; FAIL=$((FAIL+1)); fi`);
  }
  lines.push("exit $FAIL", "");
  return lines.join("\n");
}
