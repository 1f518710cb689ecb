// Target configuration steps, in the order Setup applies them.
// Each step turns rendered templates into Actions; the ActionRunner performs or describes them.
// Every write overwrites and every append first checks for the line, so re-running converges.
import type { Action } from "../types/action.js";
import type { Endpoints, RunConfiguration } from "../types/config.js";
import type { TemplateStore } from "../templates/store.js";
import type { TemplateVars } from "../templates/renderer.js";
import { shellQuote } from "../shared/shell.js";
import { buildVerifyScript } from "../verify/checks.js";
import {
  DISABLED_REPO_DIR, INTERNAL_REPO_FILE, LOG_DIR, LOOPBACK_RANGE, PRIVATE_RANGES, PUBLIC_REGISTRIES,
  REPO_DIR, SCRIPT_DIR, SYSTEMD_DIR, UPDATE_UNIT, VERIFY_SCRIPT_PATH,
} from "./constants.js";

export interface StepContext {
  readonly config: RunConfiguration;
  readonly endpoints: Endpoints;
  readonly templates: TemplateStore;
}

export interface TargetStep {
  readonly id: string;
  readonly title: string;
  /** Templates the step renders; checked by the precondition pass. */
  readonly templates: readonly string[];
  plan(ctx: StepContext): Action[];
}

/** `[[registry]]` blocks denying each public registry. */
export function blockedRegistryEntries(registries: readonly string[] = PUBLIC_REGISTRIES): string {
  return registries.map((r) => `[[registry]]\nlocation = "${r}"\nblocked = true\n`).join("\n");
}

export function templateVars(config: RunConfiguration, endpoints: Endpoints): TemplateVars {
  return {
    SSH_PORT: String(config.sshPort),
    MIRROR_URL: endpoints.mirrorUrl.replace(/\/+$/, ""),
    INTERNAL_REGISTRY: endpoints.registryHost,
    BLOCKED_REGISTRIES: blockedRegistryEntries(),
    DNS_SERVER: endpoints.dnsServer,
    SEARCH_DOMAIN: config.searchDomain,
    PROXY_URL: endpoints.proxyUrl,
    NO_PROXY: config.noProxy.join(","),
    LOG_DIR,
    SCRIPT_DIR,
  };
}

function write(ctx: StepContext, template: string, path: string, mode: number): Action {
  return { kind: "target-write", path, content: ctx.templates.render(template, templateVars(ctx.config, ctx.endpoints)), mode };
}

function run(description: string, script: string, bestEffort = false): Action {
  return { kind: "target-run", description, script, bestEffort };
}

const PRIMARY_USER = [
  'u=$(getent passwd 1000 | cut -d: -f1)',
  'if [ -z "$u" ]; then u=podmanuser; id -u "$u" >/dev/null 2>&1 || useradd -m -s /bin/bash "$u"; fi',
].join("\n");

export const TARGET_STEPS: readonly TargetStep[] = [
  {
    id: "ssh-hardening",
    title: "SSH hardening",
    templates: ["sshd_config.tmpl"],
    plan: (ctx) => [
      write(ctx, "sshd_config.tmpl", "/etc/ssh/sshd_config", 0o600),
      run("validate sshd configuration", "if command -v sshd >/dev/null 2>&1; then sshd -t -f /etc/ssh/sshd_config; fi"),
      run("restart sshd", "systemctl restart sshd 2>/dev/null || service sshd restart", true),
    ],
  },
  {
    id: "repository-restriction",
    title: "Repository restriction",
    templates: ["internal-mirror.repo.tmpl", "dnf.conf.tmpl"],
    plan: (ctx) => [
      run(
        `move repository definitions other than ${INTERNAL_REPO_FILE} to ${DISABLED_REPO_DIR}`,
        [
          `mkdir -p ${DISABLED_REPO_DIR}`,
          `for repo in ${REPO_DIR}/*.repo; do`,
          `  [ -f "$repo" ] || continue`,
          `  [ "$(basename "$repo")" = ${INTERNAL_REPO_FILE} ] && continue`,
          `  mv -f "$repo" ${DISABLED_REPO_DIR}/`,
          "done",
        ].join("\n"),
      ),
      write(ctx, "internal-mirror.repo.tmpl", `${REPO_DIR}/${INTERNAL_REPO_FILE}`, 0o644),
      write(ctx, "dnf.conf.tmpl", "/etc/dnf/dnf.conf", 0o644),
    ],
  },
  {
    id: "registry-restriction",
    title: "Registry restriction",
    templates: ["registries.conf.tmpl", "policy.json.tmpl"],
    plan: (ctx) => [
      write(ctx, "registries.conf.tmpl", "/etc/containers/registries.conf", 0o644),
      write(ctx, "policy.json.tmpl", "/etc/containers/policy.json", 0o644),
    ],
  },
  {
    id: "rootless-mode",
    title: "Rootless mode enforcement",
    templates: ["containers.conf.tmpl"],
    plan: (ctx) => [
      run(
        "ensure subordinate id ranges for the primary user",
        [
          PRIMARY_USER,
          'grep -q "^$u:" /etc/subuid 2>/dev/null || echo "$u:100000:65536" >> /etc/subuid',
          'grep -q "^$u:" /etc/subgid 2>/dev/null || echo "$u:100000:65536" >> /etc/subgid',
        ].join("\n"),
      ),
      write(ctx, "containers.conf.tmpl", "/etc/containers/containers.conf", 0o644),
      run(
        "set SELinux enforcing",
        "command -v getenforce >/dev/null 2>&1 || exit 0\nsetenforce 1\nsed -i -E 's/^SELINUX=(permissive|disabled)/SELINUX=enforcing/' /etc/selinux/config",
        true,
      ),
    ],
  },
  {
    id: "target-firewall",
    title: "Target firewall",
    templates: [],
    plan: (ctx) => [
      run("install firewalld", "command -v firewall-cmd >/dev/null 2>&1 || dnf install -y firewalld"),
      run("enable firewalld", "systemctl enable --now firewalld"),
      run(
        "default zone drop; trust loopback, internal DNS and private ranges",
        [
          "set -e",
          "firewall-cmd --set-default-zone=drop",
          ...[LOOPBACK_RANGE, `${ctx.endpoints.dnsServer}/32`, ...PRIVATE_RANGES].map(
            (s) => `firewall-cmd --permanent --zone=trusted --add-source=${shellQuote(s)}`,
          ),
          "firewall-cmd --reload",
        ].join("\n"),
      ),
    ],
  },
  {
    id: "dns-pinning",
    title: "DNS pinning",
    templates: ["resolv.conf.tmpl"],
    plan: (ctx) => [
      run("clear immutable flag on /etc/resolv.conf", "chattr -i /etc/resolv.conf", true),
      // WSL may leave resolv.conf as a symlink to its generated file; replace it with a real file.
      run("replace /etc/resolv.conf symlink", "[ -L /etc/resolv.conf ] && rm -f /etc/resolv.conf; true"),
      write(ctx, "resolv.conf.tmpl", "/etc/resolv.conf", 0o644),
      run("set immutable flag on /etc/resolv.conf", "chattr +i /etc/resolv.conf"),
    ],
  },
  {
    id: "proxy-configuration",
    title: "Proxy configuration",
    templates: ["environment.tmpl"],
    plan: (ctx) => [
      write(ctx, "environment.tmpl", "/etc/environment", 0o644),
      run(
        "set package manager proxy",
        `[ -f /etc/dnf/dnf.conf ] || exit 0\nsed -i '/^proxy=/d' /etc/dnf/dnf.conf\necho ${shellQuote(`proxy=${ctx.endpoints.proxyUrl}`)} >> /etc/dnf/dnf.conf`,
      ),
    ],
  },
  {
    id: "maintenance-scripts",
    title: "Maintenance script deployment",
    templates: [
      "update-system.sh.tmpl", "update-images.sh.tmpl", "health-check.sh.tmpl",
      `${UPDATE_UNIT}.service.tmpl`, `${UPDATE_UNIT}.timer.tmpl`,
    ],
    plan: (ctx) => [
      write(ctx, "update-system.sh.tmpl", `${SCRIPT_DIR}/update-system.sh`, 0o755),
      write(ctx, "update-images.sh.tmpl", `${SCRIPT_DIR}/update-images.sh`, 0o755),
      write(ctx, "health-check.sh.tmpl", `${SCRIPT_DIR}/health-check.sh`, 0o755),
      { kind: "target-write", path: VERIFY_SCRIPT_PATH, content: buildVerifyScript(), mode: 0o755 },
      write(ctx, `${UPDATE_UNIT}.service.tmpl`, `${SYSTEMD_DIR}/${UPDATE_UNIT}.service`, 0o644),
      write(ctx, `${UPDATE_UNIT}.timer.tmpl`, `${SYSTEMD_DIR}/${UPDATE_UNIT}.timer`, 0o644),
      run(`create ${LOG_DIR} and reload systemd`, `mkdir -p ${LOG_DIR}\nsystemctl daemon-reload`, true),
    ],
  },
];

/** Every template any target step renders. */
export function requiredTemplates(): string[] {
  return [...new Set(TARGET_STEPS.flatMap((s) => s.templates))];
}
