// Host network policy: Hyper-V firewall rules that fence in the WSL VM, plus .wslconfig.
// Rules are identified purely by name prefix: Setup strips and recreates them, rollback strips them.
import type { Action } from "../types/action.js";
import type { RunConfiguration } from "../types/config.js";
import type { TemplateStore } from "../templates/store.js";
import { psQuote } from "../shared/shell.js";
import { LOOPBACK_RANGE, PRIVATE_RANGES } from "./constants.js";

export const WSLCONFIG_TEMPLATE = "wslconfig.tmpl";

export interface HostFirewallRule {
  readonly name: string;
  readonly direction: "Inbound" | "Outbound";
  readonly action: "Allow" | "Block";
  readonly remoteAddresses?: readonly string[];
}

/** The rule set, in creation order: deny-by-default first, then the narrower allows. */
export function hostFirewallRules(prefix: string): HostFirewallRule[] {
  return [
    { name: `${prefix}DenyOutbound`, direction: "Outbound", action: "Block" },
    { name: `${prefix}AllowInternalOutbound`, direction: "Outbound", action: "Allow", remoteAddresses: PRIVATE_RANGES },
    { name: `${prefix}AllowLoopbackOutbound`, direction: "Outbound", action: "Allow", remoteAddresses: [LOOPBACK_RANGE] },
    { name: `${prefix}DenyInbound`, direction: "Inbound", action: "Block" },
  ];
}

export function removeHostRulesScript(prefix: string): string {
  return `Get-NetFirewallHyperVRule -Name ${psQuote(`${prefix}*`)} -ErrorAction SilentlyContinue | Remove-NetFirewallHyperVRule -ErrorAction Stop`;
}

export function createHostRuleScript(rule: HostFirewallRule, vmCreatorId: string): string {
  const parts = [
    "New-NetFirewallHyperVRule",
    `-Name ${psQuote(rule.name)}`,
    `-DisplayName ${psQuote(rule.name)}`,
    `-Direction ${rule.direction}`,
    `-VMCreatorId ${psQuote(vmCreatorId)}`,
    `-Action ${rule.action}`,
  ];
  if (rule.remoteAddresses) parts.push(`-RemoteAddresses ${rule.remoteAddresses.map(psQuote).join(",")}`);
  parts.push("-ErrorAction Stop | Out-Null");
  return parts.join(" ");
}

export function removeHostRulesAction(prefix: string): Action {
  return {
    kind: "host-run",
    description: `remove Hyper-V firewall rules named ${prefix}*`,
    script: removeHostRulesScript(prefix),
    bestEffort: true,
  };
}

export function hostPolicyActions(config: RunConfiguration, templates: TemplateStore): Action[] {
  return [
    removeHostRulesAction(config.hostRulePrefix),
    ...hostFirewallRules(config.hostRulePrefix).map((rule): Action => ({
      kind: "host-run",
      description: `create Hyper-V firewall rule ${rule.name} (${rule.direction} ${rule.action}${rule.remoteAddresses ? ` ${rule.remoteAddresses.join(",")}` : ""})`,
      script: createHostRuleScript(rule, config.vmCreatorId),
    })),
    { kind: "host-write", path: config.wslConfigPath, content: templates.render(WSLCONFIG_TEMPLATE, {}) },
  ];
}
