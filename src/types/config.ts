/** On-disk configuration (config.yaml), snake_case like the YAML it mirrors. */
export interface FileConfig {
  target: {
    id: string;
  };
  endpoints: {
    mirror_url: string | null;
    registry: string | null;
    dns_server: string | null;
    proxy_url: string | null;
  };
  network: {
    search_domain: string;
    no_proxy: string[];
  };
  ssh: {
    port: number;
  };
  backup: {
    root: string;
  };
  host: {
    wslconfig_path: string;
    rule_prefix: string;
    vm_creator_id: string;
  };
  execution: {
    command_timeout_seconds: number;
  };
  templates: {
    dir: string | null;
  };
}

/** Values that may be supplied on the command line, overriding the file. */
export interface RunOverrides {
  targetId?: string;
  mirrorUrl?: string;
  registryHost?: string;
  dnsServer?: string;
  proxyUrl?: string;
  backupRoot?: string;
  dryRun?: boolean;
  skipPreconditionCheck?: boolean;
  includeHostArtifacts?: boolean;
  forceNoConfirm?: boolean;
}

/** Service endpoints the baseline pins the target to. */
export interface Endpoints {
  readonly mirrorUrl: string;
  readonly registryHost: string;
  readonly dnsServer: string;
  readonly proxyUrl: string;
}

/**
 * Validated inputs for one invocation. Built once, frozen, and passed by reference
 * into every engine. `endpoints` is null for commands that never render templates.
 */
export interface RunConfiguration {
  readonly targetId: string;
  readonly endpoints: Endpoints | null;
  readonly backupRoot: string;
  readonly dryRun: boolean;
  readonly skipPreconditionCheck: boolean;
  readonly includeHostArtifacts: boolean;
  readonly forceNoConfirm: boolean;
  readonly searchDomain: string;
  readonly noProxy: readonly string[];
  readonly sshPort: number;
  readonly wslConfigPath: string;
  readonly hostRulePrefix: string;
  readonly vmCreatorId: string;
  readonly templateDir: string;
  readonly commandTimeoutMs: number;
}
