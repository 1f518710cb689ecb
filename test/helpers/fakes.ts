// In-process stand-ins for the WSL target, the Windows host and the process executor.
// FakeTarget keeps files in memory and simulates the handful of scripts whose effect
// on those files the engines depend on; every other script exits 0.
import type { Command, ExecResult } from '../../src/types/command.js';
import type { CommandExecutor } from '../../src/execution/executor.js';
import type { TargetEnvironment, RunOptions } from '../../src/execution/target.js';
import type { HostEnvironment } from '../../src/execution/host.js';
import { ABSENT_EXIT_CODE, toBuffer } from '../../src/execution/target.js';
import { BaselineError, BaselineErrorCode } from '../../src/shared/errors.js';

export interface FakeFile {
  content: Buffer;
  mode: number;
}

export interface FirewallModel {
  installed: boolean;
  enabled: boolean;
  active: boolean;
  defaultZone: string;
  sources: string[];
}

const ok = (stdout = ''): ExecResult => ({ stdout, stderr: '', exitCode: 0, durationMs: 0 });
const exit = (exitCode: number, stderr = ''): ExecResult => ({ stdout: '', stderr, exitCode, durationMs: 0 });

export class FakeTarget implements TargetEnvironment {
  readonly files = new Map<string, FakeFile>();
  readonly immutable = new Set<string>();
  readonly scripts: string[] = [];
  readonly writes: string[] = [];
  readonly removes: string[] = [];
  firewall: FirewallModel = { installed: false, enabled: false, active: false, defaultZone: 'public', sources: [] };
  /** Scripts matching any of these exit 1. */
  failOn: RegExp[] = [];
  /** Paths whose read fails outright. */
  unreadable = new Set<string>();
  /** Canned results for scripts matching a pattern, checked before the simulations. */
  responses: Array<{ match: RegExp; result: ExecResult }> = [];

  constructor(readonly id = 'TestDistro') {}

  seed(path: string, content: string | Buffer, mode = 0o644): this {
    this.files.set(path, { content: toBuffer(content), mode });
    return this;
  }

  text(path: string): string | undefined {
    return this.files.get(path)?.content.toString('utf-8');
  }

  /** Sorted path → "mode:content" view, for whole-state comparisons. */
  snapshot(): Record<string, string> {
    const out: Record<string, string> = {};
    for (const p of [...this.files.keys()].sort()) {
      const f = this.files.get(p);
      if (f) out[p] = `${f.mode.toString(8)}:${f.content.toString('base64')}`;
    }
    return out;
  }

  async run(script: string, _options?: RunOptions): Promise<ExecResult> {
    this.scripts.push(script);
    if (this.failOn.some((re) => re.test(script))) return exit(1, 'simulated failure');
    const canned = this.responses.find((r) => r.match.test(script));
    if (canned) return canned.result;
    return this.simulate(script);
  }

  async readFile(path: string): Promise<Buffer | null> {
    if (this.unreadable.has(path)) {
      throw new BaselineError(BaselineErrorCode.COMMAND_FAILED, `Failed to read ${path} in ${this.id} (exit 1)`, { exitCode: 1 });
    }
    const f = this.files.get(path);
    return f ? Buffer.from(f.content) : null;
  }

  async writeFile(path: string, content: string | Buffer, mode: number): Promise<void> {
    if (this.immutable.has(path)) {
      throw new BaselineError(BaselineErrorCode.COMMAND_FAILED, `Failed to write ${path} in ${this.id} (exit 1)`, {
        exitCode: 1,
        stderr: 'Operation not permitted',
      });
    }
    this.writes.push(path);
    this.files.set(path, { content: Buffer.from(toBuffer(content)), mode });
  }

  async remove(path: string): Promise<void> {
    if (this.immutable.has(path)) {
      throw new BaselineError(BaselineErrorCode.COMMAND_FAILED, `Failed to remove ${path} in ${this.id} (exit 1)`, { exitCode: 1 });
    }
    this.removes.push(path);
    for (const p of [...this.files.keys()]) {
      if (p === path || p.startsWith(`${path}/`)) this.files.delete(p);
    }
  }

  async listFiles(dir: string, suffix: string): Promise<string[] | null> {
    const names = this.filesIn(dir).filter((n) => n.endsWith(suffix));
    if (names.length === 0 && ![...this.files.keys()].some((p) => p.startsWith(`${dir}/`))) return null;
    return names.sort();
  }

  private filesIn(dir: string): string[] {
    return [...this.files.keys()]
      .filter((p) => p.startsWith(`${dir}/`) && !p.slice(dir.length + 1).includes('/'))
      .map((p) => p.slice(dir.length + 1));
  }

  private simulate(script: string): ExecResult {
    if (script === 'id -u') return ok('0\n');
    const testX = script.match(/^test -x '([^']+)'$/);
    if (testX) {
      const f = this.files.get(testX[1]);
      return f && (f.mode & 0o111) !== 0 ? ok() : exit(1);
    }

    for (const m of script.matchAll(/chattr ([+-])i '?([^'\s;]+)'?/g)) {
      if (m[1] === '+') this.immutable.add(m[2]);
      else this.immutable.delete(m[2]);
    }

    if (script.includes('for repo in /etc/yum.repos.d/*.repo')) {
      for (const name of this.filesIn('/etc/yum.repos.d')) {
        if (!name.endsWith('.repo') || name === 'internal-mirror.repo') continue;
        const f = this.files.get(`/etc/yum.repos.d/${name}`);
        if (!f) continue;
        this.files.delete(`/etc/yum.repos.d/${name}`);
        this.files.set(`/etc/yum.repos.d/disabled/${name}`, f);
      }
    }

    const prune = script.match(/^\[ -d '([^']+)' \] \|\| exit 0\nfor f in '[^']+'\/\*(\S+); do/);
    if (prune) {
      const keep = [...script.matchAll(/^ {4}(.+)\) ;;$/gm)].flatMap((m) => m[1].split('|').map((s) => s.replace(/^'|'$/g, '')));
      for (const name of this.filesIn(prune[1])) {
        if (name.endsWith(prune[2]) && !keep.includes(name)) this.files.delete(`${prune[1]}/${name}`);
      }
    }

    for (const file of ['/etc/subuid', '/etc/subgid']) {
      if (script.includes(`>> ${file}`)) {
        const current = this.text(file) ?? '';
        if (!current.split('\n').some((l) => l.startsWith('podmanuser:'))) {
          this.files.set(file, { content: Buffer.from(`${current}podmanuser:100000:65536\n`), mode: this.files.get(file)?.mode ?? 0o644 });
        }
      }
    }

    if (script.includes("sed -i -E 's/^SELINUX=(permissive|disabled)/SELINUX=enforcing/' /etc/selinux/config")) {
      const f = this.files.get('/etc/selinux/config');
      if (f) f.content = Buffer.from(f.content.toString('utf-8').replace(/^SELINUX=(permissive|disabled)/m, 'SELINUX=enforcing'));
    }

    const proxy = script.match(/echo '(proxy=[^']+)' >> \/etc\/dnf\/dnf\.conf/);
    if (proxy) {
      const f = this.files.get('/etc/dnf/dnf.conf');
      if (f) {
        const kept = f.content.toString('utf-8').split('\n').filter((l) => !l.startsWith('proxy='));
        if (kept[kept.length - 1] === '') kept.pop();
        f.content = Buffer.from(`${[...kept, proxy[1]].join('\n')}\n`);
      }
    }

    return this.simulateFirewall(script);
  }

  private simulateFirewall(script: string): ExecResult {
    if (script.includes('--get-default-zone')) {
      if (!this.firewall.installed) return exit(ABSENT_EXIT_CODE);
      const { defaultZone, sources, enabled, active } = this.firewall;
      return ok(`${defaultZone}\n${sources.join(' ')}\nenabled=${enabled ? 'enabled' : 'disabled'}\nactive=${active ? 'active' : 'inactive'}\n`);
    }
    if (script.includes('dnf install -y firewalld')) this.firewall.installed = true;
    // Unit commands apply in script order, so a restore that starts then stops ends stopped.
    for (const m of script.matchAll(/systemctl (enable|disable|start|stop)( --now)? firewalld\b/g)) {
      const on = m[1] === 'enable' || m[1] === 'start';
      if (m[1] === 'enable' || m[1] === 'disable') this.firewall.enabled = on;
      if (m[1] === 'start' || m[1] === 'stop' || m[2]) this.firewall.active = on;
    }
    const zone = script.match(/firewall-cmd --set-default-zone=(\S+)/);
    if (zone) this.firewall.defaultZone = zone[1];
    if (script.includes('--remove-source')) this.firewall.sources = [];
    for (const m of script.matchAll(/--add-source=(?:'([^']*)'|(\S+))/g)) {
      const source = m[1] ?? m[2];
      if (!this.firewall.sources.includes(source)) this.firewall.sources.push(source);
    }
    return ok();
  }
}

export interface FakeRule {
  name: string;
  direction: string;
  action: string;
}

export class FakeHost implements HostEnvironment {
  readonly files = new Map<string, Buffer>();
  readonly rules = new Map<string, FakeRule>();
  readonly scripts: string[] = [];
  readonly writes: string[] = [];
  elevated = true;
  shutdowns = 0;
  failOn: RegExp[] = [];

  async run(script: string): Promise<ExecResult> {
    this.scripts.push(script);
    if (this.failOn.some((re) => re.test(script))) return exit(1, 'simulated failure');

    if (script === 'wsl.exe --shutdown') {
      this.shutdowns++;
      return ok();
    }
    const created = script.match(/^New-NetFirewallHyperVRule -Name '([^']+)'.* -Direction (\S+) .* -Action (\S+)/);
    if (created) {
      if (this.rules.has(created[1])) return exit(1, 'rule already exists');
      this.rules.set(created[1], { name: created[1], direction: created[2], action: created[3] });
      return ok();
    }
    const removed = script.match(/^Get-NetFirewallHyperVRule -Name '([^']+)\*'.*Remove-NetFirewallHyperVRule/);
    if (removed) {
      for (const name of [...this.rules.keys()]) if (name.startsWith(removed[1])) this.rules.delete(name);
      return ok();
    }
    if (script.startsWith('Get-NetFirewallHyperVRule -VMCreatorId')) {
      return ok(JSON.stringify([...this.rules.values()]));
    }
    return ok();
  }

  async isElevated(): Promise<boolean> {
    return this.elevated;
  }

  async readFile(path: string): Promise<Buffer | null> {
    const f = this.files.get(path);
    return f ? Buffer.from(f) : null;
  }

  async writeFile(path: string, content: string | Buffer): Promise<void> {
    this.writes.push(path);
    this.files.set(path, Buffer.from(toBuffer(content)));
  }

  async remove(path: string): Promise<void> {
    this.files.delete(path);
  }
}

/** Records each command and answers from a queue (or with a default result). */
export class RecordingExecutor implements CommandExecutor {
  readonly calls: Array<{ command: Command; timeoutMs: number }> = [];
  readonly queue: ExecResult[] = [];

  constructor(private readonly fallback: ExecResult = ok()) {}

  reply(result: Partial<ExecResult>): this {
    this.queue.push({ ...ok(), ...result });
    return this;
  }

  async execute(command: Command, timeoutMs: number): Promise<ExecResult> {
    this.calls.push({ command, timeoutMs });
    return this.queue.shift() ?? this.fallback;
  }
}
