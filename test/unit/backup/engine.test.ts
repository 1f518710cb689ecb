import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { createBackup, backupOnly, PlannedBackupProvider, selectBackupProvider, EngineBackupProvider } from '../../../src/backup/engine.js';
import { readMetadata, listBundles, latestBundle } from '../../../src/backup/bundle.js';
import { BaselineErrorCode } from '../../../src/shared/errors.js';
import type { ArtifactCapture } from '../../../src/types/bundle.js';
import { FakeHost, FakeTarget } from '../../helpers/fakes.js';
import { WSLCONFIG_PATH, steppingClock, testConfig } from '../../helpers/config.js';

function capture(artifacts: readonly ArtifactCapture[], name: string): ArtifactCapture {
  const found = artifacts.find((a) => a.name === name);
  if (!found) throw new Error(`no capture for ${name}`);
  return found;
}

describe('backup engine', () => {
  let tmpDir: string;
  let target: FakeTarget;
  let host: FakeHost;

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'wslb-backup-'));
    target = new FakeTarget()
      .seed('/etc/ssh/sshd_config', 'Port 22\n', 0o600)
      .seed('/etc/yum.repos.d/fedora.repo', '[fedora]\n')
      .seed('/etc/yum.repos.d/updates.repo', '[updates]\n')
      .seed('/etc/yum.repos.d/README', 'not a repo\n');
    target.firewall = { installed: true, enabled: true, active: true, defaultZone: 'public', sources: ['10.1.0.0/16'] };
    host = new FakeHost();
    host.files.set(WSLCONFIG_PATH, Buffer.from('[wsl2]\nmemory=8GB\n'));
  });

  afterEach(async () => {
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  it('captures present, absent and directory artifacts into a timestamped bundle', async () => {
    const config = testConfig(tmpDir);
    const bundle = await createBackup(config, { target, host, now: steppingClock() }, { includeHostArtifacts: false });

    expect(bundle.id).toBe('20261018-174105');
    expect(bundle.path).toBe(path.join(tmpDir, '20261018-174105'));
    expect(bundle.written).toBe(true);

    const metadata = await readMetadata(bundle.path);
    expect(metadata).toEqual(bundle.metadata);
    const artifacts = bundle.metadata.artifacts;
    expect(artifacts.some((a) => a.scope === 'host')).toBe(false);
    expect(capture(artifacts, 'sshd-config')).toEqual({
      name: 'sshd-config', scope: 'target', kind: 'file', path: '/etc/ssh/sshd_config',
      status: 'present', bundleFile: 'target/etc/ssh/sshd_config',
    });
    expect(capture(artifacts, 'registries-conf').status).toBe('absent');
    expect(capture(artifacts, 'repo-definitions')).toMatchObject({ status: 'present', files: ['fedora.repo', 'updates.repo'] });
    expect(await fs.readFile(path.join(bundle.path, 'target/etc/yum.repos.d/fedora.repo'), 'utf-8')).toBe('[fedora]\n');
    expect(await fs.readFile(path.join(bundle.path, 'target/_state/firewalld-state'), 'utf-8')).toBe('public\n10.1.0.0/16\nenabled=enabled\nactive=active\n');
  });

  it('keeps file content byte-exact', async () => {
    const bytes = Buffer.from([0x23, 0x20, 0xe2, 0x9c, 0x93, 0x00, 0x0d]);
    target.seed('/etc/environment', bytes);
    const bundle = await createBackup(testConfig(tmpDir), { target, host }, { includeHostArtifacts: false });
    expect(await fs.readFile(path.join(bundle.path, 'target/etc/environment'))).toEqual(bytes);
  });

  it('captures host artifacts when asked', async () => {
    host.rules.set('Existing', { name: 'Existing', direction: 'Inbound', action: 'Allow' });
    const bundle = await createBackup(testConfig(tmpDir), { target, host }, { includeHostArtifacts: true });
    expect(bundle.metadata.includesHostArtifacts).toBe(true);
    expect(capture(bundle.metadata.artifacts, 'wslconfig')).toMatchObject({ status: 'present', bundleFile: 'host/.wslconfig', path: WSLCONFIG_PATH });
    expect(await fs.readFile(path.join(bundle.path, 'host/.wslconfig'), 'utf-8')).toBe('[wsl2]\nmemory=8GB\n');
    expect(JSON.parse(await fs.readFile(path.join(bundle.path, 'host/hyperv-firewall-rules.json'), 'utf-8'))).toEqual([
      { name: 'Existing', direction: 'Inbound', action: 'Allow' },
    ]);
  });

  it('records a probe failure as failed and carries on', async () => {
    target.unreadable.add('/etc/subuid');
    const bundle = await createBackup(testConfig(tmpDir), { target, host }, { includeHostArtifacts: false });
    expect(capture(bundle.metadata.artifacts, 'subuid')).toMatchObject({ status: 'failed' });
    expect(capture(bundle.metadata.artifacts, 'subgid').status).toBe('absent');
  });

  it('records an uninstalled firewalld as absent', async () => {
    target.firewall = { installed: false, enabled: false, active: false, defaultZone: 'public', sources: [] };
    const bundle = await createBackup(testConfig(tmpDir), { target, host }, { includeHostArtifacts: false });
    expect(capture(bundle.metadata.artifacts, 'firewalld-state').status).toBe('absent');
  });

  it('fails with BACKUP_FAILED when the target is unreachable', async () => {
    target.failOn = [/^true$/];
    await expect(createBackup(testConfig(tmpDir), { target, host }, { includeHostArtifacts: false })).rejects.toMatchObject({
      code: BaselineErrorCode.BACKUP_FAILED,
    });
    expect(await fs.readdir(tmpDir)).toEqual([]);
  });

  it('fails with BACKUP_FAILED when the backup root is not writable', async () => {
    const blocker = path.join(tmpDir, 'file');
    await fs.writeFile(blocker, 'x');
    await expect(createBackup(testConfig(path.join(blocker, 'root')), { target, host }, { includeHostArtifacts: false })).rejects.toMatchObject({
      code: BaselineErrorCode.BACKUP_FAILED,
    });
  });

  it('never overwrites an existing bundle', async () => {
    const now = () => new Date(Date.UTC(2026, 0, 2, 3, 4, 5));
    await createBackup(testConfig(tmpDir), { target, host, now }, { includeHostArtifacts: false });
    await expect(createBackup(testConfig(tmpDir), { target, host, now }, { includeHostArtifacts: false })).rejects.toMatchObject({
      code: BaselineErrorCode.BACKUP_FAILED,
    });
  });

  it('standalone backup honours includeHostArtifacts', async () => {
    const bundlePath = await backupOnly(testConfig(tmpDir), { target, host });
    const metadata = await readMetadata(bundlePath);
    expect(metadata?.includesHostArtifacts).toBe(false);
  });

  it('standalone backup writes nothing in dry-run mode', async () => {
    const now = () => new Date(Date.UTC(2026, 9, 18, 18, 6, 42));
    const bundlePath = await backupOnly(testConfig(tmpDir, { dryRun: true }), { target, host, now });

    expect(bundlePath).toBe(path.join(tmpDir, '20261018-180642'));
    expect(await fs.readdir(tmpDir)).toEqual([]);
    expect(target.scripts).toEqual([]);
    expect(host.scripts).toEqual([]);
  });

  it('lists bundles newest first', async () => {
    const clock = steppingClock();
    await createBackup(testConfig(tmpDir), { target, host, now: clock }, { includeHostArtifacts: false });
    await createBackup(testConfig(tmpDir), { target, host, now: clock }, { includeHostArtifacts: false });
    await fs.mkdir(path.join(tmpDir, '20200101-000000'));
    const bundles = await listBundles(tmpDir);
    expect(bundles.map((b) => b.id)).toEqual(['20261018-174106', '20261018-174105', '20200101-000000']);
    expect(bundles[2].metadata).toBeNull();
    expect(await latestBundle(tmpDir)).toBe(path.join(tmpDir, '20261018-174106'));
  });

  it('reports BUNDLE_NOT_FOUND when there are no bundles', async () => {
    await expect(latestBundle(tmpDir)).rejects.toMatchObject({ code: BaselineErrorCode.BUNDLE_NOT_FOUND });
  });

  it('rejects metadata that points outside the bundle', async () => {
    const bundle = await createBackup(testConfig(tmpDir), { target, host }, { includeHostArtifacts: false });
    const file = path.join(bundle.path, 'metadata.json');
    const raw = JSON.parse(await fs.readFile(file, 'utf-8'));
    raw.artifacts[0].bundleFile = 'target/../../etc/passwd';
    await fs.rm(file);
    await fs.writeFile(file, JSON.stringify(raw));
    await expect(readMetadata(bundle.path)).rejects.toMatchObject({ code: BaselineErrorCode.BUNDLE_INVALID });
  });
});

describe('backup providers', () => {
  it('selects the planned provider for dry runs', () => {
    const deps = { target: new FakeTarget(), host: new FakeHost() };
    expect(selectBackupProvider(testConfig('/tmp/x', { dryRun: true }), deps)).toBeInstanceOf(PlannedBackupProvider);
    expect(selectBackupProvider(testConfig('/tmp/x'), deps)).toBeInstanceOf(EngineBackupProvider);
  });

  it('plans a bundle without touching anything', async () => {
    const target = new FakeTarget();
    const provider = new PlannedBackupProvider(() => new Date(Date.UTC(2026, 9, 18, 0, 0, 0)));
    const bundle = await provider.capture(testConfig('/nonexistent/root', { dryRun: true }), { includeHostArtifacts: true });
    expect(bundle).toMatchObject({ id: '20261018-000000', path: path.join('/nonexistent/root', '20261018-000000'), written: false });
    expect(target.scripts).toEqual([]);
  });
});
