import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { loadConfig, buildRunConfig, DEFAULT_CONFIG } from '../../../src/config/loader.js';
import { BaselineErrorCode } from '../../../src/shared/errors.js';

describe('loadConfig', () => {
  let tmpDir: string;

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'wslb-config-'));
  });

  afterEach(async () => {
    await fs.rm(tmpDir, { recursive: true });
    delete process.env.WSL_BASELINE_CONFIG;
  });

  it('deep-merges a partial file over the defaults', async () => {
    const file = path.join(tmpDir, 'config.yaml');
    await fs.writeFile(file, 'target:\n  id: Fedora-Work\nendpoints:\n  registry: reg.example.com\nssh:\n  port: 2222\n');
    const { config, found, configPath } = loadConfig(file);
    expect(found).toBe(true);
    expect(configPath).toBe(file);
    expect(config.target.id).toBe('Fedora-Work');
    expect(config.endpoints).toEqual({ mirror_url: null, registry: 'reg.example.com', dns_server: null, proxy_url: null });
    expect(config.ssh.port).toBe(2222);
    expect(config.host).toEqual(DEFAULT_CONFIG.host);
  });

  it('reads the path from WSL_BASELINE_CONFIG', async () => {
    const file = path.join(tmpDir, 'env.yaml');
    await fs.writeFile(file, 'backup:\n  root: /srv/bundles\n');
    process.env.WSL_BASELINE_CONFIG = file;
    expect(loadConfig().config.backup.root).toBe('/srv/bundles');
  });

  it('falls back to defaults when the default file is absent', () => {
    process.env.WSL_BASELINE_CONFIG = path.join(tmpDir, 'missing.yaml');
    const { config, found } = loadConfig();
    expect(found).toBe(false);
    expect(config).toEqual(DEFAULT_CONFIG);
  });

  it('rejects an explicit path that does not exist', () => {
    expect(() => loadConfig(path.join(tmpDir, 'missing.yaml'))).toThrow(
      expect.objectContaining({ code: BaselineErrorCode.INVALID_CONFIG }),
    );
  });

  it('rejects values that fail validation', async () => {
    const file = path.join(tmpDir, 'bad.yaml');
    await fs.writeFile(file, 'ssh:\n  port: 70000\n');
    expect(() => loadConfig(file)).toThrow(expect.objectContaining({ code: BaselineErrorCode.INVALID_CONFIG }));
  });

  it('rejects YAML that is not a mapping', async () => {
    const file = path.join(tmpDir, 'list.yaml');
    await fs.writeFile(file, '- a\n- b\n');
    expect(() => loadConfig(file)).toThrow(expect.objectContaining({ code: BaselineErrorCode.INVALID_CONFIG }));
  });
});

describe('buildRunConfig', () => {
  const endpoints = {
    mirrorUrl: 'https://mirror.example.com',
    registryHost: 'reg.example.com:5000',
    dnsServer: '10.0.0.53',
    proxyUrl: 'http://proxy.example.com:3128',
  };

  it('lets command-line values override the file', () => {
    const file = { ...DEFAULT_CONFIG, endpoints: { mirror_url: 'https://file.example.com', registry: 'file.example.com', dns_server: '10.9.9.9', proxy_url: 'http://file:1' } };
    const config = buildRunConfig(file, { dnsServer: '10.0.0.53', targetId: 'Other' }, { requireEndpoints: true });
    expect(config.targetId).toBe('Other');
    expect(config.endpoints).toEqual({ mirrorUrl: 'https://file.example.com', registryHost: 'file.example.com', dnsServer: '10.0.0.53', proxyUrl: 'http://file:1' });
  });

  it('produces a frozen configuration with defaults filled in', () => {
    const config = buildRunConfig(DEFAULT_CONFIG, endpoints, { requireEndpoints: true });
    expect(Object.isFrozen(config)).toBe(true);
    expect(config.dryRun).toBe(false);
    expect(config.commandTimeoutMs).toBe(120000);
    expect(config.hostRulePrefix).toBe('WSLBaseline-');
  });

  it('requires valid endpoints only when asked to', () => {
    expect(() => buildRunConfig(DEFAULT_CONFIG, {}, { requireEndpoints: true })).toThrow(
      expect.objectContaining({ code: BaselineErrorCode.INVALID_CONFIG }),
    );
    expect(buildRunConfig(DEFAULT_CONFIG, {}, { requireEndpoints: false }).endpoints).toBeNull();
  });

  it('rejects a DNS server that is not an IPv4 address', () => {
    expect(() => buildRunConfig(DEFAULT_CONFIG, { ...endpoints, dnsServer: 'dns.example.com' }, { requireEndpoints: true })).toThrow(
      expect.objectContaining({ code: BaselineErrorCode.INVALID_CONFIG }),
    );
  });

  it('rejects a target id that could escape the wsl.exe argument', () => {
    expect(() => buildRunConfig(DEFAULT_CONFIG, { targetId: 'a b' }, { requireEndpoints: false })).toThrow(
      expect.objectContaining({ code: BaselineErrorCode.INVALID_CONFIG }),
    );
  });
});
