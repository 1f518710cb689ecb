import { WslTarget, ABSENT_EXIT_CODE } from '../../../src/execution/target.js';
import { WindowsHost } from '../../../src/execution/host.js';
import { BaselineErrorCode } from '../../../src/shared/errors.js';
import { RecordingExecutor } from '../../helpers/fakes.js';

describe('WslTarget', () => {
  it('runs scripts as root in the named distribution', async () => {
    const executor = new RecordingExecutor();
    await new WslTarget('Fedora-Test', executor, 5000).run('id -u');
    expect(executor.calls).toEqual([
      { command: { argv: ['wsl.exe', '-d', 'Fedora-Test', '-u', 'root', '--exec', 'bash', '-c', 'id -u'], stdin: undefined }, timeoutMs: 5000 },
    ]);
  });

  it('decodes file content from base64 byte-for-byte', async () => {
    const bytes = Buffer.from([0x00, 0xff, 0x0a, 0x41]);
    const executor = new RecordingExecutor().reply({ stdout: `${bytes.toString('base64')}\n` });
    const content = await new WslTarget('T', executor, 1000).readFile('/etc/x');
    expect(content).toEqual(bytes);
  });

  it('returns null for an absent file', async () => {
    const executor = new RecordingExecutor().reply({ exitCode: ABSENT_EXIT_CODE });
    expect(await new WslTarget('T', executor, 1000).readFile('/etc/missing')).toBeNull();
  });

  it('throws COMMAND_FAILED when a read fails', async () => {
    const executor = new RecordingExecutor().reply({ exitCode: 1, stderr: 'Permission denied' });
    await expect(new WslTarget('T', executor, 1000).readFile('/etc/shadow')).rejects.toMatchObject({
      code: BaselineErrorCode.COMMAND_FAILED,
      context: { target: 'T', exitCode: 1, stderr: 'Permission denied' },
    });
  });

  it('writes content through stdin as base64 and sets the mode', async () => {
    const executor = new RecordingExecutor();
    await new WslTarget('T', executor, 1000).writeFile("/etc/it's", 'hello\n', 0o600);
    const { command } = executor.calls[0];
    expect(command.stdin).toBe(Buffer.from('hello\n').toString('base64'));
    expect(command.argv[8]).toBe(`set -e; mkdir -p -- "$(dirname -- '/etc/it'\\''s')"; base64 -d > '/etc/it'\\''s'; chmod 0600 '/etc/it'\\''s'`);
  });

  it('lists directory entries, or null when the directory is absent', async () => {
    const executor = new RecordingExecutor().reply({ stdout: 'a.repo\nb.repo\n' }).reply({ exitCode: ABSENT_EXIT_CODE });
    const target = new WslTarget('T', executor, 1000);
    expect(await target.listFiles('/etc/yum.repos.d', '.repo')).toEqual(['a.repo', 'b.repo']);
    expect(await target.listFiles('/etc/nowhere', '.repo')).toBeNull();
  });
});

describe('WindowsHost', () => {
  it('runs PowerShell non-interactively', async () => {
    const executor = new RecordingExecutor();
    await new WindowsHost(executor, 2000).run('Get-Date');
    expect(executor.calls[0].command.argv).toEqual([
      'powershell.exe', '-NoProfile', '-NonInteractive', '-ExecutionPolicy', 'Bypass', '-Command', 'Get-Date',
    ]);
    expect(executor.calls[0].timeoutMs).toBe(2000);
  });

  it('reports elevation from the principal check', async () => {
    expect(await new WindowsHost(new RecordingExecutor().reply({ stdout: 'True\r\n' }), 1000).isElevated()).toBe(true);
    expect(await new WindowsHost(new RecordingExecutor().reply({ stdout: 'False\r\n' }), 1000).isElevated()).toBe(false);
  });
});
