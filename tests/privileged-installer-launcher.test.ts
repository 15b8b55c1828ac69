import { EventEmitter } from 'node:events';
import type { SpawnOptions } from 'node:child_process';
import { describe, expect, it, vi } from 'vitest';
import type { ProgressEvent } from '@shared/contracts';
import { PrivilegedInstallerLauncher } from '@main/services/updater/PrivilegedInstallerLauncher';

describe('PrivilegedInstallerLauncher', () => {
  it('executa o instalador via sudo -A quando há askpass configurado', async () => {
    const child = new EventEmitter();
    const spawnFn = vi.fn((_command: string, _args: string[], _options: SpawnOptions) => child);
    const progress: ProgressEvent[] = [];
    const launcher = new PrivilegedInstallerLauncher({
      logger: mockLogger(),
      askpassPath: '/usr/bin/test-askpass',
      spawnFn
    });

    const pending = launcher.installPackages(['pkgA;1.0', 'pkgB;2.0'], (event) => progress.push(event));
    child.emit('exit', 0, null);
    await expect(pending).resolves.toBeUndefined();

    expect(spawnFn).toHaveBeenCalledTimes(1);
    const [command, args, options] = spawnFn.mock.calls[0];
    expect(command).toBe('sudo');
    expect(args).toEqual(['-A', 'pkg-update-installer', 'pkgA;1.0', 'pkgB;2.0']);
    expect(options.stdio).toBe('ignore');
    expect(options.env?.SUDO_ASKPASS).toBe('/usr/bin/test-askpass');
    expect(progress).toEqual([{ phase: 'install', percent: null }]);
  });

  it('omite -A e usa comando customizado sem askpass', async () => {
    const child = new EventEmitter();
    const spawnFn = vi.fn((_command: string, _args: string[], _options: SpawnOptions) => child);
    const launcher = new PrivilegedInstallerLauncher({
      logger: mockLogger(),
      installerCommand: '/opt/updater/bin/installer',
      sudoCommand: 'pkexec',
      askpassPath: '   ',
      spawnFn
    });

    const pending = launcher.installPackages(['pkgA;1.0']);
    child.emit('exit', 0, null);
    await pending;

    expect(spawnFn).toHaveBeenCalledWith('pkexec', ['/opt/updater/bin/installer', 'pkgA;1.0'], expect.anything());
  });

  it('rejeita com o código de saída do instalador', async () => {
    const child = new EventEmitter();
    const logger = mockLogger();
    const launcher = new PrivilegedInstallerLauncher({
      logger,
      spawnFn: () => child
    });

    const pending = launcher.installPackages(['pkgA;1.0']);
    child.emit('exit', 1, null);

    await expect(pending).rejects.toThrow('instalador saiu com código 1');
    expect(logger.error).toHaveBeenCalledWith('updater.install.launch_exit', {
      code: 1,
      signal: null,
      reason: 'instalador saiu com código 1'
    });
  });

  it('rejeita quando o instalador é encerrado por sinal', async () => {
    const child = new EventEmitter();
    const launcher = new PrivilegedInstallerLauncher({
      logger: mockLogger(),
      spawnFn: () => child
    });

    const pending = launcher.installPackages(['pkgA;1.0']);
    child.emit('exit', null, 'SIGTERM');

    await expect(pending).rejects.toThrow('instalador encerrado pelo sinal SIGTERM');
  });

  it('propaga erro de spawn e ignora saída posterior', async () => {
    const child = new EventEmitter();
    const launcher = new PrivilegedInstallerLauncher({
      logger: mockLogger(),
      spawnFn: () => child
    });

    const pending = launcher.installPackages(['pkgA;1.0']);
    child.emit('error', new Error('spawn sudo ENOENT'));
    child.emit('exit', 0, null);

    await expect(pending).rejects.toThrow('spawn sudo ENOENT');
  });

  it('rejeita quando spawn lança sincronamente', async () => {
    const launcher = new PrivilegedInstallerLauncher({
      logger: mockLogger(),
      spawnFn: () => {
        throw new Error('EACCES');
      }
    });

    await expect(launcher.installPackages(['pkgA;1.0'])).rejects.toThrow('EACCES');
  });
});

function mockLogger() {
  return {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn()
  };
}
