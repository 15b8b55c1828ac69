import { afterEach, describe, expect, it, vi } from 'vitest';

afterEach(() => {
  vi.restoreAllMocks();
  vi.resetModules();
});

describe('command-resolution', () => {
  it('acrescenta diretórios sbin e bin ao PATH no Linux', async () => {
    const setup = await loadCommandResolutionModule();
    const env = setup.buildCommandEnvironment('linux', {
      PATH: '/custom/bin',
      HOME: '/tmp/user'
    });

    expect(env.PATH?.split(':')).toEqual([
      '/custom/bin',
      '/usr/local/sbin',
      '/usr/local/bin',
      '/usr/sbin',
      '/usr/bin',
      '/sbin',
      '/bin'
    ]);
    expect(env.HOME).toBe('/tmp/user');
  });

  it('não duplica entradas já presentes no PATH', async () => {
    const setup = await loadCommandResolutionModule();
    const env = setup.buildCommandEnvironment('linux', { PATH: '/usr/sbin:/usr/bin' });

    expect(env.PATH?.split(':').filter((entry) => entry === '/usr/sbin')).toHaveLength(1);
  });

  it('resolve binário pelo which quando disponível', async () => {
    const setup = await loadCommandResolutionModule();
    setup.spawnSync.mockReturnValue({
      status: 0,
      stdout: '/usr/bin/raspi-config\n'
    });

    const result = setup.resolveCommandBinary('raspi-config', 'linux');

    expect(result).toEqual({
      found: true,
      path: '/usr/bin/raspi-config'
    });
    expect(setup.spawnSync).toHaveBeenCalledWith('which', ['raspi-config'], expect.anything());
  });

  it('percorre o PATH quando which falha', async () => {
    const setup = await loadCommandResolutionModule();
    setup.spawnSync.mockImplementation(() => {
      throw new Error('which indisponível');
    });
    setup.existsSync.mockImplementation((candidate: string) => candidate === '/usr/sbin/raspi-config');

    const result = setup.resolveCommandBinary('raspi-config', 'linux');

    expect(result).toEqual({
      found: true,
      path: '/usr/sbin/raspi-config'
    });
  });

  it('verifica caminho absoluto direto no disco', async () => {
    const setup = await loadCommandResolutionModule();
    setup.existsSync.mockImplementation((candidate: string) => candidate === '/usr/sbin/ntpd');

    expect(setup.resolveCommandBinary('/usr/sbin/ntpd', 'linux')).toEqual({
      found: true,
      path: '/usr/sbin/ntpd'
    });
    expect(setup.resolveCommandBinary('/usr/sbin/chronyd', 'linux')).toEqual({
      found: false,
      path: null
    });
    expect(setup.spawnSync).not.toHaveBeenCalled();
  });

  it('retorna não encontrado para nome vazio', async () => {
    const setup = await loadCommandResolutionModule();

    expect(setup.resolveCommandBinary('   ', 'linux')).toEqual({ found: false, path: null });
  });
});

async function loadCommandResolutionModule() {
  vi.resetModules();

  const spawnSync = vi.fn();
  const existsSync = vi.fn((_candidate: string) => false);

  vi.doMock('node:child_process', () => ({
    spawnSync
  }));

  vi.doMock('node:fs', () => ({
    existsSync
  }));

  const mod = await import('@main/services/environment/command-resolution');

  return {
    buildCommandEnvironment: mod.buildCommandEnvironment,
    resolveCommandBinary: mod.resolveCommandBinary,
    spawnSync,
    existsSync
  };
}
