import { describe, expect, it } from 'vitest';
import { filterUpdates, NON_TARGET_ARCH_MARKER, shouldInclude } from '@main/services/updater/ArchitectureFilter';
import { parseUpdateId, toPendingRows, uniqueInOrder } from '@main/services/updater/update-id';

describe('ArchitectureFilter', () => {
  it('mantém tudo na plataforma alvo', () => {
    expect(shouldInclude({ arch: 'amd64' }, true)).toBe(true);
    expect(shouldInclude({ arch: 'armhf' }, true)).toBe(true);
  });

  it('exclui pacotes amd64 fora da plataforma alvo', () => {
    expect(NON_TARGET_ARCH_MARKER).toBe('amd64');
    expect(shouldInclude({ arch: 'amd64' }, false)).toBe(false);
    expect(shouldInclude({ arch: 'linux-amd64' }, false)).toBe(false);
    expect(shouldInclude({ arch: 'all' }, false)).toBe(true);
    expect(shouldInclude({ arch: 'arm64' }, false)).toBe(true);
  });

  it('filtra preservando a ordem original sem alterar a entrada', () => {
    const updates = [
      { id: 'a', arch: 'armhf' },
      { id: 'b', arch: 'amd64' },
      { id: 'c', arch: 'all' }
    ];

    expect(filterUpdates(updates, false).map((update) => update.id)).toEqual(['a', 'c']);
    expect(filterUpdates(updates, true).map((update) => update.id)).toEqual(['a', 'b', 'c']);
    expect(updates).toHaveLength(3);
  });
});

describe('update-id', () => {
  it('separa nome, versão e arquitetura do id', () => {
    expect(parseUpdateId('libfoo;1.2-3;armhf;raspbian')).toEqual({
      id: 'libfoo;1.2-3;armhf;raspbian',
      name: 'libfoo',
      version: '1.2-3',
      arch: 'armhf'
    });
    expect(parseUpdateId('semversao')).toEqual({
      id: 'semversao',
      name: 'semversao',
      version: '',
      arch: ''
    });
  });

  it('gera linhas nome/versão para listagem', () => {
    expect(toPendingRows(['pkgA;1.0;armhf', 'pkgB;2.0'])).toEqual([
      { name: 'pkgA', version: '1.0' },
      { name: 'pkgB', version: '2.0' }
    ]);
  });

  it('remove duplicados mantendo a primeira ocorrência', () => {
    expect(uniqueInOrder(['b', 'a', 'b', 'c', 'a'])).toEqual(['b', 'a', 'c']);
  });
});
