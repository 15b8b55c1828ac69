import type { UpdateRecord } from '@shared/contracts';

// arquitetura nativa fora da plataforma alvo; esses pacotes não são atualizados automaticamente
export const NON_TARGET_ARCH_MARKER = 'amd64';

export function shouldInclude(update: Pick<UpdateRecord, 'arch'>, isTargetPlatform: boolean): boolean {
  if (isTargetPlatform) {
    return true;
  }

  return !update.arch.includes(NON_TARGET_ARCH_MARKER);
}

export function filterUpdates<T extends Pick<UpdateRecord, 'arch'>>(updates: readonly T[], isTargetPlatform: boolean): T[] {
  return updates.filter((update) => shouldInclude(update, isTargetPlatform));
}
