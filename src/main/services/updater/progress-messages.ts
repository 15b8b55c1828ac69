import type { CheckOutcome, ProgressEvent, ProgressPhase } from '@shared/contracts';

const PHASE_MESSAGES: Record<ProgressPhase, string> = {
  cache: 'Atualizando dados de pacotes - aguarde...',
  resolve: 'Procurando pacote - aguarde...',
  download: 'Baixando pacote - aguarde...',
  install: 'Instalando pacote - aguarde...'
};

export const STAGE_MESSAGES = {
  refreshing: PHASE_MESSAGES.cache,
  comparing: 'Comparando versões - aguarde...',
  installing: 'Instalando atualizações - aguarde...',
  upToDate: 'Sistema atualizado'
} as const;

export interface ProgressLine {
  message: string;
  /** 0..1, or null for an indeterminate (pulsing) bar */
  fraction: number | null;
}

export function describeProgress(event: ProgressEvent): ProgressLine {
  return {
    message: PHASE_MESSAGES[event.phase],
    fraction: toFraction(event.percent)
  };
}

function toFraction(percent: number | null): number | null {
  if (percent === null || !Number.isFinite(percent) || percent < 0 || percent > 100) {
    return null;
  }
  return percent / 100;
}

export function describeCheckFailure(outcome: Extract<CheckOutcome, { kind: 'failed' }>): string {
  const stage = outcome.code === 'cache_refresh_failed' ? 'atualizando cache' : 'comparando versões';
  return `Erro ${stage} - ${outcome.detail}`;
}
