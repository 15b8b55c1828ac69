import type { CheckOutcome, InstallResult, PipelineState, ProgressEvent, UpdaterErrorCode } from '@shared/contracts';
import type { LogSink } from '@main/services/logging/Logger';

export interface UpdaterEventMap {
  progress: ProgressEvent;
  outcome: CheckOutcome;
  'install-result': InstallResult;
  'pipeline-state': PipelineState;
  icon: { visible: boolean };
  notification: { message: string; count: number };
  error: { code: UpdaterErrorCode; message: string };
}

export type UpdaterEventName = keyof UpdaterEventMap;
type Listener<K extends UpdaterEventName> = (payload: UpdaterEventMap[K]) => void;
type ListenerSets = { [K in UpdaterEventName]: Set<Listener<K>> };

export class UpdaterEvents {
  private readonly listeners: ListenerSets = {
    progress: new Set(),
    outcome: new Set(),
    'install-result': new Set(),
    'pipeline-state': new Set(),
    icon: new Set(),
    notification: new Set(),
    error: new Set()
  };

  constructor(private readonly logger: LogSink) {}

  on<K extends UpdaterEventName>(event: K, listener: Listener<K>): () => void {
    const set: Set<Listener<K>> = this.listeners[event];
    set.add(listener);
    return () => {
      set.delete(listener);
    };
  }

  // falha de um assinante não interrompe os demais nem quem emitiu
  emit<K extends UpdaterEventName>(event: K, payload: UpdaterEventMap[K]): void {
    const set: Set<Listener<K>> = this.listeners[event];
    for (const listener of [...set]) {
      try {
        listener(payload);
      } catch (error) {
        this.logger.warn('updater.events.listener_failed', {
          event,
          reason: error instanceof Error ? error.message : String(error)
        });
      }
    }
  }
}
