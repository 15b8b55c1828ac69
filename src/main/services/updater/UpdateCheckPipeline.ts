import type { CheckFailureCode, CheckOutcome, ProgressEvent, StartCheckResult, UpdateRecord } from '@shared/contracts';
import type { EnvironmentGate } from '@main/services/environment/EnvironmentGate';
import type { LogSink } from '@main/services/logging/Logger';
import { filterUpdates } from '@main/services/updater/ArchitectureFilter';
import type { PackageBackend } from '@main/services/updater/PackageBackend';
import type { PipelineLease, PipelineSlot } from '@main/services/updater/PipelineSlot';
import { uniqueInOrder } from '@main/services/updater/update-id';

interface UpdateCheckPipelineOptions {
  slot: PipelineSlot;
  backend: PackageBackend;
  gate: Pick<EnvironmentGate, 'targetPlatform'>;
  logger: LogSink;
  onProgress?: (event: ProgressEvent) => void;
  onOutcome?: (outcome: CheckOutcome) => void;
}

export class UpdateCheckPipeline {
  private readonly slot: PipelineSlot;
  private readonly backend: PackageBackend;
  private readonly gate: Pick<EnvironmentGate, 'targetPlatform'>;
  private readonly logger: LogSink;
  private readonly onProgress: (event: ProgressEvent) => void;
  private readonly onOutcome: (outcome: CheckOutcome) => void;

  constructor(options: UpdateCheckPipelineOptions) {
    this.slot = options.slot;
    this.backend = options.backend;
    this.gate = options.gate;
    this.logger = options.logger;
    this.onProgress = options.onProgress ?? (() => undefined);
    this.onOutcome = options.onOutcome ?? (() => undefined);
  }

  startCheck(): Promise<StartCheckResult> {
    const lease = this.slot.tryAcquire('refreshing-cache');
    if (!lease) {
      this.logger.debug('updater.check.rejected', {
        code: 'already_running',
        state: this.slot.state
      });
      return Promise.resolve({
        ok: false,
        code: 'already_running',
        message: 'Já existe uma verificação ou instalação em andamento.'
      });
    }

    return this.run(lease).then((outcome): StartCheckResult => ({ ok: true, outcome }));
  }

  private async run(lease: PipelineLease): Promise<CheckOutcome> {
    try {
      return await this.execute(lease);
    } finally {
      // no-op quando finish já liberou; cobre falhas fora do backend
      lease.release();
    }
  }

  private async execute(lease: PipelineLease): Promise<CheckOutcome> {
    const forward = (event: ProgressEvent): void => {
      if (lease.isActive()) {
        this.notify('progress', () => this.onProgress(event));
      }
    };

    this.logger.info('updater.check.start', { backend: this.backend.kind });

    try {
      await this.backend.refreshCache(true, forward);
    } catch (error) {
      return this.fail(lease, 'cache_refresh_failed', error);
    }

    this.logger.info('updater.check.cache_refreshed', { backend: this.backend.kind });
    lease.advance('comparing-versions');

    let updates: UpdateRecord[];
    try {
      updates = await this.backend.getUpdates(forward);
    } catch (error) {
      return this.fail(lease, 'version_compare_failed', error);
    }

    const targetPlatform = this.gate.targetPlatform();
    const ids = uniqueInOrder(filterUpdates(updates, targetPlatform).map((update) => update.id));

    if (ids.length === 0) {
      this.logger.info('updater.check.finish', {
        outcome: 'up-to-date',
        discovered: updates.length,
        targetPlatform
      });
      return this.finish(lease, { kind: 'up-to-date' });
    }

    this.logger.info('updater.check.finish', {
      outcome: 'pending',
      discovered: updates.length,
      pending: ids.length,
      targetPlatform
    });
    return this.finish(lease, { kind: 'pending', ids: Object.freeze(ids) });
  }

  private fail(lease: PipelineLease, code: CheckFailureCode, error: unknown): CheckOutcome {
    const detail = error instanceof Error ? error.message : String(error);
    this.logger.error('updater.check.error', {
      backend: this.backend.kind,
      code,
      reason: detail
    });
    return this.finish(lease, { kind: 'failed', code, detail });
  }

  // libera o slot antes de reportar: o resultado é sempre o último evento da execução
  private finish(lease: PipelineLease, outcome: CheckOutcome): CheckOutcome {
    const frozen = Object.freeze(outcome);
    lease.release();
    this.notify('outcome', () => this.onOutcome(frozen));
    return frozen;
  }

  private notify(listener: 'progress' | 'outcome', call: () => void): void {
    try {
      call();
    } catch (error) {
      this.logger.warn('updater.check.listener_failed', {
        listener,
        reason: error instanceof Error ? error.message : String(error)
      });
    }
  }
}
