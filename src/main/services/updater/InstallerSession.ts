import type { UpdateId } from '@shared/contracts';
import type { EnvironmentGate } from '@main/services/environment/EnvironmentGate';
import type { LogSink } from '@main/services/logging/Logger';
import type { PackageBackend } from '@main/services/updater/PackageBackend';
import { PipelineSlot } from '@main/services/updater/PipelineSlot';
import { UpdateCheckPipeline } from '@main/services/updater/UpdateCheckPipeline';
import { describeCheckFailure, describeProgress, STAGE_MESSAGES } from '@main/services/updater/progress-messages';

export interface InstallerLine {
  kind: 'progress' | 'error' | 'done';
  message: string;
  fraction: number | null;
}

export interface InstallerSessionResult {
  exitCode: 0 | 1;
  installed: UpdateId[];
}

interface InstallerSessionOptions {
  backend: PackageBackend;
  gate: Pick<EnvironmentGate, 'targetPlatform'>;
  logger: LogSink;
  report: (line: InstallerLine) => void;
}

/**
 * The privileged side of an install: refresh, compare and install in one
 * process, reporting one line per stage or progress tick.
 */
export class InstallerSession {
  private readonly backend: PackageBackend;
  private readonly gate: Pick<EnvironmentGate, 'targetPlatform'>;
  private readonly logger: LogSink;
  private readonly report: (line: InstallerLine) => void;

  constructor(options: InstallerSessionOptions) {
    this.backend = options.backend;
    this.gate = options.gate;
    this.logger = options.logger;
    this.report = options.report;
  }

  async run(requestedIds: readonly UpdateId[] = []): Promise<InstallerSessionResult> {
    const slot = new PipelineSlot((state) => {
      if (state === 'comparing-versions') {
        this.progress(STAGE_MESSAGES.comparing);
      }
    });
    const pipeline = new UpdateCheckPipeline({
      slot,
      backend: this.backend,
      gate: this.gate,
      logger: this.logger,
      onProgress: (event) => this.report({ kind: 'progress', ...describeProgress(event) })
    });

    this.progress(STAGE_MESSAGES.refreshing);
    const checked = await pipeline.startCheck();
    if (!checked.ok) {
      return this.fail(checked.message);
    }

    const outcome = checked.outcome;
    if (outcome.kind === 'failed') {
      return this.fail(describeCheckFailure(outcome));
    }

    const ids = outcome.kind === 'pending' ? restrictTo(outcome.ids, requestedIds) : [];
    if (ids.length === 0) {
      this.logger.info('updater.installer.nothing_to_install', { requested: requestedIds.length });
      return this.done([]);
    }

    const lease = slot.tryAcquire('installing');
    if (!lease) {
      return this.fail('Já existe uma verificação ou instalação em andamento.');
    }

    try {
      this.progress(STAGE_MESSAGES.installing);
      this.logger.info('updater.installer.install_start', { count: ids.length });
      await this.backend.installPackages(ids, (event) => {
        if (lease.isActive()) {
          this.report({ kind: 'progress', ...describeProgress(event) });
        }
      });
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      this.logger.error('updater.installer.install_error', { reason });
      return this.fail(`Erro instalando pacotes - ${reason}`);
    } finally {
      lease.release();
    }

    this.logger.info('updater.installer.install_finish', { count: ids.length });
    return this.done(ids);
  }

  private progress(message: string): void {
    this.report({ kind: 'progress', message, fraction: null });
  }

  private fail(message: string): InstallerSessionResult {
    this.report({ kind: 'error', message, fraction: null });
    return { exitCode: 1, installed: [] };
  }

  private done(installed: UpdateId[]): InstallerSessionResult {
    this.report({ kind: 'done', message: STAGE_MESSAGES.upToDate, fraction: null });
    return { exitCode: 0, installed };
  }
}

function restrictTo(pending: readonly UpdateId[], requested: readonly UpdateId[]): UpdateId[] {
  if (requested.length === 0) {
    return pending.slice();
  }
  const allowed = new Set(requested);
  return pending.filter((id) => allowed.has(id));
}
