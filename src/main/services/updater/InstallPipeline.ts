import type { InstallResult, ProgressEvent, UpdateId } from '@shared/contracts';
import type { EnvironmentGate } from '@main/services/environment/EnvironmentGate';
import type { LogSink } from '@main/services/logging/Logger';
import type { PackageInstaller } from '@main/services/updater/PackageBackend';
import type { PipelineSlot } from '@main/services/updater/PipelineSlot';

interface InstallPipelineOptions {
  slot: PipelineSlot;
  installer: PackageInstaller;
  gate: Pick<EnvironmentGate, 'networkAvailable' | 'clockSynced'>;
  logger: LogSink;
  onProgress?: (event: ProgressEvent) => void;
}

export class InstallPipeline {
  private readonly slot: PipelineSlot;
  private readonly installer: PackageInstaller;
  private readonly gate: Pick<EnvironmentGate, 'networkAvailable' | 'clockSynced'>;
  private readonly logger: LogSink;
  private readonly onProgress: (event: ProgressEvent) => void;

  constructor(options: InstallPipelineOptions) {
    this.slot = options.slot;
    this.installer = options.installer;
    this.gate = options.gate;
    this.logger = options.logger;
    this.onProgress = options.onProgress ?? (() => undefined);
  }

  async startInstall(ids: readonly UpdateId[]): Promise<InstallResult> {
    // precondições são relidas a cada chamada; o resultado do último check não vale aqui
    if (!this.gate.networkAvailable()) {
      this.logger.warn('updater.install.precondition_failed', { code: 'no_network' });
      return {
        ok: false,
        code: 'no_network',
        message: 'Sem conexão de rede - não é possível instalar atualizações.'
      };
    }

    if (!this.gate.clockSynced()) {
      this.logger.warn('updater.install.precondition_failed', { code: 'clock_not_synced' });
      return {
        ok: false,
        code: 'clock_not_synced',
        message: 'Relógio não sincronizado - não é possível instalar atualizações. Tente novamente em alguns minutos.'
      };
    }

    if (ids.length === 0) {
      return {
        ok: false,
        code: 'nothing_to_install',
        message: 'Nenhuma atualização pendente para instalar.'
      };
    }

    const lease = this.slot.tryAcquire('installing');
    if (!lease) {
      this.logger.debug('updater.install.rejected', {
        code: 'already_running',
        state: this.slot.state
      });
      return {
        ok: false,
        code: 'already_running',
        message: 'Já existe uma verificação ou instalação em andamento.'
      };
    }

    const requested = ids.slice();
    this.logger.info('updater.install.start', { count: requested.length });

    try {
      await this.installer.installPackages(requested, (event) => {
        if (lease.isActive()) {
          this.forwardProgress(event);
        }
      });
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      this.logger.error('updater.install.error', {
        code: 'install_failed',
        reason
      });
      return {
        ok: false,
        code: 'install_failed',
        message: `Erro ao instalar pacotes - ${reason}`
      };
    } finally {
      lease.release();
    }

    this.logger.info('updater.install.finish', { count: requested.length });
    return { ok: true, installed: requested };
  }

  private forwardProgress(event: ProgressEvent): void {
    try {
      this.onProgress(event);
    } catch (error) {
      this.logger.warn('updater.install.listener_failed', {
        listener: 'progress',
        reason: error instanceof Error ? error.message : String(error)
      });
    }
  }
}
