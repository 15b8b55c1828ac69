import type {
  CheckOutcome,
  InstallResult,
  PendingUpdateRow,
  StartCheckResult,
  UpdateId,
  UpdaterConfig,
  UpdaterSnapshot
} from '@shared/contracts';
import type { UpdaterConfigStore } from '@main/services/config/UpdaterConfigStore';
import type { EnvironmentGate } from '@main/services/environment/EnvironmentGate';
import type { LogSink } from '@main/services/logging/Logger';
import { InstallPipeline } from '@main/services/updater/InstallPipeline';
import type { PackageBackend, PackageInstaller } from '@main/services/updater/PackageBackend';
import { PipelineSlot } from '@main/services/updater/PipelineSlot';
import { ScheduleController, type ScheduleTarget } from '@main/services/updater/ScheduleController';
import { UpdateCheckPipeline } from '@main/services/updater/UpdateCheckPipeline';
import { UpdaterEvents } from '@main/services/updater/UpdaterEvents';
import { describeCheckFailure } from '@main/services/updater/progress-messages';
import { toPendingRows } from '@main/services/updater/update-id';

export const UPDATES_AVAILABLE_MESSAGE = 'Atualizações disponíveis\nClique no ícone de atualização para instalar';

interface UpdateNotifierOptions {
  backend: PackageBackend;
  installer: PackageInstaller;
  gate: EnvironmentGate;
  configStore: Pick<UpdaterConfigStore, 'get' | 'setInterval'>;
  logger: LogSink;
  events?: UpdaterEvents;
  pollIntervalMs?: number;
}

/**
 * Single owner of the updater state: pipeline slot, last outcome, pending
 * ids, icon flag and (through ScheduleController) the timers. UI layers only
 * see it through `events` and the snapshot.
 */
export class UpdateNotifier implements ScheduleTarget {
  readonly events: UpdaterEvents;
  private readonly slot: PipelineSlot;
  private readonly checkPipeline: UpdateCheckPipeline;
  private readonly installPipeline: InstallPipeline;
  private readonly scheduler: ScheduleController;
  private readonly configStore: Pick<UpdaterConfigStore, 'get' | 'setInterval'>;
  private readonly logger: LogSink;
  private lastOutcome: CheckOutcome | null = null;
  private pendingIds: UpdateId[] = [];
  private iconVisible = false;
  private checkedAt: string | null = null;

  constructor(options: UpdateNotifierOptions) {
    this.events = options.events ?? new UpdaterEvents(options.logger);
    this.configStore = options.configStore;
    this.logger = options.logger;
    this.slot = new PipelineSlot((state) => this.events.emit('pipeline-state', state));
    this.checkPipeline = new UpdateCheckPipeline({
      slot: this.slot,
      backend: options.backend,
      gate: options.gate,
      logger: options.logger,
      onProgress: (event) => this.events.emit('progress', event),
      onOutcome: (outcome) => this.applyOutcome(outcome)
    });
    this.installPipeline = new InstallPipeline({
      slot: this.slot,
      installer: options.installer,
      gate: options.gate,
      logger: options.logger,
      onProgress: (event) => this.events.emit('progress', event)
    });
    this.scheduler = new ScheduleController({
      target: this,
      gate: options.gate,
      logger: options.logger,
      intervalHours: this.configStore.get().interval,
      pollIntervalMs: options.pollIntervalMs
    });
  }

  start(): void {
    this.logger.info('updater.notifier.start', { intervalHours: this.scheduler.getIntervalHours() });
    this.scheduler.start();
  }

  stop(): void {
    this.scheduler.stop();
    this.logger.info('updater.notifier.stop', {});
  }

  startCheck(): Promise<StartCheckResult> {
    return this.checkPipeline.startCheck();
  }

  checkNow(): Promise<StartCheckResult> {
    return this.scheduler.triggerManualCheck();
  }

  hideIcon(): void {
    this.setIconVisible(false);
  }

  async requestInstall(): Promise<InstallResult> {
    const result = await this.installPipeline.startInstall(this.pendingIds);
    if (result.ok) {
      const outcome: CheckOutcome = { kind: 'up-to-date' };
      this.pendingIds = [];
      this.lastOutcome = Object.freeze(outcome);
      this.setIconVisible(false);
      this.events.emit('outcome', outcome);
    } else {
      this.events.emit('error', { code: result.code, message: result.message });
    }

    this.events.emit('install-result', result);
    return result;
  }

  listPendingUpdates(): PendingUpdateRow[] {
    return toPendingRows(this.pendingIds);
  }

  setCheckInterval(hours: number): UpdaterConfig {
    const config = this.configStore.setInterval(hours);
    this.scheduler.reconfigure(config.interval);
    return config;
  }

  getSnapshot(): UpdaterSnapshot {
    return {
      pipelineState: this.slot.state,
      scheduleState: this.scheduler.getState(),
      iconVisible: this.iconVisible,
      lastOutcome: this.lastOutcome,
      pendingIds: this.pendingIds.slice(),
      checkedAt: this.checkedAt,
      interval: this.scheduler.getIntervalHours()
    };
  }

  private applyOutcome(outcome: CheckOutcome): void {
    this.lastOutcome = outcome;
    this.checkedAt = new Date().toISOString();

    switch (outcome.kind) {
      case 'pending':
        this.pendingIds = outcome.ids.slice();
        this.setIconVisible(true);
        this.events.emit('outcome', outcome);
        this.events.emit('notification', {
          message: UPDATES_AVAILABLE_MESSAGE,
          count: outcome.ids.length
        });
        return;
      case 'up-to-date':
        this.pendingIds = [];
        this.setIconVisible(false);
        this.events.emit('outcome', outcome);
        return;
      case 'failed':
        // ícone e lista pendente ficam como estavam; só o erro é reportado
        this.events.emit('outcome', outcome);
        this.events.emit('error', { code: outcome.code, message: describeCheckFailure(outcome) });
        return;
    }
  }

  private setIconVisible(visible: boolean): void {
    if (this.iconVisible === visible) {
      return;
    }
    this.iconVisible = visible;
    this.events.emit('icon', { visible });
  }
}
