import type { StartCheckResult } from '@shared/contracts';
import type { EnvironmentGate } from '@main/services/environment/EnvironmentGate';
import type { LogSink } from '@main/services/logging/Logger';

export type ScheduleState = 'idle' | 'awaiting-network';
export type CheckTrigger = 'startup' | 'network-restored' | 'periodic' | 'manual';

export interface ScheduleTarget {
  startCheck(): Promise<StartCheckResult>;
  hideIcon(): void;
}

interface ScheduleControllerOptions {
  target: ScheduleTarget;
  gate: Pick<EnvironmentGate, 'networkAvailable' | 'installerWizardRunning'>;
  logger: LogSink;
  intervalHours: number;
  pollIntervalMs?: number;
  onStateChange?: (state: ScheduleState) => void;
}

type TimeoutHandle = ReturnType<typeof setTimeout>;
type IntervalHandle = ReturnType<typeof setInterval>;

const MS_PER_HOUR = 60 * 60 * 1000;
const DEFAULT_POLL_INTERVAL_MS = 60 * 1000;
// timers do Node tratam atrasos acima de 2^31-1 ms como 1 ms
const MAX_TIMER_DELAY_MS = 2 ** 31 - 1;

export class ScheduleController {
  private readonly target: ScheduleTarget;
  private readonly gate: Pick<EnvironmentGate, 'networkAvailable' | 'installerWizardRunning'>;
  private readonly logger: LogSink;
  private readonly pollIntervalMs: number;
  private readonly onStateChange: (state: ScheduleState) => void;
  private intervalHours: number;
  private periodicTimer: TimeoutHandle | null = null;
  private pollTimer: IntervalHandle | null = null;
  private state: ScheduleState = 'idle';

  constructor(options: ScheduleControllerOptions) {
    this.target = options.target;
    this.gate = options.gate;
    this.logger = options.logger;
    this.intervalHours = normalizeHours(options.intervalHours);
    this.pollIntervalMs = normalizePollInterval(options.pollIntervalMs);
    this.onStateChange = options.onStateChange ?? (() => undefined);
  }

  getState(): ScheduleState {
    return this.state;
  }

  getIntervalHours(): number {
    return this.intervalHours;
  }

  hasPeriodicTimer(): boolean {
    return this.periodicTimer !== null;
  }

  start(): void {
    this.target.hideIcon();
    this.armPeriodicTimer();

    if (this.gate.installerWizardRunning()) {
      this.logger.info('updater.schedule.startup_skipped', { reason: 'installer_wizard_running' });
      return;
    }

    if (this.gate.networkAvailable()) {
      this.fireCheck('startup');
      return;
    }

    this.logger.info('updater.schedule.network_poll_start', { pollIntervalMs: this.pollIntervalMs });
    this.armPollTimer();
  }

  stop(): void {
    this.clearPeriodicTimer();
    this.clearPollTimer();
  }

  triggerManualCheck(): Promise<StartCheckResult> {
    this.target.hideIcon();
    return this.runCheck('manual');
  }

  reconfigure(intervalHours: number): void {
    this.intervalHours = normalizeHours(intervalHours);
    this.armPeriodicTimer();
    this.logger.info('updater.schedule.reconfigured', {
      intervalHours: this.intervalHours,
      periodic: this.periodicTimer !== null
    });
  }

  private armPeriodicTimer(): void {
    this.clearPeriodicTimer();
    if (this.intervalHours === 0) {
      return;
    }

    this.schedulePeriodicTick(this.intervalHours * MS_PER_HOUR);
  }

  // intervalos acima do atraso máximo são encadeados em vários setTimeout,
  // sempre com um único handle armado
  private schedulePeriodicTick(remainingMs: number): void {
    const delayMs = Math.min(remainingMs, MAX_TIMER_DELAY_MS);
    this.periodicTimer = setTimeout(() => {
      this.periodicTimer = null;
      const leftMs = remainingMs - delayMs;
      if (leftMs > 0) {
        this.schedulePeriodicTick(leftMs);
        return;
      }

      this.schedulePeriodicTick(this.intervalHours * MS_PER_HOUR);
      this.fireCheck('periodic');
    }, delayMs);
  }

  private clearPeriodicTimer(): void {
    if (this.periodicTimer === null) {
      return;
    }
    clearTimeout(this.periodicTimer);
    this.periodicTimer = null;
  }

  private armPollTimer(): void {
    if (this.pollTimer !== null) {
      return;
    }

    this.pollTimer = setInterval(() => {
      this.handlePollTick();
    }, this.pollIntervalMs);
    this.setState('awaiting-network');
  }

  private clearPollTimer(): void {
    if (this.pollTimer === null) {
      return;
    }
    clearInterval(this.pollTimer);
    this.pollTimer = null;
    this.setState('idle');
  }

  private handlePollTick(): void {
    if (!this.gate.networkAvailable()) {
      this.logger.debug('updater.schedule.network_poll_tick', { networkAvailable: false });
      return;
    }

    this.clearPollTimer();
    this.logger.info('updater.schedule.network_restored', {});
    this.fireCheck('network-restored');
  }

  private runCheck(trigger: CheckTrigger): Promise<StartCheckResult> {
    this.logger.debug('updater.schedule.check_requested', { trigger });
    // executor síncrono: um throw de startCheck vira rejeição tratada em fireCheck
    return new Promise<StartCheckResult>((resolve) => resolve(this.target.startCheck())).then((result) => {
      if (!result.ok) {
        this.logger.debug('updater.schedule.check_dropped', { trigger, code: result.code });
      }
      return result;
    });
  }

  private fireCheck(trigger: Exclude<CheckTrigger, 'manual'>): void {
    void this.runCheck(trigger).catch((error: unknown) => {
      this.logger.error('updater.schedule.check_crashed', {
        trigger,
        reason: error instanceof Error ? error.message : String(error)
      });
    });
  }

  private setState(next: ScheduleState): void {
    if (this.state === next) {
      return;
    }
    this.state = next;
    this.onStateChange(next);
  }
}

function normalizeHours(value: number): number {
  return Number.isFinite(value) && value > 0 ? Math.trunc(value) : 0;
}

function normalizePollInterval(value: number | undefined): number {
  return typeof value === 'number' && Number.isFinite(value) && value > 0 ? Math.trunc(value) : DEFAULT_POLL_INTERVAL_MS;
}
