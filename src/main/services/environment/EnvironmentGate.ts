import type { LogSink } from '@main/services/logging/Logger';
import type { EnvironmentSensor } from '@main/services/environment/SystemEnvironmentSensor';

type SensorName = keyof EnvironmentSensor;

/**
 * Boolean view over the environment sensors. A sensor that throws reads as
 * `false`, so callers fall back to "try again later". For `targetPlatform`
 * that means the architecture filter stays on.
 */
export class EnvironmentGate {
  constructor(
    private readonly sensor: EnvironmentSensor,
    private readonly logger: LogSink
  ) {}

  networkAvailable(): boolean {
    return this.read('isNetworkAvailable');
  }

  clockSynced(): boolean {
    return this.read('isClockSynchronized');
  }

  installerWizardRunning(): boolean {
    return this.read('isInstallerWizardRunning');
  }

  targetPlatform(): boolean {
    return this.read('isTargetPlatform');
  }

  private read(name: SensorName): boolean {
    try {
      return this.sensor[name]() === true;
    } catch (error) {
      this.logger.warn('updater.environment.sensor_failed', {
        sensor: name,
        reason: error instanceof Error ? error.message : String(error)
      });
      return false;
    }
  }
}
