import { spawnSync } from 'node:child_process';
import {
  buildCommandEnvironment,
  resolveCommandBinary,
  type CommandResolution
} from '@main/services/environment/command-resolution';

export interface EnvironmentSensor {
  isNetworkAvailable(): boolean;
  isClockSynchronized(): boolean;
  isInstallerWizardRunning(): boolean;
  isTargetPlatform(): boolean;
}

/** Exit status of `sh -c <script>`, or null when the shell could not run it. */
export type ShellRunner = (script: string) => number | null;

interface SystemEnvironmentSensorOptions {
  runShell?: ShellRunner;
  resolveCommand?: (commandName: string) => CommandResolution;
  wizardProcessName?: string;
}

export class SystemEnvironmentSensor implements EnvironmentSensor {
  private readonly runShell: ShellRunner;
  private readonly resolveCommand: (commandName: string) => CommandResolution;
  private readonly wizardProcessName: string;

  constructor(options: SystemEnvironmentSensorOptions = {}) {
    this.runShell = options.runShell ?? runShellScript;
    this.resolveCommand = options.resolveCommand ?? ((commandName) => resolveCommandBinary(commandName));
    this.wizardProcessName = normalizeProcessName(options.wizardProcessName, 'piwiz');
  }

  isNetworkAvailable(): boolean {
    return this.runShell("hostname -I | grep -q '\\.'") === 0;
  }

  isClockSynchronized(): boolean {
    if (this.resolveCommand('/usr/sbin/ntpd').found) {
      return this.runShell("ntpq -p | grep -q '^\\*'") === 0;
    }

    return this.runShell('timedatectl status | grep -q "synchronized: yes"') === 0;
  }

  isInstallerWizardRunning(): boolean {
    return this.runShell(`ps ax | grep -v grep | grep -q ${this.wizardProcessName}`) === 0;
  }

  isTargetPlatform(): boolean {
    if (!this.resolveCommand('raspi-config').found) {
      return false;
    }

    return this.runShell('raspi-config nonint is_pi') === 0;
  }
}

function runShellScript(script: string): number | null {
  const result = spawnSync('sh', ['-c', script], {
    stdio: 'ignore',
    env: buildCommandEnvironment()
  });
  if (result.error) {
    return null;
  }
  return result.status;
}

function normalizeProcessName(value: string | undefined, fallback: string): string {
  const normalized = typeof value === 'string' ? value.trim() : '';
  return /^[A-Za-z0-9._-]+$/.test(normalized) ? normalized : fallback;
}
