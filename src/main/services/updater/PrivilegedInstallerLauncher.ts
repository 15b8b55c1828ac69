import { spawn, type SpawnOptions } from 'node:child_process';
import type { UpdateId } from '@shared/contracts';
import { buildCommandEnvironment } from '@main/services/environment/command-resolution';
import type { LogSink } from '@main/services/logging/Logger';
import type { PackageInstaller, ProgressListener } from '@main/services/updater/PackageBackend';

export interface ChildProcessLike {
  once(event: 'error', listener: (error: Error) => void): unknown;
  once(event: 'exit', listener: (code: number | null, signal: NodeJS.Signals | null) => void): unknown;
}

export type SpawnFn = (command: string, args: string[], options: SpawnOptions) => ChildProcessLike;

interface PrivilegedInstallerLauncherOptions {
  logger: LogSink;
  installerCommand?: string;
  sudoCommand?: string;
  askpassPath?: string | null;
  spawnFn?: SpawnFn;
}

/**
 * Runs the installer as a privileged child process and resolves when it
 * exits cleanly. The child does its own refresh and install; the ids passed
 * here only restrict what it may install.
 */
export class PrivilegedInstallerLauncher implements PackageInstaller {
  private readonly logger: LogSink;
  private readonly installerCommand: string;
  private readonly sudoCommand: string;
  private readonly askpassPath: string | null;
  private readonly spawnFn: SpawnFn;

  constructor(options: PrivilegedInstallerLauncherOptions) {
    this.logger = options.logger;
    this.installerCommand = normalizeCommandName(options.installerCommand, 'pkg-update-installer');
    this.sudoCommand = normalizeCommandName(options.sudoCommand, 'sudo');
    this.askpassPath = normalizeOptionalPath(options.askpassPath);
    this.spawnFn = options.spawnFn ?? ((command, args, spawnOptions) => spawn(command, args, spawnOptions));
  }

  installPackages(ids: readonly UpdateId[], onProgress?: ProgressListener): Promise<void> {
    const args = [...(this.askpassPath ? ['-A'] : []), this.installerCommand, ...ids];
    const env = buildCommandEnvironment();
    if (this.askpassPath) {
      env.SUDO_ASKPASS = this.askpassPath;
    }

    this.logger.info('updater.install.launch', {
      command: this.sudoCommand,
      args,
      askpass: this.askpassPath
    });

    return new Promise<void>((resolve, reject) => {
      let child: ChildProcessLike;
      try {
        child = this.spawnFn(this.sudoCommand, args, {
          stdio: 'ignore',
          env
        });
      } catch (error) {
        reject(error instanceof Error ? error : new Error(String(error)));
        return;
      }

      onProgress?.({ phase: 'install', percent: null });

      let settled = false;
      child.once('error', (error) => {
        if (settled) {
          return;
        }
        settled = true;
        this.logger.error('updater.install.launch_error', { reason: error.message });
        reject(error);
      });
      child.once('exit', (code, signal) => {
        if (settled) {
          return;
        }
        settled = true;
        if (code === 0) {
          this.logger.info('updater.install.launch_exit', { code });
          resolve();
          return;
        }

        const reason = signal ? `instalador encerrado pelo sinal ${signal}` : `instalador saiu com código ${code ?? 'desconhecido'}`;
        this.logger.error('updater.install.launch_exit', { code, signal, reason });
        reject(new Error(reason));
      });
    });
  }
}

function normalizeCommandName(value: string | undefined, fallback: string): string {
  const normalized = typeof value === 'string' ? value.trim() : '';
  return normalized.length > 0 ? normalized : fallback;
}

function normalizeOptionalPath(value: string | null | undefined): string | null {
  if (typeof value !== 'string') {
    return null;
  }
  const normalized = value.trim();
  return normalized ? normalized : null;
}
