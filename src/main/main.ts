#!/usr/bin/env node
import readline from 'node:readline';
import { readPositiveIntEnv, readStringEnv, resolveBaseDir, resolveDebugLogMirrorPath } from '@main/bootstrap-env';
import { UpdaterConfigStore } from '@main/services/config/UpdaterConfigStore';
import { EnvironmentGate } from '@main/services/environment/EnvironmentGate';
import { SystemEnvironmentSensor } from '@main/services/environment/SystemEnvironmentSensor';
import { Logger } from '@main/services/logging/Logger';
import { ConsoleUpdateSurface } from '@main/services/updater/ConsoleUpdateSurface';
import { NoopPackageBackend } from '@main/services/updater/PackageBackend';
import { PrivilegedInstallerLauncher } from '@main/services/updater/PrivilegedInstallerLauncher';
import { UpdateNotifier } from '@main/services/updater/UpdateNotifier';
import { handleControlMessage } from '@main/services/updater/control-channel';

const HELP_TEXT = 'Comandos: check | install | show | interval <horas>';

function bootstrap(): void {
  const baseDir = resolveBaseDir();
  const logger = new Logger(baseDir, {
    mirrorFilePath: resolveDebugLogMirrorPath()
  });
  const configStore = new UpdaterConfigStore(baseDir);
  const gate = new EnvironmentGate(
    new SystemEnvironmentSensor({ wizardProcessName: readStringEnv('UPDATER_WIZARD_PROCESS') }),
    logger
  );
  const installer = new PrivilegedInstallerLauncher({
    logger,
    installerCommand: readStringEnv('UPDATER_INSTALLER_COMMAND'),
    askpassPath: readStringEnv('UPDATER_SUDO_ASKPASS') ?? null
  });
  const pollSeconds = readPositiveIntEnv('UPDATER_NET_POLL_SECONDS');
  const notifier = new UpdateNotifier({
    backend: new NoopPackageBackend(),
    installer,
    gate,
    configStore,
    logger,
    pollIntervalMs: pollSeconds ? pollSeconds * 1000 : undefined
  });

  const print = (line: string): void => {
    process.stdout.write(`${line}\n`);
  };
  const surface = new ConsoleUpdateSurface(notifier.events, print);
  surface.attach();

  const input = readline.createInterface({ input: process.stdin, terminal: false });
  input.on('line', (line) => {
    if (!line.trim()) {
      return;
    }
    if (!handleControlMessage(notifier, line, { logger, print })) {
      print(HELP_TEXT);
    }
  });

  const shutdown = (signal: string): void => {
    logger.info('app.shutdown', { signal });
    notifier.stop();
    surface.detach();
    input.close();
  };
  process.once('SIGINT', () => shutdown('SIGINT'));
  process.once('SIGTERM', () => shutdown('SIGTERM'));

  logger.info('app.bootstrap', {
    baseDir,
    interval: configStore.get().interval,
    pollSeconds: pollSeconds ?? null
  });
  notifier.start();
}

bootstrap();
