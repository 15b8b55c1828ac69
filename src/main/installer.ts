#!/usr/bin/env node
import { resolveBaseDir, resolveDebugLogMirrorPath } from '@main/bootstrap-env';
import { EnvironmentGate } from '@main/services/environment/EnvironmentGate';
import { SystemEnvironmentSensor } from '@main/services/environment/SystemEnvironmentSensor';
import { Logger } from '@main/services/logging/Logger';
import { InstallerSession, type InstallerLine } from '@main/services/updater/InstallerSession';
import { NoopPackageBackend } from '@main/services/updater/PackageBackend';

async function main(): Promise<number> {
  const logger = new Logger(resolveBaseDir(), {
    mirrorFilePath: resolveDebugLogMirrorPath()
  });
  const session = new InstallerSession({
    backend: new NoopPackageBackend(),
    gate: new EnvironmentGate(new SystemEnvironmentSensor(), logger),
    logger,
    report: (line) => writeLine(line)
  });

  const requestedIds = process.argv.slice(2).filter((arg) => arg.trim().length > 0);
  logger.info('installer.start', { requested: requestedIds.length });
  const result = await session.run(requestedIds);
  logger.info('installer.finish', { exitCode: result.exitCode, installed: result.installed.length });
  return result.exitCode;
}

function writeLine(line: InstallerLine): void {
  const suffix = line.fraction === null ? '' : ` ${Math.round(line.fraction * 100)}%`;
  const stream = line.kind === 'error' ? process.stderr : process.stdout;
  stream.write(`${line.message}${suffix}\n`);
}

main().then(
  (exitCode) => {
    process.exitCode = exitCode;
  },
  (error: unknown) => {
    process.stderr.write(`${error instanceof Error ? error.message : String(error)}\n`);
    process.exitCode = 1;
  }
);
