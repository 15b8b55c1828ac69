import os from 'node:os';
import path from 'node:path';

export function resolveBaseDir(): string {
  const explicit = process.env.UPDATER_HOME?.trim();
  if (explicit) {
    return explicit;
  }
  return path.join(os.homedir(), '.config', 'pkg-update-notifier');
}

export function resolveDebugLogMirrorPath(): string | null {
  const explicitPath = process.env.UPDATER_DEBUG_LOG_MIRROR?.trim();
  return explicitPath ? explicitPath : null;
}

export function readStringEnv(envName: string): string | undefined {
  const raw = process.env[envName]?.trim();
  return raw ? raw : undefined;
}

export function readPositiveIntEnv(envName: string): number | undefined {
  const raw = process.env[envName]?.trim();
  if (!raw) {
    return undefined;
  }
  const value = Number(raw);
  if (!Number.isFinite(value) || value <= 0) {
    return undefined;
  }
  return Math.trunc(value);
}
