import path from 'node:path';
import { spawnSync } from 'node:child_process';
import { existsSync } from 'node:fs';

export interface CommandResolution {
  found: boolean;
  path: string | null;
}

// ntpd e raspi-config ficam em sbin, que costuma faltar no PATH da sessão gráfica
const SYSTEM_PATH_SEGMENTS: Partial<Record<NodeJS.Platform, string[]>> = {
  linux: ['/usr/local/sbin', '/usr/local/bin', '/usr/sbin', '/usr/bin', '/sbin', '/bin'],
  darwin: ['/usr/local/bin', '/usr/bin', '/bin', '/usr/sbin', '/sbin']
};

export function buildCommandEnvironment(
  platform: NodeJS.Platform = process.platform,
  baseEnv: NodeJS.ProcessEnv = process.env
): NodeJS.ProcessEnv {
  const env = { ...baseEnv };
  const entries = splitPathEntries(baseEnv.PATH);
  for (const segment of SYSTEM_PATH_SEGMENTS[platform] ?? []) {
    if (!entries.includes(segment)) {
      entries.push(segment);
    }
  }
  if (entries.length > 0) {
    env.PATH = entries.join(path.delimiter);
  }
  return env;
}

export function resolveCommandBinary(commandName: string, platform: NodeJS.Platform = process.platform): CommandResolution {
  const normalized = commandName.trim();
  if (!normalized) {
    return { found: false, path: null };
  }

  if (path.isAbsolute(normalized)) {
    return existsSync(normalized) ? { found: true, path: normalized } : { found: false, path: null };
  }

  const env = buildCommandEnvironment(platform);
  const resolved = lookupWithWhich(normalized, env);
  if (resolved) {
    return { found: true, path: resolved };
  }

  for (const dir of splitPathEntries(env.PATH)) {
    const target = path.join(dir, normalized);
    if (existsSync(target)) {
      return { found: true, path: target };
    }
  }

  return { found: false, path: null };
}

function lookupWithWhich(commandName: string, env: NodeJS.ProcessEnv): string | null {
  try {
    const result = spawnSync('which', [commandName], {
      encoding: 'utf-8',
      env
    });
    return result.status === 0 ? readFirstOutputLine(result.stdout) : null;
  } catch {
    // sem `which`: busca manual no PATH
    return null;
  }
}

function splitPathEntries(value: string | undefined): string[] {
  if (typeof value !== 'string' || !value.trim()) {
    return [];
  }

  return value
    .split(path.delimiter)
    .map((entry) => entry.trim())
    .filter(Boolean);
}

function readFirstOutputLine(output: string | null | undefined): string | null {
  if (typeof output !== 'string') {
    return null;
  }

  const firstLine = output
    .split('\n')
    .map((line) => line.trim())
    .find(Boolean);

  return firstLine ?? null;
}
