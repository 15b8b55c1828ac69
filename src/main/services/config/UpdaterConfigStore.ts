import fs from 'node:fs';
import path from 'node:path';
import { z } from 'zod';
import type { UpdaterConfig } from '@shared/contracts';

const configSchema = z.object({
  interval: z.number().int().min(0)
});

const DEFAULT_CONFIG: UpdaterConfig = {
  interval: 24
};

export class UpdaterConfigStore {
  private readonly filePath: string;
  private cache: UpdaterConfig;

  constructor(baseDir: string) {
    const configDir = path.join(baseDir, 'config');
    fs.mkdirSync(configDir, { recursive: true });
    this.filePath = path.join(configDir, 'updater.config.json');
    this.cache = this.load();
  }

  get(): UpdaterConfig {
    return { ...this.cache };
  }

  setInterval(hours: number): UpdaterConfig {
    const parsed = configSchema.shape.interval.safeParse(hours);
    if (!parsed.success) {
      return this.get();
    }

    this.cache = { ...this.cache, interval: parsed.data };
    this.persist(this.cache);
    return this.get();
  }

  private load(): UpdaterConfig {
    if (!fs.existsSync(this.filePath)) {
      this.persist(DEFAULT_CONFIG);
      return { ...DEFAULT_CONFIG };
    }

    const stored = this.readStored();
    if (stored) {
      return stored;
    }

    this.persist(DEFAULT_CONFIG);
    return { ...DEFAULT_CONFIG };
  }

  private readStored(): UpdaterConfig | null {
    try {
      const raw = fs.readFileSync(this.filePath, 'utf-8');
      const parsed = configSchema.safeParse(JSON.parse(raw));
      return parsed.success ? parsed.data : null;
    } catch {
      return null;
    }
  }

  private persist(config: UpdaterConfig): void {
    fs.writeFileSync(this.filePath, JSON.stringify(config, null, 2), 'utf-8');
  }
}
