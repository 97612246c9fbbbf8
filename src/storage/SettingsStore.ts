import os from 'os';
import path from 'path';
import { z } from 'zod';
import { assertValidRate } from '../download/throttle/RateLimiter';
import { logger } from '../utils/logger';
import { JsonFileStore } from './JsonFileStore';

const SettingsSchema = z.object({
  theme: z.enum(['system', 'light', 'dark']).default('system'),
  downloadPath: z.string().min(1).default(path.join(os.homedir(), 'Downloads')),
  autoPlay: z.boolean().default(false),
  defaultQuality: z.string().min(1).default('best'),
  defaultFormat: z.string().min(1).default('mp4'),
  clipboardMonitoring: z.boolean().default(true),
  // bytes per second, 0 = unlimited
  speedLimit: z.number().int().nonnegative().default(0),
});

export type Settings = z.infer<typeof SettingsSchema>;

export function defaultSettings(): Settings {
  return SettingsSchema.parse({});
}

/**
 * SettingsStore - User preferences kept in settings.json
 * Missing keys take their defaults; a malformed file is replaced by defaults
 */
export class SettingsStore extends JsonFileStore<Settings> {
  constructor(dataDir: string = './data') {
    super(path.join(dataDir, 'settings.json'), SettingsSchema, defaultSettings, 0);
  }

  get<K extends keyof Settings>(key: K): Settings[K] {
    return this.data[key];
  }

  getAll(): Settings {
    return { ...this.data };
  }

  async set<K extends keyof Settings>(key: K, value: Settings[K]): Promise<void> {
    if (key === 'speedLimit' && typeof value === 'number') {
      assertValidRate(value);
    }

    const next = SettingsSchema.safeParse({ ...this.data, [key]: value });
    if (!next.success) {
      throw new Error(`Invalid value for setting ${String(key)}: ${next.error.issues[0]?.message ?? 'rejected'}`);
    }

    this.data = next.data;
    logger.info('⚙️ Setting updated', { key, value });
    this.scheduleSave();
    await this.flush();
  }
}
