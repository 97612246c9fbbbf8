import os from 'os';
import path from 'path';
import { z } from 'zod';
import { AppConfig } from '../types';
import { RateLimitConfigError } from '../download/core/errors';
import { assertValidRate } from '../download/throttle/RateLimiter';
import { normalizeFormat, normalizeQuality } from '../download/quality/presets';
import { defaultSettings, Settings } from '../storage/SettingsStore';

/**
 * Expand a leading "~" to the home directory
 */
export function expandHome(input: string): string {
  if (input === '~') return os.homedir();
  if (input.startsWith('~/') || input.startsWith('~\\')) {
    return path.join(os.homedir(), input.slice(2));
  }
  return input;
}

const intFrom = (fallback: number) =>
  z
    .string()
    .trim()
    .regex(/^-?\d+$/, 'must be an integer')
    .transform(Number)
    .optional()
    .transform((value) => value ?? fallback);

const EnvSchema = z.object({
  DOWNLOAD_DIRECTORY: z.string().min(1).default('~/Downloads'),
  DATA_DIRECTORY: z.string().min(1).default('./data'),
  MAX_BYTES_PER_SECOND: intFrom(0),
  RESOLVE_TIMEOUT: intFrom(30000).pipe(z.number().positive()),
  PROGRESS_INTERVAL_MS: intFrom(250).pipe(z.number().nonnegative()),
  PROGRESS_INTERVAL_BYTES: intFrom(1024 * 1024).pipe(z.number().nonnegative()),
  FETCH_ENGINE: z.enum(['http', 'yt-dlp']).default('yt-dlp'),
  YTDLP_PATH: z.string().min(1).default('yt-dlp'),
  YTDLP_COOKIES: z.string().min(1).optional(),
  DEFAULT_QUALITY: z.string().min(1).default('best'),
  DEFAULT_FORMAT: z.string().min(1).default('mp4'),
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly']).default('info'),
  SENTRY_DSN: z.string().min(1).optional(),
});

/**
 * Load configuration from environment variables
 * The entry point loads .env through dotenv before this runs
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  // Empty strings count as unset
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value !== ''),
  );

  const parsed = EnvSchema.safeParse(present);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new Error(`Invalid configuration ${issue?.path.join('.') ?? ''}: ${issue?.message ?? 'rejected'}`);
  }
  const values = parsed.data;

  assertValidRate(values.MAX_BYTES_PER_SECOND);

  const defaultQuality = normalizeQuality(values.DEFAULT_QUALITY);
  if (!defaultQuality) {
    throw new Error(`Invalid configuration DEFAULT_QUALITY: unknown quality "${values.DEFAULT_QUALITY}"`);
  }
  const defaultFormat = normalizeFormat(values.DEFAULT_FORMAT);
  if (!defaultFormat) {
    throw new Error(`Invalid configuration DEFAULT_FORMAT: unknown format "${values.DEFAULT_FORMAT}"`);
  }

  return {
    downloadDirectory: path.resolve(expandHome(values.DOWNLOAD_DIRECTORY)),
    dataDirectory: path.resolve(expandHome(values.DATA_DIRECTORY)),
    maxBytesPerSecond: values.MAX_BYTES_PER_SECOND,
    resolveTimeoutMs: values.RESOLVE_TIMEOUT,
    progressIntervalMs: values.PROGRESS_INTERVAL_MS,
    progressIntervalBytes: values.PROGRESS_INTERVAL_BYTES,
    engine: values.FETCH_ENGINE,
    ytDlpPath: values.YTDLP_PATH,
    ytDlpCookies: values.YTDLP_COOKIES,
    defaultQuality,
    defaultFormat,
    logLevel: values.LOG_LEVEL,
    sentryDsn: values.SENTRY_DSN,
  };
}

/**
 * Overlay stored user settings; only settings changed from their defaults take effect
 */
export function applySettings(config: AppConfig, settings: Settings): AppConfig {
  const defaults = defaultSettings();
  const next: AppConfig = { ...config };

  if (settings.downloadPath !== defaults.downloadPath) {
    next.downloadDirectory = path.resolve(expandHome(settings.downloadPath));
  }
  if (settings.speedLimit !== defaults.speedLimit) {
    if (settings.speedLimit < 0) throw new RateLimitConfigError(settings.speedLimit);
    next.maxBytesPerSecond = settings.speedLimit;
  }
  if (settings.defaultQuality !== defaults.defaultQuality) {
    next.defaultQuality = normalizeQuality(settings.defaultQuality) ?? next.defaultQuality;
  }
  if (settings.defaultFormat !== defaults.defaultFormat) {
    next.defaultFormat = normalizeFormat(settings.defaultFormat) ?? next.defaultFormat;
  }

  return next;
}
