#!/usr/bin/env node
import 'dotenv/config';
import { parseArgs } from 'util';
import * as Sentry from '@sentry/node';
import { applySettings, loadConfig } from './utils/config';
import { logError, logOperation, logger, setLogLevel } from './utils/logger';
import { FileManager } from './utils/FileManager';
import { JobQueue } from './queue/JobQueue';
import { ExecutionController } from './download/core/ExecutionController';
import { InvalidUrlError } from './download/core/errors';
import { JobState } from './download/core/types';
import { RateLimiter, assertValidRate } from './download/throttle/RateLimiter';
import { createEngine } from './download/engines';
import { normalizeFormat, normalizeQuality } from './download/quality/presets';
import { ConsoleProgressSink } from './download/sinks/ConsoleProgressSink';
import { CompositeProgressSink, LoggingProgressSink } from './download/sinks/LoggingProgressSink';
import { HistoryStore } from './storage/HistoryStore';
import { SettingsStore } from './storage/SettingsStore';
import { FileCheckpointStore } from './storage/CheckpointStore';
import { AppConfig } from './types';

const USAGE =
  'Usage: media-queue <url...> [--quality q] [--format f] [--output dir] [--limit bytesPerSecond] [--resume]';

export interface CliOptions {
  urls: string[];
  quality?: string;
  format?: string;
  output?: string;
  limit?: number;
  resume: boolean;
  verbose: boolean;
  help: boolean;
}

/**
 * Parse command line arguments; throws on unknown flags or bad values
 */
export function parseCliArgs(argv: string[]): CliOptions {
  const { values, positionals } = parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      quality: { type: 'string', short: 'q' },
      format: { type: 'string', short: 'f' },
      output: { type: 'string', short: 'o' },
      limit: { type: 'string', short: 'l' },
      resume: { type: 'boolean', default: false },
      verbose: { type: 'boolean', short: 'v', default: false },
      help: { type: 'boolean', short: 'h', default: false },
    },
  });

  let quality: string | undefined;
  if (values.quality !== undefined) {
    quality = normalizeQuality(values.quality);
    if (!quality) throw new Error(`Unknown quality "${values.quality}"`);
  }

  let format: string | undefined;
  if (values.format !== undefined) {
    format = normalizeFormat(values.format);
    if (!format) throw new Error(`Unknown format "${values.format}"`);
  }

  let limit: number | undefined;
  if (values.limit !== undefined) {
    limit = values.limit.trim() === '' ? Number.NaN : Number(values.limit);
    assertValidRate(limit);
  }

  return {
    urls: positionals,
    quality,
    format,
    output: values.output,
    limit,
    resume: values.resume ?? false,
    verbose: values.verbose ?? false,
    help: values.help ?? false,
  };
}

function initializeSentry(config: AppConfig): void {
  if (!config.sentryDsn) return;
  Sentry.init({
    dsn: config.sentryDsn,
    tracesSampleRate: 1.0,
  });
}

/**
 * Run one batch over the given URLs; resolves with the process exit code
 */
export async function main(argv: string[] = process.argv.slice(2)): Promise<number> {
  let options: CliOptions;
  try {
    options = parseCliArgs(argv);
  } catch (error: unknown) {
    process.stderr.write(`${error instanceof Error ? error.message : String(error)}\n${USAGE}\n`);
    return 2;
  }

  if (options.help || (options.urls.length === 0 && !options.resume)) {
    process.stdout.write(`${USAGE}\n`);
    return options.help ? 0 : 2;
  }

  const baseConfig = loadConfig();
  const settings = new SettingsStore(baseConfig.dataDirectory);
  const config = applySettings(baseConfig, settings.getAll());

  setLogLevel(options.verbose ? 'debug' : config.logLevel);
  initializeSentry(config);

  const fileManager = new FileManager(options.output ?? config.downloadDirectory);
  await fileManager.initialize();

  const history = new HistoryStore(config.dataDirectory);
  const checkpoints = new FileCheckpointStore(config.dataDirectory);
  const queue = new JobQueue();
  const controller = new ExecutionController({
    queue,
    engine: createEngine(config, fileManager),
    limiter: new RateLimiter(options.limit ?? config.maxBytesPerSecond),
    sink: new CompositeProgressSink(new LoggingProgressSink(), new ConsoleProgressSink()),
    history,
    checkpoints,
    options: {
      resolveTimeoutMs: config.resolveTimeoutMs,
      progressIntervalMs: config.progressIntervalMs,
      progressIntervalBytes: config.progressIntervalBytes,
    },
  });

  let rejected = 0;
  for (const url of options.urls) {
    try {
      queue.enqueue(url, options.quality ?? config.defaultQuality, options.format ?? config.defaultFormat);
    } catch (error: unknown) {
      if (!(error instanceof InvalidUrlError)) throw error;
      rejected++;
      process.stderr.write(`${error.message}\n`);
    }
  }

  if (options.resume) {
    for (const job of controller.restoreCheckpoints()) {
      controller.resumeJob(job.id);
    }
  }

  const onInterrupt = (): void => {
    logger.warn('🛑 Interrupted, cancelling batch');
    controller.cancelAll();
  };
  process.once('SIGINT', onInterrupt);

  try {
    controller.startBatch();
    await controller.whenIdle();
  } finally {
    process.removeListener('SIGINT', onInterrupt);
    await Promise.all([history.flush(), checkpoints.flush(), settings.flush()]);
  }

  const failed = queue.inState(JobState.FAILED).length;
  const completed = queue.inState(JobState.COMPLETED).length;
  logOperation('🏁 Batch finished', { completed, failed, rejected });

  return failed > 0 || rejected > 0 ? 1 : 0;
}

if (require.main === module) {
  main()
    .then((code) => {
      process.exitCode = code;
    })
    .catch((error: unknown) => {
      logError(error instanceof Error ? error : new Error(String(error)), { operation: 'cli' });
      process.exitCode = 1;
    });
}
