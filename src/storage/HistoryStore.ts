import path from 'path';
import { z } from 'zod';
import { ErrorKind, HistoryRecord, HistoryRecorder, JobState } from '../download/core/types';
import { logger } from '../utils/logger';
import { JsonFileStore } from './JsonFileStore';

const HistoryRecordSchema = z.object({
  jobId: z.string(),
  sourceUrl: z.string(),
  title: z.string().optional(),
  format: z.string(),
  quality: z.string(),
  state: z.enum([JobState.COMPLETED, JobState.FAILED, JobState.CANCELLED]),
  startedAt: z.string().nullable(),
  finishedAt: z.string(),
  bytesTotal: z.number().nullable(),
  errorKind: z.nativeEnum(ErrorKind).optional(),
  errorReason: z.string().optional(),
});

const HistorySchema = z.array(HistoryRecordSchema);

export interface HistoryStats {
  total: number;
  completed: number;
  failed: number;
  cancelled: number;
}

/**
 * HistoryStore - Append-only download history kept in download_history.json
 */
export class HistoryStore extends JsonFileStore<HistoryRecord[]> implements HistoryRecorder {
  constructor(dataDir: string = './data') {
    super(path.join(dataDir, 'download_history.json'), HistorySchema, () => [], 0);
  }

  async record(entry: HistoryRecord): Promise<void> {
    this.data.push(entry);
    logger.debug('📜 History entry added', { jobId: entry.jobId, state: entry.state });
    this.scheduleSave();
    await this.flush();
  }

  /**
   * Most recent entries first
   */
  list(limit: number = 50): HistoryRecord[] {
    if (limit <= 0) return [];
    return this.data.slice(-limit).reverse();
  }

  stats(): HistoryStats {
    return {
      total: this.data.length,
      completed: this.data.filter((r) => r.state === JobState.COMPLETED).length,
      failed: this.data.filter((r) => r.state === JobState.FAILED).length,
      cancelled: this.data.filter((r) => r.state === JobState.CANCELLED).length,
    };
  }

  async clear(): Promise<void> {
    this.data = [];
    this.scheduleSave();
    await this.flush();
    logger.info('🗑️ Download history cleared');
  }
}
