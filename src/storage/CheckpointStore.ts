import path from 'path';
import { z } from 'zod';
import { CheckpointStore, ResumeToken } from '../download/core/types';
import { JsonFileStore } from './JsonFileStore';

const ResumeTokenSchema = z.object({
  jobId: z.string(),
  sourceUrl: z.string(),
  format: z.string(),
  quality: z.string(),
  title: z.string().optional(),
  bytesTotal: z.number().nullable(),
  offset: z.number().nonnegative(),
  handle: z.string(),
  savedAt: z.string(),
});

const CheckpointFileSchema = z.record(ResumeTokenSchema);

/**
 * FileCheckpointStore - Resume tokens by job id in checkpoints.json
 * Progress checkpoints arrive per chunk, so writes are debounced
 */
export class FileCheckpointStore
  extends JsonFileStore<Record<string, ResumeToken>>
  implements CheckpointStore {
  constructor(dataDir: string = './data', debounceMs: number = 1000) {
    super(path.join(dataDir, 'checkpoints.json'), CheckpointFileSchema, () => ({}), debounceMs);
  }

  save(token: ResumeToken): void {
    this.data[token.jobId] = token;
    this.scheduleSave();
  }

  remove(jobId: string): void {
    if (jobId in this.data) {
      delete this.data[jobId];
      this.scheduleSave();
    }
  }

  list(): ResumeToken[] {
    return Object.values(this.data);
  }
}
