import fs from 'fs';
import { promises as fsPromises } from 'fs';
import path from 'path';
import { z } from 'zod';
import { logger } from '../utils/logger';

/**
 * JsonFileStore - A JSON document on disk, validated on load and saved atomically
 * Saves are debounced; flush() writes immediately (used on shutdown)
 */
export abstract class JsonFileStore<T> {
  protected data: T;
  protected readonly filePath: string;
  private saveTimeout?: NodeJS.Timeout;
  private saveInProgress: Promise<void> | null = null;
  private dirty = false;

  protected constructor(
    filePath: string,
    private readonly schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    private readonly defaults: () => T,
    private readonly debounceMs: number = 1000,
  ) {
    this.filePath = filePath;

    const dir = path.dirname(filePath);
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
    }

    this.data = this.load();
  }

  /**
   * Load data from disk, falling back to defaults for a missing or malformed file
   */
  private load(): T {
    if (!fs.existsSync(this.filePath)) {
      return this.defaults();
    }

    try {
      const raw: unknown = JSON.parse(fs.readFileSync(this.filePath, 'utf-8'));
      const parsed = this.schema.safeParse(raw);
      if (!parsed.success) {
        logger.warn('💾 Stored data is malformed, using defaults', {
          file: this.filePath,
          issues: parsed.error.issues.length,
        });
        return this.defaults();
      }
      return parsed.data;
    } catch (error: unknown) {
      logger.error('Failed to load stored data', {
        file: this.filePath,
        error: error instanceof Error ? error.message : String(error),
      });
      return this.defaults();
    }
  }

  /**
   * Schedule a debounced save
   */
  protected scheduleSave(): void {
    this.dirty = true;
    if (this.saveTimeout) {
      clearTimeout(this.saveTimeout);
    }

    this.saveTimeout = setTimeout(() => {
      this.saveTimeout = undefined;
      this.flush().catch((error: unknown) => {
        logger.error('Debounced save failed', {
          file: this.filePath,
          error: error instanceof Error ? error.message : String(error),
        });
      });
    }, this.debounceMs);
    this.saveTimeout.unref();
  }

  /**
   * Write pending changes now
   */
  async flush(): Promise<void> {
    if (this.saveTimeout) {
      clearTimeout(this.saveTimeout);
      this.saveTimeout = undefined;
    }
    while (this.saveInProgress) {
      await this.saveInProgress;
    }
    if (!this.dirty) {
      return;
    }

    this.dirty = false;
    this.saveInProgress = this.performSave();
    try {
      await this.saveInProgress;
    } catch (error: unknown) {
      this.dirty = true;
      throw error;
    } finally {
      this.saveInProgress = null;
    }
  }

  /**
   * Atomic write: write to temp file, then rename
   */
  private async performSave(): Promise<void> {
    const tempPath = `${this.filePath}.tmp`;
    await fsPromises.writeFile(tempPath, JSON.stringify(this.data, null, 2), 'utf-8');
    await fsPromises.rename(tempPath, this.filePath);
    logger.debug('💾 Data saved to storage', { file: this.filePath });
  }
}
