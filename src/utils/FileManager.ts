import fs from 'fs/promises';
import path from 'path';
import { logger } from './logger';

export const PARTIAL_SUFFIX = '.part';

/**
 * FileManager - Output and partial files in the download directory
 * A transfer writes to "<name>.part" and is renamed to its final name once complete
 */
export class FileManager {
  private readonly downloadDir: string;

  constructor(downloadDirectory: string) {
    this.downloadDir = downloadDirectory;
  }

  getDownloadDirectory(): string {
    return this.downloadDir;
  }

  /**
   * Initialize download directory (create if doesn't exist)
   */
  async initialize(): Promise<void> {
    try {
      await fs.mkdir(this.downloadDir, { recursive: true });
      logger.info('📁 Download directory initialized', { path: this.downloadDir });
    } catch (error) {
      logger.error('Failed to create download directory', { error });
      throw error;
    }
  }

  /**
   * A final path for the file name that does not collide with an existing file or partial
   */
  async allocateOutputPath(filename: string): Promise<string> {
    const ext = path.extname(filename);
    const base = filename.slice(0, filename.length - ext.length);

    for (let attempt = 0; attempt < 1000; attempt++) {
      const name = attempt === 0 ? filename : `${base} (${attempt})${ext}`;
      const candidate = path.join(this.downloadDir, name);
      const taken =
        (await this.fileExists(candidate)) ||
        (await this.fileExists(this.partialPathFor(candidate)));
      if (!taken) {
        return candidate;
      }
    }

    throw new Error(`No free file name for ${filename}`);
  }

  partialPathFor(outputPath: string): string {
    return `${outputPath}${PARTIAL_SUFFIX}`;
  }

  outputPathFor(partialPath: string): string {
    return partialPath.endsWith(PARTIAL_SUFFIX)
      ? partialPath.slice(0, -PARTIAL_SUFFIX.length)
      : partialPath;
  }

  /**
   * Move a finished partial file to its final name
   */
  async promote(partialPath: string): Promise<string> {
    const outputPath = this.outputPathFor(partialPath);
    await fs.rename(partialPath, outputPath);
    logger.info('✅ Download saved', { path: outputPath });
    return outputPath;
  }

  /**
   * Delete a file; a file that is already gone is not an error
   */
  async deleteFile(filePath: string): Promise<void> {
    try {
      await fs.unlink(filePath);
      logger.info('🗑️ File deleted', { path: filePath });
    } catch (error: unknown) {
      if (!this.isMissing(error)) {
        throw error;
      }
    }
  }

  /**
   * Get file size in bytes, 0 when the file does not exist
   */
  async getFileSize(filePath: string): Promise<number> {
    try {
      const stats = await fs.stat(filePath);
      return stats.size;
    } catch (error: unknown) {
      if (this.isMissing(error)) {
        return 0;
      }
      throw error;
    }
  }

  /**
   * Cut a partial file back to the checkpointed length
   */
  async truncate(filePath: string, length: number): Promise<void> {
    await fs.truncate(filePath, length);
  }

  /**
   * Check if file exists
   */
  async fileExists(filePath: string): Promise<boolean> {
    try {
      await fs.access(filePath);
      return true;
    } catch {
      return false;
    }
  }

  private isMissing(error: unknown): boolean {
    return (
      typeof error === 'object' &&
      error !== null &&
      'code' in error &&
      error.code === 'ENOENT'
    );
  }
}
