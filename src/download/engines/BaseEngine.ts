/**
 * BaseEngine - Shared plumbing for fetch engines: signal polling and timing logs
 */

import { logger } from '../../utils/logger';
import { FileManager } from '../../utils/FileManager';
import { FileSanitizer } from '../security/FileSanitizer';
import {
    FetchEngine,
    ResolveOptions,
    ResolvedMedia,
    TransferOutcome,
    TransferRequest,
} from '../core/types';

export type StopReason = 'paused' | 'cancelled';

export abstract class BaseEngine implements FetchEngine {
    abstract readonly name: string;

    protected readonly sanitizer = new FileSanitizer();

    constructor(protected readonly fileManager: FileManager) {}

    abstract resolve(url: string, options: ResolveOptions): Promise<ResolvedMedia>;

    abstract transfer(request: TransferRequest): Promise<TransferOutcome>;

    /**
     * Check the controller's flags; cancel wins over pause
     */
    protected pollSignals(request: TransferRequest): StopReason | null {
        if (request.shouldCancel() || request.signal.aborted) return 'cancelled';
        if (request.shouldPause()) return 'paused';
        return null;
    }

    /**
     * Execute with timing logs
     */
    protected async executeWithTracking<T>(
        operation: () => Promise<T>,
        operationName: string,
    ): Promise<T> {
        const startTime = Date.now();

        try {
            const result = await operation();
            logger.debug(`[${this.name}] ${operationName} succeeded`, {
                responseTime: Date.now() - startTime,
            });
            return result;
        } catch (error: unknown) {
            logger.warn(`[${this.name}] ${operationName} failed`, {
                error: error instanceof Error ? error.message : String(error),
                responseTime: Date.now() - startTime,
            });
            throw error;
        }
    }
}
