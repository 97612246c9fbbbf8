/**
 * Error taxonomy for the download queue
 * Engine failures are converted into job transitions; only InvalidStateError reaches command callers
 */

import {
    EngineCheckpoint,
    ErrorKind,
    JobState,
    ResolveFailureReason,
    TransferFailureReason,
} from './types';

export abstract class DownloadQueueError extends Error {
    abstract readonly kind: ErrorKind;

    constructor(message: string) {
        super(message);
        this.name = new.target.name;
    }
}

export class InvalidUrlError extends DownloadQueueError {
    readonly kind = ErrorKind.INVALID_URL;

    constructor(readonly url: string, reason: string) {
        super(`Invalid media URL "${url}": ${reason}`);
    }
}

export class InvalidStateError extends DownloadQueueError {
    readonly kind = ErrorKind.INVALID_STATE;

    constructor(
        readonly command: string,
        readonly jobId?: string,
        readonly state?: JobState,
    ) {
        super(
            jobId
                ? `Cannot ${command} job ${jobId} in state ${state ?? 'unknown'}`
                : `Cannot ${command}: no job accepts this command`,
        );
    }
}

export class ResolveError extends DownloadQueueError {
    readonly kind = ErrorKind.RESOLVE;

    constructor(readonly reason: ResolveFailureReason, message: string) {
        super(message);
    }
}

export class TransferError extends DownloadQueueError {
    readonly kind = ErrorKind.TRANSFER;

    constructor(
        readonly reason: TransferFailureReason,
        message: string,
        readonly checkpoint: EngineCheckpoint | null = null,
    ) {
        super(message);
    }
}

export class RateLimitConfigError extends DownloadQueueError {
    readonly kind = ErrorKind.RATE_LIMIT_CONFIG;

    constructor(readonly value: number) {
        super(`Invalid bandwidth limit ${value}: expected a non-negative number of bytes per second`);
    }
}

// ============================================================================
// Classification of arbitrary thrown values
// ============================================================================

const STORAGE_FULL_CODES = new Set(['ENOSPC', 'EDQUOT', 'EFBIG']);
const DISK_CODES = new Set(['EACCES', 'EPERM', 'EROFS', 'EIO', 'EISDIR', 'ENOENT', 'EMFILE']);
const NETWORK_CODES = new Set([
    'ENOTFOUND',
    'ECONNREFUSED',
    'ECONNRESET',
    'ETIMEDOUT',
    'EAI_AGAIN',
    'EHOSTUNREACH',
    'ENETUNREACH',
    'EPIPE',
]);

function errorCode(error: unknown): string | undefined {
    if (typeof error === 'object' && error !== null && 'code' in error) {
        const code = error.code;
        return typeof code === 'string' ? code : undefined;
    }
    return undefined;
}

function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

/**
 * Map an HTTP status to a resolve failure reason
 */
export function reasonForStatus(status: number): ResolveFailureReason {
    if (status === 401 || status === 403 || status === 451) return 'restricted';
    if (status === 404 || status === 410) return 'not_found';
    if (status === 408 || status === 504) return 'timeout';
    if (status >= 500) return 'unreachable';
    return 'unknown';
}

export function classifyResolveError(error: unknown): ResolveError {
    if (error instanceof ResolveError) return error;

    const message = errorMessage(error);
    const code = errorCode(error);

    if (code && NETWORK_CODES.has(code)) {
        return new ResolveError(code === 'ETIMEDOUT' ? 'timeout' : 'unreachable', message);
    }

    const lower = message.toLowerCase();
    if (lower.includes('timeout') || lower.includes('timed out')) {
        return new ResolveError('timeout', message);
    }
    if (lower.includes('private') || lower.includes('sign in') || lower.includes('forbidden') || lower.includes('403')) {
        return new ResolveError('restricted', message);
    }
    if (lower.includes('not found') || lower.includes('unavailable') || lower.includes('404')) {
        return new ResolveError('not_found', message);
    }
    if (lower.includes('unable to download webpage') || lower.includes('getaddrinfo')) {
        return new ResolveError('unreachable', message);
    }

    return new ResolveError('unknown', message);
}

export function classifyTransferError(
    error: unknown,
    checkpoint: EngineCheckpoint | null = null,
): TransferError {
    if (error instanceof TransferError) return error;

    const message = errorMessage(error);
    const code = errorCode(error);

    if (code && STORAGE_FULL_CODES.has(code)) {
        return new TransferError('storage_full', message, checkpoint);
    }
    if (code && DISK_CODES.has(code)) {
        return new TransferError('disk', message, checkpoint);
    }
    if (code && NETWORK_CODES.has(code)) {
        return new TransferError('network', message, checkpoint);
    }

    const lower = message.toLowerCase();
    if (lower.includes('no space left') || lower.includes('quota')) {
        return new TransferError('storage_full', message, checkpoint);
    }
    if (lower.includes('network') || lower.includes('socket') || lower.includes('connection')) {
        return new TransferError('network', message, checkpoint);
    }

    return new TransferError('unknown', message, checkpoint);
}
