/**
 * HttpEngine - Direct media files over HTTP(S)
 *
 * Resolution is a HEAD request. Transfers stream into "<name>.part" and continue from a
 * checkpoint with a Range request; a server that ignores the range restarts the file.
 */

import fs from 'fs';
import path from 'path';
import fetch, { Response } from 'node-fetch';
import { logger } from '../../utils/logger';
import { retryWithBackoff } from '../../utils/retryHelper';
import { FileManager } from '../../utils/FileManager';
import { BaseEngine, StopReason } from './BaseEngine';
import {
    ResolveError,
    TransferError,
    classifyResolveError,
    classifyTransferError,
    reasonForStatus,
} from '../core/errors';
import {
    EngineCheckpoint,
    ResolveOptions,
    ResolvedMedia,
    TransferOutcome,
    TransferRequest,
} from '../core/types';

export interface HttpEngineOptions {
    maxRetries?: number;
    retryBaseDelay?: number;
    userAgent?: string;
}

const DEFAULT_USER_AGENT = 'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36';

function writeChunk(stream: fs.WriteStream, chunk: Buffer): Promise<void> {
    return new Promise((resolve, reject) => {
        stream.write(chunk, (error) => (error ? reject(error) : resolve()));
    });
}

function closeStream(stream: fs.WriteStream): Promise<void> {
    return new Promise((resolve, reject) => {
        if (stream.closed || stream.destroyed) {
            resolve();
            return;
        }
        stream.once('error', reject);
        stream.end(() => resolve());
    });
}

/**
 * File name from a Content-Disposition header, if it carries one
 */
export function filenameFromDisposition(header: string | null): string | undefined {
    if (!header) return undefined;

    const encoded = /filename\*\s*=\s*(?:UTF-8|utf-8)''([^;]+)/.exec(header);
    if (encoded) {
        try {
            return decodeURIComponent(encoded[1].trim());
        } catch {
            return encoded[1].trim();
        }
    }

    const plain = /filename\s*=\s*"?([^";]+)"?/.exec(header);
    return plain ? plain[1].trim() : undefined;
}

/**
 * Total size from "bytes start-end/total"
 */
export function totalFromContentRange(header: string | null): number | null {
    const match = header ? /\/(\d+)\s*$/.exec(header) : null;
    return match ? parseInt(match[1], 10) : null;
}

function parseLength(header: string | null): number | null {
    if (header === null) return null;
    const value = parseInt(header, 10);
    return Number.isFinite(value) && value >= 0 ? value : null;
}

export class HttpEngine extends BaseEngine {
    readonly name = 'http';

    private readonly maxRetries: number;
    private readonly retryBaseDelay: number;
    private readonly userAgent: string;

    constructor(fileManager: FileManager, options: HttpEngineOptions = {}) {
        super(fileManager);
        this.maxRetries = options.maxRetries ?? 2;
        this.retryBaseDelay = options.retryBaseDelay ?? 1000;
        this.userAgent = options.userAgent ?? DEFAULT_USER_AGENT;
    }

    async resolve(url: string, options: ResolveOptions): Promise<ResolvedMedia> {
        return this.executeWithTracking(
            () =>
                retryWithBackoff(() => this.head(url, options.signal), {
                    maxRetries: this.maxRetries,
                    baseDelay: this.retryBaseDelay,
                    operationName: `[${this.name}] resolve`,
                    shouldRetry: (error) => error instanceof ResolveError && error.reason === 'unreachable',
                    signal: options.signal,
                }),
            'resolve',
        );
    }

    async transfer(request: TransferRequest): Promise<TransferOutcome> {
        const { partialPath, offset: startOffset } = await this.preparePartial(request);
        let offset = startOffset;
        const checkpointAt = (bytes: number): EngineCheckpoint => ({ offset: bytes, handle: partialPath });

        const early = this.pollSignals(request);
        if (early) {
            return this.stop(early, checkpointAt(offset));
        }

        let response: Response;
        try {
            response = await fetch(request.url, {
                headers: {
                    'User-Agent': this.userAgent,
                    ...(offset > 0 ? { Range: `bytes=${offset}-` } : {}),
                },
                signal: request.signal,
            });
        } catch (error: unknown) {
            if (this.pollSignals(request) === 'cancelled') {
                return this.stop('cancelled', checkpointAt(offset));
            }
            throw classifyTransferError(error, offset > 0 ? checkpointAt(offset) : null);
        }

        if (response.status === 416 && offset > 0) {
            // Nothing left to fetch: the partial file is already whole
            const outputPath = await this.fileManager.promote(partialPath);
            return { status: 'completed', bytesReceived: offset, outputPath };
        }
        if (!response.ok) {
            throw new TransferError(
                response.status >= 500 ? 'network' : 'unknown',
                `HTTP ${response.status} while downloading`,
                offset > 0 ? checkpointAt(offset) : null,
            );
        }
        if (offset > 0 && response.status !== 206) {
            logger.warn(`[${this.name}] Server ignored range request, restarting file`, {
                url: request.url,
                offset,
            });
            offset = 0;
        }

        const bytesTotal = response.status === 206
            ? totalFromContentRange(response.headers.get('content-range'))
            : parseLength(response.headers.get('content-length'));

        return this.streamBody(request, response, partialPath, offset, bytesTotal);
    }

    /**
     * Delete the partial file behind a checkpoint
     */
    async discard(checkpoint: EngineCheckpoint): Promise<void> {
        await this.fileManager.deleteFile(checkpoint.handle);
    }

    private async head(url: string, signal: AbortSignal): Promise<ResolvedMedia> {
        let response: Response;
        try {
            response = await fetch(url, {
                method: 'HEAD',
                headers: { 'User-Agent': this.userAgent },
                signal,
            });
        } catch (error: unknown) {
            throw classifyResolveError(error);
        }

        if (!response.ok) {
            throw new ResolveError(reasonForStatus(response.status), `HTTP ${response.status} for ${url}`);
        }

        const contentType = response.headers.get('content-type');
        const bytesTotal = parseLength(response.headers.get('content-length'));
        const title = filenameFromDisposition(response.headers.get('content-disposition'))
            ?? this.nameFromUrl(url);
        const extension = this.sanitizer.getExtensionFromMime(contentType) ?? path.extname(title);
        const mime = (contentType ?? '').toLowerCase();

        return {
            title,
            bytesTotal,
            availableFormats: [
                {
                    formatId: 'source',
                    extension: extension.replace(/^\./, '') || 'bin',
                    quality: 'source',
                    filesize: bytesTotal,
                    hasVideo: mime.startsWith('video/'),
                    hasAudio: mime.startsWith('audio/') || mime.startsWith('video/'),
                },
            ],
        };
    }

    /**
     * Locate (or allocate) the partial file and the offset to continue from
     */
    private async preparePartial(request: TransferRequest): Promise<{ partialPath: string; offset: number }> {
        const token = request.resumeToken;

        if (token) {
            const onDisk = await this.fileManager.getFileSize(token.handle);
            if (onDisk < token.offset) {
                logger.warn(`[${this.name}] Partial file shorter than checkpoint`, {
                    handle: token.handle,
                    onDisk,
                    checkpoint: token.offset,
                });
                return { partialPath: token.handle, offset: onDisk };
            }
            if (onDisk > token.offset) {
                // Bytes past the last acknowledged checkpoint are not trusted
                await this.fileManager.truncate(token.handle, token.offset);
            }
            return { partialPath: token.handle, offset: token.offset };
        }

        const candidate = request.title ?? this.nameFromUrl(request.url);
        const extension = (path.extname(candidate) || request.format === 'best') ? undefined : request.format;
        const name = this.sanitizer.buildOutputName(candidate, extension);
        const outputPath = await this.fileManager.allocateOutputPath(name);
        return { partialPath: this.fileManager.partialPathFor(outputPath), offset: 0 };
    }

    private async streamBody(
        request: TransferRequest,
        response: Response,
        partialPath: string,
        startOffset: number,
        bytesTotal: number | null,
    ): Promise<TransferOutcome> {
        const out = fs.createWriteStream(partialPath, { flags: startOffset > 0 ? 'a' : 'w' });
        let streamError: Error | null = null;
        out.on('error', (error) => {
            streamError = error;
        });

        let received = startOffset;
        let stopped: StopReason | null = null;
        const checkpoint = (): EngineCheckpoint => ({ offset: received, handle: partialPath });

        request.onProgress({ bytesReceived: received, bytesTotal, checkpoint: checkpoint() });

        try {
            for await (const chunk of response.body) {
                stopped = this.pollSignals(request);
                if (stopped) break;

                const buffer = typeof chunk === 'string' ? Buffer.from(chunk) : chunk;
                await request.throttle(buffer.length);

                // the wait may have been long; look again before committing the chunk
                stopped = this.pollSignals(request);
                if (stopped) break;

                await writeChunk(out, buffer);
                received += buffer.length;
                request.onProgress({ bytesReceived: received, bytesTotal, checkpoint: checkpoint() });
            }
            await closeStream(out);
        } catch (error: unknown) {
            out.destroy();
            if (this.pollSignals(request) === 'cancelled') {
                return this.stop('cancelled', checkpoint());
            }
            throw classifyTransferError(streamError ?? error, received > 0 ? checkpoint() : null);
        }

        if (stopped) {
            return this.stop(stopped, checkpoint());
        }

        if (bytesTotal !== null && received < bytesTotal) {
            throw new TransferError(
                'network',
                `Connection closed after ${received} of ${bytesTotal} bytes`,
                checkpoint(),
            );
        }

        const outputPath = await this.fileManager.promote(partialPath);
        return { status: 'completed', bytesReceived: received, outputPath };
    }

    private async stop(reason: StopReason, checkpoint: EngineCheckpoint): Promise<TransferOutcome> {
        if (reason === 'paused') {
            logger.info(`[${this.name}] Transfer paused`, { ...checkpoint });
            return { status: 'paused', checkpoint };
        }

        await this.discard(checkpoint);
        logger.info(`[${this.name}] Transfer cancelled`, { handle: checkpoint.handle });
        return { status: 'cancelled' };
    }

    private nameFromUrl(url: string): string {
        const parsed = new URL(url);
        const last = parsed.pathname.split('/').filter(Boolean).pop();
        if (!last) return parsed.hostname;
        try {
            return decodeURIComponent(last);
        } catch {
            return last;
        }
    }
}
