/**
 * YtDlpEngine - Fetch engine backed by the yt-dlp executable
 * Covers most media platforms; resumes through yt-dlp's own ".part" files (--continue)
 */

import { spawn } from 'child_process';
import path from 'path';
import { z } from 'zod';
import { BaseEngine, StopReason } from './BaseEngine';
import { FileManager } from '../../utils/FileManager';
import { logger } from '../../utils/logger';
import { buildFormatSelector, isAudioFormat } from '../quality/presets';
import { ResolveError, TransferError, classifyResolveError, classifyTransferError } from '../core/errors';
import {
    EngineCheckpoint,
    MediaFormat,
    ResolveOptions,
    ResolvedMedia,
    TransferOutcome,
    TransferRequest,
} from '../core/types';

// URL validation schema
const UrlSchema = z
    .string()
    .url()
    .refine(
        (url) => !url.includes(';') && !url.includes('|') && !url.includes('&&'),
        { message: 'Invalid URL format' },
    );

const YtDlpFormatSchema = z.object({
    format_id: z.string(),
    ext: z.string(),
    height: z.number().nullish(),
    filesize: z.number().nullish(),
    filesize_approx: z.number().nullish(),
    vcodec: z.string().nullish(),
    acodec: z.string().nullish(),
    format_note: z.string().nullish(),
});

const YtDlpInfoSchema = z.object({
    title: z.string().default('Unknown'),
    filesize: z.number().nullish(),
    filesize_approx: z.number().nullish(),
    formats: z.array(YtDlpFormatSchema).default([]),
});

type YtDlpFormat = z.infer<typeof YtDlpFormatSchema>;

export interface YtDlpEngineOptions {
    binaryPath?: string;
    /** How often a running transfer looks at the pause/cancel flags */
    pollIntervalMs?: number;
    cookies?: string;
}

export const PROGRESS_PREFIX = '[progress]';
export const FILE_PREFIX = '[file]';

const PROGRESS_TEMPLATE =
    `download:${PROGRESS_PREFIX} %(progress.downloaded_bytes)s %(progress.total_bytes)s %(progress.total_bytes_estimate)s`;

function parseCount(value: string | undefined): number | null {
    if (value === undefined || value === 'NA' || value === 'None') return null;
    const parsed = parseFloat(value);
    return Number.isFinite(parsed) && parsed >= 0 ? Math.round(parsed) : null;
}

/**
 * Folds per-stream counters into one running total.
 * yt-dlp restarts downloaded_bytes for each stream of a merged download.
 */
export class StreamProgressTracker {
    private base = 0;
    private streamBytes = 0;
    private streamTotal: number | null = null;

    constructor(private readonly floor = 0) {}

    update(downloaded: number, total: number | null): void {
        if (downloaded < this.streamBytes) {
            this.base += this.streamTotal ?? this.streamBytes;
        }
        this.streamBytes = downloaded;
        this.streamTotal = total;
    }

    get bytesReceived(): number {
        return Math.max(this.floor, this.base + this.streamBytes);
    }

    get bytesTotal(): number | null {
        return this.streamTotal === null ? null : this.base + this.streamTotal;
    }
}

export class YtDlpEngine extends BaseEngine {
    readonly name = 'yt-dlp';

    private readonly binaryPath: string;
    private readonly pollIntervalMs: number;
    private readonly cookies?: string;

    constructor(fileManager: FileManager, options: YtDlpEngineOptions = {}) {
        super(fileManager);
        this.binaryPath = options.binaryPath ?? 'yt-dlp';
        this.pollIntervalMs = options.pollIntervalMs ?? 200;
        this.cookies = options.cookies;
    }

    async resolve(url: string, options: ResolveOptions): Promise<ResolvedMedia> {
        const parsedUrl = UrlSchema.safeParse(url);
        if (!parsedUrl.success) {
            throw new ResolveError('unknown', `Refusing to pass URL to yt-dlp: ${url}`);
        }

        return this.executeWithTracking(async () => {
            const args = [
                '--dump-json',
                '--no-playlist',
                '--no-warnings',
                '--skip-download',
                ...this.cookieArgs(),
                parsedUrl.data,
            ];

            const output = await this.run(args, options.signal);

            let raw: unknown;
            try {
                raw = JSON.parse(output);
            } catch {
                throw new ResolveError('unknown', 'yt-dlp returned unreadable metadata');
            }

            const info = YtDlpInfoSchema.safeParse(raw);
            if (!info.success) {
                throw new ResolveError('unknown', `Unexpected metadata: ${info.error.issues[0]?.message ?? 'invalid'}`);
            }

            return {
                title: info.data.title,
                bytesTotal: info.data.filesize ?? info.data.filesize_approx ?? null,
                availableFormats: this.parseFormats(info.data.formats),
            };
        }, 'resolve');
    }

    async transfer(request: TransferRequest): Promise<TransferOutcome> {
        const outputTemplate = request.resumeToken?.handle
            ?? path.join(this.fileManager.getDownloadDirectory(), '%(title)s [%(id)s].%(ext)s');
        const tracker = new StreamProgressTracker(request.resumeToken?.offset ?? 0);
        const checkpoint = (): EngineCheckpoint => ({ offset: tracker.bytesReceived, handle: outputTemplate });

        // yt-dlp paces itself with --limit-rate; the bytes it moved still count against the shared limiter
        let charged = tracker.bytesReceived;
        const charge = (): void => {
            const delta = tracker.bytesReceived - charged;
            if (delta > 0) {
                request.account(delta);
                charged = tracker.bytesReceived;
            }
        };

        for (;;) {
            const early = this.pollSignals(request);
            if (early === 'paused') return { status: 'paused', checkpoint: checkpoint() };
            if (early === 'cancelled') return { status: 'cancelled' };

            const rate = request.maxBytesPerSecond();
            const outcome = await this.runTransfer(request, outputTemplate, rate, tracker, checkpoint, charge);
            if (outcome !== 'restart') {
                return outcome;
            }

            logger.info(`[${this.name}] Bandwidth limit changed, restarting transfer`, {
                url: request.url,
                offset: tracker.bytesReceived,
                maxBytesPerSecond: request.maxBytesPerSecond(),
            });
        }
    }

    /**
     * One yt-dlp run; resolves 'restart' when the bandwidth ceiling moved away from rate
     */
    private runTransfer(
        request: TransferRequest,
        outputTemplate: string,
        rate: number,
        tracker: StreamProgressTracker,
        checkpoint: () => EngineCheckpoint,
        charge: () => void,
    ): Promise<TransferOutcome | 'restart'> {
        const args = this.buildTransferArgs(request, outputTemplate, rate);

        return new Promise<TransferOutcome | 'restart'>((resolve, reject) => {
            const proc = spawn(this.binaryPath, args, { stdio: ['ignore', 'pipe', 'pipe'] });

            let stopped: StopReason | 'restart' | null = null;
            let settled = false;
            let outputPath: string | undefined;
            const errorLines: string[] = [];
            const pending = { stdout: '', stderr: '' };

            const stop = (reason: StopReason | 'restart'): void => {
                if (stopped) return;
                stopped = reason;
                proc.kill('SIGTERM');
            };
            const onAbort = (): void => stop('cancelled');
            const poll = setInterval(() => {
                const reason = this.pollSignals(request);
                if (reason) {
                    stop(reason);
                } else if (request.maxBytesPerSecond() !== rate) {
                    stop('restart');
                }
            }, this.pollIntervalMs);
            request.signal.addEventListener('abort', onAbort, { once: true });

            const cleanup = (): void => {
                clearInterval(poll);
                request.signal.removeEventListener('abort', onAbort);
            };

            const handleLine = (line: string, fromStderr: boolean): void => {
                const trimmed = line.trim();
                if (trimmed.startsWith(PROGRESS_PREFIX)) {
                    const [downloaded, total, estimate] = trimmed.slice(PROGRESS_PREFIX.length).trim().split(/\s+/);
                    const bytes = parseCount(downloaded);
                    if (bytes === null) return;
                    tracker.update(bytes, parseCount(total) ?? parseCount(estimate));
                    charge();
                    request.onProgress({
                        bytesReceived: tracker.bytesReceived,
                        bytesTotal: tracker.bytesTotal,
                        checkpoint: checkpoint(),
                    });
                } else if (trimmed.startsWith(FILE_PREFIX)) {
                    outputPath = trimmed.slice(FILE_PREFIX.length).trim();
                } else if (fromStderr && trimmed) {
                    errorLines.push(trimmed);
                }
            };

            const consume = (stream: 'stdout' | 'stderr') => (data: Buffer): void => {
                const lines = (pending[stream] + data.toString()).split(/\r?\n/);
                pending[stream] = lines.pop() ?? '';
                lines.forEach((line) => handleLine(line, stream === 'stderr'));
            };

            proc.stdout.on('data', consume('stdout'));
            proc.stderr.on('data', consume('stderr'));

            proc.on('error', (error) => {
                cleanup();
                if (settled) return;
                settled = true;
                reject(new TransferError('unknown', `Could not start ${this.binaryPath}: ${error.message}`));
            });

            proc.on('close', (code) => {
                cleanup();
                if (settled) return;
                settled = true;
                handleLine(pending.stdout, false);
                handleLine(pending.stderr, true);

                if (stopped === 'paused') {
                    logger.info(`[${this.name}] Transfer paused`, { ...checkpoint() });
                    resolve({ status: 'paused', checkpoint: checkpoint() });
                } else if (stopped === 'cancelled') {
                    logger.info(`[${this.name}] Transfer cancelled`, { url: request.url });
                    resolve({ status: 'cancelled' });
                } else if (stopped === 'restart') {
                    resolve('restart');
                } else if (code === 0) {
                    resolve({ status: 'completed', bytesReceived: tracker.bytesReceived, outputPath });
                } else {
                    const message = errorLines[errorLines.length - 1] ?? `yt-dlp exited with code ${code}`;
                    reject(classifyTransferError(new Error(message), tracker.bytesReceived > 0 ? checkpoint() : null));
                }
            });
        });
    }

    /**
     * Build download arguments
     */
    private buildTransferArgs(request: TransferRequest, outputTemplate: string, rate: number): string[] {
        const { selector, extraArgs } = buildFormatSelector(request.quality, request.format);
        const args = ['-f', selector, ...extraArgs];

        if (!isAudioFormat(request.format) && request.format !== 'best') {
            args.push('--merge-output-format', request.format);
        }
        if (rate > 0) {
            args.push('--limit-rate', String(rate));
        }

        args.push(
            '-o', outputTemplate,
            '--continue',
            '--no-playlist',
            '--no-mtime',
            '--no-warnings',
            '--newline',
            '--progress',
            '--progress-template', PROGRESS_TEMPLATE,
            '--print', `after_move:${FILE_PREFIX} %(filepath)s`,
            ...this.cookieArgs(),
            request.url,
        );

        return args;
    }

    private cookieArgs(): string[] {
        return this.cookies ? ['--cookies', this.cookies] : [];
    }

    /**
     * Parse yt-dlp formats into our format
     */
    private parseFormats(formats: YtDlpFormat[]): MediaFormat[] {
        return formats
            .filter((f) => f.vcodec !== 'none' || f.acodec !== 'none')
            .map((f) => ({
                formatId: f.format_id,
                extension: f.ext,
                quality: f.height ? `${f.height}p` : (f.format_note ?? 'unknown'),
                filesize: f.filesize ?? f.filesize_approx ?? null,
                hasVideo: f.vcodec !== 'none',
                hasAudio: f.acodec !== 'none',
            }));
    }

    /**
     * Execute yt-dlp and collect stdout; an aborted signal kills the process
     */
    private run(args: string[], signal: AbortSignal): Promise<string> {
        return new Promise((resolve, reject) => {
            let output = '';
            let errorOutput = '';

            const proc = spawn(this.binaryPath, args, { stdio: ['ignore', 'pipe', 'pipe'] });
            const onAbort = (): void => {
                proc.kill('SIGKILL');
            };
            signal.addEventListener('abort', onAbort, { once: true });

            proc.stdout.on('data', (data: Buffer) => {
                output += data.toString();
            });
            proc.stderr.on('data', (data: Buffer) => {
                errorOutput += data.toString();
            });

            proc.on('error', (error) => {
                signal.removeEventListener('abort', onAbort);
                reject(new ResolveError('unknown', `Could not start ${this.binaryPath}: ${error.message}`));
            });

            proc.on('close', (code) => {
                signal.removeEventListener('abort', onAbort);
                if (code === 0) {
                    resolve(output);
                } else if (signal.aborted) {
                    reject(new ResolveError('timeout', 'yt-dlp was stopped before it finished'));
                } else {
                    reject(classifyResolveError(new Error(errorOutput.trim() || `yt-dlp exited with code ${code}`)));
                }
            });
        });
    }
}
