/**
 * ExecutionController - Runs the job queue one job at a time
 *
 * A single batch loop owns every job mutation that happens during execution. Control
 * commands only raise per-job signal flags (and abort the job's AbortController); the
 * engine polls those flags between chunks, so no command ever waits on a transfer.
 */

import { JobQueue } from '../../queue/JobQueue';
import { logError, logger } from '../../utils/logger';
import { RateLimiter } from '../throttle/RateLimiter';
import {
    InvalidStateError,
    ResolveError,
    classifyResolveError,
    classifyTransferError,
} from './errors';
import { applyTransition, isTerminal, JobTransition } from './JobStateMachine';
import { ProgressThrottle, RateMeter } from './ProgressThrottle';
import {
    CheckpointStore,
    ControllerOptions,
    EngineCheckpoint,
    ErrorKind,
    FetchEngine,
    HistoryRecord,
    HistoryRecorder,
    Job,
    JobError,
    JobState,
    JobView,
    ProgressEventType,
    ProgressSink,
    ResolvedMedia,
    ResumeToken,
    TransferProgress,
} from './types';

interface JobSignal {
    pause: boolean;
    cancel: boolean;
    readonly abort: AbortController;
    /** Fires on pause or cancel; cuts short a limiter wait */
    readonly wake: AbortController;
}

interface ActiveJob {
    job: Job;
    signal: JobSignal;
}

type RunOutcome = 'completed' | 'paused' | 'cancelled' | 'failed';

class CancellationRequested extends Error {
    constructor() {
        super('Cancelled by request');
    }
}

export const DEFAULT_CONTROLLER_OPTIONS: ControllerOptions = {
    resolveTimeoutMs: 30000,
    progressIntervalMs: 250,
    progressIntervalBytes: 1024 * 1024,
};

export interface ExecutionControllerDeps {
    queue: JobQueue;
    engine: FetchEngine;
    limiter: RateLimiter;
    sink: ProgressSink;
    history: HistoryRecorder;
    checkpoints?: CheckpointStore;
    options?: Partial<ControllerOptions>;
    sleep?: (ms: number, signal: AbortSignal) => Promise<void>;
}

/**
 * Wait for ms, or until the signal fires
 */
const defaultSleep = (ms: number, signal: AbortSignal): Promise<void> =>
    new Promise((resolve) => {
        if (signal.aborted) {
            resolve();
            return;
        }
        const onAbort = (): void => {
            clearTimeout(timer);
            resolve();
        };
        const timer = setTimeout(() => {
            signal.removeEventListener('abort', onAbort);
            resolve();
        }, ms);
        signal.addEventListener('abort', onAbort, { once: true });
    });

export class ExecutionController {
    private readonly queue: JobQueue;
    private readonly engine: FetchEngine;
    private readonly limiter: RateLimiter;
    private readonly sink: ProgressSink;
    private readonly history: HistoryRecorder;
    private readonly checkpoints?: CheckpointStore;
    private readonly options: ControllerOptions;
    private readonly sleep: (ms: number, signal: AbortSignal) => Promise<void>;

    private running = false;
    private stopRequested = false;
    private loop: Promise<void> | null = null;
    private active: ActiveJob | null = null;

    constructor(deps: ExecutionControllerDeps) {
        this.queue = deps.queue;
        this.engine = deps.engine;
        this.limiter = deps.limiter;
        this.sink = deps.sink;
        this.history = deps.history;
        this.checkpoints = deps.checkpoints;
        this.options = { ...DEFAULT_CONTROLLER_OPTIONS, ...deps.options };
        this.sleep = deps.sleep ?? defaultSleep;
    }

    // ========================================================================
    // Batch commands
    // ========================================================================

    /**
     * Start pulling eligible jobs; while the loop is already running this only lifts an
     * earlier cancelAll, so jobs enqueued since then still run
     */
    startBatch(): void {
        if (this.running) {
            this.stopRequested = false;
            return;
        }

        this.running = true;
        this.stopRequested = false;
        logger.info('▶️ Batch started', { engine: this.engine.name, queued: this.queue.size });

        this.loop = this.runLoop().catch((error: unknown) => {
            logError(error instanceof Error ? error : new Error(String(error)), {
                operation: 'batch-loop',
            });
        });
    }

    /**
     * Resolves once the batch loop has stopped
     */
    whenIdle(): Promise<void> {
        return this.loop ?? Promise.resolve();
    }

    isRunning(): boolean {
        return this.running;
    }

    getActiveJob(): JobView | undefined {
        return this.active?.job;
    }

    pauseCurrent(): void {
        if (!this.active || this.active.job.state !== JobState.DOWNLOADING) {
            throw new InvalidStateError('pause', this.active?.job.id, this.active?.job.state);
        }
        this.raisePause(this.active);
    }

    resumeCurrent(): void {
        const paused = this.queue.inState(JobState.PAUSED);
        if (paused.length !== 1) {
            throw new InvalidStateError('resume');
        }
        this.resumeJob(paused[0].id);
    }

    cancelCurrent(): void {
        if (this.active) {
            this.raiseCancel(this.active);
            return;
        }

        const paused = this.queue.inState(JobState.PAUSED);
        if (paused.length !== 1) {
            throw new InvalidStateError('cancel');
        }
        this.cancelJob(paused[0].id);
        this.startBatch();
    }

    /**
     * Cancel the in-flight job and every queued or paused job without touching the engine
     */
    cancelAll(): void {
        if (this.running) {
            this.stopRequested = true;
        }
        if (this.active) {
            this.raiseCancel(this.active);
        }

        const pending = [...this.queue.inState(JobState.QUEUED), ...this.queue.inState(JobState.PAUSED)];
        for (const job of pending) {
            this.cancelIdleJob(job);
        }

        logger.info('⏹️ Batch cancelled', { cancelled: pending.length, inFlight: this.active?.job.id });
    }

    // ========================================================================
    // Per-job commands
    // ========================================================================

    pauseJob(jobId: string): void {
        const job = this.requireJob('pause', jobId);
        if (this.active?.job.id !== jobId || job.state !== JobState.DOWNLOADING) {
            throw new InvalidStateError('pause', jobId, job.state);
        }
        this.raisePause(this.active);
    }

    resumeJob(jobId: string): void {
        const job = this.requireJob('resume', jobId);
        if (job.state !== JobState.PAUSED) {
            throw new InvalidStateError('resume', jobId, job.state);
        }

        if (!job.resumeRequested) {
            job.resumeRequested = true;
            logger.info('⏯️ Resume requested', { jobId, offset: job.resumeToken?.offset ?? 0 });
        }
        this.startBatch();
    }

    cancelJob(jobId: string): void {
        const job = this.requireJob('cancel', jobId);

        if (this.active?.job.id === jobId) {
            this.raiseCancel(this.active);
            return;
        }
        if (job.state !== JobState.QUEUED && job.state !== JobState.PAUSED) {
            throw new InvalidStateError('cancel', jobId, job.state);
        }
        this.cancelIdleJob(job);
    }

    /**
     * Start a failed job again, continuing from its checkpoint when the engine left one
     */
    retryJob(jobId: string): JobView {
        const job = this.requireJob('retry', jobId);
        if (job.state !== JobState.FAILED) {
            throw new InvalidStateError('retry', jobId, job.state);
        }

        if (job.resumeToken) {
            const restored = this.queue.restore(job.resumeToken);
            // The partial output now belongs to the restored job
            job.resumeToken = null;
            this.checkpoints?.remove(job.id);
            this.saveCheckpoint(restored);
            this.publish('state', restored);
            this.resumeJob(restored.id);
            return restored;
        }

        const fresh = this.queue.enqueue(job.sourceUrl, job.requestedQuality, job.requestedFormat);
        this.publish('state', fresh);
        this.startBatch();
        return fresh;
    }

    /**
     * Turn persisted checkpoints into paused jobs; the caller decides whether to resume them
     */
    restoreCheckpoints(): JobView[] {
        if (!this.checkpoints) {
            return [];
        }

        const restored: Job[] = [];
        for (const token of this.checkpoints.list()) {
            if (this.queue.get(token.jobId)) {
                continue;
            }
            try {
                const job = this.queue.restore(token);
                this.checkpoints.remove(token.jobId);
                this.saveCheckpoint(job);
                this.publish('state', job);
                restored.push(job);
            } catch (error: unknown) {
                logger.warn('Discarding unusable checkpoint', {
                    jobId: token.jobId,
                    error: error instanceof Error ? error.message : String(error),
                });
                this.checkpoints.remove(token.jobId);
            }
        }

        if (restored.length > 0) {
            logger.info('♻️ Checkpoints restored', { count: restored.length });
        }
        return restored;
    }

    setMaxBytesPerSecond(maxBytesPerSecond: number): void {
        this.limiter.setMaxBytesPerSecond(maxBytesPerSecond);
    }

    // ========================================================================
    // Batch loop
    // ========================================================================

    private async runLoop(): Promise<void> {
        try {
            while (!this.stopRequested) {
                const job = this.queue.nextEligible();
                if (!job) {
                    break;
                }

                const outcome = await this.runJob(job);

                if (outcome === 'paused') {
                    // A paused batch stays idle unless something was explicitly resumed meanwhile
                    const next = this.queue.nextEligible();
                    if (!next || !next.resumeRequested) {
                        break;
                    }
                }
            }
        } finally {
            this.running = false;
            this.active = null;
            logger.info('⏸️ Batch loop idle', { stopped: this.stopRequested });
        }
    }

    private async runJob(job: Job): Promise<RunOutcome> {
        const signal: JobSignal = {
            pause: false,
            cancel: false,
            abort: new AbortController(),
            wake: new AbortController(),
        };
        this.active = { job, signal };

        try {
            if (job.state === JobState.QUEUED) {
                this.transition(job, 'start');

                let media: ResolvedMedia;
                try {
                    media = await this.resolveWithTimeout(job, signal);
                } catch (error: unknown) {
                    if (error instanceof CancellationRequested || signal.cancel) {
                        return this.finishCancelled(job);
                    }
                    const resolveError = classifyResolveError(error);
                    return this.finishFailed(job, {
                        kind: ErrorKind.RESOLVE,
                        reason: resolveError.reason,
                        message: resolveError.message,
                    });
                }

                if (signal.cancel) {
                    return this.finishCancelled(job);
                }

                job.title = media.title;
                job.progress.bytesTotal = media.bytesTotal;
                this.transition(job, 'resolved');
            } else {
                this.transition(job, 'resume');
            }

            return await this.download(job, signal);
        } finally {
            this.active = null;
        }
    }

    private async resolveWithTimeout(job: Job, signal: JobSignal): Promise<ResolvedMedia> {
        const { resolveTimeoutMs } = this.options;
        const engineAbort = new AbortController();
        let timer: NodeJS.Timeout | undefined;
        let onCancel: (() => void) | undefined;

        const guard = new Promise<never>((_, reject) => {
            timer = setTimeout(() => {
                engineAbort.abort();
                reject(new ResolveError('timeout', `No metadata within ${resolveTimeoutMs} ms`));
            }, resolveTimeoutMs);

            onCancel = () => {
                engineAbort.abort();
                reject(new CancellationRequested());
            };
            if (signal.abort.signal.aborted) {
                onCancel();
            } else {
                signal.abort.signal.addEventListener('abort', onCancel, { once: true });
            }
        });

        const pending = this.engine.resolve(job.sourceUrl, {
            signal: engineAbort.signal,
            quality: job.requestedQuality,
            format: job.requestedFormat,
        });
        // The race may already be decided when the engine settles
        pending.catch((error: unknown) => {
            if (engineAbort.signal.aborted) {
                logger.debug('Resolve settled after abort', {
                    jobId: job.id,
                    error: error instanceof Error ? error.message : String(error),
                });
            }
        });

        try {
            return await Promise.race([pending, guard]);
        } finally {
            clearTimeout(timer);
            if (onCancel) {
                signal.abort.signal.removeEventListener('abort', onCancel);
            }
        }
    }

    private async download(job: Job, signal: JobSignal): Promise<RunOutcome> {
        const checkpoint = this.usableCheckpoint(job);
        job.progress.bytesReceived = checkpoint?.offset ?? 0;

        const throttle = new ProgressThrottle(this.options.progressIntervalMs, this.options.progressIntervalBytes);
        const meter = new RateMeter();
        throttle.markEmitted(job.progress.bytesReceived, Date.now());
        meter.sample(job.progress.bytesReceived, Date.now());

        let lastCheckpoint: EngineCheckpoint | null = checkpoint;

        try {
            const outcome = await this.engine.transfer({
                url: job.sourceUrl,
                format: job.requestedFormat,
                quality: job.requestedQuality,
                title: job.title,
                resumeToken: checkpoint,
                maxBytesPerSecond: () => this.limiter.getMaxBytesPerSecond(),
                onProgress: (progress) => {
                    if (progress.checkpoint) {
                        lastCheckpoint = progress.checkpoint;
                    }
                    this.handleProgress(job, progress, throttle, meter);
                },
                shouldPause: () => signal.pause,
                shouldCancel: () => signal.cancel,
                throttle: (byteCount) => this.throttle(byteCount, signal),
                account: (byteCount) => this.limiter.record(byteCount),
                signal: signal.abort.signal,
            });

            switch (outcome.status) {
                case 'completed':
                    job.progress.bytesReceived = Math.max(job.progress.bytesReceived, outcome.bytesReceived);
                    job.progress.bytesTotal = job.progress.bytesTotal ?? job.progress.bytesReceived;
                    job.outputPath = outcome.outputPath;
                    job.resumeToken = null;
                    this.checkpoints?.remove(job.id);
                    this.transition(job, 'complete');
                    this.recordHistory(job);
                    return 'completed';

                case 'paused':
                    job.progress.bytesReceived = Math.max(job.progress.bytesReceived, outcome.checkpoint.offset);
                    job.resumeToken = this.bindCheckpoint(job, outcome.checkpoint);
                    this.saveCheckpoint(job);
                    this.transition(job, 'pause');
                    return 'paused';

                case 'cancelled':
                    return this.finishCancelled(job);
            }
        } catch (error: unknown) {
            if (signal.cancel) {
                return this.finishCancelled(job);
            }

            const transferError = classifyTransferError(error, lastCheckpoint);
            if (transferError.checkpoint) {
                job.resumeToken = this.bindCheckpoint(job, transferError.checkpoint);
                this.saveCheckpoint(job);
            }
            return this.finishFailed(job, {
                kind: ErrorKind.TRANSFER,
                reason: transferError.reason,
                message: transferError.message,
            });
        }
    }

    private handleProgress(
        job: Job,
        progress: TransferProgress,
        throttle: ProgressThrottle,
        meter: RateMeter,
    ): void {
        if (job.state !== JobState.DOWNLOADING) {
            return;
        }

        if (progress.bytesReceived >= job.progress.bytesReceived) {
            job.progress.bytesReceived = progress.bytesReceived;
        } else {
            logger.debug('Ignoring regressive progress report', {
                jobId: job.id,
                reported: progress.bytesReceived,
                current: job.progress.bytesReceived,
            });
        }
        if (progress.bytesTotal !== null) {
            job.progress.bytesTotal = progress.bytesTotal;
        }
        if (progress.checkpoint) {
            job.resumeToken = this.bindCheckpoint(job, progress.checkpoint);
            this.saveCheckpoint(job);
        }

        const now = Date.now();
        job.progress.instantaneousRate = meter.sample(job.progress.bytesReceived, now);

        if (throttle.shouldEmit(job.progress.bytesReceived, now)) {
            throttle.markEmitted(job.progress.bytesReceived, now);
            this.publish('progress', job);
        }
    }

    private async throttle(byteCount: number, signal: JobSignal): Promise<void> {
        const wait = this.limiter.acquire(byteCount);
        if (wait > 0 && !signal.wake.signal.aborted) {
            await this.sleep(wait, signal.wake.signal);
        }
    }

    // ========================================================================
    // Transitions & outcomes
    // ========================================================================

    private transition(job: Job, transition: JobTransition): void {
        const from = job.state;
        const to = applyTransition(job, transition);
        logger.info(`🔁 Job ${transition}`, { jobId: job.id, from, to });
        this.publish('state', job);
    }

    private finishCancelled(job: Job): RunOutcome {
        job.resumeToken = null;
        this.checkpoints?.remove(job.id);
        this.transition(job, 'cancel');
        this.recordHistory(job);
        return 'cancelled';
    }

    private finishFailed(job: Job, error: JobError): RunOutcome {
        job.error = error;
        this.transition(job, job.state === JobState.RESOLVING ? 'resolve_fail' : 'transfer_fail');
        logger.warn('❌ Job failed', { jobId: job.id, ...error });
        this.recordHistory(job);
        return 'failed';
    }

    private cancelIdleJob(job: Job): void {
        const partial = job.resumeToken;
        this.finishCancelled(job);

        if (partial && this.engine.discard) {
            this.engine.discard(partial).catch((error: unknown) => {
                logger.warn('Failed to discard partial output', {
                    jobId: job.id,
                    error: error instanceof Error ? error.message : String(error),
                });
            });
        }
    }

    private raisePause(active: ActiveJob): void {
        active.signal.pause = true;
        active.signal.wake.abort();
        logger.info('⏸️ Pause requested', { jobId: active.job.id });
    }

    private raiseCancel(active: ActiveJob): void {
        active.signal.cancel = true;
        active.signal.abort.abort();
        active.signal.wake.abort();
        logger.info('🛑 Cancel requested', { jobId: active.job.id, state: active.job.state });
    }

    private requireJob(command: string, jobId: string): Job {
        const job = this.queue.get(jobId);
        if (!job) {
            throw new InvalidStateError(command, jobId);
        }
        return job;
    }

    // ========================================================================
    // Checkpoints
    // ========================================================================

    /**
     * The job's checkpoint, if it was taken for this url/format pair
     */
    private usableCheckpoint(job: Job): EngineCheckpoint | null {
        const token = job.resumeToken;
        if (!token) {
            return null;
        }
        if (token.sourceUrl !== job.sourceUrl || token.format !== job.requestedFormat) {
            logger.warn('Discarding checkpoint taken for a different url/format', {
                jobId: job.id,
                checkpointFormat: token.format,
                requestedFormat: job.requestedFormat,
            });
            job.resumeToken = null;
            this.checkpoints?.remove(job.id);
            return null;
        }
        return { offset: token.offset, handle: token.handle };
    }

    private bindCheckpoint(job: Job, checkpoint: EngineCheckpoint): ResumeToken {
        return {
            jobId: job.id,
            sourceUrl: job.sourceUrl,
            format: job.requestedFormat,
            quality: job.requestedQuality,
            title: job.title,
            bytesTotal: job.progress.bytesTotal,
            offset: checkpoint.offset,
            handle: checkpoint.handle,
            savedAt: new Date().toISOString(),
        };
    }

    private saveCheckpoint(job: Job): void {
        if (!this.checkpoints || !job.resumeToken) {
            return;
        }
        try {
            this.checkpoints.save(job.resumeToken);
        } catch (error: unknown) {
            logger.warn('Failed to persist checkpoint', {
                jobId: job.id,
                error: error instanceof Error ? error.message : String(error),
            });
        }
    }

    // ========================================================================
    // Observers
    // ========================================================================

    private publish(type: ProgressEventType, job: Job): void {
        try {
            this.sink.publish({
                type,
                jobId: job.id,
                state: job.state,
                bytesReceived: job.progress.bytesReceived,
                bytesTotal: job.progress.bytesTotal,
                rate: job.progress.instantaneousRate,
                timestamp: new Date(),
                error: job.error ?? undefined,
            });
        } catch (error: unknown) {
            logger.warn('Progress sink failed', {
                jobId: job.id,
                error: error instanceof Error ? error.message : String(error),
            });
        }
    }

    private recordHistory(job: Job): void {
        if (!isTerminal(job.state) || !job.finishedAt) {
            return;
        }

        const entry: HistoryRecord = {
            jobId: job.id,
            sourceUrl: job.sourceUrl,
            title: job.title,
            format: job.requestedFormat,
            quality: job.requestedQuality,
            state: job.state === JobState.COMPLETED
                ? JobState.COMPLETED
                : job.state === JobState.FAILED
                    ? JobState.FAILED
                    : JobState.CANCELLED,
            startedAt: job.startedAt ? job.startedAt.toISOString() : null,
            finishedAt: job.finishedAt.toISOString(),
            bytesTotal: job.progress.bytesTotal,
            errorKind: job.error?.kind,
            errorReason: job.error?.reason,
        };

        const onFailure = (error: unknown): void => {
            logError(error instanceof Error ? error : new Error(String(error)), {
                operation: 'history-record',
                jobId: job.id,
            });
        };

        try {
            const pending = this.history.record(entry);
            if (pending instanceof Promise) {
                pending.catch(onFailure);
            }
        } catch (error: unknown) {
            onFailure(error);
        }
    }
}
