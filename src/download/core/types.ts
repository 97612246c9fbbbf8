/**
 * Core Types for the Download Queue
 * Defines the job model and the contracts of the engine, sink and recorder collaborators
 */

// ============================================================================
// Enums
// ============================================================================

export enum JobState {
    QUEUED = 'queued',
    RESOLVING = 'resolving',
    DOWNLOADING = 'downloading',
    PAUSED = 'paused',
    COMPLETED = 'completed',
    FAILED = 'failed',
    CANCELLED = 'cancelled',
}

export enum ErrorKind {
    INVALID_URL = 'invalid_url',
    INVALID_STATE = 'invalid_state',
    RESOLVE = 'resolve',
    TRANSFER = 'transfer',
    RATE_LIMIT_CONFIG = 'rate_limit_config',
}

export type ResolveFailureReason = 'unreachable' | 'restricted' | 'not_found' | 'timeout' | 'unknown';

export type TransferFailureReason = 'network' | 'disk' | 'storage_full' | 'unknown';

// ============================================================================
// Job Types
// ============================================================================

export interface JobProgress {
    bytesReceived: number;
    bytesTotal: number | null;
    instantaneousRate: number; // bytes per second
}

/**
 * Engine-side checkpoint: how far a transfer got and where its partial output lives
 */
export interface EngineCheckpoint {
    offset: number;
    handle: string;
}

/**
 * A checkpoint bound to the url/format pair it was taken under
 */
export interface ResumeToken extends EngineCheckpoint {
    jobId: string;
    sourceUrl: string;
    format: string;
    quality: string;
    bytesTotal: number | null;
    title?: string;
    savedAt: string; // ISO Date
}

export interface JobError {
    kind: ErrorKind.RESOLVE | ErrorKind.TRANSFER;
    reason: ResolveFailureReason | TransferFailureReason;
    message: string;
}

export interface Job {
    readonly id: string;
    readonly sourceUrl: string;
    readonly requestedQuality: string;
    readonly requestedFormat: string;
    state: JobState;
    progress: JobProgress;
    resumeToken: ResumeToken | null;
    error: JobError | null;
    title?: string;
    outputPath?: string;
    /** Set when a paused job has been explicitly resumed and may be picked up again */
    resumeRequested: boolean;
    readonly createdAt: Date;
    startedAt: Date | null;
    finishedAt: Date | null;
}

export type JobView = Readonly<Omit<Job, 'progress'>> & { readonly progress: Readonly<JobProgress> };

// ============================================================================
// Fetch Engine Types
// ============================================================================

export interface MediaFormat {
    formatId: string;
    extension: string;
    quality: string;
    filesize: number | null;
    hasVideo: boolean;
    hasAudio: boolean;
}

export interface ResolvedMedia {
    title: string;
    bytesTotal: number | null;
    availableFormats: MediaFormat[];
}

export interface ResolveOptions {
    signal: AbortSignal;
    quality?: string;
    format?: string;
}

export interface TransferProgress {
    bytesReceived: number;
    bytesTotal: number | null;
    checkpoint?: EngineCheckpoint;
}

export interface TransferRequest {
    url: string;
    format: string;
    quality: string;
    title?: string;
    resumeToken: EngineCheckpoint | null;
    /** Current bandwidth ceiling for engines that throttle out of process (0 = unlimited); may change mid-transfer */
    maxBytesPerSecond: () => number;
    onProgress: (progress: TransferProgress) => void;
    shouldPause: () => boolean;
    shouldCancel: () => boolean;
    /** Waits until the shared limiter permits byteCount more bytes; returns early on pause or cancel */
    throttle: (byteCount: number) => Promise<void>;
    /** Charges bytes that were paced outside the shared limiter */
    account: (byteCount: number) => void;
    signal: AbortSignal;
}

export type TransferOutcome =
    | { status: 'completed'; bytesReceived: number; outputPath?: string }
    | { status: 'paused'; checkpoint: EngineCheckpoint }
    | { status: 'cancelled' };

export interface FetchEngine {
    readonly name: string;

    /**
     * Resolve stream metadata; throws ResolveError
     */
    resolve(url: string, options: ResolveOptions): Promise<ResolvedMedia>;

    /**
     * Transfer bytes until completion, pause or cancel; throws TransferError
     */
    transfer(request: TransferRequest): Promise<TransferOutcome>;

    /**
     * Delete the partial output behind a checkpoint that will never be resumed
     */
    discard?(checkpoint: EngineCheckpoint): Promise<void>;
}

// ============================================================================
// Event Types
// ============================================================================

export type ProgressEventType = 'state' | 'progress';

export interface ProgressEvent {
    type: ProgressEventType;
    jobId: string;
    state: JobState;
    bytesReceived: number;
    bytesTotal: number | null;
    rate: number;
    timestamp: Date;
    error?: JobError;
}

export interface ProgressSink {
    publish(event: ProgressEvent): void;
}

// ============================================================================
// History & Checkpoint Types
// ============================================================================

export interface HistoryRecord {
    jobId: string;
    sourceUrl: string;
    title?: string;
    format: string;
    quality: string;
    state: JobState.COMPLETED | JobState.FAILED | JobState.CANCELLED;
    startedAt: string | null; // ISO Date
    finishedAt: string; // ISO Date
    bytesTotal: number | null;
    errorKind?: ErrorKind;
    errorReason?: string;
}

export interface HistoryRecorder {
    record(entry: HistoryRecord): void | Promise<void>;
}

export interface CheckpointStore {
    save(token: ResumeToken): void;
    remove(jobId: string): void;
    list(): ResumeToken[];
}

// ============================================================================
// Controller Configuration
// ============================================================================

export interface ControllerOptions {
    resolveTimeoutMs: number;
    progressIntervalMs: number;
    progressIntervalBytes: number;
}
