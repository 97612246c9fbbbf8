/**
 * JobStateMachine - Legal job transitions
 */

import { InvalidStateError } from './errors';
import { Job, JobState } from './types';

export type JobTransition =
    | 'start'
    | 'resolved'
    | 'resolve_fail'
    | 'complete'
    | 'pause'
    | 'resume'
    | 'transfer_fail'
    | 'cancel';

const TRANSITIONS: Record<JobState, Partial<Record<JobTransition, JobState>>> = {
    [JobState.QUEUED]: {
        start: JobState.RESOLVING,
        cancel: JobState.CANCELLED,
    },
    [JobState.RESOLVING]: {
        resolved: JobState.DOWNLOADING,
        resolve_fail: JobState.FAILED,
        cancel: JobState.CANCELLED,
    },
    [JobState.DOWNLOADING]: {
        complete: JobState.COMPLETED,
        pause: JobState.PAUSED,
        transfer_fail: JobState.FAILED,
        cancel: JobState.CANCELLED,
    },
    [JobState.PAUSED]: {
        resume: JobState.DOWNLOADING,
        cancel: JobState.CANCELLED,
    },
    [JobState.COMPLETED]: {},
    [JobState.FAILED]: {},
    [JobState.CANCELLED]: {},
};

const TERMINAL_STATES = new Set([JobState.COMPLETED, JobState.FAILED, JobState.CANCELLED]);

export function isTerminal(state: JobState): boolean {
    return TERMINAL_STATES.has(state);
}

export function isActive(state: JobState): boolean {
    return state === JobState.RESOLVING || state === JobState.DOWNLOADING;
}

export function canTransition(state: JobState, transition: JobTransition): boolean {
    return TRANSITIONS[state][transition] !== undefined;
}

/**
 * Apply a transition to the job, throwing InvalidStateError without mutating it if illegal
 */
export function applyTransition(job: Job, transition: JobTransition, now: Date = new Date()): JobState {
    const next = TRANSITIONS[job.state][transition];
    if (next === undefined) {
        throw new InvalidStateError(transition, job.id, job.state);
    }

    job.state = next;
    if (transition === 'start') {
        job.startedAt = now;
    }
    if (transition === 'resume') {
        job.resumeRequested = false;
        job.startedAt = job.startedAt ?? now;
    }
    if (isTerminal(next)) {
        job.finishedAt = now;
        job.progress.instantaneousRate = 0;
    }
    if (next === JobState.PAUSED) {
        job.progress.instantaneousRate = 0;
    }
    return next;
}
