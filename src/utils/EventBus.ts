import { EventEmitter } from 'events';
import { JobState, ProgressEvent, ProgressSink } from '../download/core/types';
import { logger } from './logger';

export enum QueueEvents {
  STATE_CHANGED = 'state_changed',
  PROGRESS = 'progress',
  JOB_FINISHED = 'job_finished',
}

export type ProgressListener = (event: ProgressEvent) => void;

const FINISHED_STATES = new Set([JobState.COMPLETED, JobState.FAILED, JobState.CANCELLED]);

/**
 * EventBus - Fans controller events out to any number of listeners (GUI, CLI, tests)
 */
export class EventBus extends EventEmitter implements ProgressSink {
  constructor() {
    super();
    this.setMaxListeners(20);
  }

  publish(event: ProgressEvent): void {
    if (event.type === 'progress') {
      this.emit(QueueEvents.PROGRESS, event);
      return;
    }

    this.emit(QueueEvents.STATE_CHANGED, event);
    if (FINISHED_STATES.has(event.state)) {
      this.emit(QueueEvents.JOB_FINISHED, event);
    }
  }

  public emit(event: QueueEvents, payload: ProgressEvent): boolean {
    logger.debug(`EventBus: Emitting ${event}`, { jobId: payload.jobId, state: payload.state });
    return super.emit(event, payload);
  }

  public on(event: QueueEvents, listener: ProgressListener): this {
    logger.debug(`EventBus: Listener added for ${event}`);
    return super.on(event, listener);
  }
}
