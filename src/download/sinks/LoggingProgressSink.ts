/**
 * LoggingProgressSink - Writes controller events to the application log
 */

import { logger } from '../../utils/logger';
import { JobState, ProgressEvent, ProgressSink } from '../core/types';

export class LoggingProgressSink implements ProgressSink {
    publish(event: ProgressEvent): void {
        const details = {
            jobId: event.jobId,
            state: event.state,
            bytesReceived: event.bytesReceived,
            bytesTotal: event.bytesTotal,
            rate: event.rate,
        };

        if (event.type === 'progress') {
            logger.debug('Job progress', details);
        } else if (event.state === JobState.FAILED) {
            logger.warn('Job state changed', { ...details, error: event.error });
        } else {
            logger.info('Job state changed', details);
        }
    }
}

/**
 * CompositeProgressSink - Delivers each event to several sinks; one failing sink does not starve the others
 */
export class CompositeProgressSink implements ProgressSink {
    private readonly sinks: ProgressSink[];

    constructor(...sinks: ProgressSink[]) {
        this.sinks = sinks;
    }

    publish(event: ProgressEvent): void {
        for (const sink of this.sinks) {
            try {
                sink.publish(event);
            } catch (error: unknown) {
                logger.warn('Progress sink failed', {
                    jobId: event.jobId,
                    error: error instanceof Error ? error.message : String(error),
                });
            }
        }
    }
}
