import { v4 as uuidv4 } from 'uuid';
import { InvalidStateError, InvalidUrlError } from '../download/core/errors';
import { isActive, isTerminal } from '../download/core/JobStateMachine';
import { Job, JobState, JobView, ResumeToken } from '../download/core/types';
import { URLValidator } from '../utils/UrlValidator';
import { logger } from '../utils/logger';

/**
 * JobQueue - Ordered collection of download jobs
 * Insertion order is execution order; paused jobs are skipped until explicitly resumed
 */
export class JobQueue {
  private jobs: Job[] = [];
  private readonly validator: URLValidator;

  constructor(validator: URLValidator = new URLValidator()) {
    this.validator = validator;
  }

  /**
   * Create a queued job for the URL and append it
   */
  enqueue(url: string, quality: string, format: string): Job {
    const result = this.validator.validate(url);
    if (!result.valid) {
      throw new InvalidUrlError(url, result.message ?? 'invalid URL');
    }

    const job = this.createJob(url.trim(), quality, format, JobState.QUEUED);
    this.jobs.push(job);

    logger.info('📥 Job added to queue', {
      jobId: job.id,
      url: job.sourceUrl,
      platform: result.platform,
      quality,
      format,
      position: this.jobs.length,
    });

    return job;
  }

  /**
   * Re-create a paused job from a persisted checkpoint (after a restart or a failed attempt)
   */
  restore(token: ResumeToken): Job {
    const result = this.validator.validate(token.sourceUrl);
    if (!result.valid) {
      throw new InvalidUrlError(token.sourceUrl, result.message ?? 'invalid URL');
    }

    const job = this.createJob(token.sourceUrl, token.quality, token.format, JobState.PAUSED);
    job.title = token.title;
    job.progress.bytesReceived = token.offset;
    job.progress.bytesTotal = token.bytesTotal;
    job.resumeToken = { ...token, jobId: job.id };
    this.jobs.push(job);

    logger.info('♻️ Job restored from checkpoint', {
      jobId: job.id,
      previousJobId: token.jobId,
      offset: token.offset,
    });

    return job;
  }

  /**
   * Remove a job that is not currently resolving or downloading
   */
  remove(jobId: string): void {
    const index = this.jobs.findIndex((j) => j.id === jobId);
    if (index === -1) {
      throw new InvalidStateError('remove', jobId);
    }

    const job = this.jobs[index];
    if (isActive(job.state)) {
      throw new InvalidStateError('remove', jobId, job.state);
    }

    this.jobs.splice(index, 1);
    logger.info('🗑️ Job removed from queue', { jobId, state: job.state });
  }

  /**
   * Remove every completed, failed or cancelled job
   */
  clearFinished(): number {
    const before = this.jobs.length;
    this.jobs = this.jobs.filter((j) => !isTerminal(j.state));
    return before - this.jobs.length;
  }

  /**
   * Earliest job that may run: queued, or paused and explicitly resumed
   */
  nextEligible(): Job | undefined {
    return this.jobs.find(
      (j) =>
        j.state === JobState.QUEUED ||
        (j.state === JobState.PAUSED && j.resumeRequested),
    );
  }

  get(jobId: string): Job | undefined {
    return this.jobs.find((j) => j.id === jobId);
  }

  /**
   * Jobs currently in the given state, in insertion order
   */
  inState(state: JobState): Job[] {
    return this.jobs.filter((j) => j.state === state);
  }

  /**
   * Read-only copies of the jobs as they are now; iterating again replays the same copies
   */
  snapshot(): Iterable<JobView> {
    const captured = this.jobs.map((j) => JobQueue.freeze(j));

    return {
      *[Symbol.iterator](): Iterator<JobView> {
        yield* captured;
      },
    };
  }

  get size(): number {
    return this.jobs.length;
  }

  private createJob(url: string, quality: string, format: string, state: JobState): Job {
    return {
      id: uuidv4(),
      sourceUrl: url,
      requestedQuality: quality,
      requestedFormat: format,
      state,
      progress: {
        bytesReceived: 0,
        bytesTotal: null,
        instantaneousRate: 0,
      },
      resumeToken: null,
      error: null,
      resumeRequested: false,
      createdAt: new Date(),
      startedAt: null,
      finishedAt: null,
    };
  }

  private static freeze(job: Job): JobView {
    return Object.freeze({
      ...job,
      progress: Object.freeze({ ...job.progress }),
      resumeToken: job.resumeToken ? Object.freeze({ ...job.resumeToken }) : null,
      error: job.error ? Object.freeze({ ...job.error }) : null,
    });
  }
}
