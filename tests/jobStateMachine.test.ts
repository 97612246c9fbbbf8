import { applyTransition, canTransition, isActive, isTerminal, JobTransition } from '../src/download/core/JobStateMachine';
import { InvalidStateError } from '../src/download/core/errors';
import { Job, JobState } from '../src/download/core/types';

function makeJob(state: JobState): Job {
  return {
    id: 'job-1',
    sourceUrl: 'https://media.example.com/a.mp4',
    requestedQuality: 'best',
    requestedFormat: 'mp4',
    state,
    progress: { bytesReceived: 0, bytesTotal: null, instantaneousRate: 42 },
    resumeToken: null,
    error: null,
    resumeRequested: false,
    createdAt: new Date(0),
    startedAt: null,
    finishedAt: null,
  };
}

describe('JobStateMachine', () => {
  const legal: Array<[JobState, JobTransition, JobState]> = [
    [JobState.QUEUED, 'start', JobState.RESOLVING],
    [JobState.QUEUED, 'cancel', JobState.CANCELLED],
    [JobState.RESOLVING, 'resolved', JobState.DOWNLOADING],
    [JobState.RESOLVING, 'resolve_fail', JobState.FAILED],
    [JobState.RESOLVING, 'cancel', JobState.CANCELLED],
    [JobState.DOWNLOADING, 'complete', JobState.COMPLETED],
    [JobState.DOWNLOADING, 'pause', JobState.PAUSED],
    [JobState.DOWNLOADING, 'transfer_fail', JobState.FAILED],
    [JobState.DOWNLOADING, 'cancel', JobState.CANCELLED],
    [JobState.PAUSED, 'resume', JobState.DOWNLOADING],
    [JobState.PAUSED, 'cancel', JobState.CANCELLED],
  ];

  it.each(legal)('%s --%s--> %s', (from, transition, to) => {
    const job = makeJob(from);

    expect(canTransition(from, transition)).toBe(true);
    expect(applyTransition(job, transition)).toBe(to);
    expect(job.state).toBe(to);
  });

  it('rejects every transition that is not in the table, leaving the job untouched', () => {
    const transitions: JobTransition[] = [
      'start', 'resolved', 'resolve_fail', 'complete', 'pause', 'resume', 'transfer_fail', 'cancel',
    ];
    const states = Object.values(JobState);

    for (const state of states) {
      for (const transition of transitions) {
        if (legal.some(([from, t]) => from === state && t === transition)) continue;

        const job = makeJob(state);
        expect(canTransition(state, transition)).toBe(false);
        expect(() => applyTransition(job, transition)).toThrow(InvalidStateError);
        expect(job.state).toBe(state);
        expect(job.finishedAt).toBeNull();
      }
    }
  });

  it('names the command and state in the error', () => {
    expect(() => applyTransition(makeJob(JobState.COMPLETED), 'pause')).toThrow(
      'Cannot pause job job-1 in state completed',
    );
  });

  it('stamps start and finish times', () => {
    const job = makeJob(JobState.QUEUED);
    const started = new Date(1000);
    const finished = new Date(2000);

    applyTransition(job, 'start', started);
    applyTransition(job, 'resolved', new Date(1500));
    applyTransition(job, 'complete', finished);

    expect(job.startedAt).toBe(started);
    expect(job.finishedAt).toBe(finished);
    expect(job.progress.instantaneousRate).toBe(0);
  });

  it('clears the resume request and keeps the original start time on resume', () => {
    const job = makeJob(JobState.PAUSED);
    job.startedAt = new Date(10);
    job.resumeRequested = true;

    applyTransition(job, 'resume', new Date(99));

    expect(job.resumeRequested).toBe(false);
    expect(job.startedAt).toEqual(new Date(10));
  });

  it('reports zero rate while paused', () => {
    const job = makeJob(JobState.DOWNLOADING);
    applyTransition(job, 'pause');
    expect(job.progress.instantaneousRate).toBe(0);
  });

  it('classifies states', () => {
    expect(isTerminal(JobState.COMPLETED)).toBe(true);
    expect(isTerminal(JobState.FAILED)).toBe(true);
    expect(isTerminal(JobState.CANCELLED)).toBe(true);
    expect(isTerminal(JobState.PAUSED)).toBe(false);
    expect(isActive(JobState.RESOLVING)).toBe(true);
    expect(isActive(JobState.DOWNLOADING)).toBe(true);
    expect(isActive(JobState.QUEUED)).toBe(false);
  });
});
