import fc from 'fast-check';
import { JobQueue } from '../src/queue/JobQueue';
import { InvalidStateError, InvalidUrlError } from '../src/download/core/errors';
import { JobState, ResumeToken } from '../src/download/core/types';

const urlArb = fc
  .tuple(fc.constantFrom('http', 'https'), fc.stringMatching(/^[a-z]{1,10}$/), fc.nat({ max: 999 }))
  .map(([scheme, name, n]) => `${scheme}://${name}.example.com/v/${n}`);

function token(overrides: Partial<ResumeToken> = {}): ResumeToken {
  return {
    jobId: 'old-job',
    sourceUrl: 'https://media.example.com/big.mp4',
    format: 'mp4',
    quality: '720p',
    title: 'big.mp4',
    bytesTotal: 10_000,
    offset: 4096,
    handle: '/downloads/big.mp4.part',
    savedAt: '2026-01-01T00:00:00.000Z',
    ...overrides,
  };
}

describe('JobQueue', () => {
  it('creates queued jobs with zero progress', () => {
    const queue = new JobQueue();
    const job = queue.enqueue(' https://media.example.com/a.mp4 ', '1080p', 'mp4');

    expect(job.state).toBe(JobState.QUEUED);
    expect(job.sourceUrl).toBe('https://media.example.com/a.mp4');
    expect(job.requestedQuality).toBe('1080p');
    expect(job.requestedFormat).toBe('mp4');
    expect(job.progress).toEqual({ bytesReceived: 0, bytesTotal: null, instantaneousRate: 0 });
    expect(job.resumeToken).toBeNull();
    expect(queue.size).toBe(1);
  });

  it('rejects an invalid URL without changing the queue', () => {
    const queue = new JobQueue();
    queue.enqueue('https://media.example.com/a.mp4', 'best', 'mp4');

    expect(() => queue.enqueue('definitely not a url', 'best', 'mp4')).toThrow(InvalidUrlError);
    expect(queue.size).toBe(1);
  });

  it('Property: snapshot order equals insertion order and ids are unique', () => {
    fc.assert(
      fc.property(fc.array(urlArb, { minLength: 1, maxLength: 30 }), (urls) => {
        const queue = new JobQueue();
        const ids = urls.map((url) => queue.enqueue(url, 'best', 'mp4').id);

        const snapshot = [...queue.snapshot()];
        expect(snapshot.map((j) => j.id)).toEqual(ids);
        expect(snapshot.map((j) => j.sourceUrl)).toEqual(urls);
        expect(new Set(ids).size).toBe(ids.length);
      }),
      { numRuns: 50 },
    );
  });

  it('returns frozen copies that do not follow later changes', () => {
    const queue = new JobQueue();
    const job = queue.enqueue('https://media.example.com/a.mp4', 'best', 'mp4');
    const snapshot = queue.snapshot();

    job.progress.bytesReceived = 500;
    queue.enqueue('https://media.example.com/b.mp4', 'best', 'mp4');

    const first = [...snapshot];
    expect(first).toHaveLength(1);
    expect(first[0].progress.bytesReceived).toBe(0);
    expect(Object.isFrozen(first[0])).toBe(true);
    // replays the same copies
    expect([...snapshot][0]).toBe(first[0]);
  });

  it('picks the earliest queued job, skipping paused ones until resumed', () => {
    const queue = new JobQueue();
    const a = queue.enqueue('https://media.example.com/a.mp4', 'best', 'mp4');
    const b = queue.enqueue('https://media.example.com/b.mp4', 'best', 'mp4');

    a.state = JobState.PAUSED;
    expect(queue.nextEligible()).toBe(b);

    a.resumeRequested = true;
    expect(queue.nextEligible()).toBe(a);

    a.state = JobState.COMPLETED;
    b.state = JobState.FAILED;
    expect(queue.nextEligible()).toBeUndefined();
  });

  it('removes idle jobs and refuses active or unknown ones', () => {
    const queue = new JobQueue();
    const a = queue.enqueue('https://media.example.com/a.mp4', 'best', 'mp4');
    const b = queue.enqueue('https://media.example.com/b.mp4', 'best', 'mp4');
    b.state = JobState.DOWNLOADING;

    queue.remove(a.id);
    expect(queue.get(a.id)).toBeUndefined();
    expect(() => queue.remove(b.id)).toThrow(InvalidStateError);
    expect(() => queue.remove('missing')).toThrow('Cannot remove job missing in state unknown');
    expect(queue.size).toBe(1);
  });

  it('clears finished jobs only', () => {
    const queue = new JobQueue();
    const a = queue.enqueue('https://media.example.com/a.mp4', 'best', 'mp4');
    const b = queue.enqueue('https://media.example.com/b.mp4', 'best', 'mp4');
    const c = queue.enqueue('https://media.example.com/c.mp4', 'best', 'mp4');
    a.state = JobState.COMPLETED;
    c.state = JobState.CANCELLED;

    expect(queue.clearFinished()).toBe(2);
    expect([...queue.snapshot()].map((j) => j.id)).toEqual([b.id]);
  });

  it('lists jobs by state', () => {
    const queue = new JobQueue();
    const a = queue.enqueue('https://media.example.com/a.mp4', 'best', 'mp4');
    queue.enqueue('https://media.example.com/b.mp4', 'best', 'mp4');
    a.state = JobState.PAUSED;

    expect(queue.inState(JobState.PAUSED)).toEqual([a]);
    expect(queue.inState(JobState.QUEUED)).toHaveLength(1);
  });

  describe('restore', () => {
    it('re-creates a paused job bound to a fresh id', () => {
      const queue = new JobQueue();
      const job = queue.restore(token());

      expect(job.state).toBe(JobState.PAUSED);
      expect(job.id).not.toBe('old-job');
      expect(job.title).toBe('big.mp4');
      expect(job.requestedQuality).toBe('720p');
      expect(job.progress.bytesReceived).toBe(4096);
      expect(job.progress.bytesTotal).toBe(10_000);
      expect(job.resumeToken).toEqual({ ...token(), jobId: job.id });
      expect(job.resumeRequested).toBe(false);
    });

    it('rejects a checkpoint with an unusable URL', () => {
      const queue = new JobQueue();
      expect(() => queue.restore(token({ sourceUrl: 'ftp://media.example.com/x' }))).toThrow(InvalidUrlError);
      expect(queue.size).toBe(0);
    });
  });
});
