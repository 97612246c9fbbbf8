import { ConsoleProgressSink, formatBytes, formatEvent } from '../src/download/sinks/ConsoleProgressSink';
import { CompositeProgressSink, LoggingProgressSink } from '../src/download/sinks/LoggingProgressSink';
import { EventBus, QueueEvents } from '../src/utils/EventBus';
import { ErrorKind, JobState, ProgressEvent } from '../src/download/core/types';

function event(overrides: Partial<ProgressEvent> = {}): ProgressEvent {
  return {
    type: 'state',
    jobId: '0123456789abcdef',
    state: JobState.DOWNLOADING,
    bytesReceived: 0,
    bytesTotal: null,
    rate: 0,
    timestamp: new Date(0),
    ...overrides,
  };
}

describe('progress sinks', () => {
  it.each([
    [0, '0 B'],
    [1023, '1023 B'],
    [1024, '1.0 KiB'],
    [1536, '1.5 KiB'],
    [5 * 1024 * 1024, '5.0 MiB'],
  ])('formats %i bytes as %s', (bytes, text) => {
    expect(formatBytes(bytes)).toBe(text);
  });

  it('formats progress with a percentage when the size is known', () => {
    expect(formatEvent(event({ type: 'progress', bytesReceived: 512, bytesTotal: 2048, rate: 1024 }))).toBe(
      '[01234567] 512 B / 2.0 KiB (25%) at 1.0 KiB/s',
    );
    expect(formatEvent(event({ type: 'progress', bytesReceived: 512, rate: 0 }))).toBe('[01234567] 512 B at 0 B/s');
  });

  it('formats state changes with the failure reason', () => {
    expect(formatEvent(event({ state: JobState.COMPLETED }))).toBe('✅ [01234567] completed');
    expect(
      formatEvent(event({
        state: JobState.FAILED,
        error: { kind: ErrorKind.RESOLVE, reason: 'not_found', message: 'HTTP 404' },
      })),
    ).toBe('❌ [01234567] failed: not_found (HTTP 404)');
  });

  it('writes one line per event', () => {
    const lines: string[] = [];
    new ConsoleProgressSink((line) => lines.push(line)).publish(event({ state: JobState.PAUSED }));

    expect(lines).toEqual(['⏸️ [01234567] paused']);
  });

  it('keeps delivering when one sink throws', () => {
    const received: ProgressEvent[] = [];
    const composite = new CompositeProgressSink(
      { publish: () => { throw new Error('broken'); } },
      new LoggingProgressSink(),
      { publish: (e) => received.push(e) },
    );

    composite.publish(event());
    expect(received).toHaveLength(1);
  });

  it('routes events on the bus', () => {
    const bus = new EventBus();
    const states: JobState[] = [];
    const progress: number[] = [];
    const finished: string[] = [];
    bus.on(QueueEvents.STATE_CHANGED, (e) => states.push(e.state));
    bus.on(QueueEvents.PROGRESS, (e) => progress.push(e.bytesReceived));
    bus.on(QueueEvents.JOB_FINISHED, (e) => finished.push(e.jobId));

    bus.publish(event({ state: JobState.DOWNLOADING }));
    bus.publish(event({ type: 'progress', bytesReceived: 100 }));
    bus.publish(event({ state: JobState.CANCELLED }));

    expect(states).toEqual([JobState.DOWNLOADING, JobState.CANCELLED]);
    expect(progress).toEqual([100]);
    expect(finished).toEqual(['0123456789abcdef']);
  });
});
