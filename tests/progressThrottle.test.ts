import { ProgressThrottle, RateMeter } from '../src/download/core/ProgressThrottle';

describe('ProgressThrottle', () => {
  it('lets the first update through', () => {
    expect(new ProgressThrottle(250, 1024).shouldEmit(0, 0)).toBe(true);
  });

  it('holds updates until either interval is reached', () => {
    const throttle = new ProgressThrottle(250, 1000);
    throttle.markEmitted(0, 0);

    expect(throttle.shouldEmit(500, 100)).toBe(false);
    expect(throttle.shouldEmit(500, 250)).toBe(true);
    expect(throttle.shouldEmit(1000, 10)).toBe(true);
  });

  it('measures from the last emitted update', () => {
    const throttle = new ProgressThrottle(250, 1000);
    throttle.markEmitted(0, 0);
    throttle.markEmitted(900, 300);

    expect(throttle.shouldEmit(1800, 500)).toBe(false);
    expect(throttle.shouldEmit(1900, 500)).toBe(true);
  });
});

describe('RateMeter', () => {
  it('reports zero until time has passed', () => {
    expect(new RateMeter().sample(0, 0)).toBe(0);
  });

  it('computes bytes per second over the trailing window', () => {
    const meter = new RateMeter(1000);

    expect(meter.sample(0, 0)).toBe(0);
    expect(meter.sample(500, 500)).toBe(1000);
    expect(meter.sample(1500, 1000)).toBe(1500);
    // the two oldest samples fall out of the window
    expect(meter.sample(2000, 1600)).toBe(833);
  });
});
