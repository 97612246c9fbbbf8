/**
 * ProgressThrottle - Coalesces per-chunk engine callbacks into bounded progress events
 * An update is let through once intervalMs have passed or intervalBytes have arrived since the last one
 */

export class ProgressThrottle {
    private lastEmitAt: number | null = null;
    private lastEmitBytes = 0;

    constructor(
        private readonly intervalMs: number,
        private readonly intervalBytes: number,
    ) {}

    shouldEmit(bytesReceived: number, now: number): boolean {
        if (this.lastEmitAt === null) {
            return true;
        }
        return (
            now - this.lastEmitAt >= this.intervalMs ||
            bytesReceived - this.lastEmitBytes >= this.intervalBytes
        );
    }

    markEmitted(bytesReceived: number, now: number): void {
        this.lastEmitAt = now;
        this.lastEmitBytes = bytesReceived;
    }
}

/**
 * RateMeter - Transfer rate over a trailing window
 */
export class RateMeter {
    private readonly samples: Array<{ at: number; bytes: number }> = [];

    constructor(private readonly windowMs: number = 1000) {}

    sample(bytesReceived: number, now: number): number {
        this.samples.push({ at: now, bytes: bytesReceived });
        while (this.samples.length > 2 && now - this.samples[0].at > this.windowMs) {
            this.samples.shift();
        }

        const first = this.samples[0];
        const elapsed = now - first.at;
        if (elapsed <= 0) {
            return 0;
        }
        return Math.round(((bytesReceived - first.bytes) * 1000) / elapsed);
    }
}
