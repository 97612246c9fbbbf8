/**
 * RateLimiter - Token bucket bounding the combined throughput of every active transfer
 *
 * Capacity is one second of the configured rate. Refill is continuous, computed from the
 * wall-clock time elapsed since the previous acquire. A grant larger than the available
 * tokens puts the bucket into debt; the returned wait is the time needed to repay it.
 */

import { RateLimitConfigError } from '../core/errors';
import { logger } from '../../utils/logger';

export type Clock = () => number;

export interface RateLimiterStats {
    maxBytesPerSecond: number;
    bytesConsumed: number;
    availableTokens: number;
}

export function assertValidRate(maxBytesPerSecond: number): void {
    if (!Number.isFinite(maxBytesPerSecond) || maxBytesPerSecond < 0) {
        throw new RateLimitConfigError(maxBytesPerSecond);
    }
}

export class RateLimiter {
    private maxBytesPerSecond: number;
    private tokens: number;
    private lastRefill: number;
    private bytesConsumed = 0;
    private readonly clock: Clock;

    constructor(maxBytesPerSecond: number = 0, clock: Clock = Date.now) {
        assertValidRate(maxBytesPerSecond);
        this.maxBytesPerSecond = maxBytesPerSecond;
        this.tokens = maxBytesPerSecond;
        this.clock = clock;
        this.lastRefill = clock();
    }

    /**
     * Reserve byteCount bytes and return how many milliseconds the caller must wait first
     */
    acquire(byteCount: number): number {
        const now = this.clock();
        this.bytesConsumed += byteCount;

        if (this.maxBytesPerSecond === 0) {
            this.lastRefill = now;
            return 0;
        }

        this.refill(now);
        this.tokens -= byteCount;

        if (this.tokens >= 0) {
            return 0;
        }

        return Math.ceil((-this.tokens / this.maxBytesPerSecond) * 1000);
    }

    /**
     * Count bytes an out-of-process transfer already moved under its own cap; they draw on
     * the bucket like a grant, but nobody waits for them
     */
    record(byteCount: number): void {
        this.acquire(byteCount);
    }

    /**
     * Change the ceiling; the next acquire uses it
     */
    setMaxBytesPerSecond(maxBytesPerSecond: number): void {
        assertValidRate(maxBytesPerSecond);

        const wasUnlimited = this.maxBytesPerSecond === 0;
        this.maxBytesPerSecond = maxBytesPerSecond;
        if (wasUnlimited) {
            // Start a newly limited bucket full
            this.tokens = maxBytesPerSecond;
            this.lastRefill = this.clock();
        }

        logger.info('⚙️ Bandwidth limit updated', { maxBytesPerSecond });
    }

    getMaxBytesPerSecond(): number {
        return this.maxBytesPerSecond;
    }

    isUnlimited(): boolean {
        return this.maxBytesPerSecond === 0;
    }

    getStats(): RateLimiterStats {
        if (this.maxBytesPerSecond > 0) {
            this.refill(this.clock());
        }
        return {
            maxBytesPerSecond: this.maxBytesPerSecond,
            bytesConsumed: this.bytesConsumed,
            availableTokens: this.maxBytesPerSecond === 0 ? Infinity : Math.max(0, this.tokens),
        };
    }

    private refill(now: number): void {
        const elapsed = Math.max(0, now - this.lastRefill);
        const capacity = this.maxBytesPerSecond;
        this.tokens = Math.min(capacity, this.tokens + (elapsed * this.maxBytesPerSecond) / 1000);
        this.lastRefill = now;
    }
}
