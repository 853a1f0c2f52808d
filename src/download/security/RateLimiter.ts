/**
 * RateLimiter - Per-user sliding window admission control
 *
 * Each user keeps the timestamps of their admitted submissions. Timestamps
 * older than the window are pruned on every call, so no background sweep runs.
 * A timestamp exactly one window old no longer counts.
 */

import { logger } from '../../utils/logger';

export interface RateLimiterOptions {
    maxRequests: number;
    windowMs: number;
    now?: () => number;
}

export class RateLimiter {
    private readonly submissions = new Map<number, number[]>();
    private readonly maxRequests: number;
    private readonly windowMs: number;
    private readonly now: () => number;

    constructor(options: RateLimiterOptions) {
        this.maxRequests = options.maxRequests;
        this.windowMs = options.windowMs;
        this.now = options.now ?? Date.now;
    }

    /**
     * Check and record in one operation
     */
    admit(userId: number): boolean {
        if (!this.check(userId)) {
            logger.debug('Rate limit hit', { userId });
            return false;
        }
        this.record(userId);
        return true;
    }

    /**
     * Whether another submission would be admitted right now, without recording it
     */
    check(userId: number): boolean {
        return this.prune(userId).length < this.maxRequests;
    }

    record(userId: number): void {
        const recent = this.prune(userId);
        recent.push(this.now());
        this.submissions.set(userId, recent);
    }

    getRemaining(userId: number): number {
        return Math.max(0, this.maxRequests - this.prune(userId).length);
    }

    reset(userId: number): void {
        this.submissions.delete(userId);
        logger.info('Rate limit reset for user', { userId });
    }

    getStats(): { trackedUsers: number; maxRequests: number; windowMs: number } {
        return {
            trackedUsers: this.submissions.size,
            maxRequests: this.maxRequests,
            windowMs: this.windowMs,
        };
    }

    private prune(userId: number): number[] {
        const stamps = this.submissions.get(userId);
        if (!stamps) return [];

        const cutoff = this.now() - this.windowMs;
        const recent = stamps.filter((t) => t > cutoff);
        if (recent.length === 0) {
            this.submissions.delete(userId);
        } else {
            this.submissions.set(userId, recent);
        }
        return recent;
    }
}
