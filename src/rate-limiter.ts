import { CONFIG } from './config';
import { ArchiveError } from './errors';

export interface RateLimiterOptions {
    /** Requests allowed inside one window (default: 40) */
    requestsPerMinute?: number;
    /** Window length in ms (default: 60000) */
    windowMs?: number;
}

/**
 * Sliding window limiter shared by every request of one harvester.
 *
 * Callers are not queued in order; whichever waiter wakes first after a
 * slot frees up takes it.
 */
export class RateLimiter {
    readonly requestsPerMinute: number;
    private readonly windowMs: number;
    private grants: number[] = [];

    constructor(options: RateLimiterOptions = {}) {
        this.requestsPerMinute = options.requestsPerMinute ?? CONFIG.REQUESTS_PER_MINUTE;
        this.windowMs = options.windowMs ?? CONFIG.RATE_WINDOW_MS;

        if (!Number.isFinite(this.requestsPerMinute) || this.requestsPerMinute < 1) {
            throw new RangeError(`requestsPerMinute must be at least 1, got ${this.requestsPerMinute}`);
        }
    }

    /**
     * Resolves once a request may be sent. Rejects with an ABORTED archive
     * error if the signal fires first.
     */
    async acquire(signal?: AbortSignal): Promise<void> {
        while (true) {
            if (signal?.aborted) {
                throw new ArchiveError('ABORTED', 'Rate limiter wait aborted', '');
            }

            const now = Date.now();
            this.prune(now);

            if (this.grants.length < this.requestsPerMinute) {
                this.grants.push(now);
                return;
            }

            // Oldest grant leaves the window first
            const waitMs = Math.max(this.grants[0] + this.windowMs - now, 1);
            await this.sleep(waitMs, signal);
        }
    }

    /**
     * Number of grants still inside the current window.
     */
    inFlight(): number {
        this.prune(Date.now());
        return this.grants.length;
    }

    private prune(now: number): void {
        const windowStart = now - this.windowMs;
        let expired = 0;
        while (expired < this.grants.length && this.grants[expired] <= windowStart) {
            expired++;
        }
        if (expired > 0) {
            this.grants = this.grants.slice(expired);
        }
    }

    private sleep(ms: number, signal?: AbortSignal): Promise<void> {
        return new Promise(resolve => {
            const timer = setTimeout(done, ms);

            function done() {
                clearTimeout(timer);
                signal?.removeEventListener('abort', done);
                resolve();
            }

            // Waking early is enough; the loop re-checks the signal
            signal?.addEventListener('abort', done, { once: true });
        });
    }
}
