/**
 * Token Bucket Rate Limiter
 *
 * Capacity C tokens, refilled continuously at R tokens/second.
 * Waiters are served strictly in arrival order: each acquire() chains
 * onto the previous one, so concurrent callers never race for a token.
 */

import { setTimeout as delay } from "node:timers/promises";

export interface TokenBucketConfig {
    readonly capacity: number;
    readonly refillPerSecond: number;
}

export interface TokenBucketClock {
    readonly now: () => number;
    readonly sleep: (ms: number) => Promise<void>;
}

export const SYSTEM_CLOCK: TokenBucketClock = {
    now: () => Date.now(),
    sleep: async (ms: number) => {
        await delay(ms);
    }
};

export class TokenBucket {
    readonly #capacity: number;
    readonly #refillPerSecond: number;
    readonly #clock: TokenBucketClock;

    #tokens: number;
    #lastRefill: number;
    #queue: Promise<void> = Promise.resolve();
    #waiting = 0;

    constructor(config: TokenBucketConfig, clock: TokenBucketClock = SYSTEM_CLOCK) {
        if (config.capacity < 1 || config.refillPerSecond <= 0) {
            throw new Error(`Invalid token bucket config: capacity=${config.capacity} refill=${config.refillPerSecond}`);
        }
        this.#capacity = config.capacity;
        this.#refillPerSecond = config.refillPerSecond;
        this.#clock = clock;
        this.#tokens = config.capacity;
        this.#lastRefill = clock.now();
    }

    /**
     * Resolve once a token has been taken for the caller.
     */
    acquire(): Promise<void> {
        this.#waiting++;
        const turn = this.#queue.then(() => this.take()).finally(() => {
            this.#waiting--;
        });
        this.#queue = turn.catch(() => undefined);
        return turn;
    }

    /**
     * Tokens currently available (after refill).
     */
    available(): number {
        this.refill();
        return this.#tokens;
    }

    get pending(): number {
        return this.#waiting;
    }

    private async take(): Promise<void> {
        this.refill();
        if (this.#tokens >= 1) {
            this.#tokens -= 1;
            return;
        }

        const waitMs = Math.ceil(((1 - this.#tokens) / this.#refillPerSecond) * 1000);
        await this.#clock.sleep(waitMs);
        this.refill();
        this.#tokens = Math.max(0, this.#tokens - 1);
    }

    private refill(): void {
        const now = this.#clock.now();
        const elapsedMs = Math.max(0, now - this.#lastRefill);
        this.#tokens = Math.min(this.#capacity, this.#tokens + (elapsedMs / 1000) * this.#refillPerSecond);
        this.#lastRefill = now;
    }
}
