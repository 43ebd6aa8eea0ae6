/**
 * Bounded exponential backoff with jitter for idempotent reads.
 *
 * Never used for order submission: a mutating call is sent once.
 */

import { ExchangeError } from "../adapters/base/ExchangeError";
import { NetworkTimeoutError } from "../../domain/failures";
import { TokenBucket } from "./TokenBucket";

export interface BackoffPolicy {
    readonly maxAttempts: number;
    readonly baseDelayMs: number;
    readonly maxDelayMs: number;
}

export const DEFAULT_BACKOFF_POLICY: BackoffPolicy = Object.freeze({
    maxAttempts: 5,
    baseDelayMs: 500,
    maxDelayMs: 8000
});

export interface RetryDeps {
    readonly limiter: TokenBucket;
    readonly sleep: (ms: number) => Promise<void>;
    readonly random?: () => number;
    readonly isRetryable?: (error: unknown) => boolean;
}

/**
 * "Equal jitter": half the exponential step is fixed, half is random.
 */
export function computeBackoffDelay(
    attempt: number,
    policy: BackoffPolicy,
    random: () => number = Math.random
): number {
    const exp = Math.min(policy.maxDelayMs, policy.baseDelayMs * 2 ** (attempt - 1));
    return Math.round(exp / 2 + random() * (exp / 2));
}

export function isRetryableReadError(error: unknown): boolean {
    return error instanceof ExchangeError && error.retryable;
}

/**
 * Run a read call under the shared limiter, retrying transient failures.
 * Each attempt takes a token. Non-retryable errors propagate immediately;
 * an exhausted budget surfaces NetworkTimeoutError.
 */
export async function withReadRetry<T>(
    operation: string,
    fn: () => Promise<T>,
    policy: BackoffPolicy,
    deps: RetryDeps
): Promise<T> {
    const isRetryable = deps.isRetryable ?? isRetryableReadError;
    const random = deps.random ?? Math.random;
    let lastError: unknown;

    for (let attempt = 1; attempt <= policy.maxAttempts; attempt++) {
        await deps.limiter.acquire();
        try {
            return await fn();
        } catch (error) {
            if (!isRetryable(error)) {
                throw error;
            }
            lastError = error;
            if (attempt === policy.maxAttempts) {
                break;
            }

            const waitMs = computeBackoffDelay(attempt, policy, random);
            console.warn(
                `[Backoff] ${operation} attempt ${attempt}/${policy.maxAttempts} failed: ` +
                `${error instanceof Error ? error.message : String(error)}; retrying in ${waitMs}ms`
            );
            await deps.sleep(waitMs);
        }
    }

    throw new NetworkTimeoutError(operation, policy.maxAttempts, lastError);
}
