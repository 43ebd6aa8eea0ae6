/**
 * Proposal Oracle
 *
 * The AI model is an untrusted, slow, fallible collaborator. Every call is
 * bounded by a timeout and a per-pair interval; any failure degrades to
 * "no proposal" and the cycle holds.
 */

import { AccountSnapshot, Position, Quote } from "../domain/types";
import { errorMessage } from "../domain/failures";
import { SwapPoints } from "../market/SwapSource";
import { RiskEnvironment } from "../market/VixSource";

// ============================================================================
// Types
// ============================================================================

export interface OracleInput {
    readonly pair: string;
    readonly snapshot: AccountSnapshot;
    readonly quote: Quote | null;
    readonly position: Position | null;
    readonly swap: SwapPoints | null;
    readonly risk: RiskEnvironment;
    /** Untrusted text, already wrapped in UNTRUSTED_NEWS_TEXT markers */
    readonly newsDigest: string;
}

export interface ProposalOracle {
    readonly name: string;
    /** Resolve with the model's raw output; reject on any failure */
    propose(input: OracleInput, signal: AbortSignal): Promise<unknown>;
}

export type OracleResult =
    | { readonly ok: true; readonly raw: unknown; readonly latencyMs: number }
    | { readonly ok: false; readonly reason: string; readonly latencyMs: number };

export class OracleTimeoutError extends Error {
    constructor(readonly timeoutMs: number) {
        super(`Oracle did not answer within ${timeoutMs}ms`);
        this.name = "OracleTimeoutError";
    }
}

// ============================================================================
// Bounded request
// ============================================================================

/**
 * Call the oracle with a hard deadline. The raw output is stamped with the
 * snapshot id it was asked about and the time it arrived, so the gate can
 * reject it once stale.
 */
export async function requestProposal(
    oracle: ProposalOracle,
    input: OracleInput,
    timeoutMs: number,
    now: () => number = Date.now
): Promise<OracleResult> {
    const started = now();
    const controller = new AbortController();
    let timer: NodeJS.Timeout | undefined;

    const deadline = new Promise<never>((_, reject) => {
        timer = setTimeout(() => {
            reject(new OracleTimeoutError(timeoutMs));
            controller.abort();
        }, timeoutMs);
    });

    try {
        const output = await Promise.race([oracle.propose(input, controller.signal), deadline]);
        const latencyMs = now() - started;

        if (typeof output !== "object" || output === null || Array.isArray(output)) {
            // Left for the gate to reject as a schema violation
            return { ok: true, raw: output, latencyMs };
        }

        return {
            ok: true,
            raw: {
                ...output,
                generatedAt: new Date(now()).toISOString(),
                snapshotId: input.snapshot.snapshotId
            },
            latencyMs
        };
    } catch (error) {
        const reason = error instanceof OracleTimeoutError
            ? error.message
            : `${oracle.name} failed: ${errorMessage(error)}`;
        console.warn(`[Oracle] ${reason}`);
        return { ok: false, reason, latencyMs: now() - started };
    } finally {
        clearTimeout(timer);
    }
}

// ============================================================================
// Interval throttle
// ============================================================================

/**
 * One oracle call per pair per interval.
 */
export class OracleThrottle {
    readonly #intervalMs: number;
    readonly #lastCall = new Map<string, number>();

    constructor(intervalMs: number) {
        this.#intervalMs = intervalMs;
    }

    isDue(pair: string, now: number): boolean {
        const last = this.#lastCall.get(pair);
        return last === undefined || now - last >= this.#intervalMs;
    }

    nextDueAt(pair: string): number | null {
        const last = this.#lastCall.get(pair);
        return last === undefined ? null : last + this.#intervalMs;
    }

    markCalled(pair: string, now: number): void {
        this.#lastCall.set(pair, now);
    }
}
