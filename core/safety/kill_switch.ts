/**
 * Kill switch — margin floor and external kill signal.
 * Overrides every other decision when active.
 */

import { AccountSnapshot } from "../domain/types";
import { SafetyReasonCode } from "./safety_reason_code";

export interface KillSwitchConfig {
    /** Force close below this margin ratio (fraction) */
    readonly minMarginRatio: number;

    /** Block new entries this long after a margin kill */
    readonly cooldownMs: number;
}

export interface KillSwitchResult {
    readonly killed: boolean;
    readonly reason_code: SafetyReasonCode | null;
    readonly reason: string;
}

export const NOT_KILLED: KillSwitchResult = Object.freeze({
    killed: false,
    reason_code: null,
    reason: ""
});

/**
 * Evaluate the margin floor against a snapshot.
 * Pure function: no side effects, no I/O.
 */
export function evaluateMarginKill(snapshot: AccountSnapshot, config: KillSwitchConfig): KillSwitchResult {
    if (snapshot.marginRatio === null) {
        return NOT_KILLED;
    }
    if (snapshot.marginRatio < config.minMarginRatio) {
        return {
            killed: true,
            reason_code: SafetyReasonCode.MARGIN_KILL,
            reason: `margin ratio ${(snapshot.marginRatio * 100).toFixed(1)}% below ${(config.minMarginRatio * 100).toFixed(1)}%`
        };
    }
    return NOT_KILLED;
}

// ============================================================================
// External kill signal
// ============================================================================

export function loadExternalKillFromEnv(env: NodeJS.ProcessEnv = process.env): KillSwitchResult {
    const raw = env.KILL_SWITCH ?? "";
    if (raw === "1" || raw.toLowerCase() === "true") {
        return {
            killed: true,
            reason_code: SafetyReasonCode.EXTERNAL_KILL,
            reason: env.KILL_SWITCH_REASON || "kill switch set in environment"
        };
    }
    return NOT_KILLED;
}

/**
 * Runtime kill signal set by the operator API, combined with the
 * environment variable (re-read on every evaluation).
 */
export class ExternalKillSignal {
    readonly #env: NodeJS.ProcessEnv;
    #reason: string | null = null;
    #engagedAt: number | null = null;

    constructor(env: NodeJS.ProcessEnv = process.env) {
        this.#env = env;
    }

    engage(reason: string, now: number = Date.now()): void {
        this.#reason = reason || "operator kill";
        this.#engagedAt = now;
        console.warn(`[KillSwitch] External kill engaged: ${this.#reason}`);
    }

    clear(): void {
        if (this.#reason !== null) {
            console.log("[KillSwitch] External kill cleared");
        }
        this.#reason = null;
        this.#engagedAt = null;
    }

    get engagedAt(): number | null {
        return this.#engagedAt;
    }

    evaluate(): KillSwitchResult {
        if (this.#reason !== null) {
            return {
                killed: true,
                reason_code: SafetyReasonCode.EXTERNAL_KILL,
                reason: this.#reason
            };
        }
        return loadExternalKillFromEnv(this.#env);
    }
}
