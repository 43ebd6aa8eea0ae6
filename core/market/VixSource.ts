/**
 * VIX as a market risk gauge. Above the configured threshold the market
 * counts as risk-off: the cycle consults the oracle without waiting for
 * the AI interval, and the model is told it is risk-off.
 */

import { errorMessage } from "../domain/failures";

export interface RiskEnvironment {
    /** null when no reading was available */
    readonly vixIndex: number | null;
    readonly riskOff: boolean;
}

export interface VixSource {
    readonly name: string;
    /** Latest VIX level, or null when unknown */
    fetchVix(): Promise<number | null>;
}

/** Sits above the usual risk-off threshold, so an unconfigured gauge errs cautious. */
export const CAUTIOUS_VIX = 25;

export class FixedVixSource implements VixSource {
    readonly name = "fixed";

    constructor(readonly value: number = CAUTIOUS_VIX) {}

    async fetchVix(): Promise<number | null> {
        return this.value;
    }
}

/**
 * Read the gauge and classify it. An unknown or failing reading is treated
 * as risk-off.
 */
export async function assessRiskEnvironment(source: VixSource, threshold: number): Promise<RiskEnvironment> {
    let vix: number | null;
    try {
        vix = await source.fetchVix();
    } catch (err) {
        console.warn(`[Vix] ${source.name} failed: ${errorMessage(err)}`);
        vix = null;
    }

    if (vix === null || !Number.isFinite(vix)) {
        console.warn(`[Vix] No reading from ${source.name}; assuming risk-off`);
        return { vixIndex: null, riskOff: true };
    }
    return { vixIndex: vix, riskOff: vix > threshold };
}
