/**
 * Reconciliation Report Types
 *
 * Result of comparing the coordinator's believed position against an
 * authoritative read of the venue.
 */

import { Position } from "../../domain/types";

// ============================================================================
// Report Types
// ============================================================================

export type ExchangeVerdict = "FLAT" | "SINGLE" | "MULTIPLE";

export interface ReconciliationReport {
    readonly timestamp: number;
    readonly exchange: string;
    readonly pair: string;

    /** Position id the coordinator believes is open (null = flat) */
    readonly expectedPositionId: string | null;

    /** What the venue actually holds for the pair */
    readonly exchangePositions: readonly Position[];

    readonly verdict: ExchangeVerdict;
    readonly isConsistent: boolean;
    readonly reason: string;
}

// ============================================================================
// Report Builder
// ============================================================================

export function classifyPositions(positions: readonly Position[]): ExchangeVerdict {
    if (positions.length === 0) return "FLAT";
    if (positions.length === 1) return "SINGLE";
    return "MULTIPLE";
}

export function createReconciliationReport(params: {
    exchange: string;
    pair: string;
    expected: Position | null;
    exchangePositions: readonly Position[];
    timestamp: number;
}): ReconciliationReport {
    const verdict = classifyPositions(params.exchangePositions);
    const expectedPositionId = params.expected?.id ?? null;

    let isConsistent: boolean;
    let reason: string;

    if (verdict === "MULTIPLE") {
        isConsistent = false;
        reason = `Venue holds ${params.exchangePositions.length} positions; at most one is allowed`;
    } else if (expectedPositionId === null) {
        isConsistent = verdict === "FLAT";
        reason = isConsistent ? "Flat as expected" : `Unexpected position ${params.exchangePositions[0].id} on venue`;
    } else if (verdict === "FLAT") {
        isConsistent = false;
        reason = `Expected position ${expectedPositionId} is missing on venue`;
    } else {
        const actual = params.exchangePositions[0];
        isConsistent = actual.id === expectedPositionId;
        reason = isConsistent
            ? `Position ${expectedPositionId} confirmed`
            : `Expected position ${expectedPositionId}, venue holds ${actual.id}`;
    }

    return Object.freeze({
        timestamp: params.timestamp,
        exchange: params.exchange,
        pair: params.pair,
        expectedPositionId,
        exchangePositions: params.exchangePositions,
        verdict,
        isConsistent,
        reason
    });
}

// ============================================================================
// Report Formatting
// ============================================================================

export function formatReportSummary(report: ReconciliationReport): string {
    const lines: string[] = [
        `=== Reconciliation Report ===`,
        `Exchange: ${report.exchange} ${report.pair}`,
        `Time: ${new Date(report.timestamp).toISOString()}`,
        `Status: ${report.isConsistent ? "CONSISTENT" : "MISMATCH DETECTED"}`,
        `Expected: ${report.expectedPositionId ?? "flat"}`,
        `Venue: ${report.verdict} (${report.exchangePositions.length})`,
        `Reason: ${report.reason}`
    ];

    for (const p of report.exchangePositions) {
        lines.push(`  ${p.id}: ${p.side} ${p.size} @ ${p.entryPrice}`);
    }

    return lines.join("\n");
}
