/**
 * Position Reconciler
 *
 * Reads the venue's open positions through the gateway and compares them
 * with what the coordinator believes. Used on restart and for manual
 * recovery from HALTED.
 */

import { Position } from "../../domain/types";
import { ExchangeGateway } from "../gateway/ExchangeGateway";
import {
    ReconciliationReport,
    createReconciliationReport,
    formatReportSummary
} from "./ReconciliationReport";

export class PositionReconciler {
    readonly #gateway: ExchangeGateway;
    readonly #pair: string;
    readonly #now: () => number;

    constructor(gateway: ExchangeGateway, pair: string, now: () => number = Date.now) {
        this.#gateway = gateway;
        this.#pair = pair;
        this.#now = now;
    }

    /**
     * Compare the expected position (null = flat) against the venue.
     */
    async reconcile(expected: Position | null): Promise<ReconciliationReport> {
        const exchangePositions = await this.#gateway.getOpenPositions(this.#pair);

        const report = createReconciliationReport({
            exchange: this.#gateway.exchange,
            pair: this.#pair,
            expected,
            exchangePositions,
            timestamp: this.#now()
        });

        if (!report.isConsistent) {
            console.warn("[Reconciler] Mismatch detected:\n" + formatReportSummary(report));
        }

        return report;
    }
}
