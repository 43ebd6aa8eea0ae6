/**
 * Trading Cycle
 *
 * One decision tick:
 *
 *   snapshot -> drift check -> kill switch -> (oracle -> gate) -> interlock
 *            -> sizing -> DECISION audit -> coordinator
 *
 * A risk-off market (VIX above the threshold) skips the AI interval so the
 * model is consulted on every tick while it lasts.
 *
 * The kill switch runs before and independently of the oracle, so a slow
 * or failing model never delays a forced close.
 */

import { AuditLog } from "../audit/AuditLog";
import { AccountSnapshot, Decision, Quote, describeDecision } from "../domain/types";
import { FailureClass, errorMessage } from "../domain/failures";
import { ExchangeGateway } from "../exchange/gateway/ExchangeGateway";
import { ExchangeHealthMonitor } from "../exchange/monitoring/ExchangeHealthMonitor";
import { CoordinatorOutcome, ExecutionCoordinator, OrderSizing } from "../execution/ExecutionCoordinator";
import { NewsSource, formatNewsDigest } from "../oracle/news/NewsSource";
import { SwapSource } from "../market/SwapSource";
import { VixSource, assessRiskEnvironment } from "../market/VixSource";
import { OracleThrottle, ProposalOracle, requestProposal } from "../oracle/ProposalOracle";
import { ProposalGate } from "../proposal/ProposalGate";
import { computeOrderSize } from "../risk/sizing";
import { SafetyInterlock, hold } from "../safety/SafetyInterlock";
import { SafetyReasonCode } from "../safety/safety_reason_code";

// ============================================================================
// Types
// ============================================================================

export interface TradingCycleConfig {
    readonly pair: string;
    readonly maxLeverage: number;
    readonly lotUnit: number;
    readonly oracleTimeoutMs: number;
    readonly vixThreshold: number;
}

export interface TradingCycleDeps {
    readonly gateway: ExchangeGateway;
    readonly coordinator: ExecutionCoordinator;
    readonly interlock: SafetyInterlock;
    readonly gate: ProposalGate;
    readonly oracle: ProposalOracle;
    readonly news: NewsSource;
    readonly swap: SwapSource;
    readonly vix: VixSource;
    readonly throttle: OracleThrottle;
    readonly audit: AuditLog;
    readonly health?: ExchangeHealthMonitor | null;
    readonly now?: () => number;
}

export interface CycleReport {
    readonly snapshotId: string | null;
    readonly decision: Decision;
    readonly outcome: CoordinatorOutcome | null;
}

interface DecisionDraft {
    readonly decision: Decision;
    readonly failureClass?: FailureClass;
    readonly detail?: string;
    readonly order?: OrderSizing;
}

// ============================================================================
// Trading Cycle
// ============================================================================

export class TradingCycle {
    readonly #deps: TradingCycleDeps;
    readonly #config: TradingCycleConfig;
    readonly #now: () => number;

    constructor(deps: TradingCycleDeps, config: TradingCycleConfig) {
        this.#deps = deps;
        this.#config = config;
        this.#now = deps.now ?? Date.now;
    }

    /**
     * Run one tick. Never throws; failures end the tick with a Hold.
     */
    async runOnce(): Promise<CycleReport> {
        const { gateway, coordinator, audit, interlock } = this.#deps;

        let snapshot: AccountSnapshot;
        try {
            snapshot = await gateway.getAccountSnapshot(this.#config.pair);
        } catch (err) {
            console.error(`[Cycle] Snapshot unavailable: ${errorMessage(err)}`);
            return { snapshotId: null, decision: hold("snapshot unavailable", SafetyReasonCode.MARKET_DATA_UNAVAILABLE), outcome: null };
        }

        let draft: DecisionDraft;
        try {
            await coordinator.observeSnapshot(snapshot);
            draft = await this.decide(snapshot);
        } catch (err) {
            console.error(`[Cycle] Decision failed: ${errorMessage(err)}`);
            return { snapshotId: snapshot.snapshotId, decision: hold("cycle error", SafetyReasonCode.MARKET_DATA_UNAVAILABLE), outcome: null };
        }

        const { decision } = draft;
        console.log(`[Cycle] ${snapshot.snapshotId} ${describeDecision(decision)}${draft.detail ? ` (${draft.detail})` : ""}`);

        try {
            await audit.append({
                kind: "DECISION",
                snapshotId: snapshot.snapshotId,
                decision,
                lockStateSnapshot: interlock.readLockState(),
                failureClass: draft.failureClass,
                note: draft.detail ?? describeDecision(decision)
            });
        } catch (err) {
            // Nothing is dispatched for a decision that could not be recorded
            console.error(`[Cycle] Decision not audited, skipping: ${errorMessage(err)}`);
            return { snapshotId: snapshot.snapshotId, decision, outcome: null };
        }

        if (decision.kind === "HOLD") {
            return { snapshotId: snapshot.snapshotId, decision, outcome: null };
        }

        try {
            const outcome = await coordinator.handleDecision(decision, snapshot, draft.order);
            return { snapshotId: snapshot.snapshotId, decision, outcome };
        } catch (err) {
            console.error(`[Cycle] Coordinator failed: ${errorMessage(err)}`);
            return { snapshotId: snapshot.snapshotId, decision, outcome: null };
        }
    }

    // -------------------------------------------------------------------------
    // Private
    // -------------------------------------------------------------------------

    private async decide(snapshot: AccountSnapshot): Promise<DecisionDraft> {
        const { coordinator, interlock, health, throttle } = this.#deps;

        const kill = interlock.evaluateKillSwitch(snapshot);
        if (kill) {
            return { decision: kill };
        }

        if (coordinator.state === "HALTED") {
            return safety(hold("halted", SafetyReasonCode.HALTED), coordinator.haltReason ?? undefined);
        }
        if (health && !health.isMarketOpen()) {
            return safety(hold("market closed", SafetyReasonCode.MARKET_CLOSED));
        }

        const now = this.#now();
        const risk = await assessRiskEnvironment(this.#deps.vix, this.#config.vixThreshold);
        if (risk.riskOff) {
            console.warn(`[Cycle] Risk-off (VIX ${risk.vixIndex ?? "unknown"}), consulting the oracle outside its interval`);
        } else if (!throttle.isDue(this.#config.pair, now)) {
            const next = throttle.nextDueAt(this.#config.pair);
            return {
                decision: hold("ai interval", SafetyReasonCode.AI_INTERVAL),
                detail: next === null ? undefined : `next oracle call after ${new Date(next).toISOString()}`
            };
        }

        const quote = await this.readQuote();
        const newsItems = await this.#deps.news.fetchNews(this.#config.pair);
        const swap = await this.#deps.swap.getSwapPoints(this.#config.pair);

        throttle.markCalled(this.#config.pair, now);
        const answer = await requestProposal(
            this.#deps.oracle,
            {
                pair: this.#config.pair,
                snapshot,
                quote,
                position: coordinator.position,
                swap,
                risk,
                newsDigest: formatNewsDigest(newsItems)
            },
            this.#config.oracleTimeoutMs,
            this.#now
        );
        if (!answer.ok) {
            return {
                decision: hold("oracle unavailable", SafetyReasonCode.ORACLE_UNAVAILABLE),
                failureClass: FailureClass.NETWORK_TIMEOUT,
                detail: answer.reason
            };
        }

        const checked = this.#deps.gate.check(answer.raw, snapshot);
        const decision = interlock.authorize(checked.ok ? checked.proposal : null, snapshot);

        if (!checked.ok) {
            return {
                decision,
                failureClass: decision.kind === "HOLD" ? FailureClass.VALIDATION_ERROR : undefined,
                detail: `${checked.reason}: ${checked.errors.join("; ")}`
            };
        }

        if (decision.kind === "HOLD") {
            return safety(decision);
        }
        if (decision.kind !== "EXECUTE") {
            return { decision };
        }

        if (coordinator.stopRequested) {
            return safety(hold("stopped", SafetyReasonCode.STOPPED));
        }

        return this.size(decision, snapshot, quote);
    }

    private async size(
        decision: Extract<Decision, { kind: "EXECUTE" }>,
        snapshot: AccountSnapshot,
        quote: Quote | null
    ): Promise<DecisionDraft> {
        const fresh = quote ?? await this.readQuote();
        if (!fresh) {
            return safety(hold("quote unavailable", SafetyReasonCode.MARKET_DATA_UNAVAILABLE));
        }

        const sizing = computeOrderSize({
            equity: snapshot.equity,
            quote: fresh,
            side: decision.side,
            suggestedLeverage: decision.leverage,
            maxLeverage: this.#config.maxLeverage,
            lotUnit: this.#config.lotUnit
        });

        if (sizing.size <= 0) {
            return safety(hold("order size is zero", SafetyReasonCode.ZERO_SIZE));
        }

        return {
            decision,
            order: { size: sizing.size },
            detail: `${decision.side} ${sizing.size} @ ~${sizing.price} x${sizing.leverage}`
        };
    }

    private async readQuote(): Promise<Quote | null> {
        try {
            return await this.#deps.gateway.getQuote(this.#config.pair);
        } catch (err) {
            console.warn(`[Cycle] Quote unavailable: ${errorMessage(err)}`);
            return null;
        }
    }
}

function safety(decision: Decision, detail?: string): DecisionDraft {
    return { decision, failureClass: FailureClass.SAFETY_BLOCKED, detail };
}
