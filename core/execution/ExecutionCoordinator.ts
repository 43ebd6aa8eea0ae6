/**
 * Execution Coordinator
 *
 * Owns the single position and the order state machine. At most one
 * intent is in flight: every submit-and-classify runs under a mutex.
 *
 *   IDLE --Execute--> SUBMITTING --CONFIRMED--> CONFIRMED_OPEN
 *                         |--REJECTED--> IDLE
 *                         '--AMBIGUOUS--> HALTED
 *   CONFIRMED_OPEN --ForceClose/Close--> SUBMITTING_CLOSE
 *                         |--CONFIRMED--> CONFIRMED_CLOSED --> IDLE
 *                         |--REJECTED--> CONFIRMED_OPEN
 *                         '--AMBIGUOUS--> HALTED
 *   HALTED --operator reconcile--> IDLE | CONFIRMED_OPEN
 *
 * Mutating calls are never retried. HALTED blocks every Execute until an
 * operator reconciles against an authoritative read.
 */

import { EventEmitter } from "node:events";
import { AuditLog } from "../audit/AuditLog";
import { AuditEntry } from "../audit/audit_record";
import {
    AccountSnapshot,
    Decision,
    LockState,
    OrderIntent,
    OrderResult,
    Position,
    describeDecision
} from "../domain/types";
import { FailureClass, PersistenceFailureError, errorMessage } from "../domain/failures";
import { PositionReconciler } from "../exchange/reconciliation/PositionReconciler";
import { ReconciliationReport } from "../exchange/reconciliation/ReconciliationReport";
import { Notifier, NotificationEvent, notifyInBackground } from "../notify/Notifier";
import {
    CoordinatorSnapshot,
    CoordinatorState,
    DispatchRecord,
    initialSnapshot,
    isSubmitting,
    isValidTransition
} from "./coordinator_states";
import { StateStore } from "./CoordinatorStateStore";
import { Mutex } from "./Mutex";
import { DispatchLedger, OrderDispatcher, OrderSubmitter } from "./OrderDispatcher";
import { buildCloseIntent, buildOpenIntent } from "./order_intent";

// ============================================================================
// Types
// ============================================================================

export interface CoordinatorDeps {
    readonly gateway: OrderSubmitter;
    readonly reconciler: PositionReconciler;
    readonly audit: AuditLog;
    readonly store: StateStore;
    readonly notifier: Notifier;
    /** Fresh two-factor lock state; consulted right before every dispatch */
    readonly lockState: () => LockState;
    readonly now?: () => number;
}

export interface TransitionEvent {
    readonly from: CoordinatorState;
    readonly to: CoordinatorState;
    readonly trigger: string;
    readonly timestamp: number;
}

export interface CoordinatorOutcome {
    readonly dispatched: boolean;
    readonly state: CoordinatorState;
    readonly result?: OrderResult;
    readonly note: string;
}

export interface OrderSizing {
    readonly size: number;
}

type SnapshotPatch = Partial<Omit<CoordinatorSnapshot, "version" | "state" | "updatedAt">>;

// ============================================================================
// Execution Coordinator
// ============================================================================

export class ExecutionCoordinator extends EventEmitter {
    readonly #reconciler: PositionReconciler;
    readonly #audit: AuditLog;
    readonly #store: StateStore;
    readonly #notifier: Notifier;
    readonly #lockState: () => LockState;
    readonly #now: () => number;
    readonly #mutex = new Mutex();
    readonly #dispatcher: OrderDispatcher;

    #snap: CoordinatorSnapshot;
    #stopRequested = false;
    #initialized = false;
    /** Submitting state entered by the next markDispatched */
    #pendingState: CoordinatorState = "SUBMITTING";

    constructor(deps: CoordinatorDeps) {
        super();
        this.#reconciler = deps.reconciler;
        this.#audit = deps.audit;
        this.#store = deps.store;
        this.#notifier = deps.notifier;
        this.#lockState = deps.lockState;
        this.#now = deps.now ?? Date.now;
        this.#snap = initialSnapshot(this.#now());

        const ledger: DispatchLedger = {
            find: key => this.#snap.dispatched.find(d => d.key === key),
            markDispatched: intent => this.markDispatched(intent),
            recordResult: (key, result) => this.recordResult(key, result)
        };
        this.#dispatcher = new OrderDispatcher(deps.gateway, deps.audit, ledger);
    }

    // -------------------------------------------------------------------------
    // Accessors
    // -------------------------------------------------------------------------

    get state(): CoordinatorState {
        return this.#snap.state;
    }

    get position(): Position | null {
        return this.#snap.position;
    }

    get haltReason(): string | null {
        return this.#snap.haltReason;
    }

    get stopRequested(): boolean {
        return this.#stopRequested;
    }

    // -------------------------------------------------------------------------
    // Startup
    // -------------------------------------------------------------------------

    /**
     * Load persisted state and confirm it against the venue before resuming.
     */
    async init(): Promise<ReconciliationReport | null> {
        return this.#mutex.runExclusive(async () => {
            let persisted: CoordinatorSnapshot | null;
            try {
                persisted = await this.#store.load();
            } catch (error) {
                this.#initialized = true;
                let reason = `state file unreadable: ${errorMessage(error)}`;
                let moved: string | null;
                try {
                    moved = await this.#store.quarantine();
                } catch (moveError) {
                    // Saving now would overwrite the only copy
                    reason = `${reason}; could not move it aside: ${errorMessage(moveError)}`;
                    await this.halt(reason, FailureClass.PERSISTENCE_FAILURE, null, false);
                    return null;
                }
                if (moved) {
                    reason = `${reason}; moved aside to ${moved}`;
                }
                await this.halt(reason, FailureClass.PERSISTENCE_FAILURE);
                return null;
            }

            this.#snap = persisted ?? initialSnapshot(this.#now());
            this.#initialized = true;
            const from = this.#snap.state;

            console.log(`[Coordinator] Restored state ${from}${persisted ? "" : " (fresh)"}`);

            if (from === "HALTED") {
                await this.appendAudit({
                    kind: "RECONCILE",
                    snapshotId: null,
                    decision: null,
                    lockStateSnapshot: this.#lockState(),
                    note: `restart: remains HALTED (${this.#snap.haltReason ?? "no reason recorded"})`
                });
                return null;
            }

            if (isSubmitting(from)) {
                const key = this.#snap.inFlight?.idempotencyKey ?? "unknown";
                await this.halt(`restart with order ${key} in flight; outcome unknown`, FailureClass.AMBIGUOUS_RESPONSE);
                return null;
            }

            const expected = from === "CONFIRMED_OPEN" ? this.#snap.position : null;
            let report: ReconciliationReport;
            try {
                report = await this.#reconciler.reconcile(expected);
            } catch (error) {
                await this.halt(`restart reconciliation read failed: ${errorMessage(error)}`, FailureClass.NETWORK_TIMEOUT);
                return null;
            }

            await this.appendAudit({
                kind: "RECONCILE",
                snapshotId: null,
                decision: null,
                lockStateSnapshot: this.#lockState(),
                note: `restart: ${report.reason}`
            });

            if (!report.isConsistent) {
                await this.halt(`restart mismatch: ${report.reason}`, FailureClass.AMBIGUOUS_RESPONSE);
                return report;
            }

            if (from === "CONFIRMED_CLOSED") {
                await this.transition("IDLE", "restart after confirmed close", { position: null, inFlight: null });
            } else if (from === "CONFIRMED_OPEN" && report.exchangePositions.length === 1) {
                // Refresh size/swap from the venue
                this.#snap = { ...this.#snap, position: report.exchangePositions[0] };
            }

            return report;
        });
    }

    // -------------------------------------------------------------------------
    // Decisions
    // -------------------------------------------------------------------------

    /**
     * Act on one authorized decision.
     *
     * @param order sizing for an Execute; ignored otherwise
     */
    async handleDecision(decision: Decision, snapshot: AccountSnapshot, order?: OrderSizing): Promise<CoordinatorOutcome> {
        return this.#mutex.runExclusive(async () => {
            this.assertInitialized();

            switch (decision.kind) {
                case "HOLD":
                    return this.outcome(false, `hold: ${decision.reason}`);
                case "EXECUTE":
                    return this.handleExecute(decision, snapshot, order);
                case "FORCE_CLOSE":
                case "CLOSE":
                    return this.handleClose(decision, snapshot);
            }
        });
    }

    /**
     * Compare a fresh snapshot with the owned position. A venue position the
     * coordinator did not create, or a missing one, halts trading.
     */
    async observeSnapshot(snapshot: AccountSnapshot): Promise<CoordinatorState> {
        return this.#mutex.runExclusive(async () => {
            this.assertInitialized();

            // Taken before our last state change; cannot judge drift from it
            if (snapshot.timestamp < this.#snap.updatedAt) {
                return this.#snap.state;
            }

            const venue = snapshot.openPositions;
            const state = this.#snap.state;

            if (state === "IDLE" && venue.length > 0) {
                await this.halt(
                    `unexpected venue position ${venue.map(p => p.id).join(",")} while IDLE`,
                    FailureClass.AMBIGUOUS_RESPONSE,
                    snapshot.snapshotId
                );
            } else if (state === "CONFIRMED_OPEN") {
                const owned = this.#snap.position;
                const match = venue.length === 1 && owned !== null && venue[0].id === owned.id;
                if (!match) {
                    await this.halt(
                        `position drift: expected ${owned?.id ?? "none"}, venue has [${venue.map(p => p.id).join(",")}]`,
                        FailureClass.AMBIGUOUS_RESPONSE,
                        snapshot.snapshotId
                    );
                } else if (owned && venue[0].swapAccruedToDate !== owned.swapAccruedToDate) {
                    this.#snap = { ...this.#snap, position: { ...owned, swapAccruedToDate: venue[0].swapAccruedToDate } };
                }
            }

            return this.#snap.state;
        });
    }

    // -------------------------------------------------------------------------
    // Operator Controls
    // -------------------------------------------------------------------------

    /**
     * Clear HALTED from an authoritative read: flat -> IDLE, one position ->
     * CONFIRMED_OPEN adopting it, more than one -> stays HALTED.
     */
    async reconcile(operator: string): Promise<ReconciliationReport> {
        return this.#mutex.runExclusive(async () => {
            this.assertInitialized();
            if (this.#snap.state !== "HALTED") {
                throw new Error(`Reconciliation only applies to HALTED (current: ${this.#snap.state})`);
            }

            const report = await this.#reconciler.reconcile(null);
            await this.appendAudit({
                kind: "RECONCILE",
                snapshotId: null,
                decision: null,
                lockStateSnapshot: this.#lockState(),
                note: `operator ${operator}: venue ${report.verdict} (${report.exchangePositions.map(p => p.id).join(",") || "none"})`
            });

            if (report.verdict === "FLAT") {
                await this.transition("IDLE", `reconciled by ${operator}`, {
                    position: null,
                    inFlight: null,
                    haltReason: null
                });
            } else if (report.verdict === "SINGLE") {
                await this.transition("CONFIRMED_OPEN", `reconciled by ${operator}`, {
                    position: report.exchangePositions[0],
                    inFlight: null,
                    haltReason: null
                });
            } else {
                console.error(`[Coordinator] Reconciliation by ${operator} found ${report.exchangePositions.length} positions; staying HALTED`);
                return report;
            }

            this.notify({
                type: "RECONCILED",
                level: "WARNING",
                message: `Reconciled by ${operator}: ${report.verdict}, now ${this.#snap.state}`
            });
            return report;
        });
    }

    /**
     * Stop taking new entries. Closes and the kill switch still act.
     */
    async requestStop(by: string): Promise<void> {
        this.#stopRequested = true;
        console.warn(`[Coordinator] Stop requested by ${by}`);
        await this.appendAudit({
            kind: "NOTE",
            snapshotId: null,
            decision: null,
            lockStateSnapshot: this.#lockState(),
            note: `stop requested by ${by}`
        });
    }

    async resume(by: string): Promise<void> {
        this.#stopRequested = false;
        console.log(`[Coordinator] Resumed by ${by}`);
        await this.appendAudit({
            kind: "NOTE",
            snapshotId: null,
            decision: null,
            lockStateSnapshot: this.#lockState(),
            note: `entries resumed by ${by}`
        });
    }

    /**
     * Resolve once any in-flight submit-and-classify has finished.
     */
    async drain(): Promise<void> {
        await this.#mutex.runExclusive(async () => undefined);
    }

    // -------------------------------------------------------------------------
    // Private: decision handlers
    // -------------------------------------------------------------------------

    private async handleExecute(
        decision: Extract<Decision, { kind: "EXECUTE" }>,
        snapshot: AccountSnapshot,
        order?: OrderSizing
    ): Promise<CoordinatorOutcome> {
        if (this.#snap.state === "HALTED") {
            return this.ignored(decision, snapshot, "execute ignored: HALTED");
        }
        if (this.#stopRequested) {
            return this.ignored(decision, snapshot, "execute ignored: stop requested");
        }
        if (this.#snap.state !== "IDLE") {
            return this.ignored(decision, snapshot, `execute ignored: state ${this.#snap.state}`);
        }

        const lock = this.#lockState();
        const attempt = this.#snap.attemptCounter + 1;
        const intent = buildOpenIntent({
            side: decision.side,
            size: order?.size ?? 0,
            snapshot,
            lock,
            attempt,
            now: this.#now()
        });

        if (!intent) {
            const why = !lock.armed
                ? "not armed at dispatch"
                : snapshot.openPositions.length > 0 ? "venue not flat" : "no order size";
            return this.ignored(decision, snapshot, `execute not dispatched: ${why}`);
        }

        return this.dispatch(intent, decision, lock, "SUBMITTING");
    }

    private async handleClose(
        decision: Extract<Decision, { kind: "FORCE_CLOSE" | "CLOSE" }>,
        snapshot: AccountSnapshot
    ): Promise<CoordinatorOutcome> {
        const label = describeDecision(decision);
        const position = this.#snap.position;

        if (this.#snap.state !== "CONFIRMED_OPEN" || position === null) {
            return this.ignored(decision, snapshot, `${label} ignored: state ${this.#snap.state}`);
        }

        const lock = this.#lockState();
        if (!lock.armed) {
            this.notify({
                type: "KILL_SWITCH",
                level: "CRITICAL",
                message: `${label} NOT sent: live trading is not armed. Position ${position.id} remains open.`
            });
            return this.ignored(decision, snapshot, `${label} not dispatched: not armed`);
        }

        if (decision.kind === "FORCE_CLOSE") {
            this.notify({
                type: "KILL_SWITCH",
                level: "CRITICAL",
                message: `Kill switch: closing position ${position.id} (${decision.reason})`
            });
        }

        const intent = buildCloseIntent({
            position,
            snapshotId: snapshot.snapshotId,
            attempt: this.#snap.attemptCounter + 1,
            now: this.#now()
        });

        return this.dispatch(intent, decision, lock, "SUBMITTING_CLOSE");
    }

    private async dispatch(
        intent: OrderIntent,
        decision: Decision,
        lock: LockState,
        submitting: CoordinatorState
    ): Promise<CoordinatorOutcome> {
        this.#pendingState = submitting;

        let result: OrderResult;
        try {
            result = await this.#dispatcher.dispatch(intent, { decision, lock });
        } catch (error) {
            const sent = isSubmitting(this.#snap.state);
            const reason = sent
                ? `persistence failed after dispatch of ${intent.idempotencyKey}: ${errorMessage(error)}`
                : `persistence failed before dispatch of ${intent.idempotencyKey}: ${errorMessage(error)}`;
            await this.halt(reason, error instanceof PersistenceFailureError ? FailureClass.PERSISTENCE_FAILURE : FailureClass.AMBIGUOUS_RESPONSE, intent.snapshotId);
            return this.outcome(sent, reason);
        }

        await this.commit(intent, result);
        return this.outcome(true, `${intent.action} ${result.status}`, result);
    }

    // -------------------------------------------------------------------------
    // Private: result classification
    // -------------------------------------------------------------------------

    private async commit(intent: OrderIntent, result: OrderResult): Promise<void> {
        try {
            if (intent.action === "OPEN") {
                await this.commitOpen(intent, result);
            } else {
                await this.commitClose(intent, result);
            }
        } catch (error) {
            await this.halt(
                `failed to commit ${intent.action} ${result.status}: ${errorMessage(error)}`,
                FailureClass.PERSISTENCE_FAILURE,
                intent.snapshotId
            );
        }
        this.emit("result", { intent, result });
    }

    private async commitOpen(intent: OrderIntent, result: OrderResult): Promise<void> {
        if (result.status === "CONFIRMED" && result.fill) {
            const position: Position = Object.freeze({
                id: result.fill.positionId,
                pair: intent.pair,
                side: intent.side,
                size: result.fill.size,
                entryPrice: result.fill.price,
                openedAt: result.fill.timestamp,
                swapAccruedToDate: 0
            });
            await this.transition("CONFIRMED_OPEN", `open confirmed ${result.exchangeOrderId ?? ""}`.trim(), {
                position,
                inFlight: null
            });
            this.notify({
                type: "OPENED",
                level: "INFO",
                message: `Opened ${position.side} ${position.size} ${position.pair} @ ${position.entryPrice} (position ${position.id})`
            });
            return;
        }

        if (result.status === "REJECTED") {
            await this.transition("IDLE", `open rejected: ${result.errorCode ?? ""} ${result.error ?? ""}`.trim(), {
                inFlight: null
            });
            return;
        }

        await this.halt(
            `open ${intent.idempotencyKey} outcome unknown: ${result.error ?? "no fill"}`,
            FailureClass.AMBIGUOUS_RESPONSE,
            intent.snapshotId
        );
    }

    private async commitClose(intent: OrderIntent, result: OrderResult): Promise<void> {
        if (result.status === "CONFIRMED") {
            const closed = this.#snap.position;
            await this.transition("CONFIRMED_CLOSED", `close confirmed ${result.exchangeOrderId ?? ""}`.trim(), {
                position: null,
                inFlight: null
            });
            await this.transition("IDLE", "close settled", {});
            this.notify({
                type: "CLOSED",
                level: "INFO",
                message: `Closed position ${closed?.id ?? intent.positionId ?? "?"} @ ${result.fill?.price ?? "?"}`
            });
            return;
        }

        if (result.status === "REJECTED") {
            await this.transition("CONFIRMED_OPEN", `close rejected: ${result.errorCode ?? ""} ${result.error ?? ""}`.trim(), {
                inFlight: null
            });
            this.notify({
                type: "NOTICE",
                level: "WARNING",
                message: `Close of ${intent.positionId ?? "?"} rejected: ${result.error ?? result.errorCode ?? "unknown"}`
            });
            return;
        }

        await this.halt(
            `close ${intent.idempotencyKey} outcome unknown: ${result.error ?? "no fill"}`,
            FailureClass.AMBIGUOUS_RESPONSE,
            intent.snapshotId
        );
    }

    // -------------------------------------------------------------------------
    // Private: ledger
    // -------------------------------------------------------------------------

    private async markDispatched(intent: OrderIntent): Promise<void> {
        const record: DispatchRecord = {
            key: intent.idempotencyKey,
            action: intent.action,
            dispatchedAt: this.#now(),
            result: null
        };
        await this.transition(this.#pendingState, `dispatch ${intent.action} ${intent.idempotencyKey}`, {
            inFlight: intent,
            attemptCounter: this.#snap.attemptCounter + 1,
            dispatched: [...this.#snap.dispatched, record]
        });
    }

    private recordResult(key: string, result: OrderResult): void {
        this.#snap = {
            ...this.#snap,
            dispatched: this.#snap.dispatched.map(d => (d.key === key ? { ...d, result } : d))
        };
    }

    // -------------------------------------------------------------------------
    // Private: state changes
    // -------------------------------------------------------------------------

    /**
     * Audit, persist, then adopt the new state. On failure the in-memory
     * state is unchanged and the error propagates.
     */
    private async transition(to: CoordinatorState, trigger: string, patch: SnapshotPatch): Promise<void> {
        const from = this.#snap.state;
        if (!isValidTransition(from, to)) {
            throw new Error(`Invalid coordinator transition ${from} -> ${to} (${trigger})`);
        }

        const timestamp = this.#now();
        const next: CoordinatorSnapshot = {
            ...this.#snap,
            ...patch,
            state: to,
            updatedAt: timestamp
        };

        await this.appendAudit({
            kind: "TRANSITION",
            snapshotId: next.inFlight?.snapshotId ?? null,
            decision: null,
            lockStateSnapshot: this.#lockState(),
            transition: { from, to, trigger },
            note: trigger
        });
        await this.#store.save(next);

        this.#snap = next;
        console.log(`[Coordinator] ${from} -> ${to} (${trigger})`);

        const event: TransitionEvent = { from, to, trigger, timestamp };
        this.emit("transition", event);
    }

    /**
     * Enter HALTED. The in-memory state is HALTED even if the halt itself
     * cannot be persisted; that failure is logged and notified.
     */
    /**
     * @param persist false keeps the halt in memory only, leaving the state file untouched
     */
    private async halt(
        reason: string,
        failureClass: FailureClass,
        snapshotId: string | null = null,
        persist = true
    ): Promise<void> {
        const from = this.#snap.state;
        console.error(`[Coordinator] HALT from ${from}: ${reason}`);

        if (from !== "HALTED" && !persist) {
            this.#snap = { ...this.#snap, state: "HALTED", haltReason: reason, updatedAt: this.#now() };
            this.emit("transition", { from, to: "HALTED", trigger: reason, timestamp: this.#now() });
            reason = `${reason} (halt not persisted: state file left in place)`;
        } else if (from !== "HALTED") {
            try {
                await this.transition("HALTED", reason, { haltReason: reason });
            } catch (error) {
                this.#snap = { ...this.#snap, state: "HALTED", haltReason: reason, updatedAt: this.#now() };
                console.error(`[Coordinator] HALTED state could not be persisted: ${errorMessage(error)}`);
                this.emit("transition", { from, to: "HALTED", trigger: reason, timestamp: this.#now() });
                reason = `${reason} (halt not persisted: ${errorMessage(error)})`;
            }
        }

        try {
            await this.appendAudit({
                kind: "NOTE",
                snapshotId,
                decision: null,
                lockStateSnapshot: this.#lockState(),
                failureClass,
                note: `halted: ${reason}`
            });
        } catch (error) {
            console.error(`[Coordinator] Halt note could not be audited: ${errorMessage(error)}`);
        }

        this.notify({
            type: "HALTED",
            level: "CRITICAL",
            message: `Trading HALTED: ${reason}. Manual reconciliation required.`
        });
    }

    private async ignored(decision: Decision, snapshot: AccountSnapshot, note: string): Promise<CoordinatorOutcome> {
        console.warn(`[Coordinator] ${note}`);
        await this.appendAudit({
            kind: "NOTE",
            snapshotId: snapshot.snapshotId,
            decision,
            lockStateSnapshot: this.#lockState(),
            failureClass: FailureClass.SAFETY_BLOCKED,
            note
        });
        return this.outcome(false, note);
    }

    private async appendAudit(entry: AuditEntry): Promise<void> {
        await this.#audit.append(entry);
    }

    private notify(event: NotificationEvent): void {
        notifyInBackground(this.#notifier, event);
    }

    private outcome(dispatched: boolean, note: string, result?: OrderResult): CoordinatorOutcome {
        return { dispatched, state: this.#snap.state, result, note };
    }

    private assertInitialized(): void {
        if (!this.#initialized) {
            throw new Error("ExecutionCoordinator.init() must complete before use");
        }
    }
}
