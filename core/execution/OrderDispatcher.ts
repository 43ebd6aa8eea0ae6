/**
 * Order Dispatcher
 *
 * Sends one OrderIntent through the gateway with write-ahead auditing:
 *
 *   1. refuse a key that was ever dispatched before
 *   2. INTENT audit record (durable)      -- failure: nothing sent
 *   3. mark the key dispatched (durable)  -- failure: nothing sent
 *   4. gateway.submit (exactly once)
 *   5. RESULT audit record (durable)
 *
 * The caller commits the resulting state only after this returns.
 */

import { AuditLog } from "../audit/AuditLog";
import { Decision, LockState, OrderIntent, OrderResult } from "../domain/types";
import { ExchangeErrorCode } from "../exchange/adapters/base/ExchangeError";
import { ambiguousResult } from "../exchange/gateway/order_result";
import { DispatchRecord } from "./coordinator_states";

export interface OrderSubmitter {
    submit(intent: OrderIntent): Promise<OrderResult>;
}

export interface DispatchLedger {
    find(key: string): DispatchRecord | undefined;
    /** Durably record that the key is about to be sent */
    markDispatched(intent: OrderIntent): Promise<void>;
    recordResult(key: string, result: OrderResult): void;
}

export interface DispatchContext {
    readonly decision: Decision;
    readonly lock: LockState;
}

export class OrderDispatcher {
    readonly #submitter: OrderSubmitter;
    readonly #audit: AuditLog;
    readonly #ledger: DispatchLedger;

    constructor(submitter: OrderSubmitter, audit: AuditLog, ledger: DispatchLedger) {
        this.#submitter = submitter;
        this.#audit = audit;
        this.#ledger = ledger;
    }

    /**
     * Dispatch an intent at most once. Persistence failures propagate as
     * PersistenceFailureError; exchange failures come back as a result.
     */
    async dispatch(intent: OrderIntent, context: DispatchContext): Promise<OrderResult> {
        const previous = this.#ledger.find(intent.idempotencyKey);
        if (previous) {
            console.warn(`[Dispatcher] Key ${intent.idempotencyKey} already dispatched; not resending`);
            return previous.result ?? ambiguousResult(
                "Previously dispatched with unknown outcome",
                ExchangeErrorCode.UNKNOWN
            );
        }

        await this.#audit.append({
            kind: "INTENT",
            snapshotId: intent.snapshotId,
            decision: context.decision,
            lockStateSnapshot: context.lock,
            orderIntent: intent,
            note: `${intent.action} ${intent.side} ${intent.size} ${intent.pair}`
        });

        await this.#ledger.markDispatched(intent);

        let result: OrderResult;
        try {
            result = await this.#submitter.submit(intent);
        } catch (error) {
            // The gateway classifies; anything escaping it is still an unknown outcome
            result = ambiguousResult(
                error instanceof Error ? error.message : String(error),
                ExchangeErrorCode.UNKNOWN
            );
        }
        this.#ledger.recordResult(intent.idempotencyKey, result);

        await this.#audit.append({
            kind: "RESULT",
            snapshotId: intent.snapshotId,
            decision: context.decision,
            lockStateSnapshot: context.lock,
            orderIntent: intent,
            orderResult: result,
            note: `${intent.action} ${intent.idempotencyKey} -> ${result.status}`
        });

        return result;
    }
}
