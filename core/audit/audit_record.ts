/**
 * Audit record shape.
 */

import { Decision, LockState, OrderIntent, OrderResult } from "../domain/types";
import { FailureClass } from "../domain/failures";

export type AuditKind =
    | "DECISION"      // Interlock output for a cycle
    | "INTENT"        // Written before a mutating call is dispatched
    | "RESULT"        // Written before the resulting state is committed
    | "TRANSITION"    // Coordinator state change
    | "RECONCILE"     // Restart or manual reconciliation outcome
    | "NOTE";         // Anything else worth keeping

export interface StateTransition {
    readonly from: string;
    readonly to: string;
    readonly trigger: string;
}

export interface AuditRecord {
    readonly seq: number;
    readonly timestamp: number;
    readonly kind: AuditKind;
    readonly snapshotId: string | null;
    readonly decision: Decision | null;
    readonly lockStateSnapshot: LockState | null;
    readonly orderIntent?: OrderIntent;
    readonly orderResult?: OrderResult;
    readonly transition?: StateTransition;
    readonly failureClass?: FailureClass;
    readonly note: string;
}

export type AuditEntry = Omit<AuditRecord, "seq" | "timestamp">;

const AUDIT_KINDS: readonly string[] = ["DECISION", "INTENT", "RESULT", "TRANSITION", "RECONCILE", "NOTE"];

/**
 * Structural check for records read back from disk. The log is only
 * written by this process, so the envelope fields are what matter.
 */
export function isAuditRecord(value: unknown): value is AuditRecord {
    if (typeof value !== "object" || value === null) return false;
    if (!("seq" in value) || !("timestamp" in value) || !("kind" in value) || !("note" in value)) return false;
    return (
        typeof value.seq === "number" &&
        typeof value.timestamp === "number" &&
        typeof value.kind === "string" &&
        AUDIT_KINDS.includes(value.kind) &&
        typeof value.note === "string"
    );
}
