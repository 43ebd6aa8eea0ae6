/**
 * Execution Coordinator States
 *
 * At most one order is in flight; the state names which one.
 */

import { OrderIntent, OrderResult, Position } from "../domain/types";

// ============================================================================
// States
// ============================================================================

export type CoordinatorState =
    | "IDLE"               // Flat, ready for an entry
    | "SUBMITTING"         // OPEN intent dispatched, awaiting classification
    | "CONFIRMED_OPEN"     // One confirmed position
    | "SUBMITTING_CLOSE"   // CLOSE intent dispatched, awaiting classification
    | "CONFIRMED_CLOSED"   // Close confirmed; passes straight through to IDLE
    | "HALTED";            // Outcome unknown or state untrusted; operator must reconcile

export const COORDINATOR_STATES: readonly CoordinatorState[] = [
    "IDLE",
    "SUBMITTING",
    "CONFIRMED_OPEN",
    "SUBMITTING_CLOSE",
    "CONFIRMED_CLOSED",
    "HALTED"
];

/**
 * States with a mutating call in flight.
 */
export const SUBMITTING_STATES: readonly CoordinatorState[] = ["SUBMITTING", "SUBMITTING_CLOSE"];

/**
 * Valid state transitions.
 */
export const STATE_TRANSITIONS: Readonly<Record<CoordinatorState, readonly CoordinatorState[]>> = {
    "IDLE": ["SUBMITTING", "HALTED"],
    "SUBMITTING": ["CONFIRMED_OPEN", "IDLE", "HALTED"],
    "CONFIRMED_OPEN": ["SUBMITTING_CLOSE", "HALTED"],
    "SUBMITTING_CLOSE": ["CONFIRMED_CLOSED", "CONFIRMED_OPEN", "HALTED"],
    "CONFIRMED_CLOSED": ["IDLE", "HALTED"],
    "HALTED": ["IDLE", "CONFIRMED_OPEN"]
};

export function isCoordinatorState(value: unknown): value is CoordinatorState {
    return typeof value === "string" && COORDINATOR_STATES.some(s => s === value);
}

export function isValidTransition(from: CoordinatorState, to: CoordinatorState): boolean {
    return STATE_TRANSITIONS[from]?.includes(to) ?? false;
}

export function isSubmitting(state: CoordinatorState): boolean {
    return SUBMITTING_STATES.includes(state);
}

// ============================================================================
// Persisted Snapshot
// ============================================================================

export interface DispatchRecord {
    readonly key: string;
    readonly action: OrderIntent["action"];
    readonly dispatchedAt: number;
    /** null until the call returned */
    readonly result: OrderResult | null;
}

export interface CoordinatorSnapshot {
    readonly version: 1;
    readonly state: CoordinatorState;
    readonly position: Position | null;
    readonly inFlight: OrderIntent | null;
    /** Monotonic, feeds idempotency key derivation */
    readonly attemptCounter: number;
    readonly dispatched: readonly DispatchRecord[];
    readonly haltReason: string | null;
    readonly updatedAt: number;
}

export function initialSnapshot(now: number): CoordinatorSnapshot {
    return {
        version: 1,
        state: "IDLE",
        position: null,
        inFlight: null,
        attemptCounter: 0,
        dispatched: [],
        haltReason: null,
        updatedAt: now
    };
}
