/**
 * Trading Domain Types
 *
 * Shared shapes flowing between the proposal gate, the safety interlock,
 * the execution coordinator and the audit log.
 */

// ============================================================================
// Sides
// ============================================================================

export type TradeSide = "BUY" | "SELL";

export type ProposalSide = TradeSide | "HOLD" | "EXIT";

export const PROPOSAL_SIDES: readonly ProposalSide[] = ["BUY", "SELL", "HOLD", "EXIT"];

export function oppositeSide(side: TradeSide): TradeSide {
    return side === "BUY" ? "SELL" : "BUY";
}

// ============================================================================
// Proposal (untrusted oracle output after normalization)
// ============================================================================

export interface Proposal {
    readonly side: ProposalSide;
    readonly confidence: number;          // [0, 1]
    readonly rationale: string;
    readonly generatedAt: number;         // Unix ms
    readonly snapshotId: string;
    readonly suggestedLeverage?: number;
}

// ============================================================================
// Account / Position
// ============================================================================

export interface Position {
    readonly id: string;                  // Exchange position id
    readonly pair: string;
    readonly side: TradeSide;
    readonly size: number;
    readonly entryPrice: number;
    readonly openedAt: number;
    readonly swapAccruedToDate: number;
}

export interface AccountSnapshot {
    readonly snapshotId: string;
    readonly pair: string;
    readonly equity: number;
    /** Margin maintenance ratio as a fraction; null when no margin is in use */
    readonly marginRatio: number | null;
    readonly openPositions: readonly Position[];
    readonly timestamp: number;
}

export interface Quote {
    readonly pair: string;
    readonly bid: number;
    readonly ask: number;
    readonly timestamp: number;
}

// ============================================================================
// Lock State
// ============================================================================

export interface LockState {
    readonly configFlagArmed: boolean;
    readonly envFlagArmed: boolean;
    readonly armed: boolean;
}

export function deriveLockState(configFlagArmed: boolean, envFlagArmed: boolean): LockState {
    return Object.freeze({
        configFlagArmed,
        envFlagArmed,
        armed: configFlagArmed && envFlagArmed
    });
}

// ============================================================================
// Decision
// ============================================================================

export type Decision =
    | { readonly kind: "EXECUTE"; readonly side: TradeSide; readonly leverage?: number }
    | { readonly kind: "HOLD"; readonly reason: string; readonly code: string }
    | { readonly kind: "FORCE_CLOSE"; readonly reason: string; readonly code: string }
    | { readonly kind: "CLOSE"; readonly reason: string };

export function describeDecision(decision: Decision): string {
    switch (decision.kind) {
        case "EXECUTE":
            return `Execute(${decision.side})`;
        case "HOLD":
            return `Hold(${decision.reason})`;
        case "FORCE_CLOSE":
            return `ForceClose(${decision.reason})`;
        case "CLOSE":
            return `Close(${decision.reason})`;
    }
}

// ============================================================================
// Order Intent / Result
// ============================================================================

export type OrderAction = "OPEN" | "CLOSE";

export interface OrderIntent {
    readonly idempotencyKey: string;
    readonly action: OrderAction;
    readonly pair: string;
    readonly side: TradeSide;
    readonly size: number;
    readonly positionId?: string;         // Required for CLOSE
    readonly snapshotId: string;
    readonly createdAt: number;
}

export type OrderResultStatus = "CONFIRMED" | "AMBIGUOUS" | "REJECTED";

export interface OrderFill {
    readonly positionId: string;
    readonly price: number;
    readonly size: number;
    readonly timestamp: number;
}

export interface OrderResult {
    readonly status: OrderResultStatus;
    readonly exchangeOrderId?: string;
    readonly fill?: OrderFill;
    readonly error?: string;
    readonly errorCode?: string;
}
