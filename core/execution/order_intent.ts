/**
 * Order intent construction.
 *
 * An OPEN intent can only be built while armed and flat; every other path
 * returns null. This is the structural guarantee behind the single-position
 * cap, independent of what the interlock decided.
 */

import { AccountSnapshot, LockState, OrderIntent, Position, TradeSide, oppositeSide } from "../domain/types";
import { deriveIdempotencyKey } from "./idempotency";

export interface OpenIntentParams {
    readonly side: TradeSide;
    readonly size: number;
    readonly snapshot: AccountSnapshot;
    readonly lock: LockState;
    readonly attempt: number;
    readonly now: number;
}

export function buildOpenIntent(params: OpenIntentParams): OrderIntent | null {
    if (!params.lock.armed) return null;
    if (params.snapshot.openPositions.length !== 0) return null;
    if (!(params.size > 0)) return null;

    return Object.freeze({
        idempotencyKey: deriveIdempotencyKey("OPEN", params.snapshot.snapshotId, params.attempt, params.now),
        action: "OPEN",
        pair: params.snapshot.pair,
        side: params.side,
        size: params.size,
        snapshotId: params.snapshot.snapshotId,
        createdAt: params.now
    });
}

export interface CloseIntentParams {
    readonly position: Position;
    readonly snapshotId: string;
    readonly attempt: number;
    readonly now: number;
}

export function buildCloseIntent(params: CloseIntentParams): OrderIntent {
    return Object.freeze({
        idempotencyKey: deriveIdempotencyKey("CLOSE", params.snapshotId, params.attempt, params.now),
        action: "CLOSE",
        pair: params.position.pair,
        side: oppositeSide(params.position.side),
        size: params.position.size,
        positionId: params.position.id,
        snapshotId: params.snapshotId,
        createdAt: params.now
    });
}
