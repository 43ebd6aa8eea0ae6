/**
 * Single-position cap. Pure.
 */

import { OrderAction } from "../domain/types";

export const MAX_OPEN_POSITIONS = 1;

export interface PositionCapResult {
    readonly allowed: boolean;
    readonly reason: string;
}

export function checkPositionCap(openPositionCount: number, action: OrderAction): PositionCapResult {
    // Closing is always allowed
    if (action === "CLOSE") {
        return { allowed: true, reason: "" };
    }
    if (openPositionCount >= MAX_OPEN_POSITIONS) {
        return {
            allowed: false,
            reason: `position cap reached (${openPositionCount}/${MAX_OPEN_POSITIONS})`
        };
    }
    return { allowed: true, reason: "" };
}
