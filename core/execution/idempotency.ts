import crypto from "node:crypto";
import { OrderAction } from "../domain/types";

/**
 * Derive the idempotency key for one order attempt.
 *
 * `attempt` is the coordinator's persisted counter, so two attempts never
 * share a key even for the same snapshot. The key doubles as the venue's
 * clientOrderId (alphanumeric, at most 36 chars).
 */
export function deriveIdempotencyKey(
    action: OrderAction,
    snapshotId: string,
    attempt: number,
    now: number
): string {
    return crypto
        .createHash("sha256")
        .update(`${action}:${snapshotId}:${attempt}:${now}`)
        .digest("hex")
        .slice(0, 32);
}
