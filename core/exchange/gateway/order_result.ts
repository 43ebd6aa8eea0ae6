/**
 * Three-way outcome of a mutating exchange call.
 */

import { OrderFill, OrderResult } from "../../domain/types";
import { ExchangeError, ExchangeErrorCode, isDefiniteRejection } from "../adapters/base/ExchangeError";

export function confirmedResult(exchangeOrderId: string, fill: OrderFill): OrderResult {
    return Object.freeze({ status: "CONFIRMED", exchangeOrderId, fill });
}

export function rejectedResult(error: string, errorCode: string, exchangeOrderId?: string): OrderResult {
    return Object.freeze({ status: "REJECTED", error, errorCode, exchangeOrderId });
}

export function ambiguousResult(error: string, errorCode: string, exchangeOrderId?: string): OrderResult {
    return Object.freeze({ status: "AMBIGUOUS", error, errorCode, exchangeOrderId });
}

/**
 * Classify a thrown error from a mutating call.
 * Only an explicit refusal from the venue counts as REJECTED; timeouts,
 * transport failures, 5xx and unreadable bodies leave the outcome unknown.
 */
export function classifyMutationError(error: unknown): OrderResult {
    if (error instanceof ExchangeError) {
        if (isDefiniteRejection(error.code)) {
            return rejectedResult(error.message, error.code);
        }
        return ambiguousResult(error.message, error.code);
    }
    const message = error instanceof Error ? error.message : String(error);
    return ambiguousResult(message, ExchangeErrorCode.UNKNOWN);
}
