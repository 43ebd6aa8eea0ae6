/**
 * Venue error taxonomy.
 *
 * Every adapter failure surfaces as an ExchangeError carrying one of these
 * codes. Two traits per code drive the gateway:
 *  - retryable: a read call may be repeated after backoff
 *  - rejected: the venue answered and did not act, so a mutating call
 *    has a known outcome. A mutating failure without this trait is
 *    treated as an unknown outcome.
 */

export enum ExchangeErrorCode {
    AUTH_FAILED = "AUTH_FAILED",
    API_KEY_INVALID = "API_KEY_INVALID",
    SIGNATURE_INVALID = "SIGNATURE_INVALID",
    CREDENTIALS_MISSING = "CREDENTIALS_MISSING",

    RATE_LIMIT_EXCEEDED = "RATE_LIMIT_EXCEEDED",

    INSUFFICIENT_MARGIN = "INSUFFICIENT_MARGIN",
    ORDER_REJECTED = "ORDER_REJECTED",
    INVALID_QUANTITY = "INVALID_QUANTITY",
    POSITION_NOT_FOUND = "POSITION_NOT_FOUND",
    MARKET_CLOSED = "MARKET_CLOSED",
    SYMBOL_NOT_FOUND = "SYMBOL_NOT_FOUND",

    NETWORK_ERROR = "NETWORK_ERROR",
    TIMEOUT = "TIMEOUT",
    SERVER_ERROR = "SERVER_ERROR",
    SERVICE_UNAVAILABLE = "SERVICE_UNAVAILABLE",
    MALFORMED_RESPONSE = "MALFORMED_RESPONSE",

    // Raised locally, never reaches the venue
    SAFETY_BLOCKED = "SAFETY_BLOCKED",

    UNKNOWN = "UNKNOWN"
}

interface CodeTraits {
    readonly retryable: boolean;
    readonly rejected: boolean;
}

const REJECTED: CodeTraits = { retryable: false, rejected: true };
const TRANSIENT: CodeTraits = { retryable: true, rejected: false };
const OPAQUE: CodeTraits = { retryable: false, rejected: false };

const TRAITS: Readonly<Record<ExchangeErrorCode, CodeTraits>> = {
    [ExchangeErrorCode.AUTH_FAILED]: REJECTED,
    [ExchangeErrorCode.API_KEY_INVALID]: REJECTED,
    [ExchangeErrorCode.SIGNATURE_INVALID]: REJECTED,
    [ExchangeErrorCode.CREDENTIALS_MISSING]: REJECTED,
    // Throttled requests are refused before processing
    [ExchangeErrorCode.RATE_LIMIT_EXCEEDED]: { retryable: true, rejected: true },
    [ExchangeErrorCode.INSUFFICIENT_MARGIN]: REJECTED,
    [ExchangeErrorCode.ORDER_REJECTED]: REJECTED,
    [ExchangeErrorCode.INVALID_QUANTITY]: REJECTED,
    [ExchangeErrorCode.POSITION_NOT_FOUND]: REJECTED,
    [ExchangeErrorCode.MARKET_CLOSED]: REJECTED,
    [ExchangeErrorCode.SYMBOL_NOT_FOUND]: REJECTED,
    [ExchangeErrorCode.NETWORK_ERROR]: TRANSIENT,
    [ExchangeErrorCode.TIMEOUT]: TRANSIENT,
    [ExchangeErrorCode.SERVER_ERROR]: TRANSIENT,
    [ExchangeErrorCode.SERVICE_UNAVAILABLE]: TRANSIENT,
    [ExchangeErrorCode.MALFORMED_RESPONSE]: OPAQUE,
    [ExchangeErrorCode.SAFETY_BLOCKED]: REJECTED,
    [ExchangeErrorCode.UNKNOWN]: OPAQUE
};

export interface ExchangeErrorDetail {
    readonly code: ExchangeErrorCode;
    readonly message: string;
    readonly exchange: string;
    readonly timestamp: number;
    readonly retryable: boolean;
    /** Venue-native error code, e.g. GMO's "ERR-201". */
    readonly originalCode?: string | number;
    readonly originalMessage?: string;
    readonly httpStatus?: number;
}

export class ExchangeError extends Error {
    readonly code: ExchangeErrorCode;
    readonly exchange: string;
    readonly timestamp: number;
    readonly retryable: boolean;
    readonly originalCode?: string | number;
    readonly originalMessage?: string;
    readonly httpStatus?: number;

    constructor(detail: ExchangeErrorDetail) {
        super(detail.message);
        this.name = "ExchangeError";
        this.code = detail.code;
        this.exchange = detail.exchange;
        this.timestamp = detail.timestamp;
        this.retryable = detail.retryable;
        this.originalCode = detail.originalCode;
        this.originalMessage = detail.originalMessage;
        this.httpStatus = detail.httpStatus;
    }
}

/** Only ever consulted for read calls. */
export function isRetryableError(code: ExchangeErrorCode): boolean {
    return TRAITS[code].retryable;
}

export function isDefiniteRejection(code: ExchangeErrorCode): boolean {
    return TRAITS[code].rejected;
}

/**
 * Wrap a failure thrown by the transport (fetch, DNS, socket) as an
 * ExchangeError. Errors that already are ExchangeErrors pass through.
 */
export function createExchangeError(
    exchange: string,
    error: unknown,
    fallback: ExchangeErrorCode = ExchangeErrorCode.UNKNOWN,
    now: () => number = Date.now
): ExchangeError {
    if (error instanceof ExchangeError) {
        return error;
    }

    const message = error instanceof Error ? error.message : String(error);
    let code = fallback;
    if (/ETIMEDOUT|timeout/i.test(message)) {
        code = ExchangeErrorCode.TIMEOUT;
    } else if (/ECONNREFUSED|ECONNRESET|ENOTFOUND/.test(message) || (error instanceof Error && error.name === "TypeError")) {
        // fetch() rejects with TypeError on transport failure
        code = ExchangeErrorCode.NETWORK_ERROR;
    }

    return new ExchangeError({
        code,
        message: `${exchange}: ${message}`,
        exchange,
        originalMessage: message,
        timestamp: now(),
        retryable: isRetryableError(code)
    });
}
