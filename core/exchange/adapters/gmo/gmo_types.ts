/**
 * GMO Coin FX API Type Definitions
 *
 * Public:  https://forex-api.coin.z.com/public
 * Private: https://forex-api.coin.z.com/private
 *
 * Every response is wrapped as { status, data, responsetime } on success or
 * { status, messages: [{ message_code, message_string }] } on error.
 * Numeric fields arrive as strings.
 */

export const GMO_FX_PUBLIC_BASE = "https://forex-api.coin.z.com/public";
export const GMO_FX_PRIVATE_BASE = "https://forex-api.coin.z.com/private";

// ============================================================================
// API Response Wrapper
// ============================================================================

export interface GmoMessage {
    readonly message_code: string;
    readonly message_string: string;
}

export interface GmoApiResponse {
    readonly status: number;
    readonly data?: unknown;
    readonly messages?: readonly GmoMessage[];
    readonly responsetime?: string;
}

// ============================================================================
// Raw Payloads (after field-level parsing)
// ============================================================================

export interface GmoTicker {
    readonly symbol: string;
    readonly ask: string;
    readonly bid: string;
    readonly timestamp: string;
    readonly status: string;
}

export interface GmoAssets {
    readonly equity: string;
    readonly availableAmount: string;
    readonly margin: string;
    readonly marginRatio: string;
}

export interface GmoOpenPosition {
    readonly positionId: string;
    readonly symbol: string;
    readonly side: string;
    readonly size: string;
    readonly price: string;
    readonly totalSwap: string;
    readonly timestamp: string;
}

export interface GmoOrder {
    readonly orderId: string;
    readonly clientOrderId?: string;
    readonly status: string;
}

export interface GmoExecution {
    readonly executionId: string;
    readonly orderId: string;
    readonly positionId: string;
    readonly symbol: string;
    readonly side: string;
    readonly settleType: string;
    readonly size: string;
    readonly price: string;
    readonly timestamp: string;
}

export interface GmoOrderRequest {
    readonly symbol: string;
    readonly side: "BUY" | "SELL";
    readonly size: string;
    readonly clientOrderId: string;
    readonly executionType: "MARKET";
}

export interface GmoCloseOrderRequest {
    readonly symbol: string;
    readonly side: "BUY" | "SELL";
    readonly clientOrderId: string;
    readonly executionType: "MARKET";
    readonly settlePosition: ReadonlyArray<{ readonly positionId: number; readonly size: string }>;
}

// ============================================================================
// Field Readers
// ============================================================================

export class GmoPayloadError extends Error {
    constructor(message: string) {
        super(message);
        this.name = "GmoPayloadError";
    }
}

export function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Read a scalar field as string. GMO mixes numbers and numeric strings.
 */
export function readField(obj: Record<string, unknown>, key: string): string {
    const value = obj[key];
    if (typeof value === "string") return value;
    if (typeof value === "number" && Number.isFinite(value)) return String(value);
    throw new GmoPayloadError(`Missing or invalid field '${key}'`);
}

export function readOptionalField(obj: Record<string, unknown>, key: string): string | undefined {
    return obj[key] === undefined || obj[key] === null ? undefined : readField(obj, key);
}

export function readNumber(obj: Record<string, unknown>, key: string): number {
    const parsed = Number(readField(obj, key));
    if (!Number.isFinite(parsed)) {
        throw new GmoPayloadError(`Field '${key}' is not numeric`);
    }
    return parsed;
}

/**
 * Unwrap the response envelope. Returns null for a non-envelope body.
 */
export function parseEnvelope(body: unknown): GmoApiResponse | null {
    if (!isRecord(body) || typeof body.status !== "number") {
        return null;
    }

    const messages: GmoMessage[] = [];
    if (Array.isArray(body.messages)) {
        for (const m of body.messages) {
            if (isRecord(m)) {
                messages.push({
                    message_code: String(m.message_code ?? "UNKNOWN"),
                    message_string: String(m.message_string ?? "")
                });
            }
        }
    }

    return {
        status: body.status,
        data: body.data,
        messages,
        responsetime: typeof body.responsetime === "string" ? body.responsetime : undefined
    };
}

/**
 * List payloads come either bare or as { list: [...] }.
 */
export function listOf(data: unknown): Record<string, unknown>[] {
    const raw = isRecord(data) ? data.list ?? [] : data ?? [];
    if (!Array.isArray(raw)) {
        throw new GmoPayloadError("Expected a list payload");
    }
    return raw.filter(isRecord);
}

export function parseTicker(item: Record<string, unknown>): GmoTicker {
    return {
        symbol: readField(item, "symbol"),
        ask: readField(item, "ask"),
        bid: readField(item, "bid"),
        timestamp: readField(item, "timestamp"),
        status: readOptionalField(item, "status") ?? "OPEN"
    };
}

export function parseAssets(data: unknown): GmoAssets {
    const item = Array.isArray(data) ? data[0] : data;
    if (!isRecord(item)) {
        throw new GmoPayloadError("Expected an assets object");
    }
    return {
        equity: readField(item, "equity"),
        availableAmount: readOptionalField(item, "availableAmount") ?? "0",
        margin: readOptionalField(item, "margin") ?? "0",
        marginRatio: readOptionalField(item, "marginRatio") ?? "0"
    };
}

export function parseOpenPosition(item: Record<string, unknown>): GmoOpenPosition {
    return {
        positionId: readField(item, "positionId"),
        symbol: readField(item, "symbol"),
        side: readField(item, "side"),
        size: readField(item, "size"),
        price: readField(item, "price"),
        totalSwap: readOptionalField(item, "totalSwap") ?? "0",
        timestamp: readField(item, "timestamp")
    };
}

export function parseOrder(data: unknown): GmoOrder {
    const item = Array.isArray(data) ? data[0] : data;
    if (!isRecord(item)) {
        throw new GmoPayloadError("Expected an order acknowledgement");
    }
    return {
        orderId: readField(item, "orderId"),
        clientOrderId: readOptionalField(item, "clientOrderId"),
        status: readOptionalField(item, "status") ?? "UNKNOWN"
    };
}

export function parseExecution(item: Record<string, unknown>): GmoExecution {
    return {
        executionId: readField(item, "executionId"),
        orderId: readField(item, "orderId"),
        positionId: readField(item, "positionId"),
        symbol: readField(item, "symbol"),
        side: readField(item, "side"),
        settleType: readField(item, "settleType"),
        size: readField(item, "size"),
        price: readField(item, "price"),
        timestamp: readField(item, "timestamp")
    };
}
