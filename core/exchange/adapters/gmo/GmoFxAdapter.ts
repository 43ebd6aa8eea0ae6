/**
 * GMO Coin FX Adapter
 *
 * REST client for GMO Coin margin FX. One call is one HTTP request:
 * throttling and retry live in the gateway so that mutating calls
 * can never be repeated by accident.
 *
 * Endpoints:
 * - Public:  https://forex-api.coin.z.com/public
 * - Private: https://forex-api.coin.z.com/private
 */

import {
    ExchangeAdapter,
    Ticker,
    AccountAssets,
    ExchangePosition,
    MarketOrderParams,
    ClosePositionParams,
    OrderAck,
    ExecutionFill,
    MarketStatus,
    OrderSide
} from "../base/ExchangeAdapter";
import { ExchangeCredentials } from "../base/ExchangeCredentials";
import {
    ExchangeError,
    ExchangeErrorCode,
    createExchangeError,
    isRetryableError
} from "../base/ExchangeError";
import { GmoSigner } from "./GmoSigner";
import {
    GMO_FX_PUBLIC_BASE,
    GMO_FX_PRIVATE_BASE,
    GmoCloseOrderRequest,
    GmoOrderRequest,
    GmoPayloadError,
    isRecord,
    listOf,
    parseAssets,
    parseEnvelope,
    parseExecution,
    parseOpenPosition,
    parseOrder,
    parseTicker
} from "./gmo_types";

// ============================================================================
// Constants
// ============================================================================

const REQUEST_TIMEOUT = 10000;

export interface GmoFxAdapterOptions {
    readonly publicBaseUrl?: string;
    readonly privateBaseUrl?: string;
    readonly requestTimeoutMs?: number;
    readonly fetchImpl?: typeof fetch;
    readonly now?: () => number;
}

// ============================================================================
// GMO FX Adapter
// ============================================================================

export class GmoFxAdapter extends ExchangeAdapter {
    readonly exchange = "gmo";

    readonly #signer: GmoSigner | null;
    readonly #publicBaseUrl: string;
    readonly #privateBaseUrl: string;
    readonly #timeoutMs: number;
    readonly #fetch: typeof fetch;
    readonly #now: () => number;

    constructor(credentials: ExchangeCredentials | null, options: GmoFxAdapterOptions = {}) {
        super(credentials);
        this.#signer = credentials ? new GmoSigner(credentials.apiKey, credentials.secretKey) : null;
        this.#publicBaseUrl = options.publicBaseUrl ?? GMO_FX_PUBLIC_BASE;
        this.#privateBaseUrl = options.privateBaseUrl ?? GMO_FX_PRIVATE_BASE;
        this.#timeoutMs = options.requestTimeoutMs ?? REQUEST_TIMEOUT;
        this.#fetch = options.fetchImpl ?? fetch;
        this.#now = options.now ?? Date.now;
    }

    // -------------------------------------------------------------------------
    // Public Market Data
    // -------------------------------------------------------------------------

    async getTicker(symbol: string): Promise<Ticker> {
        const url = `${this.#publicBaseUrl}/v1/ticker`;
        const data = await this.request(url, { method: "GET" });

        const match = this.parse(() => listOf(data).map(parseTicker)).find(t => t.symbol === symbol);
        if (!match) {
            throw this.error(ExchangeErrorCode.SYMBOL_NOT_FOUND, `Ticker for ${symbol} not in response`);
        }

        return {
            symbol: match.symbol,
            bid: this.toNumber(match.bid, "bid"),
            ask: this.toNumber(match.ask, "ask"),
            timestamp: this.toTime(match.timestamp)
        };
    }

    async getMarketStatus(): Promise<MarketStatus> {
        const url = `${this.#publicBaseUrl}/v1/status`;
        const data = await this.request(url, { method: "GET" });

        const status = isRecord(data) ? data.status : undefined;
        if (status === "OPEN" || status === "CLOSE" || status === "MAINTENANCE") {
            return status;
        }
        throw this.error(ExchangeErrorCode.MALFORMED_RESPONSE, `Unexpected market status: ${String(status)}`);
    }

    // -------------------------------------------------------------------------
    // Account
    // -------------------------------------------------------------------------

    async getAccountAssets(): Promise<AccountAssets> {
        const data = await this.privateGet("/v1/account/assets", {});
        const assets = this.parse(() => parseAssets(data));

        const margin = this.toNumber(assets.margin, "margin");
        const ratioPct = this.toNumber(assets.marginRatio, "marginRatio");

        return {
            equity: this.toNumber(assets.equity, "equity"),
            margin,
            availableAmount: this.toNumber(assets.availableAmount, "availableAmount"),
            // GMO reports 0 when nothing is held
            marginRatio: margin > 0 && ratioPct > 0 ? ratioPct / 100 : null
        };
    }

    async getOpenPositions(symbol: string): Promise<ExchangePosition[]> {
        const data = await this.privateGet("/v1/openPositions", { symbol });
        const rows = this.parse(() => listOf(data).map(parseOpenPosition));

        return rows.map(p => ({
            positionId: p.positionId,
            symbol: p.symbol,
            side: this.toSide(p.side),
            size: this.toNumber(p.size, "size"),
            price: this.toNumber(p.price, "price"),
            totalSwap: this.toNumber(p.totalSwap, "totalSwap"),
            openedAt: this.toTime(p.timestamp)
        }));
    }

    async getExecutions(orderId: string): Promise<ExecutionFill[]> {
        const data = await this.privateGet("/v1/executions", { orderId });
        const rows = this.parse(() => listOf(data).map(parseExecution));

        return rows.map(e => ({
            executionId: e.executionId,
            orderId: e.orderId,
            positionId: e.positionId,
            symbol: e.symbol,
            side: this.toSide(e.side),
            settleType: e.settleType === "CLOSE" ? "CLOSE" : "OPEN",
            size: this.toNumber(e.size, "size"),
            price: this.toNumber(e.price, "price"),
            timestamp: this.toTime(e.timestamp)
        }));
    }

    // -------------------------------------------------------------------------
    // Order Operations
    // -------------------------------------------------------------------------

    async placeMarketOrder(params: MarketOrderParams): Promise<OrderAck> {
        const body: GmoOrderRequest = {
            symbol: params.symbol,
            side: params.side,
            size: String(params.size),
            clientOrderId: params.clientOrderId,
            executionType: "MARKET"
        };

        const data = await this.privatePost("/v1/order", body);
        const order = this.parse(() => parseOrder(data));
        return { orderId: order.orderId, clientOrderId: order.clientOrderId, status: order.status };
    }

    async closePosition(params: ClosePositionParams): Promise<OrderAck> {
        const positionId = Number(params.positionId);
        if (!Number.isInteger(positionId)) {
            throw this.error(ExchangeErrorCode.POSITION_NOT_FOUND, `Invalid position id ${params.positionId}`);
        }

        const body: GmoCloseOrderRequest = {
            symbol: params.symbol,
            side: params.side,
            clientOrderId: params.clientOrderId,
            executionType: "MARKET",
            settlePosition: [{ positionId, size: String(params.size) }]
        };

        const data = await this.privatePost("/v1/closeOrder", body);
        const order = this.parse(() => parseOrder(data));
        return { orderId: order.orderId, clientOrderId: order.clientOrderId, status: order.status };
    }

    // -------------------------------------------------------------------------
    // Private Helpers
    // -------------------------------------------------------------------------

    private requireSigner(): GmoSigner {
        if (!this.#signer) {
            throw this.error(ExchangeErrorCode.CREDENTIALS_MISSING, "API key/secret required for private API");
        }
        return this.#signer;
    }

    private async privateGet(path: string, params: Record<string, string>): Promise<unknown> {
        const signer = this.requireSigner();
        const { url, headers } = signer.signGetRequest(this.#privateBaseUrl, path, params, this.#now());
        return this.request(url, { method: "GET", headers });
    }

    private async privatePost(path: string, payload: object): Promise<unknown> {
        const signer = this.requireSigner();
        const { body, headers } = signer.signPostRequest(path, payload, this.#now());
        return this.request(`${this.#privateBaseUrl}${path}`, { method: "POST", headers, body });
    }

    private async request(url: string, options: RequestInit): Promise<unknown> {
        const response = await this.fetchWithTimeout(url, options);
        return this.handleResponse(response);
    }

    private async fetchWithTimeout(url: string, options: RequestInit): Promise<Response> {
        const controller = new AbortController();
        const timeout = setTimeout(() => controller.abort(), this.#timeoutMs);

        const fetchImpl = this.#fetch;

        try {
            return await fetchImpl(url, {
                ...options,
                signal: controller.signal
            });
        } catch (error) {
            if (error instanceof Error && error.name === "AbortError") {
                throw this.error(ExchangeErrorCode.TIMEOUT, "Request timeout");
            }
            throw createExchangeError(this.exchange, error, ExchangeErrorCode.NETWORK_ERROR, this.#now);
        } finally {
            clearTimeout(timeout);
        }
    }

    private async handleResponse(response: Response): Promise<unknown> {
        if (response.status === 429) {
            throw this.error(ExchangeErrorCode.RATE_LIMIT_EXCEEDED, "HTTP 429", response.status);
        }
        if (response.status >= 500) {
            const code = response.status === 503
                ? ExchangeErrorCode.SERVICE_UNAVAILABLE
                : ExchangeErrorCode.SERVER_ERROR;
            throw this.error(code, `HTTP ${response.status}`, response.status);
        }

        let body: unknown;
        try {
            body = await response.json();
        } catch (error) {
            throw this.error(
                ExchangeErrorCode.MALFORMED_RESPONSE,
                `Unparseable body (HTTP ${response.status}): ${error instanceof Error ? error.message : String(error)}`,
                response.status
            );
        }

        const envelope = parseEnvelope(body);
        if (!envelope) {
            throw this.error(ExchangeErrorCode.MALFORMED_RESPONSE, `Missing status envelope (HTTP ${response.status})`, response.status);
        }

        if (envelope.status !== 0) {
            const first = envelope.messages?.[0];
            const originalCode = first?.message_code ?? "UNKNOWN";
            const code = this.mapGmoError(originalCode);
            throw new ExchangeError({
                code,
                message: first?.message_string || `GMO error status ${envelope.status}`,
                exchange: this.exchange,
                originalCode,
                originalMessage: first?.message_string,
                httpStatus: response.status,
                timestamp: this.#now(),
                retryable: isRetryableError(code)
            });
        }

        return envelope.data;
    }

    private mapGmoError(code: string): ExchangeErrorCode {
        switch (code) {
            case "ERR-5003": return ExchangeErrorCode.RATE_LIMIT_EXCEEDED;
            case "ERR-5008":
            case "ERR-5009":
            case "ERR-5010": return ExchangeErrorCode.SIGNATURE_INVALID;
            case "ERR-5011":
            case "ERR-5012": return ExchangeErrorCode.API_KEY_INVALID;
            case "ERR-5201": return ExchangeErrorCode.SERVICE_UNAVAILABLE;
            case "ERR-5202": return ExchangeErrorCode.MARKET_CLOSED;
            case "ERR-200":
            case "ERR-201": return ExchangeErrorCode.INSUFFICIENT_MARGIN;
            case "ERR-254": return ExchangeErrorCode.POSITION_NOT_FOUND;
            case "ERR-5106":
            case "ERR-5114": return ExchangeErrorCode.INVALID_QUANTITY;
            default: return ExchangeErrorCode.ORDER_REJECTED;
        }
    }

    private parse<T>(fn: () => T): T {
        try {
            return fn();
        } catch (error) {
            if (error instanceof GmoPayloadError) {
                throw this.error(ExchangeErrorCode.MALFORMED_RESPONSE, error.message);
            }
            throw error;
        }
    }

    private toNumber(value: string, field: string): number {
        const parsed = Number(value);
        if (!Number.isFinite(parsed)) {
            throw this.error(ExchangeErrorCode.MALFORMED_RESPONSE, `Field '${field}' is not numeric: ${value}`);
        }
        return parsed;
    }

    private toTime(value: string): number {
        const parsed = Date.parse(value);
        return Number.isNaN(parsed) ? this.#now() : parsed;
    }

    private toSide(value: string): OrderSide {
        if (value === "BUY" || value === "SELL") return value;
        throw this.error(ExchangeErrorCode.MALFORMED_RESPONSE, `Unknown side: ${value}`);
    }

    private error(code: ExchangeErrorCode, message: string, httpStatus?: number): ExchangeError {
        return new ExchangeError({
            code,
            message,
            exchange: this.exchange,
            httpStatus,
            timestamp: this.#now(),
            retryable: isRetryableError(code)
        });
    }
}
