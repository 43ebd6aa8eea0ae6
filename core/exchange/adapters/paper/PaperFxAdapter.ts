/**
 * Paper FX Adapter
 *
 * In-memory venue used for dry runs. Orders fill immediately at the
 * current quote; margin ratio is derived from a fixed exchange leverage.
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
    MarketStatus
} from "../base/ExchangeAdapter";
import { ExchangeError, ExchangeErrorCode } from "../base/ExchangeError";

export interface PaperFxAdapterOptions {
    readonly balance?: number;
    readonly bid?: number;
    readonly ask?: number;
    /** Venue leverage used to compute required margin */
    readonly venueLeverage?: number;
    readonly now?: () => number;
}

const DEFAULTS = {
    balance: 1_000_000,
    bid: 150.0,
    ask: 150.05,
    venueLeverage: 25
};

export class PaperFxAdapter extends ExchangeAdapter {
    readonly exchange = "paper";

    readonly #positions = new Map<string, ExchangePosition>();
    readonly #executions = new Map<string, ExecutionFill[]>();
    readonly #venueLeverage: number;
    readonly #now: () => number;

    #balance: number;
    #bid: number;
    #ask: number;
    #status: MarketStatus = "OPEN";
    #seq = 0;

    constructor(options: PaperFxAdapterOptions = {}) {
        super(null);
        this.#balance = options.balance ?? DEFAULTS.balance;
        this.#bid = options.bid ?? DEFAULTS.bid;
        this.#ask = options.ask ?? DEFAULTS.ask;
        this.#venueLeverage = options.venueLeverage ?? DEFAULTS.venueLeverage;
        this.#now = options.now ?? Date.now;
    }

    // -------------------------------------------------------------------------
    // Simulation Controls
    // -------------------------------------------------------------------------

    setQuote(bid: number, ask: number): void {
        this.#bid = bid;
        this.#ask = ask;
    }

    setMarketStatus(status: MarketStatus): void {
        this.#status = status;
    }

    // -------------------------------------------------------------------------
    // ExchangeAdapter
    // -------------------------------------------------------------------------

    async getTicker(symbol: string): Promise<Ticker> {
        return { symbol, bid: this.#bid, ask: this.#ask, timestamp: this.#now() };
    }

    async getMarketStatus(): Promise<MarketStatus> {
        return this.#status;
    }

    async getAccountAssets(): Promise<AccountAssets> {
        let margin = 0;
        let unrealized = 0;
        for (const p of this.#positions.values()) {
            const mark = p.side === "BUY" ? this.#bid : this.#ask;
            margin += (p.size * mark) / this.#venueLeverage;
            unrealized += (p.side === "BUY" ? mark - p.price : p.price - mark) * p.size;
        }

        const equity = this.#balance + unrealized;
        return {
            equity,
            margin,
            availableAmount: equity - margin,
            marginRatio: margin > 0 ? equity / margin : null
        };
    }

    async getOpenPositions(symbol: string): Promise<ExchangePosition[]> {
        return Array.from(this.#positions.values()).filter(p => p.symbol === symbol);
    }

    async getExecutions(orderId: string): Promise<ExecutionFill[]> {
        return this.#executions.get(orderId) ?? [];
    }

    async placeMarketOrder(params: MarketOrderParams): Promise<OrderAck> {
        if (this.#status !== "OPEN") {
            throw this.reject(ExchangeErrorCode.MARKET_CLOSED, "Market is not open");
        }
        if (params.size <= 0) {
            throw this.reject(ExchangeErrorCode.INVALID_QUANTITY, `Invalid size ${params.size}`);
        }

        const orderId = this.nextId();
        const positionId = this.nextId();
        const price = params.side === "BUY" ? this.#ask : this.#bid;
        const now = this.#now();

        this.#positions.set(positionId, {
            positionId,
            symbol: params.symbol,
            side: params.side,
            size: params.size,
            price,
            totalSwap: 0,
            openedAt: now
        });
        this.#executions.set(orderId, [{
            executionId: this.nextId(),
            orderId,
            positionId,
            symbol: params.symbol,
            side: params.side,
            settleType: "OPEN",
            size: params.size,
            price,
            timestamp: now
        }]);

        console.log(`[PaperFx] ${params.side} ${params.size} ${params.symbol} @ ${price} (position ${positionId})`);
        return { orderId, clientOrderId: params.clientOrderId, status: "EXECUTED" };
    }

    async closePosition(params: ClosePositionParams): Promise<OrderAck> {
        const position = this.#positions.get(params.positionId);
        if (!position) {
            throw this.reject(ExchangeErrorCode.POSITION_NOT_FOUND, `No position ${params.positionId}`);
        }

        const orderId = this.nextId();
        const price = params.side === "BUY" ? this.#ask : this.#bid;
        const pnl = (position.side === "BUY" ? price - position.price : position.price - price) * position.size;

        this.#balance += pnl + position.totalSwap;
        this.#positions.delete(params.positionId);
        this.#executions.set(orderId, [{
            executionId: this.nextId(),
            orderId,
            positionId: params.positionId,
            symbol: params.symbol,
            side: params.side,
            settleType: "CLOSE",
            size: position.size,
            price,
            timestamp: this.#now()
        }]);

        console.log(`[PaperFx] Closed position ${params.positionId} @ ${price} (pnl ${pnl.toFixed(2)})`);
        return { orderId, clientOrderId: params.clientOrderId, status: "EXECUTED" };
    }

    // -------------------------------------------------------------------------
    // Private Helpers
    // -------------------------------------------------------------------------

    private nextId(): string {
        this.#seq += 1;
        return String(this.#seq);
    }

    private reject(code: ExchangeErrorCode, message: string): ExchangeError {
        return new ExchangeError({
            code,
            message,
            exchange: this.exchange,
            timestamp: this.#now(),
            retryable: false
        });
    }
}
