/**
 * Exchange Gateway
 *
 * The only path from the trading core to the venue.
 *
 * Reads (ticker, status, assets, positions, executions) are idempotent:
 * each attempt takes a token from the shared bucket and transient failures
 * are retried with backoff.
 *
 * Mutations (open, close) are sent exactly once. They bypass retry entirely
 * and are classified CONFIRMED / REJECTED / AMBIGUOUS. An accepted order is
 * CONFIRMED only once its fill is observed through an authoritative read.
 */

import crypto from "node:crypto";
import {
    ExchangeAdapter,
    ExchangePosition,
    ExecutionFill,
    MarketStatus
} from "../adapters/base/ExchangeAdapter";
import { ExchangeErrorCode } from "../adapters/base/ExchangeError";
import { BackoffPolicy, DEFAULT_BACKOFF_POLICY, withReadRetry } from "../ratelimit/backoff";
import { SYSTEM_CLOCK, TokenBucket } from "../ratelimit/TokenBucket";
import { AccountSnapshot, OrderIntent, OrderResult, Position, Quote } from "../../domain/types";
import { ambiguousResult, classifyMutationError, confirmedResult, rejectedResult } from "./order_result";

// ============================================================================
// Configuration
// ============================================================================

export interface GatewayConfig {
    readonly backoff: BackoffPolicy;
    /** Reads of the executions endpoint after an accepted order */
    readonly fillPollAttempts: number;
    readonly fillPollDelayMs: number;
}

export interface GatewayDeps {
    readonly limiter: TokenBucket;
    /** Re-evaluated immediately before every mutating call */
    readonly isArmed: () => boolean;
    readonly sleep?: (ms: number) => Promise<void>;
    readonly random?: () => number;
    readonly now?: () => number;
}

const DEFAULT_CONFIG: GatewayConfig = {
    backoff: DEFAULT_BACKOFF_POLICY,
    fillPollAttempts: 3,
    fillPollDelayMs: 1000
};

// ============================================================================
// Exchange Gateway
// ============================================================================

export class ExchangeGateway {
    readonly #adapter: ExchangeAdapter;
    readonly #config: GatewayConfig;
    readonly #limiter: TokenBucket;
    readonly #isArmed: () => boolean;
    readonly #sleep: (ms: number) => Promise<void>;
    readonly #random: () => number;
    readonly #now: () => number;

    #mutationCount = 0;

    constructor(adapter: ExchangeAdapter, deps: GatewayDeps, config: Partial<GatewayConfig> = {}) {
        this.#adapter = adapter;
        this.#config = { ...DEFAULT_CONFIG, ...config };
        this.#limiter = deps.limiter;
        this.#isArmed = deps.isArmed;
        this.#sleep = deps.sleep ?? SYSTEM_CLOCK.sleep;
        this.#random = deps.random ?? Math.random;
        this.#now = deps.now ?? Date.now;
    }

    get exchange(): string {
        return this.#adapter.exchange;
    }

    /**
     * Number of mutating calls actually sent to the adapter.
     */
    get mutationCount(): number {
        return this.#mutationCount;
    }

    // -------------------------------------------------------------------------
    // Reads
    // -------------------------------------------------------------------------

    async getQuote(pair: string): Promise<Quote> {
        const ticker = await this.read("getTicker", () => this.#adapter.getTicker(pair));
        return { pair: ticker.symbol, bid: ticker.bid, ask: ticker.ask, timestamp: ticker.timestamp };
    }

    async getMarketStatus(): Promise<MarketStatus> {
        return this.read("getMarketStatus", () => this.#adapter.getMarketStatus());
    }

    async getOpenPositions(pair: string): Promise<Position[]> {
        const rows = await this.read("getOpenPositions", () => this.#adapter.getOpenPositions(pair));
        return rows.map(toPosition);
    }

    /**
     * Authoritative account view for one pair.
     */
    async getAccountSnapshot(pair: string): Promise<AccountSnapshot> {
        const assets = await this.read("getAccountAssets", () => this.#adapter.getAccountAssets());
        const positions = await this.getOpenPositions(pair);
        const timestamp = this.#now();

        const snapshotId = crypto
            .createHash("sha256")
            .update(`${pair}:${timestamp}:${assets.equity}:${positions.map(p => p.id).join(",")}`)
            .digest("hex")
            .slice(0, 16);

        return Object.freeze({
            snapshotId,
            pair,
            equity: assets.equity,
            marginRatio: assets.marginRatio,
            openPositions: Object.freeze(positions),
            timestamp
        });
    }

    // -------------------------------------------------------------------------
    // Mutations
    // -------------------------------------------------------------------------

    /**
     * Send an order intent once and classify the outcome.
     */
    async submit(intent: OrderIntent): Promise<OrderResult> {
        // Last line of defence: nothing leaves the process unless armed right now
        if (!this.#isArmed()) {
            console.warn(`[Gateway] Refusing ${intent.action} ${intent.idempotencyKey}: not armed`);
            return rejectedResult("Live trading not armed at send time", ExchangeErrorCode.SAFETY_BLOCKED);
        }
        if (intent.action === "CLOSE" && !intent.positionId) {
            return rejectedResult("Close intent without position id", ExchangeErrorCode.POSITION_NOT_FOUND);
        }

        let orderId: string;
        try {
            this.#mutationCount++;
            const ack = intent.action === "OPEN"
                ? await this.#adapter.placeMarketOrder({
                    clientOrderId: intent.idempotencyKey,
                    symbol: intent.pair,
                    side: intent.side,
                    size: intent.size
                })
                : await this.#adapter.closePosition({
                    clientOrderId: intent.idempotencyKey,
                    symbol: intent.pair,
                    side: intent.side,
                    positionId: intent.positionId ?? "",
                    size: intent.size
                });
            orderId = ack.orderId;
        } catch (error) {
            const result = classifyMutationError(error);
            console.error(
                `[Gateway] ${intent.action} ${intent.idempotencyKey} -> ${result.status} ` +
                `(${result.errorCode}: ${result.error})`
            );
            return result;
        }

        console.log(`[Gateway] ${intent.action} ${intent.idempotencyKey} accepted as order ${orderId}`);
        return this.confirmFill(intent, orderId);
    }

    // -------------------------------------------------------------------------
    // Private Helpers
    // -------------------------------------------------------------------------

    private async confirmFill(intent: OrderIntent, orderId: string): Promise<OrderResult> {
        for (let poll = 1; poll <= this.#config.fillPollAttempts; poll++) {
            let fills: ExecutionFill[];
            try {
                fills = await this.read("getExecutions", () => this.#adapter.getExecutions(orderId));
            } catch (error) {
                const message = error instanceof Error ? error.message : String(error);
                return ambiguousResult(`Fill not verifiable: ${message}`, ExchangeErrorCode.TIMEOUT, orderId);
            }

            if (fills.length > 0) {
                const size = fills.reduce((sum, f) => sum + f.size, 0);
                const notional = fills.reduce((sum, f) => sum + f.size * f.price, 0);
                const positionId = intent.action === "OPEN"
                    ? fills[0].positionId
                    : intent.positionId ?? fills[0].positionId;

                return confirmedResult(orderId, {
                    positionId,
                    price: size > 0 ? notional / size : fills[0].price,
                    size,
                    timestamp: fills[fills.length - 1].timestamp
                });
            }

            if (poll < this.#config.fillPollAttempts) {
                await this.#sleep(this.#config.fillPollDelayMs);
            }
        }

        return ambiguousResult(
            `Order ${orderId} accepted but no fill observed`,
            ExchangeErrorCode.MALFORMED_RESPONSE,
            orderId
        );
    }

    private read<T>(operation: string, fn: () => Promise<T>): Promise<T> {
        return withReadRetry(operation, fn, this.#config.backoff, {
            limiter: this.#limiter,
            sleep: this.#sleep,
            random: this.#random
        });
    }
}

function toPosition(p: ExchangePosition): Position {
    return Object.freeze({
        id: p.positionId,
        pair: p.symbol,
        side: p.side,
        size: p.size,
        entryPrice: p.price,
        openedAt: p.openedAt,
        swapAccruedToDate: p.totalSwap
    });
}
