/**
 * Exchange Adapter - Abstract Base Class
 *
 * Defines the raw venue surface for margin FX. Adapters perform exactly one
 * HTTP exchange per call: no retry, no throttling. Those belong to the
 * gateway, which knows which calls are safe to repeat.
 */

import { ExchangeCredentials } from "./ExchangeCredentials";

// ============================================================================
// Type Definitions
// ============================================================================

export type OrderSide = "BUY" | "SELL";
export type MarketStatus = "OPEN" | "CLOSE" | "MAINTENANCE";

// ============================================================================
// Interfaces
// ============================================================================

export interface Ticker {
    readonly symbol: string;
    readonly bid: number;
    readonly ask: number;
    readonly timestamp: number;       // Unix ms
}

export interface AccountAssets {
    readonly equity: number;
    readonly margin: number;          // Margin in use
    readonly availableAmount: number;
    /** Maintenance ratio as a fraction (1.5 = 150%); null when no margin is in use */
    readonly marginRatio: number | null;
}

export interface ExchangePosition {
    readonly positionId: string;
    readonly symbol: string;
    readonly side: OrderSide;
    readonly size: number;
    readonly price: number;
    readonly totalSwap: number;
    readonly openedAt: number;        // Unix ms
}

export interface MarketOrderParams {
    readonly clientOrderId: string;
    readonly symbol: string;
    readonly side: OrderSide;
    readonly size: number;
}

export interface ClosePositionParams {
    readonly clientOrderId: string;
    readonly symbol: string;
    readonly side: OrderSide;         // Opposite of the position side
    readonly positionId: string;
    readonly size: number;
}

export interface OrderAck {
    readonly orderId: string;
    readonly clientOrderId?: string;
    readonly status: string;
}

export interface ExecutionFill {
    readonly executionId: string;
    readonly orderId: string;
    readonly positionId: string;
    readonly symbol: string;
    readonly side: OrderSide;
    readonly settleType: "OPEN" | "CLOSE";
    readonly size: number;
    readonly price: number;
    readonly timestamp: number;
}

// ============================================================================
// Abstract Base Class
// ============================================================================

export abstract class ExchangeAdapter {
    protected readonly credentials: ExchangeCredentials | null;

    abstract readonly exchange: string;

    constructor(credentials: ExchangeCredentials | null) {
        this.credentials = credentials;
    }

    // -------------------------------------------------------------------------
    // Public Market Data
    // -------------------------------------------------------------------------

    abstract getTicker(symbol: string): Promise<Ticker>;

    abstract getMarketStatus(): Promise<MarketStatus>;

    // -------------------------------------------------------------------------
    // Account (private reads)
    // -------------------------------------------------------------------------

    abstract getAccountAssets(): Promise<AccountAssets>;

    abstract getOpenPositions(symbol: string): Promise<ExchangePosition[]>;

    abstract getExecutions(orderId: string): Promise<ExecutionFill[]>;

    // -------------------------------------------------------------------------
    // Order Operations (private mutations)
    // -------------------------------------------------------------------------

    /**
     * Submit a market order that opens a new position.
     */
    abstract placeMarketOrder(params: MarketOrderParams): Promise<OrderAck>;

    /**
     * Submit a market order that settles the given position.
     */
    abstract closePosition(params: ClosePositionParams): Promise<OrderAck>;

    hasCredentials(): boolean {
        return this.credentials !== null;
    }
}
