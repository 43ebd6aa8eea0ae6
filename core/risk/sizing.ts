import { Quote, TradeSide } from "../domain/types";

export interface SizingInput {
    readonly equity: number;
    readonly quote: Quote;
    readonly side: TradeSide;
    readonly suggestedLeverage?: number;
    readonly maxLeverage: number;
    readonly lotUnit: number;
}

export interface SizingResult {
    readonly size: number;
    readonly leverage: number;
    readonly price: number;
    readonly notional: number;
}

/**
 * Pure function to size a market order.
 *
 * Logic:
 * 1. Execution price is the side we cross: ask for BUY, bid for SELL.
 * 2. Leverage = min(suggested ?? 1, maxLeverage).
 * 3. Units = equity * leverage / price, floored to whole lots.
 *
 * A result of size 0 means the account cannot afford one lot.
 */
export function computeOrderSize(input: SizingInput): SizingResult {
    const price = input.side === "BUY" ? input.quote.ask : input.quote.bid;
    const leverage = Math.min(input.suggestedLeverage ?? 1, input.maxLeverage);

    if (!(price > 0) || !(input.equity > 0) || !(leverage > 0) || !(input.lotUnit > 0)) {
        return { size: 0, leverage, price, notional: 0 };
    }

    const lots = Math.floor((input.equity * leverage) / price / input.lotUnit);
    const size = Math.max(0, lots) * input.lotUnit;

    return {
        size,
        leverage,
        price,
        notional: size * price
    };
}
