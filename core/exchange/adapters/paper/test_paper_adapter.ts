import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { PaperFxAdapter } from "./PaperFxAdapter";
import { ExchangeError, ExchangeErrorCode } from "../base/ExchangeError";

const NOW = 1_700_000_000_000;

describe("PaperFxAdapter", () => {
    it("fills a BUY at the ask and reports the position and execution", async () => {
        const paper = new PaperFxAdapter({ balance: 1_000_000, bid: 8.0, ask: 8.01, now: () => NOW });

        const ack = await paper.placeMarketOrder({ clientOrderId: "k1", symbol: "MXN_JPY", side: "BUY", size: 10000 });

        assert.deepEqual(ack, { orderId: "1", clientOrderId: "k1", status: "EXECUTED" });
        assert.deepEqual(await paper.getOpenPositions("MXN_JPY"), [{
            positionId: "2",
            symbol: "MXN_JPY",
            side: "BUY",
            size: 10000,
            price: 8.01,
            totalSwap: 0,
            openedAt: NOW
        }]);
        const fills = await paper.getExecutions("1");
        assert.equal(fills.length, 1);
        assert.equal(fills[0].positionId, "2");
        assert.equal(fills[0].price, 8.01);
    });

    it("derives margin ratio from venue leverage", async () => {
        const paper = new PaperFxAdapter({ balance: 100_000, bid: 10, ask: 10, venueLeverage: 25, now: () => NOW });
        assert.equal((await paper.getAccountAssets()).marginRatio, null);

        await paper.placeMarketOrder({ clientOrderId: "k1", symbol: "MXN_JPY", side: "BUY", size: 100_000 });
        const assets = await paper.getAccountAssets();

        // margin = 100000 * 10 / 25 = 40000
        assert.equal(assets.margin, 40_000);
        assert.equal(assets.marginRatio, 2.5);
    });

    it("closes a position and realizes the P&L", async () => {
        const paper = new PaperFxAdapter({ balance: 1_000_000, bid: 8.0, ask: 8.0, now: () => NOW });
        await paper.placeMarketOrder({ clientOrderId: "k1", symbol: "MXN_JPY", side: "BUY", size: 10000 });

        paper.setQuote(8.5, 8.5);
        await paper.closePosition({ clientOrderId: "k2", symbol: "MXN_JPY", side: "SELL", positionId: "2", size: 10000 });

        assert.deepEqual(await paper.getOpenPositions("MXN_JPY"), []);
        assert.equal((await paper.getAccountAssets()).equity, 1_005_000);
    });

    it("refuses orders while the market is closed", async () => {
        const paper = new PaperFxAdapter({ now: () => NOW });
        paper.setMarketStatus("CLOSE");

        await assert.rejects(
            paper.placeMarketOrder({ clientOrderId: "k1", symbol: "MXN_JPY", side: "BUY", size: 10000 }),
            (err: unknown) => err instanceof ExchangeError && err.code === ExchangeErrorCode.MARKET_CLOSED
        );
    });

    it("rejects a close for an unknown position", async () => {
        const paper = new PaperFxAdapter({ now: () => NOW });
        await assert.rejects(
            paper.closePosition({ clientOrderId: "k1", symbol: "MXN_JPY", side: "SELL", positionId: "99", size: 1 }),
            (err: unknown) => err instanceof ExchangeError && err.code === ExchangeErrorCode.POSITION_NOT_FOUND
        );
    });
});
