import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { T0, makeSnapshot } from "../testing/fixtures";
import { ProposalGate, normalizeSide } from "./ProposalGate";

const snapshot = makeSnapshot();

function raw(overrides: Record<string, unknown> = {}): Record<string, unknown> {
    return {
        side: "BUY",
        confidence: 0.7,
        rationale: "  carry is positive  ",
        suggestedLeverage: null,
        generatedAt: new Date(T0).toISOString(),
        snapshotId: "snap-1",
        ...overrides
    };
}

describe("ProposalGate", () => {
    const gate = new ProposalGate({}, () => T0);

    it("normalizes a valid proposal", () => {
        const result = gate.check(raw({ side: " buy " }), snapshot);
        assert.deepEqual(result, {
            ok: true,
            proposal: {
                side: "BUY",
                confidence: 0.7,
                rationale: "carry is positive",
                generatedAt: T0,
                snapshotId: "snap-1"
            }
        });
    });

    it("keeps a positive suggested leverage and ignores extra keys", () => {
        const result = gate.check(raw({ suggestedLeverage: 2, note: "extra" }), snapshot);
        assert.equal(result.ok && result.proposal.suggestedLeverage, 2);
    });

    it("rejects a missing proposal", () => {
        assert.deepEqual(gate.check(null, snapshot), { ok: false, reason: "missing proposal", errors: [] });
    });

    it("reports schema violations", () => {
        assert.deepEqual(gate.check(raw({ confidence: 1.5 }), snapshot), {
            ok: false,
            reason: "schema violation",
            errors: ["/confidence must be <= 1"]
        });

        const withoutSnapshot = raw();
        delete withoutSnapshot.snapshotId;
        const missing = gate.check(withoutSnapshot, snapshot);
        assert.deepEqual(missing.ok ? [] : missing.errors, ["/ must have required property 'snapshotId'"]);

        const text = gate.check("BUY now", snapshot);
        assert.equal(!text.ok && text.reason, "schema violation");
    });

    it("rejects a zero leverage", () => {
        const result = gate.check(raw({ suggestedLeverage: 0 }), snapshot);
        assert.equal(!result.ok && result.reason, "schema violation");
    });

    it("rejects an unknown side", () => {
        const result = gate.check(raw({ side: "LONG" }), snapshot);
        assert.deepEqual(result, {
            ok: false,
            reason: "unknown side",
            errors: ["side \"LONG\" is not one of BUY, SELL, HOLD, EXIT"]
        });
    });

    it("rejects a proposal for another snapshot", () => {
        const result = gate.check(raw({ snapshotId: "snap-0" }), snapshot);
        assert.deepEqual(result, {
            ok: false,
            reason: "stale snapshot",
            errors: ["proposal for snapshot snap-0, current is snap-1"]
        });
    });

    it("rejects expired and future-dated proposals", () => {
        const old = gate.check(raw({ generatedAt: new Date(T0 - 301_000).toISOString() }), snapshot);
        assert.deepEqual(old, { ok: false, reason: "proposal expired", errors: ["generated 301000ms ago"] });

        const edge = gate.check(raw({ generatedAt: new Date(T0 - 300_000).toISOString() }), snapshot);
        assert.equal(edge.ok, true);

        const future = gate.check(raw({ generatedAt: new Date(T0 + 61_000).toISOString() }), snapshot);
        assert.equal(!future.ok && future.reason, "proposal from the future");
    });

    it("truncates the rationale", () => {
        const short = new ProposalGate({ maxRationaleLength: 5 }, () => T0);
        const result = short.check(raw(), snapshot);
        assert.equal(result.ok && result.proposal.rationale, "carry");
    });
});

describe("normalizeSide", () => {
    it("accepts any case and rejects the rest", () => {
        assert.equal(normalizeSide("exit"), "EXIT");
        assert.equal(normalizeSide("Sell\n"), "SELL");
        assert.equal(normalizeSide("short"), null);
    });
});
