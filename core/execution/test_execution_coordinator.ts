import { describe, it } from "node:test";
import assert from "node:assert/strict";
import fs from "node:fs/promises";
import path from "node:path";
import { Decision } from "../domain/types";
import { PersistenceFailureError } from "../domain/failures";
import { PositionReconciler } from "../exchange/reconciliation/PositionReconciler";
import { DISARMED, Harness, PAIR, T0, makeHarness, makePosition, makeSnapshot, removeDir } from "../testing/fixtures";
import { CoordinatorSnapshot, initialSnapshot } from "./coordinator_states";
import { StateStore } from "./CoordinatorStateStore";
import { ExecutionCoordinator, TransitionEvent } from "./ExecutionCoordinator";
import { buildOpenIntent } from "./order_intent";

const BUY: Decision = { kind: "EXECUTE", side: "BUY" };
const EXIT: Decision = { kind: "CLOSE", reason: "carry unwound" };
const KILL: Decision = { kind: "FORCE_CLOSE", reason: "margin ratio 150.0% below 200.0%", code: "MARGIN_KILL" };
const LOT = { size: 10000 };

async function withHarness(fn: (h: Harness) => Promise<void>): Promise<void> {
    const h = await makeHarness();
    try {
        await fn(h);
    } finally {
        await removeDir(h.dir);
    }
}

async function openPosition(h: Harness): Promise<void> {
    await h.coordinator.init();
    const outcome = await h.coordinator.handleDecision(BUY, makeSnapshot(), LOT);
    assert.equal(outcome.state, "CONFIRMED_OPEN");
}

function openSnapshot(h: Harness) {
    return makeSnapshot({ snapshotId: "snap-2", openPositions: h.coordinator.position ? [h.coordinator.position] : [] });
}

describe("ExecutionCoordinator", () => {
    it("refuses to act before init", async () => {
        await withHarness(async h => {
            await assert.rejects(
                h.coordinator.handleDecision(BUY, makeSnapshot(), LOT),
                { message: "ExecutionCoordinator.init() must complete before use" }
            );
        });
    });

    it("opens a position on a confirmed fill", async () => {
        await withHarness(async h => {
            const transitions: TransitionEvent[] = [];
            h.coordinator.on("transition", (e: TransitionEvent) => transitions.push(e));

            const report = await h.coordinator.init();
            assert.equal(report?.reason, "Flat as expected");

            const outcome = await h.coordinator.handleDecision(BUY, makeSnapshot(), LOT);

            assert.equal(outcome.dispatched, true);
            assert.equal(outcome.state, "CONFIRMED_OPEN");
            assert.equal(outcome.note, "OPEN CONFIRMED");
            assert.deepEqual(h.coordinator.position, {
                id: "P1",
                pair: PAIR,
                side: "BUY",
                size: 10000,
                entryPrice: 8.125,
                openedAt: T0,
                swapAccruedToDate: 0
            });
            assert.equal(h.gateway.mutationCount, 1);
            assert.deepEqual(transitions.map(t => `${t.from}->${t.to}`), ["IDLE->SUBMITTING", "SUBMITTING->CONFIRMED_OPEN"]);
            assert.deepEqual(h.notifier.types(), ["OPENED"]);

            const kinds = (await h.audit.readRecent()).map(r => r.kind);
            assert.deepEqual(kinds, ["RECONCILE", "INTENT", "TRANSITION", "RESULT", "TRANSITION"]);

            const saved = await h.store.load();
            assert.equal(saved?.state, "CONFIRMED_OPEN");
            assert.equal(saved?.attemptCounter, 1);
            assert.equal(saved?.inFlight, null);
            assert.equal(saved?.dispatched[0]?.result?.status, "CONFIRMED");
        });
    });

    it("closes the position and returns to IDLE", async () => {
        await withHarness(async h => {
            await openPosition(h);

            const outcome = await h.coordinator.handleDecision(EXIT, openSnapshot(h));

            assert.equal(outcome.state, "IDLE");
            assert.equal(outcome.result?.fill?.price, 8.0);
            assert.equal(h.coordinator.position, null);
            assert.deepEqual(h.adapter.closes.map(c => [c.positionId, c.side, c.size]), [["P1", "SELL", 10000]]);
            assert.deepEqual(h.notifier.types(), ["OPENED", "CLOSED"]);
            assert.equal(h.notifier.events[1]?.message, "Closed position P1 @ 8");
        });
    });

    it("halts on an ambiguous open and sends nothing more until reconciled", async () => {
        await withHarness(async h => {
            await h.coordinator.init();
            h.adapter.behaviours.push("timeout");

            const outcome = await h.coordinator.handleDecision(BUY, makeSnapshot(), LOT);

            assert.equal(outcome.dispatched, true);
            assert.equal(outcome.state, "HALTED");
            assert.equal(outcome.result?.status, "AMBIGUOUS");
            assert.match(h.coordinator.haltReason ?? "", /^open [0-9a-f]{32} outcome unknown: request timed out$/);
            assert.deepEqual(h.notifier.types(), ["HALTED"]);
            assert.equal(h.notifier.events[0]?.level, "CRITICAL");

            const retry = await h.coordinator.handleDecision(BUY, makeSnapshot({ snapshotId: "snap-2" }), LOT);
            assert.equal(retry.dispatched, false);
            assert.equal(retry.note, "execute ignored: HALTED");
            assert.equal(h.gateway.mutationCount, 1);
            assert.equal(h.adapter.orders.length, 1);

            const last = (await h.audit.readRecent(1))[0];
            assert.equal(last?.failureClass, "SAFETY_BLOCKED");
        });
    });

    it("halts when an accepted order never shows a fill", async () => {
        await withHarness(async h => {
            await h.coordinator.init();
            h.adapter.behaviours.push("no-fill");

            const outcome = await h.coordinator.handleDecision(BUY, makeSnapshot(), LOT);

            assert.equal(outcome.state, "HALTED");
            assert.equal(outcome.result?.exchangeOrderId, "O1");
            assert.equal(h.adapter.orders.length, 1);
        });
    });

    it("returns to IDLE on a definite rejection and uses a fresh key next time", async () => {
        await withHarness(async h => {
            await h.coordinator.init();
            h.adapter.behaviours.push("reject");

            const rejected = await h.coordinator.handleDecision(BUY, makeSnapshot(), LOT);
            assert.equal(rejected.state, "IDLE");
            assert.equal(rejected.result?.status, "REJECTED");
            assert.equal(rejected.result?.errorCode, "INSUFFICIENT_MARGIN");

            const second = await h.coordinator.handleDecision(BUY, makeSnapshot(), LOT);
            assert.equal(second.state, "CONFIRMED_OPEN");

            const [first, next] = h.adapter.orders;
            assert.notEqual(first?.clientOrderId, next?.clientOrderId);
        });
    });

    it("keeps the position when a close is rejected", async () => {
        await withHarness(async h => {
            await openPosition(h);
            h.adapter.behaviours.push("reject");

            const outcome = await h.coordinator.handleDecision(EXIT, openSnapshot(h));

            assert.equal(outcome.state, "CONFIRMED_OPEN");
            assert.equal(h.coordinator.position?.id, "P1");
            assert.deepEqual(h.notifier.types(), ["OPENED", "NOTICE"]);
        });
    });

    it("halts on an ambiguous close", async () => {
        await withHarness(async h => {
            await openPosition(h);
            h.adapter.behaviours.push("malformed");

            const outcome = await h.coordinator.handleDecision(KILL, openSnapshot(h));

            assert.equal(outcome.state, "HALTED");
            assert.deepEqual(h.notifier.types(), ["OPENED", "KILL_SWITCH", "HALTED"]);
        });
    });

    it("halts when a close times out and ignores entries until reconciled", async () => {
        await withHarness(async h => {
            await openPosition(h);
            h.adapter.behaviours.push("timeout");

            const outcome = await h.coordinator.handleDecision(EXIT, openSnapshot(h));
            assert.equal(outcome.state, "HALTED");
            assert.equal(h.adapter.closes.length, 1);

            const entry = await h.coordinator.handleDecision(BUY, makeSnapshot({ snapshotId: "snap-3" }), LOT);
            assert.equal(entry.dispatched, false);
            assert.equal(h.gateway.mutationCount, 2);

            await h.coordinator.reconcile("alice");
            assert.equal(h.coordinator.state, "CONFIRMED_OPEN");
            assert.equal(h.coordinator.position?.id, "P1");
        });
    });

    it("does not dispatch an entry when disarmed at dispatch time", async () => {
        await withHarness(async h => {
            await h.coordinator.init();
            h.lock = DISARMED;

            const outcome = await h.coordinator.handleDecision(BUY, makeSnapshot(), LOT);

            assert.deepEqual(outcome, {
                dispatched: false,
                state: "IDLE",
                result: undefined,
                note: "execute not dispatched: not armed at dispatch"
            });
            assert.equal(h.gateway.mutationCount, 0);
        });
    });

    it("does not open a second position", async () => {
        await withHarness(async h => {
            await openPosition(h);

            const outcome = await h.coordinator.handleDecision(BUY, openSnapshot(h), LOT);

            assert.equal(outcome.note, "execute ignored: state CONFIRMED_OPEN");
            assert.equal(h.adapter.orders.length, 1);
        });
    });

    it("ignores an entry against a venue that is not flat", async () => {
        await withHarness(async h => {
            await h.coordinator.init();
            const outcome = await h.coordinator.handleDecision(BUY, makeSnapshot({ openPositions: [makePosition()] }), LOT);
            assert.equal(outcome.note, "execute not dispatched: venue not flat");
        });
    });

    it("serializes concurrent decisions", async () => {
        await withHarness(async h => {
            await h.coordinator.init();

            const outcomes = await Promise.all([
                h.coordinator.handleDecision(BUY, makeSnapshot(), LOT),
                h.coordinator.handleDecision({ kind: "EXECUTE", side: "SELL" }, makeSnapshot(), LOT)
            ]);

            assert.deepEqual(outcomes.map(o => o.dispatched), [true, false]);
            assert.equal(h.adapter.orders.length, 1);
        });
    });

    it("notifies but sends no force close while disarmed", async () => {
        await withHarness(async h => {
            await openPosition(h);
            h.lock = DISARMED;

            const outcome = await h.coordinator.handleDecision(KILL, openSnapshot(h));

            assert.equal(outcome.dispatched, false);
            assert.equal(outcome.state, "CONFIRMED_OPEN");
            assert.equal(h.adapter.closes.length, 0);
            const alert = h.notifier.events[1];
            assert.equal(alert?.type, "KILL_SWITCH");
            assert.equal(
                alert?.message,
                "ForceClose(margin ratio 150.0% below 200.0%) NOT sent: live trading is not armed. Position P1 remains open."
            );
        });
    });

    it("blocks entries but not closes after a stop request", async () => {
        await withHarness(async h => {
            await openPosition(h);
            await h.coordinator.requestStop("operator");
            assert.equal(h.coordinator.stopRequested, true);

            const closed = await h.coordinator.handleDecision(EXIT, openSnapshot(h));
            assert.equal(closed.state, "IDLE");

            const entry = await h.coordinator.handleDecision(BUY, makeSnapshot({ snapshotId: "snap-3" }), LOT);
            assert.equal(entry.note, "execute ignored: stop requested");

            await h.coordinator.resume("operator");
            const resumed = await h.coordinator.handleDecision(BUY, makeSnapshot({ snapshotId: "snap-3" }), LOT);
            assert.equal(resumed.state, "CONFIRMED_OPEN");
        });
    });

    it("halts without sending when state cannot be persisted", async () => {
        await withHarness(async h => {
            const failing: StateStore = {
                load: async () => null,
                save: async () => { throw new PersistenceFailureError("coordinator state", new Error("disk full")); },
                quarantine: async () => null
            };
            const coordinator = new ExecutionCoordinator({
                gateway: h.gateway,
                reconciler: new PositionReconciler(h.gateway, PAIR, h.clock.now),
                audit: h.audit,
                store: failing,
                notifier: h.notifier,
                lockState: () => h.lock,
                now: h.clock.now
            });
            await coordinator.init();

            const outcome = await coordinator.handleDecision(BUY, makeSnapshot(), LOT);

            assert.equal(outcome.dispatched, false);
            assert.equal(outcome.state, "HALTED");
            assert.equal(h.gateway.mutationCount, 0);
            assert.match(coordinator.haltReason ?? "", /^persistence failed before dispatch of [0-9a-f]{32}: /);
            assert.match(
                h.notifier.events[0]?.message ?? "",
                /\(halt not persisted: Failed to persist coordinator state: disk full\)\. Manual reconciliation required\.$/
            );
        });
    });
});

describe("ExecutionCoordinator.observeSnapshot", () => {
    it("halts when the venue holds a position the coordinator did not open", async () => {
        await withHarness(async h => {
            await h.coordinator.init();
            const state = await h.coordinator.observeSnapshot(makeSnapshot({ openPositions: [makePosition({ id: "X9" })] }));
            assert.equal(state, "HALTED");
            assert.equal(h.coordinator.haltReason, "unexpected venue position X9 while IDLE");
        });
    });

    it("halts when the owned position disappears", async () => {
        await withHarness(async h => {
            await openPosition(h);
            const state = await h.coordinator.observeSnapshot(makeSnapshot());
            assert.equal(state, "HALTED");
            assert.equal(h.coordinator.haltReason, "position drift: expected P1, venue has []");
        });
    });

    it("tracks accrued swap on the owned position", async () => {
        await withHarness(async h => {
            await openPosition(h);
            const owned = h.coordinator.position;
            assert.ok(owned);

            const state = await h.coordinator.observeSnapshot(makeSnapshot({ openPositions: [{ ...owned, swapAccruedToDate: 44 }] }));

            assert.equal(state, "CONFIRMED_OPEN");
            assert.equal(h.coordinator.position?.swapAccruedToDate, 44);
        });
    });

    it("ignores a snapshot older than the last state change", async () => {
        await withHarness(async h => {
            await openPosition(h);
            const state = await h.coordinator.observeSnapshot(makeSnapshot({ timestamp: T0 - 1 }));
            assert.equal(state, "CONFIRMED_OPEN");
        });
    });
});

describe("ExecutionCoordinator.reconcile", () => {
    it("returns a flat venue to IDLE", async () => {
        await withHarness(async h => {
            await h.coordinator.init();
            h.adapter.behaviours.push("timeout");
            await h.coordinator.handleDecision(BUY, makeSnapshot(), LOT);

            const report = await h.coordinator.reconcile("alice");

            assert.equal(report.verdict, "FLAT");
            assert.equal(h.coordinator.state, "IDLE");
            assert.equal(h.coordinator.haltReason, null);
            assert.deepEqual(h.notifier.types(), ["HALTED", "RECONCILED"]);
        });
    });

    it("adopts a single venue position", async () => {
        await withHarness(async h => {
            await h.coordinator.init();
            h.adapter.openPosition("X9", "SELL", 20000);
            await h.coordinator.observeSnapshot(makeSnapshot({ openPositions: [makePosition({ id: "X9" })] }));

            await h.coordinator.reconcile("alice");

            assert.equal(h.coordinator.state, "CONFIRMED_OPEN");
            assert.deepEqual(h.coordinator.position, {
                id: "X9",
                pair: PAIR,
                side: "SELL",
                size: 20000,
                entryPrice: 8.0,
                openedAt: T0,
                swapAccruedToDate: 0
            });
        });
    });

    it("stays HALTED with more than one venue position", async () => {
        await withHarness(async h => {
            await h.coordinator.init();
            h.adapter.openPosition("X8", "BUY", 10000);
            h.adapter.openPosition("X9", "BUY", 10000);
            await h.coordinator.observeSnapshot(makeSnapshot({ openPositions: [makePosition({ id: "X8" })] }));

            const report = await h.coordinator.reconcile("alice");

            assert.equal(report.verdict, "MULTIPLE");
            assert.equal(h.coordinator.state, "HALTED");
        });
    });

    it("only applies to HALTED", async () => {
        await withHarness(async h => {
            await h.coordinator.init();
            await assert.rejects(h.coordinator.reconcile("alice"), {
                message: "Reconciliation only applies to HALTED (current: IDLE)"
            });
        });
    });
});

describe("ExecutionCoordinator restart", () => {
    it("resumes a confirmed position after checking the venue", async () => {
        await withHarness(async h => {
            await openPosition(h);

            const restarted = await makeHarness(h.dir, h.adapter);
            const report = await restarted.coordinator.init();

            assert.equal(report?.reason, "Position P1 confirmed");
            assert.equal(restarted.coordinator.state, "CONFIRMED_OPEN");
            assert.equal(restarted.coordinator.position?.id, "P1");
            assert.equal(restarted.audit.lastSeq, 6);
        });
    });

    it("halts when restarted with an order in flight", async () => {
        await withHarness(async h => {
            const intent = buildOpenIntent({ side: "BUY", size: 10000, snapshot: makeSnapshot(), lock: h.lock, attempt: 1, now: T0 });
            assert.ok(intent);
            const persisted: CoordinatorSnapshot = { ...initialSnapshot(T0), state: "SUBMITTING", inFlight: intent, attemptCounter: 1 };
            await h.store.save(persisted);

            await h.coordinator.init();

            assert.equal(h.coordinator.state, "HALTED");
            assert.equal(h.coordinator.haltReason, `restart with order ${intent.idempotencyKey} in flight; outcome unknown`);
            assert.equal(h.adapter.orders.length, 0);
        });
    });

    it("halts when the venue disagrees with a flat restart", async () => {
        await withHarness(async h => {
            h.adapter.openPosition("X9", "BUY", 10000);

            const report = await h.coordinator.init();

            assert.equal(report?.isConsistent, false);
            assert.equal(h.coordinator.state, "HALTED");
            assert.equal(h.coordinator.haltReason, "restart mismatch: Unexpected position X9 on venue");
        });
    });

    it("halts on an unreadable state file and keeps it for inspection", async () => {
        await withHarness(async h => {
            const statePath = path.join(h.dir, "state.json");
            await fs.writeFile(statePath, "{ torn");

            await h.coordinator.init();

            const movedTo = `${statePath}.corrupt-${T0}`;
            assert.equal(h.coordinator.state, "HALTED");
            assert.match(h.coordinator.haltReason ?? "", /^state file unreadable: Failed to load coordinator state /);
            assert.ok((h.coordinator.haltReason ?? "").endsWith(`; moved aside to ${movedTo}`));
            assert.equal(await fs.readFile(movedTo, "utf-8"), "{ torn");
            assert.equal((await h.store.load())?.state, "HALTED");
        });
    });

    it("leaves an unreadable state file in place when it cannot be moved aside", async () => {
        await withHarness(async h => {
            let saves = 0;
            const stuck: StateStore = {
                load: async () => { throw new PersistenceFailureError("coordinator state", new Error("bad json"), "load"); },
                save: async () => { saves++; },
                quarantine: async () => { throw new Error("read-only filesystem"); }
            };
            const coordinator = new ExecutionCoordinator({
                gateway: h.gateway,
                reconciler: new PositionReconciler(h.gateway, PAIR, h.clock.now),
                audit: h.audit,
                store: stuck,
                notifier: h.notifier,
                lockState: () => h.lock,
                now: h.clock.now
            });

            await coordinator.init();

            assert.equal(coordinator.state, "HALTED");
            assert.equal(saves, 0);
            assert.equal(
                coordinator.haltReason,
                "state file unreadable: Failed to load coordinator state: bad json; could not move it aside: read-only filesystem"
            );
            assert.equal(
                h.notifier.events[0]?.message,
                "Trading HALTED: state file unreadable: Failed to load coordinator state: bad json; " +
                "could not move it aside: read-only filesystem (halt not persisted: state file left in place). " +
                "Manual reconciliation required."
            );
        });
    });

    it("stays HALTED across a restart", async () => {
        await withHarness(async h => {
            await h.coordinator.init();
            h.adapter.behaviours.push("timeout");
            await h.coordinator.handleDecision(BUY, makeSnapshot(), LOT);

            const restarted = await makeHarness(h.dir, h.adapter);
            await restarted.coordinator.init();

            assert.equal(restarted.coordinator.state, "HALTED");
            const last = (await restarted.audit.readRecent(1))[0];
            assert.equal(last?.kind, "RECONCILE");
        });
    });
});
