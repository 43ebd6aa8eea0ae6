import { describe, it } from "node:test";
import assert from "node:assert/strict";
import fs from "node:fs/promises";
import path from "node:path";
import { LockState, Proposal, deriveLockState } from "../domain/types";
import { ARMED, DISARMED, FakeClock, T0, makePosition, makeSnapshot, makeTempDir, removeDir } from "../testing/fixtures";
import { ExternalKillSignal, evaluateMarginKill } from "./kill_switch";
import { fileLockStateSource } from "./lock_state";
import { checkPositionCap } from "./position_cap";
import { SafetyInterlock } from "./SafetyInterlock";
import { SafetyReasonCode } from "./safety_reason_code";

const HOUR_MS = 60 * 60 * 1000;

function proposal(overrides: Partial<Proposal> = {}): Proposal {
    return {
        side: "BUY",
        confidence: 0.8,
        rationale: "positive carry",
        generatedAt: T0,
        snapshotId: "snap-1",
        ...overrides
    };
}

function makeInterlock(lock: LockState = ARMED, env: NodeJS.ProcessEnv = {}) {
    const clock = new FakeClock();
    const killSignal = new ExternalKillSignal(env);
    const interlock = new SafetyInterlock({
        lockState: () => lock,
        killSignal,
        killSwitch: { minMarginRatio: 2, cooldownMs: HOUR_MS },
        now: clock.now
    });
    return { clock, killSignal, interlock };
}

describe("SafetyInterlock.authorize", () => {
    it("executes a BUY when armed and flat", () => {
        const { interlock } = makeInterlock();
        assert.deepEqual(interlock.authorize(proposal(), makeSnapshot()), { kind: "EXECUTE", side: "BUY" });
    });

    it("passes a suggested leverage through", () => {
        const { interlock } = makeInterlock();
        assert.deepEqual(
            interlock.authorize(proposal({ side: "SELL", suggestedLeverage: 2 }), makeSnapshot()),
            { kind: "EXECUTE", side: "SELL", leverage: 2 }
        );
    });

    it("holds when not armed", () => {
        const { interlock } = makeInterlock(DISARMED);
        assert.deepEqual(interlock.authorize(proposal(), makeSnapshot()), {
            kind: "HOLD",
            reason: "not armed",
            code: SafetyReasonCode.NOT_ARMED
        });
    });

    it("holds an entry while a position is open", () => {
        const { interlock } = makeInterlock();
        const snapshot = makeSnapshot({ openPositions: [makePosition()] });
        assert.deepEqual(interlock.authorize(proposal(), snapshot), {
            kind: "HOLD",
            reason: "position cap reached",
            code: SafetyReasonCode.POSITION_CAP
        });
    });

    it("holds an invalid proposal and an oracle HOLD", () => {
        const { interlock } = makeInterlock();
        const a = interlock.authorize(null, makeSnapshot());
        const b = interlock.authorize(proposal({ side: "HOLD" }), makeSnapshot());
        assert.equal(a.kind === "HOLD" && a.code, SafetyReasonCode.INVALID_PROPOSAL);
        assert.equal(b.kind === "HOLD" && b.code, SafetyReasonCode.PROPOSAL_HOLD);
    });

    it("turns EXIT into Close only with a position and arming", () => {
        const open = makeSnapshot({ openPositions: [makePosition()] });

        const armed = makeInterlock().interlock;
        assert.deepEqual(armed.authorize(proposal({ side: "EXIT", rationale: "carry unwound" }), open), {
            kind: "CLOSE",
            reason: "carry unwound"
        });

        const flat = armed.authorize(proposal({ side: "EXIT" }), makeSnapshot());
        assert.equal(flat.kind === "HOLD" && flat.code, SafetyReasonCode.NO_POSITION);

        const disarmed = makeInterlock(DISARMED).interlock.authorize(proposal({ side: "EXIT" }), open);
        assert.equal(disarmed.kind === "HOLD" && disarmed.code, SafetyReasonCode.NOT_ARMED);
    });

    it("lets the margin kill override an invalid proposal", () => {
        const { interlock } = makeInterlock();
        const snapshot = makeSnapshot({ marginRatio: 1.5, openPositions: [makePosition()] });
        assert.deepEqual(interlock.authorize(null, snapshot), {
            kind: "FORCE_CLOSE",
            reason: "margin ratio 150.0% below 200.0%",
            code: SafetyReasonCode.MARGIN_KILL
        });
    });

    it("force closes a confident BUY when margin is below the threshold", () => {
        const { interlock } = makeInterlock();
        const snapshot = makeSnapshot({ marginRatio: 1.5, openPositions: [makePosition()] });
        assert.deepEqual(interlock.authorize(proposal({ side: "BUY", confidence: 0.99 }), snapshot), {
            kind: "FORCE_CLOSE",
            reason: "margin ratio 150.0% below 200.0%",
            code: SafetyReasonCode.MARGIN_KILL
        });
    });

    it("force closes even when disarmed", () => {
        const { interlock, killSignal } = makeInterlock(DISARMED);
        killSignal.engage("operator says stop", T0);
        assert.deepEqual(interlock.authorize(proposal(), makeSnapshot()), {
            kind: "FORCE_CLOSE",
            reason: "operator says stop",
            code: SafetyReasonCode.EXTERNAL_KILL
        });
    });

    it("blocks entries during the cooldown after a margin kill", () => {
        const { interlock, clock } = makeInterlock();
        assert.deepEqual(interlock.authorize(proposal(), makeSnapshot({ marginRatio: 1.2 })), {
            kind: "FORCE_CLOSE",
            reason: "margin ratio 120.0% below 200.0%",
            code: SafetyReasonCode.MARGIN_KILL
        });
        assert.equal(interlock.cooldownUntil, T0 + HOUR_MS);

        clock.advance(HOUR_MS - 1);
        const during = interlock.authorize(proposal(), makeSnapshot({ marginRatio: 3 }));
        assert.equal(during.kind === "HOLD" && during.code, SafetyReasonCode.KILL_COOLDOWN);

        clock.advance(1);
        assert.equal(interlock.cooldownUntil, null);
        assert.deepEqual(interlock.authorize(proposal(), makeSnapshot({ marginRatio: 3 })), { kind: "EXECUTE", side: "BUY" });
    });
});

describe("kill switch", () => {
    it("ignores an unknown margin ratio and a ratio at the floor", () => {
        const config = { minMarginRatio: 2, cooldownMs: 0 };
        assert.equal(evaluateMarginKill(makeSnapshot(), config).killed, false);
        assert.equal(evaluateMarginKill(makeSnapshot({ marginRatio: 2 }), config).killed, false);
        assert.equal(evaluateMarginKill(makeSnapshot({ marginRatio: 1.99 }), config).killed, true);
    });

    it("reads the environment kill on every evaluation", () => {
        const env: NodeJS.ProcessEnv = {};
        const signal = new ExternalKillSignal(env);
        assert.equal(signal.evaluate().killed, false);

        env.KILL_SWITCH = "true";
        assert.deepEqual(signal.evaluate(), {
            killed: true,
            reason_code: SafetyReasonCode.EXTERNAL_KILL,
            reason: "kill switch set in environment"
        });
    });

    it("clears an operator kill but not the environment one", () => {
        const signal = new ExternalKillSignal({ KILL_SWITCH: "1", KILL_SWITCH_REASON: "maintenance" });
        signal.engage("", T0);
        assert.equal(signal.evaluate().reason, "operator kill");
        assert.equal(signal.engagedAt, T0);

        signal.clear();
        assert.equal(signal.engagedAt, null);
        assert.equal(signal.evaluate().reason, "maintenance");
    });
});

describe("position cap", () => {
    it("allows closing at the cap and blocks a second open", () => {
        assert.equal(checkPositionCap(1, "CLOSE").allowed, true);
        assert.equal(checkPositionCap(0, "OPEN").allowed, true);
        assert.deepEqual(checkPositionCap(1, "OPEN"), { allowed: false, reason: "position cap reached (1/1)" });
    });
});

describe("deriveLockState", () => {
    it("is armed only when both flags are set", () => {
        const table = [[false, false], [false, true], [true, false], [true, true]].map(
            ([config, env]) => deriveLockState(config, env).armed
        );
        assert.deepEqual(table, [false, false, false, true]);
    });
});

describe("fileLockStateSource", () => {
    it("re-reads the settings file on every check", async () => {
        const dir = await makeTempDir();
        try {
            const file = path.join(dir, "settings.json");
            const env: NodeJS.ProcessEnv = { LIVE_TRADING_ARMED: "YES" };
            const source = fileLockStateSource(file, env);

            await fs.writeFile(file, JSON.stringify({ enableLiveTrading: true }));
            assert.deepEqual(source(), { configFlagArmed: true, envFlagArmed: true, armed: true });

            await fs.writeFile(file, JSON.stringify({ enableLiveTrading: false }));
            assert.equal(source().armed, false);

            await fs.writeFile(file, JSON.stringify({ enableLiveTrading: true }));
            env.LIVE_TRADING_ARMED = "yes";
            assert.deepEqual(source(), { configFlagArmed: true, envFlagArmed: false, armed: false });
        } finally {
            await removeDir(dir);
        }
    });

    it("treats an unreadable file as disarmed", () => {
        const source = fileLockStateSource("/nonexistent/settings.json", { LIVE_TRADING_ARMED: "YES" });
        assert.equal(source().configFlagArmed, false);
        assert.equal(source().armed, false);
    });
});
