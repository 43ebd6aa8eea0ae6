/**
 * Shared test fixtures: clocks, temp dirs and wiring for the trading core.
 */

import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { AuditLog } from "../audit/AuditLog";
import { AccountSnapshot, LockState, Position, deriveLockState } from "../domain/types";
import { ExchangeGateway } from "../exchange/gateway/ExchangeGateway";
import { TokenBucket } from "../exchange/ratelimit/TokenBucket";
import { PositionReconciler } from "../exchange/reconciliation/PositionReconciler";
import { CoordinatorStateStore } from "../execution/CoordinatorStateStore";
import { ExecutionCoordinator } from "../execution/ExecutionCoordinator";
import { RecordingNotifier } from "./RecordingNotifier";
import { ScriptedFxAdapter } from "./ScriptedFxAdapter";

export const T0 = 1_700_000_000_000;
export const PAIR = "MXN_JPY";

/**
 * Manual clock. sleep() advances time instead of waiting and records the
 * requested delays.
 */
export class FakeClock {
    #now: number;
    readonly sleeps: number[] = [];

    constructor(start: number = T0) {
        this.#now = start;
    }

    readonly now = (): number => this.#now;

    readonly sleep = async (ms: number): Promise<void> => {
        this.sleeps.push(ms);
        this.#now += ms;
    };

    advance(ms: number): void {
        this.#now += ms;
    }
}

export async function makeTempDir(prefix = "carry-guard-"): Promise<string> {
    return fs.mkdtemp(path.join(os.tmpdir(), prefix));
}

export async function removeDir(dir: string): Promise<void> {
    await fs.rm(dir, { recursive: true, force: true });
}

export const ARMED: LockState = deriveLockState(true, true);
export const DISARMED: LockState = deriveLockState(true, false);

export function makePosition(overrides: Partial<Position> = {}): Position {
    return {
        id: "X1",
        pair: PAIR,
        side: "BUY",
        size: 10000,
        entryPrice: 8.125,
        openedAt: T0,
        swapAccruedToDate: 0,
        ...overrides
    };
}

export function makeSnapshot(overrides: Partial<AccountSnapshot> = {}): AccountSnapshot {
    return {
        snapshotId: "snap-1",
        pair: PAIR,
        equity: 1_000_000,
        marginRatio: null,
        openPositions: [],
        timestamp: T0,
        ...overrides
    };
}

export interface Harness {
    readonly dir: string;
    readonly clock: FakeClock;
    readonly adapter: ScriptedFxAdapter;
    readonly gateway: ExchangeGateway;
    readonly audit: AuditLog;
    readonly store: CoordinatorStateStore;
    readonly notifier: RecordingNotifier;
    readonly coordinator: ExecutionCoordinator;
    lock: LockState;
}

/**
 * Scripted venue + real gateway, audit log and state store in a temp dir.
 * The coordinator is constructed but not initialized.
 */
export async function makeHarness(dir?: string, adapter?: ScriptedFxAdapter): Promise<Harness> {
    const root = dir ?? await makeTempDir();
    const clock = new FakeClock();
    const venue = adapter ?? new ScriptedFxAdapter(clock.now);
    const limiter = new TokenBucket({ capacity: 100, refillPerSecond: 100 }, clock);

    const harness: { lock: LockState } = { lock: ARMED };
    const gateway = new ExchangeGateway(
        venue,
        { limiter, isArmed: () => harness.lock.armed, sleep: clock.sleep, random: () => 0.5, now: clock.now },
        { fillPollAttempts: 2, fillPollDelayMs: 10 }
    );
    const audit = new AuditLog(path.join(root, "audit.jsonl"), clock.now);
    await audit.init();
    const store = new CoordinatorStateStore(path.join(root, "state.json"), clock.now);
    const notifier = new RecordingNotifier();

    const coordinator = new ExecutionCoordinator({
        gateway,
        reconciler: new PositionReconciler(gateway, PAIR, clock.now),
        audit,
        store,
        notifier,
        lockState: () => harness.lock,
        now: clock.now
    });

    return Object.assign(harness, { dir: root, clock, adapter: venue, gateway, audit, store, notifier, coordinator });
}
