/**
 * Safety Interlock
 *
 * Produces the authoritative Decision from a validated proposal and an
 * account snapshot. Precedence is strict:
 *
 *   ForceClose (kill switch) > Hold (safety block / proposal) > Execute | Close
 *
 * Arming is re-derived on every call; nothing is carried across cycles
 * except the kill-switch cooldown deadline.
 */

import { AccountSnapshot, Decision, LockState, OrderAction, Proposal } from "../domain/types";
import { LockStateSource } from "./lock_state";
import { ExternalKillSignal, KillSwitchConfig, evaluateMarginKill } from "./kill_switch";
import { PositionCapResult, checkPositionCap } from "./position_cap";
import { SafetyReasonCode } from "./safety_reason_code";

export interface SafetyInterlockDeps {
    readonly lockState: LockStateSource;
    readonly killSignal: ExternalKillSignal;
    readonly killSwitch: KillSwitchConfig;
    readonly now?: () => number;
}

export class SafetyInterlock {
    readonly #lockState: LockStateSource;
    readonly #killSignal: ExternalKillSignal;
    readonly #config: KillSwitchConfig;
    readonly #now: () => number;

    #cooldownUntil = 0;

    constructor(deps: SafetyInterlockDeps) {
        this.#lockState = deps.lockState;
        this.#killSignal = deps.killSignal;
        this.#config = deps.killSwitch;
        this.#now = deps.now ?? Date.now;
    }

    // -------------------------------------------------------------------------
    // Checks
    // -------------------------------------------------------------------------

    /**
     * Current two-factor lock state, read fresh.
     */
    readLockState(): LockState {
        return this.#lockState();
    }

    isArmed(): boolean {
        return this.readLockState().armed;
    }

    checkPositionCap(snapshot: AccountSnapshot, action: OrderAction): PositionCapResult {
        return checkPositionCap(snapshot.openPositions.length, action);
    }

    /**
     * ForceClose when the margin floor is breached or a kill signal is set;
     * null when clear. A margin kill (re)starts the entry cooldown.
     */
    evaluateKillSwitch(snapshot: AccountSnapshot): Decision | null {
        const external = this.#killSignal.evaluate();
        if (external.killed) {
            return { kind: "FORCE_CLOSE", reason: external.reason, code: SafetyReasonCode.EXTERNAL_KILL };
        }

        const margin = evaluateMarginKill(snapshot, this.#config);
        if (margin.killed) {
            const until = this.#now() + this.#config.cooldownMs;
            if (until > this.#cooldownUntil) {
                this.#cooldownUntil = until;
            }
            return { kind: "FORCE_CLOSE", reason: margin.reason, code: SafetyReasonCode.MARGIN_KILL };
        }

        return null;
    }

    isCoolingDown(): boolean {
        return this.#now() < this.#cooldownUntil;
    }

    get cooldownUntil(): number | null {
        return this.isCoolingDown() ? this.#cooldownUntil : null;
    }

    // -------------------------------------------------------------------------
    // Authorization
    // -------------------------------------------------------------------------

    /**
     * @param proposal validated proposal, or null when the gate rejected it
     */
    authorize(proposal: Proposal | null, snapshot: AccountSnapshot): Decision {
        const kill = this.evaluateKillSwitch(snapshot);
        if (kill) {
            return kill;
        }

        if (proposal === null) {
            return hold("invalid proposal", SafetyReasonCode.INVALID_PROPOSAL);
        }
        if (proposal.side === "HOLD") {
            return hold("proposal hold", SafetyReasonCode.PROPOSAL_HOLD);
        }

        const lock = this.readLockState();

        if (proposal.side === "EXIT") {
            if (snapshot.openPositions.length === 0) {
                return hold("no position to exit", SafetyReasonCode.NO_POSITION);
            }
            if (!lock.armed) {
                return hold("not armed", SafetyReasonCode.NOT_ARMED);
            }
            return { kind: "CLOSE", reason: proposal.rationale || "oracle exit" };
        }

        if (!lock.armed) {
            return hold("not armed", SafetyReasonCode.NOT_ARMED);
        }

        const cap = this.checkPositionCap(snapshot, "OPEN");
        if (!cap.allowed) {
            return hold("position cap reached", SafetyReasonCode.POSITION_CAP);
        }

        if (this.isCoolingDown()) {
            return hold("kill-switch cooldown", SafetyReasonCode.KILL_COOLDOWN);
        }

        return proposal.suggestedLeverage === undefined
            ? { kind: "EXECUTE", side: proposal.side }
            : { kind: "EXECUTE", side: proposal.side, leverage: proposal.suggestedLeverage };
    }
}

export function hold(reason: string, code: SafetyReasonCode): Decision {
    return { kind: "HOLD", reason, code };
}
