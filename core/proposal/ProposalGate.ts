/**
 * Proposal Gate
 *
 * Treats oracle output as untrusted input: validates its shape, normalizes
 * it and checks it belongs to the snapshot being decided on. Applies no
 * trading policy; that is the interlock's job.
 */

import Ajv, { ErrorObject, ValidateFunction } from "ajv";
import addFormats from "ajv-formats";
import { AccountSnapshot, PROPOSAL_SIDES, Proposal, ProposalSide } from "../domain/types";
import { RAW_PROPOSAL_SCHEMA, RawProposal } from "./proposal_schema";

export interface ProposalGateConfig {
    readonly maxAgeMs: number;
    readonly maxRationaleLength: number;
    /** Tolerated clock skew for proposals stamped in the future */
    readonly maxFutureSkewMs: number;
}

const DEFAULT_CONFIG: ProposalGateConfig = {
    maxAgeMs: 5 * 60 * 1000,
    maxRationaleLength: 2000,
    maxFutureSkewMs: 60 * 1000
};

export type GateResult =
    | { readonly ok: true; readonly proposal: Proposal }
    | { readonly ok: false; readonly reason: string; readonly errors: readonly string[] };

export class ProposalGate {
    readonly #config: ProposalGateConfig;
    readonly #validate: ValidateFunction<RawProposal>;
    readonly #now: () => number;

    constructor(config: Partial<ProposalGateConfig> = {}, now: () => number = Date.now) {
        this.#config = Object.freeze({ ...DEFAULT_CONFIG, ...config });
        this.#now = now;

        const ajv = new Ajv({ allErrors: true, strict: false });
        addFormats(ajv);
        this.#validate = ajv.compile<RawProposal>(RAW_PROPOSAL_SCHEMA);
    }

    /**
     * Validate and normalize a raw proposal against the current snapshot.
     * Never throws.
     */
    check(raw: unknown, snapshot: AccountSnapshot): GateResult {
        if (raw === null || raw === undefined) {
            return reject("missing proposal", []);
        }

        if (!this.#validate(raw)) {
            return reject("schema violation", formatErrors(this.#validate.errors));
        }

        const side = normalizeSide(raw.side);
        if (side === null) {
            return reject("unknown side", [`side "${raw.side}" is not one of ${PROPOSAL_SIDES.join(", ")}`]);
        }

        if (raw.snapshotId !== snapshot.snapshotId) {
            return reject("stale snapshot", [
                `proposal for snapshot ${raw.snapshotId}, current is ${snapshot.snapshotId}`
            ]);
        }

        const generatedAt = Date.parse(raw.generatedAt);
        const now = this.#now();
        if (now - generatedAt > this.#config.maxAgeMs) {
            return reject("proposal expired", [`generated ${now - generatedAt}ms ago`]);
        }
        if (generatedAt - now > this.#config.maxFutureSkewMs) {
            return reject("proposal from the future", [`generatedAt ${raw.generatedAt}`]);
        }

        const proposal: Proposal = {
            side,
            confidence: raw.confidence,
            rationale: raw.rationale.trim().slice(0, this.#config.maxRationaleLength),
            generatedAt,
            snapshotId: raw.snapshotId,
            ...(typeof raw.suggestedLeverage === "number" ? { suggestedLeverage: raw.suggestedLeverage } : {})
        };

        return { ok: true, proposal: Object.freeze(proposal) };
    }
}

export function normalizeSide(value: string): ProposalSide | null {
    const upper = value.trim().toUpperCase();
    return PROPOSAL_SIDES.find(s => s === upper) ?? null;
}

function reject(reason: string, errors: readonly string[]): GateResult {
    console.warn(`[ProposalGate] Rejected: ${reason}${errors.length ? ` (${errors.join("; ")})` : ""}`);
    return { ok: false, reason, errors };
}

function formatErrors(errors: ErrorObject[] | null | undefined): string[] {
    return (errors ?? []).map(e => `${e.instancePath || "/"} ${e.message ?? "invalid"}`);
}
