/**
 * JSON schemas for oracle output.
 *
 * ORACLE_OUTPUT_SCHEMA is what the model is asked to produce (strict
 * structured output: every key required, no extras). RAW_PROPOSAL_SCHEMA is
 * what the gate accepts: the oracle output plus the request metadata the
 * oracle wrapper attaches.
 */

export const ORACLE_OUTPUT_SCHEMA = {
    type: "object",
    properties: {
        side: { type: "string", enum: ["BUY", "SELL", "HOLD", "EXIT"] },
        confidence: { type: "number", minimum: 0, maximum: 1 },
        rationale: { type: "string" },
        suggestedLeverage: { type: ["number", "null"] }
    },
    required: ["side", "confidence", "rationale", "suggestedLeverage"],
    additionalProperties: false
} as const;

export const RAW_PROPOSAL_SCHEMA = {
    type: "object",
    properties: {
        // Case and whitespace are normalized after validation
        side: { type: "string", minLength: 1, maxLength: 16 },
        confidence: { type: "number", minimum: 0, maximum: 1 },
        rationale: { type: "string" },
        suggestedLeverage: { type: ["number", "null"], exclusiveMinimum: 0 },
        generatedAt: { type: "string", format: "date-time" },
        snapshotId: { type: "string", minLength: 1 }
    },
    required: ["side", "confidence", "rationale", "generatedAt", "snapshotId"],
    additionalProperties: true
} as const;

export interface OracleOutput {
    readonly side: string;
    readonly confidence: number;
    readonly rationale: string;
    readonly suggestedLeverage?: number | null;
}

export interface RawProposal extends OracleOutput {
    readonly generatedAt: string;
    readonly snapshotId: string;
}
