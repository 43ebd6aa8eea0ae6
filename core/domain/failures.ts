/**
 * Failure classes recorded in audit entries and carried by thrown errors.
 */

export enum FailureClass {
    VALIDATION_ERROR = "VALIDATION_ERROR",
    SAFETY_BLOCKED = "SAFETY_BLOCKED",
    RATE_LIMITED = "RATE_LIMITED",
    NETWORK_TIMEOUT = "NETWORK_TIMEOUT",
    AMBIGUOUS_RESPONSE = "AMBIGUOUS_RESPONSE",
    EXCHANGE_REJECTED = "EXCHANGE_REJECTED",
    PERSISTENCE_FAILURE = "PERSISTENCE_FAILURE"
}

/**
 * Read call retry budget exhausted.
 */
export class NetworkTimeoutError extends Error {
    readonly failureClass = FailureClass.NETWORK_TIMEOUT;
    readonly attempts: number;
    readonly operation: string;

    constructor(operation: string, attempts: number, cause?: unknown) {
        super(`${operation} failed after ${attempts} attempts`, { cause });
        this.name = "NetworkTimeoutError";
        this.operation = operation;
        this.attempts = attempts;
    }
}

/**
 * Audit or state persistence could not be made durable, or persisted
 * state could not be read back.
 */
export class PersistenceFailureError extends Error {
    readonly failureClass = FailureClass.PERSISTENCE_FAILURE;
    readonly target: string;
    readonly operation: "persist" | "load";

    constructor(target: string, cause?: unknown, operation: "persist" | "load" = "persist") {
        const detail = cause instanceof Error ? cause.message : String(cause);
        super(`Failed to ${operation} ${target}: ${detail}`, { cause });
        this.name = "PersistenceFailureError";
        this.target = target;
        this.operation = operation;
    }
}

export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
