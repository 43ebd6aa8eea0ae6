/**
 * Coordinator State Store
 *
 * Persists the coordinator snapshot as a single JSON file.
 * Atomic write: write temp, fsync, rename over the previous file.
 * A file that cannot be loaded is moved aside intact, never overwritten.
 */

import fs, { FileHandle } from "node:fs/promises";
import path from "node:path";
import { PersistenceFailureError } from "../domain/failures";
import { CoordinatorSnapshot, isCoordinatorState } from "./coordinator_states";

/** Dispatched-key ledger entries kept on disk */
export const MAX_LEDGER_ENTRIES = 200;

export interface StateStore {
    load(): Promise<CoordinatorSnapshot | null>;
    save(snapshot: CoordinatorSnapshot): Promise<void>;
    /** Move the current file aside; resolves to its new path, or null if there is none. */
    quarantine(): Promise<string | null>;
}

export class CoordinatorStateStore implements StateStore {
    readonly #filePath: string;
    readonly #now: () => number;

    constructor(filePath: string, now: () => number = Date.now) {
        this.#filePath = filePath;
        this.#now = now;
    }

    get filePath(): string {
        return this.#filePath;
    }

    /**
     * Load the last saved snapshot; null when none exists yet.
     * Throws a load PersistenceFailureError when the file exists but is unreadable.
     */
    async load(): Promise<CoordinatorSnapshot | null> {
        let content: string;
        try {
            content = await fs.readFile(this.#filePath, "utf-8");
        } catch (error) {
            if (isNotFound(error)) {
                return null;
            }
            throw new PersistenceFailureError(`coordinator state ${this.#filePath}`, error, "load");
        }

        let parsed: unknown;
        try {
            parsed = JSON.parse(content);
        } catch (error) {
            throw new PersistenceFailureError(`coordinator state ${this.#filePath}`, error, "load");
        }

        if (!isCoordinatorSnapshot(parsed)) {
            throw new PersistenceFailureError(
                `coordinator state ${this.#filePath}`,
                new Error("unrecognized snapshot shape"),
                "load"
            );
        }
        return parsed;
    }

    async save(snapshot: CoordinatorSnapshot): Promise<void> {
        const tempPath = `${this.#filePath}.tmp`;
        const pruned: CoordinatorSnapshot = {
            ...snapshot,
            dispatched: snapshot.dispatched.slice(-MAX_LEDGER_ENTRIES)
        };

        let handle: FileHandle | undefined;
        try {
            await fs.mkdir(path.dirname(this.#filePath), { recursive: true });
            handle = await fs.open(tempPath, "w");
            await handle.writeFile(JSON.stringify(pruned, null, 2), "utf-8");
            await handle.sync();
            await handle.close();
            handle = undefined;
            await fs.rename(tempPath, this.#filePath);
        } catch (error) {
            await handle?.close();
            throw new PersistenceFailureError(`coordinator state ${this.#filePath}`, error);
        }
    }

    async quarantine(): Promise<string | null> {
        const target = `${this.#filePath}.corrupt-${this.#now()}`;
        try {
            await fs.rename(this.#filePath, target);
        } catch (error) {
            if (isNotFound(error)) {
                return null;
            }
            throw error;
        }
        console.warn(`[StateStore] Moved unreadable ${this.#filePath} to ${target}`);
        return target;
    }
}

function isNotFound(error: unknown): boolean {
    return error instanceof Error && "code" in error && error.code === "ENOENT";
}

function isCoordinatorSnapshot(value: unknown): value is CoordinatorSnapshot {
    if (typeof value !== "object" || value === null) return false;
    if (!("version" in value) || value.version !== 1) return false;
    if (!("state" in value) || !isCoordinatorState(value.state)) return false;
    if (!("attemptCounter" in value) || typeof value.attemptCounter !== "number") return false;
    if (!("dispatched" in value) || !Array.isArray(value.dispatched)) return false;
    if (!("position" in value) || (value.position !== null && typeof value.position !== "object")) return false;
    if (!("inFlight" in value) || (value.inFlight !== null && typeof value.inFlight !== "object")) return false;
    return "haltReason" in value && "updatedAt" in value;
}
