/**
 * Audit Log
 *
 * Append-only JSON Lines file. Every append is serialized behind the
 * previous one, assigned the next sequence number and flushed to disk
 * (fdatasync) before the returned promise resolves. A record that could
 * not be made durable does not consume a sequence number.
 *
 * The file always ends on a newline before the next append: a torn final
 * line left by a crash or a failed write is cut off first, so the next
 * record starts on a line of its own.
 */

import fs, { FileHandle } from "node:fs/promises";
import path from "node:path";
import { PersistenceFailureError } from "../domain/failures";
import { readJSONL } from "./JSONLReader";
import { AuditEntry, AuditRecord, isAuditRecord } from "./audit_record";

const NEWLINE = 0x0a;

export class AuditLog {
    readonly #filePath: string;
    readonly #now: () => number;

    #seq = 0;
    #tail: Promise<unknown> = Promise.resolve();
    #initialized = false;
    /** Set after a failed write; the tail may hold a partial line */
    #tailSuspect = false;

    constructor(filePath: string, now: () => number = Date.now) {
        this.#filePath = filePath;
        this.#now = now;
    }

    get filePath(): string {
        return this.#filePath;
    }

    /**
     * Last sequence number made durable.
     */
    get lastSeq(): number {
        return this.#seq;
    }

    /**
     * Create the directory and resume numbering after the last durable record.
     */
    async init(): Promise<void> {
        await fs.mkdir(path.dirname(this.#filePath), { recursive: true });
        await this.repairTail();

        const records = await readJSONL(this.#filePath, { guard: isAuditRecord });
        this.#seq = records.reduce((max, r) => Math.max(max, r.seq), 0);
        this.#initialized = true;

        console.log(`[AuditLog] ${this.#filePath} ready (last seq ${this.#seq})`);
    }

    /**
     * Append a record. Rejects with PersistenceFailureError if it could not be
     * flushed; callers must not proceed as if it had been written.
     */
    append(entry: AuditEntry): Promise<AuditRecord> {
        const write = this.#tail.then(() => this.write(entry));
        this.#tail = write.catch(() => undefined);
        return write;
    }

    /**
     * Most recent records, oldest first.
     */
    async readRecent(limit: number = 100): Promise<AuditRecord[]> {
        await this.#tail;
        const records = await readJSONL(this.#filePath, { guard: isAuditRecord });
        return limit > 0 ? records.slice(-limit) : records;
    }

    private async write(entry: AuditEntry): Promise<AuditRecord> {
        if (!this.#initialized) {
            throw new PersistenceFailureError("audit log", new Error("init() not called"));
        }

        const record: AuditRecord = Object.freeze({
            seq: this.#seq + 1,
            timestamp: this.#now(),
            ...entry
        });

        if (this.#tailSuspect) {
            try {
                await this.repairTail();
            } catch (error) {
                console.error(`[AuditLog] Cannot repair tail before ${entry.kind}:`, error);
                throw new PersistenceFailureError("audit log", error);
            }
            this.#tailSuspect = false;
        }

        let handle: FileHandle | undefined;
        try {
            handle = await fs.open(this.#filePath, "a");
            await handle.appendFile(JSON.stringify(record) + "\n", "utf-8");
            await handle.datasync();
            // Durable from here on; the number is spent even if close fails
            this.#seq = record.seq;
            const opened = handle;
            handle = undefined;
            await opened.close();
        } catch (error) {
            this.#tailSuspect = true;
            console.error(`[AuditLog] Append failed for ${entry.kind}:`, error);
            if (handle) {
                await handle.close().catch((closeError: unknown) => {
                    console.error("[AuditLog] Close after failed append also failed:", closeError);
                });
            }
            throw new PersistenceFailureError("audit log", error);
        }

        return record;
    }

    /**
     * Cut the file back to its last complete line. Returns the bytes dropped.
     */
    private async repairTail(): Promise<number> {
        let content: Buffer;
        try {
            content = await fs.readFile(this.#filePath);
        } catch (error) {
            if (error instanceof Error && "code" in error && error.code === "ENOENT") {
                return 0;
            }
            throw error;
        }

        if (content.length === 0 || content[content.length - 1] === NEWLINE) {
            return 0;
        }

        const keep = content.lastIndexOf(NEWLINE) + 1;
        await fs.truncate(this.#filePath, keep);
        const dropped = content.length - keep;
        console.warn(`[AuditLog] Dropped ${dropped} bytes of torn final line from ${this.#filePath}`);
        return dropped;
    }
}
