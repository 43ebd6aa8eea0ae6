import { afterEach, beforeEach, describe, it } from "node:test";
import assert from "node:assert/strict";
import fs from "node:fs/promises";
import path from "node:path";
import { AuditLog } from "./AuditLog";
import { AuditEntry } from "./audit_record";
import { PersistenceFailureError } from "../domain/failures";
import { ARMED, FakeClock, T0, makeTempDir, removeDir } from "../testing/fixtures";

function note(text: string): AuditEntry {
    return { kind: "NOTE", snapshotId: null, decision: null, lockStateSnapshot: ARMED, note: text };
}

describe("AuditLog", () => {
    let dir: string;
    let file: string;

    beforeEach(async () => {
        dir = await makeTempDir();
        file = path.join(dir, "nested", "audit.jsonl");
    });

    afterEach(async () => {
        await removeDir(dir);
    });

    it("numbers records and writes one JSON line each", async () => {
        const clock = new FakeClock();
        const log = new AuditLog(file, clock.now);
        await log.init();

        const first = await log.append(note("one"));
        clock.advance(5);
        const second = await log.append({ ...note("two"), kind: "DECISION", decision: { kind: "HOLD", reason: "proposal hold", code: "PROPOSAL_HOLD" } });

        assert.equal(first.seq, 1);
        assert.equal(first.timestamp, T0);
        assert.equal(second.seq, 2);
        assert.equal(second.timestamp, T0 + 5);

        const lines = (await fs.readFile(file, "utf-8")).trim().split("\n");
        assert.equal(lines.length, 2);
        assert.deepEqual(JSON.parse(lines[1]), {
            seq: 2,
            timestamp: T0 + 5,
            kind: "DECISION",
            snapshotId: null,
            decision: { kind: "HOLD", reason: "proposal hold", code: "PROPOSAL_HOLD" },
            lockStateSnapshot: { configFlagArmed: true, envFlagArmed: true, armed: true },
            note: "two"
        });
    });

    it("keeps arrival order for concurrent appends", async () => {
        const log = new AuditLog(file);
        await log.init();

        await Promise.all(["a", "b", "c", "d"].map(n => log.append(note(n))));

        const records = await log.readRecent();
        assert.deepEqual(records.map(r => [r.seq, r.note]), [[1, "a"], [2, "b"], [3, "c"], [4, "d"]]);
    });

    it("resumes numbering after a restart", async () => {
        const log = new AuditLog(file);
        await log.init();
        await log.append(note("one"));
        await log.append(note("two"));

        const reopened = new AuditLog(file);
        await reopened.init();
        assert.equal(reopened.lastSeq, 2);
        assert.equal((await reopened.append(note("three"))).seq, 3);
    });

    it("skips a torn line when reading back", async () => {
        const log = new AuditLog(file);
        await log.init();
        await log.append(note("one"));
        await fs.appendFile(file, "{\"seq\": 2, \"timest");

        const reopened = new AuditLog(file);
        await reopened.init();

        assert.equal(reopened.lastSeq, 1);
        assert.deepEqual((await reopened.readRecent()).map(r => r.note), ["one"]);
    });

    it("starts the first record after a torn tail on its own line", async () => {
        const log = new AuditLog(file);
        await log.init();
        await log.append(note("one"));
        await fs.appendFile(file, "{\"seq\":2,\"timestamp\":1,\"kind\":\"INT");

        const reopened = new AuditLog(file);
        await reopened.init();
        const intent = await reopened.append({ ...note("after restart"), kind: "INTENT" });

        assert.equal(intent.seq, 2);
        assert.deepEqual(
            (await reopened.readRecent()).map(r => [r.seq, r.kind, r.note]),
            [[1, "NOTE", "one"], [2, "INTENT", "after restart"]]
        );
        assert.equal((await fs.readFile(file, "utf-8")).split("\n").length, 3);
    });

    it("repairs the tail before the next append after a failed write", async () => {
        const log = new AuditLog(file);
        await log.init();
        await log.append(note("one"));
        const intact = await fs.readFile(file, "utf-8");

        await fs.rm(file);
        await fs.mkdir(file);
        await assert.rejects(log.append(note("lost")), PersistenceFailureError);

        // The failed write left half a line behind
        await fs.rmdir(file);
        await fs.writeFile(file, intact + "{\"seq\":2,\"tim");

        const next = await log.append(note("two"));

        assert.equal(next.seq, 2);
        assert.deepEqual((await log.readRecent()).map(r => [r.seq, r.note]), [[1, "one"], [2, "two"]]);
    });

    it("returns only the most recent records up to the limit", async () => {
        const log = new AuditLog(file);
        await log.init();
        for (const n of ["a", "b", "c"]) {
            await log.append(note(n));
        }

        assert.deepEqual((await log.readRecent(2)).map(r => r.note), ["b", "c"]);
    });

    it("refuses to append before init", async () => {
        const log = new AuditLog(file);
        await assert.rejects(log.append(note("early")), PersistenceFailureError);
    });

    it("surfaces a write failure without consuming a sequence number", async () => {
        const log = new AuditLog(file);
        await log.init();
        await log.append(note("one"));

        // Replace the log file with a directory so the next open fails
        await fs.rm(file);
        await fs.mkdir(file);

        await assert.rejects(log.append(note("two")), PersistenceFailureError);
        assert.equal(log.lastSeq, 1);
    });
});
