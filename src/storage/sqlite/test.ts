import { afterEach, expect, test } from "vitest";
import { mkdtempSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { describeStore, agentRecord } from "../_contract";
import { SqliteStore } from "./src";

describeStore("SqliteStore", () => new SqliteStore(":memory:"));

let dir: string | null = null;

afterEach(() => {
    if (dir) rmSync(dir, { recursive: true, force: true });
    dir = null;
});

test("SqliteStore keeps rows across reopen", () => {
    dir = mkdtempSync(join(tmpdir(), "fleet-trust-"));
    const path = join(dir, "registry.db");

    const first = new SqliteStore(path);
    first.transaction((tx) => tx.agents.insert(agentRecord()));
    first.close();

    const second = new SqliteStore(path);
    expect(second.transaction((tx) => tx.agents.findById("agent-1"))?.machineName).toBe("DC01");
    second.close();
});

test("SqliteStore enforces agent foreign keys", () => {
    const store = new SqliteStore();
    expect(() =>
        store.transaction((tx) =>
            tx.errorReports.insert({
                id: "rep-1",
                agentId: "nobody",
                reportedAt: new Date(),
                totalErrorCount: 0,
                processedErrorCount: 0,
                newErrorCount: 0,
                duplicateErrorCount: 0,
                status: "Processing",
                processedAt: null,
            })
        )
    ).toThrow("FOREIGN KEY constraint failed");
    store.close();
});
