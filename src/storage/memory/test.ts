import { expect, test } from "vitest";
import { describeStore, agentRecord, certificateRecord } from "../_contract";
import type { StoreTransaction } from "../interface";
import { MemoryStore } from "./src";

describeStore("MemoryStore", () => new MemoryStore());

test("MemoryStore hands out copies of rows", () => {
    const store = new MemoryStore();
    store.transaction((tx) => tx.agents.insert(agentRecord()));

    const copy = store.transaction((tx) => tx.agents.findById("agent-1"));
    if (copy) copy.name = "changed";

    expect(store.transaction((tx) => tx.agents.findById("agent-1"))?.name).toBe("DC01 Collector");
});

test("MemoryStore rejects nested transactions", () => {
    const store = new MemoryStore();
    expect(() => store.transaction(() => store.transaction(() => 1))).toThrow("Nested transactions are not supported");
});

test("MemoryStore rejects async work", () => {
    const store = new MemoryStore();
    expect(() => store.transaction(async () => 1)).toThrow("Transaction function cannot return a promise");
});

test("MemoryStore rolls back each transaction to the state it started from", () => {
    const store = new MemoryStore();
    const rename = (name: string) => (tx: StoreTransaction) => {
        const agent = tx.agents.findById("agent-1");
        if (agent) tx.agents.update({ ...agent, name });
    };

    store.transaction((tx) => tx.agents.insert(agentRecord()));
    store.transaction(rename("First"));
    expect(() =>
        store.transaction((tx) => {
            tx.certificates.insert(certificateRecord());
            rename("Second")(tx);
            throw new Error("boom");
        })
    ).toThrow("boom");
    store.transaction(rename("Third"));
    expect(() =>
        store.transaction((tx) => {
            tx.certificates.insert(certificateRecord());
            throw new Error("boom");
        })
    ).toThrow("boom");

    expect(store.transaction((tx) => tx.agents.findById("agent-1"))?.name).toBe("Third");
    expect(store.transaction((tx) => tx.certificates.listForAgent("agent-1"))).toEqual([]);
});
