import { describe, expect, test, beforeEach, afterEach } from "vitest";
import type { AgentRecord, CertificateRecord, Store } from "./interface";

export function agentRecord(overrides: Partial<AgentRecord> = {}): AgentRecord {
    return {
        id: "agent-1",
        name: "DC01 Collector",
        type: "DomainController",
        version: "1.0.0",
        machineName: "DC01",
        ipAddress: "10.0.0.5",
        domain: "corp.example",
        operatingSystem: "Windows Server 2022",
        configuration: null,
        isActive: true,
        isOnline: false,
        status: "Registered",
        statusMessage: null,
        registeredAt: new Date("2026-01-01T00:00:00Z"),
        lastHeartbeat: null,
        lastDataCollection: null,
        lastUpdated: null,
        ...overrides,
    };
}

export function certificateRecord(overrides: Partial<CertificateRecord> = {}): CertificateRecord {
    return {
        id: "cert-1",
        agentId: "agent-1",
        thumbprint: "AA11",
        serialNumber: "01",
        subject: "CN=DC01",
        issuer: "CN=DC01",
        notBefore: new Date("2026-01-01T00:00:00Z"),
        notAfter: new Date("2027-01-01T00:00:00Z"),
        issuedAt: new Date("2026-01-01T00:00:00Z"),
        status: "Active",
        usage: "ClientAuthentication",
        revokedAt: null,
        revocationReason: null,
        certificateData: null,
        ...overrides,
    };
}

/**
 * Behaviour every storage engine shares.
 */
export function describeStore(name: string, open: () => Store) {
    describe(name, () => {
        let store: Store;

        beforeEach(() => {
            store = open();
        });

        afterEach(() => {
            store.close();
        });

        test("round-trips an agent with dates and flags", () => {
            const agent = agentRecord({ lastHeartbeat: new Date("2026-02-01T10:00:00Z"), isOnline: true });
            store.transaction((tx) => tx.agents.insert(agent));

            const found = store.transaction((tx) => tx.agents.findByNaturalKey("DC01", "DomainController"));
            expect(found).toEqual(agent);
            expect(store.transaction((tx) => tx.agents.findByNaturalKey("DC01", "Server"))).toBeNull();
        });

        test("rejects a second agent with the same natural key", () => {
            store.transaction((tx) => tx.agents.insert(agentRecord()));

            expect(() => store.transaction((tx) => tx.agents.insert(agentRecord({ id: "agent-2" })))).toThrow(
                "UNIQUE constraint failed"
            );
        });

        test("rolls back every write when the work throws", () => {
            expect(() =>
                store.transaction((tx) => {
                    tx.agents.insert(agentRecord());
                    throw new Error("boom");
                })
            ).toThrow("boom");

            expect(store.transaction((tx) => tx.agents.findById("agent-1"))).toBeNull();
        });

        test("a failed transaction restores the tables it wrote and keeps earlier commits", () => {
            store.transaction((tx) => tx.agents.insert(agentRecord()));

            expect(() =>
                store.transaction((tx) => {
                    const agent = tx.agents.findById("agent-1");
                    if (agent) tx.agents.update({ ...agent, name: "Renamed" });
                    tx.certificates.insert(certificateRecord());
                    throw new Error("boom");
                })
            ).toThrow("boom");

            expect(store.transaction((tx) => tx.agents.findById("agent-1"))?.name).toBe("DC01 Collector");
            expect(store.transaction((tx) => tx.certificates.listForAgent("agent-1"))).toEqual([]);

            store.transaction((tx) => tx.certificates.insert(certificateRecord()));
            expect(store.transaction((tx) => tx.certificates.listForAgent("agent-1")).map((c) => c.thumbprint)).toEqual([
                "AA11",
            ]);
        });

        test("update of a missing row throws", () => {
            expect(() => store.transaction((tx) => tx.agents.update(agentRecord({ id: "missing" })))).toThrow(
                "agents row missing does not exist"
            );
        });

        test("lists only active agents ordered by name", () => {
            store.transaction((tx) => {
                tx.agents.insert(agentRecord({ id: "a", name: "Zulu", machineName: "Z" }));
                tx.agents.insert(agentRecord({ id: "b", name: "Alpha", machineName: "A" }));
                tx.agents.insert(agentRecord({ id: "c", name: "Mike", machineName: "M", isActive: false }));
            });

            const names = store.transaction((tx) => tx.agents.listActive()).map((a) => a.name);
            expect(names).toEqual(["Alpha", "Zulu"]);
        });

        test("orders names by code unit, uppercase before lowercase", () => {
            store.transaction((tx) => {
                tx.agents.insert(agentRecord({ id: "a", name: "alpha", machineName: "A" }));
                tx.agents.insert(agentRecord({ id: "b", name: "Zulu", machineName: "Z" }));
            });

            expect(store.transaction((tx) => tx.agents.listActive()).map((a) => a.name)).toEqual(["Zulu", "alpha"]);
        });

        test("certificates issued in the same millisecond list the later insert first", () => {
            store.transaction((tx) => {
                tx.agents.insert(agentRecord());
                tx.certificates.insert(certificateRecord());
                tx.certificates.insert(certificateRecord({ id: "cert-2", thumbprint: "BB22" }));
            });

            const listed = store.transaction((tx) => tx.certificates.listForAgent("agent-1"));
            expect(listed.map((c) => c.thumbprint)).toEqual(["BB22", "AA11"]);
        });

        test("keeps thumbprints unique and lists certificates newest first", () => {
            store.transaction((tx) => {
                tx.agents.insert(agentRecord());
                tx.certificates.insert(certificateRecord());
                tx.certificates.insert(
                    certificateRecord({ id: "cert-2", thumbprint: "BB22", issuedAt: new Date("2026-03-01T00:00:00Z") })
                );
            });

            expect(() =>
                store.transaction((tx) => tx.certificates.insert(certificateRecord({ id: "cert-3" })))
            ).toThrow("UNIQUE constraint failed");

            const listed = store.transaction((tx) => tx.certificates.listForAgent("agent-1"));
            expect(listed.map((c) => c.thumbprint)).toEqual(["BB22", "AA11"]);
            expect(store.transaction((tx) => tx.certificates.findForAgent("agent-2", "AA11"))).toBeNull();
        });

        test("limits submissions per agent", () => {
            store.transaction((tx) => {
                tx.agents.insert(agentRecord());
                for (let i = 0; i < 3; i++) {
                    tx.submissions.insert({
                        id: `sub-${i}`,
                        agentId: "agent-1",
                        dataType: "Users",
                        recordCount: i,
                        dataSizeBytes: 0,
                        fileHash: null,
                        metadata: null,
                        status: "Pending",
                        submittedAt: new Date(Date.UTC(2026, 0, 1 + i)),
                        processedAt: null,
                        processedCount: 0,
                        errorCount: 0,
                        errorDetails: null,
                        retryCount: 0,
                        retryAfter: null,
                        maxRetries: 3,
                    });
                }
            });

            const ids = store.transaction((tx) => tx.submissions.listForAgent("agent-1", 2)).map((s) => s.id);
            expect(ids).toEqual(["sub-2", "sub-1"]);
        });

        test("keeps one error row per agent and error id", () => {
            const at = new Date("2026-01-05T00:00:00Z");
            const error = {
                id: "err-1",
                agentId: "agent-1",
                errorId: "E100",
                severity: "High" as const,
                category: "Collection",
                source: "UserCollector",
                message: "Directory unreachable",
                stackTrace: null,
                additionalData: null,
                occurredAt: at,
                occurrenceCount: 1,
                firstOccurrence: at,
                lastOccurrence: at,
                reportedAt: at,
                status: "New",
            };
            store.transaction((tx) => {
                tx.agents.insert(agentRecord());
                tx.errors.insert(error);
            });

            expect(() => store.transaction((tx) => tx.errors.insert({ ...error, id: "err-2" }))).toThrow(
                "UNIQUE constraint failed"
            );
            expect(store.transaction((tx) => tx.errors.find("agent-1", "E100"))?.severity).toBe("High");
        });
    });
}
