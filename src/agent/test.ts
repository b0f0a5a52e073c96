import { createHash } from "node:crypto";
import { describe, expect, test, beforeEach } from "vitest";
import { createCore, type Core } from "../core";
import { createHandler } from "../gateway/src";
import { silentLogger } from "../logger";
import { ManualClock } from "../mock";
import { MemoryStore } from "../storage/memory/src";
import type { DataType } from "../submission/interface";
import type { FetchLike } from "./interface";
import { runCollectorLoop } from "./loop";
import { CollectorAgent, localErrorId } from "./src";

const DAY_MS = 24 * 60 * 60 * 1000;

describe("CollectorAgent", () => {
    let clock: ManualClock;
    let core: Core;
    let gateway: FetchLike;

    beforeEach(() => {
        clock = new ManualClock("2026-03-01T12:00:00.000Z");
        core = createCore({ store: new MemoryStore(), logger: silentLogger, clock: clock.now });
        const handle = createHandler(core, silentLogger);
        gateway = (url, init) => handle(new Request(url, init));
    });

    function agentWith(fetch: FetchLike = gateway) {
        return new CollectorAgent({
            name: "DC01 Collector",
            type: "DomainController",
            version: "1.0.0",
            machineName: "DC01",
            domain: "corp.example",
            serviceUrl: "http://fleet.test",
            fetch,
            logger: silentLogger,
            clock: clock.now,
        });
    }

    function storedAgent(agentId: string) {
        return core.store.transaction((tx) => tx.agents.findById(agentId));
    }

    test("registers, heartbeats and submits records", async () => {
        const agent = agentWith();
        await agent.register();

        const agentId = agent.agentId ?? "";
        expect(agentId).not.toBe("");
        expect(agent.configuration?.enabledDataTypes).toEqual(["Users", "Groups", "Policies"]);

        expect(await agent.heartbeat("Online")).toBe(false);
        expect(storedAgent(agentId)?.isOnline).toBe(true);
        expect(storedAgent(agentId)?.status).toBe("Online");

        const records = [{ username: "alice" }];
        const submissionId = await agent.submit("Users", records);
        const submission = core.store.transaction((tx) => tx.submissions.findById(submissionId));
        expect(submission?.status).toBe("Completed");
        expect(submission?.fileHash).toBe(createHash("sha256").update(JSON.stringify(records)).digest("hex"));
        expect(submission?.metadata).toBe('{"machineName":"DC01"}');
        expect(core.store.transaction((tx) => tx.users.list()).map((u) => u.username)).toEqual(["alice"]);
    });

    test("calls before registration fail locally", async () => {
        await expect(agentWith().heartbeat("Online")).rejects.toThrow("Agent is not registered");
    });

    test("service failures carry the status and error kind", async () => {
        const agent = agentWith();
        agent.agentId = "missing";

        await expect(agent.heartbeat("Online")).rejects.toMatchObject({
            name: "AgentApiError",
            status: 404,
            kind: "AgentNotFound",
            message: "Agent not found",
        });
    });

    test("repeated local errors are reported once with their count", async () => {
        const agent = agentWith();
        await agent.register();
        const failure = { severity: "Medium" as const, category: "Ldap", source: "UserCollector", message: "Timeout" };

        agent.recordError(failure);
        clock.advance(60_000);
        agent.recordError(failure);

        expect(agent.pendingErrors()).toHaveLength(1);
        expect(agent.pendingErrors()[0]?.occurrenceCount).toBe(2);

        expect(await agent.flushErrors()).toBe(1);
        expect(agent.pendingErrors()).toEqual([]);
        expect(await agent.flushErrors()).toBe(0);

        const stored = core.store.transaction((tx) =>
            tx.errors.find(agent.agentId ?? "", localErrorId("UserCollector", "Timeout"))
        );
        expect(stored?.occurrenceCount).toBe(2);
        expect(stored?.firstOccurrence.toISOString()).toBe("2026-03-01T12:00:00.000Z");
        expect(stored?.lastOccurrence.toISOString()).toBe("2026-03-01T12:01:00.000Z");
        expect(stored?.additionalData).toBe('{"machineName":"DC01"}');
    });

    test("an occurrence recorded while a report is in flight is sent with the next report", async () => {
        const failure = { severity: "Low" as const, category: "Ldap", source: "GroupCollector", message: "Referral" };
        let recordedInFlight = false;
        const agent: CollectorAgent = agentWith(async (url, init) => {
            if (url.endsWith("/errors/report") && !recordedInFlight) {
                recordedInFlight = true;
                agent.recordError(failure);
            }
            return gateway(url, init);
        });
        await agent.register();

        agent.recordError(failure);
        expect(await agent.flushErrors()).toBe(1);
        expect(agent.pendingErrors().map((e) => e.occurrenceCount)).toEqual([1]);

        expect(await agent.flushErrors()).toBe(1);
        expect(agent.pendingErrors()).toEqual([]);

        const stored = core.store.transaction((tx) =>
            tx.errors.find(agent.agentId ?? "", localErrorId("GroupCollector", "Referral"))
        );
        expect(stored?.occurrenceCount).toBe(2);
    });

    test("a failed report keeps its errors queued, merged with any recorded meanwhile", async () => {
        const failure = { severity: "High" as const, category: "Service", source: "Uploader", message: "Offline" };
        let down = true;
        const agent: CollectorAgent = agentWith(async (url, init) => {
            if (url.endsWith("/errors/report") && down) {
                agent.recordError(failure);
                throw new Error("connect ECONNREFUSED");
            }
            return gateway(url, init);
        });
        await agent.register();

        agent.recordError(failure);
        clock.advance(60_000);
        await expect(agent.flushErrors()).rejects.toThrow("connect ECONNREFUSED");

        const [queued] = agent.pendingErrors();
        expect(agent.pendingErrors()).toHaveLength(1);
        expect(queued?.occurrenceCount).toBe(2);
        expect(queued?.firstOccurrence?.toISOString()).toBe("2026-03-01T12:00:00.000Z");
        expect(queued?.lastOccurrence?.toISOString()).toBe("2026-03-01T12:01:00.000Z");

        down = false;
        expect(await agent.flushErrors()).toBe(1);
        const stored = core.store.transaction((tx) =>
            tx.errors.find(agent.agentId ?? "", localErrorId("Uploader", "Offline"))
        );
        expect(stored?.occurrenceCount).toBe(2);
        expect(stored?.firstOccurrence.toISOString()).toBe("2026-03-01T12:00:00.000Z");
        expect(stored?.lastOccurrence.toISOString()).toBe("2026-03-01T12:01:00.000Z");
    });

    test("acquires and renews its certificate", async () => {
        const agent = agentWith();
        await agent.register();
        await expect(agent.renewCertificate()).rejects.toThrow("No certificate to renew");

        await agent.requestCertificate("DC01", ["dc01.corp.example"]);
        const first = agent.certificate;
        expect(first?.expiresAt.toISOString()).toBe("2027-02-28T12:00:00.000Z");
        expect(agent.certificateExpiresWithin(30)).toBe(false);

        clock.advance(340 * DAY_MS);
        expect(agent.certificateExpiresWithin(30)).toBe(true);

        await agent.renewCertificate();
        expect(agent.certificate?.thumbprint).not.toBe(first?.thumbprint);

        const old = core.store.transaction((tx) => tx.certificates.findByThumbprint(first?.thumbprint ?? ""));
        expect(old?.status).toBe("Superseded");
    });
});

describe("runCollectorLoop", () => {
    let clock: ManualClock;
    let core: Core;
    let gateway: FetchLike;

    beforeEach(() => {
        clock = new ManualClock("2026-03-01T12:00:00.000Z");
        core = createCore({ store: new MemoryStore(), logger: silentLogger, clock: clock.now });
        const handle = createHandler(core, silentLogger);
        gateway = (url, init) => handle(new Request(url, init));
    });

    function agentWith(fetch: FetchLike) {
        return new CollectorAgent({
            name: "DC01 Collector",
            type: "DomainController",
            version: "1.0.0",
            machineName: "DC01",
            serviceUrl: "http://fleet.test",
            fetch,
            logger: silentLogger,
            clock: clock.now,
        });
    }

    /** Advances the clock instead of waiting, and aborts after `cycles` sleeps */
    function sleeper(controller: AbortController, cycles: number) {
        const waits: number[] = [];
        const sleep = async (ms: number) => {
            waits.push(ms);
            clock.advance(ms);
            if (waits.length === cycles) controller.abort();
        };
        return { waits, sleep };
    }

    test("backs off for a minute after a failed cycle, then resumes the normal interval", async () => {
        let reachable = false;
        const agent = agentWith(async (url, init) => {
            if (!reachable) {
                reachable = true;
                throw new Error("connect ECONNREFUSED");
            }
            return gateway(url, init);
        });

        const controller = new AbortController();
        const { waits, sleep } = sleeper(controller, 3);
        const collected: DataType[] = [];

        await runCollectorLoop(agent, {
            signal: controller.signal,
            sleep,
            collect: async (dataType) => {
                collected.push(dataType);
                return dataType === "Users" ? [{ username: "alice" }, { username: "bob" }] : null;
            },
        });

        expect(waits).toEqual([60_000, 30_000, 30_000]);
        expect(collected).toEqual(["Users", "Groups", "Policies"]);

        const agentId = agent.agentId ?? "";
        expect(core.store.transaction((tx) => tx.agents.findById(agentId))?.lastHeartbeat?.toISOString()).toBe(
            "2026-03-01T12:01:00.000Z"
        );

        const submissions = core.submissions.listSubmissions(agentId);
        expect(submissions.success && submissions.value.map((s) => [s.dataType, s.recordCount, s.status])).toEqual([
            ["Users", 2, "Completed"],
        ]);

        const errors = core.errors.listErrors(agentId);
        expect(errors.success && errors.value.map((e) => [e.source, e.message, e.severity])).toEqual([
            ["CollectorLoop", "connect ECONNREFUSED", "High"],
        ]);
        expect(agent.pendingErrors()).toEqual([]);
    });

    test("stops inside a cycle when aborted", async () => {
        const agent = agentWith(gateway);
        const controller = new AbortController();
        const { waits, sleep } = sleeper(controller, 10);

        await runCollectorLoop(agent, {
            signal: controller.signal,
            sleep,
            collect: async () => {
                controller.abort();
                return [{ username: "alice" }];
            },
        });

        expect(waits).toEqual([]);
        const submissions = core.submissions.listSubmissions(agent.agentId ?? "");
        expect(submissions.success && submissions.value).toEqual([]);
    });

    test("aborting cancels a request the service never answers", async () => {
        const agent = agentWith(
            (_url, init) =>
                new Promise<Response>((_resolve, reject) => {
                    const signal = init?.signal;
                    if (!signal) {
                        reject(new Error("request sent without a signal"));
                        return;
                    }
                    signal.addEventListener("abort", () => reject(signal.reason), { once: true });
                })
        );
        const controller = new AbortController();
        const { waits, sleep } = sleeper(controller, 10);

        const stopped = runCollectorLoop(agent, { signal: controller.signal, sleep, collect: async () => null });
        controller.abort();
        await stopped;

        expect(waits).toEqual([]);
        expect(agent.agentId).toBeNull();
        expect(agent.pendingErrors()).toEqual([]);
    });

    test("hands the loop's signal to the collector", async () => {
        const agent = agentWith(gateway);
        const controller = new AbortController();
        const { sleep } = sleeper(controller, 1);
        const signals: AbortSignal[] = [];

        await runCollectorLoop(agent, {
            signal: controller.signal,
            sleep,
            collect: async (_dataType, signal) => {
                signals.push(signal);
                return null;
            },
        });

        expect(signals).toHaveLength(3);
        expect(signals.every((signal) => signal === controller.signal)).toBe(true);
    });

    test("registers again after the service deactivated the agent", async () => {
        const agent = agentWith(gateway);
        await agent.register();
        const agentId = agent.agentId ?? "";
        core.registry.deactivate(agentId);

        const controller = new AbortController();
        const { waits, sleep } = sleeper(controller, 2);
        await runCollectorLoop(agent, { signal: controller.signal, sleep, collect: async () => null });

        expect(waits).toEqual([60_000, 30_000]);
        expect(agent.agentId).toBe(agentId);
        expect(core.store.transaction((tx) => tx.agents.findById(agentId))?.isActive).toBe(true);

        const errors = core.errors.listErrors(agentId);
        expect(errors.success && errors.value.map((e) => e.message)).toEqual(["Agent not found"]);
    });
});
