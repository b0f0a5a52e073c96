import { describe, expect, test, beforeEach } from "vitest";
import { ManualClock, mockContext, registrationFor } from "../mock";
import type { ServiceContext } from "../context";
import { AgentRegistry } from "./src";
import type { RegisterAgentRequest } from "./interface";

describe("AgentRegistry", () => {
    let clock: ManualClock;
    let ctx: ServiceContext;
    let registry: AgentRegistry;

    beforeEach(() => {
        clock = new ManualClock("2026-03-01T12:00:00.000Z");
        ctx = mockContext({ clock });
        registry = new AgentRegistry(ctx);
    });

    function register(overrides: Partial<RegisterAgentRequest> = {}) {
        const result = registry.register(registrationFor(overrides));
        if (!result.success) throw new Error(result.message);
        return result.value;
    }

    test("register returns an id, a credential and the type defaults", () => {
        const result = registry.register(registrationFor());

        expect(result.success).toBe(true);
        if (!result.success) return;
        expect(result.message).toBe("Agent registered successfully");
        expect(result.value.apiKey).toMatch(/^[A-Za-z0-9_-]{43}$/);
        expect(result.value.configuration).toEqual({
            dataCollectionIntervalMinutes: 60,
            enabledDataTypes: ["Users", "Groups", "Policies"],
            heartbeatIntervalSeconds: 300,
            enableDetailedLogging: false,
            customSettings: {},
        });

        const stored = ctx.store.transaction((tx) => tx.agents.findById(result.value.agentId));
        expect(stored?.status).toBe("Registered");
        expect(stored?.isActive).toBe(true);
        expect(stored?.isOnline).toBe(false);
    });

    test("server and workstation defaults", () => {
        const server = registry.register(registrationFor({ type: "Server", machineName: "APP01" }));
        const workstation = registry.register(registrationFor({ type: "Workstation", machineName: "WS01" }));

        expect(server.success && server.value.configuration.enabledDataTypes).toEqual(["Events", "LocalUsers", "LocalGroups"]);
        expect(server.success && server.value.configuration.dataCollectionIntervalMinutes).toBe(30);
        expect(workstation.success && workstation.value.configuration.enabledDataTypes).toEqual(["Events", "LocalUsers"]);
        expect(workstation.success && workstation.value.configuration.dataCollectionIntervalMinutes).toBe(120);
    });

    test("registering the same machine and type twice updates the first row", () => {
        const first = register();
        clock.advance(60_000);
        const second = register({ name: "Renamed", version: "1.1.0", configuration: { site: "east" } });

        expect(second.agentId).toBe(first.agentId);
        expect(second.apiKey).not.toBe(first.apiKey);

        const agents = ctx.store.transaction((tx) => tx.agents.listActive());
        expect(agents).toHaveLength(1);
        expect(agents[0]?.name).toBe("Renamed");
        expect(agents[0]?.version).toBe("1.1.0");
        expect(agents[0]?.configuration).toBe('{"site":"east"}');
        expect(agents[0]?.registeredAt.toISOString()).toBe("2026-03-01T12:00:00.000Z");
        expect(agents[0]?.lastUpdated?.toISOString()).toBe("2026-03-01T12:01:00.000Z");
    });

    test("same machine with a different type is a different agent", () => {
        const dc = register();
        const server = register({ type: "Server" });
        expect(server.agentId).not.toBe(dc.agentId);
    });

    test("registration reactivates a deactivated agent", () => {
        const { agentId } = register();
        registry.deactivate(agentId);

        register();

        const result = registry.get(agentId);
        expect(result.success).toBe(true);
    });

    test("store failures become RegistrationError", () => {
        const broken = new AgentRegistry({
            ...ctx,
            store: {
                kind: "memory",
                transaction: () => {
                    throw new Error("disk full");
                },
                close: () => {},
            },
        });

        expect(broken.register(registrationFor())).toEqual({
            success: false,
            error: "RegistrationError",
            message: "Registration failed: disk full",
        });
    });

    test("heartbeat marks the agent online", () => {
        const { agentId } = register();
        clock.advance(5_000);

        const result = registry.heartbeat({ agentId, status: "Collecting", statusMessage: "Users 40%" });

        expect(result).toEqual({ success: true, message: "Heartbeat processed", value: { updateAvailable: false } });
        const agent = ctx.store.transaction((tx) => tx.agents.findById(agentId));
        expect(agent?.isOnline).toBe(true);
        expect(agent?.status).toBe("Collecting");
        expect(agent?.statusMessage).toBe("Users 40%");
        expect(agent?.lastHeartbeat?.toISOString()).toBe("2026-03-01T12:00:05.000Z");
    });

    test("heartbeat for an unknown agent creates nothing", () => {
        const result = registry.heartbeat({ agentId: "00000000-0000-0000-0000-000000000000", status: "Online" });

        expect(result).toEqual({ success: false, error: "AgentNotFound", message: "Agent not found" });
        expect(ctx.store.transaction((tx) => tx.agents.listActive())).toHaveLength(0);
    });

    test("heartbeat for a deactivated agent is rejected", () => {
        const { agentId } = register();
        registry.deactivate(agentId);

        const result = registry.heartbeat({ agentId, status: "Online" });
        expect(result.success).toBe(false);
        expect(!result.success && result.error).toBe("AgentNotFound");
    });

    test("deactivate clears flags and is safe to repeat", () => {
        const { agentId } = register();
        registry.heartbeat({ agentId, status: "Online" });

        expect(registry.deactivate(agentId)).toEqual({ success: true, message: "Agent deactivated", value: true });
        expect(registry.deactivate(agentId)).toEqual({ success: true, message: "Agent already deactivated", value: true });

        const agent = ctx.store.transaction((tx) => tx.agents.findById(agentId));
        expect(agent?.isActive).toBe(false);
        expect(agent?.isOnline).toBe(false);
        expect(agent?.status).toBe("Deactivated");
    });

    test("deactivate of an unknown agent", () => {
        const result = registry.deactivate("missing");
        expect(!result.success && result.error).toBe("AgentNotFound");
    });

    test("list and get only show active agents", () => {
        const zulu = register({ name: "Zulu", machineName: "Z1" });
        register({ name: "Alpha", machineName: "A1" });
        registry.deactivate(zulu.agentId);

        const list = registry.list();
        expect(list.success && list.value.map((a) => a.name)).toEqual(["Alpha"]);

        const hidden = registry.get(zulu.agentId);
        expect(!hidden.success && hidden.error).toBe("AgentNotFound");
    });

    test("updateConfiguration stores the document", () => {
        const { agentId } = register();
        const configuration = {
            dataCollectionIntervalMinutes: 15,
            enabledDataTypes: ["Users" as const],
            heartbeatIntervalSeconds: 60,
            enableDetailedLogging: true,
            customSettings: { ou: "Staff" },
        };

        expect(registry.updateConfiguration(agentId, configuration).success).toBe(true);

        const stored = ctx.store.transaction((tx) => tx.agents.findById(agentId));
        expect(JSON.parse(stored?.configuration ?? "null")).toEqual(configuration);
    });
});
