import { afterEach, describe, expect, test, vi } from "vitest";
import { agentFromEnv } from "./agent/module";
import { ConfigError, loadConfig } from "./config";
import { createLogger, silentLogger } from "./logger";
import { CoreError, logFailure } from "./result";
import { getStore, MemoryStore, SqliteStore } from "./storage/module";

describe("loadConfig", () => {
    test("defaults", () => {
        expect(loadConfig({})).toEqual({
            port: 9002,
            debug: false,
            storage: { kind: "memory", dbPath: "registry.db" },
            authority: { mode: "self-signed", dataDir: ".authority" },
        });
    });

    test("reads every variable", () => {
        expect(
            loadConfig({
                PORT: "8080",
                DEBUG: "true",
                REGISTRY_STORAGE: "sqlite",
                REGISTRY_DB_PATH: "/var/lib/fleet/registry.db",
                AUTHORITY_MODE: "root-ca",
                AUTHORITY_DATA_DIR: "/var/lib/fleet/ca",
            })
        ).toEqual({
            port: 8080,
            debug: true,
            storage: { kind: "sqlite", dbPath: "/var/lib/fleet/registry.db" },
            authority: { mode: "root-ca", dataDir: "/var/lib/fleet/ca" },
        });
    });

    test("rejects unknown engines and bad ports", () => {
        expect(() => loadConfig({ REGISTRY_STORAGE: "redis" })).toThrow(ConfigError);
        expect(() => loadConfig({ PORT: "not-a-port" })).toThrow(ConfigError);

        const thrown = (() => {
            try {
                loadConfig({ REGISTRY_STORAGE: "redis", AUTHORITY_MODE: "vault" });
                return null;
            } catch (err) {
                return err;
            }
        })();
        expect(thrown).toBeInstanceOf(ConfigError);
        const issues = thrown instanceof ConfigError ? thrown.issues : [];
        expect(issues).toHaveLength(2);
        expect(issues[0]).toMatch(/^REGISTRY_STORAGE: /);
        expect(issues[1]).toMatch(/^AUTHORITY_MODE: /);
    });

    test("storage engine follows the configuration", () => {
        expect(getStore({ kind: "memory", dbPath: "unused.db" })).toBeInstanceOf(MemoryStore);

        const sqlite = getStore({ kind: "sqlite", dbPath: ":memory:" });
        expect(sqlite).toBeInstanceOf(SqliteStore);
        expect(sqlite.kind).toBe("sqlite");
        sqlite.close();
    });
});

describe("agentFromEnv", () => {
    test("builds an agent from its environment", () => {
        const agent = agentFromEnv({ AGENT_MACHINE_NAME: "APP01", AGENT_SERVICE_URL: "http://fleet.test:9002" });
        expect(agent.agentId).toBeNull();
    });

    test("rejects an unknown agent type", () => {
        expect(() => agentFromEnv({ AGENT_TYPE: "Printer" })).toThrow(ConfigError);
    });
});

describe("logger", () => {
    afterEach(() => {
        vi.restoreAllMocks();
    });

    test("prefixes lines with the scope chain", () => {
        const log = vi.spyOn(console, "log").mockImplementation(() => undefined);
        const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);

        const logger = createLogger("Gateway");
        logger.info("listening");
        logger.child("Registry").warn("Agent not found");
        logger.debug("hidden");

        expect(log.mock.calls).toEqual([["[Gateway] listening"]]);
        expect(warn.mock.calls).toEqual([["[Gateway:Registry] Agent not found"]]);
    });

    test("debug lines need the debug flag and silent wins", () => {
        const log = vi.spyOn(console, "log").mockImplementation(() => undefined);

        createLogger("Agent", { debug: true }).debug("POST /register");
        createLogger("Agent", { debug: true, silent: true }).info("dropped");
        silentLogger.child("Errors").info("dropped");

        expect(log.mock.calls).toEqual([["[Agent] POST /register"]]);
    });
});

describe("logFailure", () => {
    afterEach(() => {
        vi.restoreAllMocks();
    });

    test("expected failures keep their kind and log a warning", () => {
        const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);
        const failure = logFailure(createLogger("Test"), new CoreError("AgentNotFound", "Agent not found"), "StoreFailure", "Failed");

        expect(failure).toEqual({ success: false, error: "AgentNotFound", message: "Agent not found" });
        expect(warn.mock.calls).toEqual([["[Test] Agent not found"]]);
    });

    test("anything else becomes the fallback kind with the prefix", () => {
        const error = vi.spyOn(console, "error").mockImplementation(() => undefined);
        const cause = new Error("database is locked");
        const failure = logFailure(createLogger("Test"), cause, "StoreFailure", "Failed to list agents");

        expect(failure).toEqual({
            success: false,
            error: "StoreFailure",
            message: "Failed to list agents: database is locked",
        });
        expect(error.mock.calls).toEqual([["[Test] Failed to list agents: database is locked", cause]]);
    });
});
