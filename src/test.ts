import { mkdtempSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { z } from "zod";
import { CollectorAgent, type FetchLike } from "./agent/module";
import { getSigner } from "./authority/module";
import { createCore, type Core } from "./core";
import { API_PREFIX, createHandler } from "./gateway/src";
import { silentLogger } from "./logger";
import { ManualClock } from "./mock";
import { SqliteStore } from "./storage/module";
import type { AgentType } from "./storage/interface";

const Validation = z.object({
    isValid: z.boolean(),
    validationErrors: z.array(z.string()),
    certificateInfo: z.object({ issuer: z.string(), status: z.string().nullable() }).nullable(),
});

describe("Fleet end to end", () => {
    let dir: string;
    let clock: ManualClock;
    let store: SqliteStore;
    let core: Core;
    let gateway: FetchLike;

    async function boot() {
        store = new SqliteStore(join(dir, "registry.db"));
        const signer = await getSigner({ mode: "root-ca", dataDir: join(dir, "ca") });
        core = createCore({ store, signer, logger: silentLogger, clock: clock.now });
        const handle = createHandler(core, silentLogger);
        gateway = (url, init) => handle(new Request(url, init));
    }

    function collector(machineName: string, type: AgentType) {
        return new CollectorAgent({
            name: `${machineName} Collector`,
            type,
            version: "1.0.0",
            machineName,
            serviceUrl: "http://fleet.test",
            fetch: (url, init) => gateway(url, init),
            logger: silentLogger,
            clock: clock.now,
        });
    }

    async function validate(certificateData: string) {
        const res = await gateway(`http://fleet.test${API_PREFIX}/certificates/validate`, {
            method: "POST",
            body: JSON.stringify({ certificateData }),
        });
        expect(res.status).toBe(200);
        return Validation.parse(await res.json());
    }

    beforeEach(async () => {
        dir = mkdtempSync(join(tmpdir(), "fleet-e2e-"));
        clock = new ManualClock("2026-03-01T12:00:00.000Z");
        await boot();
    });

    afterEach(() => {
        store.close();
        rmSync(dir, { recursive: true, force: true });
    });

    test("two agents onboard, report and hold CA-issued certificates", async () => {
        const dc = collector("DC01", "DomainController");
        const app = collector("APP01", "Server");
        await dc.register();
        await app.register();

        expect(app.configuration?.enabledDataTypes).toEqual(["Events", "LocalUsers", "LocalGroups"]);

        const listed = core.registry.list();
        expect(listed.success && listed.value.map((a) => a.name)).toEqual(["APP01 Collector", "DC01 Collector"]);

        await dc.submit("Users", [{ username: "alice", email: "alice@corp.example" }]);
        await app.submit("Events", [{ id: 4624 }, { id: 4625 }]);
        expect(store.transaction((tx) => tx.users.list()).map((u) => u.username)).toEqual(["alice"]);

        await dc.requestCertificate("DC01", ["dc01.corp.example"]);
        const certificateData = dc.certificate?.certificateData ?? "";

        const report = await validate(certificateData);
        expect(report.isValid).toBe(true);
        expect(report.certificateInfo?.issuer).toBe("CN=Fleet Trust Root CA, O=Fleet Trust");
        expect(report.certificateInfo?.status).toBe("Active");

        const authority = await gateway(`http://fleet.test${API_PREFIX}/certificates/authority`);
        expect(authority.headers.get("Content-Type")).toBe("application/x-pem-file");
        expect((await authority.text()).startsWith("-----BEGIN CERTIFICATE-----")).toBe(true);

        const revoked = core.authority.revokeCertificate({
            agentId: dc.agentId ?? "",
            certificateThumbprint: dc.certificate?.thumbprint ?? "",
            reason: "KeyCompromise",
        });
        expect(revoked.success).toBe(true);
        expect((await validate(certificateData)).validationErrors).toEqual([
            "Certificate has been revoked",
            "Certificate chain validation failed",
        ]);
    });

    test("agents, certificates and the CA survive a restart", async () => {
        const dc = collector("DC01", "DomainController");
        await dc.register();
        await dc.requestCertificate("DC01");
        dc.recordError({ severity: "Low", category: "Ldap", source: "UserCollector", message: "Slow bind" });
        await dc.flushErrors();

        store.close();
        clock.advance(60 * 60 * 1000);
        await boot();

        const agent = core.registry.get(dc.agentId ?? "");
        expect(agent.success && agent.value.machineName).toBe("DC01");

        const report = await validate(dc.certificate?.certificateData ?? "");
        expect(report).toEqual({
            isValid: true,
            validationErrors: [],
            certificateInfo: { issuer: "CN=Fleet Trust Root CA, O=Fleet Trust", status: "Active" },
        });

        const errors = core.errors.listErrors(dc.agentId ?? "");
        expect(errors.success && errors.value.map((e) => e.message)).toEqual(["Slow bind"]);

        await expect(dc.heartbeat("Online")).resolves.toBe(false);
    });

    test("a deactivated agent is turned away until it registers again", async () => {
        const dc = collector("DC01", "DomainController");
        await dc.register();
        const agentId = dc.agentId ?? "";

        const res = await gateway(`http://fleet.test${API_PREFIX}/${agentId}`, { method: "DELETE" });
        expect(await res.json()).toEqual({ success: true, message: "Agent deactivated" });

        await expect(dc.heartbeat("Online")).rejects.toMatchObject({ status: 404, kind: "AgentNotFound" });
        await expect(dc.submit("Users", [])).rejects.toMatchObject({ status: 404 });

        await dc.register();
        expect(dc.agentId).toBe(agentId);
        await expect(dc.heartbeat("Online")).resolves.toBe(false);
    });
});
