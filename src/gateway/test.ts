import { describe, expect, test, beforeEach } from "vitest";
import { z } from "zod";
import { createCore, type Core } from "../core";
import { silentLogger } from "../logger";
import { ManualClock } from "../mock";
import type { Store } from "../storage/interface";
import { MemoryStore } from "../storage/memory/src";
import { API_PREFIX, createHandler } from "./src";

const encode = (value: unknown) => Buffer.from(JSON.stringify(value), "utf-8").toString("base64");

const Registered = z.object({ agentId: z.string() });
const Issued = z.object({ thumbprint: z.string(), certificateData: z.string() });
const Submitted = z.object({ submissionId: z.string() });

const registration = {
    name: "DC01 Collector",
    type: "DomainController",
    version: "1.0.0",
    machineName: "DC01",
    ipAddress: "10.0.0.5",
    domain: "corp.example",
    os: "Windows Server 2022",
};

describe("Gateway", () => {
    let clock: ManualClock;
    let core: Core;
    let handle: (req: Request) => Promise<Response>;

    function setup(store: Store = new MemoryStore()) {
        clock = new ManualClock("2026-03-01T12:00:00.000Z");
        core = createCore({ store, logger: silentLogger, clock: clock.now });
        handle = createHandler(core, silentLogger);
    }

    beforeEach(() => setup());

    async function call(method: string, path: string, body?: unknown) {
        const res = await handle(
            new Request(`http://localhost${API_PREFIX}${path}`, {
                method,
                headers: { "Content-Type": "application/json" },
                body: body === undefined ? undefined : typeof body === "string" ? body : JSON.stringify(body),
            })
        );
        const payload: unknown = await res.json();
        return { status: res.status, body: payload };
    }

    async function register() {
        const { body } = await call("POST", "/register", registration);
        return Registered.parse(body).agentId;
    }

    test("register answers with the id, a credential and the default schedule", async () => {
        const { status, body } = await call("POST", "/register", registration);

        expect(status).toBe(200);
        expect(body).toMatchObject({
            success: true,
            message: "Agent registered successfully",
            configuration: { dataCollectionIntervalMinutes: 60, heartbeatIntervalSeconds: 300 },
        });

        const { agentId } = Registered.parse(body);
        const stored = core.store.transaction((tx) => tx.agents.findById(agentId));
        expect(stored?.operatingSystem).toBe("Windows Server 2022");
    });

    test("rejects bodies that do not match the contract", async () => {
        expect(await call("POST", "/heartbeat", {})).toEqual({
            status: 400,
            body: {
                success: false,
                error: "InvalidRequest",
                message: "Invalid request: agentId: Required; status: Required",
            },
        });

        expect(await call("POST", "/heartbeat", "{not json")).toEqual({
            status: 400,
            body: { success: false, error: "InvalidRequest", message: "Request body is not valid JSON" },
        });
    });

    test("rejects ids that are not valid percent-encoding", async () => {
        const malformed = {
            status: 400,
            body: { success: false, error: "InvalidRequest", message: "Invalid request: malformed path segment" },
        };

        expect(await call("GET", "/%E0%A4%A")).toEqual(malformed);
        expect(await call("DELETE", "/%ZZ")).toEqual(malformed);
        expect(await call("POST", "/submissions/%E0%A4%A/retry", { delaySeconds: 60 })).toEqual(malformed);
    });

    test("maps a missing agent to 404", async () => {
        expect(await call("POST", "/heartbeat", { agentId: "missing", status: "Running" })).toEqual({
            status: 404,
            body: { success: false, error: "AgentNotFound", message: "Agent not found" },
        });
    });

    test("heartbeat, list and get", async () => {
        const agentId = await register();

        expect(await call("POST", "/heartbeat", { agentId, status: "Running", statusMessage: "ok" })).toEqual({
            status: 200,
            body: { success: true, message: "Heartbeat processed", updateAvailable: false },
        });

        const listed = await call("GET", "");
        expect(listed.body).toMatchObject({ success: true, agents: [{ id: agentId, isOnline: true, status: "Running" }] });

        const fetched = await call("GET", `/${agentId}`);
        expect(fetched.body).toMatchObject({
            success: true,
            id: agentId,
            lastHeartbeat: "2026-03-01T12:00:00.000Z",
        });
    });

    test("submitted users are listed with the agent's submissions", async () => {
        const agentId = await register();
        const data = encode([{ username: "alice" }, { username: "bob" }]);

        const submitted = await call("POST", "/submit-data", { agentId, dataType: "Users", recordCount: 2, data });
        expect(submitted).toEqual({
            status: 200,
            body: {
                success: true,
                message: "Data submitted successfully",
                submissionId: Submitted.parse(submitted.body).submissionId,
                processedAt: "2026-03-01T12:00:00.000Z",
            },
        });

        const listed = await call("GET", `/${agentId}/submissions?limit=5`);
        expect(listed.status).toBe(200);
        expect(listed.body).toMatchObject({
            submissions: [{ dataType: "Users", status: "Completed", processedCount: 2, errorCount: 0 }],
        });

        expect((await call("GET", `/${agentId}/submissions?limit=0`)).status).toBe(400);
    });

    test("a failed submission can be retried until the limit", async () => {
        const agentId = await register();
        const data = Buffer.from("not json", "utf-8").toString("base64");

        const failed = await call("POST", "/submit-data", { agentId, dataType: "Users", recordCount: 4, data });
        expect(failed.status).toBe(422);
        expect(failed.body).toMatchObject({ success: false, error: "HandlerFailure" });
        const { submissionId } = Submitted.parse(failed.body);

        expect(await call("POST", `/submissions/${submissionId}/retry`)).toEqual({
            status: 200,
            body: {
                success: true,
                message: "Retry scheduled",
                submissionId,
                retryCount: 1,
                retryAfter: "2026-03-01T12:05:00.000Z",
            },
        });
        await call("POST", `/submissions/${submissionId}/retry`, { delaySeconds: 60 });
        await call("POST", `/submissions/${submissionId}/retry`, { delaySeconds: 60 });

        expect(await call("POST", `/submissions/${submissionId}/retry`)).toEqual({
            status: 409,
            body: {
                success: false,
                error: "RetryLimitExceeded",
                message: "Submission has reached its retry limit of 3",
            },
        });
        expect((await call("POST", "/submissions/missing/retry")).status).toBe(404);
    });

    test("certificate lifecycle over HTTP", async () => {
        const agentId = await register();

        const generated = await call("POST", "/certificates/generate", {
            agentId,
            commonName: "DC01",
            subjectAlternativeNames: ["dc01.corp.example"],
        });
        expect(generated.status).toBe(200);
        expect(generated.body).toMatchObject({ success: true, message: "Certificate generated successfully" });
        const { thumbprint, certificateData } = Issued.parse(generated.body);

        const validated = await call("POST", "/certificates/validate", { certificateData });
        expect(validated.status).toBe(200);
        expect(validated.body).toMatchObject({ isValid: true, validationErrors: [] });

        expect(
            await call("POST", "/certificates/revoke", { agentId, certificateThumbprint: thumbprint, reason: "KeyCompromise" })
        ).toEqual({
            status: 200,
            body: { success: true, message: "Certificate revoked successfully", revokedAt: "2026-03-01T12:00:00.000Z" },
        });
        expect(await call("POST", "/certificates/revoke", { agentId, certificateThumbprint: thumbprint })).toEqual({
            status: 409,
            body: { success: false, error: "AlreadyRevoked", message: "Certificate is already revoked" },
        });

        const listed = await call("GET", `/certificates?agentId=${agentId}`);
        expect(listed.body).toMatchObject({
            success: true,
            certificates: [{ thumbprint, status: "Revoked", revocationReason: "KeyCompromise" }],
        });

        const revalidated = await call("POST", "/certificates/validate", { certificateData, checkChain: false });
        expect(revalidated.status).toBe(200);
        expect(revalidated.body).toMatchObject({ isValid: false, validationErrors: ["Certificate has been revoked"] });
    });

    test("certificate listing needs an agent id", async () => {
        expect(await call("GET", "/certificates")).toEqual({
            status: 400,
            body: { success: false, error: "InvalidRequest", message: "Invalid request: agentId: Required" },
        });
    });

    test("there is no CA certificate to hand out in self-signed mode", async () => {
        expect(await call("GET", "/certificates/authority")).toEqual({
            status: 404,
            body: { success: false, error: "CertificateNotFound", message: "Certificates are self-signed" },
        });
    });

    test("error reports and listing", async () => {
        const agentId = await register();
        const report = {
            agentId,
            reportedAt: "2026-03-01T11:59:00.000Z",
            errors: [
                {
                    errorId: "E1",
                    severity: "Critical",
                    category: "Ldap",
                    source: "UserCollector",
                    message: "Server unavailable",
                    occurredAt: "2026-03-01T11:58:00.000Z",
                },
            ],
        };

        const first = await call("POST", "/errors/report", report);
        expect(first.body).toMatchObject({
            success: true,
            processedErrorCount: 1,
            newErrorCount: 1,
            duplicateErrorCount: 0,
            processedAt: "2026-03-01T12:00:00.000Z",
        });
        const second = await call("POST", "/errors/report", report);
        expect(second.body).toMatchObject({ newErrorCount: 0, duplicateErrorCount: 1 });

        const listed = await call("GET", `/${agentId}/errors`);
        expect(listed.body).toMatchObject({
            success: true,
            errors: [{ errorId: "E1", occurrenceCount: 2, severity: "Critical" }],
        });

        const badSeverity = await call("POST", "/errors/report", {
            ...report,
            errors: [{ ...report.errors[0], severity: "Fatal" }],
        });
        expect(badSeverity.status).toBe(400);
    });

    test("configuration update and deactivation", async () => {
        const agentId = await register();
        const configuration = {
            dataCollectionIntervalMinutes: 15,
            enabledDataTypes: ["Users"],
            heartbeatIntervalSeconds: 60,
            enableDetailedLogging: true,
        };

        expect(await call("PUT", `/${agentId}/configuration`, configuration)).toEqual({
            status: 200,
            body: { success: true, message: "Configuration updated" },
        });
        const stored = core.store.transaction((tx) => tx.agents.findById(agentId));
        expect(JSON.parse(stored?.configuration ?? "null")).toEqual({ ...configuration, customSettings: {} });

        expect((await call("PUT", `/${agentId}/configuration`, { ...configuration, enabledDataTypes: ["Mail"] })).status).toBe(
            400
        );

        expect(await call("DELETE", `/${agentId}`)).toEqual({
            status: 200,
            body: { success: true, message: "Agent deactivated" },
        });
        expect((await call("GET", `/${agentId}`)).status).toBe(404);
        expect((await call("GET", "")).body).toEqual({ success: true, message: "0 active agents", agents: [] });
    });

    test("version, unknown routes and preflight", async () => {
        expect(await call("GET", "/version")).toEqual({
            status: 200,
            body: { success: true, message: "Fleet Trust gateway", version: "0.1.0" },
        });
        expect(await call("POST", "/nowhere/at/all")).toEqual({ status: 404, body: { success: false, message: "Not Found" } });

        const outside = await handle(new Request("http://localhost/health"));
        expect(outside.status).toBe(404);

        const preflight = await handle(new Request(`http://localhost${API_PREFIX}/register`, { method: "OPTIONS" }));
        expect(preflight.status).toBe(200);
        expect(preflight.headers.get("Access-Control-Allow-Origin")).toBe("*");
    });

    test("store failures surface as 500 with the cause", async () => {
        setup({
            kind: "memory",
            transaction: () => {
                throw new Error("disk full");
            },
            close: () => {},
        });

        expect(await call("GET", "")).toEqual({
            status: 500,
            body: { success: false, error: "StoreFailure", message: "Failed to list agents: disk full" },
        });
    });
});
