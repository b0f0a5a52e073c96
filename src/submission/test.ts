import { describe, expect, test, beforeEach } from "vitest";
import { ManualClock, mockContext, registrationFor } from "../mock";
import type { ServiceContext } from "../context";
import { AgentRegistry } from "../registry/src";
import { resolveDataType } from "./handlers";
import { SubmissionProcessor } from "./src";

const encode = (value: unknown) => Buffer.from(JSON.stringify(value), "utf-8").toString("base64");

const users = [
    { username: "alice", email: "alice@corp.example", displayName: "Alice A", department: "IT", objectSid: "S-1-5-21-1" },
    { username: "bob", email: "bob@corp.example", displayName: "Bob B", department: "Sales", objectSid: "S-1-5-21-2" },
    { username: "carol", email: "carol@corp.example", displayName: "Carol C", isActive: false, objectSid: "S-1-5-21-3" },
];

describe("SubmissionProcessor", () => {
    let clock: ManualClock;
    let ctx: ServiceContext;
    let registry: AgentRegistry;
    let processor: SubmissionProcessor;
    let agentId: string;

    beforeEach(() => {
        clock = new ManualClock("2026-03-01T12:00:00.000Z");
        ctx = mockContext({ clock });
        registry = new AgentRegistry(ctx);
        processor = new SubmissionProcessor(ctx);

        const registered = registry.register(registrationFor());
        if (!registered.success) throw new Error(registered.message);
        agentId = registered.value.agentId;
    });

    function submission(id: string) {
        return ctx.store.transaction((tx) => tx.submissions.findById(id));
    }

    function directory() {
        return ctx.store.transaction((tx) => tx.users.list());
    }

    test("ingests three new users and completes", () => {
        const data = encode(users);
        const result = processor.submitData({ agentId, dataType: "Users", recordCount: 3, data, dataHash: "abc123" });

        expect(result.success).toBe(true);
        if (!result.success) return;
        expect(result.message).toBe("Data submitted successfully");

        const row = submission(result.value.submissionId);
        expect(row?.status).toBe("Completed");
        expect(row?.processedCount).toBe(3);
        expect(row?.errorCount).toBe(0);
        expect(row?.dataSizeBytes).toBe(Buffer.from(data, "base64").length);
        expect(row?.fileHash).toBe("abc123");

        const stored = directory();
        expect(stored.map((u) => u.username)).toEqual(["alice", "bob", "carol"]);
        expect(stored[0]?.source).toBe("DomainController");
        expect(stored[0]?.sourceId).toBe("S-1-5-21-1");
        expect(stored[2]?.isActive).toBe(false);

        const agent = ctx.store.transaction((tx) => tx.agents.findById(agentId));
        expect(agent?.lastDataCollection?.toISOString()).toBe("2026-03-01T12:00:00.000Z");
    });

    test("resubmitting the same users updates them in place", () => {
        processor.submitData({ agentId, dataType: "Users", recordCount: 3, data: encode(users) });
        const before = directory();
        clock.advance(60_000);

        const changed = users.map((u) => ({ ...u, department: "Platform" }));
        const result = processor.submitData({ agentId, dataType: "users", recordCount: 3, data: encode(changed) });

        expect(result.success).toBe(true);
        const after = directory();
        expect(after).toHaveLength(3);
        expect(after.map((u) => u.id)).toEqual(before.map((u) => u.id));
        expect(after.map((u) => u.department)).toEqual(["Platform", "Platform", "Platform"]);
        expect(after[0]?.lastUpdated?.toISOString()).toBe("2026-03-01T12:01:00.000Z");
        expect(after[0]?.createdAt.toISOString()).toBe("2026-03-01T12:00:00.000Z");
    });

    test("records without a username are skipped and counted", () => {
        const data = encode([{ username: "dave" }, { email: "nobody@corp.example" }, { username: "" }]);

        const result = processor.submitData({ agentId, dataType: "Users", recordCount: 3, data });

        expect(result.success).toBe(true);
        if (!result.success) return;
        const row = submission(result.value.submissionId);
        expect(row?.status).toBe("Completed");
        expect(row?.processedCount).toBe(1);
        expect(row?.errorCount).toBe(2);
        expect(directory().map((u) => u.username)).toEqual(["dave"]);
    });

    test("a payload that is not JSON fails the submission but keeps the row", () => {
        const data = Buffer.from("not json", "utf-8").toString("base64");

        const result = processor.submitData({ agentId, dataType: "Users", recordCount: 4, data });

        expect(result.success).toBe(false);
        if (result.success) return;
        expect(result.error).toBe("HandlerFailure");
        expect(result.message).toMatch(/^Failed to process Users data: /);
        const submissionId = result.details?.submissionId;
        expect(typeof submissionId).toBe("string");

        const row = submission(String(submissionId));
        expect(row?.status).toBe("Failed");
        expect(row?.errorCount).toBe(4);
        expect(row?.processedAt).toBeNull();
        expect(row?.retryAfter?.toISOString()).toBe("2026-03-01T12:05:00.000Z");
        expect(directory()).toHaveLength(0);

        const agent = ctx.store.transaction((tx) => tx.agents.findById(agentId));
        expect(agent?.lastDataCollection).toBeNull();
    });

    test("a failing record rolls back the users written before it", () => {
        const data = encode({ username: "alice" });

        const result = processor.submitData({ agentId, dataType: "Users", recordCount: 1, data });

        expect(!result.success && result.message).toBe("Failed to process Users data: Users payload must be a JSON array");
        expect(directory()).toHaveLength(0);
    });

    test("reserved and unknown types complete without handler work", () => {
        const groups = processor.submitData({ agentId, dataType: "Groups", recordCount: 2, data: encode([]) });
        const unknown = processor.submitData({ agentId, dataType: "Printers", recordCount: 5, data: encode([]) });

        for (const result of [groups, unknown]) {
            expect(result.success).toBe(true);
            if (!result.success) continue;
            expect(submission(result.value.submissionId)?.status).toBe("Completed");
        }
        expect(unknown.success && submission(unknown.value.submissionId)?.processedCount).toBe(5);
        expect(directory()).toHaveLength(0);
    });

    test("rejects unknown and deactivated agents", () => {
        const unknown = processor.submitData({ agentId: "missing", dataType: "Users", recordCount: 0, data: "" });
        expect(unknown).toEqual({ success: false, error: "AgentNotFound", message: "Agent not found" });

        registry.deactivate(agentId);
        const inactive = processor.submitData({ agentId, dataType: "Users", recordCount: 0, data: "" });
        expect(!inactive.success && inactive.error).toBe("AgentNotFound");
    });

    test("listSubmissions returns newest first up to the limit", () => {
        for (let i = 0; i < 3; i++) {
            processor.submitData({ agentId, dataType: "Events", recordCount: i, data: encode([]) });
            clock.advance(1000);
        }

        const listed = processor.listSubmissions(agentId, 2);
        expect(listed.success && listed.value.map((s) => s.recordCount)).toEqual([2, 1]);
    });

    describe("scheduleRetry", () => {
        function failedSubmission() {
            const result = processor.submitData({ agentId, dataType: "Users", recordCount: 1, data: encode("oops") });
            if (result.success) throw new Error("expected a failure");
            return String(result.details?.submissionId);
        }

        test("counts retries up to the limit", () => {
            const id = failedSubmission();

            for (let i = 1; i <= 3; i++) {
                const result = processor.scheduleRetry(id, 60);
                expect(result.success && result.value.retryCount).toBe(i);
            }
            expect(submission(id)?.retryAfter?.toISOString()).toBe("2026-03-01T12:01:00.000Z");

            const exceeded = processor.scheduleRetry(id, 60);
            expect(exceeded).toEqual({
                success: false,
                error: "RetryLimitExceeded",
                message: "Submission has reached its retry limit of 3",
            });
            expect(submission(id)?.retryCount).toBe(3);
        });

        test("only failed submissions can be retried", () => {
            const ok = processor.submitData({ agentId, dataType: "Events", recordCount: 0, data: encode([]) });
            if (!ok.success) throw new Error(ok.message);

            const result = processor.scheduleRetry(ok.value.submissionId);
            expect(result).toEqual({
                success: false,
                error: "InvalidRequest",
                message: "Only failed submissions can be retried (status: Completed)",
            });
        });

        test("unknown submission", () => {
            const result = processor.scheduleRetry("missing");
            expect(!result.success && result.error).toBe("SubmissionNotFound");
        });
    });
});

test("resolveDataType matches case-insensitively", () => {
    expect(resolveDataType("LOCALUSERS")).toBe("LocalUsers");
    expect(resolveDataType("users")).toBe("Users");
    expect(resolveDataType("Printers")).toBeNull();
});
