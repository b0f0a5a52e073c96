import { describe, expect, test, beforeEach } from "vitest";
import type { ServiceContext } from "../context";
import { ManualClock, mockContext, registrationFor } from "../mock";
import { AgentRegistry } from "../registry/src";
import type { Store, StoreTransaction } from "../storage/interface";
import { MemoryStore } from "../storage/memory/src";
import type { ErrorItem } from "./interface";
import { ErrorAggregator } from "./src";

/**
 * Fails every insert of one particular error id, leaving the rest of the
 * store untouched.
 */
class PoisonedStore implements Store {
    readonly kind = "memory";

    constructor(private inner: Store, private poisonedErrorId: string) {}

    transaction<T>(work: (tx: StoreTransaction) => T): T {
        return this.inner.transaction((tx) =>
            work({
                ...tx,
                errors: {
                    find: (agentId, errorId) => tx.errors.find(agentId, errorId),
                    insert: (error) => {
                        if (error.errorId === this.poisonedErrorId) throw new Error("disk full");
                        tx.errors.insert(error);
                    },
                    update: (error) => tx.errors.update(error),
                    listForAgent: (agentId) => tx.errors.listForAgent(agentId),
                },
            })
        );
    }

    close() {
        this.inner.close();
    }
}

function item(errorId: string, overrides: Partial<ErrorItem> = {}): ErrorItem {
    return {
        errorId,
        severity: "High",
        category: "Collection",
        source: "UserCollector",
        message: `${errorId} failed`,
        occurredAt: new Date("2026-03-01T11:00:00.000Z"),
        ...overrides,
    };
}

const reportedAt = new Date("2026-03-01T11:59:00.000Z");

describe("ErrorAggregator", () => {
    let clock: ManualClock;
    let ctx: ServiceContext;
    let registry: AgentRegistry;
    let aggregator: ErrorAggregator;
    let agentId: string;

    function setup(store?: Store) {
        clock = new ManualClock("2026-03-01T12:00:00.000Z");
        ctx = mockContext({ clock, store });
        registry = new AgentRegistry(ctx);
        aggregator = new ErrorAggregator(ctx);

        const registered = registry.register(registrationFor());
        if (!registered.success) throw new Error(registered.message);
        agentId = registered.value.agentId;
    }

    function envelope(reportId: string) {
        return ctx.store.transaction((tx) => tx.errorReports.findById(reportId));
    }

    beforeEach(() => setup());

    test("records new errors and completes the envelope", () => {
        const result = aggregator.reportErrors({ agentId, reportedAt, errors: [item("E1"), item("E2")] });

        expect(result.success).toBe(true);
        if (!result.success) return;
        expect(result.message).toBe("Errors reported successfully");
        expect(result.value.processedErrorCount).toBe(2);
        expect(result.value.newErrorCount).toBe(2);
        expect(result.value.duplicateErrorCount).toBe(0);
        expect(result.value.processedAt.toISOString()).toBe("2026-03-01T12:00:00.000Z");

        const report = envelope(result.value.reportId);
        expect(report?.status).toBe("Completed");
        expect(report?.totalErrorCount).toBe(2);
        expect(report?.processedAt?.toISOString()).toBe("2026-03-01T12:00:00.000Z");
        expect(report?.reportedAt.toISOString()).toBe("2026-03-01T11:59:00.000Z");

        const stored = ctx.store.transaction((tx) => tx.errors.find(agentId, "E1"));
        expect(stored?.status).toBe("New");
        expect(stored?.occurrenceCount).toBe(1);
        expect(stored?.firstOccurrence.toISOString()).toBe("2026-03-01T11:00:00.000Z");
        expect(stored?.lastOccurrence.toISOString()).toBe("2026-03-01T11:00:00.000Z");
    });

    test("a known error id accumulates occurrences", () => {
        aggregator.reportErrors({ agentId, reportedAt, errors: [item("E1")] });

        clock.advance(60 * 60 * 1000);
        const result = aggregator.reportErrors({
            agentId,
            reportedAt: new Date("2026-03-01T12:59:00.000Z"),
            errors: [item("E1", { occurrenceCount: 3, lastOccurrence: new Date("2026-03-01T12:30:00.000Z") })],
        });

        expect(result.success && result.value.newErrorCount).toBe(0);
        expect(result.success && result.value.duplicateErrorCount).toBe(1);

        const stored = ctx.store.transaction((tx) => tx.errors.find(agentId, "E1"));
        expect(stored?.occurrenceCount).toBe(4);
        expect(stored?.firstOccurrence.toISOString()).toBe("2026-03-01T11:00:00.000Z");
        expect(stored?.lastOccurrence.toISOString()).toBe("2026-03-01T12:30:00.000Z");
        expect(stored?.reportedAt.toISOString()).toBe("2026-03-01T12:59:00.000Z");
    });

    test("a late report does not move lastOccurrence backwards", () => {
        aggregator.reportErrors({
            agentId,
            reportedAt,
            errors: [item("E1", { lastOccurrence: new Date("2026-03-01T11:30:00.000Z") })],
        });
        aggregator.reportErrors({ agentId, reportedAt, errors: [item("E1")] });

        const stored = ctx.store.transaction((tx) => tx.errors.find(agentId, "E1"));
        expect(stored?.occurrenceCount).toBe(2);
        expect(stored?.lastOccurrence.toISOString()).toBe("2026-03-01T11:30:00.000Z");
    });

    test("the same id twice in one batch counts once as new and once as duplicate", () => {
        const result = aggregator.reportErrors({ agentId, reportedAt, errors: [item("E1"), item("E1")] });

        expect(result.success && result.value.newErrorCount).toBe(1);
        expect(result.success && result.value.duplicateErrorCount).toBe(1);
        const listed = aggregator.listErrors(agentId);
        expect(listed.success && listed.value.map((e) => [e.errorId, e.occurrenceCount])).toEqual([["E1", 2]]);
    });

    test("an empty batch completes with zero counts", () => {
        const result = aggregator.reportErrors({ agentId, reportedAt, errors: [] });

        expect(result.success).toBe(true);
        if (!result.success) return;
        expect(result.value.processedErrorCount).toBe(0);
        expect(envelope(result.value.reportId)?.status).toBe("Completed");
    });

    test("unknown and deactivated agents are rejected without an envelope", () => {
        expect(aggregator.reportErrors({ agentId: "missing", reportedAt, errors: [item("E1")] })).toEqual({
            success: false,
            error: "AgentNotFound",
            message: "Agent not found",
        });

        registry.deactivate(agentId);
        const result = aggregator.reportErrors({ agentId, reportedAt, errors: [item("E1")] });
        expect(result.success).toBe(false);
        expect(!result.success && result.error).toBe("AgentNotFound");
        expect(ctx.store.transaction((tx) => tx.errorReports.listForAgent(agentId))).toEqual([]);
    });

    test("a failing item keeps the others and marks the envelope failed", () => {
        setup(new PoisonedStore(new MemoryStore(), "E2"));

        const result = aggregator.reportErrors({ agentId, reportedAt, errors: [item("E1"), item("E2"), item("E3")] });

        expect(result.success).toBe(false);
        if (result.success) return;
        expect(result.error).toBe("StoreFailure");
        expect(result.message).toBe("1 of 3 errors could not be recorded");
        expect(result.details).toMatchObject({ processedErrorCount: 2, newErrorCount: 2, duplicateErrorCount: 0 });

        const reportId = result.details?.reportId;
        expect(typeof reportId).toBe("string");
        const report = typeof reportId === "string" ? envelope(reportId) : null;
        expect(report?.status).toBe("Failed");
        expect(report?.processedErrorCount).toBe(2);
        expect(report?.totalErrorCount).toBe(3);

        const listed = aggregator.listErrors(agentId);
        expect(listed.success && listed.value.map((e) => e.errorId).sort()).toEqual(["E1", "E3"]);
    });

    test("listErrors orders by last occurrence and keeps additional data as JSON", () => {
        aggregator.reportErrors({
            agentId,
            reportedAt,
            errors: [
                item("OLD", { occurredAt: new Date("2026-03-01T09:00:00.000Z") }),
                item("NEW", {
                    occurredAt: new Date("2026-03-01T11:45:00.000Z"),
                    additionalData: { domain: "corp.example" },
                    stackTrace: "at collect()",
                }),
            ],
        });

        const result = aggregator.listErrors(agentId);
        expect(result.success).toBe(true);
        if (!result.success) return;
        expect(result.value.map((e) => e.errorId)).toEqual(["NEW", "OLD"]);
        expect(result.value[0]?.additionalData).toBe('{"domain":"corp.example"}');
        expect(result.value[0]?.stackTrace).toBe("at collect()");
        expect(result.value[1]?.additionalData).toBeNull();
    });

    test("errors of a deactivated agent stay listable", () => {
        aggregator.reportErrors({ agentId, reportedAt, errors: [item("E1")] });
        registry.deactivate(agentId);

        const result = aggregator.listErrors(agentId);
        expect(result.success && result.value).toHaveLength(1);
        expect(aggregator.listErrors("missing")).toEqual({
            success: false,
            error: "AgentNotFound",
            message: "Agent not found",
        });
    });
});
