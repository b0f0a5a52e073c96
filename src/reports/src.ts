import { randomUUID } from "node:crypto";
import type { ServiceContext } from "../context";
import type { Logger } from "../logger";
import { requireActiveAgent, requireAgent } from "../registry/src";
import { errorMessage, fail, logFailure, ok, type Result } from "../result";
import type { AgentErrorRecord, ErrorReportRecord, StoreTransaction } from "../storage/interface";
import type { AgentErrorSummary, ErrorItem, ErrorReportReceipt, ErrorReportRequest } from "./interface";

const later = (a: Date, b: Date) => (b > a ? b : a);

function toSummary(e: AgentErrorRecord): AgentErrorSummary {
    return {
        errorId: e.errorId,
        severity: e.severity,
        category: e.category,
        source: e.source,
        message: e.message,
        stackTrace: e.stackTrace,
        additionalData: e.additionalData,
        occurrenceCount: e.occurrenceCount,
        firstOccurrence: e.firstOccurrence,
        lastOccurrence: e.lastOccurrence,
        reportedAt: e.reportedAt,
        status: e.status,
    };
}

function loadReport(tx: StoreTransaction, reportId: string): ErrorReportRecord {
    const report = tx.errorReports.findById(reportId);
    if (!report) {
        throw new Error(`Error report ${reportId} disappeared`);
    }
    return report;
}

/**
 * Deduplicated ingestion of agent runtime errors.
 *
 * A batch is best-effort: every item commits on its own together with the
 * envelope counters, so a failing item leaves earlier ones in place and the
 * envelope always matches the rows written.
 */
export class ErrorAggregator {
    private logger: Logger;

    constructor(private ctx: ServiceContext) {
        this.logger = ctx.logger.child("Errors");
    }

    reportErrors(req: ErrorReportRequest): Result<ErrorReportReceipt> {
        try {
            const envelope = this.ctx.store.transaction((tx) => {
                requireActiveAgent(tx, req.agentId);
                const report: ErrorReportRecord = {
                    id: randomUUID(),
                    agentId: req.agentId,
                    reportedAt: req.reportedAt,
                    totalErrorCount: req.errors.length,
                    processedErrorCount: 0,
                    newErrorCount: 0,
                    duplicateErrorCount: 0,
                    status: "Processing",
                    processedAt: null,
                };
                tx.errorReports.insert(report);
                return report;
            });

            let failed = 0;
            for (const item of req.errors) {
                try {
                    this.ctx.store.transaction((tx) => {
                        const isNew = this.record(tx, req, item);
                        const report = loadReport(tx, envelope.id);
                        tx.errorReports.update({
                            ...report,
                            processedErrorCount: report.processedErrorCount + 1,
                            newErrorCount: report.newErrorCount + (isNew ? 1 : 0),
                            duplicateErrorCount: report.duplicateErrorCount + (isNew ? 0 : 1),
                        });
                    });
                } catch (err) {
                    failed++;
                    this.logger.error(`Failed to record error ${item.errorId} for agent ${req.agentId}: ${errorMessage(err)}`);
                }
            }

            const processedAt = this.ctx.clock();
            const report = this.ctx.store.transaction((tx) => {
                const current = loadReport(tx, envelope.id);
                const finished: ErrorReportRecord = {
                    ...current,
                    status: failed > 0 ? "Failed" : "Completed",
                    processedAt,
                };
                tx.errorReports.update(finished);
                return finished;
            });

            const receipt: ErrorReportReceipt = {
                reportId: report.id,
                processedErrorCount: report.processedErrorCount,
                newErrorCount: report.newErrorCount,
                duplicateErrorCount: report.duplicateErrorCount,
                processedAt,
            };

            if (failed > 0) {
                return fail("StoreFailure", `${failed} of ${req.errors.length} errors could not be recorded`, {
                    reportId: receipt.reportId,
                    processedErrorCount: receipt.processedErrorCount,
                    newErrorCount: receipt.newErrorCount,
                    duplicateErrorCount: receipt.duplicateErrorCount,
                });
            }

            this.logger.info(
                `Error report ${report.id} from agent ${req.agentId}: ${report.newErrorCount} new, ${report.duplicateErrorCount} duplicate`
            );
            return ok(receipt, "Errors reported successfully");
        } catch (err) {
            return logFailure(this.logger, err, "StoreFailure", "Error report failed");
        }
    }

    /** Returns true when the error was not known for this agent yet */
    private record(tx: StoreTransaction, req: ErrorReportRequest, item: ErrorItem): boolean {
        const occurrences = item.occurrenceCount ?? 1;
        const lastOccurrence = item.lastOccurrence ?? item.occurredAt;

        const existing = tx.errors.find(req.agentId, item.errorId);
        if (existing) {
            tx.errors.update({
                ...existing,
                occurrenceCount: existing.occurrenceCount + occurrences,
                lastOccurrence: later(existing.lastOccurrence, lastOccurrence),
                reportedAt: req.reportedAt,
            });
            return false;
        }

        tx.errors.insert({
            id: randomUUID(),
            agentId: req.agentId,
            errorId: item.errorId,
            severity: item.severity,
            category: item.category,
            source: item.source,
            message: item.message,
            stackTrace: item.stackTrace ?? null,
            additionalData: item.additionalData ? JSON.stringify(item.additionalData) : null,
            occurredAt: item.occurredAt,
            occurrenceCount: occurrences,
            firstOccurrence: item.firstOccurrence ?? item.occurredAt,
            lastOccurrence,
            reportedAt: req.reportedAt,
            status: "New",
        });
        return true;
    }

    listErrors(agentId: string): Result<AgentErrorSummary[]> {
        try {
            const errors = this.ctx.store.transaction((tx) => {
                requireAgent(tx, agentId);
                return tx.errors.listForAgent(agentId);
            });
            return ok(errors.map(toSummary), `${errors.length} errors`);
        } catch (err) {
            return logFailure(this.logger, err, "StoreFailure", "Failed to list errors");
        }
    }
}
