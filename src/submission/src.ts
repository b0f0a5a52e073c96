import { randomUUID } from "node:crypto";
import type { ServiceContext } from "../context";
import type { Logger } from "../logger";
import { requireActiveAgent, requireAgent } from "../registry/src";
import { CoreError, errorMessage, fail, logFailure, ok, type Result } from "../result";
import type { SubmissionRecord } from "../storage/interface";
import { HANDLERS, resolveDataType } from "./handlers";
import type { RetrySchedule, SubmissionReceipt, SubmissionSummary, SubmitDataRequest } from "./interface";

export const MAX_RETRIES = 3;
export const DEFAULT_RETRY_DELAY_SECONDS = 300;
export const DEFAULT_SUBMISSION_LIMIT = 50;

function toSummary(s: SubmissionRecord): SubmissionSummary {
    return {
        id: s.id,
        dataType: s.dataType,
        recordCount: s.recordCount,
        dataSizeBytes: s.dataSizeBytes,
        status: s.status,
        submittedAt: s.submittedAt,
        processedAt: s.processedAt,
        processedCount: s.processedCount,
        errorCount: s.errorCount,
        errorDetails: s.errorDetails,
        retryCount: s.retryCount,
        retryAfter: s.retryAfter,
        maxRetries: s.maxRetries,
    };
}

/**
 * Ingests bulk payloads from agents.
 *
 * A submission is written as Pending in its own transaction before the
 * payload is touched, so it survives a failing handler. The handler and the
 * Completed update then commit together.
 */
export class SubmissionProcessor {
    private logger: Logger;

    constructor(private ctx: ServiceContext) {
        this.logger = ctx.logger.child("Submissions");
    }

    submitData(req: SubmitDataRequest): Result<SubmissionReceipt> {
        try {
            const payload = Buffer.from(req.data, "base64");
            const submittedAt = this.ctx.clock();

            const submission = this.ctx.store.transaction((tx) => {
                requireActiveAgent(tx, req.agentId);
                const record: SubmissionRecord = {
                    id: randomUUID(),
                    agentId: req.agentId,
                    dataType: req.dataType,
                    recordCount: req.recordCount,
                    dataSizeBytes: payload.length,
                    fileHash: req.dataHash ?? null,
                    metadata: req.metadata ? JSON.stringify(req.metadata) : null,
                    status: "Pending",
                    submittedAt,
                    processedAt: null,
                    processedCount: 0,
                    errorCount: 0,
                    errorDetails: null,
                    retryCount: 0,
                    retryAfter: null,
                    maxRetries: MAX_RETRIES,
                };
                tx.submissions.insert(record);
                return record;
            });

            const dataType = resolveDataType(req.dataType);
            if (!dataType) {
                this.logger.warn(`Unknown data type: ${req.dataType}`);
            }

            try {
                const processedAt = this.ctx.clock();
                this.ctx.store.transaction((tx) => {
                    const agent = requireActiveAgent(tx, req.agentId);
                    const { rejected } = dataType
                        ? HANDLERS[dataType](payload, { tx, agent, now: processedAt, logger: this.logger })
                        : { rejected: 0 };

                    tx.submissions.update({
                        ...submission,
                        status: "Completed",
                        processedAt,
                        processedCount: Math.max(0, req.recordCount - rejected),
                        errorCount: rejected,
                    });
                    tx.agents.update({ ...agent, lastDataCollection: processedAt });
                });

                this.logger.info(
                    `Submission ${submission.id} processed for agent ${req.agentId}, type: ${req.dataType}, records: ${req.recordCount}`
                );
                return ok({ submissionId: submission.id, processedAt }, "Data submitted successfully");
            } catch (err) {
                const message = errorMessage(err);
                const retryAfter = new Date(this.ctx.clock().getTime() + DEFAULT_RETRY_DELAY_SECONDS * 1000);
                this.ctx.store.transaction((tx) => {
                    tx.submissions.update({
                        ...submission,
                        status: "Failed",
                        errorDetails: message,
                        errorCount: req.recordCount,
                        retryAfter,
                    });
                });

                this.logger.error(`Failed to process ${req.dataType} data for submission ${submission.id}: ${message}`);
                return fail("HandlerFailure", `Failed to process ${req.dataType} data: ${message}`, {
                    submissionId: submission.id,
                });
            }
        } catch (err) {
            return logFailure(this.logger, err, "StoreFailure", "Data submission failed");
        }
    }

    listSubmissions(agentId: string, limit: number = DEFAULT_SUBMISSION_LIMIT): Result<SubmissionSummary[]> {
        try {
            const submissions = this.ctx.store.transaction((tx) => {
                requireAgent(tx, agentId);
                return tx.submissions.listForAgent(agentId, limit);
            });
            return ok(submissions.map(toSummary), `${submissions.length} submissions`);
        } catch (err) {
            return logFailure(this.logger, err, "StoreFailure", "Failed to list submissions");
        }
    }

    /**
     * Records that the caller will retry a failed submission after
     * `delaySeconds`. The service never retries on its own.
     */
    scheduleRetry(submissionId: string, delaySeconds: number = DEFAULT_RETRY_DELAY_SECONDS): Result<RetrySchedule> {
        try {
            const retryAfter = new Date(this.ctx.clock().getTime() + delaySeconds * 1000);
            const retryCount = this.ctx.store.transaction((tx) => {
                const submission = tx.submissions.findById(submissionId);
                if (!submission) {
                    throw new CoreError("SubmissionNotFound", "Submission not found");
                }
                if (submission.status !== "Failed") {
                    throw new CoreError("InvalidRequest", `Only failed submissions can be retried (status: ${submission.status})`);
                }
                if (submission.retryCount >= submission.maxRetries) {
                    throw new CoreError(
                        "RetryLimitExceeded",
                        `Submission has reached its retry limit of ${submission.maxRetries}`
                    );
                }
                const next = submission.retryCount + 1;
                tx.submissions.update({ ...submission, retryCount: next, retryAfter });
                return next;
            });

            this.logger.info(`Retry ${retryCount} of submission ${submissionId} scheduled for ${retryAfter.toISOString()}`);
            return ok({ submissionId, retryCount, retryAfter }, "Retry scheduled");
        } catch (err) {
            return logFailure(this.logger, err, "StoreFailure", "Failed to schedule retry");
        }
    }
}
