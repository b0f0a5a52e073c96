import type { ErrorSeverity } from "../storage/interface";

/**
 * One runtime error as reported by an agent. `errorId` is the agent's own
 * stable identifier for the error, used to deduplicate.
 */
export interface ErrorItem {
    errorId: string;
    severity: ErrorSeverity;
    category: string;
    source: string;
    message: string;
    stackTrace?: string | null;
    additionalData?: Record<string, string> | null;
    occurredAt: Date;
    /** Occurrences since the agent last reported this error, default 1 */
    occurrenceCount?: number;
    firstOccurrence?: Date | null;
    lastOccurrence?: Date | null;
}

export interface ErrorReportRequest {
    agentId: string;
    reportedAt: Date;
    errors: ErrorItem[];
}

export interface ErrorReportReceipt {
    reportId: string;
    processedErrorCount: number;
    newErrorCount: number;
    duplicateErrorCount: number;
    processedAt: Date;
}

export interface AgentErrorSummary {
    errorId: string;
    severity: ErrorSeverity;
    category: string;
    source: string;
    message: string;
    stackTrace: string | null;
    additionalData: string | null;
    occurrenceCount: number;
    firstOccurrence: Date;
    lastOccurrence: Date;
    reportedAt: Date;
    status: string;
}
