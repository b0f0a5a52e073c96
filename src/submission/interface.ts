/**
 * Data submission contracts
 */

export const DATA_TYPES = ["Users", "Groups", "Policies", "Events", "LocalUsers", "LocalGroups"] as const;
export type DataType = (typeof DATA_TYPES)[number];

export interface SubmitDataRequest {
    agentId: string;
    dataType: string;
    recordCount: number;
    /** Base64 payload */
    data: string;
    dataHash?: string | null;
    metadata?: Record<string, string> | null;
}

export interface SubmissionReceipt {
    submissionId: string;
    processedAt: Date | null;
}

export interface SubmissionSummary {
    id: string;
    dataType: string;
    recordCount: number;
    dataSizeBytes: number;
    status: string;
    submittedAt: Date;
    processedAt: Date | null;
    processedCount: number;
    errorCount: number;
    errorDetails: string | null;
    retryCount: number;
    retryAfter: Date | null;
    maxRetries: number;
}

export interface RetrySchedule {
    submissionId: string;
    retryCount: number;
    retryAfter: Date;
}
