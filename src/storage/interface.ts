/**
 * Durable entities and the repository contract every storage engine implements.
 */

export const AGENT_TYPES = ["DomainController", "Server", "Workstation"] as const;
export type AgentType = (typeof AGENT_TYPES)[number];

/**
 * Agent entity. The natural key is `(machineName, type)`.
 */
export interface AgentRecord {
    id: string;
    name: string;
    type: AgentType;
    version: string;
    machineName: string;
    ipAddress: string | null;
    domain: string | null;
    operatingSystem: string | null;
    /** JSON document supplied by the agent at registration */
    configuration: string | null;
    isActive: boolean;
    isOnline: boolean;
    status: string | null;
    statusMessage: string | null;
    registeredAt: Date;
    lastHeartbeat: Date | null;
    lastDataCollection: Date | null;
    lastUpdated: Date | null;
}

export const CERTIFICATE_STATUSES = ["Active", "Superseded", "Revoked"] as const;
export type CertificateStatus = (typeof CERTIFICATE_STATUSES)[number];

export interface CertificateRecord {
    id: string;
    agentId: string;
    /** Uppercase hex SHA-1 of the DER encoding, globally unique */
    thumbprint: string;
    serialNumber: string;
    subject: string;
    issuer: string;
    notBefore: Date;
    notAfter: Date;
    issuedAt: Date;
    status: CertificateStatus;
    usage: string;
    revokedAt: Date | null;
    revocationReason: string | null;
    /** Base64 DER */
    certificateData: string | null;
}

export const SUBMISSION_STATUSES = ["Pending", "Completed", "Failed"] as const;
export type SubmissionStatus = (typeof SUBMISSION_STATUSES)[number];

export interface SubmissionRecord {
    id: string;
    agentId: string;
    dataType: string;
    recordCount: number;
    dataSizeBytes: number;
    fileHash: string | null;
    metadata: string | null;
    status: SubmissionStatus;
    submittedAt: Date;
    processedAt: Date | null;
    processedCount: number;
    errorCount: number;
    errorDetails: string | null;
    retryCount: number;
    retryAfter: Date | null;
    maxRetries: number;
}

/**
 * Directory user harvested by domain controller agents, unique by username.
 */
export interface DirectoryUserRecord {
    id: string;
    username: string;
    email: string | null;
    displayName: string | null;
    firstName: string | null;
    lastName: string | null;
    department: string | null;
    jobTitle: string | null;
    manager: string | null;
    isActive: boolean;
    createdAt: Date;
    lastUpdated: Date | null;
    source: string;
    sourceId: string | null;
}

export const ERROR_SEVERITIES = ["Low", "Medium", "High", "Critical"] as const;
export type ErrorSeverity = (typeof ERROR_SEVERITIES)[number];

/**
 * Deduplicated agent error, unique by `(agentId, errorId)`.
 */
export interface AgentErrorRecord {
    id: string;
    agentId: string;
    errorId: string;
    severity: ErrorSeverity;
    category: string;
    source: string;
    message: string;
    stackTrace: string | null;
    additionalData: string | null;
    occurredAt: Date;
    occurrenceCount: number;
    firstOccurrence: Date;
    lastOccurrence: Date;
    reportedAt: Date;
    status: string;
}

export const ERROR_REPORT_STATUSES = ["Processing", "Completed", "Failed"] as const;
export type ErrorReportStatus = (typeof ERROR_REPORT_STATUSES)[number];

export interface ErrorReportRecord {
    id: string;
    agentId: string;
    reportedAt: Date;
    totalErrorCount: number;
    processedErrorCount: number;
    newErrorCount: number;
    duplicateErrorCount: number;
    status: ErrorReportStatus;
    processedAt: Date | null;
}

export interface AgentRepository {
    findById(id: string): AgentRecord | null;
    findByNaturalKey(machineName: string, type: AgentType): AgentRecord | null;
    insert(agent: AgentRecord): void;
    update(agent: AgentRecord): void;
    /** Active agents ordered by name */
    listActive(): AgentRecord[];
}

export interface CertificateRepository {
    findByThumbprint(thumbprint: string): CertificateRecord | null;
    findForAgent(agentId: string, thumbprint: string): CertificateRecord | null;
    insert(certificate: CertificateRecord): void;
    update(certificate: CertificateRecord): void;
    /** Ordered by issuedAt, newest first */
    listForAgent(agentId: string): CertificateRecord[];
}

export interface SubmissionRepository {
    findById(id: string): SubmissionRecord | null;
    insert(submission: SubmissionRecord): void;
    update(submission: SubmissionRecord): void;
    /** Ordered by submittedAt, newest first */
    listForAgent(agentId: string, limit: number): SubmissionRecord[];
}

export interface DirectoryUserRepository {
    findByUsername(username: string): DirectoryUserRecord | null;
    insert(user: DirectoryUserRecord): void;
    update(user: DirectoryUserRecord): void;
    list(): DirectoryUserRecord[];
}

export interface AgentErrorRepository {
    find(agentId: string, errorId: string): AgentErrorRecord | null;
    insert(error: AgentErrorRecord): void;
    update(error: AgentErrorRecord): void;
    /** Ordered by lastOccurrence, newest first */
    listForAgent(agentId: string): AgentErrorRecord[];
}

export interface ErrorReportRepository {
    findById(id: string): ErrorReportRecord | null;
    insert(report: ErrorReportRecord): void;
    update(report: ErrorReportRecord): void;
    listForAgent(agentId: string): ErrorReportRecord[];
}

export interface StoreTransaction {
    agents: AgentRepository;
    certificates: CertificateRepository;
    submissions: SubmissionRepository;
    users: DirectoryUserRepository;
    errors: AgentErrorRepository;
    errorReports: ErrorReportRepository;
}

/**
 * A durable store. `transaction` runs `work` synchronously and atomically:
 * either every write made through `tx` is kept, or, when `work` throws,
 * none is. `work` must not return a promise.
 */
export interface Store {
    readonly kind: "memory" | "sqlite";
    transaction<T>(work: (tx: StoreTransaction) => T): T;
    close(): void;
}
