import Database from "better-sqlite3";
import {
    AGENT_TYPES,
    CERTIFICATE_STATUSES,
    ERROR_REPORT_STATUSES,
    ERROR_SEVERITIES,
    SUBMISSION_STATUSES,
    type AgentErrorRecord,
    type AgentErrorRepository,
    type AgentRecord,
    type AgentRepository,
    type AgentType,
    type CertificateRecord,
    type CertificateRepository,
    type DirectoryUserRecord,
    type DirectoryUserRepository,
    type ErrorReportRecord,
    type ErrorReportRepository,
    type Store,
    type StoreTransaction,
    type SubmissionRecord,
    type SubmissionRepository,
} from "../interface";

const SCHEMA = `
    CREATE TABLE IF NOT EXISTS agents (
        id TEXT PRIMARY KEY,
        name TEXT NOT NULL,
        type TEXT NOT NULL,
        version TEXT NOT NULL,
        machine_name TEXT NOT NULL,
        ip_address TEXT,
        domain TEXT,
        operating_system TEXT,
        configuration TEXT,
        is_active INTEGER NOT NULL,
        is_online INTEGER NOT NULL,
        status TEXT,
        status_message TEXT,
        registered_at INTEGER NOT NULL,
        last_heartbeat INTEGER,
        last_data_collection INTEGER,
        last_updated INTEGER,
        UNIQUE (machine_name, type)
    );

    CREATE TABLE IF NOT EXISTS agent_certificates (
        id TEXT PRIMARY KEY,
        agent_id TEXT NOT NULL REFERENCES agents(id),
        thumbprint TEXT NOT NULL UNIQUE,
        serial_number TEXT NOT NULL,
        subject TEXT NOT NULL,
        issuer TEXT NOT NULL,
        not_before INTEGER NOT NULL,
        not_after INTEGER NOT NULL,
        issued_at INTEGER NOT NULL,
        status TEXT NOT NULL,
        usage TEXT NOT NULL,
        revoked_at INTEGER,
        revocation_reason TEXT,
        certificate_data TEXT
    );
    CREATE INDEX IF NOT EXISTS ix_agent_certificates_agent_status ON agent_certificates (agent_id, status);
    CREATE INDEX IF NOT EXISTS ix_agent_certificates_not_after ON agent_certificates (not_after);

    CREATE TABLE IF NOT EXISTS agent_data_submissions (
        id TEXT PRIMARY KEY,
        agent_id TEXT NOT NULL REFERENCES agents(id),
        data_type TEXT NOT NULL,
        record_count INTEGER NOT NULL,
        data_size_bytes INTEGER NOT NULL,
        file_hash TEXT,
        metadata TEXT,
        status TEXT NOT NULL,
        submitted_at INTEGER NOT NULL,
        processed_at INTEGER,
        processed_count INTEGER NOT NULL,
        error_count INTEGER NOT NULL,
        error_details TEXT,
        retry_count INTEGER NOT NULL,
        retry_after INTEGER,
        max_retries INTEGER NOT NULL
    );
    CREATE INDEX IF NOT EXISTS ix_agent_data_submissions_agent ON agent_data_submissions (agent_id, submitted_at);

    CREATE TABLE IF NOT EXISTS directory_users (
        id TEXT PRIMARY KEY,
        username TEXT NOT NULL UNIQUE,
        email TEXT,
        display_name TEXT,
        first_name TEXT,
        last_name TEXT,
        department TEXT,
        job_title TEXT,
        manager TEXT,
        is_active INTEGER NOT NULL,
        created_at INTEGER NOT NULL,
        last_updated INTEGER,
        source TEXT NOT NULL,
        source_id TEXT
    );

    CREATE TABLE IF NOT EXISTS agent_errors (
        id TEXT PRIMARY KEY,
        agent_id TEXT NOT NULL REFERENCES agents(id),
        error_id TEXT NOT NULL,
        severity TEXT NOT NULL,
        category TEXT NOT NULL,
        source TEXT NOT NULL,
        message TEXT NOT NULL,
        stack_trace TEXT,
        additional_data TEXT,
        occurred_at INTEGER NOT NULL,
        occurrence_count INTEGER NOT NULL,
        first_occurrence INTEGER NOT NULL,
        last_occurrence INTEGER NOT NULL,
        reported_at INTEGER NOT NULL,
        status TEXT NOT NULL,
        UNIQUE (agent_id, error_id)
    );

    CREATE TABLE IF NOT EXISTS agent_error_reports (
        id TEXT PRIMARY KEY,
        agent_id TEXT NOT NULL REFERENCES agents(id),
        reported_at INTEGER NOT NULL,
        total_error_count INTEGER NOT NULL,
        processed_error_count INTEGER NOT NULL,
        new_error_count INTEGER NOT NULL,
        duplicate_error_count INTEGER NOT NULL,
        status TEXT NOT NULL,
        processed_at INTEGER
    );
`;

// Timestamps are stored as epoch milliseconds, booleans as 0/1.
const ms = (date: Date): number => date.getTime();
const msOrNull = (date: Date | null): number | null => (date ? date.getTime() : null);
const dateOrNull = (value: number | null): Date | null => (value === null ? null : new Date(value));
const flag = (value: boolean): number => (value ? 1 : 0);

function oneOf<T extends string>(values: readonly T[], value: string, column: string): T {
    const match = values.find((v) => v === value);
    if (match === undefined) {
        throw new Error(`Unexpected value "${value}" in ${column}`);
    }
    return match;
}

function requireChange(changes: number, table: string, id: string): void {
    if (changes === 0) {
        throw new Error(`${table} row ${id} does not exist`);
    }
}

interface AgentRow {
    id: string;
    name: string;
    type: string;
    version: string;
    machine_name: string;
    ip_address: string | null;
    domain: string | null;
    operating_system: string | null;
    configuration: string | null;
    is_active: number;
    is_online: number;
    status: string | null;
    status_message: string | null;
    registered_at: number;
    last_heartbeat: number | null;
    last_data_collection: number | null;
    last_updated: number | null;
}

const agentToRow = (a: AgentRecord): AgentRow => ({
    id: a.id,
    name: a.name,
    type: a.type,
    version: a.version,
    machine_name: a.machineName,
    ip_address: a.ipAddress,
    domain: a.domain,
    operating_system: a.operatingSystem,
    configuration: a.configuration,
    is_active: flag(a.isActive),
    is_online: flag(a.isOnline),
    status: a.status,
    status_message: a.statusMessage,
    registered_at: ms(a.registeredAt),
    last_heartbeat: msOrNull(a.lastHeartbeat),
    last_data_collection: msOrNull(a.lastDataCollection),
    last_updated: msOrNull(a.lastUpdated),
});

const agentFromRow = (row: AgentRow): AgentRecord => ({
    id: row.id,
    name: row.name,
    type: oneOf(AGENT_TYPES, row.type, "agents.type"),
    version: row.version,
    machineName: row.machine_name,
    ipAddress: row.ip_address,
    domain: row.domain,
    operatingSystem: row.operating_system,
    configuration: row.configuration,
    isActive: row.is_active === 1,
    isOnline: row.is_online === 1,
    status: row.status,
    statusMessage: row.status_message,
    registeredAt: new Date(row.registered_at),
    lastHeartbeat: dateOrNull(row.last_heartbeat),
    lastDataCollection: dateOrNull(row.last_data_collection),
    lastUpdated: dateOrNull(row.last_updated),
});

class SqliteAgentRepository implements AgentRepository {
    private byId;
    private byNaturalKey;
    private insertStmt;
    private updateStmt;
    private activeStmt;

    constructor(db: Database.Database) {
        this.byId = db.prepare<[string], AgentRow>("SELECT * FROM agents WHERE id = ?");
        this.byNaturalKey = db.prepare<[string, string], AgentRow>(
            "SELECT * FROM agents WHERE machine_name = ? AND type = ?"
        );
        this.insertStmt = db.prepare<AgentRow>(`
            INSERT INTO agents (id, name, type, version, machine_name, ip_address, domain, operating_system,
                configuration, is_active, is_online, status, status_message, registered_at, last_heartbeat,
                last_data_collection, last_updated)
            VALUES (@id, @name, @type, @version, @machine_name, @ip_address, @domain, @operating_system,
                @configuration, @is_active, @is_online, @status, @status_message, @registered_at, @last_heartbeat,
                @last_data_collection, @last_updated)
        `);
        this.updateStmt = db.prepare<AgentRow>(`
            UPDATE agents SET name = @name, type = @type, version = @version, machine_name = @machine_name,
                ip_address = @ip_address, domain = @domain, operating_system = @operating_system,
                configuration = @configuration, is_active = @is_active, is_online = @is_online, status = @status,
                status_message = @status_message, registered_at = @registered_at, last_heartbeat = @last_heartbeat,
                last_data_collection = @last_data_collection, last_updated = @last_updated
            WHERE id = @id
        `);
        this.activeStmt = db.prepare<[], AgentRow>("SELECT * FROM agents WHERE is_active = 1 ORDER BY name");
    }

    findById(id: string) {
        const row = this.byId.get(id);
        return row ? agentFromRow(row) : null;
    }

    findByNaturalKey(machineName: string, type: AgentType) {
        const row = this.byNaturalKey.get(machineName, type);
        return row ? agentFromRow(row) : null;
    }

    insert(agent: AgentRecord) {
        this.insertStmt.run(agentToRow(agent));
    }

    update(agent: AgentRecord) {
        requireChange(this.updateStmt.run(agentToRow(agent)).changes, "agents", agent.id);
    }

    listActive() {
        return this.activeStmt.all().map(agentFromRow);
    }
}

interface CertificateRow {
    id: string;
    agent_id: string;
    thumbprint: string;
    serial_number: string;
    subject: string;
    issuer: string;
    not_before: number;
    not_after: number;
    issued_at: number;
    status: string;
    usage: string;
    revoked_at: number | null;
    revocation_reason: string | null;
    certificate_data: string | null;
}

const certificateToRow = (c: CertificateRecord): CertificateRow => ({
    id: c.id,
    agent_id: c.agentId,
    thumbprint: c.thumbprint,
    serial_number: c.serialNumber,
    subject: c.subject,
    issuer: c.issuer,
    not_before: ms(c.notBefore),
    not_after: ms(c.notAfter),
    issued_at: ms(c.issuedAt),
    status: c.status,
    usage: c.usage,
    revoked_at: msOrNull(c.revokedAt),
    revocation_reason: c.revocationReason,
    certificate_data: c.certificateData,
});

const certificateFromRow = (row: CertificateRow): CertificateRecord => ({
    id: row.id,
    agentId: row.agent_id,
    thumbprint: row.thumbprint,
    serialNumber: row.serial_number,
    subject: row.subject,
    issuer: row.issuer,
    notBefore: new Date(row.not_before),
    notAfter: new Date(row.not_after),
    issuedAt: new Date(row.issued_at),
    status: oneOf(CERTIFICATE_STATUSES, row.status, "agent_certificates.status"),
    usage: row.usage,
    revokedAt: dateOrNull(row.revoked_at),
    revocationReason: row.revocation_reason,
    certificateData: row.certificate_data,
});

class SqliteCertificateRepository implements CertificateRepository {
    private byThumbprint;
    private byAgentAndThumbprint;
    private insertStmt;
    private updateStmt;
    private forAgent;

    constructor(db: Database.Database) {
        this.byThumbprint = db.prepare<[string], CertificateRow>(
            "SELECT * FROM agent_certificates WHERE thumbprint = ?"
        );
        this.byAgentAndThumbprint = db.prepare<[string, string], CertificateRow>(
            "SELECT * FROM agent_certificates WHERE agent_id = ? AND thumbprint = ?"
        );
        this.insertStmt = db.prepare<CertificateRow>(`
            INSERT INTO agent_certificates (id, agent_id, thumbprint, serial_number, subject, issuer, not_before,
                not_after, issued_at, status, usage, revoked_at, revocation_reason, certificate_data)
            VALUES (@id, @agent_id, @thumbprint, @serial_number, @subject, @issuer, @not_before,
                @not_after, @issued_at, @status, @usage, @revoked_at, @revocation_reason, @certificate_data)
        `);
        this.updateStmt = db.prepare<CertificateRow>(`
            UPDATE agent_certificates SET agent_id = @agent_id, thumbprint = @thumbprint,
                serial_number = @serial_number, subject = @subject, issuer = @issuer, not_before = @not_before,
                not_after = @not_after, issued_at = @issued_at, status = @status, usage = @usage,
                revoked_at = @revoked_at, revocation_reason = @revocation_reason,
                certificate_data = @certificate_data
            WHERE id = @id
        `);
        this.forAgent = db.prepare<[string], CertificateRow>(
            "SELECT * FROM agent_certificates WHERE agent_id = ? ORDER BY issued_at DESC, rowid DESC"
        );
    }

    findByThumbprint(thumbprint: string) {
        const row = this.byThumbprint.get(thumbprint);
        return row ? certificateFromRow(row) : null;
    }

    findForAgent(agentId: string, thumbprint: string) {
        const row = this.byAgentAndThumbprint.get(agentId, thumbprint);
        return row ? certificateFromRow(row) : null;
    }

    insert(certificate: CertificateRecord) {
        this.insertStmt.run(certificateToRow(certificate));
    }

    update(certificate: CertificateRecord) {
        requireChange(this.updateStmt.run(certificateToRow(certificate)).changes, "agent_certificates", certificate.id);
    }

    listForAgent(agentId: string) {
        return this.forAgent.all(agentId).map(certificateFromRow);
    }
}

interface SubmissionRow {
    id: string;
    agent_id: string;
    data_type: string;
    record_count: number;
    data_size_bytes: number;
    file_hash: string | null;
    metadata: string | null;
    status: string;
    submitted_at: number;
    processed_at: number | null;
    processed_count: number;
    error_count: number;
    error_details: string | null;
    retry_count: number;
    retry_after: number | null;
    max_retries: number;
}

const submissionToRow = (s: SubmissionRecord): SubmissionRow => ({
    id: s.id,
    agent_id: s.agentId,
    data_type: s.dataType,
    record_count: s.recordCount,
    data_size_bytes: s.dataSizeBytes,
    file_hash: s.fileHash,
    metadata: s.metadata,
    status: s.status,
    submitted_at: ms(s.submittedAt),
    processed_at: msOrNull(s.processedAt),
    processed_count: s.processedCount,
    error_count: s.errorCount,
    error_details: s.errorDetails,
    retry_count: s.retryCount,
    retry_after: msOrNull(s.retryAfter),
    max_retries: s.maxRetries,
});

const submissionFromRow = (row: SubmissionRow): SubmissionRecord => ({
    id: row.id,
    agentId: row.agent_id,
    dataType: row.data_type,
    recordCount: row.record_count,
    dataSizeBytes: row.data_size_bytes,
    fileHash: row.file_hash,
    metadata: row.metadata,
    status: oneOf(SUBMISSION_STATUSES, row.status, "agent_data_submissions.status"),
    submittedAt: new Date(row.submitted_at),
    processedAt: dateOrNull(row.processed_at),
    processedCount: row.processed_count,
    errorCount: row.error_count,
    errorDetails: row.error_details,
    retryCount: row.retry_count,
    retryAfter: dateOrNull(row.retry_after),
    maxRetries: row.max_retries,
});

class SqliteSubmissionRepository implements SubmissionRepository {
    private byId;
    private insertStmt;
    private updateStmt;
    private forAgent;

    constructor(db: Database.Database) {
        this.byId = db.prepare<[string], SubmissionRow>("SELECT * FROM agent_data_submissions WHERE id = ?");
        this.insertStmt = db.prepare<SubmissionRow>(`
            INSERT INTO agent_data_submissions (id, agent_id, data_type, record_count, data_size_bytes, file_hash,
                metadata, status, submitted_at, processed_at, processed_count, error_count, error_details,
                retry_count, retry_after, max_retries)
            VALUES (@id, @agent_id, @data_type, @record_count, @data_size_bytes, @file_hash,
                @metadata, @status, @submitted_at, @processed_at, @processed_count, @error_count, @error_details,
                @retry_count, @retry_after, @max_retries)
        `);
        this.updateStmt = db.prepare<SubmissionRow>(`
            UPDATE agent_data_submissions SET agent_id = @agent_id, data_type = @data_type,
                record_count = @record_count, data_size_bytes = @data_size_bytes, file_hash = @file_hash,
                metadata = @metadata, status = @status, submitted_at = @submitted_at, processed_at = @processed_at,
                processed_count = @processed_count, error_count = @error_count, error_details = @error_details,
                retry_count = @retry_count, retry_after = @retry_after, max_retries = @max_retries
            WHERE id = @id
        `);
        this.forAgent = db.prepare<[string, number], SubmissionRow>(
            "SELECT * FROM agent_data_submissions WHERE agent_id = ? ORDER BY submitted_at DESC, rowid DESC LIMIT ?"
        );
    }

    findById(id: string) {
        const row = this.byId.get(id);
        return row ? submissionFromRow(row) : null;
    }

    insert(submission: SubmissionRecord) {
        this.insertStmt.run(submissionToRow(submission));
    }

    update(submission: SubmissionRecord) {
        requireChange(this.updateStmt.run(submissionToRow(submission)).changes, "agent_data_submissions", submission.id);
    }

    listForAgent(agentId: string, limit: number) {
        return this.forAgent.all(agentId, limit).map(submissionFromRow);
    }
}

interface DirectoryUserRow {
    id: string;
    username: string;
    email: string | null;
    display_name: string | null;
    first_name: string | null;
    last_name: string | null;
    department: string | null;
    job_title: string | null;
    manager: string | null;
    is_active: number;
    created_at: number;
    last_updated: number | null;
    source: string;
    source_id: string | null;
}

const userToRow = (u: DirectoryUserRecord): DirectoryUserRow => ({
    id: u.id,
    username: u.username,
    email: u.email,
    display_name: u.displayName,
    first_name: u.firstName,
    last_name: u.lastName,
    department: u.department,
    job_title: u.jobTitle,
    manager: u.manager,
    is_active: flag(u.isActive),
    created_at: ms(u.createdAt),
    last_updated: msOrNull(u.lastUpdated),
    source: u.source,
    source_id: u.sourceId,
});

const userFromRow = (row: DirectoryUserRow): DirectoryUserRecord => ({
    id: row.id,
    username: row.username,
    email: row.email,
    displayName: row.display_name,
    firstName: row.first_name,
    lastName: row.last_name,
    department: row.department,
    jobTitle: row.job_title,
    manager: row.manager,
    isActive: row.is_active === 1,
    createdAt: new Date(row.created_at),
    lastUpdated: dateOrNull(row.last_updated),
    source: row.source,
    sourceId: row.source_id,
});

class SqliteDirectoryUserRepository implements DirectoryUserRepository {
    private byUsername;
    private insertStmt;
    private updateStmt;
    private allStmt;

    constructor(db: Database.Database) {
        this.byUsername = db.prepare<[string], DirectoryUserRow>("SELECT * FROM directory_users WHERE username = ?");
        this.insertStmt = db.prepare<DirectoryUserRow>(`
            INSERT INTO directory_users (id, username, email, display_name, first_name, last_name, department,
                job_title, manager, is_active, created_at, last_updated, source, source_id)
            VALUES (@id, @username, @email, @display_name, @first_name, @last_name, @department,
                @job_title, @manager, @is_active, @created_at, @last_updated, @source, @source_id)
        `);
        this.updateStmt = db.prepare<DirectoryUserRow>(`
            UPDATE directory_users SET username = @username, email = @email, display_name = @display_name,
                first_name = @first_name, last_name = @last_name, department = @department, job_title = @job_title,
                manager = @manager, is_active = @is_active, created_at = @created_at, last_updated = @last_updated,
                source = @source, source_id = @source_id
            WHERE id = @id
        `);
        this.allStmt = db.prepare<[], DirectoryUserRow>("SELECT * FROM directory_users ORDER BY username");
    }

    findByUsername(username: string) {
        const row = this.byUsername.get(username);
        return row ? userFromRow(row) : null;
    }

    insert(user: DirectoryUserRecord) {
        this.insertStmt.run(userToRow(user));
    }

    update(user: DirectoryUserRecord) {
        requireChange(this.updateStmt.run(userToRow(user)).changes, "directory_users", user.id);
    }

    list() {
        return this.allStmt.all().map(userFromRow);
    }
}

interface AgentErrorRow {
    id: string;
    agent_id: string;
    error_id: string;
    severity: string;
    category: string;
    source: string;
    message: string;
    stack_trace: string | null;
    additional_data: string | null;
    occurred_at: number;
    occurrence_count: number;
    first_occurrence: number;
    last_occurrence: number;
    reported_at: number;
    status: string;
}

const errorToRow = (e: AgentErrorRecord): AgentErrorRow => ({
    id: e.id,
    agent_id: e.agentId,
    error_id: e.errorId,
    severity: e.severity,
    category: e.category,
    source: e.source,
    message: e.message,
    stack_trace: e.stackTrace,
    additional_data: e.additionalData,
    occurred_at: ms(e.occurredAt),
    occurrence_count: e.occurrenceCount,
    first_occurrence: ms(e.firstOccurrence),
    last_occurrence: ms(e.lastOccurrence),
    reported_at: ms(e.reportedAt),
    status: e.status,
});

const errorFromRow = (row: AgentErrorRow): AgentErrorRecord => ({
    id: row.id,
    agentId: row.agent_id,
    errorId: row.error_id,
    severity: oneOf(ERROR_SEVERITIES, row.severity, "agent_errors.severity"),
    category: row.category,
    source: row.source,
    message: row.message,
    stackTrace: row.stack_trace,
    additionalData: row.additional_data,
    occurredAt: new Date(row.occurred_at),
    occurrenceCount: row.occurrence_count,
    firstOccurrence: new Date(row.first_occurrence),
    lastOccurrence: new Date(row.last_occurrence),
    reportedAt: new Date(row.reported_at),
    status: row.status,
});

class SqliteAgentErrorRepository implements AgentErrorRepository {
    private byKey;
    private insertStmt;
    private updateStmt;
    private forAgent;

    constructor(db: Database.Database) {
        this.byKey = db.prepare<[string, string], AgentErrorRow>(
            "SELECT * FROM agent_errors WHERE agent_id = ? AND error_id = ?"
        );
        this.insertStmt = db.prepare<AgentErrorRow>(`
            INSERT INTO agent_errors (id, agent_id, error_id, severity, category, source, message, stack_trace,
                additional_data, occurred_at, occurrence_count, first_occurrence, last_occurrence, reported_at, status)
            VALUES (@id, @agent_id, @error_id, @severity, @category, @source, @message, @stack_trace,
                @additional_data, @occurred_at, @occurrence_count, @first_occurrence, @last_occurrence, @reported_at,
                @status)
        `);
        this.updateStmt = db.prepare<AgentErrorRow>(`
            UPDATE agent_errors SET agent_id = @agent_id, error_id = @error_id, severity = @severity,
                category = @category, source = @source, message = @message, stack_trace = @stack_trace,
                additional_data = @additional_data, occurred_at = @occurred_at, occurrence_count = @occurrence_count,
                first_occurrence = @first_occurrence, last_occurrence = @last_occurrence, reported_at = @reported_at,
                status = @status
            WHERE id = @id
        `);
        this.forAgent = db.prepare<[string], AgentErrorRow>(
            "SELECT * FROM agent_errors WHERE agent_id = ? ORDER BY last_occurrence DESC, rowid DESC"
        );
    }

    find(agentId: string, errorId: string) {
        const row = this.byKey.get(agentId, errorId);
        return row ? errorFromRow(row) : null;
    }

    insert(error: AgentErrorRecord) {
        this.insertStmt.run(errorToRow(error));
    }

    update(error: AgentErrorRecord) {
        requireChange(this.updateStmt.run(errorToRow(error)).changes, "agent_errors", error.id);
    }

    listForAgent(agentId: string) {
        return this.forAgent.all(agentId).map(errorFromRow);
    }
}

interface ErrorReportRow {
    id: string;
    agent_id: string;
    reported_at: number;
    total_error_count: number;
    processed_error_count: number;
    new_error_count: number;
    duplicate_error_count: number;
    status: string;
    processed_at: number | null;
}

const reportToRow = (r: ErrorReportRecord): ErrorReportRow => ({
    id: r.id,
    agent_id: r.agentId,
    reported_at: ms(r.reportedAt),
    total_error_count: r.totalErrorCount,
    processed_error_count: r.processedErrorCount,
    new_error_count: r.newErrorCount,
    duplicate_error_count: r.duplicateErrorCount,
    status: r.status,
    processed_at: msOrNull(r.processedAt),
});

const reportFromRow = (row: ErrorReportRow): ErrorReportRecord => ({
    id: row.id,
    agentId: row.agent_id,
    reportedAt: new Date(row.reported_at),
    totalErrorCount: row.total_error_count,
    processedErrorCount: row.processed_error_count,
    newErrorCount: row.new_error_count,
    duplicateErrorCount: row.duplicate_error_count,
    status: oneOf(ERROR_REPORT_STATUSES, row.status, "agent_error_reports.status"),
    processedAt: dateOrNull(row.processed_at),
});

class SqliteErrorReportRepository implements ErrorReportRepository {
    private byId;
    private insertStmt;
    private updateStmt;
    private forAgent;

    constructor(db: Database.Database) {
        this.byId = db.prepare<[string], ErrorReportRow>("SELECT * FROM agent_error_reports WHERE id = ?");
        this.insertStmt = db.prepare<ErrorReportRow>(`
            INSERT INTO agent_error_reports (id, agent_id, reported_at, total_error_count, processed_error_count,
                new_error_count, duplicate_error_count, status, processed_at)
            VALUES (@id, @agent_id, @reported_at, @total_error_count, @processed_error_count,
                @new_error_count, @duplicate_error_count, @status, @processed_at)
        `);
        this.updateStmt = db.prepare<ErrorReportRow>(`
            UPDATE agent_error_reports SET agent_id = @agent_id, reported_at = @reported_at,
                total_error_count = @total_error_count, processed_error_count = @processed_error_count,
                new_error_count = @new_error_count, duplicate_error_count = @duplicate_error_count,
                status = @status, processed_at = @processed_at
            WHERE id = @id
        `);
        this.forAgent = db.prepare<[string], ErrorReportRow>(
            "SELECT * FROM agent_error_reports WHERE agent_id = ? ORDER BY reported_at DESC, rowid DESC"
        );
    }

    findById(id: string) {
        const row = this.byId.get(id);
        return row ? reportFromRow(row) : null;
    }

    insert(report: ErrorReportRecord) {
        this.insertStmt.run(reportToRow(report));
    }

    update(report: ErrorReportRecord) {
        requireChange(this.updateStmt.run(reportToRow(report)).changes, "agent_error_reports", report.id);
    }

    listForAgent(agentId: string) {
        return this.forAgent.all(agentId).map(reportFromRow);
    }
}

/**
 * SQLite-backed store. Transactions start with `BEGIN IMMEDIATE`, so a
 * read-modify-write sequence holds the write lock from its first read.
 */
export class SqliteStore implements Store {
    readonly kind = "sqlite" as const;
    private db: Database.Database;
    private tx: StoreTransaction;

    constructor(dbPath: string = ":memory:") {
        this.db = new Database(dbPath);
        this.init();
        this.tx = {
            agents: new SqliteAgentRepository(this.db),
            certificates: new SqliteCertificateRepository(this.db),
            submissions: new SqliteSubmissionRepository(this.db),
            users: new SqliteDirectoryUserRepository(this.db),
            errors: new SqliteAgentErrorRepository(this.db),
            errorReports: new SqliteErrorReportRepository(this.db),
        };
    }

    private init() {
        if (this.db.name !== ":memory:") {
            this.db.pragma("journal_mode = WAL");
        }
        this.db.pragma("foreign_keys = ON");
        this.db.exec(SCHEMA);
    }

    transaction<T>(work: (tx: StoreTransaction) => T): T {
        return this.db.transaction(() => work(this.tx)).immediate();
    }

    close(): void {
        this.db.close();
    }
}
