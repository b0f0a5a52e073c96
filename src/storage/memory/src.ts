import type {
    AgentErrorRecord,
    AgentErrorRepository,
    AgentRecord,
    AgentRepository,
    AgentType,
    CertificateRecord,
    CertificateRepository,
    DirectoryUserRecord,
    DirectoryUserRepository,
    ErrorReportRecord,
    ErrorReportRepository,
    Store,
    StoreTransaction,
    SubmissionRecord,
    SubmissionRepository,
} from "../interface";

interface MemoryState {
    agents: Map<string, AgentRecord>;
    certificates: Map<string, CertificateRecord>;
    submissions: Map<string, SubmissionRecord>;
    users: Map<string, DirectoryUserRecord>;
    errors: Map<string, AgentErrorRecord>;
    errorReports: Map<string, ErrorReportRecord>;
}

function emptyState(): MemoryState {
    return {
        agents: new Map(),
        certificates: new Map(),
        submissions: new Map(),
        users: new Map(),
        errors: new Map(),
        errorReports: new Map(),
    };
}

function isPromiseLike(value: unknown): boolean {
    return typeof value === "object" && value !== null && "then" in value && typeof value.then === "function";
}

/**
 * One table of rows keyed by id. Reads hand out copies so callers can only
 * change a row through `update`.
 */
class Table<R extends { id: string }> {
    /** `beforeWrite` runs ahead of every insert or update */
    constructor(private name: string, private rows: () => Map<string, R>, private beforeWrite: () => void) {}

    get(id: string): R | null {
        const row = this.rows().get(id);
        return row ? { ...row } : null;
    }

    find(predicate: (row: R) => boolean): R | null {
        for (const row of this.rows().values()) {
            if (predicate(row)) return { ...row };
        }
        return null;
    }

    filter(predicate: (row: R) => boolean): R[] {
        return Array.from(this.rows().values()).filter(predicate).map((row) => ({ ...row }));
    }

    /** Matching rows by `pick` descending; ties go to the row inserted last */
    newestFirst(predicate: (row: R) => boolean, pick: (row: R) => Date): R[] {
        return this.filter(predicate)
            .reverse()
            .sort((a, b) => pick(b).getTime() - pick(a).getTime());
    }

    /** `conflict` reports an existing row that shares a unique key with `row` */
    insert(row: R, conflict?: (existing: R) => boolean, key?: string): void {
        this.beforeWrite();
        const rows = this.rows();
        if (rows.has(row.id)) {
            throw new Error(`UNIQUE constraint failed: ${this.name}.id`);
        }
        if (conflict) {
            for (const existing of rows.values()) {
                if (conflict(existing)) throw new Error(`UNIQUE constraint failed: ${this.name}.${key}`);
            }
        }
        rows.set(row.id, { ...row });
    }

    update(row: R): void {
        this.beforeWrite();
        const rows = this.rows();
        if (!rows.has(row.id)) {
            throw new Error(`${this.name} row ${row.id} does not exist`);
        }
        rows.set(row.id, { ...row });
    }
}

/** Code unit order, the way SQLite's default BINARY collation compares text */
const byText = <R>(pick: (row: R) => string) => (a: R, b: R) => {
    const x = pick(a);
    const y = pick(b);
    return x < y ? -1 : x > y ? 1 : 0;
};

class MemoryAgentRepository implements AgentRepository {
    constructor(private table: Table<AgentRecord>) {}

    findById(id: string) {
        return this.table.get(id);
    }

    findByNaturalKey(machineName: string, type: AgentType) {
        return this.table.find((a) => a.machineName === machineName && a.type === type);
    }

    insert(agent: AgentRecord) {
        this.table.insert(
            agent,
            (a) => a.machineName === agent.machineName && a.type === agent.type,
            "machine_name, agents.type"
        );
    }

    update(agent: AgentRecord) {
        this.table.update(agent);
    }

    listActive() {
        return this.table.filter((a) => a.isActive).sort(byText((a) => a.name));
    }
}

class MemoryCertificateRepository implements CertificateRepository {
    constructor(private table: Table<CertificateRecord>) {}

    findByThumbprint(thumbprint: string) {
        return this.table.find((c) => c.thumbprint === thumbprint);
    }

    findForAgent(agentId: string, thumbprint: string) {
        return this.table.find((c) => c.agentId === agentId && c.thumbprint === thumbprint);
    }

    insert(certificate: CertificateRecord) {
        this.table.insert(certificate, (c) => c.thumbprint === certificate.thumbprint, "thumbprint");
    }

    update(certificate: CertificateRecord) {
        this.table.update(certificate);
    }

    listForAgent(agentId: string) {
        return this.table.newestFirst((c) => c.agentId === agentId, (c) => c.issuedAt);
    }
}

class MemorySubmissionRepository implements SubmissionRepository {
    constructor(private table: Table<SubmissionRecord>) {}

    findById(id: string) {
        return this.table.get(id);
    }

    insert(submission: SubmissionRecord) {
        this.table.insert(submission);
    }

    update(submission: SubmissionRecord) {
        this.table.update(submission);
    }

    listForAgent(agentId: string, limit: number) {
        return this.table.newestFirst((s) => s.agentId === agentId, (s) => s.submittedAt).slice(0, limit);
    }
}

class MemoryDirectoryUserRepository implements DirectoryUserRepository {
    constructor(private table: Table<DirectoryUserRecord>) {}

    findByUsername(username: string) {
        return this.table.find((u) => u.username === username);
    }

    insert(user: DirectoryUserRecord) {
        this.table.insert(user, (u) => u.username === user.username, "username");
    }

    update(user: DirectoryUserRecord) {
        this.table.update(user);
    }

    list() {
        return this.table.filter(() => true).sort(byText((u) => u.username));
    }
}

class MemoryAgentErrorRepository implements AgentErrorRepository {
    constructor(private table: Table<AgentErrorRecord>) {}

    find(agentId: string, errorId: string) {
        return this.table.find((e) => e.agentId === agentId && e.errorId === errorId);
    }

    insert(error: AgentErrorRecord) {
        this.table.insert(
            error,
            (e) => e.agentId === error.agentId && e.errorId === error.errorId,
            "agent_id, agent_errors.error_id"
        );
    }

    update(error: AgentErrorRecord) {
        this.table.update(error);
    }

    listForAgent(agentId: string) {
        return this.table.newestFirst((e) => e.agentId === agentId, (e) => e.lastOccurrence);
    }
}

class MemoryErrorReportRepository implements ErrorReportRepository {
    constructor(private table: Table<ErrorReportRecord>) {}

    findById(id: string) {
        return this.table.get(id);
    }

    insert(report: ErrorReportRecord) {
        this.table.insert(report);
    }

    update(report: ErrorReportRecord) {
        this.table.update(report);
    }

    listForAgent(agentId: string) {
        return this.table.newestFirst((r) => r.agentId === agentId, (r) => r.reportedAt);
    }
}

type TableName = keyof MemoryState;

/**
 * Process-local store. A table's map is copied the first time a transaction
 * writes to it, so rolling back restores the untouched maps and reads never
 * pay for a copy.
 */
export class MemoryStore implements Store {
    readonly kind = "memory" as const;
    private state: MemoryState = emptyState();
    private inTransaction = false;
    private copied = new Set<TableName>();
    private readonly tx: StoreTransaction;

    constructor() {
        this.tx = {
            agents: new MemoryAgentRepository(
                new Table("agents", () => this.state.agents, this.copyOnWrite("agents", () => {
                    this.state.agents = new Map(this.state.agents);
                }))
            ),
            certificates: new MemoryCertificateRepository(
                new Table("agent_certificates", () => this.state.certificates, this.copyOnWrite("certificates", () => {
                    this.state.certificates = new Map(this.state.certificates);
                }))
            ),
            submissions: new MemorySubmissionRepository(
                new Table("agent_data_submissions", () => this.state.submissions, this.copyOnWrite("submissions", () => {
                    this.state.submissions = new Map(this.state.submissions);
                }))
            ),
            users: new MemoryDirectoryUserRepository(
                new Table("directory_users", () => this.state.users, this.copyOnWrite("users", () => {
                    this.state.users = new Map(this.state.users);
                }))
            ),
            errors: new MemoryAgentErrorRepository(
                new Table("agent_errors", () => this.state.errors, this.copyOnWrite("errors", () => {
                    this.state.errors = new Map(this.state.errors);
                }))
            ),
            errorReports: new MemoryErrorReportRepository(
                new Table("agent_error_reports", () => this.state.errorReports, this.copyOnWrite("errorReports", () => {
                    this.state.errorReports = new Map(this.state.errorReports);
                }))
            ),
        };
    }

    private copyOnWrite(table: TableName, copy: () => void) {
        return () => {
            if (!this.inTransaction || this.copied.has(table)) return;
            this.copied.add(table);
            copy();
        };
    }

    transaction<T>(work: (tx: StoreTransaction) => T): T {
        if (this.inTransaction) {
            throw new Error("Nested transactions are not supported");
        }

        // Rows are replaced, never mutated, so the old maps are a full snapshot.
        const snapshot: MemoryState = { ...this.state };
        this.inTransaction = true;
        this.copied.clear();
        try {
            const result = work(this.tx);
            if (isPromiseLike(result)) {
                throw new Error("Transaction function cannot return a promise");
            }
            return result;
        } catch (err) {
            this.state = snapshot;
            throw err;
        } finally {
            this.inTransaction = false;
        }
    }

    close(): void {
        this.state = emptyState();
    }
}
