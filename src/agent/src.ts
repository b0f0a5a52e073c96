import { createHash } from "node:crypto";
import { z } from "zod";
import { systemClock, type Clock } from "../context";
import { createLogger, type Logger } from "../logger";
import type { AgentConfiguration } from "../registry/interface";
import type { ErrorItem } from "../reports/interface";
import { DATA_TYPES, type DataType } from "../submission/interface";
import { AgentApiError, type AgentConfig, type FetchLike, type IAgent, type LocalError } from "./interface";

const DAY_MS = 24 * 60 * 60 * 1000;

const ConfigurationSchema = z.object({
    dataCollectionIntervalMinutes: z.number(),
    enabledDataTypes: z.array(z.enum(DATA_TYPES)),
    heartbeatIntervalSeconds: z.number(),
    enableDetailedLogging: z.boolean(),
    customSettings: z.record(z.string()),
});

const RegistrationBody = z.object({ agentId: z.string(), apiKey: z.string(), configuration: ConfigurationSchema });
const HeartbeatBody = z.object({ updateAvailable: z.boolean() });
const SubmissionBody = z.object({ submissionId: z.string() });
const ReportBody = z.object({ processedErrorCount: z.number(), duplicateErrorCount: z.number() });
const CertificateBody = z.object({
    certificateData: z.string(),
    privateKeyData: z.string(),
    thumbprint: z.string(),
    expiresAt: z.coerce.date(),
});
const RenewalBody = z.object({
    newThumbprint: z.string(),
    certificateData: z.string(),
    privateKeyData: z.string(),
    expiresAt: z.coerce.date(),
    oldCertificateRevoked: z.boolean(),
});
const FailureBody = z.object({ error: z.string().optional(), message: z.string() });

export interface HeldCertificate {
    thumbprint: string;
    /** Base64 DER */
    certificateData: string;
    /** Base64 PKCS#8 */
    privateKeyData: string;
    expiresAt: Date;
}

/**
 * Stable id for a local error, so repeats are counted instead of listed.
 */
export function localErrorId(source: string, message: string): string {
    return createHash("sha256").update(`${source}\n${message}`).digest("hex").slice(0, 16).toUpperCase();
}

const earlier = (a: Date, b: Date) => (a.getTime() <= b.getTime() ? a : b);
const later = (a: Date, b: Date) => (a.getTime() >= b.getTime() ? a : b);

/** Folds the occurrences of an unsent entry into one recorded after it. */
function mergeOccurrences(unsent: ErrorItem, recorded: ErrorItem): ErrorItem {
    return {
        ...unsent,
        occurrenceCount: (unsent.occurrenceCount ?? 1) + (recorded.occurrenceCount ?? 1),
        occurredAt: earlier(unsent.occurredAt, recorded.occurredAt),
        firstOccurrence: earlier(unsent.firstOccurrence ?? unsent.occurredAt, recorded.firstOccurrence ?? recorded.occurredAt),
        lastOccurrence: later(unsent.lastOccurrence ?? unsent.occurredAt, recorded.lastOccurrence ?? recorded.occurredAt),
    };
}

/**
 * Collector-side client of the gateway. Holds the identity, schedule and
 * certificate handed out by the service, plus the queue of errors still to
 * be reported.
 */
export class CollectorAgent implements IAgent {
    public agentId: string | null = null;
    public apiKey: string | null = null;
    public configuration: AgentConfiguration | null = null;
    public certificate: HeldCertificate | null = null;

    readonly logger: Logger;
    readonly clock: Clock;
    private fetch: FetchLike;
    private pending = new Map<string, ErrorItem>();

    constructor(private config: AgentConfig) {
        this.logger = config.logger ?? createLogger("Agent", { debug: config.debug });
        this.clock = config.clock ?? systemClock;
        this.fetch = config.fetch ?? ((url, init) => fetch(url, init));
    }

    private async call<S extends z.ZodTypeAny>(
        method: string,
        path: string,
        body: unknown,
        schema: S,
        signal?: AbortSignal
    ): Promise<z.output<S>> {
        const url = `${this.config.serviceUrl}/api/agents${path}`;
        this.logger.debug(`${method} ${url}`);

        const res = await this.fetch(url, {
            method,
            headers: { "Content-Type": "application/json" },
            body: body === undefined ? undefined : JSON.stringify(body),
            signal,
        });
        const payload: unknown = await res.json();

        if (!res.ok) {
            const failure = FailureBody.safeParse(payload);
            if (failure.success) {
                throw new AgentApiError(res.status, failure.data.error ?? null, failure.data.message);
            }
            throw new AgentApiError(res.status, null, `Service answered ${res.status}`);
        }
        return schema.parse(payload);
    }

    private requireId(): string {
        if (!this.agentId) {
            throw new Error("Agent is not registered");
        }
        return this.agentId;
    }

    /** The schedule received at registration */
    schedule(): AgentConfiguration {
        if (!this.configuration) {
            throw new Error("Agent is not registered");
        }
        return this.configuration;
    }

    /** Drops the identity, so the next cycle registers again */
    forget() {
        this.agentId = null;
        this.apiKey = null;
    }

    async register(signal?: AbortSignal) {
        const registered = await this.call("POST", "/register", {
            name: this.config.name,
            type: this.config.type,
            version: this.config.version,
            machineName: this.config.machineName,
            domain: this.config.domain,
            ipAddress: this.config.ipAddress,
            operatingSystem: this.config.operatingSystem,
        }, RegistrationBody, signal);

        this.agentId = registered.agentId;
        this.apiKey = registered.apiKey;
        this.configuration = registered.configuration;
        this.logger.info(`Registered as ${registered.agentId}`);
    }

    async heartbeat(status: string, statusMessage?: string, signal?: AbortSignal): Promise<boolean> {
        const ack = await this.call(
            "POST",
            "/heartbeat",
            { agentId: this.requireId(), status, statusMessage },
            HeartbeatBody,
            signal
        );
        if (ack.updateAvailable) {
            this.logger.info("Agent update available");
        }
        return ack.updateAvailable;
    }

    async submit(dataType: DataType, records: unknown[], signal?: AbortSignal): Promise<string> {
        const json = Buffer.from(JSON.stringify(records), "utf-8");
        const receipt = await this.call("POST", "/submit-data", {
            agentId: this.requireId(),
            dataType,
            recordCount: records.length,
            data: json.toString("base64"),
            dataHash: createHash("sha256").update(json).digest("hex"),
            metadata: { machineName: this.config.machineName },
        }, SubmissionBody, signal);

        this.logger.debug(`Submitted ${records.length} ${dataType} records as ${receipt.submissionId}`);
        return receipt.submissionId;
    }

    recordError(error: LocalError) {
        const errorId = localErrorId(error.source, error.message);
        const now = this.clock();
        const known = this.pending.get(errorId);

        this.pending.set(
            errorId,
            known
                ? { ...known, occurrenceCount: (known.occurrenceCount ?? 1) + 1, lastOccurrence: now }
                : {
                      errorId,
                      severity: error.severity,
                      category: error.category,
                      source: error.source,
                      message: error.message,
                      stackTrace: error.stackTrace ?? null,
                      additionalData: { machineName: this.config.machineName },
                      occurredAt: now,
                      occurrenceCount: 1,
                      firstOccurrence: now,
                      lastOccurrence: now,
                  }
        );
    }

    pendingErrors(): ErrorItem[] {
        return [...this.pending.values()];
    }

    async flushErrors(signal?: AbortSignal): Promise<number> {
        const errors = this.pendingErrors();
        if (errors.length === 0) return 0;
        const agentId = this.requireId();

        // Occurrences recorded while the report is in flight start a new entry.
        this.pending.clear();

        let report: z.output<typeof ReportBody>;
        try {
            report = await this.call("POST", "/errors/report", {
                agentId,
                reportedAt: this.clock(),
                errors,
            }, ReportBody, signal);
        } catch (err) {
            for (const unsent of errors) {
                const recorded = this.pending.get(unsent.errorId);
                this.pending.set(unsent.errorId, recorded ? mergeOccurrences(unsent, recorded) : unsent);
            }
            throw err;
        }

        this.logger.info(
            `Reported ${report.processedErrorCount} errors to the service (${report.duplicateErrorCount} duplicates)`
        );
        return report.processedErrorCount;
    }

    async requestCertificate(commonName: string, subjectAlternativeNames: string[] = [], signal?: AbortSignal) {
        const issued = await this.call("POST", "/certificates/generate", {
            agentId: this.requireId(),
            commonName,
            subjectAlternativeNames,
        }, CertificateBody, signal);

        this.certificate = issued;
        this.logger.info(`Certificate ${issued.thumbprint} acquired, expires ${issued.expiresAt.toISOString()}`);
    }

    async renewCertificate(signal?: AbortSignal) {
        if (!this.certificate) {
            throw new Error("No certificate to renew");
        }
        const renewed = await this.call("POST", "/certificates/renew", {
            agentId: this.requireId(),
            currentThumbprint: this.certificate.thumbprint,
            revokeOldCertificate: true,
        }, RenewalBody, signal);

        this.logger.info(`Certificate ${this.certificate.thumbprint} renewed as ${renewed.newThumbprint}`);
        this.certificate = {
            thumbprint: renewed.newThumbprint,
            certificateData: renewed.certificateData,
            privateKeyData: renewed.privateKeyData,
            expiresAt: renewed.expiresAt,
        };
    }

    certificateExpiresWithin(days: number): boolean {
        if (!this.certificate) return false;
        return this.certificate.expiresAt.getTime() - this.clock().getTime() < days * DAY_MS;
    }
}
