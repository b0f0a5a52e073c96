import { z } from "zod";
import { REVOCATION_REASONS } from "../authority/interface";
import { AGENT_TYPES, ERROR_SEVERITIES } from "../storage/interface";
import { DATA_TYPES } from "../submission/interface";

const id = z.string().trim().min(1);
const text = z.string().nullish();
const instant = z.coerce.date();

export const RegisterSchema = z.object({
    name: z.string().trim().min(1),
    type: z.enum(AGENT_TYPES),
    version: z.string().trim().min(1),
    machineName: z.string().trim().min(1),
    ipAddress: text,
    domain: text,
    operatingSystem: text,
    /** Older collectors send the operating system as `os` */
    os: text,
    configuration: z.record(z.unknown()).nullish(),
});

export const HeartbeatSchema = z.object({
    agentId: id,
    status: z.string().trim().min(1),
    statusMessage: text,
});

export const SubmitDataSchema = z.object({
    agentId: id,
    dataType: z.string().trim().min(1),
    recordCount: z.number().int().min(0),
    data: z.string(),
    dataHash: text,
    metadata: z.record(z.string()).nullish(),
});

const ErrorItemSchema = z.object({
    errorId: z.string().trim().min(1),
    severity: z.enum(ERROR_SEVERITIES),
    category: z.string(),
    source: z.string(),
    message: z.string(),
    stackTrace: text,
    additionalData: z.record(z.string()).nullish(),
    occurredAt: instant,
    occurrenceCount: z.number().int().min(1).optional(),
    firstOccurrence: instant.nullish(),
    lastOccurrence: instant.nullish(),
});

export const ErrorReportSchema = z.object({
    agentId: id,
    reportedAt: instant,
    errors: z.array(ErrorItemSchema),
});

export const GenerateCertificateSchema = z.object({
    agentId: id,
    commonName: z.string().trim().min(1),
    organization: z.string().min(1).optional(),
    organizationalUnit: z.string().min(1).optional(),
    country: z.string().length(2).optional(),
    validityDays: z.number().int().min(1).max(3650).optional(),
    subjectAlternativeNames: z.array(z.string().min(1)).optional(),
});

export const ValidateCertificateSchema = z.object({
    certificateData: z.string().min(1),
    validateAtTime: instant.nullish(),
    checkChain: z.boolean().optional(),
    checkRevocation: z.boolean().optional(),
});

export const RenewCertificateSchema = z.object({
    agentId: id,
    currentThumbprint: z.string().trim().min(1),
    validityDays: z.number().int().min(1).max(3650).optional(),
    revokeOldCertificate: z.boolean().optional(),
});

export const RevokeCertificateSchema = z.object({
    agentId: id,
    certificateThumbprint: z.string().trim().min(1),
    reason: z.enum(REVOCATION_REASONS).default("Unspecified"),
});

export const ConfigurationSchema = z.object({
    dataCollectionIntervalMinutes: z.number().int().min(1),
    enabledDataTypes: z.array(z.enum(DATA_TYPES)),
    heartbeatIntervalSeconds: z.number().int().min(1),
    enableDetailedLogging: z.boolean(),
    customSettings: z.record(z.string()).default({}),
});

export const RetrySchema = z.object({
    delaySeconds: z.number().int().min(0).optional(),
});

export const CertificatesQuerySchema = z.object({
    agentId: id,
});

export const SubmissionsQuerySchema = z.object({
    limit: z.coerce.number().int().min(1).max(500).optional(),
});
