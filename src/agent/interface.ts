import type { Clock } from "../context";
import type { Logger } from "../logger";
import type { AgentType, ErrorSeverity } from "../storage/interface";
import type { DataType } from "../submission/interface";

export type FetchLike = (url: string, init?: RequestInit) => Promise<Response>;

export interface AgentConfig {
    /** Display name reported at registration */
    name: string;
    type: AgentType;
    version: string;
    machineName: string;
    domain?: string;
    ipAddress?: string;
    operatingSystem?: string;
    /** Base URL of the gateway, without the `/api/agents` prefix */
    serviceUrl: string;
    debug?: boolean;
    /** Defaults to the global fetch */
    fetch?: FetchLike;
    logger?: Logger;
    clock?: Clock;
}

/**
 * Produces the records of one data type for a collection cycle, or null when
 * the agent has nothing to send for it. `signal` aborts when the loop stops.
 */
export type Collector = (dataType: DataType, signal: AbortSignal) => Promise<unknown[] | null>;

export interface LocalError {
    severity: ErrorSeverity;
    category: string;
    source: string;
    message: string;
    stackTrace?: string | null;
}

export class AgentApiError extends Error {
    constructor(public status: number, public kind: string | null, message: string) {
        super(message);
        this.name = "AgentApiError";
    }
}

/** Every call takes an optional signal that cancels the request in flight. */
export interface IAgent {
    /** Registers (or re-registers) the agent and keeps the returned schedule */
    register(signal?: AbortSignal): Promise<void>;
    heartbeat(status: string, statusMessage?: string, signal?: AbortSignal): Promise<boolean>;
    submit(dataType: DataType, records: unknown[], signal?: AbortSignal): Promise<string>;
    /** Queues a local error for the next report, deduplicated by source and message */
    recordError(error: LocalError): void;
    /** Sends queued errors, returns how many the service accepted */
    flushErrors(signal?: AbortSignal): Promise<number>;
    requestCertificate(commonName: string, subjectAlternativeNames?: string[], signal?: AbortSignal): Promise<void>;
    renewCertificate(signal?: AbortSignal): Promise<void>;
}
