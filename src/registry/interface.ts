/**
 * Agent Registry Interface Definitions
 */
import type { AgentType } from "../storage/interface";
import type { DataType } from "../submission/interface";

/**
 * Collection schedule handed to an agent when it registers
 */
export interface AgentConfiguration {
    dataCollectionIntervalMinutes: number;
    enabledDataTypes: DataType[];
    heartbeatIntervalSeconds: number;
    enableDetailedLogging: boolean;
    customSettings: Record<string, string>;
}

/**
 * Request DTO for registering (or re-registering) an agent
 */
export interface RegisterAgentRequest {
    name: string;
    type: AgentType;
    version: string;
    machineName: string;
    ipAddress?: string | null;
    domain?: string | null;
    operatingSystem?: string | null;
    /** Stored as a JSON document */
    configuration?: Record<string, unknown> | null;
}

export interface Registration {
    agentId: string;
    /** Opaque credential, regenerated on every registration */
    apiKey: string;
    configuration: AgentConfiguration;
}

export interface HeartbeatRequest {
    agentId: string;
    status: string;
    statusMessage?: string | null;
}

export interface HeartbeatAck {
    updateAvailable: boolean;
}

/**
 * Read-only projection of an active agent
 */
export interface AgentStatus {
    id: string;
    name: string;
    type: AgentType;
    version: string;
    machineName: string;
    ipAddress: string | null;
    domain: string | null;
    isActive: boolean;
    isOnline: boolean;
    status: string | null;
    statusMessage: string | null;
    registeredAt: Date;
    lastHeartbeat: Date | null;
    lastDataCollection: Date | null;
}
