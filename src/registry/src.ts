import { randomBytes, randomUUID } from "node:crypto";
import type { ServiceContext } from "../context";
import type { Logger } from "../logger";
import { CoreError, logFailure, ok, type Result } from "../result";
import type { AgentRecord, StoreTransaction } from "../storage/interface";
import { defaultConfiguration } from "./defaults";
import type {
    AgentConfiguration,
    AgentStatus,
    HeartbeatAck,
    HeartbeatRequest,
    RegisterAgentRequest,
    Registration,
} from "./interface";

/**
 * Loads an agent inside a transaction, deactivated or not.
 */
export function requireAgent(tx: StoreTransaction, agentId: string): AgentRecord {
    const agent = tx.agents.findById(agentId);
    if (!agent) {
        throw new CoreError("AgentNotFound", "Agent not found");
    }
    return agent;
}

/**
 * Loads an agent that may still talk to the service. A deactivated agent is
 * reported as not found until it registers again.
 */
export function requireActiveAgent(tx: StoreTransaction, agentId: string): AgentRecord {
    const agent = requireAgent(tx, agentId);
    if (!agent.isActive) {
        throw new CoreError("AgentNotFound", "Agent not found");
    }
    return agent;
}

function toStatus(agent: AgentRecord): AgentStatus {
    return {
        id: agent.id,
        name: agent.name,
        type: agent.type,
        version: agent.version,
        machineName: agent.machineName,
        ipAddress: agent.ipAddress,
        domain: agent.domain,
        isActive: agent.isActive,
        isOnline: agent.isOnline,
        status: agent.status,
        statusMessage: agent.statusMessage,
        registeredAt: agent.registeredAt,
        lastHeartbeat: agent.lastHeartbeat,
        lastDataCollection: agent.lastDataCollection,
    };
}

/**
 * Identity and liveness of collector agents.
 */
export class AgentRegistry {
    private logger: Logger;

    constructor(private ctx: ServiceContext) {
        this.logger = ctx.logger.child("Registry");
    }

    /**
     * Creates the agent or refreshes the one already known under
     * `(machineName, type)`. `registeredAt` and `status` survive a refresh.
     */
    register(req: RegisterAgentRequest): Result<Registration> {
        try {
            const now = this.ctx.clock();
            const configuration = req.configuration ? JSON.stringify(req.configuration) : null;

            const agentId = this.ctx.store.transaction((tx) => {
                const existing = tx.agents.findByNaturalKey(req.machineName, req.type);
                if (existing) {
                    tx.agents.update({
                        ...existing,
                        name: req.name,
                        version: req.version,
                        ipAddress: req.ipAddress ?? null,
                        domain: req.domain ?? null,
                        operatingSystem: req.operatingSystem ?? null,
                        configuration,
                        isActive: true,
                        lastUpdated: now,
                    });
                    return existing.id;
                }

                const agent: AgentRecord = {
                    id: randomUUID(),
                    name: req.name,
                    type: req.type,
                    version: req.version,
                    machineName: req.machineName,
                    ipAddress: req.ipAddress ?? null,
                    domain: req.domain ?? null,
                    operatingSystem: req.operatingSystem ?? null,
                    configuration,
                    isActive: true,
                    isOnline: false,
                    status: "Registered",
                    statusMessage: null,
                    registeredAt: now,
                    lastHeartbeat: null,
                    lastDataCollection: null,
                    lastUpdated: null,
                };
                tx.agents.insert(agent);
                return agent.id;
            });

            this.logger.info(`Agent ${req.name} (${req.type}) registered from ${req.machineName} as ${agentId}`);

            return ok(
                {
                    agentId,
                    apiKey: randomBytes(32).toString("base64url"),
                    configuration: defaultConfiguration(req.type),
                },
                "Agent registered successfully"
            );
        } catch (err) {
            return logFailure(this.logger, err, "RegistrationError", "Registration failed");
        }
    }

    heartbeat(req: HeartbeatRequest): Result<HeartbeatAck> {
        try {
            const now = this.ctx.clock();
            this.ctx.store.transaction((tx) => {
                const agent = requireActiveAgent(tx, req.agentId);
                tx.agents.update({
                    ...agent,
                    isOnline: true,
                    lastHeartbeat: now,
                    status: req.status,
                    statusMessage: req.statusMessage ?? null,
                });
            });

            this.logger.debug(`Heartbeat from ${req.agentId}: ${req.status}`);
            // No version policy yet, agents are never told to update.
            return ok({ updateAvailable: false }, "Heartbeat processed");
        } catch (err) {
            return logFailure(this.logger, err, "StoreFailure", "Failed to process heartbeat");
        }
    }

    deactivate(agentId: string): Result<boolean> {
        try {
            const now = this.ctx.clock();
            const changed = this.ctx.store.transaction((tx) => {
                const agent = requireAgent(tx, agentId);
                if (!agent.isActive && !agent.isOnline && agent.status === "Deactivated") {
                    return false;
                }
                tx.agents.update({ ...agent, isActive: false, isOnline: false, status: "Deactivated", lastUpdated: now });
                return true;
            });

            if (changed) this.logger.info(`Agent ${agentId} deactivated`);
            return ok(true, changed ? "Agent deactivated" : "Agent already deactivated");
        } catch (err) {
            return logFailure(this.logger, err, "StoreFailure", "Failed to deactivate agent");
        }
    }

    updateConfiguration(agentId: string, configuration: AgentConfiguration): Result<boolean> {
        try {
            const now = this.ctx.clock();
            this.ctx.store.transaction((tx) => {
                const agent = requireActiveAgent(tx, agentId);
                tx.agents.update({ ...agent, configuration: JSON.stringify(configuration), lastUpdated: now });
            });
            return ok(true, "Configuration updated");
        } catch (err) {
            return logFailure(this.logger, err, "StoreFailure", "Failed to update configuration");
        }
    }

    list(): Result<AgentStatus[]> {
        try {
            const agents = this.ctx.store.transaction((tx) => tx.agents.listActive());
            return ok(agents.map(toStatus), `${agents.length} active agents`);
        } catch (err) {
            return logFailure(this.logger, err, "StoreFailure", "Failed to list agents");
        }
    }

    get(agentId: string): Result<AgentStatus> {
        try {
            const agent = this.ctx.store.transaction((tx) => requireActiveAgent(tx, agentId));
            return ok(toStatus(agent), "Agent found");
        } catch (err) {
            return logFailure(this.logger, err, "StoreFailure", "Failed to load agent");
        }
    }
}
