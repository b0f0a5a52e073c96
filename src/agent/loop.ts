import { setTimeout as delay } from "node:timers/promises";
import { errorMessage } from "../result";
import { AgentApiError, type Collector } from "./interface";
import type { CollectorAgent } from "./src";

export const CYCLE_MS = 30_000;
export const ERROR_BACKOFF_MS = 60_000;
export const RENEW_WITHIN_DAYS = 30;

export interface LoopOptions {
    collect: Collector;
    signal: AbortSignal;
    cycleMs?: number;
    errorBackoffMs?: number;
    renewWithinDays?: number;
    sleep?: (ms: number, signal: AbortSignal) => Promise<void>;
}

const abortableSleep = async (ms: number, signal: AbortSignal) => {
    await delay(ms, undefined, { signal });
};

/**
 * One agent's background cycle: register when needed, then heartbeat,
 * collect and report on the schedule the service handed out. A failed cycle
 * is recorded as a local error and followed by a shorter fixed back-off.
 * Aborting `signal` cancels the request in flight and stops the loop.
 */
export async function runCollectorLoop(agent: CollectorAgent, options: LoopOptions): Promise<void> {
    const { collect, signal } = options;
    const cycleMs = options.cycleMs ?? CYCLE_MS;
    const errorBackoffMs = options.errorBackoffMs ?? ERROR_BACKOFF_MS;
    const renewWithinDays = options.renewWithinDays ?? RENEW_WITHIN_DAYS;
    const sleep = options.sleep ?? abortableSleep;

    let lastHeartbeat: number | null = null;
    let lastCollection: number | null = null;

    agent.logger.info("Collector loop starting");

    while (!signal.aborted) {
        let wait = cycleMs;
        try {
            if (!agent.agentId) {
                await agent.register(signal);
                lastHeartbeat = null;
            }
            signal.throwIfAborted();

            const schedule = agent.schedule();
            const now = agent.clock().getTime();

            if (lastHeartbeat === null || now - lastHeartbeat >= schedule.heartbeatIntervalSeconds * 1000) {
                await agent.heartbeat("Online", "Agent running normally", signal);
                lastHeartbeat = now;
            }

            if (lastCollection === null || now - lastCollection >= schedule.dataCollectionIntervalMinutes * 60_000) {
                for (const dataType of schedule.enabledDataTypes) {
                    signal.throwIfAborted();
                    const records = await collect(dataType, signal);
                    signal.throwIfAborted();
                    if (records) {
                        await agent.submit(dataType, records, signal);
                    }
                }
                lastCollection = now;
            }

            signal.throwIfAborted();
            await agent.flushErrors(signal);

            if (agent.certificateExpiresWithin(renewWithinDays)) {
                await agent.renewCertificate(signal);
            }
        } catch (err) {
            if (signal.aborted) break;

            agent.logger.error(`Error in collector cycle: ${errorMessage(err)}`);
            if (err instanceof AgentApiError && err.kind === "AgentNotFound") {
                agent.forget();
            }
            agent.recordError({
                severity: "High",
                category: "Service",
                source: "CollectorLoop",
                message: errorMessage(err),
                stackTrace: err instanceof Error ? err.stack ?? null : null,
            });
            wait = errorBackoffMs;
        }

        try {
            await sleep(wait, signal);
        } catch (err) {
            if (signal.aborted) break;
            throw err;
        }
    }

    agent.logger.info("Collector loop stopped");
}
