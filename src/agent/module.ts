import { hostname } from "node:os";
import { fileURLToPath } from "node:url";
import { z } from "zod";
import pkg from "../../package.json";
import { ConfigError } from "../config";
import { createLogger } from "../logger";
import { AGENT_TYPES } from "../storage/interface";
import { runCollectorLoop } from "./loop";
import { CollectorAgent } from "./src";

export * from "./interface";
export * from "./loop";
export { CollectorAgent, localErrorId, type HeldCertificate } from "./src";

const AgentEnvSchema = z.object({
    AGENT_SERVICE_URL: z.string().url().default("http://localhost:9002"),
    AGENT_NAME: z.string().min(1).optional(),
    AGENT_TYPE: z.enum(AGENT_TYPES).default("Server"),
    AGENT_MACHINE_NAME: z.string().min(1).optional(),
    AGENT_DOMAIN: z.string().min(1).optional(),
    DEBUG: z.enum(["true", "false"]).default("false"),
});

export function agentFromEnv(env: Record<string, string | undefined> = process.env): CollectorAgent {
    const parsed = AgentEnvSchema.safeParse(env);
    if (!parsed.success) {
        throw new ConfigError(parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`));
    }

    const vars = parsed.data;
    const machineName = vars.AGENT_MACHINE_NAME ?? hostname();
    const debug = vars.DEBUG === "true";
    return new CollectorAgent({
        name: vars.AGENT_NAME ?? `${machineName} Collector`,
        type: vars.AGENT_TYPE,
        version: pkg.version,
        machineName,
        domain: vars.AGENT_DOMAIN,
        operatingSystem: `${process.platform} ${process.arch}`,
        serviceUrl: vars.AGENT_SERVICE_URL,
        debug,
        logger: createLogger("Agent", { debug }),
    });
}

async function main() {
    const agent = agentFromEnv();
    const controller = new AbortController();
    process.once("SIGINT", () => controller.abort());
    process.once("SIGTERM", () => controller.abort());

    // Directory harvesting lives outside this service; the agent only reports liveness and errors.
    await runCollectorLoop(agent, { collect: async () => null, signal: controller.signal });
}

if (process.argv[1] === fileURLToPath(import.meta.url)) {
    main().catch((err) => {
        console.error("[Agent] Fatal error", err);
        process.exit(1);
    });
}
