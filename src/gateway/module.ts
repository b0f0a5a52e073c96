import { fileURLToPath } from "node:url";
import { getSigner } from "../authority/module";
import { loadConfig } from "../config";
import { createCore } from "../core";
import { createLogger } from "../logger";
import { getStore } from "../storage/module";
import { startGateway } from "./src";

export * from "./src";

export async function main(env: Record<string, string | undefined> = process.env) {
    const config = loadConfig(env);
    const logger = createLogger("Gateway", { debug: config.debug });

    const store = getStore(config.storage);
    const signer = await getSigner(config.authority);
    const core = createCore({ store, signer, logger });
    const server = startGateway(core, { port: config.port, logger });

    logger.info(`Certificates issued by the ${signer.name} signer`);

    const shutdown = () => {
        logger.info("Shutting down");
        server.close(() => store.close());
    };
    process.once("SIGINT", shutdown);
    process.once("SIGTERM", shutdown);

    return server;
}

if (process.argv[1] === fileURLToPath(import.meta.url)) {
    main().catch((err) => {
        console.error("[Gateway] Failed to start", err);
        process.exit(1);
    });
}
