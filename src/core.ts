import { CertificateAuthority, SelfSignedSigner, type CertificateSigner } from "./authority/module";
import { systemClock, type Clock, type ServiceContext } from "./context";
import { createLogger, type Logger } from "./logger";
import { AgentRegistry } from "./registry/module";
import { ErrorAggregator } from "./reports/module";
import type { Store } from "./storage/module";
import { SubmissionProcessor } from "./submission/module";

export interface Core {
    registry: AgentRegistry;
    authority: CertificateAuthority;
    submissions: SubmissionProcessor;
    errors: ErrorAggregator;
    store: Store;
}

export interface CoreOptions {
    store: Store;
    signer?: CertificateSigner;
    logger?: Logger;
    clock?: Clock;
}

/**
 * Wires the four components around one shared store, logger and clock.
 */
export function createCore(options: CoreOptions): Core {
    const ctx: ServiceContext = {
        store: options.store,
        logger: options.logger ?? createLogger("Core"),
        clock: options.clock ?? systemClock,
    };

    return {
        registry: new AgentRegistry(ctx),
        authority: new CertificateAuthority(ctx, options.signer ?? new SelfSignedSigner()),
        submissions: new SubmissionProcessor(ctx),
        errors: new ErrorAggregator(ctx),
        store: options.store,
    };
}
