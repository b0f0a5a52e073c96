import type { Logger } from "./logger";
import type { Store } from "./storage/interface";

export type Clock = () => Date;

export const systemClock: Clock = () => new Date();

/**
 * Handles constructed once at startup and shared by every core component.
 */
export interface ServiceContext {
    store: Store;
    logger: Logger;
    clock: Clock;
}
