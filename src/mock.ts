import type { Clock, ServiceContext } from "./context";
import { silentLogger } from "./logger";
import type { RegisterAgentRequest } from "./registry/interface";
import type { Store } from "./storage/interface";
import { MemoryStore } from "./storage/memory/src";

/**
 * A clock that only moves when told to.
 */
export class ManualClock {
    private current: Date;

    constructor(start: string | Date = "2026-03-01T12:00:00.000Z") {
        this.current = new Date(start);
    }

    now: Clock = () => new Date(this.current);

    set(at: string | Date) {
        this.current = new Date(at);
    }

    advance(ms: number) {
        this.current = new Date(this.current.getTime() + ms);
    }
}

export function mockContext(options: { store?: Store; clock?: ManualClock } = {}): ServiceContext {
    return {
        store: options.store ?? new MemoryStore(),
        logger: silentLogger,
        clock: (options.clock ?? new ManualClock()).now,
    };
}

export function registrationFor(overrides: Partial<RegisterAgentRequest> = {}): RegisterAgentRequest {
    return {
        name: "DC01 Collector",
        type: "DomainController",
        version: "1.0.0",
        machineName: "DC01",
        ipAddress: "10.0.0.5",
        domain: "corp.example",
        operatingSystem: "Windows Server 2022",
        ...overrides,
    };
}
