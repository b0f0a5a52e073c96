import type { StorageConfig } from "../config";
import type { Store } from "./interface";
import { MemoryStore } from "./memory/src";
import { SqliteStore } from "./sqlite/src";

export * from "./interface";
export { MemoryStore, SqliteStore };

export function getStore(config: StorageConfig): Store {
    switch (config.kind) {
        case "sqlite":
            return new SqliteStore(config.dbPath);
        case "memory":
        default:
            return new MemoryStore();
    }
}
