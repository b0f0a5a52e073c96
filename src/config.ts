import { z } from "zod";

const booleanFlag = z
    .enum(["true", "false"])
    .default("false")
    .transform((value) => value === "true");

const EnvSchema = z.object({
    PORT: z.coerce.number().int().min(0).max(65535).default(9002),
    DEBUG: booleanFlag,
    REGISTRY_STORAGE: z.enum(["memory", "sqlite"]).default("memory"),
    REGISTRY_DB_PATH: z.string().min(1).default("registry.db"),
    AUTHORITY_MODE: z.enum(["self-signed", "root-ca"]).default("self-signed"),
    AUTHORITY_DATA_DIR: z.string().min(1).default(".authority"),
});

export type StorageKind = z.infer<typeof EnvSchema>["REGISTRY_STORAGE"];
export type AuthorityMode = z.infer<typeof EnvSchema>["AUTHORITY_MODE"];

export interface StorageConfig {
    kind: StorageKind;
    /** SQLite database file, ignored by the memory engine */
    dbPath: string;
}

export interface AuthorityConfig {
    mode: AuthorityMode;
    /** Directory holding the root CA key and certificate in `root-ca` mode */
    dataDir: string;
}

export interface ServiceConfig {
    port: number;
    debug: boolean;
    storage: StorageConfig;
    authority: AuthorityConfig;
}

export class ConfigError extends Error {
    constructor(public issues: string[]) {
        super(`Invalid configuration: ${issues.join("; ")}`);
        this.name = "ConfigError";
    }
}

export function loadConfig(env: Record<string, string | undefined> = process.env): ServiceConfig {
    const parsed = EnvSchema.safeParse(env);
    if (!parsed.success) {
        throw new ConfigError(parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`));
    }

    const vars = parsed.data;
    return {
        port: vars.PORT,
        debug: vars.DEBUG,
        storage: { kind: vars.REGISTRY_STORAGE, dbPath: vars.REGISTRY_DB_PATH },
        authority: { mode: vars.AUTHORITY_MODE, dataDir: vars.AUTHORITY_DATA_DIR },
    };
}
