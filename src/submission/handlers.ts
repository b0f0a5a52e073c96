import { randomUUID } from "node:crypto";
import { z } from "zod";
import type { Logger } from "../logger";
import type { AgentRecord, StoreTransaction } from "../storage/interface";
import { DATA_TYPES, type DataType } from "./interface";

export interface HandlerContext {
    tx: StoreTransaction;
    agent: AgentRecord;
    now: Date;
    logger: Logger;
}

export interface HandlerOutcome {
    /** Records skipped because they could not be ingested */
    rejected: number;
}

/**
 * Ingests one decoded payload inside the submission's transaction. Throwing
 * fails the whole submission and discards the handler's writes.
 */
export type SubmissionHandler = (payload: Buffer, ctx: HandlerContext) => HandlerOutcome;

const optionalText = z.string().nullish().transform((value) => value ?? null);

const DirectoryUserSchema = z.object({
    username: z.string().trim().min(1),
    email: optionalText,
    displayName: optionalText,
    firstName: optionalText,
    lastName: optionalText,
    department: optionalText,
    jobTitle: optionalText,
    manager: optionalText,
    isActive: z.boolean().default(true),
    objectSid: optionalText,
});

/**
 * Upserts directory users by username. Profile fields are overwritten on
 * every submission; users missing from a payload are left alone.
 */
const ingestUsers: SubmissionHandler = (payload, { tx, agent, now, logger }) => {
    const parsed: unknown = JSON.parse(payload.toString("utf-8"));
    if (parsed === null) {
        return { rejected: 0 };
    }
    if (!Array.isArray(parsed)) {
        throw new Error("Users payload must be a JSON array");
    }

    let rejected = 0;
    for (const item of parsed) {
        const result = DirectoryUserSchema.safeParse(item);
        if (!result.success) {
            rejected++;
            continue;
        }

        const user = result.data;
        const profile = {
            email: user.email,
            displayName: user.displayName,
            firstName: user.firstName,
            lastName: user.lastName,
            department: user.department,
            jobTitle: user.jobTitle,
            manager: user.manager,
            isActive: user.isActive,
        };

        const existing = tx.users.findByUsername(user.username);
        if (existing) {
            tx.users.update({ ...existing, ...profile, lastUpdated: now, source: agent.type });
        } else {
            tx.users.insert({
                id: randomUUID(),
                username: user.username,
                ...profile,
                createdAt: now,
                lastUpdated: null,
                source: agent.type,
                sourceId: user.objectSid,
            });
        }
    }

    if (rejected > 0) {
        logger.warn(`Skipped ${rejected} invalid user records`);
    }
    return { rejected };
};

// Collected by agents but not ingested yet.
const reserved: SubmissionHandler = () => ({ rejected: 0 });

export const HANDLERS: Record<DataType, SubmissionHandler> = {
    Users: ingestUsers,
    Groups: reserved,
    Policies: reserved,
    Events: reserved,
    LocalUsers: reserved,
    LocalGroups: reserved,
};

/** Case-insensitive lookup; null for a type no handler knows */
export function resolveDataType(name: string): DataType | null {
    const wanted = name.toLowerCase();
    return DATA_TYPES.find((type) => type.toLowerCase() === wanted) ?? null;
}
