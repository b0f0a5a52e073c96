/**
 * Outcome types shared by every core operation.
 */

import type { Logger } from "./logger";

export type ErrorKind =
    | "AgentNotFound"
    | "RegistrationError"
    | "CertificateNotFound"
    | "AlreadyRevoked"
    | "ValidationFailed"
    | "SubmissionNotFound"
    | "RetryLimitExceeded"
    | "HandlerFailure"
    | "StoreFailure"
    | "InvalidRequest";

export interface Success<T> {
    success: true;
    message: string;
    value: T;
}

export interface Failure {
    success: false;
    error: ErrorKind;
    message: string;
    /** Identifiers of rows that were written before the failure */
    details?: Record<string, string | number>;
}

export type Result<T> = Success<T> | Failure;

/**
 * Raised inside a store transaction for an expected, typed failure.
 * Operations catch it at their boundary and turn it into a {@link Failure}.
 */
export class CoreError extends Error {
    constructor(public kind: ErrorKind, message: string) {
        super(message);
        this.name = "CoreError";
    }
}

export function ok<T>(value: T, message: string): Success<T> {
    return { success: true, message, value };
}

export function fail(error: ErrorKind, message: string, details?: Record<string, string | number>): Failure {
    return details ? { success: false, error, message, details } : { success: false, error, message };
}

export function errorMessage(err: unknown): string {
    return err instanceof Error ? err.message : String(err);
}

/**
 * Maps a caught exception to a failure. A {@link CoreError} keeps its kind and
 * message; anything else is reported as `fallback` with `prefix` prepended.
 */
export function toFailure(err: unknown, fallback: ErrorKind, prefix: string): Failure {
    if (err instanceof CoreError) {
        return fail(err.kind, err.message);
    }
    return fail(fallback, `${prefix}: ${errorMessage(err)}`);
}

/**
 * {@link toFailure}, logged: expected failures as warnings, anything else as
 * an error with the original exception attached.
 */
export function logFailure(logger: Logger, err: unknown, fallback: ErrorKind, prefix: string): Failure {
    const failure = toFailure(err, fallback, prefix);
    if (err instanceof CoreError) {
        logger.warn(failure.message);
    } else {
        logger.error(failure.message, err);
    }
    return failure;
}
