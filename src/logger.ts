/**
 * Scoped console logger. Lines are prefixed with `[Scope]`; debug lines are
 * only written when the logger was created with `debug: true`.
 */
export interface Logger {
    debug(message: string, ...args: unknown[]): void;
    info(message: string, ...args: unknown[]): void;
    warn(message: string, ...args: unknown[]): void;
    error(message: string, ...args: unknown[]): void;
    /** Returns a logger for a sub-scope, e.g. `[Gateway:Authority]` */
    child(scope: string): Logger;
}

export interface LoggerOptions {
    debug?: boolean;
    silent?: boolean;
}

export function createLogger(scope: string, options: LoggerOptions = {}): Logger {
    const prefix = `[${scope}]`;
    const silent = options.silent === true;
    const debug = options.debug === true && !silent;

    return {
        debug(message, ...args) {
            if (debug) console.log(`${prefix} ${message}`, ...args);
        },
        info(message, ...args) {
            if (!silent) console.log(`${prefix} ${message}`, ...args);
        },
        warn(message, ...args) {
            if (!silent) console.warn(`${prefix} ${message}`, ...args);
        },
        error(message, ...args) {
            if (!silent) console.error(`${prefix} ${message}`, ...args);
        },
        child(childScope) {
            return createLogger(`${scope}:${childScope}`, options);
        },
    };
}

export const silentLogger: Logger = createLogger("silent", { silent: true });
