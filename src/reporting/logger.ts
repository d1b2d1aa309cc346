/**
 * Console logger with a scope prefix. Debug lines are dropped unless
 * the debug flag is on.
 */

export interface Logger {
    debug(message: string, ...details: unknown[]): void;
    info(message: string, ...details: unknown[]): void;
    warn(message: string, ...details: unknown[]): void;
    error(message: string, ...details: unknown[]): void;
}

export interface LoggerOptions {
    debug: boolean;
}

export function createLogger(scope: string, options: LoggerOptions = { debug: false }): Logger {
    const prefix = `[${scope}]`;

    return {
        debug(message, ...details) {
            if (options.debug) {
                console.debug(prefix, message, ...details);
            }
        },
        info(message, ...details) {
            console.info(prefix, message, ...details);
        },
        warn(message, ...details) {
            console.warn(prefix, message, ...details);
        },
        error(message, ...details) {
            console.error(prefix, message, ...details);
        }
    };
}
