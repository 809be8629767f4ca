/**
 * Logger.ts
 * The logging seam used by the protocol layer.
 *
 * The library never writes to the console on its own: callers pass a Logger
 * or get the silent one.
 */
import pino from 'pino';

export interface Logger {
    error(message: string): void;
    warn(message: string): void;
    info(message: string): void;
    debug(message: string): void;
    /** Word-level wire tracing */
    trace(message: string): void;
}

const noop = (): void => undefined;

export const silentLogger: Logger = {
    error: noop,
    warn: noop,
    info: noop,
    debug: noop,
    trace: noop
};

/**
 * Maps a repeat count of `-v` to a pino level.
 * 0 → info, 1 → debug, 2 or more → trace.
 */
export function levelForVerbosity(verbosity: number): 'info' | 'debug' | 'trace' {
    if (verbosity >= 2) return 'trace';
    if (verbosity === 1) return 'debug';
    return 'info';
}

/**
 * Creates the CLI logger. Output goes to stderr so stdout stays free for results.
 */
export function createLogger(name: string, verbosity: number = 0): Logger {
    const log = pino({ name, level: levelForVerbosity(verbosity) }, pino.destination(2));

    return {
        error: (message) => log.error(message),
        warn: (message) => log.warn(message),
        info: (message) => log.info(message),
        debug: (message) => log.debug(message),
        trace: (message) => log.trace(message)
    };
}
