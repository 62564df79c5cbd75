/**
 * Tagged logging.
 *
 * Every subsystem logs through `createLogger('tag')`, producing lines like
 * `[server] client 3 disconnected`. Output goes to a sink (console by
 * default) and is filtered by a single process-wide level.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LEVEL_ORDER: Record<LogLevel, number> = {
    debug: 10,
    info: 20,
    warn: 30,
    error: 40,
    silent: 100
};

export interface LogSink {
    debug(message: string, ...details: unknown[]): void;
    info(message: string, ...details: unknown[]): void;
    warn(message: string, ...details: unknown[]): void;
    error(message: string, ...details: unknown[]): void;
}

export interface Logger {
    readonly tag: string;
    debug(message: string, ...details: unknown[]): void;
    info(message: string, ...details: unknown[]): void;
    warn(message: string, ...details: unknown[]): void;
    error(message: string, ...details: unknown[]): void;
    isEnabled(level: LogLevel): boolean;
}

let currentLevel: LogLevel = 'info';
let currentSink: LogSink = console;

export function setLogLevel(level: LogLevel): void {
    currentLevel = level;
}

export function getLogLevel(): LogLevel {
    return currentLevel;
}

/**
 * Replace the output sink. Returns the previous sink so callers (tests) can
 * restore it.
 */
export function setLogSink(sink: LogSink): LogSink {
    const previous = currentSink;
    currentSink = sink;
    return previous;
}

function enabled(level: LogLevel): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[currentLevel];
}

export function createLogger(tag: string): Logger {
    const prefix = `[${tag}]`;
    return {
        tag,
        debug(message, ...details) {
            if (enabled('debug')) currentSink.debug(`${prefix} ${message}`, ...details);
        },
        info(message, ...details) {
            if (enabled('info')) currentSink.info(`${prefix} ${message}`, ...details);
        },
        warn(message, ...details) {
            if (enabled('warn')) currentSink.warn(`${prefix} ${message}`, ...details);
        },
        error(message, ...details) {
            if (enabled('error')) currentSink.error(`${prefix} ${message}`, ...details);
        },
        isEnabled: enabled
    };
}
