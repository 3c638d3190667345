import type { LogEntry, LoggerContext, LogHandler, LogLevel } from "./types";

const LEVEL_RANK: Record<LogLevel, number> = {
    debug: 0,
    info: 1,
    warn: 2,
    error: 3,
};

export function isLogLevel(value: string): value is LogLevel {
    return Object.hasOwn(LEVEL_RANK, value);
}

export class Logger implements LoggerContext {
    private readonly handlers: Set<LogHandler> = new Set();
    private minLevel: LogLevel;

    constructor(level: LogLevel = "debug") {
        this.minLevel = level;
    }

    get level(): LogLevel {
        return this.minLevel;
    }

    setLevel(level: LogLevel): void {
        this.minLevel = level;
    }

    addHandler(handler: LogHandler): void {
        this.handlers.add(handler);
    }

    removeHandler(handler: LogHandler): void {
        this.handlers.delete(handler);
    }

    debug(code: string, message: string, details?: Record<string, unknown>): void {
        this.emit("debug", code, message, details);
    }

    info(code: string, message: string, details?: Record<string, unknown>): void {
        this.emit("info", code, message, details);
    }

    warn(code: string, message: string, details?: Record<string, unknown>): void {
        this.emit("warn", code, message, details);
    }

    error(code: string, message: string, details?: Record<string, unknown>): void {
        this.emit("error", code, message, details);
    }

    private emit(level: LogLevel, code: string, message: string, details?: Record<string, unknown>): void {
        if (LEVEL_RANK[level] < LEVEL_RANK[this.minLevel]) return;
        const entry: LogEntry = { level, code, message, details, timestamp: Date.now() };
        for (const handler of this.handlers) {
            try {
                handler(entry);
            } catch (err) {
                reportSinkFailure(err);
            }
        }
    }
}

/** A log sink that throws is reported as a process warning; it never fails the caller. */
function reportSinkFailure(err: unknown): void {
    const reason = err instanceof Error ? err.message : String(err);
    process.emitWarning(`log handler threw: ${reason}`, "MedialinkLogWarning");
}

/**
 * Wrap `logger` so that none of its methods can throw. Used where a log call
 * sits on a path back into native code.
 */
export function guardLogger(logger: LoggerContext): LoggerContext {
    const guard =
        (method: keyof LoggerContext) =>
        (code: string, message: string, details?: Record<string, unknown>): void => {
            try {
                logger[method](code, message, details);
            } catch (err) {
                reportSinkFailure(err);
            }
        };
    return {
        debug: guard("debug"),
        info: guard("info"),
        warn: guard("warn"),
        error: guard("error"),
    };
}

/** Logger that drops everything. Default for components constructed without one. */
export const silentLogger: LoggerContext = {
    debug() {},
    info() {},
    warn() {},
    error() {},
};
