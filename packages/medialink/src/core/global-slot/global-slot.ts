import { guardLogger, silentLogger } from "../logger/logger";
import type { LoggerContext } from "../logger/types";

/**
 * Single-occupant holder for a process-wide native callback (log sink, exit
 * handler). The native side accepts one such callback at a time, so a second
 * `install` replaces the first; subscribers do not compose.
 */
export class CallbackSlot<TCallback> {
    private occupant: TCallback | null = null;

    constructor(
        private readonly name: string,
        private readonly hooks: {
            install: (callback: TCallback) => void;
            uninstall: () => void;
        },
        private readonly logger: LoggerContext = silentLogger,
    ) {}

    get installed(): boolean {
        return this.occupant !== null;
    }

    install(callback: TCallback): void {
        if (this.occupant !== null) {
            this.logger.warn("CallbackSlot", `${this.name}: replacing the installed callback`);
        }
        this.hooks.install(callback);
        this.occupant = callback;
    }

    /** No-op when nothing is installed. */
    uninstall(): void {
        if (this.occupant === null) return;
        this.hooks.uninstall();
        this.occupant = null;
    }
}

/**
 * Wrap a callback the native library will invoke so that nothing it throws
 * unwinds into native frames. Failures go to the logger.
 */
export function guardNativeCallback<TArgs extends unknown[]>(
    name: string,
    logger: LoggerContext,
    callback: (...args: TArgs) => void,
): (...args: TArgs) => void {
    const safeLogger = guardLogger(logger);
    return (...args) => {
        try {
            callback(...args);
        } catch (err) {
            safeLogger.error("CallbackSlot", `${name} threw`, { error: err });
        }
    };
}
