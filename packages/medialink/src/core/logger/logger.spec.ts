/**
 * Contract: Logger -- leveled logging with pluggable handlers.
 *
 * Sections:
 *   1. Handler management
 *   2. Logging methods
 *   3. Level filter
 *   4. Entry shape
 *   5. Console handler formatting
 *   6. Sink failures
 */
import { describe, expect, it, vi } from "vitest";
import { createConsoleHandler, formatEntry } from "./console-handler";
import { guardLogger, isLogLevel, Logger } from "./logger";
import type { LogEntry, LoggerContext } from "./types";

function capture(logger: Logger): LogEntry[] {
    const entries: LogEntry[] = [];
    logger.addHandler((entry) => entries.push(entry));
    return entries;
}

describe("Logger", () => {
    // -- 1. Handler management --
    describe("Handler management", () => {
        it("addHandler registers a handler that receives entries", () => {
            const logger = new Logger();
            const handler = vi.fn();
            logger.addHandler(handler);
            logger.debug("test", "hello");
            expect(handler).toHaveBeenCalledOnce();
        });

        it("removeHandler stops the handler from receiving entries", () => {
            const logger = new Logger();
            const handler = vi.fn();
            logger.addHandler(handler);
            logger.removeHandler(handler);
            logger.debug("test", "hello");
            expect(handler).not.toHaveBeenCalled();
        });

        it("fans out to multiple handlers", () => {
            const logger = new Logger();
            const a = vi.fn();
            const b = vi.fn();
            logger.addHandler(a);
            logger.addHandler(b);
            logger.info("test", "hello");
            expect(a).toHaveBeenCalledOnce();
            expect(b).toHaveBeenCalledOnce();
        });

        it("no handlers means no error (silent)", () => {
            const logger = new Logger();
            expect(() => logger.error("test", "hello")).not.toThrow();
        });
    });

    // -- 2. Logging methods --
    describe("Logging methods", () => {
        it.each([
            ["debug", (l: Logger) => l.debug("EventManager", "attached")],
            ["info", (l: Logger) => l.info("EventManager", "attached")],
            ["warn", (l: Logger) => l.warn("EventManager", "attached")],
            ["error", (l: Logger) => l.error("EventManager", "attached")],
        ])("%s() emits an entry with that level", (level, log) => {
            const logger = new Logger();
            const entries = capture(logger);
            log(logger);
            expect(entries).toHaveLength(1);
            expect(entries[0]).toMatchObject({ level, code: "EventManager", message: "attached" });
        });
    });

    // -- 3. Level filter --
    describe("Level filter", () => {
        it("defaults to debug and lets everything through", () => {
            const logger = new Logger();
            const entries = capture(logger);
            logger.debug("a", "1");
            logger.info("a", "2");
            expect(logger.level).toBe("debug");
            expect(entries.map((e) => e.message)).toEqual(["1", "2"]);
        });

        it("drops entries below the minimum level", () => {
            const logger = new Logger("warn");
            const entries = capture(logger);
            logger.debug("a", "1");
            logger.info("a", "2");
            logger.warn("a", "3");
            logger.error("a", "4");
            expect(entries.map((e) => e.message)).toEqual(["3", "4"]);
        });

        it("setLevel changes the filter for later entries", () => {
            const logger = new Logger("error");
            const entries = capture(logger);
            logger.info("a", "dropped");
            logger.setLevel("info");
            logger.info("a", "kept");
            expect(entries.map((e) => e.message)).toEqual(["kept"]);
        });

        it("isLogLevel accepts only known levels", () => {
            expect(isLogLevel("warn")).toBe(true);
            expect(isLogLevel("verbose")).toBe(false);
            expect(isLogLevel("toString")).toBe(false);
        });
    });

    // -- 4. Entry shape --
    describe("Entry shape", () => {
        it("includes timestamp as a number", () => {
            const logger = new Logger();
            const entries = capture(logger);
            logger.debug("test", "msg");
            expect(typeof entries[0]?.timestamp).toBe("number");
        });

        it("details is undefined when not provided", () => {
            const logger = new Logger();
            const entries = capture(logger);
            logger.debug("test", "msg");
            expect(entries[0]?.details).toBeUndefined();
        });

        it("details is passed through when provided", () => {
            const logger = new Logger();
            const entries = capture(logger);
            logger.error("test", "msg", { key: "value" });
            expect(entries[0]?.details).toEqual({ key: "value" });
        });
    });

    // -- 5. Console handler --
    describe("Console handler (createConsoleHandler)", () => {
        const timestamp = new Date(2026, 0, 2, 3, 4, 5).getTime();

        it("formats time, tag, code and message on one line", () => {
            const line = formatEntry({ level: "info", code: "native:http", message: "connected", timestamp });
            expect(line).toBe("03:04:05 [info] native:http → connected");
        });

        it("tags debug entries with the library name", () => {
            const line = formatEntry({ level: "debug", code: "EventManager", message: "media: attached", timestamp });
            expect(line).toBe("03:04:05 [medialink] EventManager → media: attached");
        });

        it("appends colorized details", () => {
            const line = formatEntry({ level: "warn", code: "x", message: "y", details: { status: 200 }, timestamp });
            const pair = "\x1b[36mstatus\x1b[0m\x1b[90m:\x1b[0m \x1b[33m200\x1b[0m";
            const details = `\x1b[90m{\x1b[0m ${pair} \x1b[90m}\x1b[0m`;
            expect(line).toBe(`03:04:05 [warn] x → y ${details}`);
        });

        it("logs debug and info to console.log", () => {
            const spy = vi.spyOn(console, "log").mockImplementation(() => {});
            const handler = createConsoleHandler();
            handler({ level: "debug", code: "media", message: "ready", timestamp });
            handler({ level: "info", code: "media", message: "parsed", timestamp });
            expect(spy).toHaveBeenCalledTimes(2);
            expect(spy.mock.calls[0]?.[0]).toBe("03:04:05 [medialink] media → ready");
            spy.mockRestore();
        });

        it("logs warn to console.warn", () => {
            const spy = vi.spyOn(console, "warn").mockImplementation(() => {});
            const handler = createConsoleHandler();
            handler({ level: "warn", code: "CallbackSlot", message: "replaced", timestamp });
            expect(spy).toHaveBeenCalledOnce();
            expect(spy.mock.calls[0]?.[0]).toBe("03:04:05 [warn] CallbackSlot → replaced");
            spy.mockRestore();
        });

        it("logs error to console.error", () => {
            const spy = vi.spyOn(console, "error").mockImplementation(() => {});
            const handler = createConsoleHandler();
            handler({ level: "error", code: "EventManager", message: "listener threw", timestamp });
            expect(spy).toHaveBeenCalledOnce();
            expect(spy.mock.calls[0]?.[0]).toBe("03:04:05 [error] EventManager → listener threw");
            spy.mockRestore();
        });
    });

    // -- 6. Sink failures --
    describe("Sink failures", () => {
        it("a throwing handler does not stop later handlers or the caller", () => {
            const warning = vi.spyOn(process, "emitWarning").mockImplementation(() => {});
            const logger = new Logger();
            const after = vi.fn();
            logger.addHandler(() => {
                throw new Error("disk full");
            });
            logger.addHandler(after);

            expect(() => logger.error("EventManager", "listener threw")).not.toThrow();
            expect(after).toHaveBeenCalledOnce();
            expect(warning).toHaveBeenCalledWith("log handler threw: disk full", "MedialinkLogWarning");
            warning.mockRestore();
        });

        it("guardLogger keeps a throwing context from failing the caller", () => {
            const warning = vi.spyOn(process, "emitWarning").mockImplementation(() => {});
            const calls: string[] = [];
            const throwing: LoggerContext = {
                debug: (code) => calls.push(`debug ${code}`),
                info: (code) => calls.push(`info ${code}`),
                warn: (code) => calls.push(`warn ${code}`),
                error: () => {
                    throw "sink offline";
                },
            };
            const guarded = guardLogger(throwing);

            expect(() => guarded.error("Native", "event callback failed")).not.toThrow();
            guarded.warn("CallbackSlot", "replaced");

            expect(calls).toEqual(["warn CallbackSlot"]);
            expect(warning).toHaveBeenCalledWith("log handler threw: sink offline", "MedialinkLogWarning");
            warning.mockRestore();
        });
    });
});
