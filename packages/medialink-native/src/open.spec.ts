/**
 * Contract: openMedialink
 *
 * - The environment overrides the configured library path and log level
 * - The located path is handed to the loader together with the logger
 * - The instance is built from the resolved config
 * - close() releases the instance
 */
import { defineConfig, NativeLogLevel } from "@medialink/core";
import { createRecordingLogger, FakeNativeLibrary } from "@medialink/core/testing";
import { describe, expect, it, vi } from "vitest";
import { openMedialink } from "./open";

describe("openMedialink()", () => {
    it("loads the library named by the environment", () => {
        const lib = new FakeNativeLibrary();
        const load = vi.fn(() => lib);
        const { logger } = createRecordingLogger();

        const session = openMedialink(defineConfig({ libraryPath: "/opt/a/libvlc.so.5" }), {
            env: { MEDIALINK_LIBVLC_PATH: "/opt/b/libvlc.so.5" },
            logger,
            load,
        });

        expect(load).toHaveBeenCalledWith("/opt/b/libvlc.so.5", { logger });
        expect(session.config.libraryPath).toBe("/opt/b/libvlc.so.5");
        expect(session.library).toBe(lib);
    });

    it("searches the install locations when no path is configured", () => {
        const load = vi.fn(() => new FakeNativeLibrary());
        const { logger } = createRecordingLogger();

        openMedialink(defineConfig(), {
            env: {},
            logger,
            load,
            locate: { platform: "darwin", exists: (candidate) => candidate.startsWith("/opt/homebrew/") },
        });

        expect(load).toHaveBeenCalledWith("/opt/homebrew/lib/libvlc.dylib", { logger });
    });

    it("creates a configured instance and forwards native logs", () => {
        const lib = new FakeNativeLibrary();
        const { logger, entries } = createRecordingLogger();

        const session = openMedialink(
            defineConfig({ args: ["--no-video"], userAgent: { name: "Shelf 1.0", http: "Shelf/1.0" } }),
            { env: {}, logger, load: () => lib, locate: { platform: "linux", exists: () => false } },
        );
        const fake = lib.instance(session.instance.nativePtr);
        lib.log(fake, { level: NativeLogLevel.Warning, message: "slow disk", module: null });

        expect(fake.args).toEqual(["--no-video"]);
        expect(fake.userAgent).toEqual({ name: "Shelf 1.0", http: "Shelf/1.0" });
        expect(entries.map((e) => [e.level, e.code, e.message])).toEqual([
            ["info", "Library", "loaded"],
            ["debug", "Instance", "created"],
            ["warn", "native", "slow disk"],
        ]);
        expect(entries[0]?.details).toEqual({ path: "libvlc.so.5" });
    });

    it("applies the environment log level to the default logger", () => {
        const session = openMedialink(defineConfig(), {
            env: { MEDIALINK_LOG_LEVEL: "ERROR" },
            load: () => new FakeNativeLibrary(),
            locate: { platform: "linux", exists: () => false },
        });

        expect(session.logger.level).toBe("error");
        session.close();
    });

    it("releases the instance on close", () => {
        const lib = new FakeNativeLibrary();
        const { logger } = createRecordingLogger();
        const session = openMedialink(defineConfig(), { env: {}, logger, load: () => lib });
        const fake = lib.instance(session.instance.nativePtr);

        session.close();

        expect(fake.alive).toBe(false);
        expect(fake.logCallback).toBeNull();
    });
});
