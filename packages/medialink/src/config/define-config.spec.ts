import { describe, expect, it } from "vitest";
import { defineConfig, resolveConfig } from "./define-config";

describe("defineConfig()", () => {
    it("fills defaults", () => {
        expect(defineConfig()).toEqual({
            libraryPath: null,
            args: [],
            logLevel: "warn",
            userAgent: null,
            appId: null,
        });
    });

    it("keeps provided values and trims the library path", () => {
        const config = defineConfig({
            libraryPath: "  /opt/vlc/lib/libvlc.so.5 ",
            args: ["--no-video", "--quiet"],
            logLevel: "debug",
        });
        expect(config.libraryPath).toBe("/opt/vlc/lib/libvlc.so.5");
        expect(config.args).toEqual(["--no-video", "--quiet"]);
        expect(config.logLevel).toBe("debug");
    });

    it("copies args so later changes do not leak in", () => {
        const args = ["--quiet"];
        const config = defineConfig({ args });
        args.push("--no-video");
        expect(config.args).toEqual(["--quiet"]);
    });

    it("throws on an empty library path", () => {
        expect(() => defineConfig({ libraryPath: "  " })).toThrow(
            "[medialink] defineConfig: libraryPath must not be empty",
        );
    });

    it("throws on duplicate or empty args", () => {
        expect(() => defineConfig({ args: ["--quiet", "--quiet"] })).toThrow('duplicate argument "--quiet"');
        expect(() => defineConfig({ args: [""] })).toThrow("args must not contain empty entries");
    });

    it("throws on blank identity fields", () => {
        const userAgent = { name: "", http: "x/1" };
        const appId = { id: " ", version: "1", icon: "i" };
        expect(() => defineConfig({ userAgent })).toThrow("userAgent.name must not be empty");
        expect(() => defineConfig({ appId })).toThrow("appId.id must not be empty");
    });
});

describe("resolveConfig()", () => {
    const base = defineConfig({ libraryPath: "/usr/lib/libvlc.so.5", logLevel: "info" });

    it("returns the config unchanged without env overrides", () => {
        expect(resolveConfig(base, {})).toEqual(base);
    });

    it("overlays the library path and log level from env", () => {
        const resolved = resolveConfig(base, {
            MEDIALINK_LIBVLC_PATH: "/opt/vlc/libvlc.so",
            MEDIALINK_LOG_LEVEL: "ERROR",
        });
        expect(resolved.libraryPath).toBe("/opt/vlc/libvlc.so");
        expect(resolved.logLevel).toBe("error");
        expect(base.logLevel).toBe("info");
    });

    it("ignores blank variables", () => {
        const resolved = resolveConfig(base, { MEDIALINK_LIBVLC_PATH: " ", MEDIALINK_LOG_LEVEL: "" });
        expect(resolved).toEqual(base);
    });

    it("throws on an unknown log level", () => {
        expect(() => resolveConfig(base, { MEDIALINK_LOG_LEVEL: "loud" })).toThrow(
            '[medialink] resolveConfig: MEDIALINK_LOG_LEVEL has unknown log level "loud"',
        );
    });
});
