import { isLogLevel } from "../core/logger/logger";
import type { ConfigEnv, DefineConfigInput, MedialinkConfig } from "./types";

export const LIBRARY_PATH_ENV = "MEDIALINK_LIBVLC_PATH";
export const LOG_LEVEL_ENV = "MEDIALINK_LOG_LEVEL";

function fail(message: string): never {
    throw new Error(`[medialink] defineConfig: ${message}`);
}

export function defineConfig(input: DefineConfigInput = {}): MedialinkConfig {
    const libraryPath = input.libraryPath?.trim() ?? "";
    if (input.libraryPath !== undefined && libraryPath === "") {
        fail("libraryPath must not be empty");
    }

    const args = input.args ?? [];
    const seen = new Set<string>();
    for (const arg of args) {
        if (arg.trim() === "") fail("args must not contain empty entries");
        if (seen.has(arg)) fail(`duplicate argument "${arg}"`);
        seen.add(arg);
    }

    const logLevel = input.logLevel ?? "warn";
    if (!isLogLevel(logLevel)) fail(`unknown log level "${logLevel}"`);

    if (input.userAgent && input.userAgent.name.trim() === "") {
        fail("userAgent.name must not be empty");
    }
    if (input.appId && input.appId.id.trim() === "") {
        fail("appId.id must not be empty");
    }

    return {
        libraryPath: libraryPath === "" ? null : libraryPath,
        args: [...args],
        logLevel,
        userAgent: input.userAgent ?? null,
        appId: input.appId ?? null,
    };
}

/**
 * Overlay environment settings on a config: `MEDIALINK_LIBVLC_PATH` replaces
 * the library path, `MEDIALINK_LOG_LEVEL` the log level. Blank variables are
 * ignored.
 */
export function resolveConfig(config: MedialinkConfig, env: ConfigEnv = process.env): MedialinkConfig {
    const path = env[LIBRARY_PATH_ENV]?.trim();
    const level = env[LOG_LEVEL_ENV]?.trim().toLowerCase();
    let logLevel = config.logLevel;
    if (level) {
        if (!isLogLevel(level)) {
            throw new Error(`[medialink] resolveConfig: ${LOG_LEVEL_ENV} has unknown log level "${level}"`);
        }
        logLevel = level;
    }
    return {
        ...config,
        libraryPath: path ? path : config.libraryPath,
        logLevel,
    };
}
