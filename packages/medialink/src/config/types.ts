import type { LogLevel } from "../core/logger/types";

export interface UserAgentConfig {
    /** Human-readable application name, e.g. `"Media Shelf 1.2"`. */
    readonly name: string;
    /** HTTP user agent, e.g. `"MediaShelf/1.2"`. */
    readonly http: string;
}

export interface AppIdConfig {
    /** Reverse-DNS identifier, e.g. `"org.example.shelf"`. */
    readonly id: string;
    readonly version: string;
    /** Icon name as the desktop environment knows it. */
    readonly icon: string;
}

export interface MedialinkConfig {
    /** Explicit path to the native shared library. `null` means search for it. */
    readonly libraryPath: string | null;
    /** Command-line style options for the native instance. */
    readonly args: readonly string[];
    readonly logLevel: LogLevel;
    readonly userAgent: UserAgentConfig | null;
    readonly appId: AppIdConfig | null;
}

export interface DefineConfigInput {
    libraryPath?: string;
    args?: readonly string[];
    logLevel?: LogLevel;
    userAgent?: UserAgentConfig;
    appId?: AppIdConfig;
}

/** Environment variables read by {@link resolveConfig}. */
export type ConfigEnv = Readonly<Record<string, string | undefined>>;
