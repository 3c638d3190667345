import {
    type ConfigEnv,
    createConsoleHandler,
    createInstance,
    defineConfig,
    type Instance,
    type ListenerErrorHandler,
    Logger,
    type MedialinkConfig,
    type NativeLibrary,
    resolveConfig,
} from "@medialink/core";
import { type LoadLibvlcOptions, loadLibvlc } from "./library";
import { type LocateOptions, locateLibrary } from "./locate";

export type OpenMedialinkOptions = {
    /** Defaults to `process.env`. */
    env?: ConfigEnv;
    /** Defaults to a console logger at the configured level. */
    logger?: Logger;
    locate?: LocateOptions;
    load?: (path: string, options: LoadLibvlcOptions) => NativeLibrary;
    onListenerError?: ListenerErrorHandler;
};

export type MedialinkSession = {
    readonly config: MedialinkConfig;
    readonly logger: Logger;
    readonly library: NativeLibrary;
    readonly instance: Instance;
    /** Releases the session's instance. Copies taken from it stay valid. */
    close(): void;
};

/**
 * Resolve `config` against the environment, load the native library and
 * create a configured instance from it.
 */
export function openMedialink(
    config: MedialinkConfig = defineConfig(),
    options: OpenMedialinkOptions = {},
): MedialinkSession {
    const resolved = resolveConfig(config, options.env);
    const logger = options.logger ?? createDefaultLogger(resolved);
    const path = locateLibrary(resolved.libraryPath, options.locate);
    const library = (options.load ?? loadLibvlc)(path, { logger });
    logger.info("Library", "loaded", { path });

    const instance = createInstance(library, resolved, { logger, onListenerError: options.onListenerError });
    return {
        config: resolved,
        logger,
        library,
        instance,
        close: () => instance.release(),
    };
}

function createDefaultLogger(config: MedialinkConfig): Logger {
    const logger = new Logger(config.logLevel);
    logger.addHandler(createConsoleHandler());
    return logger;
}
