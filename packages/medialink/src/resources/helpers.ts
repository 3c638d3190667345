import type { MedialinkConfig } from "../config/types";
import type { ListenerErrorHandler } from "../core/event-manager/types";
import type { LoggerContext } from "../core/logger/types";
import type { NativeLibrary } from "../core/native/types";
import { Instance } from "./instance";

export type CreateInstanceOptions = {
    logger?: LoggerContext;
    onListenerError?: ListenerErrorHandler;
    /** Forward native log messages into `logger`. Defaults to true when a logger is given. */
    forwardNativeLogs?: boolean;
};

/** Build an {@link Instance} from a resolved config and apply its identity settings. */
export function createInstance(
    lib: NativeLibrary,
    config: MedialinkConfig,
    options: CreateInstanceOptions = {},
): Instance {
    const { logger, onListenerError } = options;
    const instance = Instance.create(lib, config.args, { logger, onListenerError });
    if (config.userAgent) {
        instance.setUserAgent(config.userAgent.name, config.userAgent.http);
    }
    if (config.appId) {
        instance.setAppId(config.appId.id, config.appId.version, config.appId.icon);
    }
    if (logger && (options.forwardNativeLogs ?? true)) {
        instance.forwardLogsTo(logger);
    }
    logger?.debug("Instance", "created", { args: [...config.args] });
    return instance;
}
