import { CallbackSlot, guardNativeCallback } from "../core/global-slot/global-slot";
import { HandleBox } from "../core/handle/handle";
import { silentLogger } from "../core/logger/logger";
import type { LoggerContext, LogLevel } from "../core/logger/types";
import { NativeLogLevel } from "../core/native/enums";
import type {
    AudioOutputDescription,
    AudioOutputDeviceDescription,
    InstancePtr,
    ModuleDescription,
    NativeLibrary,
    NativeLogCallback,
} from "../core/native/types";
import { handleKinds } from "./kinds";
import { OwnerGroup, Resource, type ResourceOptions } from "./resource";

type InstanceState = {
    exitHandler: CallbackSlot<() => void>;
    log: CallbackSlot<NativeLogCallback>;
};

const NATIVE_LOG_LEVELS: Record<NativeLogLevel, LogLevel> = {
    [NativeLogLevel.Debug]: "debug",
    [NativeLogLevel.Notice]: "info",
    [NativeLogLevel.Warning]: "warn",
    [NativeLogLevel.Error]: "error",
};

/** Native log sink that re-emits every message through `logger`, code `native` or `native:<module>`. */
export function createNativeLogForwarder(logger: LoggerContext): NativeLogCallback {
    return ({ level, message, module }) => {
        const code = module ? `native:${module}` : "native";
        logger[NATIVE_LOG_LEVELS[level] ?? "debug"](code, message);
    };
}

/**
 * Handle on one native library instance. Every other resource is created from one.
 *
 * The exit handler and the log callback are single-slot native settings:
 * installing a new one replaces the previous one for every copy of this instance.
 */
export class Instance extends Resource<InstancePtr, InstanceState> {
    private constructor(
        lib: NativeLibrary,
        handle: HandleBox<InstancePtr>,
        group: OwnerGroup<InstanceState>,
        options: ResourceOptions,
    ) {
        super(lib, handle, group, options);
    }

    /**
     * Create and initialise a native instance. `args` are command-line style
     * options for the native library; unsupported ones make creation fail.
     * @throws ConstructionError when the native library refuses to create the instance.
     */
    static create(lib: NativeLibrary, args: readonly string[] = [], options: ResourceOptions = {}): Instance {
        const handle = HandleBox.adopt(handleKinds(lib).instance, lib.instanceNew(args));
        return new Instance(lib, handle, Instance.createGroup(lib, handle.get(), options), options);
    }

    /** Torn down before the last copy gives `ptr` back. */
    private static createGroup(
        lib: NativeLibrary,
        ptr: InstancePtr,
        options: ResourceOptions,
    ): OwnerGroup<InstanceState> {
        const logger = options.logger ?? silentLogger;
        const state: InstanceState = {
            exitHandler: new CallbackSlot<() => void>(
                "exit handler",
                {
                    install: (cb) => lib.setExitHandler(ptr, guardNativeCallback("exit handler", logger, cb)),
                    uninstall: () => lib.setExitHandler(ptr, null),
                },
                logger,
            ),
            log: new CallbackSlot<NativeLogCallback>(
                "log callback",
                {
                    install: (cb) => lib.logSet(ptr, guardNativeCallback("log callback", logger, cb)),
                    uninstall: () => lib.logUnset(ptr),
                },
                logger,
            ),
        };
        return new OwnerGroup(state).onLastRelease(({ exitHandler, log }) => {
            exitHandler.uninstall();
            log.uninstall();
        });
    }

    /** Options handed to every resource created from this instance. */
    get resourceOptions(): ResourceOptions {
        return this.options;
    }

    /** @internal Raw pointer for sibling facades. */
    get nativePtr(): InstancePtr {
        return this.ptr;
    }

    /** @internal */
    get library(): NativeLibrary {
        return this.lib;
    }

    /** A second owning reference to the same native instance. */
    clone(): Instance {
        return new Instance(this.lib, this.handle.clone(), this.group.join(), this.options);
    }

    /** Try to start a user interface; `null` for the default one. */
    addIntf(name: string | null = null): boolean {
        return this.lib.addIntf(this.ptr, name) === 0;
    }

    /** Sets the application name and HTTP user agent used when a protocol asks for one. */
    setUserAgent(name: string, http: string): void {
        this.lib.setUserAgent(this.ptr, name, http);
    }

    setAppId(id: string, version: string, icon: string): void {
        this.lib.setAppId(this.ptr, id, version, icon);
    }

    /**
     * Install (or, with `null`, remove) the callback invoked when the native
     * library wants to exit. It may run on a native thread's behalf.
     */
    setExitHandler(handler: (() => void) | null): void {
        if (handler === null) {
            this.group.state.exitHandler.uninstall();
        } else {
            this.group.state.exitHandler.install(handler);
        }
    }

    /** Replace the native log callback. Must not be called from inside that callback. */
    logSet(callback: NativeLogCallback): void {
        this.group.state.log.install(callback);
    }

    /** Remove the native log callback. No-op when none is installed. */
    logUnset(): void {
        this.group.state.log.uninstall();
    }

    /** Route native log messages into `logger`; replaces any installed log callback. */
    forwardLogsTo(logger: LoggerContext): void {
        this.logSet(createNativeLogForwarder(logger));
    }

    audioFilterList(): ModuleDescription[] {
        return this.lib.audioFilterList(this.ptr) ?? [];
    }

    videoFilterList(): ModuleDescription[] {
        return this.lib.videoFilterList(this.ptr) ?? [];
    }

    audioOutputList(): AudioOutputDescription[] {
        return this.lib.audioOutputList(this.ptr) ?? [];
    }

    /**
     * Devices of one audio output module. An empty list does not mean the
     * output is unusable; the list may not be exhaustive.
     */
    audioOutputDeviceList(aout: string): AudioOutputDeviceDescription[] {
        return this.lib.audioOutputDeviceList(this.ptr, aout) ?? [];
    }
}
