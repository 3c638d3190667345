// ── Config ──────────────────────────────────────────────────────────
export { defineConfig, LIBRARY_PATH_ENV, LOG_LEVEL_ENV, resolveConfig } from "./config/define-config";
export type { AppIdConfig, ConfigEnv, DefineConfigInput, MedialinkConfig, UserAgentConfig } from "./config/types";
// ── Errors ──────────────────────────────────────────────────────────
export {
    AttachError,
    ConstructionError,
    InvalidHandleError,
    LibraryLoadError,
    ListenerError,
    MedialinkError,
} from "./core/errors/errors";
export type { MedialinkErrorCode } from "./core/errors/errors";
// ── Logger ──────────────────────────────────────────────────────────
export { createConsoleHandler, formatEntry } from "./core/logger/console-handler";
export { guardLogger, isLogLevel, Logger, silentLogger } from "./core/logger/logger";
export type { LogEntry, LoggerContext, LogHandler, LogLevel } from "./core/logger/types";
// ── Native contract ─────────────────────────────────────────────────
export {
    EventType,
    MediaOptionFlag,
    MediaState,
    MetaType,
    NativeLogLevel,
    ParsedStatus,
    TrackType,
} from "./core/native/enums";
export type * from "./core/native/types";
// ── Handles ─────────────────────────────────────────────────────────
export { HandleBox } from "./core/handle/handle";
export { acquireExisting, acquireNew, defineHandleKind } from "./core/handle/helpers";
export type { HandleKind } from "./core/handle/types";
// ── Events ──────────────────────────────────────────────────────────
export { EventManager } from "./core/event-manager/event-manager";
export { waitForEvent } from "./core/event-manager/helpers";
export type {
    EventListener,
    EventManagerOptions,
    ListenerErrorHandler,
    Subscription,
    WaitForEventOptions,
} from "./core/event-manager/types";
// ── Lifecycle & global callbacks ────────────────────────────────────
export { Lifecycle } from "./core/lifecycle/lifecycle";
export type { LifecycleConfig } from "./core/lifecycle/types";
export { CallbackSlot, guardNativeCallback } from "./core/global-slot/global-slot";
// ── Resources ───────────────────────────────────────────────────────
export { createInstance } from "./resources/helpers";
export type { CreateInstanceOptions } from "./resources/helpers";
export { createNativeLogForwarder, Instance } from "./resources/instance";
export { Media, MediaSource } from "./resources/media";
export { MediaEventManager } from "./resources/media-events";
export type { BorrowMedia, MediaEventType } from "./resources/media-events";
export { MediaDiscoverer } from "./resources/media-discoverer";
export { MediaDiscovererEventManager } from "./resources/media-discoverer-events";
export type { MediaDiscovererEventType } from "./resources/media-discoverer-events";
export { MediaList } from "./resources/media-list";
export { MediaListEventManager } from "./resources/media-list-events";
export type { MediaListEventType } from "./resources/media-list-events";
export { OwnerGroup, Resource } from "./resources/resource";
export type { ResourceOptions } from "./resources/resource";
