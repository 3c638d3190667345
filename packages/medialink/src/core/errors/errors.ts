import type { EventType } from "../native/enums";

export type MedialinkErrorCode =
    | "ERR_LIBRARY_LOAD"
    | "ERR_CONSTRUCTION"
    | "ERR_ATTACH"
    | "ERR_INVALID_HANDLE"
    | "ERR_LISTENER";

export class MedialinkError extends Error {
    constructor(
        readonly code: MedialinkErrorCode,
        message: string,
        options?: { cause?: unknown },
    ) {
        super(message, options);
        this.name = new.target.name;
    }
}

/** The native shared library could not be opened or lacks an expected symbol. */
export class LibraryLoadError extends MedialinkError {
    constructor(
        readonly path: string,
        cause: unknown,
    ) {
        const reason = cause instanceof Error ? cause.message : String(cause);
        super("ERR_LIBRARY_LOAD", `Could not load the native media library from "${path}": ${reason}`, { cause });
    }
}

/** A native create call returned a null handle. */
export class ConstructionError extends MedialinkError {
    constructor(readonly kind: string) {
        super("ERR_CONSTRUCTION", `Failed to create the native ${kind}`);
    }
}

/** The native library refused to attach the trampoline for an event kind. */
export class AttachError extends MedialinkError {
    constructor(
        readonly owner: string,
        readonly eventType: EventType,
        readonly eventName: string,
        readonly status: number,
    ) {
        super("ERR_ATTACH", `"${owner}" could not attach to "${eventName}" (native status ${status})`);
    }
}

/** Contract violation: an empty handle, a disposed event manager, or a copy of an unshared handle kind. */
export class InvalidHandleError extends MedialinkError {
    constructor(message: string) {
        super("ERR_INVALID_HANDLE", message);
    }
}

/** A listener threw while an event was being dispatched. Only ever delivered out-of-band. */
export class ListenerError extends MedialinkError {
    constructor(
        readonly owner: string,
        readonly eventType: EventType,
        readonly eventName: string,
        cause: unknown,
    ) {
        const reason = cause instanceof Error ? cause.message : String(cause);
        super("ERR_LISTENER", `Listener for "${eventName}" on "${owner}" threw: ${reason}`, { cause });
    }
}
