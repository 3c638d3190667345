import type { ListenerError } from "../errors/errors";
import type { LoggerContext } from "../logger/types";
import type { EventType } from "../native/enums";
import type { EventManagerPtr, EventOf, NativeLibrary } from "../native/types";

export type EventListener<K extends EventType> = (event: EventOf<K>) => void;

/** Registration token returned by `subscribe`. */
export interface Subscription<K extends EventType = EventType> {
    readonly id: number;
    readonly kind: K;
    /** Same as `manager.unsubscribe(this)`. */
    unsubscribe(): boolean;
}

export type ListenerErrorHandler = (error: ListenerError) => void;

export type EventManagerOptions = {
    lib: NativeLibrary;
    /** Native event manager of the parent object. Lives exactly as long as the parent. */
    handle: EventManagerPtr;
    /** Owner label for logs and errors, e.g. `"media"`. */
    name: string;
    logger?: LoggerContext;
    /** Out-of-band channel for listener failures. They are always logged as well. */
    onListenerError?: ListenerErrorHandler;
};

export type WaitForEventOptions<K extends EventType> = {
    /** Reject with es-toolkit's `TimeoutError` after this many milliseconds. */
    timeoutMs?: number;
    /** Only settle on events this predicate accepts. */
    filter?: (event: EventOf<K>) => boolean;
};
