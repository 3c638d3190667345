import { AttachError, ListenerError } from "../errors/errors";
import { Lifecycle } from "../lifecycle/lifecycle";
import { guardLogger, silentLogger } from "../logger/logger";
import type { LoggerContext } from "../logger/types";
import type { EventType } from "../native/enums";
import type { EventManagerPtr, EventOf, NativeEvent, NativeEventCallback, NativeLibrary } from "../native/types";
import type { EventListener, EventManagerOptions, ListenerErrorHandler, Subscription } from "./types";

type ManagerState = "active" | "disposed";

const MANAGER_TRANSITIONS: Record<ManagerState, readonly ManagerState[]> = {
    active: ["disposed"],
    disposed: [],
};

type Registration = {
    readonly kind: EventType;
    readonly invoke: (event: NativeEvent) => void;
    active: boolean;
};

function isEventOf<K extends EventType>(event: NativeEvent, kind: K): event is EventOf<K> {
    return event.type === kind;
}

/**
 * Fans the single native callback allowed per (object, event kind) out to any
 * number of listeners.
 *
 * - One native attach per kind, made by the first listener of that kind.
 * - Dispatch walks a snapshot, so listeners may unsubscribe themselves or
 *   others mid-pass. A listener removed before its turn is skipped.
 * - Detaching from inside a native callback is not allowed by the library.
 *   When the last listener of a kind goes away during a dispatch, the detach
 *   runs in a microtask instead.
 * - Nothing thrown by a listener or a log sink reaches the native caller.
 */
export class EventManager<TKind extends EventType = EventType> {
    readonly name: string;
    private readonly lib: NativeLibrary;
    private readonly handle: EventManagerPtr;
    private readonly logger: LoggerContext;
    private readonly onListenerError: ListenerErrorHandler | undefined;
    private readonly lifecycle: Lifecycle<ManagerState>;

    private readonly listeners = new Map<EventType, Registration[]>();
    private readonly registrations = new Map<Subscription, Registration>();
    private readonly attached = new Set<EventType>();
    private readonly pendingDetach = new Set<EventType>();
    private dispatchDepth = 0;
    private nextId = 1;

    /** The one function handed to the native library, for every kind. */
    private readonly trampoline: NativeEventCallback = (event) => this.dispatch(event);

    constructor(options: EventManagerOptions) {
        this.lib = options.lib;
        this.handle = options.handle;
        this.name = options.name;
        this.logger = guardLogger(options.logger ?? silentLogger);
        this.onListenerError = options.onListenerError;
        this.lifecycle = new Lifecycle<ManagerState>({
            transitions: MANAGER_TRANSITIONS,
            initial: "active",
            name: `${options.name} event manager`,
        });
    }

    get disposed(): boolean {
        return this.lifecycle.is("disposed");
    }

    /** True while listeners are being called from the native trampoline. */
    get dispatching(): boolean {
        return this.dispatchDepth > 0;
    }

    /**
     * Register a listener for one event kind.
     * @throws AttachError if the native attach fails; nothing is registered then.
     * @throws InvalidHandleError after {@link dispose}.
     */
    subscribe<K extends TKind>(kind: K, listener: EventListener<K>): Subscription<K> {
        this.lifecycle.assertState("active");
        this.ensureAttached(kind);

        const registration: Registration = {
            kind,
            active: true,
            invoke: (event) => {
                if (isEventOf(event, kind)) listener(event);
            },
        };
        const subscription: Subscription<K> = {
            id: this.nextId++,
            kind,
            unsubscribe: () => this.unsubscribe(subscription),
        };

        let list = this.listeners.get(kind);
        if (!list) {
            list = [];
            this.listeners.set(kind, list);
        }
        list.push(registration);
        this.registrations.set(subscription, registration);
        return subscription;
    }

    /** Remove a registration. Unknown or already removed tokens return false. */
    unsubscribe(subscription: Subscription): boolean {
        const registration = this.registrations.get(subscription);
        if (!registration) return false;

        this.registrations.delete(subscription);
        registration.active = false;

        const list = this.listeners.get(registration.kind);
        if (list) {
            const idx = list.indexOf(registration);
            if (idx !== -1) list.splice(idx, 1);
            if (list.length === 0) {
                this.listeners.delete(registration.kind);
                this.releaseKind(registration.kind);
            }
        }
        return true;
    }

    listenerCount(kind?: TKind): number {
        if (kind !== undefined) return this.listeners.get(kind)?.length ?? 0;
        return this.registrations.size;
    }

    isAttached(kind: TKind): boolean {
        return this.attached.has(kind);
    }

    /** Detach every kind and drop all listeners. Idempotent. */
    dispose(): void {
        if (this.lifecycle.is("disposed")) return;
        this.lifecycle.transition("disposed");

        for (const registration of this.registrations.values()) {
            registration.active = false;
        }
        this.registrations.clear();
        this.listeners.clear();
        this.pendingDetach.clear();

        const kinds = [...this.attached];
        if (this.dispatchDepth > 0) {
            queueMicrotask(() => this.detachAll(kinds));
        } else {
            this.detachAll(kinds);
        }
    }

    private ensureAttached(kind: EventType): void {
        if (this.attached.has(kind)) {
            // A detach scheduled from inside a dispatch is still pending: keep the attachment.
            this.pendingDetach.delete(kind);
            return;
        }
        const status = this.lib.eventAttach(this.handle, kind, this.trampoline);
        if (status !== 0) {
            throw new AttachError(this.name, kind, this.lib.eventTypeName(kind), status);
        }
        this.attached.add(kind);
        this.logger.debug("EventManager", `${this.name}: attached ${this.lib.eventTypeName(kind)}`);
    }

    private releaseKind(kind: EventType): void {
        if (this.dispatchDepth === 0) {
            this.detach(kind);
            return;
        }
        this.pendingDetach.add(kind);
        queueMicrotask(() => {
            if (!this.pendingDetach.delete(kind)) return;
            this.detach(kind);
        });
    }

    private detach(kind: EventType): void {
        if (!this.attached.delete(kind)) return;
        this.lib.eventDetach(this.handle, kind, this.trampoline);
        this.logger.debug("EventManager", `${this.name}: detached ${this.lib.eventTypeName(kind)}`);
    }

    private detachAll(kinds: readonly EventType[]): void {
        for (const kind of kinds) {
            try {
                this.detach(kind);
            } catch (err) {
                this.logger.error("EventManager", `${this.name}: detach of ${this.lib.eventTypeName(kind)} failed`, {
                    error: err,
                });
            }
        }
    }

    private dispatch(event: NativeEvent): void {
        if (this.lifecycle.is("disposed")) return;
        const list = this.listeners.get(event.type);
        if (!list) return;

        const snapshot = list.slice();
        this.dispatchDepth++;
        try {
            for (const registration of snapshot) {
                if (!registration.active) continue;
                try {
                    registration.invoke(event);
                } catch (cause) {
                    this.reportListenerError(event.type, cause);
                }
            }
        } finally {
            this.dispatchDepth--;
        }
    }

    private reportListenerError(kind: EventType, cause: unknown): void {
        const error = new ListenerError(this.name, kind, this.lib.eventTypeName(kind), cause);
        this.logger.error("EventManager", error.message, { event: error.eventName });
        if (!this.onListenerError) return;
        try {
            this.onListenerError(error);
        } catch (err) {
            this.logger.error("EventManager", `${this.name}: listener error handler threw`, { error: err });
        }
    }
}
