import type { ListenerErrorHandler } from "../core/event-manager/types";
import type { HandleBox } from "../core/handle/handle";
import { Lifecycle } from "../core/lifecycle/lifecycle";
import { silentLogger } from "../core/logger/logger";
import type { LoggerContext } from "../core/logger/types";
import type { NativeLibrary, NativePointer } from "../core/native/types";

export type ResourceOptions = {
    logger?: LoggerContext;
    /** Side channel for listener failures on every event manager of this resource tree. */
    onListenerError?: ListenerErrorHandler;
};

/**
 * State shared by every copy (`clone()`) of one facade object: its lazily
 * created event manager, its callback slots. Torn down when the last copy
 * is released, before that copy gives its native reference back.
 */
export class OwnerGroup<TState extends object> {
    private owners = 1;
    private readonly finalizers: Array<(state: TState) => void> = [];
    private busyWhen: (state: TState) => boolean = () => false;

    constructor(readonly state: TState) {}

    get size(): number {
        return this.owners;
    }

    join(): this {
        this.owners++;
        return this;
    }

    onLastRelease(finalizer: (state: TState) => void): this {
        this.finalizers.push(finalizer);
        return this;
    }

    /**
     * While `predicate` holds, native references given back by members of
     * this group are released in a microtask instead of synchronously.
     */
    deferReleaseWhile(predicate: (state: TState) => boolean): this {
        this.busyWhen = predicate;
        return this;
    }

    get busy(): boolean {
        return this.busyWhen(this.state);
    }

    leave(): void {
        if (this.owners === 0) return;
        this.owners--;
        if (this.owners > 0) return;
        for (const finalizer of this.finalizers.splice(0).reverse()) {
            finalizer(this.state);
        }
    }
}

type ResourceState = "live" | "released";

const RESOURCE_TRANSITIONS: Record<ResourceState, readonly ResourceState[]> = {
    live: ["released"],
    released: [],
};

/** Base of every facade: one owned native reference plus the copy group it belongs to. */
export abstract class Resource<T extends NativePointer, TState extends object> {
    protected readonly logger: LoggerContext;
    private readonly lifecycle: Lifecycle<ResourceState>;

    protected constructor(
        protected readonly lib: NativeLibrary,
        protected readonly handle: HandleBox<T>,
        protected readonly group: OwnerGroup<TState>,
        protected readonly options: ResourceOptions,
    ) {
        this.logger = options.logger ?? silentLogger;
        this.lifecycle = new Lifecycle<ResourceState>({
            transitions: RESOURCE_TRANSITIONS,
            initial: "live",
            name: handle.kind.name,
        });
    }

    /** The raw native pointer. Throws InvalidHandleError once released. */
    protected get ptr(): T {
        return this.handle.get();
    }

    isValid(): boolean {
        return this.handle.isValid();
    }

    /** Native identity: true when both wrap the same native object. */
    equals(other: Resource<T, TState>): boolean {
        return this.handle.equals(other.handle);
    }

    /**
     * Give this copy's reference back. Idempotent.
     *
     * Called from inside one of the object's own event listeners, the native
     * release waits for a microtask so that it follows the pending detaches.
     */
    release(): void {
        if (this.lifecycle.is("released")) return;
        this.lifecycle.transition("released");
        const deferred = this.group.busy;
        this.group.leave();
        if (deferred) {
            const handle = this.handle.move();
            queueMicrotask(() => handle.release());
        } else {
            this.handle.release();
        }
    }
}

export type EventsState<M> = { events: M | null };

/** Copy group for facades whose only shared state is a lazily created event manager. */
export function createEventsGroup<M extends { readonly dispatching: boolean; dispose(): void }>(): OwnerGroup<
    EventsState<M>
> {
    return new OwnerGroup<EventsState<M>>({ events: null })
        .onLastRelease((state) => {
            state.events?.dispose();
            state.events = null;
        })
        .deferReleaseWhile((state) => state.events?.dispatching ?? false);
}
