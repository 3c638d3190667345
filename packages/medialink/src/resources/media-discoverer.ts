import { HandleBox } from "../core/handle/handle";
import type { MediaDiscovererPtr, NativeLibrary } from "../core/native/types";
import type { Instance } from "./instance";
import { handleKinds } from "./kinds";
import { MediaDiscovererEventManager } from "./media-discoverer-events";
import { MediaList } from "./media-list";
import { createEventsGroup, type EventsState, type OwnerGroup, Resource, type ResourceOptions } from "./resource";

type DiscovererGroupState = EventsState<MediaDiscovererEventManager>;

/**
 * A named media discovery service (network shares, local folders, ...).
 *
 * The native object is not reference counted and is expensive to create, so
 * there is no `clone()`: share the facade instead.
 */
export class MediaDiscoverer extends Resource<MediaDiscovererPtr, DiscovererGroupState> {
    private constructor(
        lib: NativeLibrary,
        handle: HandleBox<MediaDiscovererPtr>,
        group: OwnerGroup<DiscovererGroupState>,
        options: ResourceOptions,
    ) {
        super(lib, handle, group, options);
    }

    /** @throws ConstructionError for unknown service names. */
    static create(instance: Instance, name: string): MediaDiscoverer {
        const lib = instance.library;
        const ptr = lib.mediaDiscovererNew(instance.nativePtr, name);
        const handle = HandleBox.adopt(handleKinds(lib).mediaDiscoverer, ptr);
        const group = createEventsGroup<MediaDiscovererEventManager>();
        return new MediaDiscoverer(lib, handle, group, instance.resourceOptions);
    }

    /** Start discovery. Stop it with {@link stop} or by releasing the discoverer. */
    start(): boolean {
        return this.lib.mediaDiscovererStart(this.ptr) === 0;
    }

    stop(): void {
        this.lib.mediaDiscovererStop(this.ptr);
    }

    localizedName(): string {
        return this.lib.mediaDiscovererLocalizedName(this.ptr) ?? "";
    }

    isRunning(): boolean {
        return this.lib.mediaDiscovererIsRunning(this.ptr);
    }

    /** The list discovered media are added to; a new owning reference. */
    mediaList(): MediaList | null {
        const ptr = this.lib.mediaDiscovererMediaList(this.ptr);
        return ptr === null ? null : MediaList.adopt(this.lib, ptr, this.options);
    }

    events(): MediaDiscovererEventManager {
        const state = this.group.state;
        if (!state.events) {
            state.events = new MediaDiscovererEventManager({
                lib: this.lib,
                handle: this.lib.mediaDiscovererEventManager(this.ptr),
                name: "media discoverer",
                logger: this.options.logger,
                onListenerError: this.options.onListenerError,
            });
        }
        return state.events;
    }
}
