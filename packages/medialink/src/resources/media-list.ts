import { HandleBox } from "../core/handle/handle";
import type { MediaListPtr, MediaPtr, NativeLibrary } from "../core/native/types";
import type { Instance } from "./instance";
import { handleKinds } from "./kinds";
import { Media } from "./media";
import { MediaListEventManager } from "./media-list-events";
import { createEventsGroup, type EventsState, type OwnerGroup, Resource, type ResourceOptions } from "./resource";

type MediaListGroupState = EventsState<MediaListEventManager>;

export class MediaList extends Resource<MediaListPtr, MediaListGroupState> {
    private constructor(
        lib: NativeLibrary,
        handle: HandleBox<MediaListPtr>,
        group: OwnerGroup<MediaListGroupState>,
        options: ResourceOptions,
    ) {
        super(lib, handle, group, options);
    }

    /** @throws ConstructionError when the native library returns no list. */
    static create(instance: Instance): MediaList {
        const lib = instance.library;
        return MediaList.adopt(lib, lib.mediaListNew(instance.nativePtr), instance.resourceOptions);
    }

    /** @internal Adopt a pointer that already carries a reference for us. */
    static adopt(lib: NativeLibrary, ptr: MediaListPtr | null, options: ResourceOptions): MediaList {
        const group = createEventsGroup<MediaListEventManager>();
        return new MediaList(lib, HandleBox.adopt(handleKinds(lib).mediaList, ptr), group, options);
    }

    /** @internal */
    get nativePtr(): MediaListPtr {
        return this.ptr;
    }

    /** @internal */
    get library(): NativeLibrary {
        return this.lib;
    }

    /** @internal */
    get resourceOptions(): ResourceOptions {
        return this.options;
    }

    clone(): MediaList {
        return new MediaList(this.lib, this.handle.clone(), this.group.join(), this.options);
    }

    /** Call between {@link lock} and {@link unlock} when other threads may modify the list. */
    count(): number {
        return this.lib.mediaListCount(this.ptr);
    }

    /** The list takes its own reference; `media` stays owned by the caller. */
    addMedia(media: Media): boolean {
        return this.lib.mediaListAddMedia(this.ptr, media.nativePtr) === 0;
    }

    /** A new owning reference to the item at `index`, or null when out of range. */
    itemAt(index: number): Media | null {
        return this.wrapOwned(this.lib.mediaListItemAt(this.ptr, index));
    }

    /** The media this list was created from, if any. Must not be called with the list locked. */
    media(): Media | null {
        return Media.fromList(this);
    }

    lock(): void {
        this.lib.mediaListLock(this.ptr);
    }

    unlock(): void {
        this.lib.mediaListUnlock(this.ptr);
    }

    events(): MediaListEventManager {
        const state = this.group.state;
        if (!state.events) {
            state.events = new MediaListEventManager(
                {
                    lib: this.lib,
                    handle: this.lib.mediaListEventManager(this.ptr),
                    name: "media list",
                    logger: this.options.logger,
                    onListenerError: this.options.onListenerError,
                },
                (ptr, use) => {
                    const item = Media.wrap(this.lib, ptr, true, this.options);
                    try {
                        use(item);
                    } finally {
                        item.release();
                    }
                },
            );
        }
        return state.events;
    }

    private wrapOwned(ptr: MediaPtr | null): Media | null {
        return ptr === null ? null : Media.wrap(this.lib, ptr, false, this.options);
    }
}
