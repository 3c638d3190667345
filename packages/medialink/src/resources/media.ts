import { waitForEvent } from "../core/event-manager/helpers";
import { HandleBox } from "../core/handle/handle";
import { EventType, type MediaState, type MetaType, type ParsedStatus } from "../core/native/enums";
import type { InstancePtr, MediaPtr, MediaStats, MediaTrack, NativeLibrary } from "../core/native/types";
import type { Instance } from "./instance";
import { handleKinds } from "./kinds";
import { MediaEventManager } from "./media-events";
import type { MediaList } from "./media-list";
import { createEventsGroup, type EventsState, type OwnerGroup, Resource, type ResourceOptions } from "./resource";

export enum MediaSource {
    /** A local file path. */
    Path = "path",
    /** A media resource location such as a URL; local files need the `file://` form. */
    Location = "location",
    /** An empty node with the given name. */
    Node = "node",
}

type MediaGroupState = EventsState<MediaEventManager>;

export class Media extends Resource<MediaPtr, MediaGroupState> {
    private constructor(
        lib: NativeLibrary,
        handle: HandleBox<MediaPtr>,
        group: OwnerGroup<MediaGroupState>,
        options: ResourceOptions,
    ) {
        super(lib, handle, group, options);
    }

    /** Adopt a pointer that already carries a reference for us. */
    private static adopt(lib: NativeLibrary, ptr: MediaPtr | null, options: ResourceOptions): Media {
        const handle = HandleBox.adopt(handleKinds(lib).media, ptr);
        return new Media(lib, handle, createEventsGroup<MediaEventManager>(), options);
    }

    /**
     * @param mrl a path, a location, or a node name, depending on `source`.
     * @throws ConstructionError when the native library returns no media.
     */
    static create(instance: Instance, mrl: string, source: MediaSource): Media {
        const ptr = Media.createPtr(instance.library, instance.nativePtr, mrl, source);
        return Media.adopt(instance.library, ptr, instance.resourceOptions);
    }

    private static createPtr(lib: NativeLibrary, inst: InstancePtr, mrl: string, source: MediaSource): MediaPtr | null {
        switch (source) {
            case MediaSource.Location:
                return lib.mediaNewLocation(inst, mrl);
            case MediaSource.Path:
                return lib.mediaNewPath(inst, mrl);
            case MediaSource.Node:
                return lib.mediaNewAsNode(inst, mrl);
        }
    }

    static fromPath(instance: Instance, path: string): Media {
        return Media.create(instance, path, MediaSource.Path);
    }

    static fromLocation(instance: Instance, mrl: string): Media {
        return Media.create(instance, mrl, MediaSource.Location);
    }

    static asNode(instance: Instance, name: string): Media {
        return Media.create(instance, name, MediaSource.Node);
    }

    /**
     * Media for an already open, readable file descriptor. The descriptor is
     * never closed by the native library.
     */
    static fromFd(instance: Instance, fd: number): Media {
        const ptr = instance.library.mediaNewFd(instance.nativePtr, fd);
        return Media.adopt(instance.library, ptr, instance.resourceOptions);
    }

    /** The media a list was created from, or null when it has none. */
    static fromList(list: MediaList): Media | null {
        const ptr = list.library.mediaListMedia(list.nativePtr);
        return ptr === null ? null : Media.adopt(list.library, ptr, list.resourceOptions);
    }

    /**
     * Wrap a raw media pointer.
     * @param retain true when the pointer was not handed over with a reference.
     */
    static wrap(lib: NativeLibrary, ptr: MediaPtr, retain: boolean, options: ResourceOptions = {}): Media {
        const kind = handleKinds(lib).media;
        const handle = retain ? HandleBox.retain(kind, ptr) : HandleBox.adopt(kind, ptr);
        return new Media(lib, handle, createEventsGroup<MediaEventManager>(), options);
    }

    /** @internal */
    get nativePtr(): MediaPtr {
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

    /** A second owning reference to the same native media. Shares the event manager. */
    clone(): Media {
        return new Media(this.lib, this.handle.clone(), this.group.join(), this.options);
    }

    /** Options affect how a player reads this media; see the native library's long help. */
    addOption(option: string): void {
        this.lib.mediaAddOption(this.ptr, option);
    }

    addOptionFlag(option: string, flags: number): void {
        this.lib.mediaAddOptionFlag(this.ptr, option, flags);
    }

    mrl(): string {
        return this.lib.mediaGetMrl(this.ptr) ?? "";
    }

    /** An independent native copy of this media descriptor. */
    duplicate(): Media {
        return Media.adopt(this.lib, this.lib.mediaDuplicate(this.ptr), this.options);
    }

    /** Empty until the media has been parsed. */
    meta(type: MetaType): string {
        return this.lib.mediaGetMeta(this.ptr, type) ?? "";
    }

    /** Not persisted until {@link saveMeta}. */
    setMeta(type: MetaType, value: string): void {
        this.lib.mediaSetMeta(this.ptr, type, value);
    }

    saveMeta(): boolean {
        return this.lib.mediaSaveMeta(this.ptr) !== 0;
    }

    state(): MediaState {
        return this.lib.mediaGetState(this.ptr);
    }

    stats(): MediaStats | null {
        return this.lib.mediaGetStats(this.ptr);
    }

    /** Milliseconds, or -1 when unknown. */
    duration(): number {
        return this.lib.mediaGetDuration(this.ptr);
    }

    /** Fetch local meta data and track information. Blocks until done. */
    parse(): void {
        this.lib.mediaParse(this.ptr);
    }

    /**
     * Start parsing in the background. Completion is reported by
     * `MediaParsedChanged`, which does not fire for already parsed media.
     */
    parseAsync(): void {
        this.lib.mediaParseAsync(this.ptr);
    }

    isParsed(): boolean {
        return this.lib.mediaIsParsed(this.ptr);
    }

    /**
     * Parse in the background and wait for the outcome. Resolves with `null`
     * right away when the media is already parsed.
     * @throws TimeoutError (es-toolkit) when `timeoutMs` elapses first.
     */
    async parsed(timeoutMs?: number): Promise<ParsedStatus | null> {
        const ptr = this.ptr;
        if (this.lib.mediaIsParsed(ptr)) return null;
        const done = waitForEvent(this.events(), EventType.MediaParsedChanged, { timeoutMs });
        this.lib.mediaParseAsync(ptr);
        const event = await done;
        return event.newStatus;
    }

    /** Elementary streams; empty until parsed or played once. */
    tracks(): MediaTrack[] {
        return this.lib.mediaTracks(this.ptr);
    }

    /** Lazily created, shared with every copy, disposed with the last one. */
    events(): MediaEventManager {
        const state = this.group.state;
        if (!state.events) {
            state.events = new MediaEventManager(
                {
                    lib: this.lib,
                    handle: this.lib.mediaEventManager(this.ptr),
                    name: "media",
                    logger: this.options.logger,
                    onListenerError: this.options.onListenerError,
                },
                (ptr, use) => {
                    const child = Media.wrap(this.lib, ptr, true, this.options);
                    try {
                        use(child);
                    } finally {
                        child.release();
                    }
                },
            );
        }
        return state.events;
    }
}
