import { EventManager } from "../core/event-manager/event-manager";
import type { EventManagerOptions, Subscription } from "../core/event-manager/types";
import { EventType, type MediaState, type MetaType, type ParsedStatus } from "../core/native/enums";
import type { MediaPtr } from "../core/native/types";
import type { Media } from "./media";

export type MediaEventType =
    | EventType.MediaMetaChanged
    | EventType.MediaSubItemAdded
    | EventType.MediaDurationChanged
    | EventType.MediaParsedChanged
    | EventType.MediaFreed
    | EventType.MediaStateChanged
    | EventType.MediaSubItemTreeAdded;

/**
 * Wraps a media pointer carried by an event into a retained {@link Media}
 * that is released again once the listener returns. Listeners that keep the
 * media past their own invocation must `clone()` it.
 */
export type BorrowMedia = (ptr: MediaPtr, use: (media: Media) => void) => void;

export class MediaEventManager extends EventManager<MediaEventType> {
    constructor(
        options: EventManagerOptions,
        private readonly borrow: BorrowMedia,
    ) {
        super(options);
    }

    onMetaChanged(listener: (metaType: MetaType) => void): Subscription<EventType.MediaMetaChanged> {
        return this.subscribe(EventType.MediaMetaChanged, (event) => listener(event.metaType));
    }

    /** The child media is borrowed for the duration of the call. */
    onSubItemAdded(listener: (child: Media) => void): Subscription<EventType.MediaSubItemAdded> {
        return this.subscribe(EventType.MediaSubItemAdded, (event) => this.borrow(event.newChild, listener));
    }

    /** Duration in milliseconds. */
    onDurationChanged(listener: (duration: number) => void): Subscription<EventType.MediaDurationChanged> {
        return this.subscribe(EventType.MediaDurationChanged, (event) => listener(event.newDuration));
    }

    onParsedChanged(listener: (status: ParsedStatus) => void): Subscription<EventType.MediaParsedChanged> {
        return this.subscribe(EventType.MediaParsedChanged, (event) => listener(event.newStatus));
    }

    /** The native object is going away; its pointer must not be touched. */
    onFreed(listener: () => void): Subscription<EventType.MediaFreed> {
        return this.subscribe(EventType.MediaFreed, () => listener());
    }

    onStateChanged(listener: (state: MediaState) => void): Subscription<EventType.MediaStateChanged> {
        return this.subscribe(EventType.MediaStateChanged, (event) => listener(event.newState));
    }

    onSubItemTreeAdded(listener: (item: Media) => void): Subscription<EventType.MediaSubItemTreeAdded> {
        return this.subscribe(EventType.MediaSubItemTreeAdded, (event) => this.borrow(event.item, listener));
    }
}
