import { EventManager } from "../core/event-manager/event-manager";
import type { EventManagerOptions, Subscription } from "../core/event-manager/types";
import { EventType } from "../core/native/enums";
import type { MediaListItemEvent } from "../core/native/types";
import type { BorrowMedia } from "./media-events";
import type { Media } from "./media";

export type MediaListEventType =
    | EventType.MediaListItemAdded
    | EventType.MediaListWillAddItem
    | EventType.MediaListItemDeleted
    | EventType.MediaListWillDeleteItem
    | EventType.MediaListEndReached;

type ItemListener = (media: Media, index: number) => void;

export class MediaListEventManager extends EventManager<MediaListEventType> {
    constructor(
        options: EventManagerOptions,
        private readonly borrow: BorrowMedia,
    ) {
        super(options);
    }

    onItemAdded(listener: ItemListener): Subscription<EventType.MediaListItemAdded> {
        return this.subscribe(EventType.MediaListItemAdded, (event) => this.forward(event, listener));
    }

    onWillAddItem(listener: ItemListener): Subscription<EventType.MediaListWillAddItem> {
        return this.subscribe(EventType.MediaListWillAddItem, (event) => this.forward(event, listener));
    }

    onItemDeleted(listener: ItemListener): Subscription<EventType.MediaListItemDeleted> {
        return this.subscribe(EventType.MediaListItemDeleted, (event) => this.forward(event, listener));
    }

    onWillDeleteItem(listener: ItemListener): Subscription<EventType.MediaListWillDeleteItem> {
        return this.subscribe(EventType.MediaListWillDeleteItem, (event) => this.forward(event, listener));
    }

    onEndReached(listener: () => void): Subscription<EventType.MediaListEndReached> {
        return this.subscribe(EventType.MediaListEndReached, () => listener());
    }

    private forward(event: MediaListItemEvent, listener: ItemListener): void {
        this.borrow(event.item, (media) => listener(media, event.index));
    }
}
