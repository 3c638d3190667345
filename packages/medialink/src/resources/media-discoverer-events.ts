import { EventManager } from "../core/event-manager/event-manager";
import type { Subscription } from "../core/event-manager/types";
import { EventType } from "../core/native/enums";

export type MediaDiscovererEventType = EventType.MediaDiscovererStarted | EventType.MediaDiscovererEnded;

export class MediaDiscovererEventManager extends EventManager<MediaDiscovererEventType> {
    onStarted(listener: () => void): Subscription<EventType.MediaDiscovererStarted> {
        return this.subscribe(EventType.MediaDiscovererStarted, () => listener());
    }

    onEnded(listener: () => void): Subscription<EventType.MediaDiscovererEnded> {
        return this.subscribe(EventType.MediaDiscovererEnded, () => listener());
    }
}
