import { EventType, MediaState, MetaType, type NativeEvent, type NativePointer, ParsedStatus } from "@medialink/core";
import { enumMember } from "./values";

/** Reads fields of the event payload union; offsets are relative to its start. */
export interface EventPayloadReader {
    int(offset: number): number;
    int64(offset: number): number;
    pointer(offset: number): NativePointer | null;
    readonly pointerSize: number;
}

const EVENT_TYPES = Object.values(EventType);
const META_TYPES = Object.values(MetaType);
const PARSED_STATUSES = Object.values(ParsedStatus);
const MEDIA_STATES = Object.values(MediaState);

/** `item` then `index`, both at the start of the union. */
function listItemPayload(payload: EventPayloadReader): { item: NativePointer; index: number } | null {
    const item = payload.pointer(0);
    return item ? { item, index: payload.int(payload.pointerSize) } : null;
}

export function eventTypeOf(raw: number): EventType | undefined {
    return enumMember(EVENT_TYPES, raw);
}

/**
 * Turn a native event into its typed form. Returns null for kinds this
 * library does not model and for payloads that fail validation.
 */
export function decodeEvent(rawType: number, payload: EventPayloadReader): NativeEvent | null {
    const type = eventTypeOf(rawType);
    if (type === undefined) return null;

    switch (type) {
        case EventType.MediaMetaChanged: {
            const metaType = enumMember(META_TYPES, payload.int(0));
            return metaType === undefined ? null : { type, metaType };
        }
        case EventType.MediaSubItemAdded: {
            const newChild = payload.pointer(0);
            return newChild ? { type, newChild } : null;
        }
        case EventType.MediaDurationChanged:
            return { type, newDuration: payload.int64(0) };
        case EventType.MediaParsedChanged: {
            const newStatus = enumMember(PARSED_STATUSES, payload.int(0));
            return newStatus === undefined ? null : { type, newStatus };
        }
        case EventType.MediaFreed: {
            const md = payload.pointer(0);
            return md ? { type, md } : null;
        }
        case EventType.MediaStateChanged: {
            const newState = enumMember(MEDIA_STATES, payload.int(0));
            return newState === undefined ? null : { type, newState };
        }
        case EventType.MediaSubItemTreeAdded: {
            const item = payload.pointer(0);
            return item ? { type, item } : null;
        }
        case EventType.MediaListItemAdded: {
            const item = listItemPayload(payload);
            return item && { type, ...item };
        }
        case EventType.MediaListWillAddItem: {
            const item = listItemPayload(payload);
            return item && { type, ...item };
        }
        case EventType.MediaListItemDeleted: {
            const item = listItemPayload(payload);
            return item && { type, ...item };
        }
        case EventType.MediaListWillDeleteItem: {
            const item = listItemPayload(payload);
            return item && { type, ...item };
        }
        case EventType.MediaListEndReached:
            return { type };
        case EventType.MediaDiscovererStarted:
            return { type };
        case EventType.MediaDiscovererEnded:
            return { type };
    }
}
