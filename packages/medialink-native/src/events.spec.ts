/**
 * Contract: decodeEvent
 *
 * - Unknown event kinds decode to null
 * - Payload fields are read at the start of the union
 * - Media list item events read the index right after the item pointer
 * - Out-of-range enum values and NULL pointers decode to null
 */
import { EventType, MediaState, MetaType, type NativePointer, ParsedStatus } from "@medialink/core";
import { describe, expect, it } from "vitest";
import { decodeEvent, type EventPayloadReader } from "./events";

function reader(fields: {
    ints?: Record<number, number>;
    int64s?: Record<number, number>;
    pointers?: Record<number, NativePointer | null>;
}): EventPayloadReader {
    return {
        pointerSize: 8,
        int: (offset) => fields.ints?.[offset] ?? 0,
        int64: (offset) => fields.int64s?.[offset] ?? 0,
        pointer: (offset) => fields.pointers?.[offset] ?? null,
    };
}

describe("decodeEvent", () => {
    it("ignores kinds it does not model", () => {
        expect(decodeEvent(0x100, reader({}))).toBeNull();
    });

    it("decodes scalar payloads", () => {
        expect(decodeEvent(EventType.MediaMetaChanged, reader({ ints: { 0: MetaType.Artist } }))).toEqual({
            type: EventType.MediaMetaChanged,
            metaType: MetaType.Artist,
        });
        expect(decodeEvent(EventType.MediaDurationChanged, reader({ int64s: { 0: 183_000 } }))).toEqual({
            type: EventType.MediaDurationChanged,
            newDuration: 183_000,
        });
        expect(decodeEvent(EventType.MediaParsedChanged, reader({ ints: { 0: ParsedStatus.Done } }))).toEqual({
            type: EventType.MediaParsedChanged,
            newStatus: ParsedStatus.Done,
        });
        expect(decodeEvent(EventType.MediaStateChanged, reader({ ints: { 0: MediaState.Playing } }))).toEqual({
            type: EventType.MediaStateChanged,
            newState: MediaState.Playing,
        });
    });

    it("rejects out-of-range enum values", () => {
        expect(decodeEvent(EventType.MediaStateChanged, reader({ ints: { 0: 42 } }))).toBeNull();
        expect(decodeEvent(EventType.MediaParsedChanged, reader({ ints: { 0: 0 } }))).toBeNull();
    });

    it("decodes pointer payloads and rejects NULL", () => {
        const child = {};

        expect(decodeEvent(EventType.MediaSubItemAdded, reader({ pointers: { 0: child } }))).toEqual({
            type: EventType.MediaSubItemAdded,
            newChild: child,
        });
        expect(decodeEvent(EventType.MediaFreed, reader({}))).toBeNull();
    });

    it("reads the list index after the item pointer", () => {
        const item = {};
        const event = decodeEvent(EventType.MediaListItemAdded, reader({ pointers: { 0: item }, ints: { 8: 3 } }));

        expect(event).toEqual({ type: EventType.MediaListItemAdded, item, index: 3 });
    });

    it("decodes payload-less events", () => {
        expect(decodeEvent(EventType.MediaListEndReached, reader({}))).toEqual({ type: EventType.MediaListEndReached });
        expect(decodeEvent(EventType.MediaDiscovererEnded, reader({}))).toEqual({
            type: EventType.MediaDiscovererEnded,
        });
    });
});
