/**
 * Contract: Media -- media descriptor facade.
 *
 * Sections:
 *   1. Construction
 *   2. Ownership & shared events
 *   3. Forwarding
 *   4. Parsing
 *   5. Typed events
 *   6. Borrowed media in events
 *   7. Release from inside a listener
 */
import { TimeoutError } from "es-toolkit";
import { describe, expect, it, vi } from "vitest";
import { ConstructionError, InvalidHandleError } from "../core/errors/errors";
import { EventType, MediaOptionFlag, MediaState, MetaType, ParsedStatus } from "../core/native/enums";
import { FakeNativeLibrary } from "../testing/fake-native";
import { must } from "../testing/helpers";
import { Instance } from "./instance";
import { Media, MediaSource } from "./media";
import { MediaList } from "./media-list";

function setup() {
    const lib = new FakeNativeLibrary();
    const instance = Instance.create(lib);
    const media = Media.fromLocation(instance, "https://example.org/stream.ogg");
    const fake = lib.media(media.nativePtr);
    const rawMedia = (mrl: string) => lib.media(must(lib.mediaNewLocation(instance.nativePtr, mrl), "media"));
    return { lib, instance, media, fake, rawMedia };
}

describe("Media", () => {
    // -- 1. Construction --
    describe("Construction", () => {
        it("builds from a path, a location, a node name or a descriptor", () => {
            const { instance } = setup();
            expect(Media.fromPath(instance, "/tmp/song.ogg").mrl()).toBe("file:///tmp/song.ogg");
            expect(Media.fromLocation(instance, "rtsp://cam.local/live").mrl()).toBe("rtsp://cam.local/live");
            expect(Media.fromFd(instance, 3).mrl()).toBe("fd://3");

            const node = Media.asNode(instance, "Playlist");
            expect(node.mrl()).toBe("vlc://nop");
            expect(node.meta(MetaType.Title)).toBe("Playlist");
        });

        it("create() dispatches on the source", () => {
            const { instance } = setup();
            expect(Media.create(instance, "/srv/a.mkv", MediaSource.Path).mrl()).toBe("file:///srv/a.mkv");
            expect(Media.create(instance, "file:///srv/a.mkv", MediaSource.Location).mrl()).toBe("file:///srv/a.mkv");
        });

        it("throws ConstructionError when the native library returns nothing", () => {
            const { lib, instance } = setup();
            lib.failCreate.add("media");
            expect(() => Media.fromPath(instance, "/tmp/song.ogg")).toThrow(ConstructionError);
            expect(() => Media.fromPath(instance, "/tmp/song.ogg")).toThrow("Failed to create the native media");
        });

        it("wrap() retains only when asked to", () => {
            const { lib, media, fake } = setup();
            const borrowed = Media.wrap(lib, media.nativePtr, true);
            expect(fake.refs).toBe(2);
            expect(borrowed.equals(media)).toBe(true);

            lib.mediaRetain(media.nativePtr);
            const adopted = Media.wrap(lib, media.nativePtr, false);
            expect(fake.refs).toBe(3);

            borrowed.release();
            adopted.release();
            media.release();
            expect(fake.freed).toBe(1);
        });

        it("fromList() adopts the list's parent media, or yields null", () => {
            const { lib, instance, media, fake } = setup();
            const list = MediaList.create(instance);
            expect(Media.fromList(list)).toBeNull();

            lib.setParent(lib.list(list.nativePtr), fake);
            const parent = must(list.media(), "parent media");
            expect(parent.equals(media)).toBe(true);
            expect(fake.refs).toBe(3);
            parent.release();
            expect(fake.refs).toBe(2);
        });
    });

    // -- 2. Ownership & shared events --
    describe("Ownership & shared events", () => {
        it("copies share one event manager", () => {
            const { media } = setup();
            const copy = media.clone();
            expect(copy.events()).toBe(media.events());
        });

        it("the manager survives while any copy lives and is disposed with the last", () => {
            const { media, fake } = setup();
            const copy = media.clone();
            const events = media.events();
            events.onStateChanged(vi.fn());

            media.release();
            expect(events.disposed).toBe(false);
            expect(fake.events.count(EventType.MediaStateChanged)).toBe(1);

            copy.release();
            expect(events.disposed).toBe(true);
            expect(fake.events.detachCalls).toBe(1);
            expect(fake.freed).toBe(1);
        });

        it("a released copy throws InvalidHandleError", () => {
            const { media } = setup();
            media.release();
            expect(() => media.mrl()).toThrow(InvalidHandleError);
            expect(() => media.events()).toThrow(InvalidHandleError);
        });

        it("duplicate() creates an independent native object", () => {
            const { media, fake } = setup();
            media.addOption(":network-caching=300");
            const dup = media.duplicate();
            expect(dup.equals(media)).toBe(false);
            expect(dup.mrl()).toBe("https://example.org/stream.ogg");
            dup.release();
            expect(fake.freed).toBe(0);
        });
    });

    // -- 3. Forwarding --
    describe("Forwarding", () => {
        it("records options with and without flags", () => {
            const { media, fake } = setup();
            media.addOption(":no-audio");
            media.addOptionFlag(":sout=#display", MediaOptionFlag.Trusted);
            expect(fake.options).toEqual([
                { option: ":no-audio", flags: 0 },
                { option: ":sout=#display", flags: MediaOptionFlag.Trusted },
            ]);
        });

        it("meta is empty until set", () => {
            const { media } = setup();
            expect(media.meta(MetaType.Artist)).toBe("");
            media.setMeta(MetaType.Artist, "Test Artist");
            expect(media.meta(MetaType.Artist)).toBe("Test Artist");
        });

        it("saveMeta reports the native outcome", () => {
            const { media, fake } = setup();
            expect(media.saveMeta()).toBe(true);
            fake.saveResult = 0;
            expect(media.saveMeta()).toBe(false);
        });

        it("reads state, stats, duration and tracks", () => {
            const { media, fake } = setup();
            expect(media.state()).toBe(MediaState.NothingSpecial);
            expect(media.stats()).toBeNull();
            expect(media.duration()).toBe(-1);
            expect(media.tracks()).toEqual([]);

            fake.state = MediaState.Playing;
            fake.duration = 215_000;
            expect(media.state()).toBe(MediaState.Playing);
            expect(media.duration()).toBe(215_000);
        });
    });

    // -- 4. Parsing --
    describe("Parsing", () => {
        it("parse() completes synchronously", () => {
            const { media } = setup();
            expect(media.isParsed()).toBe(false);
            media.parse();
            expect(media.isParsed()).toBe(true);
        });

        it("parsed() starts an async parse and resolves with its status", async () => {
            const { lib, media, fake } = setup();
            const result = media.parsed();
            expect(fake.parseRequests).toBe(1);

            lib.completeParse(fake, ParsedStatus.Done);

            await expect(result).resolves.toBe(ParsedStatus.Done);
            expect(media.events().listenerCount()).toBe(0);
        });

        it("parsed() resolves with null for media that is already parsed", async () => {
            const { media, fake } = setup();
            media.parse();
            await expect(media.parsed()).resolves.toBeNull();
            expect(fake.parseRequests).toBe(0);
        });

        it("parsed() rejects with TimeoutError when nothing arrives", async () => {
            const { media } = setup();
            await expect(media.parsed(5)).rejects.toBeInstanceOf(TimeoutError);
        });
    });

    // -- 5. Typed events --
    describe("Typed events", () => {
        it("unpacks each event payload", () => {
            const { lib, media, fake } = setup();
            const events = media.events();
            const seen: unknown[] = [];
            events.onStateChanged((state) => seen.push(["state", state]));
            events.onDurationChanged((duration) => seen.push(["duration", duration]));
            events.onParsedChanged((status) => seen.push(["parsed", status]));
            events.onMetaChanged((type) => seen.push(["meta", type]));
            events.onFreed(() => seen.push(["freed"]));

            lib.emit(fake, { type: EventType.MediaStateChanged, newState: MediaState.Buffering });
            lib.emit(fake, { type: EventType.MediaDurationChanged, newDuration: 4_000 });
            lib.emit(fake, { type: EventType.MediaParsedChanged, newStatus: ParsedStatus.Failed });
            media.setMeta(MetaType.Genre, "Jazz");
            lib.emit(fake, { type: EventType.MediaFreed, md: fake });

            expect(seen).toEqual([
                ["state", MediaState.Buffering],
                ["duration", 4_000],
                ["parsed", ParsedStatus.Failed],
                ["meta", MetaType.Genre],
                ["freed"],
            ]);
        });

        it("the returned subscription unsubscribes", () => {
            const { lib, media, fake } = setup();
            const listener = vi.fn();
            const sub = media.events().onStateChanged(listener);
            sub.unsubscribe();
            lib.emit(fake, { type: EventType.MediaStateChanged, newState: MediaState.Ended });
            expect(listener).not.toHaveBeenCalled();
            expect(fake.events.detachCalls).toBe(1);
        });
    });

    // -- 6. Borrowed media in events --
    describe("Borrowed media in events", () => {
        it("hands the listener a retained child and releases it afterwards", () => {
            const { lib, media, fake, rawMedia } = setup();
            const child = rawMedia("https://example.org/stream/part1.ogg");
            const mrls: string[] = [];
            const refsDuringCall: number[] = [];
            media.events().onSubItemAdded((item) => {
                mrls.push(item.mrl());
                refsDuringCall.push(child.refs);
            });

            lib.emit(fake, { type: EventType.MediaSubItemAdded, newChild: child });

            expect(mrls).toEqual(["https://example.org/stream/part1.ogg"]);
            expect(refsDuringCall).toEqual([2]);
            expect(child.refs).toBe(1);
        });

        it("a listener keeps the child by cloning it", () => {
            const { lib, media, fake, rawMedia } = setup();
            const child = rawMedia("https://example.org/stream/part2.ogg");
            let kept: Media | null = null;
            media.events().onSubItemTreeAdded((item) => {
                kept = item.clone();
            });

            lib.emit(fake, { type: EventType.MediaSubItemTreeAdded, item: child });

            expect(child.refs).toBe(2);
            expect(must<Media>(kept, "kept media").mrl()).toBe("https://example.org/stream/part2.ogg");
        });
    });

    // -- 7. Release from inside a listener --
    describe("Release from inside a listener", () => {
        it("detaches and frees after the dispatch returns", async () => {
            const { lib, media, fake } = setup();
            media.events().onStateChanged(() => media.release());

            lib.emit(fake, { type: EventType.MediaStateChanged, newState: MediaState.Stopped });
            expect(media.isValid()).toBe(false);
            expect(fake.freed).toBe(0);

            await Promise.resolve();
            expect(fake.events.detachCalls).toBe(1);
            expect(fake.freed).toBe(1);
        });
    });
});
