import { EventManager } from "../core/event-manager/event-manager";
import type { ListenerErrorHandler } from "../core/event-manager/types";
import { Logger } from "../core/logger/logger";
import type { LogEntry } from "../core/logger/types";
import type { EventType } from "../core/native/enums";
import { type FakeMedia, FakeNativeLibrary } from "./fake-native";

export function must<T>(value: T | null | undefined, what = "value"): T {
    if (value === null || value === undefined) throw new Error(`expected a ${what}`);
    return value;
}

/** A logger that records every entry it receives. */
export function createRecordingLogger(): { logger: Logger; entries: LogEntry[] } {
    const logger = new Logger();
    const entries: LogEntry[] = [];
    logger.addHandler((entry) => entries.push(entry));
    return { logger, entries };
}

/** An event manager over a fresh fake media object. */
export function createManagerFixture(onListenerError?: ListenerErrorHandler) {
    const lib = new FakeNativeLibrary();
    const instance = must(lib.instanceNew([]), "instance");
    const ptr = must(lib.mediaNewLocation(instance, "file:///tmp/clip.ogg"), "media");
    const media: FakeMedia = lib.media(ptr);
    const { logger, entries } = createRecordingLogger();
    const manager = new EventManager<EventType>({
        lib,
        handle: lib.mediaEventManager(ptr),
        name: "media",
        logger,
        onListenerError,
    });
    return { lib, media, em: media.events, manager, entries };
}
