import { defineHandleKind } from "../core/handle/helpers";
import type { HandleKind } from "../core/handle/types";
import type { InstancePtr, MediaDiscovererPtr, MediaListPtr, MediaPtr, NativeLibrary } from "../core/native/types";

export type HandleKinds = {
    instance: HandleKind<InstancePtr>;
    media: HandleKind<MediaPtr>;
    mediaList: HandleKind<MediaListPtr>;
    mediaDiscoverer: HandleKind<MediaDiscovererPtr>;
};

const kindsByLibrary = new WeakMap<NativeLibrary, HandleKinds>();

/** Retain/release triplets for every facade kind, built once per loaded library. */
export function handleKinds(lib: NativeLibrary): HandleKinds {
    let kinds = kindsByLibrary.get(lib);
    if (!kinds) {
        kinds = {
            instance: defineHandleKind<InstancePtr>(lib, "instance", {
                retain: (ptr) => lib.instanceRetain(ptr),
                release: (ptr) => lib.instanceRelease(ptr),
            }),
            media: defineHandleKind<MediaPtr>(lib, "media", {
                retain: (ptr) => lib.mediaRetain(ptr),
                release: (ptr) => lib.mediaRelease(ptr),
            }),
            mediaList: defineHandleKind<MediaListPtr>(lib, "media list", {
                retain: (ptr) => lib.mediaListRetain(ptr),
                release: (ptr) => lib.mediaListRelease(ptr),
            }),
            // Not reference counted natively.
            mediaDiscoverer: defineHandleKind<MediaDiscovererPtr>(lib, "media discoverer", {
                release: (ptr) => lib.mediaDiscovererRelease(ptr),
            }),
        };
        kindsByLibrary.set(lib, kinds);
    }
    return kinds;
}
