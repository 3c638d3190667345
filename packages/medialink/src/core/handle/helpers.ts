import type { NativeLibrary, NativePointer } from "../native/types";
import { HandleBox } from "./handle";
import type { HandleKind } from "./types";

/** Wrap the result of a native create call. Throws ConstructionError on null. */
export function acquireNew<T extends NativePointer>(kind: HandleKind<T>, create: () => T | null): HandleBox<T> {
    return HandleBox.adopt(kind, create());
}

/** Wrap a handle the caller does not own; always retains. */
export function acquireExisting<T extends NativePointer>(kind: HandleKind<T>, ptr: T | null): HandleBox<T> {
    return HandleBox.retain(kind, ptr);
}

/** Build a {@link HandleKind} whose identity comes from the library's address lookup. */
export function defineHandleKind<T extends NativePointer>(
    lib: NativeLibrary,
    name: string,
    ops: { release: (ptr: T) => void; retain?: (ptr: T) => void },
): HandleKind<T> {
    return {
        name,
        release: ops.release,
        retain: ops.retain,
        address: (ptr) => lib.addressOf(ptr),
    };
}
