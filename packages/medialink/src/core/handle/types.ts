import type { NativePointer } from "../native/types";

/**
 * Retain/release/address triplet for one native object kind.
 * Supplied by the facade; the core never hard-codes native calls.
 */
export interface HandleKind<T extends NativePointer> {
    readonly name: string;
    release(ptr: T): void;
    /** Absent for kinds the native library does not reference count. */
    retain?(ptr: T): void;
    address(ptr: T): bigint;
}
