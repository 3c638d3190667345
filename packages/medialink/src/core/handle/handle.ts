import { ConstructionError, InvalidHandleError } from "../errors/errors";
import type { NativePointer } from "../native/types";
import type { HandleKind } from "./types";

/**
 * Owning wrapper around one native reference.
 *
 * Each non-empty box owns exactly one native reference and gives it back
 * exactly once through {@link release}. `clone()` takes a new reference,
 * `move()` hands the existing one over and leaves this box empty.
 * Equality is native address identity.
 */
export class HandleBox<T extends NativePointer> {
    private ptr: T | null;

    private constructor(
        readonly kind: HandleKind<T>,
        ptr: T | null,
    ) {
        this.ptr = ptr;
    }

    /**
     * Take ownership of a freshly created handle. The create call already
     * handed over one reference, so nothing is retained.
     * @throws ConstructionError when the create call returned null.
     */
    static adopt<T extends NativePointer>(kind: HandleKind<T>, ptr: T | null): HandleBox<T> {
        if (ptr === null) throw new ConstructionError(kind.name);
        return new HandleBox(kind, ptr);
    }

    /** Take a new reference on a handle obtained without a transfer. A null handle yields an empty box. */
    static retain<T extends NativePointer>(kind: HandleKind<T>, ptr: T | null): HandleBox<T> {
        if (ptr === null) return new HandleBox(kind, null);
        retainOf(kind)(ptr);
        return new HandleBox(kind, ptr);
    }

    static empty<T extends NativePointer>(kind: HandleKind<T>): HandleBox<T> {
        return new HandleBox(kind, null);
    }

    isValid(): boolean {
        return this.ptr !== null;
    }

    /** @throws InvalidHandleError on an empty box. */
    get(): T {
        if (this.ptr === null) {
            throw new InvalidHandleError(`Use of an empty ${this.kind.name} handle`);
        }
        return this.ptr;
    }

    address(): bigint | null {
        return this.ptr === null ? null : this.kind.address(this.ptr);
    }

    clone(): HandleBox<T> {
        return HandleBox.retain(this.kind, this.ptr);
    }

    move(): HandleBox<T> {
        const ptr = this.ptr;
        this.ptr = null;
        return new HandleBox(this.kind, ptr);
    }

    release(): void {
        const ptr = this.ptr;
        if (ptr === null) return;
        this.ptr = null;
        this.kind.release(ptr);
    }

    equals(other: HandleBox<T>): boolean {
        return this.address() === other.address();
    }
}

function retainOf<T extends NativePointer>(kind: HandleKind<T>): (ptr: T) => void {
    const retain = kind.retain;
    if (!retain) {
        throw new InvalidHandleError(`${kind.name} handles are not reference counted and cannot be shared`);
    }
    return (ptr) => retain.call(kind, ptr);
}
