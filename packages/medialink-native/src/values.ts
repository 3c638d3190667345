import type { NativePointer } from "@medialink/core";

/** Member of a numeric enum whose value is `value`, if any. */
export function enumMember<E extends number>(members: readonly (string | E)[], value: number): E | undefined {
    return members.find((member): member is E => member === value);
}

/** koffi hands back pointers as opaque objects, NULL as `null`. */
export function asPointer(value: unknown): NativePointer | null {
    return typeof value === "object" && value !== null ? value : null;
}

export function asNumber(value: unknown, what: string): number {
    if (typeof value === "number") return value;
    if (typeof value === "bigint") return Number(value);
    throw new TypeError(`${what}: expected a number, got ${typeof value}`);
}

export function asString(value: unknown): string | null {
    return typeof value === "string" ? value : null;
}

export function asBoolean(value: unknown): boolean {
    return value === true || (typeof value === "number" && value !== 0);
}
