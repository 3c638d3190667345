import { delay, noop, TimeoutError } from "es-toolkit";
import type { EventType } from "../native/enums";
import type { EventOf } from "../native/types";
import type { EventManager } from "./event-manager";
import type { WaitForEventOptions } from "./types";

/**
 * Resolve with the next event of `kind` (accepted by `filter`, if given).
 *
 * The listener is always removed once this settles. With `timeoutMs` the
 * promise rejects with es-toolkit's `TimeoutError`; the timer is cleared as
 * soon as the wait settles either way.
 */
export async function waitForEvent<TKind extends EventType, K extends TKind>(
    manager: EventManager<TKind>,
    kind: K,
    options: WaitForEventOptions<K> = {},
): Promise<EventOf<K>> {
    const { timeoutMs, filter } = options;
    let settle: (event: EventOf<K>) => void = noop;
    const next = new Promise<EventOf<K>>((resolve) => {
        settle = resolve;
    });
    const subscription = manager.subscribe(kind, (event) => {
        if (!filter || filter(event)) settle(event);
    });

    if (timeoutMs === undefined) {
        try {
            return await next;
        } finally {
            subscription.unsubscribe();
        }
    }

    const timer = new AbortController();
    const expired = delay(timeoutMs, { signal: timer.signal }).then(
        () => Promise.reject(new TimeoutError()),
        // Aborted because the event arrived first.
        () => new Promise<never>(noop),
    );
    try {
        return await Promise.race([next, expired]);
    } finally {
        timer.abort();
        subscription.unsubscribe();
    }
}
