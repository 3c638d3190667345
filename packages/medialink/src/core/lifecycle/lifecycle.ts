import { InvalidHandleError } from "../errors/errors";
import type { LifecycleConfig } from "./types";

/**
 * Guarded state of a native-backed object.
 *
 * Transitions outside the table are programming errors; leaving an object in
 * the wrong state is an invalid handle use, hence {@link InvalidHandleError}.
 */
export class Lifecycle<TState extends string> {
    private _current: TState;
    private readonly transitions: Record<TState, readonly TState[]>;
    private readonly name: string;

    constructor(config: LifecycleConfig<TState>) {
        this._current = config.initial;
        this.transitions = config.transitions;
        this.name = config.name;
    }

    get current(): TState {
        return this._current;
    }

    is(...states: TState[]): boolean {
        return states.includes(this._current);
    }

    canTransition(target: TState): boolean {
        return this.transitions[this._current].includes(target);
    }

    transition(target: TState): void {
        if (!this.canTransition(target)) {
            throw new Error(`Illegal transition: "${this._current}" → "${target}" for "${this.name}"`);
        }
        this._current = target;
    }

    assertState(...allowed: TState[]): void {
        if (!allowed.includes(this._current)) {
            const list = allowed.map((s) => `"${s}"`).join(", ");
            throw new InvalidHandleError(`"${this.name}" expected state ${list}, but current is "${this._current}"`);
        }
    }
}
