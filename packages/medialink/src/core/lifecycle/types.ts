export type LifecycleConfig<TState extends string> = {
    transitions: Record<TState, readonly TState[]>;
    initial: TState;
    /** Owner label used in error messages. */
    name: string;
};
