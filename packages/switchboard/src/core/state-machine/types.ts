export type StateMachineConfig<TState extends string> = {
    transitions: Record<TState, TState[]>;
    initial: TState;
    name?: string;
};
