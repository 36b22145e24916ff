import { SignalErrorCode } from "../errors/enums";
import { SignalError } from "../errors/error";
import type { StateMachineConfig } from "./types";

export class StateMachine<TState extends string> {
    private _current: TState;
    private readonly _transitions: Record<TState, TState[]>;
    private readonly _name: string;

    constructor(config: StateMachineConfig<TState>) {
        this._current = config.initial;
        this._transitions = config.transitions;
        this._name = config.name ?? "StateMachine";
    }

    get current(): TState {
        return this._current;
    }

    /** @throws {SignalError} `ILLEGAL_TRANSITION` when `target` is not reachable from the current state. */
    transition(target: TState): void {
        if (!this.canTransition(target)) {
            throw new SignalError(
                SignalErrorCode.ILLEGAL_TRANSITION,
                `Illegal transition: "${this._current}" → "${target}" for "${this._name}"`,
                { from: this._current, to: target },
            );
        }
        this._current = target;
    }

    canTransition(target: TState): boolean {
        const allowed = this._transitions[this._current];
        return !!allowed && allowed.includes(target);
    }

    is(...states: TState[]): boolean {
        return states.includes(this._current);
    }
}
