import type { DispatchConfig } from "../../config/types";
import type { ActionBase } from "../action/types";
import type { SignalManagerBase } from "../manager/types";
import type { TypeDescriptor } from "../type-descriptor/descriptor";
import type { SignatureBase } from "../type-descriptor/signature";
import type { LoggerContext } from "../types";
import type { DispatchKind, SignalStatus } from "./enums";
import type { SignalKey } from "./key";

export type Handler<A extends unknown[], R> = (...args: A) => R;

/** Outcome of one trigger pass: `unit` for void signatures, otherwise one value per action in order. */
export type DispatchResult<R> = { kind: DispatchKind.UNIT; count: number } | { kind: DispatchKind.VALUES; values: R[] };

export type AddActionOptions = {
    /**
     * Number of leading signal arguments the handler receives. Defaults to
     * every argument; must not exceed the signal's arity.
     */
    arity?: number;
};

export type TrackOptions = {
    /** Marks the manager as the one that destroys the signal; it is not notified on destruction. */
    primary?: boolean;
};

export type SignalOptions = {
    /** Diagnostic name; generated as `signal_<id>` when empty. */
    name?: string;
    manager?: SignalManagerBase;
    primary?: boolean;
    logger?: LoggerContext;
    config?: DispatchConfig;
};

/**
 * Type-erased view of a signal, used to hold signals of different
 * signatures in one collection. Erased triggers verify descriptors before
 * anything runs.
 */
export interface SignalBase {
    readonly id: number;
    readonly name: string;
    readonly signature: SignatureBase;
    readonly status: SignalStatus;
    readonly numArgs: number;
    readonly numActions: number;
    readonly primeManager: SignalManagerBase | null;

    addAction(action: ActionBase, options?: AddActionOptions): SignalKey;
    testMatch(action: ActionBase): boolean;
    has(key: SignalKey): boolean;
    remove(key: SignalKey): void;
    clear(): void;
    getPriority(key: SignalKey): number;
    keys(): SignalKey[];

    baseTrigger(argTypes: readonly TypeDescriptor[], ...args: unknown[]): void;
    baseTriggerReturning<T>(
        returnType: TypeDescriptor<T>,
        argTypes: readonly TypeDescriptor[],
        ...args: unknown[]
    ): T[];

    track(manager: SignalManagerBase, options?: TrackOptions): void;
    untrack(manager: SignalManagerBase): void;
    destroy(): void;
    clone(name?: string): SignalBase;
}
