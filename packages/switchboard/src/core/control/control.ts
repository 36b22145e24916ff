import type { Action } from "../action/action";
import { ActionManager } from "../action/manager";
import type { ActionBase } from "../action/types";
import { Logger } from "../logger/logger";
import { SignalManager } from "../manager/manager";
import type { SignalKey } from "../signal/key";
import type { Signal } from "../signal/signal";
import type { Handler, SignalBase } from "../signal/types";
import type { TypeDescriptor } from "../type-descriptor/descriptor";
import type { Signature } from "../type-descriptor/signature";
import type { LoggerContext } from "../types";
import type { SignalControlOptions } from "./types";

/**
 * Facade over a {@link SignalManager} and an {@link ActionManager}: signals
 * and actions are registered by name and linked by name, so the code that
 * triggers a signal never needs to see the code that handles it.
 */
export class SignalControl {
    readonly signals: SignalManager;
    readonly actions: ActionManager;
    private readonly logger: LoggerContext;

    constructor(options: SignalControlOptions = {}) {
        this.logger = options.logger ?? new Logger();
        this.signals = new SignalManager({ logger: this.logger, config: options.config });
        this.actions = new ActionManager();
    }

    addSignal<A extends unknown[], R>(signature: Signature<A, R>, name?: string): Signal<A, R> {
        return this.signals.create(signature, name);
    }

    addAction<A extends unknown[], R>(name: string, signature: Signature<A, R>, fn: NoInfer<Handler<A, R>>): Action<A, R> {
        return this.actions.create(name, signature, fn);
    }

    /**
     * Attach the action called `actionName` to the signal called `signalName`.
     *
     * @throws {SignalError} `UNKNOWN_SIGNAL`, `UNKNOWN_ACTION` or `SIGNATURE_MISMATCH`.
     */
    link(signalName: string, actionName: string): SignalKey {
        const action = this.actions.require(actionName);
        const key = this.signals.addAction(signalName, action);
        this.logger.debug("SignalControl", `linked "${signalName}" → "${actionName}"`, { key: key.toString() });
        return key;
    }

    /** Erased trigger by name; see {@link SignalBase.baseTrigger}. */
    trigger(signalName: string, argTypes: readonly TypeDescriptor[], ...args: unknown[]): void {
        this.signals.trigger(signalName, argTypes, ...args);
    }

    getSignal(name: string): SignalBase | undefined {
        return this.signals.get(name);
    }

    getAction(name: string): ActionBase | undefined {
        return this.actions.get(name);
    }

    /** Destroy every signal this control created. Registered actions are kept. */
    dispose(): void {
        this.signals.dispose();
    }
}
