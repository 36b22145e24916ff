import type { Handler } from "../signal/types";
import type { Signature } from "../type-descriptor/signature";
import { sameSignature } from "../type-descriptor/signature";
import type { ActionBase } from "./types";

/**
 * A named callable tagged with its exact signature, so it can be handed to
 * code that only knows {@link ActionBase} and still be attached to a signal
 * after a runtime signature check. Performs no argument adaptation itself.
 */
export class Action<A extends unknown[], R = void> implements ActionBase {
    constructor(
        readonly name: string,
        readonly signature: Signature<A, R>,
        private readonly fn: NoInfer<(...args: A) => R>,
    ) {}

    get numArgs(): number {
        return this.signature.args.length;
    }

    getFun(): Handler<A, R> {
        return this.fn;
    }

    clone(name: string = this.name): Action<A, R> {
        return new Action(name, this.signature, this.fn);
    }
}

/** True when `action` carries exactly `signature`, which makes its callable safe to attach. */
export function isActionFor<A extends unknown[], R>(
    action: ActionBase,
    signature: Signature<A, R>,
): action is Action<A, R> {
    return action instanceof Action && sameSignature(action.signature, signature);
}
