import { isFunction } from "es-toolkit";
import type { Signature } from "../type-descriptor/signature";
import { Action } from "./action";

/**
 * Creates an {@link Action} bound to `signature`.
 *
 * @throws If `name` is empty or `fn` is not callable.
 */
export function createAction<A extends unknown[], R>(
    name: string,
    signature: Signature<A, R>,
    fn: NoInfer<(...args: A) => R>,
): Action<A, R> {
    if (!name || name.trim().length === 0) throw new Error("createAction: name is required");
    if (!isFunction(fn)) throw new Error(`createAction: "${name}" must be a function`);
    return new Action(name, signature, fn);
}
