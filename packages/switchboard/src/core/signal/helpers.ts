import type { Signature } from "../type-descriptor/signature";
import { Signal } from "./signal";
import type { SignalOptions } from "./types";

/**
 * Creates a {@link Signal} for `signature`.
 *
 * @throws If `signature` does not carry a return descriptor and an argument list.
 */
export function createSignal<A extends unknown[], R>(
    signature: Signature<A, R>,
    options: SignalOptions = {},
): Signal<A, R> {
    if (!signature.returns) throw new Error("createSignal: signature.returns is required");
    if (!Array.isArray(signature.args)) throw new Error("createSignal: signature.args must be an array");
    return new Signal(signature, options);
}
