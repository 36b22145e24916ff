import { types } from "./builtins";
import type { TypeDescriptor } from "./descriptor";

/** One descriptor per element of the argument tuple `A`. */
export type DescriptorsOf<A extends unknown[]> = { [K in keyof A]: TypeDescriptor<A[K]> };

/** Signature with its type parameters erased, as seen across the `SignalBase` boundary. */
export interface SignatureBase {
    readonly args: readonly TypeDescriptor[];
    readonly returns: TypeDescriptor;
}

/** Runtime tag for the function type `(...args: A) => R`. */
export interface Signature<A extends unknown[], R> {
    readonly args: DescriptorsOf<A>;
    readonly returns: TypeDescriptor<R>;
}

/**
 * Build a signature, return type first: `defineSignature(types.number, types.string)`
 * tags `(arg: string) => number`.
 */
export function defineSignature<R, A extends unknown[]>(
    returns: TypeDescriptor<R>,
    ...args: DescriptorsOf<A>
): Signature<A, R> {
    return Object.freeze({ args, returns });
}

/** Shorthand for a signature returning `void`. */
export function voidSignature<A extends unknown[]>(...args: DescriptorsOf<A>): Signature<A, void> {
    return defineSignature<void, A>(types.void, ...args);
}

/** Exact match: same return descriptor, same arity, same descriptor at every position. */
export function sameSignature(a: SignatureBase, b: SignatureBase): boolean {
    if (a === b) return true;
    if (a.returns !== b.returns || a.args.length !== b.args.length) return false;
    return a.args.every((type, index) => type === b.args[index]);
}

export function formatSignature(signature: SignatureBase): string {
    return `(${signature.args.map((type) => type.name).join(", ")}) => ${signature.returns.name}`;
}
