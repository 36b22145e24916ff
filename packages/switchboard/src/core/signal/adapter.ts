import type { Handler } from "./types";

/**
 * Wrap a handler so it is called with the first `arity` arguments of each
 * trigger only.
 *
 * `arity` must not exceed the signal's arity; the signal checks that at attach time.
 */
export function adaptArity<A extends unknown[], R>(handler: Handler<A, R>, arity: number): Handler<A, R> {
    return (...args: A): R => {
        // Rest parameters are a fresh array per call.
        args.splice(arity);
        return handler(...args);
    };
}
