import { isBoolean, isFunction, isNull, isString, isSymbol, isUndefined } from "es-toolkit";
import { TypeDescriptor } from "./descriptor";
import type { AnyFunction } from "./types";

/** Descriptors every {@link TypeRegistry} knows about. */
export const types = Object.freeze({
    /** A `void` result is discarded, so any value satisfies it. */
    void: new TypeDescriptor<void>("void", (_value: unknown): _value is void => true),
    undefined: new TypeDescriptor<undefined>("undefined", isUndefined),
    null: new TypeDescriptor<null>("null", isNull),
    unknown: new TypeDescriptor<unknown>("unknown", (_value: unknown): _value is unknown => true),
    number: new TypeDescriptor<number>("number", (value: unknown): value is number => typeof value === "number"),
    string: new TypeDescriptor<string>("string", isString),
    boolean: new TypeDescriptor<boolean>("boolean", isBoolean),
    bigint: new TypeDescriptor<bigint>("bigint", (value: unknown): value is bigint => typeof value === "bigint"),
    symbol: new TypeDescriptor<symbol>("symbol", isSymbol),
    function: new TypeDescriptor<AnyFunction>("function", (value: unknown): value is AnyFunction => isFunction(value)),
    object: new TypeDescriptor<object>(
        "object",
        (value: unknown): value is object => typeof value === "object" && value !== null,
    ),
});

export type BuiltinTypeName = keyof typeof types;
