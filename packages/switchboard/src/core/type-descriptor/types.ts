export type TypeGuard<T> = (value: unknown) => value is T;

/** Any callable, for use as the payload type of function-valued arguments. */
export type AnyFunction = (...args: never[]) => unknown;

/** Any class constructor. */
export type Constructor<T> = abstract new (...args: never[]) => T;
