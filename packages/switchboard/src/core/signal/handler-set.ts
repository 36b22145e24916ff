import type { Handler } from "./types";

export type RunOptions = {
    /** Iterate over a copy taken when the pass starts. */
    snapshot: boolean;
    /** Let the first failure escape instead of running the remaining handlers. */
    failFast: boolean;
    /** Prefix for the aggregate failure message. */
    label: string;
    /** Called for each caught failure (only when `failFast` is off). */
    onError?: (error: unknown, position: number) => void;
};

/** Ordered handlers sharing one signature. Position is invocation order. */
export class HandlerSet<A extends unknown[], R> {
    private readonly handlers: Handler<A, R>[] = [];

    get size(): number {
        return this.handlers.length;
    }

    /** Append and return the new handler's position. */
    add(handler: Handler<A, R>): number {
        this.handlers.push(handler);
        return this.handlers.length - 1;
    }

    /** Remove the handler at `position`; later handlers move up by one. */
    remove(position: number): void {
        if (!Number.isInteger(position) || position < 0 || position >= this.handlers.length) {
            throw new RangeError(`Handler position ${position} is out of range (size ${this.handlers.length})`);
        }
        this.handlers.splice(position, 1);
    }

    at(position: number): Handler<A, R> | undefined {
        return this.handlers[position];
    }

    /**
     * Call every handler with `args`, in position order, and return one result per handler.
     *
     * Unless `failFast` is set, a throwing handler does not stop the pass: the
     * failure is reported to `onError` and, once all handlers have run,
     * rethrown as-is (one failure) or as an `AggregateError` (several).
     */
    run(args: A, options: RunOptions): R[] {
        const list = options.snapshot ? [...this.handlers] : this.handlers;
        const results: R[] = [];
        const failures: unknown[] = [];

        for (const [position, handler] of list.entries()) {
            if (options.failFast) {
                results.push(handler(...args));
                continue;
            }
            try {
                results.push(handler(...args));
            } catch (error) {
                failures.push(error);
                options.onError?.(error, position);
            }
        }

        if (failures.length === 1) throw failures[0];
        if (failures.length > 1) {
            throw new AggregateError(failures, `${options.label}: ${failures.length} actions failed`);
        }
        return results;
    }
}
