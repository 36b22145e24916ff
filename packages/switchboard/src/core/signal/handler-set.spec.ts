/**
 * Contract: HandlerSet -- ordered handlers of one signature.
 *
 * Sections:
 *   1. add / remove / at
 *   2. run() ordering and results
 *   3. Snapshot vs live iteration
 *   4. Failure handling
 */
import { describe, expect, it, vi } from "vitest";
import { HandlerSet } from "./handler-set";
import type { RunOptions } from "./handler-set";

const RUN: RunOptions = { snapshot: true, failFast: false, label: "test" };

describe("HandlerSet", () => {
    // -- 1. add / remove / at --
    describe("add / remove / at", () => {
        it("add returns consecutive positions", () => {
            const set = new HandlerSet<[number], number>();
            expect(set.add((n) => n)).toBe(0);
            expect(set.add((n) => n * 2)).toBe(1);
            expect(set.size).toBe(2);
        });

        it("remove shifts later handlers up", () => {
            const set = new HandlerSet<[number], number>();
            const first = (n: number) => n;
            const second = (n: number) => n + 1;
            set.add(first);
            set.add(second);
            set.remove(0);
            expect(set.size).toBe(1);
            expect(set.at(0)).toBe(second);
        });

        it("remove rejects positions out of range", () => {
            const set = new HandlerSet<[], void>();
            set.add(() => {});
            expect(() => set.remove(1)).toThrow(RangeError);
            expect(() => set.remove(-1)).toThrow("Handler position -1 is out of range (size 1)");
        });

        it("at returns undefined past the end", () => {
            expect(new HandlerSet<[], void>().at(0)).toBeUndefined();
        });
    });

    // -- 2. run() ordering and results --
    describe("run() ordering and results", () => {
        it("calls handlers in position order with the same arguments", () => {
            const set = new HandlerSet<[string, number], void>();
            const calls: string[] = [];
            set.add((s, n) => void calls.push(`a:${s}:${n}`));
            set.add((s, n) => void calls.push(`b:${s}:${n}`));
            set.run(["x", 1], RUN);
            expect(calls).toEqual(["a:x:1", "b:x:1"]);
        });

        it("returns one result per handler", () => {
            const set = new HandlerSet<[number], number>();
            set.add((n) => n + 1);
            set.add((n) => n * 10);
            expect(set.run([3], RUN)).toEqual([4, 30]);
        });

        it("an empty set returns an empty list", () => {
            expect(new HandlerSet<[number], number>().run([1], RUN)).toEqual([]);
        });
    });

    // -- 3. Snapshot vs live iteration --
    describe("Snapshot vs live iteration", () => {
        it("with snapshot, a handler added mid-run waits for the next run", () => {
            const set = new HandlerSet<[], string>();
            const late = vi.fn(() => "late");
            set.add(() => {
                set.add(late);
                return "first";
            });
            expect(set.run([], RUN)).toEqual(["first"]);
            expect(late).not.toHaveBeenCalled();
        });

        it("without snapshot, a handler added mid-run runs in the same pass", () => {
            const set = new HandlerSet<[], string>();
            let added = false;
            set.add(() => {
                if (!added) {
                    added = true;
                    set.add(() => "late");
                }
                return "first";
            });
            expect(set.run([], { ...RUN, snapshot: false })).toEqual(["first", "late"]);
        });
    });

    // -- 4. Failure handling --
    describe("Failure handling", () => {
        it("runs every handler and rethrows a single failure unchanged", () => {
            const set = new HandlerSet<[], number>();
            const boom = new Error("boom");
            const after = vi.fn(() => 2);
            set.add(() => {
                throw boom;
            });
            set.add(after);
            expect(() => set.run([], RUN)).toThrow(boom);
            expect(after).toHaveBeenCalledTimes(1);
        });

        it("reports each failure with its position", () => {
            const set = new HandlerSet<[], number>();
            const onError = vi.fn();
            set.add(() => 1);
            set.add(() => {
                throw new Error("second");
            });
            expect(() => set.run([], { ...RUN, onError })).toThrow("second");
            expect(onError).toHaveBeenCalledTimes(1);
            expect(onError).toHaveBeenCalledWith(expect.any(Error), 1);
        });

        it("collects several failures into an AggregateError in order", () => {
            const set = new HandlerSet<[], void>();
            const a = new Error("a");
            const b = new Error("b");
            set.add(() => {
                throw a;
            });
            set.add(() => {
                throw b;
            });
            try {
                set.run([], { ...RUN, label: "Signal \"clicks\"" });
                expect.unreachable();
            } catch (error) {
                expect(error).toBeInstanceOf(AggregateError);
                if (!(error instanceof AggregateError)) return;
                expect(error.message).toBe("Signal \"clicks\": 2 actions failed");
                expect(error.errors).toEqual([a, b]);
            }
        });

        it("fail-fast stops at the first failure", () => {
            const set = new HandlerSet<[], void>();
            const after = vi.fn();
            const onError = vi.fn();
            set.add(() => {
                throw new Error("first");
            });
            set.add(after);
            expect(() => set.run([], { ...RUN, failFast: true, onError })).toThrow("first");
            expect(after).not.toHaveBeenCalled();
            expect(onError).not.toHaveBeenCalled();
        });
    });
});
