/**
 * Contract: Action -- named callable tagged with its signature.
 *
 * Sections:
 *   1. Action
 *   2. createAction()
 *   3. isActionFor()
 */
import { describe, expect, it } from "vitest";
import { types } from "../type-descriptor/builtins";
import { defineSignature, voidSignature } from "../type-descriptor/signature";
import { Action, isActionFor } from "./action";
import { createAction } from "./helpers";

const scale = defineSignature(types.number, types.number, types.number);

describe("Action", () => {
    // -- 1. Action --
    describe("Action", () => {
        it("exposes name, signature and arity", () => {
            const action = new Action("scale", scale, (x: number, factor: number) => x * factor);
            expect(action.name).toBe("scale");
            expect(action.signature).toBe(scale);
            expect(action.numArgs).toBe(2);
        });

        it("getFun returns the wrapped callable unchanged", () => {
            const fn = (x: number, factor: number) => x * factor;
            const action = new Action("scale", scale, fn);
            expect(action.getFun()).toBe(fn);
            expect(action.getFun()(3, 4)).toBe(12);
        });

        it("clone keeps the callable under a new name", () => {
            const fn = (x: number) => x;
            const action = new Action("scale", scale, fn);
            const copy = action.clone("identity");
            expect(copy.name).toBe("identity");
            expect(copy.getFun()).toBe(fn);
            expect(action.clone().name).toBe("scale");
        });
    });

    // -- 2. createAction() --
    describe("createAction()", () => {
        it("creates an Action", () => {
            const action = createAction("noop", voidSignature(), () => {});
            expect(action).toBeInstanceOf(Action);
            expect(action.numArgs).toBe(0);
        });

        it("rejects an empty name", () => {
            expect(() => createAction("  ", voidSignature(), () => {})).toThrow("createAction: name is required");
        });

        it("rejects a non-callable", () => {
            const notCallable = "noop" as unknown as () => void;
            expect(() => createAction("noop", voidSignature(), notCallable)).toThrow(
                'createAction: "noop" must be a function',
            );
        });
    });

    // -- 3. isActionFor() --
    describe("isActionFor()", () => {
        it("matches the exact signature", () => {
            const action = createAction("scale", scale, (x: number) => x);
            expect(isActionFor(action, scale)).toBe(true);
            expect(isActionFor(action, defineSignature(types.number, types.number, types.number))).toBe(true);
        });

        it("rejects a different return or argument list", () => {
            const action = createAction("scale", scale, (x: number) => x);
            expect(isActionFor(action, voidSignature(types.number, types.number))).toBe(false);
            expect(isActionFor(action, defineSignature(types.number, types.number))).toBe(false);
            expect(isActionFor(action, defineSignature(types.number, types.number, types.string))).toBe(false);
        });

        it("rejects objects that only look like actions", () => {
            const lookalike = { name: "scale", signature: scale, numArgs: 2 };
            expect(isActionFor(lookalike, scale)).toBe(false);
        });
    });
});
