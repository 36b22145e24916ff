/**
 * Contract: TypeDescriptor / TypeRegistry / Signature -- runtime type tags.
 *
 * Sections:
 *   1. Builtin descriptors
 *   2. Qualified and array forms
 *   3. Relaxed matching (accepts)
 *   4. TypeRegistry
 *   5. Signatures
 */
import { describe, expect, it } from "vitest";
import { SignalErrorCode } from "../errors/enums";
import { types } from "./builtins";
import { TypeQualifier } from "./enums";
import { defaultTypeRegistry, defineType, TypeRegistry } from "./registry";
import { defineSignature, formatSignature, sameSignature, voidSignature } from "./signature";

class Organism {
    constructor(readonly fitness: number) {}
}

describe("TypeDescriptor", () => {
    // -- 1. Builtin descriptors --
    describe("Builtin descriptors", () => {
        it("each builtin has a unique positive id", () => {
            const ids = Object.values(types).map((type) => type.id);
            expect(new Set(ids).size).toBe(ids.length);
            expect(ids.every((id) => id > 0)).toBe(true);
        });

        it("guards recognise their values", () => {
            expect(types.number.is(4)).toBe(true);
            expect(types.number.is("4")).toBe(false);
            expect(types.string.is("a")).toBe(true);
            expect(types.boolean.is(false)).toBe(true);
            expect(types.bigint.is(1n)).toBe(true);
            expect(types.symbol.is(Symbol("s"))).toBe(true);
            expect(types.null.is(null)).toBe(true);
            expect(types.void.is(undefined)).toBe(true);
            expect(types.void.is(0)).toBe(true);
            expect(types.function.is(() => 1)).toBe(true);
            expect(types.object.is({})).toBe(true);
            expect(types.object.is(null)).toBe(false);
            expect(types.unknown.is(Symbol("anything"))).toBe(true);
        });

        it("unqualified descriptors are their own base", () => {
            expect(types.number.base).toBe(types.number);
            expect(types.number.isQualified).toBe(false);
            expect(types.number.qualifier).toBe(TypeQualifier.NONE);
        });
    });

    // -- 2. Qualified and array forms --
    describe("Qualified and array forms", () => {
        it("reference() is interned and reduces to the base", () => {
            const ref = types.number.reference();
            expect(ref).toBe(types.number.reference());
            expect(ref).not.toBe(types.number);
            expect(ref.name).toBe("number&");
            expect(ref.qualifier).toBe(TypeQualifier.REFERENCE);
            expect(ref.withoutQualifiers()).toBe(types.number);
        });

        it("qualifying a qualified descriptor qualifies its base", () => {
            expect(types.string.constant().reference()).toBe(types.string.reference());
            expect(types.string.constant().name).toBe("const string");
        });

        it("qualified forms share the base guard", () => {
            expect(types.number.reference().is(3)).toBe(true);
            expect(types.number.constant().is("3")).toBe(false);
        });

        it("array() is interned and checks every element", () => {
            const numbers = types.number.array();
            expect(numbers).toBe(types.number.array());
            expect(numbers.name).toBe("number[]");
            expect(numbers.is([1, 2, 3])).toBe(true);
            expect(numbers.is([1, "2"])).toBe(false);
            expect(numbers.is("12")).toBe(false);
        });

        it("toString() is the name", () => {
            expect(String(types.boolean.reference())).toBe("boolean&");
        });
    });

    // -- 3. Relaxed matching --
    describe("accepts()", () => {
        it("accepts the same descriptor", () => {
            expect(types.number.accepts(types.number)).toBe(true);
        });

        it("accepts a qualified form of itself", () => {
            expect(types.number.accepts(types.number.reference())).toBe(true);
            expect(types.number.accepts(types.number.constant())).toBe(true);
        });

        it("does not accept the unqualified form when declared as a reference", () => {
            expect(types.number.reference().accepts(types.number)).toBe(false);
        });

        it("rejects a different type", () => {
            expect(types.number.accepts(types.string)).toBe(false);
            expect(types.number.accepts(types.string.reference())).toBe(false);
        });
    });
});

describe("TypeRegistry", () => {
    it("knows every builtin", () => {
        const registry = new TypeRegistry();
        expect(registry.get("number")).toBe(types.number);
        expect(registry.has("void")).toBe(true);
        expect(registry.names()).toEqual(Object.values(types).map((type) => type.name));
    });

    it("define() registers a named descriptor with its guard", () => {
        const registry = new TypeRegistry();
        const even = registry.define("even", (value: unknown): value is number => {
            return typeof value === "number" && value % 2 === 0;
        });
        expect(registry.get("even")).toBe(even);
        expect(even.is(4)).toBe(true);
        expect(even.is(3)).toBe(false);
    });

    it("define() throws DUPLICATE_TYPE for a taken name", () => {
        const registry = new TypeRegistry();
        registry.define("genome", (value: unknown): value is string => typeof value === "string");
        let caught: unknown;
        try {
            registry.define("genome", (value: unknown): value is string => true);
        } catch (error) {
            caught = error;
        }
        expect(caught).toMatchObject({ code: SignalErrorCode.DUPLICATE_TYPE, message: 'Duplicate type: "genome"' });
    });

    it("define() refuses builtin names", () => {
        const registry = new TypeRegistry();
        expect(() => registry.define("number", (value: unknown): value is number => true)).toThrow(
            'Duplicate type: "number"',
        );
    });

    it("define() requires a name", () => {
        expect(() => new TypeRegistry().define(" ", (value: unknown): value is number => true)).toThrow(
            "name is required",
        );
    });

    it("instanceOf() names the descriptor after the class", () => {
        const registry = new TypeRegistry();
        const organism = registry.instanceOf(Organism);
        expect(organism.name).toBe("Organism");
        expect(organism.is(new Organism(1))).toBe(true);
        expect(organism.is({ fitness: 1 })).toBe(false);
    });

    it("defineType() registers in the shared default registry", () => {
        const cell = defineType("shared-cell", (value: unknown): value is number => typeof value === "number");
        expect(defaultTypeRegistry.get("shared-cell")).toBe(cell);
        expect(defaultTypeRegistry.has("number")).toBe(true);
        expect(() => defineType("shared-cell", (value: unknown): value is number => true)).toThrow(
            'Duplicate type: "shared-cell"',
        );
    });

    it("registries are independent namespaces", () => {
        const a = new TypeRegistry();
        const b = new TypeRegistry();
        const inA = a.define("cell", (value: unknown): value is number => true);
        const inB = b.define("cell", (value: unknown): value is number => true);
        expect(inA).not.toBe(inB);
        expect(inA.id).not.toBe(inB.id);
    });
});

describe("Signature", () => {
    it("defineSignature() lists the return type first", () => {
        const sig = defineSignature(types.number, types.string, types.boolean);
        expect(sig.returns).toBe(types.number);
        expect(sig.args).toEqual([types.string, types.boolean]);
    });

    it("voidSignature() returns void", () => {
        expect(voidSignature(types.number).returns).toBe(types.void);
        expect(voidSignature().args).toEqual([]);
    });

    it("sameSignature() compares descriptors exactly", () => {
        const a = defineSignature(types.number, types.number);
        expect(sameSignature(a, defineSignature(types.number, types.number))).toBe(true);
        expect(sameSignature(a, defineSignature(types.string, types.number))).toBe(false);
        expect(sameSignature(a, defineSignature(types.number, types.number.reference()))).toBe(false);
        expect(sameSignature(a, defineSignature(types.number, types.number, types.number))).toBe(false);
        expect(sameSignature(a, defineSignature(types.number))).toBe(false);
    });

    it("formatSignature() renders arrow syntax", () => {
        expect(formatSignature(defineSignature(types.void, types.number.reference(), types.string))).toBe(
            "(number&, string) => void",
        );
    });
});
