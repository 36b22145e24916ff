import { TypeQualifier } from "./enums";
import type { TypeGuard } from "./types";

let nextTypeId = 1;

/**
 * Runtime stand-in for a static type, used to verify calls that cross the
 * type-erased `SignalBase` boundary.
 *
 * Descriptors compare by identity. Qualified and array forms are interned on
 * their base descriptor, so `d.reference() === d.reference()`.
 * Create new descriptors through a {@link TypeRegistry}, not this constructor.
 */
export class TypeDescriptor<T = unknown> {
    /** Process-wide, unique, positive. */
    readonly id: number;
    /** The unqualified form; `this` when unqualified. */
    readonly base: TypeDescriptor<T>;
    private referenceForm: TypeDescriptor<T> | null = null;
    private constantForm: TypeDescriptor<T> | null = null;
    private arrayForm: TypeDescriptor<T[]> | null = null;

    constructor(
        readonly name: string,
        private readonly guard: TypeGuard<T>,
        readonly qualifier: TypeQualifier = TypeQualifier.NONE,
        base?: TypeDescriptor<T>,
    ) {
        this.id = nextTypeId++;
        this.base = base ?? this;
    }

    get isQualified(): boolean {
        return this.qualifier !== TypeQualifier.NONE;
    }

    is(value: unknown): value is T {
        return this.guard(value);
    }

    reference(): TypeDescriptor<T> {
        const base = this.base;
        base.referenceForm ??= new TypeDescriptor(`${base.name}&`, base.guard, TypeQualifier.REFERENCE, base);
        return base.referenceForm;
    }

    constant(): TypeDescriptor<T> {
        const base = this.base;
        base.constantForm ??= new TypeDescriptor(`const ${base.name}`, base.guard, TypeQualifier.CONST, base);
        return base.constantForm;
    }

    /** Array of this type's base. */
    array(): TypeDescriptor<T[]> {
        const base = this.base;
        base.arrayForm ??= new TypeDescriptor(`${base.name}[]`, (value: unknown): value is T[] => {
            return Array.isArray(value) && value.every((item) => base.guard(item));
        });
        return base.arrayForm;
    }

    withoutQualifiers(): TypeDescriptor<T> {
        return this.base;
    }

    /**
     * Relaxed match used for erased arguments: `supplied` is this type, or a
     * qualified form of it.
     */
    accepts(supplied: TypeDescriptor): boolean {
        return supplied === this || supplied.base === this;
    }

    toString(): string {
        return this.name;
    }
}
