import { SignalErrorCode } from "../errors/enums";
import { SignalError } from "../errors/error";
import { types } from "./builtins";
import { TypeDescriptor } from "./descriptor";
import type { Constructor, TypeGuard } from "./types";

/**
 * Name index of descriptors. Names are unique per registry; the builtin
 * descriptors are pre-registered in every instance.
 */
export class TypeRegistry {
    private readonly byName = new Map<string, TypeDescriptor>();

    constructor() {
        for (const descriptor of Object.values(types)) {
            this.byName.set(descriptor.name, descriptor);
        }
    }

    /**
     * Register a new descriptor.
     *
     * @throws {SignalError} `DUPLICATE_TYPE` if the name is taken.
     */
    define<T>(name: string, guard: TypeGuard<T>): TypeDescriptor<T> {
        if (!name || name.trim().length === 0) {
            throw new Error("TypeRegistry.define: name is required");
        }
        if (this.byName.has(name)) {
            throw new SignalError(SignalErrorCode.DUPLICATE_TYPE, `Duplicate type: "${name}"`, { name });
        }
        const descriptor = new TypeDescriptor<T>(name, guard);
        this.byName.set(name, descriptor);
        return descriptor;
    }

    /** Register a descriptor whose guard is `instanceof ctor`, named after the class. */
    instanceOf<T>(ctor: Constructor<T>, name: string = ctor.name): TypeDescriptor<T> {
        return this.define(name, (value: unknown): value is T => value instanceof ctor);
    }

    get(name: string): TypeDescriptor | undefined {
        return this.byName.get(name);
    }

    has(name: string): boolean {
        return this.byName.has(name);
    }

    names(): string[] {
        return [...this.byName.keys()];
    }
}

/** Registry shared by code that does not need its own namespace. */
export const defaultTypeRegistry = new TypeRegistry();

export function defineType<T>(name: string, guard: TypeGuard<T>): TypeDescriptor<T> {
    return defaultTypeRegistry.define(name, guard);
}
