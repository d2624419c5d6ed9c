/**
 * Managed member markers
 *
 * Standard decorators that mark methods and getters as managed, plus the
 * inspection that reads those markers back from a class.
 *
 * @module managed
 */

import { ReflectionAccessError } from "./errors.ts";
import type { Constructor, MemberDescriptor } from "./types.ts";

type ManagedMarker = Omit<MemberDescriptor, "name">;

/** Decorated function -> marker. Keyed by the function so subclasses see inherited markers. */
const markers = new WeakMap<object, ManagedMarker>();

/** Class -> join name declared with @ManagedResource */
const classNames = new WeakMap<object, string>();

/**
 * Options for {@link Managed}
 */
export interface ManagedOptions {
    /**
     * What a decorated method produces. Getters always produce a value.
     * @default "value"
     */
    returns?: "value" | "void";
}

/**
 * Options for {@link ManagedResource}
 */
export interface ManagedResourceOptions {
    /** Name the class is joined on, e.g. "com.example.Cache" */
    className: string;
}

/**
 * Mark a public instance method or getter as managed.
 *
 * Methods report their declared parameter count (`Function.length`, so
 * parameters with defaults and rest parameters are not counted).
 *
 * @example
 * ```typescript
 * class Counter {
 *     @Managed("current count")
 *     get count(): number { return this.value; }
 *
 *     @Managed("reset counter", { returns: "void" })
 *     reset(): void { this.value = 0; }
 * }
 * ```
 *
 * @throws {TypeError} When applied to a static, `#private`, symbol-named or setter member
 */
export function Managed(description = "", options: ManagedOptions = {}) {
    return function <This, Args extends unknown[], Return>(
        target: (this: This, ...args: Args) => Return,
        context: ClassMethodDecoratorContext<This, (this: This, ...args: Args) => Return> | ClassGetterDecoratorContext<This, Return>,
    ): void {
        const kind: string = context.kind;
        const name = context.name;

        if (typeof name !== "string") {
            throw new TypeError("@Managed members must have a string name");
        }
        if (kind !== "method" && kind !== "getter") {
            throw new TypeError(`@Managed cannot decorate ${kind} '${name}'`);
        }
        if (context.static || context.private) {
            throw new TypeError(`@Managed cannot decorate static or private member '${name}'`);
        }

        const isGetter = kind === "getter";
        markers.set(target, {
            description,
            returnsValue: isGetter || options.returns !== "void",
            parameterCount: isGetter ? 0 : target.length,
        });
    };
}

/**
 * Declare the name a class is joined on.
 *
 * Without it the constructor's own `name` is used.
 */
export function ManagedResource(options: ManagedResourceOptions) {
    return function <T extends Constructor>(target: T, _context: ClassDecoratorContext<T>): void {
        classNames.set(target, options.className);
    };
}

/**
 * Join name of a class: the @ManagedResource name, else the constructor name.
 */
export function getClassName(type: { readonly name: string }): string {
    return classNames.get(type) ?? (type.name || "<anonymous>");
}

function markerOf(descriptor: PropertyDescriptor | undefined): ManagedMarker | undefined {
    if (descriptor === undefined) {
        return undefined;
    }
    if (descriptor.get !== undefined) {
        return markers.get(descriptor.get);
    }
    const value: unknown = descriptor.value;
    return typeof value === "function" ? markers.get(value) : undefined;
}

/**
 * List the managed members a class exposes, including inherited ones.
 *
 * The most derived definition of a name wins, so an undecorated override
 * hides a managed member of a base class.
 *
 * @throws {ReflectionAccessError} If a prototype on the chain cannot be read
 */
export function describeManagedMembers(type: Constructor): MemberDescriptor[] {
    const className = getClassName(type);
    const start: unknown = type.prototype;
    if (typeof start !== "object" || start === null) {
        throw new ReflectionAccessError({ className, cause: new TypeError("class has no prototype") });
    }

    const members: MemberDescriptor[] = [];
    const seen = new Set<string>();
    let memberName: string | undefined;

    try {
        for (let proto: object | null = start; proto !== null && proto !== Object.prototype; proto = Object.getPrototypeOf(proto)) {
            for (const key of Object.getOwnPropertyNames(proto)) {
                if (key === "constructor" || seen.has(key)) {
                    continue;
                }
                seen.add(key);

                memberName = key;
                const marker = markerOf(Object.getOwnPropertyDescriptor(proto, key));
                if (marker !== undefined) {
                    members.push({ name: key, ...marker });
                }
            }
            memberName = undefined;
        }
    } catch (error) {
        throw new ReflectionAccessError({ className, memberName, cause: error });
    }

    return members;
}
