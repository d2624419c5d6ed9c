/**
 * Dependency injection container
 *
 * Resolves bindings and exposes the object graph they describe, so the
 * inspector can list every class the application can produce.
 *
 * @module Container
 */

import { getClassName } from "./managed.ts";
import type { ClassDescriptor, Constructor, ObjectGraph } from "./types.ts";

/**
 * Named token for non-class dependencies
 */
export interface Token<T> {
    readonly key: symbol;
    readonly description: string;
    /** Type carrier only; never set */
    readonly __type?: T;
}

export type InjectionToken<T = unknown> = Token<T> | (abstract new (...args: never[]) => T);

export type Lifecycle = "singleton" | "transient";

export interface ClassProvider<T> {
    useClass: new (...args: never[]) => T;
    /** Overrides the class's own `static inject` list */
    inject?: readonly InjectionToken[];
    lifecycle?: Lifecycle;
}

export interface ValueProvider<T> {
    useValue: T;
}

export interface FactoryProvider<T> {
    useFactory: (...deps: never[]) => T;
    inject?: readonly InjectionToken[];
    lifecycle?: Lifecycle;
}

export type Provider<T> = ClassProvider<T> | ValueProvider<T> | FactoryProvider<T>;

interface Binding {
    readonly provider: Provider<unknown>;
    cached?: { value: unknown };
}

/**
 * Create a token for a dependency that has no class of its own
 *
 * @example
 * ```typescript
 * const CONFIG = createToken<AppConfig>("CONFIG");
 * container.bind(CONFIG, { useValue: { port: 5000 } });
 * ```
 */
export function createToken<T>(description: string): Token<T> {
    return Object.freeze({ key: Symbol(description), description });
}

function isConstructor(value: unknown): value is Constructor {
    return typeof value === "function" && typeof value.prototype === "object" && value.prototype !== null;
}

function isInjectionToken(value: unknown): value is InjectionToken {
    if (isConstructor(value)) return true;
    return typeof value === "object" && value !== null && "key" in value && typeof value.key === "symbol";
}

function describeToken(token: InjectionToken): string {
    return isConstructor(token) ? getClassName(token) : token.description;
}

/**
 * Dependencies a class declares with `static inject = [...]`
 */
function declaredDependencies(type: Constructor): InjectionToken[] {
    const declared: unknown = Reflect.get(type, "inject");
    return Array.isArray(declared) ? declared.filter(isInjectionToken) : [];
}

/**
 * Dependency injection container
 *
 * @example
 * ```typescript
 * class UserCache {
 *     static inject = [Database];
 *     constructor(private readonly db: Database) {}
 * }
 *
 * const container = createContainer()
 *     .bind(Database, { useValue: db })
 *     .bind(UserCache);
 *
 * container.get(UserCache);
 * container.listBoundTypes(); // [Database, UserCache]
 * ```
 */
export class Container implements ObjectGraph {
    /** Explicit bindings, in binding order */
    private _bindings = new Map<InjectionToken, Binding>();

    /** Just-in-time bindings for unbound classes that were resolved */
    private _jitBindings = new Map<InjectionToken, Binding>();

    /**
     * Bind a class to itself
     */
    bind<T>(type: new (...args: never[]) => T): this;

    /**
     * Bind a token to a provider
     *
     * @throws {Error} If the token is already bound
     */
    bind<T>(token: InjectionToken<T>, provider: Provider<T>): this;

    bind<T>(token: InjectionToken<T>, provider?: Provider<T>): this {
        if (this._bindings.has(token)) {
            throw new Error(`${describeToken(token)} is already bound`);
        }

        let resolved: Provider<T>;
        if (provider !== undefined) {
            resolved = provider;
        } else if (isConcrete(token)) {
            resolved = { useClass: token };
        } else {
            throw new Error(`${describeToken(token)} needs a provider`);
        }

        this._bindings.set(token, { provider: resolved });
        return this;
    }

    isBound(token: InjectionToken): boolean {
        return this._bindings.has(token);
    }

    /**
     * Resolve a token
     *
     * Unbound classes are constructed just-in-time from their `static inject` list.
     *
     * @throws {Error} If the token is unbound and not a class, or on a dependency cycle
     */
    get<T>(token: InjectionToken<T>): T {
        // Bindings are keyed by token, so the stored value has the token's type
        return this._resolve(token, []) as T;
    }

    /**
     * Every distinct class reachable from the bindings, in binding order.
     *
     * Includes bound class tokens, `useClass` implementations, the classes of
     * bound values and, transitively, the class dependencies each provider is
     * built from. Dependencies are visited after the class that declares them.
     */
    listBoundTypes(): ClassDescriptor[] {
        const visitedTokens = new Set<InjectionToken>();
        const listed = new Set<Constructor>();
        const result: ClassDescriptor[] = [];

        const visitClass = (type: Constructor, dependencies: readonly InjectionToken[]): void => {
            if (!listed.has(type)) {
                listed.add(type);
                result.push({ name: getClassName(type), type });
            }
            for (const dependency of dependencies) {
                visitToken(dependency);
            }
        };

        // Follows the provider that `_resolve` would use for the token
        const visitToken = (token: InjectionToken): void => {
            if (visitedTokens.has(token)) {
                return;
            }
            visitedTokens.add(token);

            const provider = this._bindings.get(token)?.provider;
            if (provider === undefined) {
                if (isConstructor(token)) {
                    visitClass(token, declaredDependencies(token));
                }
                return;
            }

            if (isConstructor(token) && !("useClass" in provider && provider.useClass === token)) {
                visitClass(token, []);
            }

            if ("useClass" in provider) {
                visitClass(provider.useClass, provider.inject ?? declaredDependencies(provider.useClass));
            } else if ("useValue" in provider) {
                const owner = valueClass(provider.useValue);
                if (owner !== undefined) {
                    visitClass(owner, []);
                }
            } else {
                for (const dependency of provider.inject ?? []) {
                    visitToken(dependency);
                }
            }
        };

        for (const token of this._bindings.keys()) {
            visitToken(token);
        }

        return result;
    }

    private _resolve(token: InjectionToken, path: readonly InjectionToken[]): unknown {
        if (path.includes(token)) {
            throw new Error(`Dependency cycle: ${[...path, token].map(describeToken).join(" -> ")}`);
        }

        const binding = this._bindings.get(token) ?? this._jitBinding(token);
        if (binding.cached !== undefined) {
            return binding.cached.value;
        }

        const { provider } = binding;
        const nextPath = [...path, token];
        let value: unknown;
        let lifecycle: Lifecycle = "singleton";

        if ("useValue" in provider) {
            value = provider.useValue;
        } else if ("useClass" in provider) {
            const dependencies = (provider.inject ?? declaredDependencies(provider.useClass)).map((dep) => this._resolve(dep, nextPath));
            value = Reflect.construct(provider.useClass, dependencies);
            lifecycle = provider.lifecycle ?? lifecycle;
        } else {
            const dependencies = (provider.inject ?? []).map((dep) => this._resolve(dep, nextPath));
            value = Reflect.apply(provider.useFactory, undefined, dependencies);
            lifecycle = provider.lifecycle ?? lifecycle;
        }

        if (lifecycle === "singleton") {
            binding.cached = { value };
        }
        return value;
    }

    private _jitBinding(token: InjectionToken): Binding {
        const existing = this._jitBindings.get(token);
        if (existing !== undefined) {
            return existing;
        }
        if (!isConcrete(token)) {
            throw new Error(`No binding for ${describeToken(token)}`);
        }

        const binding: Binding = { provider: { useClass: token } };
        this._jitBindings.set(token, binding);
        return binding;
    }
}

function isConcrete<T>(token: InjectionToken<T>): token is new (...args: never[]) => T {
    return isConstructor(token);
}

function valueClass(value: unknown): Constructor | undefined {
    if (typeof value !== "object" || value === null) {
        return undefined;
    }
    const owner: unknown = value.constructor;
    return isConstructor(owner) && owner !== Object ? owner : undefined;
}

/**
 * Create an empty container
 */
export function createContainer(): Container {
    return new Container();
}
