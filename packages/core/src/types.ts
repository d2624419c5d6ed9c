/**
 * Shared types for the management registry, object graph and member inspection
 *
 * @module types
 */

/**
 * Any class constructor, abstract or concrete.
 */
export type Constructor<T = unknown> = abstract new (...args: never[]) => T;

/**
 * One live registration in a management registry
 */
export interface InstanceInfo {
    /** Join name of the registered instance's class (see `getClassName`) */
    readonly className: string;
    /** Canonical object name the instance is registered under */
    readonly objectName: string;
}

/**
 * Read side of a management registry.
 *
 * The inspector only ever asks for everything; filtering happens in the join.
 */
export interface RegistryReader {
    queryAll(): Iterable<InstanceInfo>;
}

/**
 * A class reachable from an object graph
 */
export interface ClassDescriptor {
    /** Join name (see `getClassName`) */
    readonly name: string;
    readonly type: Constructor;
}

/**
 * Object graph traversal
 *
 * Yields each distinct class the graph's bindings can produce.
 */
export interface ObjectGraph {
    listBoundTypes(): Iterable<ClassDescriptor>;
}

/**
 * A publicly exposed member carrying a managed marker
 */
export interface MemberDescriptor {
    readonly name: string;
    readonly description: string;
    /** False when the member produces no value */
    readonly returnsValue: boolean;
    readonly parameterCount: number;
}

/**
 * Enumerates the managed members of a class
 */
export type MemberInspector = (type: Constructor) => MemberDescriptor[];
