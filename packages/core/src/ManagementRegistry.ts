/**
 * Management registry
 *
 * Holds the live managed instances of the process, keyed by canonical
 * object name. Module-level singleton accessed via `managementRegistry`.
 *
 * @module ManagementRegistry
 */

import { InstanceAlreadyExistsError, InstanceNotFoundError } from "./errors.ts";
import { getClassName } from "./managed.ts";
import { ObjectName } from "./ObjectName.ts";
import type { InstanceInfo, RegistryReader } from "./types.ts";

interface Registration {
    readonly info: InstanceInfo;
    readonly instance: object;
}

function canonicalize(name: string | ObjectName): string {
    return (typeof name === "string" ? ObjectName.parse(name) : name).canonicalName;
}

/**
 * Management registry
 *
 * @example
 * ```typescript
 * import { managementRegistry } from '@managed-inspector/core';
 *
 * managementRegistry.register(cache, "app:type=Cache,name=users");
 * managementRegistry.queryAll();
 * // [{ className: "UserCache", objectName: "app:name=users,type=Cache" }]
 * ```
 */
export class ManagementRegistry implements RegistryReader {
    private registrations = new Map<string, Registration>();

    /**
     * Register a live instance under an object name
     *
     * @throws {TypeError} If `instance` is not an object with a constructor
     * @throws {MalformedObjectNameError} If `name` is not a valid object name
     * @throws {InstanceAlreadyExistsError} If the name is already taken
     */
    register(instance: object, name: string | ObjectName): InstanceInfo {
        if (typeof instance !== "object" || instance === null) {
            throw new TypeError("Only objects can be registered");
        }

        const owner: unknown = Reflect.get(instance, "constructor");
        if (typeof owner !== "function") {
            throw new TypeError("Only class instances can be registered; the object has no constructor");
        }

        const objectName = canonicalize(name);
        if (this.registrations.has(objectName)) {
            throw new InstanceAlreadyExistsError(objectName);
        }

        const info: InstanceInfo = Object.freeze({
            className: getClassName(owner),
            objectName,
        });
        this.registrations.set(objectName, { info, instance });
        return info;
    }

    /**
     * Remove a registration
     *
     * @throws {InstanceNotFoundError} If nothing is registered under the name
     */
    unregister(name: string | ObjectName): void {
        const objectName = canonicalize(name);
        if (!this.registrations.delete(objectName)) {
            throw new InstanceNotFoundError(objectName);
        }
    }

    isRegistered(name: string | ObjectName): boolean {
        return this.registrations.has(canonicalize(name));
    }

    /**
     * @returns The registered instance, or undefined if the name is free
     */
    getInstance(name: string | ObjectName): object | undefined {
        return this.registrations.get(canonicalize(name))?.instance;
    }

    /**
     * Snapshot of every registration, in registration order
     */
    queryAll(): InstanceInfo[] {
        return Array.from(this.registrations.values(), (registration) => registration.info);
    }

    get size(): number {
        return this.registrations.size;
    }

    clear(): void {
        this.registrations.clear();
    }
}

/**
 * Process-wide registry
 */
export const managementRegistry = new ManagementRegistry();

/**
 * Create a new isolated ManagementRegistry instance
 *
 * Useful for testing or inspecting several applications in one process.
 */
export function createManagementRegistry(): ManagementRegistry {
    return new ManagementRegistry();
}
