/**
 * @managed-inspector/core
 *
 * Management registry, managed-member markers and the object graph
 * the inspector reads from.
 *
 * @module @managed-inspector/core
 */

// Registry
export { createManagementRegistry, ManagementRegistry, managementRegistry } from "./ManagementRegistry.ts";
export { ObjectName } from "./ObjectName.ts";

// Managed markers + member inspection
export { describeManagedMembers, getClassName, Managed, ManagedResource } from "./managed.ts";
export type { ManagedOptions, ManagedResourceOptions } from "./managed.ts";

// Object graph
export { Container, createContainer, createToken } from "./Container.ts";
export type { ClassProvider, FactoryProvider, InjectionToken, Lifecycle, Provider, Token, ValueProvider } from "./Container.ts";

// Errors
export {
    InstanceAlreadyExistsError,
    InstanceNotFoundError,
    isInspectorError,
    MalformedObjectNameError,
    ReflectionAccessError,
    RegistryQueryError,
} from "./errors.ts";
export type { InspectorError, ReflectionAccessDetails } from "./errors.ts";

// Types
export type { ClassDescriptor, Constructor, InstanceInfo, MemberDescriptor, MemberInspector, ObjectGraph, RegistryReader } from "./types.ts";
