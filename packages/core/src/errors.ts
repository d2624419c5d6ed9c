/**
 * Error types for registry access, object names and member inspection
 *
 * @module errors
 */

function describeCause(cause: unknown): string {
    return cause instanceof Error ? cause.message : String(cause);
}

/**
 * The management registry could not be queried.
 *
 * Fatal to report construction; no partial result is produced.
 */
export class RegistryQueryError extends Error {
    constructor(cause: unknown) {
        super(`Management registry query failed: ${describeCause(cause)}`, { cause });
        this.name = "RegistryQueryError";
    }
}

/**
 * Details for reflection access failures.
 */
export interface ReflectionAccessDetails {
    readonly className: string;
    readonly memberName?: string;
    readonly cause?: unknown;
}

/**
 * A class or one of its members could not be inspected.
 *
 * Fatal to report construction; the class is not skipped.
 */
export class ReflectionAccessError extends Error {
    readonly className: string;
    readonly memberName: string | undefined;

    constructor(details: ReflectionAccessDetails) {
        const target = details.memberName === undefined ? details.className : `${details.className}.${details.memberName}`;
        super(`Cannot inspect ${target}: ${describeCause(details.cause)}`, { cause: details.cause });
        this.name = "ReflectionAccessError";
        this.className = details.className;
        this.memberName = details.memberName;
    }
}

/**
 * Object name text does not follow `domain:key=value[,key=value...]`.
 */
export class MalformedObjectNameError extends Error {
    readonly objectName: string;

    constructor(objectName: string, reason: string) {
        super(`Malformed object name '${objectName}': ${reason}`);
        this.name = "MalformedObjectNameError";
        this.objectName = objectName;
    }
}

/**
 * An instance is already registered under the given name.
 */
export class InstanceAlreadyExistsError extends Error {
    readonly objectName: string;

    constructor(objectName: string) {
        super(`Instance already registered as '${objectName}'`);
        this.name = "InstanceAlreadyExistsError";
        this.objectName = objectName;
    }
}

/**
 * No instance is registered under the given name.
 */
export class InstanceNotFoundError extends Error {
    readonly objectName: string;

    constructor(objectName: string) {
        super(`No instance registered as '${objectName}'`);
        this.name = "InstanceNotFoundError";
        this.objectName = objectName;
    }
}

export type InspectorError = RegistryQueryError | ReflectionAccessError | MalformedObjectNameError | InstanceAlreadyExistsError | InstanceNotFoundError;

/**
 * Type guard for the errors raised by this package.
 */
export function isInspectorError(err: unknown): err is InspectorError {
    return (
        err instanceof RegistryQueryError ||
        err instanceof ReflectionAccessError ||
        err instanceof MalformedObjectNameError ||
        err instanceof InstanceAlreadyExistsError ||
        err instanceof InstanceNotFoundError
    );
}
