/**
 * Inspector types
 *
 * @module types
 */

import type { MemberInspector, ObjectGraph, RegistryReader } from "@managed-inspector/core";

/**
 * Where reports are written. `process.stdout` satisfies it.
 */
export interface TextSink {
    write(text: string): unknown;
    /** Called once after the last line, when present */
    flush?(): void;
}

/**
 * Inputs for {@link createInspectorReport}
 */
export interface InspectorReportOptions {
    /** Object graph whose classes are candidates for inspection */
    graph: ObjectGraph;

    /**
     * Live instance registry.
     * When not provided, uses the process-wide `managementRegistry`.
     */
    registry?: RegistryReader;

    /**
     * Managed member lookup.
     * @default describeManagedMembers
     */
    memberInspector?: MemberInspector;

    /**
     * Spaces between report columns
     * @default 2
     */
    columnMargin?: number;
}
