/**
 * Inspection records
 *
 * One reportable pairing of a registered instance with a managed member.
 *
 * @module InspectionRecord
 */

import type { MemberDescriptor } from "@managed-inspector/core";

/**
 * Member kind
 *
 * - ATTRIBUTE: zero parameters, produces a value
 * - ACTION: produces no value, or takes parameters
 */
export const InspectionKind = {
    ATTRIBUTE: "ATTRIBUTE",
    ACTION: "ACTION",
} as const;

export type InspectionKind = (typeof InspectionKind)[keyof typeof InspectionKind];

export interface InspectionRecord {
    /** Canonical name of the registered instance */
    readonly entityName: string;
    readonly memberName: string;
    readonly description: string;
    readonly kind: InspectionKind;
}

export function classifyMember(member: Pick<MemberDescriptor, "returnsValue" | "parameterCount">): InspectionKind {
    if (!member.returnsValue) {
        return InspectionKind.ACTION;
    }
    return member.parameterCount > 0 ? InspectionKind.ACTION : InspectionKind.ATTRIBUTE;
}

export function createInspectionRecord(entityName: string, member: MemberDescriptor): InspectionRecord {
    return Object.freeze({
        entityName,
        memberName: member.name,
        description: member.description,
        kind: classifyMember(member),
    });
}

function compareStrings(a: string, b: string): number {
    return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Orders by member name, then entity name.
 *
 * Kind and description only break ties, so records that differ in them are
 * never treated as equal.
 */
export function compareRecords(a: InspectionRecord, b: InspectionRecord): number {
    return (
        compareStrings(a.memberName, b.memberName) ||
        compareStrings(a.entityName, b.entityName) ||
        compareStrings(a.kind, b.kind) ||
        compareStrings(a.description, b.description)
    );
}

/**
 * Sort records and drop exact duplicates
 */
export function sortRecords(records: Iterable<InspectionRecord>): InspectionRecord[] {
    const sorted = [...records].sort(compareRecords);
    return sorted.filter((record, index) => {
        const previous = sorted[index - 1];
        return previous === undefined || compareRecords(previous, record) !== 0;
    });
}
