/**
 * Inspector report
 *
 * Joins the classes of an object graph with the live instances of a
 * management registry and lists every managed member per instance.
 *
 * Pipeline:
 * 1. Query all registrations, index object names by class name
 * 2. For each graph class with live instances, read its managed members
 * 3. Emit one record per (object name, member), sort, drop duplicates
 *
 * @module InspectorReport
 */

import type { Constructor, InstanceInfo, MemberDescriptor, MemberInspector } from "@managed-inspector/core";
import { describeManagedMembers, managementRegistry, ReflectionAccessError, RegistryQueryError } from "@managed-inspector/core";
import { getLogger } from "@managed-inspector/otel";
import { ColumnPrinter, checkColumnMargin, DEFAULT_COLUMN_MARGIN } from "./ColumnPrinter.ts";
import { createInspectionRecord, type InspectionRecord, sortRecords } from "./InspectionRecord.ts";
import type { InspectorReportOptions, TextSink } from "./types.ts";

const NAME_COLUMN = "NAME";
const MEMBER_COLUMN = "METHOD/ATTRIBUTE";
const TYPE_COLUMN = "TYPE";
const DESCRIPTION_COLUMN = "DESCRIPTION";

const logger = getLogger("InspectorReport");

/**
 * Immutable, ordered set of inspection records
 *
 * Iterates in ascending (memberName, entityName) order.
 */
export class InspectorReport implements Iterable<InspectionRecord> {
    readonly records: readonly InspectionRecord[];
    private readonly columnMargin: number;

    /**
     * @throws {RangeError} If the column margin is not a non-negative integer
     */
    constructor(records: Iterable<InspectionRecord>, columnMargin = DEFAULT_COLUMN_MARGIN) {
        this.columnMargin = checkColumnMargin(columnMargin);
        this.records = Object.freeze(sortRecords(records));
    }

    get size(): number {
        return this.records.length;
    }

    [Symbol.iterator](): Iterator<InspectionRecord> {
        return this.records[Symbol.iterator]();
    }

    /**
     * Print the table to the given sink, then flush it
     */
    print(out: TextSink): void {
        this.makePrinter().print(out);
        out.flush?.();
    }

    /**
     * The table as text, one line per row, newline-terminated
     */
    render(): string {
        return this.makePrinter()
            .generate()
            .map((line) => `${line}\n`)
            .join("");
    }

    private makePrinter(): ColumnPrinter {
        const printer = new ColumnPrinter({ margin: this.columnMargin });

        printer.addColumn(NAME_COLUMN);
        printer.addColumn(MEMBER_COLUMN);
        printer.addColumn(TYPE_COLUMN);
        printer.addColumn(DESCRIPTION_COLUMN);

        for (const record of this.records) {
            printer.addValue(NAME_COLUMN, record.entityName);
            printer.addValue(MEMBER_COLUMN, record.memberName);
            printer.addValue(TYPE_COLUMN, record.kind.toLowerCase());
            printer.addValue(DESCRIPTION_COLUMN, record.description);
        }
        return printer;
    }
}

function queryInstances(options: InspectorReportOptions): InstanceInfo[] {
    const registry = options.registry ?? managementRegistry;
    try {
        return [...registry.queryAll()];
    } catch (error) {
        throw new RegistryQueryError(error);
    }
}

function inspectMembers(inspect: MemberInspector, className: string, type: Constructor): MemberDescriptor[] {
    try {
        return inspect(type);
    } catch (error) {
        if (error instanceof ReflectionAccessError) {
            throw error;
        }
        throw new ReflectionAccessError({ className, cause: error });
    }
}

/**
 * Build a report from a point-in-time snapshot of the registry and graph
 *
 * Classes without live instances are skipped.
 *
 * @throws {RegistryQueryError} If the registry cannot be queried
 * @throws {ReflectionAccessError} If a class's members cannot be read
 *
 * @example
 * ```typescript
 * const report = createInspectorReport({ graph: container });
 * report.print(process.stdout);
 * ```
 */
export function createInspectorReport(options: InspectorReportOptions): InspectorReport {
    const inspect = options.memberInspector ?? describeManagedMembers;
    const instances = queryInstances(options);

    const namesByClass = new Map<string, string[]>();
    for (const { className, objectName } of instances) {
        const names = namesByClass.get(className);
        if (names === undefined) {
            namesByClass.set(className, [objectName]);
        } else {
            names.push(objectName);
        }
    }

    const records: InspectionRecord[] = [];
    let inspectedClasses = 0;
    for (const { name, type } of options.graph.listBoundTypes()) {
        const objectNames = namesByClass.get(name);
        if (objectNames === undefined) {
            continue;
        }
        inspectedClasses++;

        for (const member of inspectMembers(inspect, name, type)) {
            for (const objectName of objectNames) {
                records.push(createInspectionRecord(objectName, member));
            }
        }
    }

    const report = new InspectorReport(records, options.columnMargin);
    logger.debug("Inspector report built", {
        instances: instances.length,
        inspectedClasses,
        records: report.size,
    });
    return report;
}
