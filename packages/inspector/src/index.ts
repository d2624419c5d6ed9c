/**
 * @managed-inspector/inspector
 *
 * Report of the managed attributes and actions exposed by live instances.
 *
 * @module @managed-inspector/inspector
 */

export { createInspectorReport, InspectorReport } from "./InspectorReport.ts";
export { classifyMember, compareRecords, createInspectionRecord, InspectionKind, sortRecords } from "./InspectionRecord.ts";
export type { InspectionRecord } from "./InspectionRecord.ts";
export { checkColumnMargin, ColumnPrinter, DEFAULT_COLUMN_MARGIN } from "./ColumnPrinter.ts";
export type { ColumnPrinterOptions } from "./ColumnPrinter.ts";
export type { InspectorReportOptions, TextSink } from "./types.ts";
