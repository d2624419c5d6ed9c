/**
 * Column-aligned text tables
 *
 * @module ColumnPrinter
 */

import type { TextSink } from "./types.ts";

export const DEFAULT_COLUMN_MARGIN = 2;

export interface ColumnPrinterOptions {
    /**
     * Spaces after the widest value of each column
     * @default 2
     */
    margin?: number;
}

/**
 * @throws {RangeError} If the margin is not a non-negative integer
 */
export function checkColumnMargin(margin: number): number {
    if (!Number.isInteger(margin) || margin < 0) {
        throw new RangeError(`Column margin must be a non-negative integer, got ${margin}`);
    }
    return margin;
}

interface Column {
    readonly name: string;
    readonly values: string[];
}

/**
 * Collects values column by column and prints them left-aligned
 *
 * Every cell is padded to the column's widest entry (header included) plus
 * the margin; trailing spaces are trimmed from each line. Columns may hold
 * different numbers of values; missing cells print empty.
 *
 * @example
 * ```typescript
 * const printer = new ColumnPrinter();
 * printer.addColumn("NAME");
 * printer.addColumn("SIZE");
 * printer.addValue("NAME", "users");
 * printer.addValue("SIZE", "42");
 * printer.generate(); // ["NAME   SIZE", "users  42"]
 * ```
 */
export class ColumnPrinter {
    private readonly columns: Column[] = [];
    private readonly margin: number;

    constructor(options?: ColumnPrinterOptions) {
        this.margin = checkColumnMargin(options?.margin ?? DEFAULT_COLUMN_MARGIN);
    }

    addColumn(name: string): void {
        this.columns.push({ name, values: [] });
    }

    /**
     * @throws {Error} If no column has the given name
     */
    addValue(columnName: string, value: string): void {
        const column = this.columns.find((c) => c.name === columnName);
        if (column === undefined) {
            throw new Error(`Unknown column '${columnName}'. Columns: ${this.columns.map((c) => c.name).join(", ")}`);
        }
        column.values.push(value);
    }

    /**
     * Header line followed by one line per row
     */
    generate(): string[] {
        const widths = this.columns.map((column) => column.values.reduce((max, value) => Math.max(max, value.length), column.name.length) + this.margin);
        const rowCount = this.columns.reduce((max, column) => Math.max(max, column.values.length), 0);

        const formatLine = (cells: string[]): string => cells.map((cell, i) => cell.padEnd(widths[i] ?? 0)).join("").trimEnd();

        const lines = [formatLine(this.columns.map((column) => column.name))];
        for (let row = 0; row < rowCount; row++) {
            lines.push(formatLine(this.columns.map((column) => column.values[row] ?? "")));
        }
        return lines;
    }

    /**
     * Write every line to the sink, each terminated by a newline
     */
    print(out: TextSink): void {
        for (const line of this.generate()) {
            out.write(`${line}\n`);
        }
    }
}
