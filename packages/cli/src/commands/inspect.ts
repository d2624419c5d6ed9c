/**
 * Inspect command
 *
 * Loads an application entry module, builds its object graph and prints the
 * managed-member report.
 *
 * Pipeline:
 * 1. Import the entry module and call its bootstrap function
 * 2. Build the report from the returned graph and registry
 * 3. Print the table to stdout
 *
 * @module commands/inspect
 */

import { resolve } from "node:path";
import { pathToFileURL } from "node:url";
import type { ObjectGraph, RegistryReader } from "@managed-inspector/core";
import { ColumnMarginSchema, parseEnvConfig } from "@managed-inspector/core/config";
import { createInspectorReport, type InspectorReport, type TextSink } from "@managed-inspector/inspector";
import { getLogger, shutdownProvider } from "@managed-inspector/otel";
import { defineCommand } from "citty";

const logger = getLogger("cli.inspect");

/**
 * What an entry module's bootstrap function returns
 */
export interface InspectionTarget {
    graph: ObjectGraph;
    /** Defaults to the process-wide management registry */
    registry?: RegistryReader;
}

/**
 * Options for the inspect command.
 */
export interface InspectOptions {
    /** Path of the entry module, relative to the working directory */
    entry: string;
    /** Spaces between columns; defaults to INSPECTOR_COLUMN_MARGIN */
    margin?: number;
    /** Defaults to process.stdout */
    out?: TextSink;
}

function hasFunction(value: object, key: string): boolean {
    return key in value && typeof Reflect.get(value, key) === "function";
}

function isInspectionTarget(value: unknown): value is InspectionTarget {
    if (typeof value !== "object" || value === null || !("graph" in value)) {
        return false;
    }
    const { graph } = value;
    if (typeof graph !== "object" || graph === null || !hasFunction(graph, "listBoundTypes")) {
        return false;
    }
    if (!("registry" in value) || value.registry === undefined) {
        return true;
    }
    const { registry } = value;
    return typeof registry === "object" && registry !== null && hasFunction(registry, "queryAll");
}

/**
 * Import an entry module and run its `default` (or `bootstrap`) export.
 *
 * @throws {Error} If the module exports no bootstrap function or it returns something else than `{ graph, registry? }`
 */
export async function loadEntry(entry: string): Promise<InspectionTarget> {
    const url = pathToFileURL(resolve(entry)).href;
    const loaded: unknown = await import(url);

    if (typeof loaded !== "object" || loaded === null) {
        throw new Error(`Entry module ${entry} could not be loaded`);
    }

    const bootstrap: unknown = Reflect.get(loaded, "default") ?? Reflect.get(loaded, "bootstrap");
    if (typeof bootstrap !== "function") {
        throw new Error(`Entry module ${entry} must export a default or "bootstrap" function`);
    }

    const target: unknown = await Reflect.apply(bootstrap, undefined, []);
    if (!isInspectionTarget(target)) {
        throw new Error(`Bootstrap function of ${entry} must return { graph, registry? }`);
    }
    return target;
}

/**
 * Execute the inspect pipeline.
 *
 * @returns The printed report
 */
export async function executeInspect(options: InspectOptions): Promise<InspectorReport> {
    const { entry, out = process.stdout } = options;
    const margin = options.margin ?? parseEnvConfig().INSPECTOR_COLUMN_MARGIN;

    const { graph, registry } = await loadEntry(entry);
    const report = createInspectorReport({ graph, registry, columnMargin: margin });

    logger.info("Inspection finished", { entry, records: report.size });
    report.print(out);
    return report;
}

/**
 * citty command definition for `managed-inspector inspect`.
 */
export const inspectCommand = defineCommand({
    meta: {
        name: "inspect",
        description: "Print the managed attributes and actions of an application's live instances",
    },
    args: {
        entry: {
            type: "string",
            description: "Module whose default export bootstraps the application and returns { graph, registry? }",
            required: true,
        },
        margin: {
            type: "string",
            description: "Spaces between columns (0-16)",
        },
    },
    async run({ args }) {
        try {
            await executeInspect({
                entry: args.entry,
                margin: args.margin === undefined ? undefined : ColumnMarginSchema.parse(args.margin),
            });
        } finally {
            await shutdownProvider();
        }
    },
});
