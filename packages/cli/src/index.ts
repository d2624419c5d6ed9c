/**
 * @managed-inspector/cli
 *
 * Commands:
 * - managed-inspector inspect  -- Print the managed members of an application's live instances
 *
 * @module @managed-inspector/cli
 */

import { defineCommand, runMain } from "citty";
import { inspectCommand } from "./commands/inspect.ts";

const main = defineCommand({
    meta: {
        name: "managed-inspector",
        version: "0.1.0",
        description: "Report the managed attributes and actions of a running object graph",
    },
    subCommands: {
        inspect: inspectCommand,
    },
});

runMain(main);
