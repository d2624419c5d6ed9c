process.env.OTEL_LOGS_EXPORTER = "none";

import assert from "node:assert";
import { afterEach, describe, it } from "node:test";
import type { LogRecord } from "@opentelemetry/api-logs";
import { SeverityNumber } from "@opentelemetry/api-logs";
import { getLogger } from "../../src/logger.ts";
import { getProvider, shutdownProvider } from "../../src/provider.ts";

function captureEmit(): { calls: LogRecord[]; restore: () => void } {
    const calls: LogRecord[] = [];
    const provider = getProvider();
    const original = provider.logger.emit.bind(provider.logger);
    provider.logger.emit = (record: LogRecord) => {
        calls.push(record);
    };
    return {
        calls,
        restore() {
            provider.logger.emit = original;
        },
    };
}

function firstCall(capture: { calls: LogRecord[] }): LogRecord {
    const record = capture.calls[0];
    assert.ok(record, "Expected at least one emit call");
    return record;
}

describe("getLogger", () => {
    afterEach(async () => {
        await shutdownProvider();
    });

    it("should create a logger with all methods", () => {
        const logger = getLogger("InspectorReport");

        assert.ok(typeof logger.info === "function");
        assert.ok(typeof logger.warn === "function");
        assert.ok(typeof logger.error === "function");
        assert.ok(typeof logger.debug === "function");
        assert.ok(typeof logger.emit === "function");
    });

    it("should emit info log with correct severity", () => {
        const capture = captureEmit();

        getLogger("InspectorReport").info("test message");

        assert.strictEqual(capture.calls.length, 1);
        const record = firstCall(capture);
        assert.strictEqual(record.severityNumber, SeverityNumber.INFO);
        assert.strictEqual(record.severityText, "INFO");
        assert.strictEqual(record.body, "test message");
        capture.restore();
    });

    it("should emit debug log with correct severity", () => {
        const capture = captureEmit();

        getLogger("InspectorReport").debug("debug message");

        const record = firstCall(capture);
        assert.strictEqual(record.severityNumber, SeverityNumber.DEBUG);
        assert.strictEqual(record.severityText, "DEBUG");
        capture.restore();
    });

    it("should attach logger.name and merge call attributes over defaults", () => {
        const capture = captureEmit();
        const logger = getLogger("InspectorReport", { defaultAttributes: { component: "report", records: 0 } });

        logger.warn("merged", { records: 3 });

        assert.deepStrictEqual(firstCall(capture).attributes, {
            "logger.name": "InspectorReport",
            component: "report",
            records: 3,
        });
        capture.restore();
    });

    it("should fall back to the project name when no logger name is given", () => {
        const capture = captureEmit();

        getLogger().error("unnamed");

        assert.deepStrictEqual(firstCall(capture).attributes, { "logger.name": "managed-inspector" });
        capture.restore();
    });

    it("should forward raw records through emit", () => {
        const capture = captureEmit();

        getLogger("InspectorReport").emit({ body: "raw", severityNumber: SeverityNumber.INFO });

        assert.strictEqual(firstCall(capture).body, "raw");
        capture.restore();
    });
});
