/**
 * Provider module tests
 */

import assert from "node:assert";
import { afterEach, describe, it } from "node:test";
import { getProvider, initProvider, shutdownProvider } from "../../src/provider.ts";

process.env.OTEL_LOGS_EXPORTER = "none";

describe("provider", () => {
    afterEach(async () => {
        await shutdownProvider();
    });

    describe("getProvider", () => {
        it("should lazily create provider on first call", () => {
            const provider = getProvider();

            assert.ok(provider);
            assert.ok(provider.logger);
        });

        it("should return same instance on subsequent calls", () => {
            assert.strictEqual(getProvider(), getProvider());
        });
    });

    describe("initProvider", () => {
        it("should throw if called twice without shutdown", () => {
            initProvider();

            assert.throws(() => initProvider(), { message: /already initialized/i });
        });

        it("should accept explicit settings", () => {
            initProvider({ serviceName: "test-service", settings: { logs: "none" } });

            assert.ok(getProvider().logger);
        });
    });

    describe("shutdownProvider", () => {
        it("should allow re-initialization after shutdown", async () => {
            const first = getProvider();
            await shutdownProvider();

            initProvider();

            assert.notStrictEqual(getProvider(), first);
        });

        it("should be no-op when provider not initialized", async () => {
            await shutdownProvider();
        });
    });
});
