/**
 * OpenTelemetry Provider
 *
 * Owns the logger provider and its exporter, with explicit lifecycle control.
 *
 * @module provider
 */

import { DiagConsoleLogger, DiagLogLevel, diag } from "@opentelemetry/api";
import type { Logger } from "@opentelemetry/api-logs";
import { logs } from "@opentelemetry/api-logs";
import { OTLPLogExporter as OTLPLogExporterGRPC } from "@opentelemetry/exporter-logs-otlp-grpc";
import { OTLPLogExporter as OTLPLogExporterHTTP } from "@opentelemetry/exporter-logs-otlp-http";
import { resourceFromAttributes } from "@opentelemetry/resources";
import { ConsoleLogRecordExporter, LoggerProvider, SimpleLogRecordProcessor } from "@opentelemetry/sdk-logs";
import { ATTR_SERVICE_NAME, ATTR_SERVICE_VERSION } from "@opentelemetry/semantic-conventions";
import type { CollectorOptions, OTLPSettings } from "./config.ts";
import { ExporterType, getCollectorOptions, getOTLPSettings, getServiceMetadata } from "./config.ts";

/**
 * Options for initializing the OpenTelemetry provider
 */
export interface ProviderOptions {
    /** Override service name (defaults to OTEL_SERVICE_NAME or npm_package_name) */
    serviceName?: string;
    /** Override service version (defaults to npm_package_version) */
    serviceVersion?: string;
    /** Override OTLP exporter settings (defaults to env-based config) */
    settings?: Partial<OTLPSettings>;
}

/**
 * OpenTelemetry Provider
 *
 * Supports console, OTLP/HTTP, OTLP/gRPC exporters, and no-op mode
 * based on environment configuration or explicit options.
 */
class OtelProvider {
    readonly logger: Logger;

    private loggerProvider?: LoggerProvider;

    private readonly settings: OTLPSettings;
    private readonly collectorOptions: CollectorOptions;
    private readonly serviceName: string;
    private readonly serviceVersion: string;

    constructor(options?: ProviderOptions) {
        diag.setLogger(new DiagConsoleLogger(), DiagLogLevel.ERROR);

        const envSettings = getOTLPSettings();
        this.settings = {
            logs: options?.settings?.logs ?? envSettings.logs,
        };

        this.collectorOptions = getCollectorOptions();

        const metadata = getServiceMetadata();
        this.serviceName = options?.serviceName ?? metadata.name;
        this.serviceVersion = options?.serviceVersion ?? metadata.version;

        this.logger = this.createLogger();
    }

    /**
     * Create and configure logger provider
     *
     * @returns Logger instance
     */
    private createLogger(): Logger {
        // If logging is disabled, use no-op logger from global API
        if (this.settings.logs === ExporterType.NONE) {
            return logs.getLogger(this.serviceName, this.serviceVersion);
        }

        let logExporter: OTLPLogExporterHTTP | OTLPLogExporterGRPC | ConsoleLogRecordExporter;
        if (this.settings.logs === ExporterType.OTLP_HTTP) {
            logExporter = new OTLPLogExporterHTTP(
                this.collectorOptions.url
                    ? { ...this.collectorOptions, url: `${this.collectorOptions.url}/v1/logs` }
                    : { concurrencyLimit: this.collectorOptions.concurrencyLimit },
            );
        } else if (this.settings.logs === ExporterType.OTLP_GRPC) {
            logExporter = new OTLPLogExporterGRPC(
                this.collectorOptions.url ? { ...this.collectorOptions, url: this.collectorOptions.url } : { concurrencyLimit: this.collectorOptions.concurrencyLimit },
            );
        } else {
            logExporter = new ConsoleLogRecordExporter();
        }

        this.loggerProvider = new LoggerProvider({
            resource: resourceFromAttributes({
                [ATTR_SERVICE_NAME]: this.serviceName,
                [ATTR_SERVICE_VERSION]: this.serviceVersion,
            }),
            processors: [new SimpleLogRecordProcessor(logExporter)],
        });

        logs.setGlobalLoggerProvider(this.loggerProvider);

        return this.loggerProvider.getLogger(this.serviceName, this.serviceVersion);
    }

    /**
     * Flush pending log records and release the exporter
     */
    async shutdown(): Promise<void> {
        await this.loggerProvider?.shutdown();
    }
}

// ---------------------------------------------------------------------------
// Module-level state
// ---------------------------------------------------------------------------

let provider: OtelProvider | undefined;

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Initialize the OpenTelemetry provider with explicit options.
 *
 * Throws if already initialized -- call {@link shutdownProvider}
 * first to re-initialize.
 *
 * @throws Error if provider is already initialized
 */
export function initProvider(options?: ProviderOptions): void {
    if (provider !== undefined) {
        throw new Error("OTel provider already initialized. Call shutdownProvider() first.");
    }
    provider = new OtelProvider(options);
}

/**
 * Get the current OpenTelemetry provider.
 *
 * If not yet initialized, lazily creates a provider with default
 * (environment-based) options.
 */
export function getProvider(): OtelProvider {
    if (provider === undefined) {
        provider = new OtelProvider();
    }
    return provider;
}

/**
 * Gracefully shutdown the provider and release resources.
 *
 * After shutdown, subsequent calls to {@link getProvider} will create
 * a fresh provider. If no provider exists, this is a no-op.
 */
export async function shutdownProvider(): Promise<void> {
    if (provider === undefined) {
        return;
    }
    await provider.shutdown();
    provider = undefined;
}
