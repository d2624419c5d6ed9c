/**
 * @managed-inspector/otel
 *
 * OpenTelemetry logging for managed-inspector.
 *
 * @module @managed-inspector/otel
 */

// Logger (OTel log records with a logger.name attribute)
export { getLogger } from "./logger.ts";
export type { Logger, LoggerOptions } from "./logger.ts";

// Provider management
export { getProvider, initProvider, shutdownProvider } from "./provider.ts";
export type { ProviderOptions } from "./provider.ts";

// Config
export { ExporterType, getCollectorOptions, getOTLPSettings, getServiceMetadata } from "./config.ts";
export type { CollectorOptions, OTLPSettings } from "./config.ts";
