/**
 * Configuration module
 *
 * Type-safe environment configuration validated with Zod schemas.
 *
 * @example
 * ```typescript
 * import { parseEnvConfig } from '@managed-inspector/core/config';
 *
 * const config = parseEnvConfig();
 * console.log(`Column margin: ${config.INSPECTOR_COLUMN_MARGIN}`);
 * ```
 *
 * @module @managed-inspector/core/config
 */

export { ColumnMarginSchema, InspectorEnvSchema, NodeEnvSchema, parseEnvConfig, safeParseEnvConfig, type InspectorEnv } from "./envSchema.ts";
