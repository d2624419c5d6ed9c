/**
 * Environment configuration validation with Zod
 *
 * @module @managed-inspector/core/config
 */

import { z } from "zod";

/**
 * Node environment schema
 */
export const NodeEnvSchema = z.enum(["development", "production", "test"]).default("development");

/**
 * Spaces between report columns
 */
export const ColumnMarginSchema = z.coerce.number().int().min(0).max(16);

/**
 * Inspector environment configuration schema
 *
 * @example
 * ```typescript
 * const config = InspectorEnvSchema.parse(process.env);
 * console.log(config.INSPECTOR_COLUMN_MARGIN); // 2 (default)
 * ```
 */
export const InspectorEnvSchema = z.object({
    /**
     * Spaces between report columns
     * @default 2
     */
    INSPECTOR_COLUMN_MARGIN: ColumnMarginSchema.default(2),

    /**
     * Node environment
     * @default 'development'
     */
    NODE_ENV: NodeEnvSchema,
});

/**
 * Inspector environment configuration type
 */
export type InspectorEnv = z.infer<typeof InspectorEnvSchema>;

/**
 * Parse and validate environment configuration
 *
 * @example
 * ```typescript
 * const config = parseEnvConfig();
 * // or with custom env
 * const config = parseEnvConfig({ INSPECTOR_COLUMN_MARGIN: '4' });
 * ```
 */
export function parseEnvConfig(env: Record<string, string | undefined> = process.env): InspectorEnv {
    return InspectorEnvSchema.parse(env);
}

/**
 * Safely parse environment configuration (returns result object)
 */
export function safeParseEnvConfig(env: Record<string, string | undefined> = process.env) {
    return InspectorEnvSchema.safeParse(env);
}
