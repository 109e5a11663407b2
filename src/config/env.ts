/**
 * Centralized Environment Configuration
 *
 * Validates and exports all environment variables with Zod.
 * Import this module instead of accessing process.env directly.
 *
 * @example
 * ```typescript
 * import { parseEnv } from './config/env.js';
 * const env = parseEnv();
 * console.log(env.CHUNK_SIZE); // Type-safe access
 * ```
 */

import { z } from 'zod';
import { ConfigurationError } from '../errors/index.js';
import type { PipelineConfig } from '../types/config.types.js';

/**
 * Environment variable schema with validation
 */
const envSchema = z.object({
    /**
     * Log level for the logger
     * @default 'info'
     */
    LOG_LEVEL: z
        .enum(['debug', 'info', 'warn', 'error'])
        .default('info')
        .describe('Log level: debug, info, warn, error'),

    DATA_DIR: z
        .string()
        .default('data')
        .describe('Input root scanned for PDFs'),

    PROCESSED_DIR: z
        .string()
        .default('processed')
        .describe('Output root for normalized text, chunks and the run summary'),

    CHUNK_SIZE: z.coerce
        .number()
        .int()
        .positive()
        .optional()
        .describe('Target chunk size in characters'),

    CHUNK_OVERLAP: z.coerce
        .number()
        .int()
        .min(0)
        .optional()
        .describe('Overlap between consecutive chunks in characters'),

    HEADER_FOOTER_THRESHOLD: z.coerce
        .number()
        .gt(0)
        .lt(1)
        .optional()
        .describe('Page frequency above which a repeated line is stripped'),

    MAX_CONCURRENCY: z.coerce
        .number()
        .int()
        .min(1)
        .optional()
        .describe('Documents processed in parallel'),

    EXTRACTION_TIMEOUT_MS: z.coerce
        .number()
        .int()
        .min(100)
        .optional()
        .describe('Per-document extraction timeout'),
});

/**
 * Validated environment type
 */
export type Env = z.infer<typeof envSchema>;

/**
 * Parse environment variables with validation
 * Returns validated env object or throws with descriptive errors
 */
export function parseEnv(source: NodeJS.ProcessEnv = process.env): Env {
    const result = envSchema.safeParse(source);

    if (!result.success) {
        const errors = result.error.issues
            .map(issue => `  ${issue.path.join('.')}: ${issue.message}`)
            .join('\n');

        throw new ConfigurationError(`Environment validation failed:\n${errors}`);
    }

    return result.data;
}

/**
 * Build a pipeline config from environment values.
 * Unset numeric values fall through to the library defaults.
 */
export function pipelineConfigFromEnv(source: Env = parseEnv()): PipelineConfig {
    return {
        inputDir: source.DATA_DIR,
        outputDir: source.PROCESSED_DIR,
        chunkConfig: {
            ...(source.CHUNK_SIZE !== undefined && { chunkSize: source.CHUNK_SIZE }),
            ...(source.CHUNK_OVERLAP !== undefined && { chunkOverlap: source.CHUNK_OVERLAP }),
        },
        normalizerConfig: {
            ...(source.HEADER_FOOTER_THRESHOLD !== undefined && {
                headerFooterThreshold: source.HEADER_FOOTER_THRESHOLD,
            }),
        },
        processingConfig: {
            ...(source.MAX_CONCURRENCY !== undefined && { maxConcurrency: source.MAX_CONCURRENCY }),
            ...(source.EXTRACTION_TIMEOUT_MS !== undefined && {
                extractionTimeoutMs: source.EXTRACTION_TIMEOUT_MS,
            }),
        },
        logging: {
            level: source.LOG_LEVEL,
        },
    };
}
