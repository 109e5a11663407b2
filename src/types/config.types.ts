import { z } from 'zod';

/**
 * Chunk configuration
 */
export interface ChunkConfig {
    /** Target chunk size in characters (default: 1000) */
    chunkSize: number;
    /** Overlap between consecutive chunks in characters (default: 200) */
    chunkOverlap: number;
    /** Fraction of the window, measured back from its end, searched for a boundary (default: 0.2) */
    boundarySearchRatio: number;
}

/**
 * Text normalizer configuration
 */
export interface NormalizerConfig {
    /** A line on more than this fraction of pages is boilerplate (default: 0.5) */
    headerFooterThreshold: number;
    /** Fewer content pages than this disables header/footer detection (default: 3) */
    headerFooterMinPages: number;
    /** Minimum token count for a line to be considered a garbled table row (default: 4) */
    tableMinTokens: number;
    /** Share of numeric/short/filler tokens that flags a table row (default: 0.6) */
    tableNoiseRatio: number;
}

/**
 * Document-level processing configuration
 */
export interface ProcessingConfig {
    /** Documents processed concurrently (default: 4) */
    maxConcurrency: number;
    /** Upper bound for extracting one document in milliseconds (default: 120000) */
    extractionTimeoutMs: number;
}

/**
 * Logging configuration
 */
export interface LogConfig {
    /** Log level */
    level: 'debug' | 'info' | 'warn' | 'error';
    /** Enable structured JSON logging (default: true) */
    structured: boolean;
    /** Custom logger function */
    customLogger?: (level: string, message: string, meta?: Record<string, unknown>) => void;
}

/**
 * Pipeline configuration as supplied by callers
 */
export interface PipelineConfig {
    /** Root directory scanned recursively for PDFs */
    inputDir: string;
    /** Root directory receiving per-document artifacts and the run summary */
    outputDir: string;
    chunkConfig?: Partial<ChunkConfig>;
    normalizerConfig?: Partial<NormalizerConfig>;
    processingConfig?: Partial<ProcessingConfig>;
    logging?: Partial<LogConfig>;
}

/**
 * Internal resolved configuration with all defaults applied
 */
export interface ResolvedConfig {
    inputDir: string;
    outputDir: string;
    chunkConfig: ChunkConfig;
    normalizerConfig: NormalizerConfig;
    processingConfig: ProcessingConfig;
    logging: LogConfig;
}

/**
 * Default configuration values
 */
export const DEFAULT_CHUNK_CONFIG: ChunkConfig = {
    chunkSize: 1000,
    chunkOverlap: 200,
    boundarySearchRatio: 0.2,
};

export const DEFAULT_NORMALIZER_CONFIG: NormalizerConfig = {
    headerFooterThreshold: 0.5,
    headerFooterMinPages: 3,
    tableMinTokens: 4,
    tableNoiseRatio: 0.6,
};

export const DEFAULT_PROCESSING_CONFIG: ProcessingConfig = {
    maxConcurrency: 4,
    extractionTimeoutMs: 120_000,
};

export const DEFAULT_LOG_CONFIG: LogConfig = {
    level: 'info',
    structured: true,
};

/**
 * Chunk settings; the overlap must stay below the chunk size
 */
export const chunkConfigSchema = z
    .object({
        chunkSize: z.number().int().positive(),
        chunkOverlap: z.number().int().min(0),
        boundarySearchRatio: z.number().gt(0).max(1),
    })
    .refine(c => c.chunkOverlap < c.chunkSize, {
        message: 'chunkOverlap must be smaller than chunkSize',
        path: ['chunkOverlap'],
    });

/**
 * Zod schema for config validation.
 * Applied to the resolved config so cross-field rules see the defaults.
 */
export const configSchema = z.object({
    inputDir: z.string().min(1, 'inputDir is required'),
    outputDir: z.string().min(1, 'outputDir is required'),
    chunkConfig: chunkConfigSchema,
    normalizerConfig: z.object({
        headerFooterThreshold: z.number().gt(0).lt(1),
        headerFooterMinPages: z.number().int().min(2),
        tableMinTokens: z.number().int().min(2),
        tableNoiseRatio: z.number().gt(0).max(1),
    }),
    processingConfig: z.object({
        maxConcurrency: z.number().int().min(1).max(64),
        extractionTimeoutMs: z.number().int().min(100),
    }),
    logging: z.object({
        level: z.enum(['debug', 'info', 'warn', 'error']),
        structured: z.boolean(),
    }),
});
