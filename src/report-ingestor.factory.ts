import { ReportIngestor } from './report-ingestor.js';
import {
    configSchema,
    DEFAULT_CHUNK_CONFIG,
    DEFAULT_LOG_CONFIG,
    DEFAULT_NORMALIZER_CONFIG,
    DEFAULT_PROCESSING_CONFIG,
    type PipelineConfig,
    type ResolvedConfig,
} from './types/config.types.js';
import type { IExtractionAdapter } from './types/extraction.types.js';
import type { IOutputRepository } from './types/repository.types.js';
import { ConfigurationError } from './errors/index.js';
import { createEventEmitter, createLogger } from './utils/index.js';
import { IngestionEngine, type IngestionEngineDependencies } from './engines/ingestion.engine.js';
import { PDFProcessor } from './services/pdf.processor.js';
import { TextNormalizer } from './services/normalization/index.js';
import { Chunker } from './services/chunker.service.js';
import { OutputRepository } from './repositories/output.repository.js';

/**
 * Replaceable collaborators, mainly for tests and custom extractors
 */
export interface ReportIngestorOverrides {
    extractor?: IExtractionAdapter;
    output?: IOutputRepository;
    discover?: IngestionEngineDependencies['discover'];
}

/**
 * Factory for creating ReportIngestor instances with their dependencies wired
 *
 * @example
 * ```typescript
 * const ingestor = ReportIngestorFactory.create({
 *   inputDir: 'data',
 *   outputDir: 'processed',
 *   chunkConfig: { chunkSize: 800, chunkOverlap: 150 },
 * });
 * ```
 */
export class ReportIngestorFactory {
    /**
     * Create a new ReportIngestor instance with all dependencies wired
     * @throws ConfigurationError when the configuration is invalid
     */
    static create(userConfig: PipelineConfig, overrides: ReportIngestorOverrides = {}): ReportIngestor {
        const config = ReportIngestorFactory.resolveConfig(userConfig);
        const logger = createLogger(config.logging);
        const events = createEventEmitter();

        const ingestionDeps: IngestionEngineDependencies = {
            extractor: overrides.extractor ?? new PDFProcessor(logger),
            normalizer: new TextNormalizer(config.normalizerConfig, logger),
            chunker: new Chunker(config.chunkConfig),
            output: overrides.output ?? new OutputRepository(config.outputDir, logger),
            events,
            ...(overrides.discover && { discover: overrides.discover }),
        };

        const ingestionEngine = new IngestionEngine(config, ingestionDeps, logger);

        return new ReportIngestor(config, { ingestionEngine, events, logger });
    }

    /**
     * Resolve user config with defaults and validate the result
     * @throws ConfigurationError listing every invalid field
     */
    static resolveConfig(userConfig: PipelineConfig): ResolvedConfig {
        const resolved: ResolvedConfig = {
            inputDir: userConfig.inputDir,
            outputDir: userConfig.outputDir,
            chunkConfig: {
                ...DEFAULT_CHUNK_CONFIG,
                ...userConfig.chunkConfig,
            },
            normalizerConfig: {
                ...DEFAULT_NORMALIZER_CONFIG,
                ...userConfig.normalizerConfig,
            },
            processingConfig: {
                ...DEFAULT_PROCESSING_CONFIG,
                ...userConfig.processingConfig,
            },
            logging: {
                ...DEFAULT_LOG_CONFIG,
                ...userConfig.logging,
                level: userConfig.logging?.level || DEFAULT_LOG_CONFIG.level,
            },
        };

        const validation = configSchema.safeParse(resolved);
        if (!validation.success) {
            throw new ConfigurationError('Invalid configuration', {
                errors: validation.error.issues.map(issue => ({
                    path: issue.path.join('.'),
                    message: issue.message,
                })),
            });
        }

        return resolved;
    }
}

/**
 * Create a new ReportIngestor instance
 *
 * @example
 * ```typescript
 * const ingestor = createReportIngestor({ inputDir: 'data', outputDir: 'processed' });
 * const run = await ingestor.ingest();
 * ```
 */
export function createReportIngestor(
    config: PipelineConfig,
    overrides?: ReportIngestorOverrides
): ReportIngestor {
    return ReportIngestorFactory.create(config, overrides);
}
