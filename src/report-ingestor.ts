import type { ResolvedConfig } from './types/config.types.js';
import type { DocumentResult, IngestionRun, RunOptions } from './types/ingestion.types.js';
import type { IngestionEngine } from './engines/ingestion.engine.js';
import type { IngestEventEmitter } from './utils/events.js';
import type { Logger } from './utils/logger.js';

/**
 * Collaborators wired by ReportIngestorFactory
 */
export interface ReportIngestorDependencies {
    ingestionEngine: IngestionEngine;
    events: IngestEventEmitter;
    logger: Logger;
}

/**
 * Main entry point for annual-report ingestion
 *
 * @example
 * ```typescript
 * import { createReportIngestor } from 'annual-report-ingest';
 *
 * const ingestor = createReportIngestor({
 *   inputDir: './data',
 *   outputDir: './processed',
 * });
 *
 * ingestor.events.on('ingest:error', failure => console.warn(failure.reason));
 * const run = await ingestor.ingest();
 * console.log(`${run.totalChunks} chunks from ${run.documentsProcessed} reports`);
 * ```
 */
export class ReportIngestor {
    private readonly resolvedConfig: ResolvedConfig;
    private readonly ingestionEngine: IngestionEngine;
    private readonly logger: Logger;

    /** Progress events for every run started through this instance */
    readonly events: IngestEventEmitter;

    constructor(config: ResolvedConfig, deps: ReportIngestorDependencies) {
        this.resolvedConfig = config;
        this.ingestionEngine = deps.ingestionEngine;
        this.events = deps.events;
        this.logger = deps.logger;

        this.logger.debug('Report ingestor initialized', {
            inputDir: config.inputDir,
            outputDir: config.outputDir,
            chunkConfig: config.chunkConfig,
        });
    }

    /**
     * Effective configuration with defaults applied
     */
    get config(): Readonly<ResolvedConfig> {
        return this.resolvedConfig;
    }

    // ============================================
    // INGESTION
    // ============================================

    /**
     * Ingest every PDF under the input root.
     * Resolves with the run summary even when individual documents fail.
     */
    async ingest(options?: RunOptions): Promise<IngestionRun> {
        return this.ingestionEngine.run(options);
    }

    /**
     * Ingest a single PDF; rejects when it cannot be processed
     */
    async processFile(sourcePath: string): Promise<DocumentResult> {
        return this.ingestionEngine.processDocument(sourcePath);
    }
}
