import * as path from 'path';
import pLimit from 'p-limit';
import type { ResolvedConfig } from '../types/config.types.js';
import type { ChunkFile } from '../types/chunk.types.js';
import type { ExtractionResult, IExtractionAdapter } from '../types/extraction.types.js';
import type {
    DocumentResult,
    FailedDocument,
    IngestionRun,
    RunOptions,
} from '../types/ingestion.types.js';
import type { IOutputRepository } from '../types/repository.types.js';
import { DocumentStatusEnum } from '../types/enums.js';
import {
    ExtractionError,
    IngestionError,
    clearCorrelationId,
    generateCorrelationId,
    setCorrelationId,
    wrapError,
    type ProcessingWarning,
} from '../errors/index.js';
import type { TextNormalizer } from '../services/normalization/text-normalizer.service.js';
import type { Chunker } from '../services/chunker.service.js';
import { attachMetadata, resolveIdentity, summarizeChunks } from '../services/metadata.service.js';
import { assertInputDir, discoverDocuments } from '../services/document.discovery.js';
import type { IngestEventEmitter } from '../utils/events.js';
import type { Logger } from '../utils/logger.js';
import { TimeoutError, withTimeout } from '../utils/timeout.js';

/**
 * Dependencies for IngestionEngine
 */
export interface IngestionEngineDependencies {
    extractor: IExtractionAdapter;
    normalizer: TextNormalizer;
    chunker: Chunker;
    output: IOutputRepository;
    /** Optional event sink for progress */
    events?: IngestEventEmitter;
    /** Override document discovery (defaults to a recursive *.pdf scan) */
    discover?: (inputDir: string) => Promise<string[]>;
}

type DocumentOutcome = DocumentResult | FailedDocument;

function isFailure(outcome: DocumentOutcome): outcome is FailedDocument {
    return outcome.status === DocumentStatusEnum.FAILED;
}

function bySourcePath(a: { sourcePath: string }, b: { sourcePath: string }): number {
    if (a.sourcePath === b.sourcePath) return 0;
    return a.sourcePath < b.sourcePath ? -1 : 1;
}

/**
 * Ingestion engine: extract → normalize → chunk → attach metadata → persist,
 * fanned out over every PDF below the input root.
 *
 * Per-document failures are recorded in the run summary and never abort the
 * run; only configuration problems do.
 */
export class IngestionEngine {
    private readonly config: ResolvedConfig;
    private readonly extractor: IExtractionAdapter;
    private readonly normalizer: TextNormalizer;
    private readonly chunker: Chunker;
    private readonly output: IOutputRepository;
    private readonly events?: IngestEventEmitter;
    private readonly discover: (inputDir: string) => Promise<string[]>;
    private readonly logger: Logger;

    constructor(
        config: ResolvedConfig,
        deps: IngestionEngineDependencies,
        logger: Logger
    ) {
        this.config = config;
        this.extractor = deps.extractor;
        this.normalizer = deps.normalizer;
        this.chunker = deps.chunker;
        this.output = deps.output;
        this.events = deps.events;
        this.discover = deps.discover ?? discoverDocuments;
        this.logger = logger;
    }

    /**
     * Process every PDF under the input root and write the run summary
     * @throws ConfigurationError when the input root is missing
     */
    async run(options: RunOptions = {}): Promise<IngestionRun> {
        const startTime = Date.now();
        const runId = generateCorrelationId();
        const { inputDir, outputDir } = this.config;

        setCorrelationId(runId);
        try {
            await assertInputDir(inputDir);

            const sources = await this.discover(inputDir);
            if (sources.length === 0) {
                this.logger.warn('No PDF files found', { inputDir });
            }

            this.logger.info('Starting ingestion', {
                inputDir,
                outputDir,
                documentCount: sources.length,
                chunkSize: this.chunker.chunkSize,
                chunkOverlap: this.chunker.chunkOverlap,
                maxConcurrency: this.config.processingConfig.maxConcurrency,
            });
            this.events?.emit('ingest:start', { runId, inputDir, documentCount: sources.length });

            const limit = pLimit(this.config.processingConfig.maxConcurrency);
            let completed = 0;

            const outcomes = await Promise.all(
                sources.map(sourcePath =>
                    limit(async () => {
                        const outcome = await this.processSafely(sourcePath);
                        completed += 1;
                        options.onProgress?.({
                            completed,
                            total: sources.length,
                            sourcePath,
                            status: outcome.status,
                            ...(isFailure(outcome) && { error: outcome.reason }),
                        });
                        return outcome;
                    })
                )
            );

            const documents = outcomes
                .filter((outcome): outcome is DocumentResult => !isFailure(outcome))
                .sort(bySourcePath);
            const failures = outcomes.filter(isFailure).sort(bySourcePath);

            const completedTime = Date.now();
            const run: IngestionRun = {
                runId,
                inputDir: path.resolve(inputDir),
                outputDir: path.resolve(outputDir),
                startedAt: new Date(startTime).toISOString(),
                completedAt: new Date(completedTime).toISOString(),
                elapsedMs: completedTime - startTime,
                totalDocuments: sources.length,
                documentsProcessed: documents.length,
                documentsFailed: failures.length,
                totalPages: documents.reduce((sum, doc) => sum + doc.pageCount, 0),
                totalChunks: documents.reduce((sum, doc) => sum + doc.chunkCount, 0),
                chunkSize: this.chunker.chunkSize,
                chunkOverlap: this.chunker.chunkOverlap,
                documents,
                failures,
            };

            await this.output.saveRunSummary(run);

            this.logger.info('Ingestion completed', {
                documentsProcessed: run.documentsProcessed,
                documentsFailed: run.documentsFailed,
                totalChunks: run.totalChunks,
                elapsedMs: run.elapsedMs,
            });
            this.events?.emit('ingest:complete', run);

            return run;
        } finally {
            clearCorrelationId();
        }
    }

    /**
     * Run the full pipeline for one document
     * @throws ExtractionError or IngestionError; callers decide whether to continue
     */
    async processDocument(sourcePath: string): Promise<DocumentResult> {
        const startTime = Date.now();
        const relativePath = this.relativePath(sourcePath);
        const warnings: ProcessingWarning[] = [];

        const { identity, warning } = resolveIdentity(sourcePath, this.config.inputDir);
        if (warning) {
            this.logger.warn(warning.message, { sourcePath: relativePath });
            warnings.push(warning);
        }

        const extraction = await this.extract(sourcePath);
        if (extraction.emptyPages.length > 0) {
            this.logger.info('Pages without extractable text', {
                sourcePath: relativePath,
                emptyPages: extraction.emptyPages,
            });
            warnings.push({
                type: 'EMPTY_PAGES',
                message: `${extraction.emptyPages.length} of ${extraction.pageCount} pages have no extractable text`,
                details: { pages: extraction.emptyPages },
            });
        }

        const normalized = this.normalizer.normalizePages(extraction.pages, relativePath);
        warnings.push(...normalized.warnings);

        const spans = this.chunker.chunk(normalized.text);
        const chunks = attachMetadata(spans, identity);
        const chunkStats = summarizeChunks(chunks);

        const chunkFile: ChunkFile = {
            metadata: {
                sourceFile: identity.sourceFile,
                sourcePath: relativePath,
                sourceHash: extraction.fileHash,
                company: identity.company,
                region: identity.region,
                reportType: identity.reportType,
                year: identity.year,
                pageCount: extraction.pageCount,
                originalChars: normalized.stats.originalChars,
                cleanedChars: normalized.stats.cleanedChars,
                reductionPercent: normalized.stats.reductionPercent,
                totalChunks: chunks.length,
                avgChunkSize: chunkStats.avgChunkSize,
                chunkSize: this.chunker.chunkSize,
                chunkOverlap: this.chunker.chunkOverlap,
            },
            chunks,
        };

        const paths = await this.output.saveDocument(relativePath, normalized.text, chunkFile);

        const processingMs = Date.now() - startTime;
        this.logger.info('Document processed', {
            sourcePath: relativePath,
            pageCount: extraction.pageCount,
            chunkCount: chunks.length,
            cleanedChars: normalized.stats.cleanedChars,
            processingMs,
        });

        return {
            sourcePath: identity.sourcePath,
            relativePath,
            status: DocumentStatusEnum.COMPLETED,
            company: identity.company,
            region: identity.region,
            reportType: identity.reportType,
            year: identity.year,
            pageCount: extraction.pageCount,
            chunkCount: chunks.length,
            originalChars: normalized.stats.originalChars,
            cleanedChars: normalized.stats.cleanedChars,
            textPath: paths.textPath,
            chunksPath: paths.chunksPath,
            processingMs,
            warnings,
        };
    }

    /**
     * processDocument, with any failure turned into a summary entry
     */
    private async processSafely(sourcePath: string): Promise<DocumentOutcome> {
        try {
            const result = await this.processDocument(sourcePath);
            this.events?.emit('ingest:document', result);
            return result;
        } catch (error) {
            const typed = wrapError(error, IngestionError, 'processDocument');

            const failure: FailedDocument = {
                sourcePath: path.resolve(sourcePath),
                relativePath: this.relativePath(sourcePath),
                status: DocumentStatusEnum.FAILED,
                code: typed.code,
                reason: typed.message,
            };

            this.logger.error('Document failed', {
                sourcePath: failure.relativePath,
                code: failure.code,
                error: failure.reason,
            });
            this.events?.emit('ingest:error', failure);

            return failure;
        }
    }

    /**
     * Extraction bounded by the per-document timeout
     */
    private async extract(sourcePath: string): Promise<ExtractionResult> {
        const { extractionTimeoutMs } = this.config.processingConfig;

        try {
            return await withTimeout(
                this.extractor.extract(sourcePath),
                extractionTimeoutMs,
                `Extraction of ${path.basename(sourcePath)}`
            );
        } catch (error) {
            if (error instanceof TimeoutError) {
                throw new ExtractionError(error.message, sourcePath, { timeoutMs: error.timeoutMs });
            }
            throw wrapError(error, ExtractionError, 'extract');
        }
    }

    /**
     * Source path relative to the input root; sources outside it keep their file name
     */
    private relativePath(sourcePath: string): string {
        const relative = path.relative(path.resolve(this.config.inputDir), path.resolve(sourcePath));
        if (relative.length === 0 || relative.startsWith('..') || path.isAbsolute(relative)) {
            return path.basename(sourcePath);
        }
        return relative;
    }
}
