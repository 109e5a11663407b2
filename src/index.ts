/**
 * annual-report-ingest: deterministic PDF annual-report ingestion
 *
 * @packageDocumentation
 */

// Main class and factory
export { ReportIngestor, type ReportIngestorDependencies } from './report-ingestor.js';
export {
    ReportIngestorFactory,
    createReportIngestor,
    type ReportIngestorOverrides,
} from './report-ingestor.factory.js';

// Engine
export { IngestionEngine, type IngestionEngineDependencies } from './engines/ingestion.engine.js';

// Pipeline components
export { PDFProcessor, renderPageText } from './services/pdf.processor.js';
export {
    TextNormalizer,
    reductionPercent,
    buildNormalizationStages,
    detectRepeatedLines,
    joinPages,
    splitPages,
    isGarbledTableLine,
    cleanTableLine,
} from './services/normalization/index.js';
export { Chunker } from './services/chunker.service.js';
export {
    extractYear,
    resolveIdentity,
    buildChunkId,
    attachMetadata,
    summarizeChunks,
    type ResolvedIdentity,
} from './services/metadata.service.js';
export { discoverDocuments, assertInputDir } from './services/document.discovery.js';
export { OutputRepository, writeFileAtomic, serializeJson } from './repositories/output.repository.js';

// Configuration
export { parseEnv, pipelineConfigFromEnv, type Env } from './config/env.js';
export {
    configSchema,
    chunkConfigSchema,
    DEFAULT_CHUNK_CONFIG,
    DEFAULT_NORMALIZER_CONFIG,
    DEFAULT_PROCESSING_CONFIG,
    DEFAULT_LOG_CONFIG,
} from './types/config.types.js';

export type {
    PipelineConfig,
    ResolvedConfig,
    // Config subtypes
    ChunkConfig,
    NormalizerConfig,
    ProcessingConfig,
    LogConfig,
} from './types/config.types.js';

export type {
    TextSpan,
    Chunk,
    ChunkFile,
    ChunkStats,
    DocumentIdentity,
} from './types/chunk.types.js';

export type {
    NormalizationStage,
    NormalizationResult,
    CleaningStats,
    StageStats,
} from './types/normalization.types.js';

export type {
    PageContent,
    ExtractionResult,
    IExtractionAdapter,
} from './types/extraction.types.js';

export type { IOutputRepository, SavedDocumentPaths } from './types/repository.types.js';

export type {
    DocumentResult,
    FailedDocument,
    IngestionRun,
    DocumentProgress,
    ProgressCallback,
    RunOptions,
} from './types/ingestion.types.js';

// Enums
export { DocumentStatusEnum, NormalizationStageEnum, BoundaryKindEnum } from './types/enums.js';

// Events and logging
export { IngestEventEmitter, createEventEmitter, type IngestEvents } from './utils/events.js';
export { createLogger, type Logger, type LogMeta } from './utils/logger.js';

// Errors
export {
    ReportIngestError,
    ConfigurationError,
    ExtractionError,
    NormalizationStageError,
    IngestionError,
    // Utilities
    generateCorrelationId,
    setCorrelationId,
    getCorrelationId,
    clearCorrelationId,
    wrapError,
    errorMessage,
} from './errors/index.js';

export type { ProcessingWarning, MetadataUnresolvedWarning, ErrorContext } from './errors/index.js';
