import type { DocumentStatusEnumType } from './enums.js';
import type { ProcessingWarning } from '../errors/index.js';

/**
 * Per-document outcome of a successful pipeline pass
 */
export interface DocumentResult {
    sourcePath: string;
    /** Path relative to the input root */
    relativePath: string;
    status: Extract<DocumentStatusEnumType, 'COMPLETED'>;
    company: string;
    region: string;
    reportType: string;
    year: string;
    pageCount: number;
    chunkCount: number;
    originalChars: number;
    cleanedChars: number;
    /** Where the normalized text was written */
    textPath: string;
    /** Where the chunk list was written */
    chunksPath: string;
    processingMs: number;
    warnings: ProcessingWarning[];
}

/**
 * A document that could not be processed
 */
export interface FailedDocument {
    sourcePath: string;
    relativePath: string;
    status: Extract<DocumentStatusEnumType, 'FAILED'>;
    /** Error code of the typed error, e.g. EXTRACTION_ERROR */
    code: string;
    reason: string;
}

/**
 * Aggregate record of one orchestrator invocation.
 * Written once as the run's terminal output.
 */
export interface IngestionRun {
    runId: string;
    inputDir: string;
    outputDir: string;
    startedAt: string;
    completedAt: string;
    elapsedMs: number;
    totalDocuments: number;
    documentsProcessed: number;
    documentsFailed: number;
    totalPages: number;
    totalChunks: number;
    chunkSize: number;
    chunkOverlap: number;
    documents: DocumentResult[];
    failures: FailedDocument[];
}

/**
 * Per-document progress notification
 */
export interface DocumentProgress {
    /** 1-based count of documents finished so far */
    completed: number;
    total: number;
    sourcePath: string;
    status: DocumentStatusEnumType;
    error?: string;
}

/**
 * Progress callback type
 */
export type ProgressCallback = (progress: DocumentProgress) => void;

/**
 * Run options
 */
export interface RunOptions {
    /** Progress callback, invoked once per finished document */
    onProgress?: ProgressCallback;
}
