import type { BoundaryKindEnumType } from './enums.js';

/**
 * Half-open span of normalized text produced by the chunker
 */
export interface TextSpan {
    /** 0-based position within the document */
    index: number;
    /** Start offset into the normalized text */
    start: number;
    /** End offset (exclusive) into the normalized text */
    end: number;
    /** Exactly `normalized.slice(start, end)` */
    text: string;
    /** Which boundary the end was snapped to */
    boundary: BoundaryKindEnumType;
}

/**
 * Identity fields derived from the source path
 */
export interface DocumentIdentity {
    /** Absolute path of the source PDF */
    sourcePath: string;
    /** Source file name including extension */
    sourceFile: string;
    company: string;
    region: string;
    /** Category directory, e.g. "annual" */
    reportType: string;
    year: string;
}

/**
 * Chunk with provenance, the unit handed to embedding
 */
export interface Chunk {
    /** `<company>_<year>_chunk<NNNN>` */
    chunkId: string;
    chunkIndex: number;
    startOffset: number;
    endOffset: number;
    text: string;
    charCount: number;
    company: string;
    region: string;
    reportType: string;
    year: string;
}

/**
 * Aggregate chunk statistics for one document
 */
export interface ChunkStats {
    totalChars: number;
    avgChunkSize: number;
}

/**
 * Serialized chunk-list artifact
 */
export interface ChunkFile {
    metadata: {
        sourceFile: string;
        sourcePath: string;
        sourceHash: string;
        company: string;
        region: string;
        reportType: string;
        year: string;
        pageCount: number;
        originalChars: number;
        cleanedChars: number;
        reductionPercent: number;
        totalChunks: number;
        avgChunkSize: number;
        chunkSize: number;
        chunkOverlap: number;
    };
    chunks: Chunk[];
}
