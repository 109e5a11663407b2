import type { ChunkFile } from './chunk.types.js';
import type { IngestionRun } from './ingestion.types.js';

/**
 * Where a document's artifacts were written
 */
export interface SavedDocumentPaths {
    textPath: string;
    chunksPath: string;
}

/**
 * Output Repository Interface
 *
 * Persists per-document artifacts and the run summary.
 * Every write replaces the previous artifact atomically.
 */
export interface IOutputRepository {
    /**
     * Write normalized text and chunk list for one document
     * @param relativePath - Source path relative to the input root; the layout mirrors it
     */
    saveDocument(relativePath: string, normalizedText: string, chunkFile: ChunkFile): Promise<SavedDocumentPaths>;

    /**
     * Write the run summary
     * @returns Path of the summary artifact
     */
    saveRunSummary(run: IngestionRun): Promise<string>;
}
