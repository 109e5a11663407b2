import { randomBytes } from 'crypto';
import * as fs from 'fs/promises';
import * as path from 'path';
import { OUTPUT_LAYOUT } from '../config/constants.js';
import { IngestionError, errorMessage } from '../errors/index.js';
import type { ChunkFile } from '../types/chunk.types.js';
import type { IngestionRun } from '../types/ingestion.types.js';
import type { IOutputRepository, SavedDocumentPaths } from '../types/repository.types.js';
import type { Logger } from '../utils/logger.js';

/**
 * Write a file through a temporary sibling and a rename,
 * so readers only ever see the old or the new content
 */
export async function writeFileAtomic(filePath: string, content: string): Promise<void> {
    const dir = path.dirname(filePath);
    await fs.mkdir(dir, { recursive: true });

    const tmpPath = path.join(
        dir,
        `.${path.basename(filePath)}.${process.pid}.${randomBytes(6).toString('hex')}.tmp`
    );

    try {
        await fs.writeFile(tmpPath, content, 'utf-8');
        await fs.rename(tmpPath, filePath);
    } catch (error) {
        await fs.rm(tmpPath, { force: true });
        throw error;
    }
}

/**
 * Stable JSON rendering used for every artifact
 */
export function serializeJson(value: unknown): string {
    return JSON.stringify(value, null, 2) + '\n';
}

/**
 * Filesystem output repository
 *
 * Layout mirrors the input tree:
 *   <outputDir>/<relative dir>/<stem>.txt
 *   <outputDir>/<relative dir>/<stem>_chunks.json
 *   <outputDir>/ingestion_summary.json
 */
export class OutputRepository implements IOutputRepository {
    private readonly outputDir: string;
    private readonly logger: Logger;

    constructor(outputDir: string, logger: Logger) {
        this.outputDir = path.resolve(outputDir);
        this.logger = logger;
    }

    /**
     * Artifact paths for a source path relative to the input root
     */
    resolvePaths(relativePath: string): SavedDocumentPaths {
        const parsed = path.parse(relativePath);
        if (path.isAbsolute(relativePath) || parsed.dir.split(/[\\/]/).includes('..')) {
            throw new IngestionError(`Relative path escapes the output root: ${relativePath}`, {
                sourcePath: relativePath,
            });
        }

        const dir = path.join(this.outputDir, parsed.dir);
        return {
            textPath: path.join(dir, parsed.name + OUTPUT_LAYOUT.TEXT_SUFFIX),
            chunksPath: path.join(dir, parsed.name + OUTPUT_LAYOUT.CHUNKS_SUFFIX),
        };
    }

    async saveDocument(
        relativePath: string,
        normalizedText: string,
        chunkFile: ChunkFile
    ): Promise<SavedDocumentPaths> {
        const paths = this.resolvePaths(relativePath);

        try {
            await writeFileAtomic(paths.textPath, normalizedText);
            await writeFileAtomic(paths.chunksPath, serializeJson(chunkFile));
        } catch (error) {
            throw new IngestionError(`Failed to write outputs: ${errorMessage(error)}`, {
                sourcePath: relativePath,
                details: { textPath: paths.textPath, chunksPath: paths.chunksPath },
            });
        }

        this.logger.debug('Document outputs saved', {
            sourcePath: relativePath,
            textPath: paths.textPath,
            chunksPath: paths.chunksPath,
        });

        return paths;
    }

    async saveRunSummary(run: IngestionRun): Promise<string> {
        const summaryPath = path.join(this.outputDir, OUTPUT_LAYOUT.SUMMARY_FILE);
        await writeFileAtomic(summaryPath, serializeJson(run));

        this.logger.info('Run summary saved', { summaryPath });
        return summaryPath;
    }
}
