import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs/promises';
import * as path from 'path';
import {
    OutputRepository,
    serializeJson,
    writeFileAtomic,
} from '../../src/repositories/output.repository.js';
import { IngestionError } from '../../src/errors/index.js';
import type { ChunkFile } from '../../src/types/chunk.types.js';
import type { IngestionRun } from '../../src/types/ingestion.types.js';
import { createMockLogger, createTempDir, removeTempDir } from '../mocks/index.js';

function createChunkFile(): ChunkFile {
    return {
        metadata: {
            sourceFile: 'acme_2024.pdf',
            sourcePath: 'emea/annual/acme/acme_2024.pdf',
            sourceHash: 'b'.repeat(64),
            company: 'acme',
            region: 'emea',
            reportType: 'annual',
            year: '2024',
            pageCount: 1,
            originalChars: 12,
            cleanedChars: 11,
            reductionPercent: 8.33,
            totalChunks: 1,
            avgChunkSize: 11,
            chunkSize: 1000,
            chunkOverlap: 200,
        },
        chunks: [
            {
                chunkId: 'acme_2024_chunk0000',
                chunkIndex: 0,
                startOffset: 0,
                endOffset: 11,
                text: 'Revenue up.',
                charCount: 11,
                company: 'acme',
                region: 'emea',
                reportType: 'annual',
                year: '2024',
            },
        ],
    };
}

describe('OutputRepository', () => {
    let outputDir: string;
    let repository: OutputRepository;

    beforeEach(async () => {
        outputDir = await createTempDir();
        repository = new OutputRepository(outputDir, createMockLogger());
    });

    afterEach(async () => {
        await removeTempDir(outputDir);
    });

    describe('resolvePaths', () => {
        it('should mirror the input tree', () => {
            expect(repository.resolvePaths(path.join('emea', 'annual', 'acme', 'acme_2024.pdf'))).toEqual({
                textPath: path.join(outputDir, 'emea', 'annual', 'acme', 'acme_2024.txt'),
                chunksPath: path.join(outputDir, 'emea', 'annual', 'acme', 'acme_2024_chunks.json'),
            });
        });

        it('should place top-level documents at the output root', () => {
            expect(repository.resolvePaths('report.pdf').textPath).toBe(path.join(outputDir, 'report.txt'));
        });

        it('should reject paths that leave the output root', () => {
            expect(() => repository.resolvePaths(path.join('..', 'elsewhere', 'x.pdf'))).toThrow(IngestionError);
            expect(() => repository.resolvePaths(path.resolve('/tmp/x.pdf'))).toThrow(IngestionError);
        });
    });

    describe('saveDocument', () => {
        it('should write the normalized text and the chunk file', async () => {
            const chunkFile = createChunkFile();
            const paths = await repository.saveDocument('emea/annual/acme/acme_2024.pdf', 'Revenue up.', chunkFile);

            await expect(fs.readFile(paths.textPath, 'utf-8')).resolves.toBe('Revenue up.');
            const written = JSON.parse(await fs.readFile(paths.chunksPath, 'utf-8'));
            expect(written).toEqual(chunkFile);
        });

        it('should overwrite previous outputs byte for byte', async () => {
            const chunkFile = createChunkFile();
            const first = await repository.saveDocument('acme_2024.pdf', 'Revenue up.', chunkFile);
            const before = await fs.readFile(first.chunksPath, 'utf-8');

            const second = await repository.saveDocument('acme_2024.pdf', 'Revenue up.', chunkFile);

            await expect(fs.readFile(second.chunksPath, 'utf-8')).resolves.toBe(before);
            expect((await fs.readdir(outputDir)).sort()).toEqual(['acme_2024.txt', 'acme_2024_chunks.json']);
        });

        it('should wrap write failures in IngestionError', async () => {
            await fs.writeFile(path.join(outputDir, 'blocked'), 'not a directory');

            await expect(
                repository.saveDocument('blocked/acme_2024.pdf', 'text', createChunkFile())
            ).rejects.toThrow(/^Failed to write outputs: /);
        });
    });

    describe('saveRunSummary', () => {
        it('should write the summary at the output root', async () => {
            const run: IngestionRun = {
                runId: 'ingest_test',
                inputDir: '/data',
                outputDir,
                startedAt: '2024-01-01T00:00:00.000Z',
                completedAt: '2024-01-01T00:00:01.000Z',
                elapsedMs: 1000,
                totalDocuments: 0,
                documentsProcessed: 0,
                documentsFailed: 0,
                totalPages: 0,
                totalChunks: 0,
                chunkSize: 1000,
                chunkOverlap: 200,
                documents: [],
                failures: [],
            };

            const summaryPath = await repository.saveRunSummary(run);

            expect(summaryPath).toBe(path.join(outputDir, 'ingestion_summary.json'));
            await expect(fs.readFile(summaryPath, 'utf-8')).resolves.toBe(serializeJson(run));
        });
    });

    describe('writeFileAtomic', () => {
        it('should create missing directories and leave no temporary files', async () => {
            const target = path.join(outputDir, 'nested', 'deeper', 'file.txt');

            await writeFileAtomic(target, 'content');

            await expect(fs.readFile(target, 'utf-8')).resolves.toBe('content');
            expect(await fs.readdir(path.dirname(target))).toEqual(['file.txt']);
        });
    });

    describe('serializeJson', () => {
        it('should pretty-print with a trailing newline', () => {
            expect(serializeJson({ a: 1 })).toBe('{\n  "a": 1\n}\n');
        });
    });
});
