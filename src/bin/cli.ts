#!/usr/bin/env node

import 'dotenv/config';
import { Command } from 'commander';
import { readFileSync } from 'fs';
import * as fs from 'fs/promises';
import * as path from 'path';
import { z } from 'zod';
import type { PipelineConfig } from '../types/config.types.js';
import type { IngestionRun } from '../types/ingestion.types.js';
import { OUTPUT_LAYOUT } from '../config/constants.js';
import { parseEnv, pipelineConfigFromEnv } from '../config/env.js';
import { ReportIngestError, errorMessage } from '../errors/index.js';
import { ReportIngestorFactory, createReportIngestor } from '../report-ingestor.factory.js';
import { assertInputDir, discoverDocuments } from '../services/document.discovery.js';

const packageSchema = z.object({ version: z.string().optional() });

function readVersion(): string {
    try {
        const raw = readFileSync(new URL('../../package.json', import.meta.url), 'utf-8');
        const parsed = packageSchema.safeParse(JSON.parse(raw));
        return parsed.success ? parsed.data.version ?? '0.0.0' : '0.0.0';
    } catch {
        return '0.0.0';
    }
}

const ingestOptionsSchema = z.object({
    output: z.string().min(1).optional(),
    chunkSize: z.coerce.number().int().optional(),
    overlap: z.coerce.number().int().optional(),
    headerThreshold: z.coerce.number().optional(),
    concurrency: z.coerce.number().int().optional(),
    timeout: z.coerce.number().int().optional(),
    logLevel: z.enum(['debug', 'info', 'warn', 'error']).optional(),
    pretty: z.boolean().optional(),
});

type IngestOptions = z.infer<typeof ingestOptionsSchema>;

const statusOptionsSchema = z.object({
    input: z.string().min(1).optional(),
    output: z.string().min(1).optional(),
});

/**
 * Environment first, command-line flags on top
 */
function buildPipelineConfig(inputDir: string | undefined, options: IngestOptions): PipelineConfig {
    const base = pipelineConfigFromEnv(parseEnv());

    return {
        inputDir: inputDir ?? base.inputDir,
        outputDir: options.output ?? base.outputDir,
        chunkConfig: {
            ...base.chunkConfig,
            ...(options.chunkSize !== undefined && { chunkSize: options.chunkSize }),
            ...(options.overlap !== undefined && { chunkOverlap: options.overlap }),
        },
        normalizerConfig: {
            ...base.normalizerConfig,
            ...(options.headerThreshold !== undefined && {
                headerFooterThreshold: options.headerThreshold,
            }),
        },
        processingConfig: {
            ...base.processingConfig,
            ...(options.concurrency !== undefined && { maxConcurrency: options.concurrency }),
            ...(options.timeout !== undefined && { extractionTimeoutMs: options.timeout }),
        },
        logging: {
            ...base.logging,
            ...(options.logLevel && { level: options.logLevel }),
            structured: options.pretty !== true,
        },
    };
}

function reportError(error: unknown): void {
    console.error(`Error: ${errorMessage(error)}`);
    if (error instanceof ReportIngestError && error.details?.['errors']) {
        console.error(JSON.stringify(error.details['errors'], null, 2));
    }
}

function printRun(run: IngestionRun): void {
    console.log('\nDocuments:');
    for (const doc of run.documents) {
        console.log(
            `  OK    ${doc.relativePath.padEnd(48)} ${String(doc.pageCount).padStart(5)} pages ${String(doc.chunkCount).padStart(6)} chunks`
        );
    }
    for (const failure of run.failures) {
        console.log(`  FAIL  ${failure.relativePath.padEnd(48)} ${failure.code}: ${failure.reason}`);
    }

    console.log('\nTotals:');
    console.log(`  Documents: ${run.documentsProcessed}/${run.totalDocuments} processed, ${run.documentsFailed} failed`);
    console.log(`  Pages: ${run.totalPages}`);
    console.log(`  Chunks: ${run.totalChunks} (size ${run.chunkSize}, overlap ${run.chunkOverlap})`);
    console.log(`  Elapsed: ${(run.elapsedMs / 1000).toFixed(1)}s`);
    console.log(`  Summary: ${path.join(run.outputDir, OUTPUT_LAYOUT.SUMMARY_FILE)}\n`);
}

const program = new Command();

program
    .name('report-ingest')
    .description('Normalize and chunk PDF annual reports for downstream embedding')
    .version(readVersion());

program
    .command('ingest')
    .description('Ingest every PDF under the input directory')
    .argument('[inputDir]', 'Input root (default: DATA_DIR or ./data)')
    .option('-o, --output <dir>', 'Output root (default: PROCESSED_DIR or ./processed)')
    .option('--chunk-size <chars>', 'Target chunk size in characters')
    .option('--overlap <chars>', 'Overlap between consecutive chunks')
    .option('--header-threshold <ratio>', 'Page frequency above which repeated lines are stripped')
    .option('--concurrency <number>', 'Documents processed in parallel')
    .option('--timeout <ms>', 'Per-document extraction timeout')
    .option('--log-level <level>', 'debug | info | warn | error')
    .option('--pretty', 'Human-readable logs')
    .action(async (inputDir: string | undefined, rawOptions: unknown) => {
        const parsed = ingestOptionsSchema.safeParse(rawOptions);
        if (!parsed.success) {
            for (const issue of parsed.error.issues) {
                console.error(`Error: --${issue.path.join('.')}: ${issue.message}`);
            }
            process.exitCode = 1;
            return;
        }

        try {
            const ingestor = createReportIngestor(buildPipelineConfig(inputDir, parsed.data));
            const run = await ingestor.ingest({
                onProgress: progress => {
                    const mark = progress.status === 'FAILED' ? 'x' : '.';
                    process.stderr.write(`[${progress.completed}/${progress.total}] ${mark} ${path.basename(progress.sourcePath)}\n`);
                },
            });

            printRun(run);

            if (run.documentsFailed > 0) {
                process.exitCode = 1;
            }
        } catch (error) {
            reportError(error);
            process.exitCode = 1;
        }
    });

program
    .command('status')
    .description('Show the effective configuration and the PDFs awaiting ingestion')
    .option('-i, --input <dir>', 'Input root override')
    .option('-o, --output <dir>', 'Output root override')
    .action(async (rawOptions: unknown) => {
        try {
            const options = statusOptionsSchema.parse(rawOptions);
            const base = pipelineConfigFromEnv(parseEnv());
            const config = ReportIngestorFactory.resolveConfig({
                ...base,
                inputDir: options.input ?? base.inputDir,
                outputDir: options.output ?? base.outputDir,
            });

            console.log('Configuration:');
            console.log(`  Input: ${path.resolve(config.inputDir)}`);
            console.log(`  Output: ${path.resolve(config.outputDir)}`);
            console.log(`  Chunk size: ${config.chunkConfig.chunkSize}`);
            console.log(`  Chunk overlap: ${config.chunkConfig.chunkOverlap}`);
            console.log(`  Header/footer threshold: ${config.normalizerConfig.headerFooterThreshold}`);
            console.log(`  Concurrency: ${config.processingConfig.maxConcurrency}`);
            console.log(`  Extraction timeout: ${config.processingConfig.extractionTimeoutMs}ms`);
            console.log(`  Log level: ${config.logging.level}`);
            console.log();

            await assertInputDir(config.inputDir);
            const documents = await discoverDocuments(config.inputDir);
            console.log(`PDF files found: ${documents.length}`);

            const summaryPath = path.join(config.outputDir, OUTPUT_LAYOUT.SUMMARY_FILE);
            try {
                const stats = await fs.stat(summaryPath);
                console.log(`Last run summary: ${summaryPath} (${stats.mtime.toISOString()})`);
            } catch {
                console.log('Last run summary: none');
            }
            console.log();
        } catch (error) {
            reportError(error);
            process.exitCode = 1;
        }
    });

program.parseAsync(process.argv).catch((error: unknown) => {
    reportError(error);
    process.exitCode = 1;
});
