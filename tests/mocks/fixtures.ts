/**
 * Test Fixtures
 * 
 * Factory functions for creating test data.
 * All fixtures return valid objects that can be customized via overrides.
 */

import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import type { ResolvedConfig } from '../../src/types/config.types.js';
import type { ExtractionResult, PageContent } from '../../src/types/extraction.types.js';
import {
    DEFAULT_CHUNK_CONFIG,
    DEFAULT_LOG_CONFIG,
    DEFAULT_NORMALIZER_CONFIG,
    DEFAULT_PROCESSING_CONFIG,
} from '../../src/types/config.types.js';

// ========================================
// CONFIG FIXTURES
// ========================================

/**
 * Create a resolved config with test-friendly defaults
 */
export function createMockResolvedConfig(overrides: Partial<ResolvedConfig> = {}): ResolvedConfig {
    return {
        inputDir: 'data',
        outputDir: 'processed',
        chunkConfig: { ...DEFAULT_CHUNK_CONFIG },
        normalizerConfig: { ...DEFAULT_NORMALIZER_CONFIG },
        processingConfig: { ...DEFAULT_PROCESSING_CONFIG, extractionTimeoutMs: 2_000 },
        logging: { ...DEFAULT_LOG_CONFIG, level: 'error' },
        ...overrides,
    };
}

// ========================================
// EXTRACTION FIXTURES
// ========================================

/**
 * Number pages from 1
 */
export function createMockPages(texts: readonly string[]): PageContent[] {
    return texts.map((text, i) => ({ pageNumber: i + 1, text }));
}

/**
 * Create an extraction result; pages under 50 visible characters are reported empty
 */
export function createMockExtractionResult(texts: readonly string[]): ExtractionResult {
    const pages = createMockPages(texts);
    return {
        pages,
        pageCount: pages.length,
        fileHash: 'a'.repeat(64),
        fileSize: 1024,
        emptyPages: pages.filter(p => p.text.trim().length < 50).map(p => p.pageNumber),
    };
}

/**
 * A paragraph of prose long enough to count as a content page
 */
export function createMockParagraph(topic: string, sentences: number = 4): string {
    return Array.from(
        { length: sentences },
        (_, i) => `The ${topic} review covers item number ${i + 1} in detail for the reporting period.`
    ).join(' ');
}

// ========================================
// FILESYSTEM FIXTURES
// ========================================

/**
 * Create a fresh temporary directory
 */
export async function createTempDir(prefix: string = 'report-ingest-'): Promise<string> {
    return fs.mkdtemp(path.join(os.tmpdir(), prefix));
}

/**
 * Create placeholder files under a root, e.g. 'emea/annual/acme/acme_2024_annual.pdf'
 */
export async function createCorpus(root: string, relativePaths: readonly string[]): Promise<string[]> {
    const created: string[] = [];
    for (const relativePath of relativePaths) {
        const filePath = path.join(root, relativePath);
        await fs.mkdir(path.dirname(filePath), { recursive: true });
        await fs.writeFile(filePath, '%PDF-1.4 placeholder');
        created.push(filePath);
    }
    return created;
}

/**
 * Remove a temporary directory tree
 */
export async function removeTempDir(dir: string): Promise<void> {
    await fs.rm(dir, { recursive: true, force: true });
}
