/**
 * Mock Extraction Adapter
 *
 * In-process stand-in for PDF extraction. Documents are registered by
 * file name; the PDF files on disk only need to exist for discovery.
 */

import { vi, type Mock } from 'vitest';
import * as path from 'path';
import { ExtractionError } from '../../src/errors/index.js';
import type { ExtractionResult, IExtractionAdapter } from '../../src/types/extraction.types.js';
import { createMockExtractionResult } from './fixtures.js';

/**
 * Behaviour of one registered document
 */
export type FakeDocument =
    | { pages: string[] }
    | { error: Error }
    | { hang: true };

/**
 * Mock IExtractionAdapter type
 */
export type MockExtractor = {
    [K in keyof IExtractionAdapter]: Mock<IExtractionAdapter[K]>;
};

/**
 * Create an extractor answering from a file-name keyed table
 *
 * @example
 * ```typescript
 * const extractor = createMockExtractor({
 *   'acme_2024_annual.pdf': { pages: ['Page one text', 'Page two text'] },
 *   'broken.pdf': { error: new Error('bad xref') },
 * });
 * ```
 */
export function createMockExtractor(documents: Record<string, FakeDocument>): MockExtractor {
    return {
        extract: vi.fn(async (filePath: string): Promise<ExtractionResult> => {
            const name = path.basename(filePath);
            const doc = documents[name];

            if (!doc) {
                throw new ExtractionError(`Not a valid PDF: ${name}`, filePath);
            }
            if ('error' in doc) {
                throw doc.error;
            }
            if ('hang' in doc) {
                return new Promise<ExtractionResult>(() => undefined);
            }

            return createMockExtractionResult(doc.pages);
        }),
    };
}
