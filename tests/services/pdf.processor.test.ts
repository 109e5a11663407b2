import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs/promises';
import * as path from 'path';
import pdf, { type PageData, type Result } from 'pdf-parse/lib/pdf-parse.js';
import { PDFProcessor, renderPageText } from '../../src/services/pdf.processor.js';
import { ExtractionError } from '../../src/errors/index.js';
import { hashBuffer } from '../../src/utils/hash.js';
import { createMockLogger, createTempDir, removeTempDir } from '../mocks/index.js';

vi.mock('pdf-parse/lib/pdf-parse.js', () => ({
    default: vi.fn(),
}));

const pdfMock = vi.mocked(pdf);

/**
 * Page whose text items sit on the given baselines
 */
function createPage(pageIndex: number, lines: Array<[string, number]>): PageData {
    return {
        pageIndex,
        getTextContent: async () => ({
            items: lines.map(([str, y]) => ({ str, transform: [1, 0, 0, 1, 72, y] })),
        }),
    };
}

function createResult(numpages: number): Result {
    return { numpages, numrender: numpages, info: null, metadata: null, version: '1.10.100', text: '' };
}

/**
 * Make the mocked parser render the given pages through the pagerender hook
 */
function renderPages(pages: PageData[], numpages: number = pages.length): void {
    pdfMock.mockImplementation(async (_buffer, options) => {
        for (const page of pages) {
            await options?.pagerender?.(page);
        }
        return createResult(numpages);
    });
}

describe('PDFProcessor', () => {
    let dir: string;
    let filePath: string;
    let processor: PDFProcessor;

    beforeEach(async () => {
        dir = await createTempDir();
        filePath = path.join(dir, 'acme_2024_annual.pdf');
        await fs.writeFile(filePath, '%PDF-1.4 test document');
        processor = new PDFProcessor(createMockLogger());
    });

    afterEach(async () => {
        await removeTempDir(dir);
    });

    describe('renderPageText', () => {
        it('should join items on one baseline and break lines when it moves', async () => {
            const page = createPage(0, [
                ['Group ', 700],
                ['results', 700],
                ['Revenue rose', 680],
            ]);

            await expect(renderPageText(page)).resolves.toBe('Group results\nRevenue rose');
        });

        it('should render an empty page as an empty string', async () => {
            await expect(renderPageText(createPage(0, []))).resolves.toBe('');
        });
    });

    describe('extract', () => {
        it('should return one entry per page in page order', async () => {
            const longLine = 'Operating income increased on higher volumes across all segments.';
            renderPages([
                createPage(1, [[longLine, 700]]),
                createPage(0, [['Chairman statement', 700], [longLine, 690]]),
            ]);

            const result = await processor.extract(filePath);

            expect(result.pageCount).toBe(2);
            expect(result.pages).toEqual([
                { pageNumber: 1, text: `Chairman statement\n${longLine}` },
                { pageNumber: 2, text: longLine },
            ]);
            expect(result.emptyPages).toEqual([]);
        });

        it('should report the file hash and size', async () => {
            renderPages([]);
            const bytes = await fs.readFile(filePath);

            const result = await processor.extract(filePath);

            expect(result.fileHash).toBe(hashBuffer(bytes));
            expect(result.fileSize).toBe(bytes.length);
        });

        it('should flag pages with little or no text as empty', async () => {
            renderPages([createPage(0, [['Figure 3', 700]])], 2);

            const result = await processor.extract(filePath);

            expect(result.pages).toEqual([
                { pageNumber: 1, text: 'Figure 3' },
                { pageNumber: 2, text: '' },
            ]);
            expect(result.emptyPages).toEqual([1, 2]);
        });

        it('should fail with ExtractionError when the file cannot be read', async () => {
            const missing = path.join(dir, 'missing.pdf');

            await expect(processor.extract(missing)).rejects.toThrow(ExtractionError);
            await expect(processor.extract(missing)).rejects.toThrow(/^Cannot read file: /);
            expect(pdfMock).not.toHaveBeenCalled();
        });

        it('should describe encrypted documents', async () => {
            const error = new Error('No password given');
            error.name = 'PasswordException';
            pdfMock.mockRejectedValue(error);

            await expect(processor.extract(filePath)).rejects.toMatchObject({
                name: 'ExtractionError',
                code: 'EXTRACTION_ERROR',
                message: 'PDF is encrypted: No password given',
                filePath,
            });
        });

        it('should describe invalid documents', async () => {
            const error = new Error('Invalid PDF structure');
            error.name = 'InvalidPDFException';
            pdfMock.mockRejectedValue(error);

            await expect(processor.extract(filePath)).rejects.toThrow('Not a valid PDF: Invalid PDF structure');
        });

        it('should pass other parser messages through', async () => {
            pdfMock.mockRejectedValue(new Error('bad XRef entry'));

            await expect(processor.extract(filePath)).rejects.toThrow('bad XRef entry');
        });
    });
});
