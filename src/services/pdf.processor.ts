import * as fs from 'fs/promises';
import * as path from 'path';
import pdf, { type PageData } from 'pdf-parse/lib/pdf-parse.js';
import { EXTRACTION_DEFAULTS } from '../config/constants.js';
import { ExtractionError, ReportIngestError, errorMessage } from '../errors/index.js';
import type { ExtractionResult, IExtractionAdapter, PageContent } from '../types/extraction.types.js';
import { hashBuffer } from '../utils/hash.js';
import type { Logger } from '../utils/logger.js';

/**
 * Reasons pdf.js reports through the exception name
 */
const PDFJS_FAILURES: Record<string, string> = {
    PasswordException: 'PDF is encrypted',
    InvalidPDFException: 'Not a valid PDF',
    MissingPDFException: 'PDF is missing',
    FormatError: 'PDF is corrupted',
};

/**
 * Join text items of one page, starting a new line whenever the baseline moves
 */
export async function renderPageText(pageData: PageData): Promise<string> {
    const content = await pageData.getTextContent({
        normalizeWhitespace: false,
        disableCombineTextItems: false,
    });

    let lastY: number | undefined;
    let text = '';

    for (const item of content.items) {
        const y = item.transform[5];
        if (lastY === undefined || y === lastY) {
            text += item.str;
        } else {
            text += '\n' + item.str;
        }
        lastY = y;
    }

    return text;
}

/**
 * PDF text extraction on pdf-parse, one string per page
 */
export class PDFProcessor implements IExtractionAdapter {
    private readonly logger: Logger;

    constructor(logger: Logger) {
        this.logger = logger;
    }

    /**
     * Extract per-page text from a PDF file
     */
    async extract(filePath: string): Promise<ExtractionResult> {
        const filename = path.basename(filePath);

        let buffer: Buffer;
        try {
            buffer = await fs.readFile(filePath);
        } catch (error) {
            throw new ExtractionError(`Cannot read file: ${errorMessage(error)}`, filePath);
        }

        const collected = new Map<number, string>();

        let pageCount: number;
        try {
            const result = await pdf(buffer, {
                pagerender: async (pageData: PageData) => {
                    const text = await renderPageText(pageData);
                    collected.set(pageData.pageIndex + 1, text);
                    return text;
                },
            });
            pageCount = result.numpages;
        } catch (error) {
            throw this.toExtractionError(error, filePath);
        }

        const pages: PageContent[] = [];
        for (let pageNumber = 1; pageNumber <= pageCount; pageNumber++) {
            pages.push({ pageNumber, text: collected.get(pageNumber) ?? '' });
        }

        const emptyPages = pages
            .filter(p => p.text.trim().length < EXTRACTION_DEFAULTS.EMPTY_PAGE_CHAR_THRESHOLD)
            .map(p => p.pageNumber);

        this.logger.debug('PDF extracted', {
            filename,
            fileSize: buffer.length,
            pageCount,
            emptyPages: emptyPages.length,
        });

        return {
            pages,
            pageCount,
            fileHash: hashBuffer(buffer),
            fileSize: buffer.length,
            emptyPages,
        };
    }

    private toExtractionError(error: unknown, filePath: string): ReportIngestError {
        if (error instanceof ReportIngestError) {
            return error;
        }

        const original = error instanceof Error ? error : new Error(String(error));
        const reason = PDFJS_FAILURES[original.name];

        return new ExtractionError(
            reason ? `${reason}: ${original.message}` : original.message,
            filePath,
            { originalError: original.name }
        );
    }
}
