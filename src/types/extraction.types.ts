/**
 * Raw text of one PDF page
 */
export interface PageContent {
    /** 1-indexed page number */
    pageNumber: number;
    text: string;
}

/**
 * Result of extracting one document
 */
export interface ExtractionResult {
    /** Pages in page-number order */
    pages: PageContent[];
    /** Page count reported by the PDF */
    pageCount: number;
    /** SHA-256 of the source bytes */
    fileHash: string;
    /** File size in bytes */
    fileSize: number;
    /** Page numbers whose text looks empty (image-only or blank) */
    emptyPages: number[];
}

/**
 * Extraction Adapter Interface
 *
 * Abstraction over PDF text-extraction libraries.
 * Allows swapping extractors without changing the ingestion engine.
 *
 * @example
 * ```typescript
 * class IngestionEngine {
 *   constructor(private extractor: IExtractionAdapter) {}
 *
 *   async processDocument(path: string) {
 *     const { pages, pageCount } = await this.extractor.extract(path);
 *     // Normalize, chunk...
 *   }
 * }
 * ```
 */
export interface IExtractionAdapter {
    /**
     * Extract per-page text from a document
     * @param filePath - Path of the source PDF
     * @throws ExtractionError when the file is unreadable, encrypted or not a valid PDF
     */
    extract(filePath: string): Promise<ExtractionResult>;
}
