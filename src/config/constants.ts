/**
 * System constants for the ingestion pipeline
 * Centralizes magic numbers and fixed patterns
 */

// ============================================
// Extraction
// ============================================

export const EXTRACTION_DEFAULTS = {
    /**
     * Pages with fewer trimmed characters than this are reported as empty
     * (usually image-only pages or charts)
     */
    EMPTY_PAGE_CHAR_THRESHOLD: 50,
} as const;

// ============================================
// Normalization
// ============================================

export const NORMALIZATION_PATTERNS = {
    /**
     * Separator used to join pages: a form feed on its own line.
     * Form feed never survives pdf text extraction as content.
     */
    PAGE_JOINER: '\n\f\n',

    /**
     * Replacement for a resolved page break
     */
    PARAGRAPH_BREAK: '\n\n',

    /**
     * Replacement glyph for assorted bullet characters
     */
    BULLET: '•',
} as const;

// ============================================
// Output layout
// ============================================

export const OUTPUT_LAYOUT = {
    /** Suffix of the normalized-text artifact */
    TEXT_SUFFIX: '.txt',
    /** Suffix of the chunk-list artifact */
    CHUNKS_SUFFIX: '_chunks.json',
    /** Run summary file name at the output root */
    SUMMARY_FILE: 'ingestion_summary.json',
    /** Value used for identity fields that could not be derived */
    UNKNOWN: 'unknown',
} as const;

// ============================================
// Type exports for type-safe access
// ============================================

export type ExtractionDefaults = typeof EXTRACTION_DEFAULTS;
export type NormalizationPatterns = typeof NORMALIZATION_PATTERNS;
export type OutputLayout = typeof OUTPUT_LAYOUT;
