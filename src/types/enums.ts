/**
 * Document processing status enumeration
 */
export const DocumentStatusEnum = {
    COMPLETED: 'COMPLETED',
    FAILED: 'FAILED',
} as const;

export type DocumentStatusEnumType = (typeof DocumentStatusEnum)[keyof typeof DocumentStatusEnum];

/**
 * Normalization stage names, in execution order
 */
export const NormalizationStageEnum = {
    UNICODE_NFC: 'unicode-nfc',
    INVISIBLE_WHITESPACE: 'invisible-whitespace',
    HYPHENATION_REPAIR: 'hyphenation-repair',
    HEADER_FOOTER_REMOVAL: 'header-footer-removal',
    PAGE_BREAK_RESOLUTION: 'page-break-resolution',
    PAGE_NUMBER_REMOVAL: 'page-number-removal',
    BULLET_NORMALIZATION: 'bullet-normalization',
    BLANK_LINE_COLLAPSE: 'blank-line-collapse',
    HORIZONTAL_WHITESPACE_COLLAPSE: 'horizontal-whitespace-collapse',
    TABLE_COLUMN_CLEANUP: 'table-column-cleanup',
    TRIM: 'trim',
} as const;

export type NormalizationStageEnumType = (typeof NormalizationStageEnum)[keyof typeof NormalizationStageEnum];

/**
 * Chunk end boundary kinds, in snapping priority order
 */
export const BoundaryKindEnum = {
    PARAGRAPH: 'PARAGRAPH',
    SENTENCE: 'SENTENCE',
    LINE: 'LINE',
    NONE: 'NONE',
} as const;

export type BoundaryKindEnumType = (typeof BoundaryKindEnum)[keyof typeof BoundaryKindEnum];
