import { NORMALIZATION_PATTERNS } from '../../config/constants.js';
import type { NormalizerConfig } from '../../types/config.types.js';
import { NormalizationStageEnum } from '../../types/enums.js';
import type { NormalizationStage } from '../../types/normalization.types.js';
import { PAGE_BREAK_PATTERN, removeRepeatedLines } from './header-footer.js';
import { cleanTableColumns } from './table-cleanup.js';

/** Unicode space separators that render as an ordinary space */
const SPACE_LIKE = /[\u00A0\u1680\u2000-\u200A\u202F\u205F\u3000]/g;

/** Zero-width characters, BOM, soft hyphen and NUL */
const INVISIBLE = /[\u200B-\u200D\u2060\uFEFF\u00AD\u0000]/g;

/** Word split across a line wrap; never spans a page break */
const HYPHENATED_WRAP = /(?<=\p{L})-[^\S\n\f]*\n[^\S\n\f]*(?=\p{L})/gu;

/** Standalone page number: 42, Page 42, Page 42 of 300, - 42 - */
const PAGE_NUMBER_LINE =
    /^[^\S\n]*(?:[-–—][^\S\n]*)?(?:page[^\S\n]*)?\d{1,4}(?:[^\S\n]*of[^\S\n]*\d{1,4})?(?:[^\S\n]*[-–—])?[^\S\n]*$/gimu;

const BULLETS = /[●▪▸►◆◇○]/gu;

/** Three or more newlines, counting whitespace-only lines as blank */
const EXCESS_BLANK_LINES = /\n(?:[^\S\n]*\n){2,}/g;

const HORIZONTAL_WHITESPACE = /[^\S\n]+/g;

export const unicodeNfcStage: NormalizationStage = {
    name: NormalizationStageEnum.UNICODE_NFC,
    apply: text => text.normalize('NFC'),
};

export const invisibleWhitespaceStage: NormalizationStage = {
    name: NormalizationStageEnum.INVISIBLE_WHITESPACE,
    apply: text =>
        text
            .replace(/\r\n?/g, '\n')
            .replace(SPACE_LIKE, ' ')
            .replace(INVISIBLE, ''),
};

export const hyphenationRepairStage: NormalizationStage = {
    name: NormalizationStageEnum.HYPHENATION_REPAIR,
    apply: text => text.replace(HYPHENATED_WRAP, ''),
};

export function createHeaderFooterStage(config: NormalizerConfig): NormalizationStage {
    return {
        name: NormalizationStageEnum.HEADER_FOOTER_REMOVAL,
        apply: text =>
            removeRepeatedLines(text, config.headerFooterThreshold, config.headerFooterMinPages),
    };
}

export const pageBreakResolutionStage: NormalizationStage = {
    name: NormalizationStageEnum.PAGE_BREAK_RESOLUTION,
    apply: text => text.replace(PAGE_BREAK_PATTERN, NORMALIZATION_PATTERNS.PARAGRAPH_BREAK),
};

export const pageNumberRemovalStage: NormalizationStage = {
    name: NormalizationStageEnum.PAGE_NUMBER_REMOVAL,
    apply: text => text.replace(PAGE_NUMBER_LINE, ''),
};

export const bulletNormalizationStage: NormalizationStage = {
    name: NormalizationStageEnum.BULLET_NORMALIZATION,
    apply: text => text.replace(BULLETS, NORMALIZATION_PATTERNS.BULLET),
};

export const blankLineCollapseStage: NormalizationStage = {
    name: NormalizationStageEnum.BLANK_LINE_COLLAPSE,
    apply: text => text.replace(EXCESS_BLANK_LINES, NORMALIZATION_PATTERNS.PARAGRAPH_BREAK),
};

export const horizontalWhitespaceStage: NormalizationStage = {
    name: NormalizationStageEnum.HORIZONTAL_WHITESPACE_COLLAPSE,
    apply: text => text.replace(HORIZONTAL_WHITESPACE, ' '),
};

export function createTableCleanupStage(config: NormalizerConfig): NormalizationStage {
    return {
        name: NormalizationStageEnum.TABLE_COLUMN_CLEANUP,
        apply: text =>
            cleanTableColumns(text, {
                minTokens: config.tableMinTokens,
                noiseRatio: config.tableNoiseRatio,
            }),
    };
}

export const trimStage: NormalizationStage = {
    name: NormalizationStageEnum.TRIM,
    apply: text =>
        text
            .split('\n')
            .map(line => line.trim())
            .join('\n')
            .trim(),
};

/**
 * The fixed stage order.
 * Later stages rely on earlier ones: regexes assume NFC text, header
 * detection needs the page markers that page-break resolution removes,
 * and trimming runs last.
 */
export function buildNormalizationStages(config: NormalizerConfig): NormalizationStage[] {
    return [
        unicodeNfcStage,
        invisibleWhitespaceStage,
        hyphenationRepairStage,
        createHeaderFooterStage(config),
        pageBreakResolutionStage,
        pageNumberRemovalStage,
        bulletNormalizationStage,
        blankLineCollapseStage,
        horizontalWhitespaceStage,
        createTableCleanupStage(config),
        trimStage,
    ];
}
