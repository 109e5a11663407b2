import { NormalizationStageError, errorMessage, type ProcessingWarning } from '../../errors/index.js';
import type { NormalizerConfig } from '../../types/config.types.js';
import type { PageContent } from '../../types/extraction.types.js';
import type {
    CleaningStats,
    NormalizationResult,
    NormalizationStage,
    StageStats,
} from '../../types/normalization.types.js';
import type { Logger } from '../../utils/logger.js';
import { joinPages } from './header-footer.js';
import { buildNormalizationStages } from './stages.js';

/**
 * Runs the cleaning stages over one document.
 *
 * A stage that throws is skipped: its input flows on to the next stage and
 * a STAGE_FAILED warning is recorded. The document is never dropped here.
 */
export class TextNormalizer {
    private readonly stages: readonly NormalizationStage[];
    private readonly logger: Logger;

    constructor(config: NormalizerConfig, logger: Logger, stages?: readonly NormalizationStage[]) {
        this.stages = stages ?? buildNormalizationStages(config);
        this.logger = logger;
    }

    /**
     * Normalize extracted pages, joined with the page-break marker
     */
    normalizePages(pages: readonly PageContent[], sourcePath?: string): NormalizationResult {
        const ordered = [...pages].sort((a, b) => a.pageNumber - b.pageNumber);
        return this.normalize(joinPages(ordered.map(p => p.text)), sourcePath);
    }

    /**
     * Normalize raw text that already carries page-break markers
     */
    normalize(raw: string, sourcePath?: string): NormalizationResult {
        let text = raw;
        const stageStats: StageStats[] = [];
        const warnings: ProcessingWarning[] = [];

        for (const stage of this.stages) {
            const before = text;
            try {
                text = stage.apply(before);
                stageStats.push({
                    stage: stage.name,
                    charsBefore: before.length,
                    charsAfter: text.length,
                    applied: true,
                });
            } catch (error) {
                const stageError = new NormalizationStageError(
                    `Stage ${stage.name} failed: ${errorMessage(error)}`,
                    stage.name,
                    { sourcePath }
                );

                this.logger.warn('Normalization stage skipped', {
                    sourcePath,
                    stage: stage.name,
                    error: stageError.message,
                });

                warnings.push({
                    type: 'STAGE_FAILED',
                    message: stageError.message,
                    details: { stage: stage.name, code: stageError.code },
                });

                text = before;
                stageStats.push({
                    stage: stage.name,
                    charsBefore: before.length,
                    charsAfter: before.length,
                    applied: false,
                });
            }
        }

        const stats: CleaningStats = {
            originalChars: raw.length,
            cleanedChars: text.length,
            reductionPercent: reductionPercent(raw.length, text.length),
            stages: stageStats,
        };

        this.logger.debug('Text normalized', {
            sourcePath,
            originalChars: stats.originalChars,
            cleanedChars: stats.cleanedChars,
            reductionPercent: stats.reductionPercent,
        });

        return { text, stats, warnings };
    }
}

/**
 * Share of characters removed, rounded to two decimals
 */
export function reductionPercent(originalChars: number, cleanedChars: number): number {
    if (originalChars === 0) {
        return 0;
    }
    return Math.round((1 - cleanedChars / originalChars) * 10000) / 100;
}
