import type { NormalizationStageEnumType } from './enums.js';
import type { ProcessingWarning } from '../errors/index.js';

/**
 * One text → text cleaning step.
 * Implementations are pure: same input, same output.
 */
export interface NormalizationStage {
    name: NormalizationStageEnumType;
    apply(text: string): string;
}

/**
 * Character delta produced by one stage
 */
export interface StageStats {
    stage: NormalizationStageEnumType;
    charsBefore: number;
    charsAfter: number;
    /** False when the stage threw and its input was passed through */
    applied: boolean;
}

/**
 * What the normalizer changed, for logging and the chunk artifact
 */
export interface CleaningStats {
    originalChars: number;
    cleanedChars: number;
    reductionPercent: number;
    stages: StageStats[];
}

/**
 * Output of a normalizer run over one document
 */
export interface NormalizationResult {
    text: string;
    stats: CleaningStats;
    /** STAGE_FAILED warnings for stages that were skipped */
    warnings: ProcessingWarning[];
}
