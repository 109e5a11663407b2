export { TextNormalizer, reductionPercent } from './text-normalizer.service.js';
export { buildNormalizationStages } from './stages.js';
export { detectRepeatedLines, joinPages, splitPages } from './header-footer.js';
export { isGarbledTableLine, cleanTableLine } from './table-cleanup.js';
