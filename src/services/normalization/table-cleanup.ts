/**
 * Numeric-only cell: 1,234 / (12.5) / -42 / 45% / $3 / €1.2
 */
const NUMERIC_TOKEN = /^\(?[-+−]?[$€£¥₹]?\d[\d.,]*%?\)?$/u;

/**
 * Column filler left behind by table rendering: pipes and dot leaders
 */
const FILLER_TOKEN = /^(?:[|¦│]+|\.{2,}|…+)$/u;

/**
 * Dash and rule runs. They count towards the noise ratio but are kept,
 * since `--` is how nil cells are printed.
 */
const RULE_TOKEN = /^[-–—_=]{2,}$/u;

export interface TableCleanupOptions {
    minTokens: number;
    noiseRatio: number;
}

function isFiller(token: string): boolean {
    return FILLER_TOKEN.test(token);
}

function isNoise(token: string): boolean {
    return token.length <= 2 || NUMERIC_TOKEN.test(token) || isFiller(token) || RULE_TOKEN.test(token);
}

/**
 * Whether a line reads like a flattened table row rather than prose
 */
export function isGarbledTableLine(line: string, options: TableCleanupOptions): boolean {
    const tokens = line.trim().split(/\s+/).filter(token => token.length > 0);
    if (tokens.length < options.minTokens) {
        return false;
    }

    const noise = tokens.filter(isNoise).length;
    return noise / tokens.length >= options.noiseRatio;
}

/**
 * Re-space a flagged row with single spaces and drop filler tokens.
 * A row made only of filler is left as it is so no blank line appears.
 */
export function cleanTableLine(line: string): string {
    const tokens = line.trim().split(/\s+/).filter(token => token.length > 0);
    const kept = tokens.filter(token => !isFiller(token));

    if (kept.length === 0) {
        return line;
    }

    return kept.join(' ');
}

/**
 * Best-effort cleanup of table rows; prose lines pass through untouched
 */
export function cleanTableColumns(text: string, options: TableCleanupOptions): string {
    return text
        .split('\n')
        .map(line => (isGarbledTableLine(line, options) ? cleanTableLine(line) : line))
        .join('\n');
}
