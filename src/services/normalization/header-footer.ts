import { NORMALIZATION_PATTERNS } from '../../config/constants.js';

/**
 * Matches a page-break marker line together with its surrounding newlines
 */
export const PAGE_BREAK_PATTERN = /\n?\f\n?/g;

/**
 * Split marker-joined text back into pages
 */
export function splitPages(text: string): string[] {
    return text.split(PAGE_BREAK_PATTERN);
}

/**
 * Join page texts with the page-break marker line.
 * Stray form feeds inside a page are turned into newlines first.
 */
export function joinPages(pages: readonly string[]): string {
    return pages
        .map(page => page.replace(/\f/g, '\n'))
        .join(NORMALIZATION_PATTERNS.PAGE_JOINER);
}

/**
 * Find lines that recur on more than `threshold` of the content pages.
 *
 * Lines are compared after trimming; each page counts a line once.
 * Pages with no visible text are left out of the denominator, and
 * documents with fewer than `minPages` content pages yield nothing.
 */
export function detectRepeatedLines(
    pages: readonly string[],
    threshold: number,
    minPages: number
): Set<string> {
    const contentPages = pages.filter(page => page.trim().length > 0);
    const repeated = new Set<string>();

    if (contentPages.length < minPages) {
        return repeated;
    }

    const counts = new Map<string, number>();
    for (const page of contentPages) {
        const distinct = new Set(
            page.split('\n').map(line => line.trim()).filter(line => line.length > 0)
        );
        for (const line of distinct) {
            counts.set(line, (counts.get(line) ?? 0) + 1);
        }
    }

    for (const [line, count] of counts) {
        if (count / contentPages.length > threshold) {
            repeated.add(line);
        }
    }

    return repeated;
}

/**
 * Drop boilerplate lines from every page, keeping the page-break markers
 */
export function removeRepeatedLines(text: string, threshold: number, minPages: number): string {
    const pages = splitPages(text);
    const repeated = detectRepeatedLines(pages, threshold, minPages);

    if (repeated.size === 0) {
        return text;
    }

    const cleaned = pages.map(page =>
        page
            .split('\n')
            .filter(line => !repeated.has(line.trim()))
            .join('\n')
    );

    return cleaned.join(NORMALIZATION_PATTERNS.PAGE_JOINER);
}
