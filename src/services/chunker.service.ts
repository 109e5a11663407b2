import { ConfigurationError } from '../errors/index.js';
import { chunkConfigSchema, type ChunkConfig } from '../types/config.types.js';
import type { TextSpan } from '../types/chunk.types.js';
import { BoundaryKindEnum, type BoundaryKindEnumType } from '../types/enums.js';

const SENTENCE_TERMINATOR = /[.!?]/;
const WHITESPACE = /\s/;

function isHighSurrogate(code: number): boolean {
    return code >= 0xd800 && code <= 0xdbff;
}

function isLowSurrogate(code: number): boolean {
    return code >= 0xdc00 && code <= 0xdfff;
}

interface Boundary {
    end: number;
    kind: BoundaryKindEnumType;
}

/**
 * Sliding-window chunker with boundary snapping.
 *
 * Each window spans `chunkSize` characters. Its end is pulled back to the
 * nearest paragraph break, sentence end or line break found in the last
 * `boundarySearchRatio` of the window, and the next window starts
 * `chunkOverlap` characters before that end.
 *
 * @example
 * ```typescript
 * const chunker = new Chunker({ chunkSize: 1000, chunkOverlap: 200, boundarySearchRatio: 0.2 });
 * const spans = chunker.chunk(normalizedText);
 * ```
 */
export class Chunker {
    private readonly config: ChunkConfig;

    /**
     * @throws ConfigurationError when the size/overlap relationship is invalid
     */
    constructor(config: ChunkConfig) {
        const validation = chunkConfigSchema.safeParse(config);
        if (!validation.success) {
            throw new ConfigurationError('Invalid chunk configuration', {
                errors: validation.error.issues.map(issue => ({
                    path: issue.path.join('.'),
                    message: issue.message,
                })),
            });
        }
        this.config = validation.data;
    }

    get chunkSize(): number {
        return this.config.chunkSize;
    }

    get chunkOverlap(): number {
        return this.config.chunkOverlap;
    }

    /**
     * Split text into ordered, overlapping spans covering it end to end
     */
    chunk(text: string): TextSpan[] {
        const { chunkSize, chunkOverlap } = this.config;
        const length = text.length;
        const spans: TextSpan[] = [];

        let start = 0;
        while (start < length) {
            const naiveEnd = Math.min(start + chunkSize, length);
            let end = naiveEnd;
            let kind: BoundaryKindEnumType = BoundaryKindEnum.NONE;

            if (naiveEnd < length) {
                const boundary = this.findBoundary(text, start, naiveEnd);
                // The next start must move forward, otherwise keep the naive cut
                if (boundary && boundary.end - chunkOverlap > start) {
                    end = boundary.end;
                    kind = boundary.kind;
                } else if (isHighSurrogate(text.charCodeAt(end - 1)) && end - 1 - chunkOverlap > start) {
                    // Never cut between the halves of a surrogate pair
                    end -= 1;
                }
            }

            spans.push({
                index: spans.length,
                start,
                end,
                text: text.slice(start, end),
                boundary: kind,
            });

            if (end >= length) {
                break;
            }

            start = end - chunkOverlap;
            if (start < end && isLowSurrogate(text.charCodeAt(start))) {
                start += 1;
            }
        }

        return spans;
    }

    /**
     * Search backward from the naive end, never before the window start
     */
    private findBoundary(text: string, start: number, naiveEnd: number): Boundary | undefined {
        const span = naiveEnd - start;
        const searchStart = Math.max(start, naiveEnd - Math.floor(span * this.config.boundarySearchRatio));

        const paragraph = text.lastIndexOf('\n\n', naiveEnd - 2);
        if (paragraph !== -1 && paragraph >= searchStart) {
            return { end: paragraph + 2, kind: BoundaryKindEnum.PARAGRAPH };
        }

        for (let i = naiveEnd - 2; i >= searchStart; i--) {
            if (SENTENCE_TERMINATOR.test(text.charAt(i)) && WHITESPACE.test(text.charAt(i + 1))) {
                return { end: i + 2, kind: BoundaryKindEnum.SENTENCE };
            }
        }

        const line = text.lastIndexOf('\n', naiveEnd - 1);
        if (line !== -1 && line >= searchStart) {
            return { end: line + 1, kind: BoundaryKindEnum.LINE };
        }

        return undefined;
    }
}
