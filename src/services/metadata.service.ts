/**
 * Metadata Attacher
 *
 * Derives document identity from the source path and stamps it on every
 * chunk. Everything here is a pure function of its arguments.
 *
 * Expected layout below the input root:
 *   <region>/<reportType>/<company>/<company>_<year>_<anything>.pdf
 */

import * as path from 'path';
import { OUTPUT_LAYOUT } from '../config/constants.js';
import type { MetadataUnresolvedWarning } from '../errors/index.js';
import type { Chunk, ChunkStats, DocumentIdentity, TextSpan } from '../types/chunk.types.js';

const YEAR_TOKEN = /^\d{4}$/;
const STEM_SEPARATORS = /[_\-\s.]+/;

export interface ResolvedIdentity {
    identity: DocumentIdentity;
    warning?: MetadataUnresolvedWarning;
}

/**
 * First 4-digit token of the file stem, e.g. acme_2024_annual → 2024
 */
export function extractYear(fileName: string): string | undefined {
    const stem = path.parse(fileName).name;
    return stem.split(STEM_SEPARATORS).find(token => YEAR_TOKEN.test(token));
}

/**
 * Directories between the input root and the source file.
 * Sources outside the root have none.
 */
function relativeDirectories(sourcePath: string, inputDir: string): string[] {
    const relative = path.relative(path.resolve(inputDir), path.resolve(sourcePath));
    if (relative.length === 0 || relative.startsWith('..') || path.isAbsolute(relative)) {
        return [];
    }
    return relative.split(/[\\/]+/).filter(segment => segment.length > 0).slice(0, -1);
}

/**
 * Derive company, region, report type and year from the source path.
 * Fields that cannot be derived are set to "unknown" and reported in a warning.
 */
export function resolveIdentity(sourcePath: string, inputDir: string): ResolvedIdentity {
    const sourceFile = path.basename(sourcePath);
    const unknown = OUTPUT_LAYOUT.UNKNOWN;

    // Deeper trees keep the first three levels; anything below is free-form
    const directories = relativeDirectories(sourcePath, inputDir);
    const [region, reportType, company] = directories.length >= 3 ? directories : [];

    const identity: DocumentIdentity = {
        sourcePath: path.resolve(sourcePath),
        sourceFile,
        region: region ?? unknown,
        reportType: reportType ?? unknown,
        company: company ?? unknown,
        year: extractYear(sourceFile) ?? unknown,
    };

    const unresolvedFields = (['region', 'reportType', 'company', 'year'] as const)
        .filter(field => identity[field] === unknown);

    if (unresolvedFields.length === 0) {
        return { identity };
    }

    return {
        identity,
        warning: {
            type: 'METADATA_UNRESOLVED',
            message: `Could not derive ${unresolvedFields.join(', ')} from path`,
            details: {
                sourcePath: identity.sourcePath,
                unresolvedFields: [...unresolvedFields],
            },
        },
    };
}

/**
 * Stable chunk identifier, e.g. acme_2024_chunk0007
 */
export function buildChunkId(identity: Pick<DocumentIdentity, 'company' | 'year'>, index: number): string {
    return `${identity.company}_${identity.year}_chunk${String(index).padStart(4, '0')}`;
}

/**
 * Attach identity fields and per-chunk statistics to chunker spans
 */
export function attachMetadata(spans: readonly TextSpan[], identity: DocumentIdentity): Chunk[] {
    return spans.map(span => ({
        chunkId: buildChunkId(identity, span.index),
        chunkIndex: span.index,
        startOffset: span.start,
        endOffset: span.end,
        text: span.text,
        charCount: span.text.length,
        company: identity.company,
        region: identity.region,
        reportType: identity.reportType,
        year: identity.year,
    }));
}

/**
 * Total and mean chunk length; the mean is rounded to a whole character
 */
export function summarizeChunks(chunks: readonly Chunk[]): ChunkStats {
    const totalChars = chunks.reduce((sum, chunk) => sum + chunk.charCount, 0);
    return {
        totalChars,
        avgChunkSize: chunks.length > 0 ? Math.round(totalChars / chunks.length) : 0,
    };
}
