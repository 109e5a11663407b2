import fg from 'fast-glob';
import type { Stats } from 'fs';
import * as fs from 'fs/promises';
import * as path from 'path';
import { ConfigurationError } from '../errors/index.js';

/**
 * Make sure the input root exists and is a directory
 * @throws ConfigurationError otherwise
 */
export async function assertInputDir(inputDir: string): Promise<void> {
    let stats: Stats;
    try {
        stats = await fs.stat(inputDir);
    } catch {
        throw new ConfigurationError(`Input directory not found: ${inputDir}`, { inputDir });
    }

    if (!stats.isDirectory()) {
        throw new ConfigurationError(`Input path is not a directory: ${inputDir}`, { inputDir });
    }
}

/**
 * Recursively list PDF files under a root, sorted for a stable processing order
 */
export async function discoverDocuments(inputDir: string): Promise<string[]> {
    const root = path.resolve(inputDir);

    const entries = await fg('**/*.pdf', {
        cwd: root,
        absolute: true,
        onlyFiles: true,
        caseSensitiveMatch: false,
        followSymbolicLinks: false,
        dot: false,
    });

    return entries.map(entry => path.normalize(entry)).sort();
}
