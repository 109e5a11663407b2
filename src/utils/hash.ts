import { createHash } from 'crypto';

/**
 * Hex SHA-256 of the source bytes, recorded as `sourceHash` on every chunk file
 */
export function hashBuffer(buffer: Buffer): string {
    return createHash('sha256').update(buffer).digest('hex');
}
