import { describe, it, expect, vi } from 'vitest';
import { hashBuffer } from '../src/utils/hash.js';
import { createLogger, generateCorrelationId } from '../src/utils/logger.js';
import { createEventEmitter } from '../src/utils/events.js';
import { TimeoutError, withTimeout } from '../src/utils/timeout.js';
import { setCorrelationId } from '../src/errors/index.js';
import type { FailedDocument } from '../src/types/ingestion.types.js';
import { createDeferred } from './setup.js';

describe('Utilities', () => {
    describe('Hash utilities', () => {
        it('should hash buffer consistently', () => {
            const buffer = Buffer.from('test content');
            const hash1 = hashBuffer(buffer);
            const hash2 = hashBuffer(buffer);
            expect(hash1).toBe(hash2);
            expect(hash1).toMatch(/^[0-9a-f]{64}$/);
        });

        it('should produce different hashes for different content', () => {
            const hash1 = hashBuffer(Buffer.from('content 1'));
            const hash2 = hashBuffer(Buffer.from('content 2'));
            expect(hash1).not.toBe(hash2);
        });
    });

    describe('Timeouts', () => {
        it('should resolve with the value when the promise settles in time', async () => {
            await expect(withTimeout(Promise.resolve('done'), 1000)).resolves.toBe('done');
        });

        it('should reject with TimeoutError when the promise is too slow', async () => {
            const { promise } = createDeferred<string>();

            const error = await withTimeout(promise, 20, 'Extraction of slow.pdf').catch((e: unknown) => e);

            expect(error).toBeInstanceOf(TimeoutError);
            expect(error).toMatchObject({
                message: 'Extraction of slow.pdf timed out after 20ms',
                timeoutMs: 20,
            });
        });

        it('should pass through rejections of the wrapped promise', async () => {
            await expect(withTimeout(Promise.reject(new Error('boom')), 1000)).rejects.toThrow('boom');
        });

        it('should clear its timer once the promise settles', async () => {
            const clearSpy = vi.spyOn(globalThis, 'clearTimeout');

            await withTimeout(Promise.resolve('done'), 1000);

            expect(clearSpy).toHaveBeenCalled();
            clearSpy.mockRestore();
        });
    });

    describe('Logger', () => {
        it('should create logger with config', () => {
            const logger = createLogger({ level: 'info', structured: true });
            expect(logger).toBeDefined();
            expect(logger.info).toBeDefined();
            expect(logger.warn).toBeDefined();
            expect(logger.error).toBeDefined();
            expect(logger.debug).toBeDefined();
        });

        it('should route entries to a custom logger with the run correlation ID', () => {
            const sink = vi.fn();
            const logger = createLogger({ level: 'info', structured: true, customLogger: sink });
            setCorrelationId('ingest_test_run');

            logger.warn('Document failed', { sourcePath: 'acme_2024.pdf' });

            expect(sink).toHaveBeenCalledWith('warn', 'Document failed', {
                correlationId: 'ingest_test_run',
                sourcePath: 'acme_2024.pdf',
            });
        });

        it('should generate correlation IDs', () => {
            const id1 = generateCorrelationId();
            const id2 = generateCorrelationId();
            expect(id1).toMatch(/^ingest_\d+_[a-z0-9]+$/);
            expect(id1).not.toBe(id2);
        });
    });

    describe('EventEmitter', () => {
        const failure: FailedDocument = {
            sourcePath: '/data/broken.pdf',
            relativePath: 'broken.pdf',
            status: 'FAILED',
            code: 'EXTRACTION_ERROR',
            reason: 'Not a valid PDF',
        };

        it('should emit and receive events', () => {
            const emitter = createEventEmitter();
            const handler = vi.fn();

            emitter.on('ingest:start', handler);
            emitter.emit('ingest:start', { runId: 'ingest_1', inputDir: 'data', documentCount: 3 });

            expect(handler).toHaveBeenCalledWith({ runId: 'ingest_1', inputDir: 'data', documentCount: 3 });
        });

        it('should support once listener', () => {
            const emitter = createEventEmitter();
            const handler = vi.fn();

            emitter.once('ingest:error', handler);
            emitter.emit('ingest:error', failure);
            emitter.emit('ingest:error', failure);

            expect(handler).toHaveBeenCalledTimes(1);
        });

        it('should remove listeners with off', () => {
            const emitter = createEventEmitter();
            const handler = vi.fn();

            emitter.on('ingest:error', handler);
            emitter.off('ingest:error', handler);
            emitter.emit('ingest:error', failure);

            expect(handler).not.toHaveBeenCalled();
        });
    });
});
