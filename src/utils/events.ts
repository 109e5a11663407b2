import { EventEmitter } from 'events';
import type { DocumentResult, FailedDocument, IngestionRun } from '../types/ingestion.types.js';

/**
 * Event types emitted during ingestion
 */
export interface IngestEvents {
    'ingest:start': { runId: string; inputDir: string; documentCount: number };
    'ingest:document': DocumentResult;
    'ingest:error': FailedDocument;
    'ingest:complete': IngestionRun;
}

/**
 * Type-safe event emitter for ingestion runs
 */
export class IngestEventEmitter extends EventEmitter {
    override emit<K extends keyof IngestEvents>(
        event: K,
        data: IngestEvents[K]
    ): boolean {
        return super.emit(event, data);
    }

    override on<K extends keyof IngestEvents>(
        event: K,
        listener: (data: IngestEvents[K]) => void
    ): this {
        return super.on(event, listener);
    }

    override once<K extends keyof IngestEvents>(
        event: K,
        listener: (data: IngestEvents[K]) => void
    ): this {
        return super.once(event, listener);
    }

    override off<K extends keyof IngestEvents>(
        event: K,
        listener: (data: IngestEvents[K]) => void
    ): this {
        return super.off(event, listener);
    }
}

/**
 * Create a new event emitter instance
 */
export function createEventEmitter(): IngestEventEmitter {
    return new IngestEventEmitter();
}
