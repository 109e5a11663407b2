/**
 * Error context for correlation and tracing
 */
export interface ErrorContext {
    /** Correlation ID of the ingestion run */
    correlationId?: string;
    /** Timestamp when error occurred */
    timestamp?: Date;
    /** Original cause of the error */
    cause?: Error;
    /** Operation that was being performed */
    operation?: string;
}

/**
 * Generate a unique correlation ID
 */
export function generateCorrelationId(): string {
    return `ingest_${Date.now()}_${Math.random().toString(36).substring(2, 11)}`;
}

/**
 * Current run correlation ID, set by the engine at the start of a run
 */
let currentCorrelationId: string | undefined;

export function setCorrelationId(id: string): void {
    currentCorrelationId = id;
}

export function getCorrelationId(): string {
    return currentCorrelationId ?? generateCorrelationId();
}

export function clearCorrelationId(): void {
    currentCorrelationId = undefined;
}

/**
 * Base error class for the ingestion pipeline
 * All errors extend this class for consistent handling
 */
export class ReportIngestError extends Error {
    public readonly code: string;
    public readonly details?: Record<string, unknown>;
    public readonly correlationId: string;
    public readonly timestamp: Date;
    public override readonly cause?: Error;
    public readonly operation?: string;

    constructor(
        message: string,
        code: string,
        details?: Record<string, unknown>,
        context?: ErrorContext
    ) {
        super(message);
        this.name = 'ReportIngestError';
        this.code = code;
        this.details = details;
        this.correlationId = context?.correlationId ?? getCorrelationId();
        this.timestamp = context?.timestamp ?? new Date();
        this.cause = context?.cause;
        this.operation = context?.operation;
        Error.captureStackTrace(this, this.constructor);
    }

    toJSON(): Record<string, unknown> {
        return {
            name: this.name,
            code: this.code,
            message: this.message,
            details: this.details,
            correlationId: this.correlationId,
            timestamp: this.timestamp.toISOString(),
            operation: this.operation,
            cause: this.cause ? {
                name: this.cause.name,
                message: this.cause.message,
            } : undefined,
        };
    }
}

/**
 * Message of an unknown thrown value
 */
export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

/**
 * Wrap an unknown error into a ReportIngestError
 */
export function wrapError(
    error: unknown,
    ErrorClass: new (message: string) => ReportIngestError,
    operation?: string
): ReportIngestError {
    if (error instanceof ReportIngestError) {
        return error;
    }

    const originalError = error instanceof Error ? error : new Error(String(error));
    const wrapped = new ErrorClass(originalError.message);

    // Copy over correlation context
    Object.defineProperty(wrapped, 'cause', { value: originalError });
    Object.defineProperty(wrapped, 'operation', { value: operation });

    return wrapped;
}

/**
 * Configuration-related errors.
 * Fatal: raised before any document is processed.
 */
export class ConfigurationError extends ReportIngestError {
    constructor(message: string, details?: Record<string, unknown>) {
        super(message, 'CONFIGURATION_ERROR', details);
        this.name = 'ConfigurationError';
    }
}

/**
 * Source document could not be read, is encrypted, or is not a valid PDF
 */
export class ExtractionError extends ReportIngestError {
    public readonly filePath?: string;

    constructor(message: string, filePath?: string, details?: Record<string, unknown>) {
        super(message, 'EXTRACTION_ERROR', { filePath, ...details });
        this.name = 'ExtractionError';
        this.filePath = filePath;
    }
}

/**
 * A normalization stage threw on its input. The stage is skipped.
 */
export class NormalizationStageError extends ReportIngestError {
    public readonly stage: string;

    constructor(message: string, stage: string, details?: Record<string, unknown>) {
        super(message, 'NORMALIZATION_STAGE_ERROR', { stage, ...details });
        this.name = 'NormalizationStageError';
        this.stage = stage;
    }
}

/**
 * Per-document failure outside extraction (persisting outputs, unexpected throws)
 */
export class IngestionError extends ReportIngestError {
    public readonly sourcePath?: string;

    constructor(
        message: string,
        options: {
            sourcePath?: string;
            details?: Record<string, unknown>;
        } = {}
    ) {
        super(message, 'INGESTION_ERROR', { sourcePath: options.sourcePath, ...options.details });
        this.name = 'IngestionError';
        this.sourcePath = options.sourcePath;
    }
}

/**
 * Processing warning (non-fatal issue recorded against a document)
 */
export interface ProcessingWarning {
    /** Warning type */
    type: 'STAGE_FAILED' | 'METADATA_UNRESOLVED' | 'EMPTY_PAGES';
    /** Warning message */
    message: string;
    /** Additional details */
    details?: Record<string, unknown>;
}

/**
 * Source path did not follow region/category/company/file convention.
 * Not an error: unresolved fields are set to "unknown".
 */
export interface MetadataUnresolvedWarning extends ProcessingWarning {
    type: 'METADATA_UNRESOLVED';
    details: {
        sourcePath: string;
        unresolvedFields: string[];
    };
}
