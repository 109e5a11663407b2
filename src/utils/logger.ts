import type { LogConfig } from '../types/config.types.js';
import { getCorrelationId } from '../errors/index.js';
import pino from 'pino';

export interface LogMeta {
    correlationId?: string;
    sourcePath?: string;
    stage?: string;
    [key: string]: unknown;
}

export interface Logger {
    debug(message: string, meta?: LogMeta): void;
    info(message: string, meta?: LogMeta): void;
    warn(message: string, meta?: LogMeta): void;
    error(message: string, meta?: LogMeta): void;
}

type LogLevel = keyof Logger;

/**
 * Creates a Pino logger instance
 * Automatically injects the run correlation ID into all log entries
 *
 * - Structured JSON logging by default
 * - Pretty print when `structured` is false
 * - Optional custom sink via `customLogger`
 */
export function createLogger(config: LogConfig): Logger {
    const pinoLogger = pino({
        level: config.level,
        ...(config.structured === false && {
            transport: {
                target: 'pino-pretty',
                options: {
                    colorize: true,
                    translateTime: 'SYS:standard',
                    ignore: 'pid,hostname',
                },
            },
        }),
    });

    const enrichMeta = (meta?: LogMeta): LogMeta => ({
        correlationId: meta?.correlationId ?? getCorrelationId(),
        ...meta,
    });

    const log = (level: LogLevel, message: string, meta?: LogMeta): void => {
        const enrichedMeta = enrichMeta(meta);

        if (config.customLogger) {
            config.customLogger(level, message, enrichedMeta);
            return;
        }

        pinoLogger[level](enrichedMeta, message);
    };

    return {
        debug: (message: string, meta?: LogMeta) => log('debug', message, meta),
        info: (message: string, meta?: LogMeta) => log('info', message, meta),
        warn: (message: string, meta?: LogMeta) => log('warn', message, meta),
        error: (message: string, meta?: LogMeta) => log('error', message, meta),
    };
}

export { generateCorrelationId } from '../errors/index.js';
