export { createLogger, generateCorrelationId } from './logger.js';
export type { Logger, LogMeta } from './logger.js';

export { hashBuffer } from './hash.js';

export { withTimeout, TimeoutError } from './timeout.js';

export { IngestEventEmitter, createEventEmitter } from './events.js';
export type { IngestEvents } from './events.js';
