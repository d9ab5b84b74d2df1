/**
 * Shared Utilities
 */

export { logger, Logger, LogLevel } from './logger';
export type { LogMeta } from './logger';
export { generateId } from './uuid';
export { errorMessage } from './errors';
