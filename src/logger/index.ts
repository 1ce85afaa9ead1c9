/**
 * fieldline logger - structured, leveled logging with immutable scoped loggers
 *
 * @example
 * ```typescript
 * import { getLogger, field, setLevel } from 'fieldline/logger';
 *
 * setLevel('debug');
 *
 * const log = getLogger('app').withName('db').withField('retry', 3);
 * log.error('conn failed', field('host', 'db-1'));
 * log.debugf('pool at %d%%', 80);
 * ```
 */

// Core logger functionality
export * from './types.js';
export * from './errors.js';
export * from './logger-config.js';
export * from './field.js';
export * from './persistent-list.js';
export * from './printf.js';
export * from './logger-registry.js';
export * from './logger-impl.js';

/** Current version of the logger package */
export const LOGGER_VERSION = '0.1.0';
