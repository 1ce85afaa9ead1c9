/**
 * fieldline - structured terminal logging
 *
 * Leveled logging library producing aligned, colorized lines with structured
 * key-value fields. Loggers are immutable values: naming a sub-scope or
 * attaching a field returns a new logger and leaves the original untouched,
 * so loggers can be shared freely.
 *
 * ## Core Features
 *
 * - **Scoped loggers**: `withName` builds dotted name paths, `withField`
 *   accumulates context fields
 * - **Structured fields**: a closed value domain (string, integer, float,
 *   boolean, null) rendered as `key=value`, with later keys shadowing earlier ones
 * - **Process-wide registry**: minimum level, theme, color mode and sink are
 *   read on every call, so reconfiguration takes effect immediately
 * - **Themes**: colorized and plain aligned text, JSON lines, custom layouts
 * - **Sinks**: standard error, any stream, files, memory, fan-out
 * - **printf-style methods** that never format a filtered-out record
 *
 * ## Quick Start
 *
 * @example
 * ```typescript
 * import { getLogger, field, setLevel, setTheme, themes } from 'fieldline';
 *
 * setLevel('debug');
 *
 * const log = getLogger('app');
 * log.info('server started', field('port', 8080));
 *
 * const db = log.withName('db').withField('host', 'db-1');
 * db.warn('slow query', field('ms', 812.5));
 * db.errf('connection lost after %d attempts', 3);
 *
 * // Plain output, e.g. for CI logs
 * setTheme(themes.PLAIN);
 * ```
 *
 * ## Subpath Exports
 *
 * @example
 * ```typescript
 * import { getLogger } from 'fieldline/logger';
 * import { createTextTheme } from 'fieldline/themes';
 * import { FileSink } from 'fieldline/sinks';
 * ```
 */

export * from './logger/index.js';
export * from './themes/index.js';
export * from './sinks/index.js';
