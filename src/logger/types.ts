/**
 * Core Logger Types and Interface Definitions
 *
 * Foundational type definitions for fieldline: levels, the closed field
 * value domain, log records as seen by themes, and the contracts for
 * themes, sinks and loggers.
 *
 * @example
 * ```typescript
 * import type { Theme, Sink, LogRecord } from 'fieldline';
 *
 * // Custom sink collecting lines for a test
 * const lines: string[] = [];
 * const sink: Sink = {
 *   name: 'collector',
 *   write: (line: string) => { lines.push(line); }
 * };
 *
 * // Custom theme rendering a minimal layout
 * const bare: Theme = {
 *   name: 'bare',
 *   render: (record: LogRecord) => `${record.level} ${record.message}`
 * };
 * ```
 */

/**
 * Log levels supported by the logger, from least to most severe:
 * annoying, pedantic, debug, trace, verbose, info, warn, error, critical
 */
export type LogLevel =
  | 'annoying'
  | 'pedantic'
  | 'debug'
  | 'trace'
  | 'verbose'
  | 'info'
  | 'warn'
  | 'error'
  | 'critical';

/**
 * Names of the built-in themes
 */
export type ThemeName = 'colorized' | 'plain' | 'json';

/**
 * Values a caller may pass when building a field
 */
export type FieldPrimitive = string | number | bigint | boolean | null;

/**
 * Tagged field value. The domain is closed: renderers switch on `kind`
 * exhaustively.
 */
export type FieldValue =
  | { readonly kind: 'string'; readonly value: string }
  | { readonly kind: 'integer'; readonly value: number | bigint }
  | { readonly kind: 'float'; readonly value: number }
  | { readonly kind: 'boolean'; readonly value: boolean }
  | { readonly kind: 'null'; readonly value: null };

export type FieldKind = FieldValue['kind'];

/**
 * Immutable structured key-value attribute
 */
export interface Field {
  readonly key: string;
  readonly value: FieldValue;
}

/**
 * Everything a theme needs to render one line
 */
export interface LogRecord {
  /** Log level */
  readonly level: LogLevel;

  /** Logger name path joined with '.' */
  readonly name: string;

  /** Log message */
  readonly message: string;

  /**
   * Effective fields in accumulation order: logger fields, then call-site
   * fields. Duplicate keys are still present; themes resolve shadowing.
   */
  readonly fields: readonly Field[];

  /** Epoch milliseconds when the record was emitted */
  readonly timestamp: number;
}

/**
 * Per-render options supplied by the registry
 */
export interface RenderOptions {
  /** Whether the destination accepts ANSI escape sequences */
  readonly color: boolean;
}

/**
 * Rendering strategy turning a record into a single line (no terminator)
 */
export interface Theme {
  /** Theme name for identification */
  readonly name: string;

  /** Render one record */
  render(record: LogRecord, options?: RenderOptions): string;
}

/**
 * Append-only destination for rendered lines
 */
export interface Sink {
  /** Sink name for identification and error reports */
  readonly name: string;

  /** Append one line; the argument already ends with the line terminator */
  write(line: string): void;

  /** Flush any buffered output */
  flush?(): void;

  /** Release resources held by the sink */
  close?(): void;
}

/**
 * Zero-argument capability query: does the output accept ANSI color?
 */
export type ColorProbe = () => boolean;

/**
 * Clock returning epoch milliseconds
 */
export type Clock = () => number;

/**
 * What printf-style methods do when arguments do not match the format:
 * `throw` raises FormatMismatchError, `inline` logs the raw format followed
 * by a `[format error: ...]` marker
 */
export type FormatErrorMode = 'throw' | 'inline';

/**
 * Options fixed when a root logger is created and inherited by derived loggers
 */
export interface LoggerOptions {
  /** Printf mismatch handling (default: 'throw') */
  formatErrors?: FormatErrorMode;

  /** Sink used instead of the registry sink */
  sink?: Sink;
}

/**
 * Logger interface - main logging API
 */
export interface Logger {
  /** Name path joined with '.' */
  readonly name: string;

  /** Name segments, outermost first */
  readonly namePath: readonly string[];

  /** Accumulated fields in the order they were added */
  readonly fields: readonly Field[];

  /** Create a logger with an extra name segment */
  withName(name: string): Logger;

  /** Create a logger with an extra field */
  withField(key: string, value: FieldPrimitive): Logger;

  /** Create a logger with several extra fields, in order */
  withFields(...fields: readonly Field[]): Logger;

  /** Same name path and fields */
  equals(other: Logger): boolean;

  /** Whether a record at `level` would currently be written */
  isEnabled(level: LogLevel): boolean;

  log(level: LogLevel, message: string, ...fields: readonly Field[]): void;
  logf(level: LogLevel, format: string, ...args: readonly unknown[]): void;

  critical(message: string, ...fields: readonly Field[]): void;
  error(message: string, ...fields: readonly Field[]): void;
  warn(message: string, ...fields: readonly Field[]): void;
  info(message: string, ...fields: readonly Field[]): void;
  verbose(message: string, ...fields: readonly Field[]): void;
  trace(message: string, ...fields: readonly Field[]): void;
  debug(message: string, ...fields: readonly Field[]): void;
  pedantic(message: string, ...fields: readonly Field[]): void;
  annoying(message: string, ...fields: readonly Field[]): void;

  crt(message: string, ...fields: readonly Field[]): void;
  err(message: string, ...fields: readonly Field[]): void;
  wrn(message: string, ...fields: readonly Field[]): void;
  inf(message: string, ...fields: readonly Field[]): void;
  vrb(message: string, ...fields: readonly Field[]): void;
  trc(message: string, ...fields: readonly Field[]): void;
  dbg(message: string, ...fields: readonly Field[]): void;
  ped(message: string, ...fields: readonly Field[]): void;
  ayg(message: string, ...fields: readonly Field[]): void;

  criticalf(format: string, ...args: readonly unknown[]): void;
  errorf(format: string, ...args: readonly unknown[]): void;
  warnf(format: string, ...args: readonly unknown[]): void;
  infof(format: string, ...args: readonly unknown[]): void;
  verbosef(format: string, ...args: readonly unknown[]): void;
  tracef(format: string, ...args: readonly unknown[]): void;
  debugf(format: string, ...args: readonly unknown[]): void;
  pedanticf(format: string, ...args: readonly unknown[]): void;
  annoyingf(format: string, ...args: readonly unknown[]): void;

  crtf(format: string, ...args: readonly unknown[]): void;
  errf(format: string, ...args: readonly unknown[]): void;
  wrnf(format: string, ...args: readonly unknown[]): void;
  inff(format: string, ...args: readonly unknown[]): void;
  vrbf(format: string, ...args: readonly unknown[]): void;
  trcf(format: string, ...args: readonly unknown[]): void;
  dbgf(format: string, ...args: readonly unknown[]): void;
  pedf(format: string, ...args: readonly unknown[]): void;
  aygf(format: string, ...args: readonly unknown[]): void;
}
