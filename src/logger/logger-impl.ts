/** Core Logger Implementation - immutable scoped loggers over the process registry */

import type {
  Field,
  FieldPrimitive,
  FormatErrorMode,
  Logger,
  LoggerOptions,
  LogLevel,
  LogRecord,
  Sink
} from './types.js';
import { PersistentList } from './persistent-list.js';
import { field, fieldsEqual } from './field.js';
import { shouldLog } from './logger-config.js';
import { getRegistry, type LoggerRegistry } from './logger-registry.js';
import { FormatMismatchError } from './errors.js';
import { formatErrorMarker, sprintf } from './printf.js';
import { LINE_TERMINATOR } from '../sinks/sink-interface.js';

interface ResolvedLoggerOptions {
  readonly formatErrors: FormatErrorMode;
  readonly sink: Sink | undefined;
}

/** Immutable logger: every derivation returns a new instance sharing structure with this one */
export class LoggerImpl implements Logger {
  private constructor(
    private readonly path: PersistentList<string>,
    private readonly accumulated: PersistentList<Field>,
    private readonly options: ResolvedLoggerOptions
  ) {
    Object.freeze(this);
  }

  /** Creates a root logger named `name` with no fields */
  static create(name: string, options: LoggerOptions = {}): LoggerImpl {
    if (typeof name !== 'string') throw new TypeError('Logger name must be a string');
    if (options.formatErrors !== undefined && options.formatErrors !== 'throw' && options.formatErrors !== 'inline') {
      throw new TypeError(`Invalid formatErrors mode: ${String(options.formatErrors)}`);
    }
    return new LoggerImpl(PersistentList.of(name), PersistentList.empty(), {
      formatErrors: options.formatErrors ?? 'throw',
      sink: options.sink
    });
  }

  /** Name path joined with '.', skipping empty segments */
  get name(): string {
    return this.path.toArray().filter(segment => segment !== '').join('.');
  }

  get namePath(): readonly string[] {
    return this.path.toArray();
  }

  get fields(): readonly Field[] {
    return this.accumulated.toArray();
  }

  /** How printf mismatches are handled by this logger */
  get formatErrors(): FormatErrorMode {
    return this.options.formatErrors;
  }

  /** Creates a logger with `name` appended to the name path */
  withName(name: string): Logger {
    if (typeof name !== 'string') throw new TypeError('Logger name must be a string');
    return new LoggerImpl(this.path.append(name), this.accumulated, this.options);
  }

  /** Creates a logger with one more field */
  withField(key: string, value: FieldPrimitive): Logger {
    return new LoggerImpl(this.path, this.accumulated.append(field(key, value)), this.options);
  }

  /** Creates a logger with `fields` appended in order */
  withFields(...fields: readonly Field[]): Logger {
    if (fields.length === 0) return this;
    return new LoggerImpl(this.path, this.accumulated.appendAll(fields), this.options);
  }

  equals(other: Logger): boolean {
    const ownPath = this.namePath;
    const otherPath = other.namePath;
    const ownFields = this.fields;
    const otherFields = other.fields;
    return ownPath.length === otherPath.length
      && ownPath.every((segment, index) => segment === otherPath[index])
      && ownFields.length === otherFields.length
      && ownFields.every((entry, index) => {
        const counterpart = otherFields[index];
        return counterpart !== undefined && fieldsEqual(entry, counterpart);
      });
  }

  isEnabled(level: LogLevel): boolean {
    return shouldLog(level, getRegistry().level);
  }

  /** Logs `message` at `level` with call-site fields after the accumulated ones */
  log(level: LogLevel, message: string, ...fields: readonly Field[]): void {
    if (typeof message !== 'string') throw new TypeError('Message must be a string');
    const registry = getRegistry();
    if (!shouldLog(level, registry.level)) return;

    this.emit(registry, level, message, fields);
  }

  /** Formats and logs at `level`; nothing is formatted when `level` is filtered out */
  logf(level: LogLevel, format: string, ...args: readonly unknown[]): void {
    if (typeof format !== 'string') throw new TypeError('Format must be a string');
    const registry = getRegistry();
    if (!shouldLog(level, registry.level)) return;

    let message: string;
    try {
      message = sprintf(format, ...args);
    } catch (error) {
      if (!(error instanceof FormatMismatchError) || this.options.formatErrors === 'throw') throw error;
      message = formatErrorMarker(format, error);
    }
    this.emit(registry, level, message, []);
  }

  critical(message: string, ...fields: readonly Field[]): void { this.log('critical', message, ...fields); }
  error(message: string, ...fields: readonly Field[]): void { this.log('error', message, ...fields); }
  warn(message: string, ...fields: readonly Field[]): void { this.log('warn', message, ...fields); }
  info(message: string, ...fields: readonly Field[]): void { this.log('info', message, ...fields); }
  verbose(message: string, ...fields: readonly Field[]): void { this.log('verbose', message, ...fields); }
  trace(message: string, ...fields: readonly Field[]): void { this.log('trace', message, ...fields); }
  debug(message: string, ...fields: readonly Field[]): void { this.log('debug', message, ...fields); }
  pedantic(message: string, ...fields: readonly Field[]): void { this.log('pedantic', message, ...fields); }
  annoying(message: string, ...fields: readonly Field[]): void { this.log('annoying', message, ...fields); }

  // Short forms
  crt(message: string, ...fields: readonly Field[]): void { this.log('critical', message, ...fields); }
  err(message: string, ...fields: readonly Field[]): void { this.log('error', message, ...fields); }
  wrn(message: string, ...fields: readonly Field[]): void { this.log('warn', message, ...fields); }
  inf(message: string, ...fields: readonly Field[]): void { this.log('info', message, ...fields); }
  vrb(message: string, ...fields: readonly Field[]): void { this.log('verbose', message, ...fields); }
  trc(message: string, ...fields: readonly Field[]): void { this.log('trace', message, ...fields); }
  dbg(message: string, ...fields: readonly Field[]): void { this.log('debug', message, ...fields); }
  ped(message: string, ...fields: readonly Field[]): void { this.log('pedantic', message, ...fields); }
  ayg(message: string, ...fields: readonly Field[]): void { this.log('annoying', message, ...fields); }

  criticalf(format: string, ...args: readonly unknown[]): void { this.logf('critical', format, ...args); }
  errorf(format: string, ...args: readonly unknown[]): void { this.logf('error', format, ...args); }
  warnf(format: string, ...args: readonly unknown[]): void { this.logf('warn', format, ...args); }
  infof(format: string, ...args: readonly unknown[]): void { this.logf('info', format, ...args); }
  verbosef(format: string, ...args: readonly unknown[]): void { this.logf('verbose', format, ...args); }
  tracef(format: string, ...args: readonly unknown[]): void { this.logf('trace', format, ...args); }
  debugf(format: string, ...args: readonly unknown[]): void { this.logf('debug', format, ...args); }
  pedanticf(format: string, ...args: readonly unknown[]): void { this.logf('pedantic', format, ...args); }
  annoyingf(format: string, ...args: readonly unknown[]): void { this.logf('annoying', format, ...args); }

  crtf(format: string, ...args: readonly unknown[]): void { this.logf('critical', format, ...args); }
  errf(format: string, ...args: readonly unknown[]): void { this.logf('error', format, ...args); }
  wrnf(format: string, ...args: readonly unknown[]): void { this.logf('warn', format, ...args); }
  inff(format: string, ...args: readonly unknown[]): void { this.logf('info', format, ...args); }
  vrbf(format: string, ...args: readonly unknown[]): void { this.logf('verbose', format, ...args); }
  trcf(format: string, ...args: readonly unknown[]): void { this.logf('trace', format, ...args); }
  dbgf(format: string, ...args: readonly unknown[]): void { this.logf('debug', format, ...args); }
  pedf(format: string, ...args: readonly unknown[]): void { this.logf('pedantic', format, ...args); }
  aygf(format: string, ...args: readonly unknown[]): void { this.logf('annoying', format, ...args); }

  /** Renders a record that passed filtering and hands it to the sink in one write */
  private emit(registry: LoggerRegistry, level: LogLevel, message: string, callFields: readonly Field[]): void {
    const accumulated = this.accumulated.toArray();
    const record: LogRecord = {
      level,
      name: this.name,
      message,
      fields: callFields.length === 0 ? accumulated : [...accumulated, ...callFields],
      timestamp: registry.now()
    };

    const line = registry.theme.render(record, { color: registry.colors });
    (this.options.sink ?? registry.sink).write(line + LINE_TERMINATOR);
  }
}

/**
 * Creates a root logger
 *
 * Repeated calls with the same name return distinct but equal loggers.
 *
 * @example
 * ```typescript
 * const log = getLogger('app');
 * const db = log.withName('db').withField('pool', 4);
 * db.info('connected');
 * db.errorf('query failed after %d retries', 3);
 * ```
 */
export function getLogger(name: string = '', options?: LoggerOptions): Logger {
  return LoggerImpl.create(name, options);
}
