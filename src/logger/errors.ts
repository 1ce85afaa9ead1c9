/**
 * Error types raised by fieldline.
 *
 * Every failure the library surfaces to callers is a `FieldlineError` with a
 * stable `code`, so call sites can branch without matching on messages.
 */

export type FieldlineErrorCode =
  | 'INVALID_FIELD_VALUE'
  | 'FORMAT_MISMATCH'
  | 'INVALID_LEVEL'
  | 'SINK_WRITE';

export class FieldlineError extends Error {
  readonly code: FieldlineErrorCode;

  constructor(message: string, code: FieldlineErrorCode, options?: ErrorOptions) {
    super(message, options);
    this.name = 'FieldlineError';
    this.code = code;
  }
}

/** A field was given a value outside the supported primitive kinds */
export class InvalidFieldValueError extends FieldlineError {
  readonly key: string;
  readonly valueType: string;

  constructor(key: string, valueType: string) {
    super(`Unsupported value for field "${key}": ${valueType}`, 'INVALID_FIELD_VALUE');
    this.name = 'InvalidFieldValueError';
    this.key = key;
    this.valueType = valueType;
  }
}

/** printf-style arguments do not satisfy the format string */
export class FormatMismatchError extends FieldlineError {
  readonly format: string;

  constructor(format: string, reason: string) {
    super(reason, 'FORMAT_MISMATCH');
    this.name = 'FormatMismatchError';
    this.format = format;
  }
}

export class InvalidLevelError extends FieldlineError {
  constructor(input: unknown) {
    super(`Invalid log level: ${String(input)}`, 'INVALID_LEVEL');
    this.name = 'InvalidLevelError';
  }
}

/** A sink could not accept a line; `cause` holds the underlying failure */
export class SinkWriteError extends FieldlineError {
  readonly sink: string;

  constructor(sink: string, message: string, options?: ErrorOptions) {
    super(`Sink "${sink}" failed: ${message}`, 'SINK_WRITE', options);
    this.name = 'SinkWriteError';
    this.sink = sink;
  }
}

/** Extract an error message string from an unknown thrown value */
export function errorMessage(value: unknown): string {
  if (value instanceof Error) return value.message;
  if (value == null) return 'Unknown error';
  return String(value);
}
