/**
 * printf-style message formatting
 *
 * Supports `%[flags][width][.precision]conversion` with flags `-`, `+`,
 * space, `0` and `#`, and the conversions `d i u f F e E g G x X o c s j %`.
 * Arguments are checked strictly: a missing, surplus or wrongly typed
 * argument raises FormatMismatchError instead of producing a partial message.
 *
 * @example
 * ```typescript
 * sprintf('%s took %.2fms', 'query', 12.3456); // 'query took 12.35ms'
 * sprintf('%05d|%-4s|%x', 42, 'ab', 255);       // '00042|ab  |ff'
 * fmt('%d', 'oops');  // '%d [format error: %d format: a number is required, not string]'
 * ```
 */

import { FormatMismatchError, errorMessage } from './errors.js';

interface Conversion {
  readonly flags: string;
  readonly width: number | undefined;
  readonly precision: number | undefined;
  readonly type: string;
}

const SPEC_PATTERN = /%([-+ 0#]*)(\d+)?(?:\.(\d+))?([a-zA-Z%])?/y;

const INTEGER_TYPES = new Set(['d', 'i', 'u']);
const FLOAT_TYPES = new Set(['f', 'F', 'e', 'E', 'g', 'G']);
const RADIX_TYPES = new Set(['x', 'X', 'o']);

function describeArgument(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  return typeof value;
}

function toNumber(format: string, conversion: Conversion, value: unknown): number | bigint {
  if (typeof value === 'number' || typeof value === 'bigint') return value;
  if (typeof value === 'boolean') return value ? 1 : 0;
  throw new FormatMismatchError(
    format,
    `%${conversion.type} format: a number is required, not ${describeArgument(value)}`
  );
}

function toInteger(format: string, conversion: Conversion, value: unknown): bigint {
  const numeric = toNumber(format, conversion, value);
  if (typeof numeric === 'bigint') return numeric;
  if (!Number.isFinite(numeric)) {
    throw new FormatMismatchError(format, `%${conversion.type} format: cannot convert ${numeric} to integer`);
  }
  return BigInt(Math.trunc(numeric));
}

/** Widens a JS exponent ("e+5") to at least two digits ("e+05") */
function padExponent(text: string): string {
  return text.replace(/e([+-])(\d)$/, (_match, sign: string, digit: string) => `e${sign}0${digit}`);
}

function stripTrailingZeros(text: string): string {
  return text.includes('.') ? text.replace(/\.?0+$/, '') : text;
}

function formatGeneral(value: number, precision: number, alternate: boolean): string {
  if (value === 0) return alternate ? `0.${'0'.repeat(Math.max(precision - 1, 0))}` : '0';
  const significant = Math.max(precision, 1);
  const exponential = value.toExponential(significant - 1);
  const exponent = Number(exponential.slice(exponential.indexOf('e') + 1));

  if (exponent < -4 || exponent >= significant) {
    const [mantissa = '', power = ''] = exponential.split('e');
    const body = alternate ? mantissa : stripTrailingZeros(mantissa);
    return padExponent(`${body}e${power}`);
  }
  const fixed = value.toFixed(significant - 1 - exponent);
  return alternate ? fixed : stripTrailingZeros(fixed);
}

function formatFloatConversion(value: number, conversion: Conversion): string {
  const precision = conversion.precision ?? 6;
  const alternate = conversion.flags.includes('#');
  const magnitude = Math.abs(value);

  if (!Number.isFinite(magnitude)) {
    const text = Number.isNaN(magnitude) ? 'nan' : 'inf';
    return conversion.type === conversion.type.toUpperCase() ? text.toUpperCase() : text;
  }

  switch (conversion.type) {
    case 'f':
    case 'F': {
      const fixed = magnitude.toFixed(precision);
      return alternate && precision === 0 ? `${fixed}.` : fixed;
    }
    case 'e':
      return padExponent(magnitude.toExponential(precision));
    case 'E':
      return padExponent(magnitude.toExponential(precision)).toUpperCase();
    case 'g':
      return formatGeneral(magnitude, precision, alternate);
    default:
      return formatGeneral(magnitude, precision, alternate).toUpperCase();
  }
}

function formatRadix(value: bigint, conversion: Conversion): string {
  const magnitude = value < 0n ? -value : value;
  const alternate = conversion.flags.includes('#');
  switch (conversion.type) {
    case 'x':
      return (alternate ? '0x' : '') + magnitude.toString(16);
    case 'X':
      return (alternate ? '0X' : '') + magnitude.toString(16).toUpperCase();
    default:
      return (alternate ? '0o' : '') + magnitude.toString(8);
  }
}

/** Replacer marking repeated objects and writing bigints as decimal strings */
function createCompactReplacer(): (key: string, value: unknown) => unknown {
  const seen = new WeakSet<object>();
  return (_key: string, value: unknown): unknown => {
    if (typeof value === 'bigint') {
      return value.toString();
    }
    if (typeof value === 'object' && value !== null) {
      if (seen.has(value)) {
        return '[Circular Reference]';
      }
      seen.add(value);
    }
    return value;
  };
}

function compactJSON(value: unknown): string {
  try {
    return JSON.stringify(value, createCompactReplacer()) ?? String(value);
  } catch {
    // A throwing toJSON or getter
    return String(value);
  }
}

function stringifyArgument(value: unknown): string {
  if (typeof value === 'string') return value;
  if (value instanceof Error) return value.message;
  if (typeof value === 'object' && value !== null) return compactJSON(value);
  return String(value);
}

function signPrefix(negative: boolean, flags: string): string {
  if (negative) return '-';
  if (flags.includes('+')) return '+';
  if (flags.includes(' ')) return ' ';
  return '';
}

function pad(body: string, sign: string, conversion: Conversion, numeric: boolean): string {
  const width = conversion.width ?? 0;
  const length = sign.length + body.length;
  if (length >= width) return sign + body;

  const fill = width - length;
  if (conversion.flags.includes('-')) return sign + body + ' '.repeat(fill);
  if (numeric && conversion.flags.includes('0')) return sign + '0'.repeat(fill) + body;
  return ' '.repeat(fill) + sign + body;
}

function convert(format: string, conversion: Conversion, value: unknown): string {
  const { type, flags } = conversion;

  if (INTEGER_TYPES.has(type)) {
    const integer = toInteger(format, conversion, value);
    const digits = (integer < 0n ? -integer : integer).toString();
    return pad(digits, signPrefix(integer < 0n, flags), conversion, true);
  }

  if (RADIX_TYPES.has(type)) {
    const integer = toInteger(format, conversion, value);
    return pad(formatRadix(integer, conversion), signPrefix(integer < 0n, flags), conversion, true);
  }

  if (FLOAT_TYPES.has(type)) {
    const numeric = Number(toNumber(format, conversion, value));
    const negative = numeric < 0 || Object.is(numeric, -0);
    return pad(formatFloatConversion(numeric, conversion), signPrefix(negative, flags), conversion, true);
  }

  if (type === 'c') {
    if (typeof value === 'string' && [...value].length === 1) {
      return pad(value, '', conversion, false);
    }
    if (typeof value === 'number' && Number.isInteger(value) && value >= 0 && value <= 0x10ffff) {
      return pad(String.fromCodePoint(value), '', conversion, false);
    }
    throw new FormatMismatchError(format, '%c requires an integer code point or a single character');
  }

  // 's' and 'j'
  let text = type === 'j' ? compactJSON(value) : stringifyArgument(value);
  if (conversion.precision !== undefined) {
    text = text.slice(0, conversion.precision);
  }
  return pad(text, '', conversion, false);
}

/**
 * Formats `format` with `args`
 *
 * @throws {FormatMismatchError} If the arguments do not satisfy the placeholders
 */
export function sprintf(format: string, ...args: readonly unknown[]): string {
  let output = '';
  let cursor = 0;
  let argIndex = 0;

  while (cursor < format.length) {
    const percentAt = format.indexOf('%', cursor);
    if (percentAt === -1) {
      output += format.slice(cursor);
      break;
    }
    output += format.slice(cursor, percentAt);

    SPEC_PATTERN.lastIndex = percentAt;
    const match = SPEC_PATTERN.exec(format);
    const type = match?.[4];
    if (!match || type === undefined) {
      throw new FormatMismatchError(format, 'incomplete format');
    }
    cursor = percentAt + match[0].length;

    if (type === '%') {
      output += '%';
      continue;
    }
    if (!INTEGER_TYPES.has(type) && !FLOAT_TYPES.has(type) && !RADIX_TYPES.has(type) &&
        type !== 'c' && type !== 's' && type !== 'j') {
      throw new FormatMismatchError(
        format,
        `unsupported format character '${type}' at index ${percentAt + match[0].length - 1}`
      );
    }
    if (argIndex >= args.length) {
      throw new FormatMismatchError(format, 'not enough arguments for format string');
    }

    const conversion: Conversion = {
      flags: match[1] ?? '',
      width: match[2] === undefined ? undefined : Number(match[2]),
      precision: match[3] === undefined ? undefined : Number(match[3]),
      type
    };
    output += convert(format, conversion, args[argIndex++]);
  }

  if (argIndex < args.length) {
    throw new FormatMismatchError(format, 'not all arguments converted during string formatting');
  }
  return output;
}

/**
 * Text logged in place of a message whose arguments did not match
 */
export function formatErrorMarker(format: string, error: unknown): string {
  return `${format} [format error: ${errorMessage(error)}]`;
}

/**
 * General-purpose formatting that never throws: a mismatch yields the raw
 * format followed by a `[format error: ...]` marker
 */
export function fmt(format: string, ...args: readonly unknown[]): string {
  try {
    return sprintf(format, ...args);
  } catch (error) {
    if (!(error instanceof FormatMismatchError)) throw error;
    return formatErrorMarker(format, error);
  }
}
