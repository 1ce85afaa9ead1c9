import { describe, it, expect } from 'vitest';
import {
  field,
  fields,
  fieldValueToJSON,
  fieldsEqual,
  formatFloat,
  renderFieldKey,
  renderFieldValue,
  resolveShadowedFields,
  toFieldValue
} from '../../src/logger/field.js';
import { InvalidFieldValueError } from '../../src/logger/errors.js';
import type { FieldPrimitive } from '../../src/logger/types.js';

const render = (value: FieldPrimitive): string => renderFieldValue(field('k', value).value);

describe('Fields', () => {
  describe('Construction', () => {
    it('tags each supported kind', () => {
      expect(field('s', 'text').value).toEqual({ kind: 'string', value: 'text' });
      expect(field('i', 3).value).toEqual({ kind: 'integer', value: 3 });
      expect(field('b', 10n).value).toEqual({ kind: 'integer', value: 10n });
      expect(field('f', 3.14).value).toEqual({ kind: 'float', value: 3.14 });
      expect(field('t', true).value).toEqual({ kind: 'boolean', value: true });
      expect(field('n', null).value).toEqual({ kind: 'null', value: null });
    });

    it('classifies non-finite numbers as floats', () => {
      expect(field('x', Number.NaN).value.kind).toBe('float');
      expect(field('x', Number.POSITIVE_INFINITY).value.kind).toBe('float');
    });

    it('freezes the field and its value', () => {
      const built = field('host', 'a');
      expect(Object.isFrozen(built)).toBe(true);
      expect(Object.isFrozen(built.value)).toBe(true);
    });

    it.each([
      ['object', { nested: true }],
      ['array', [1, 2]],
      ['undefined', undefined],
      ['function', () => 1],
      ['symbol', Symbol('s')],
      ['Date', new Date(0)]
    ])('rejects %s values with InvalidFieldValueError', (valueType, value) => {
      const build = () => field('bad', value as unknown as FieldPrimitive);

      expect(build).toThrow(InvalidFieldValueError);
      try {
        build();
      } catch (error) {
        expect(error).toBeInstanceOf(InvalidFieldValueError);
        if (error instanceof InvalidFieldValueError) {
          expect(error.code).toBe('INVALID_FIELD_VALUE');
          expect(error.key).toBe('bad');
          expect(error.valueType).toBe(valueType);
          expect(error.message).toBe(`Unsupported value for field "bad": ${valueType}`);
        }
      }
    });

    it('rejects non-string keys with TypeError', () => {
      expect(() => field(42 as unknown as string, 'x')).toThrow(TypeError);
    });

    it('builds fields from an object in property order', () => {
      const built = fields({ user: 'ada', attempts: 2, admin: false });

      expect(built.map(entry => entry.key)).toEqual(['user', 'attempts', 'admin']);
      expect(built[1]?.value).toEqual({ kind: 'integer', value: 2 });
    });

    it('exposes raw classification through toFieldValue', () => {
      expect(toFieldValue('k', 1.5)).toEqual({ kind: 'float', value: 1.5 });
      expect(() => toFieldValue('k', {})).toThrow(InvalidFieldValueError);
    });
  });

  describe('Equality', () => {
    it('compares fields structurally', () => {
      expect(fieldsEqual(field('a', 1), field('a', 1))).toBe(true);
      expect(fieldsEqual(field('a', 1), field('a', 2))).toBe(false);
      expect(fieldsEqual(field('a', 1), field('b', 1))).toBe(false);
      expect(fieldsEqual(field('a', 1), field('a', '1'))).toBe(false);
      expect(fieldsEqual(field('a', null), field('a', null))).toBe(true);
    });
  });

  describe('Shadowing', () => {
    it('keeps the last occurrence at its own position', () => {
      const resolved = resolveShadowedFields([field('a', 1), field('b', 2), field('a', 3)]);

      expect(resolved.map(entry => `${entry.key}=${renderFieldValue(entry.value)}`)).toEqual(['b=2', 'a=3']);
    });

    it('leaves unique keys in order', () => {
      const input = [field('x', 1), field('y', 2), field('z', 3)];
      expect(resolveShadowedFields(input)).toEqual(input);
    });

    it('does not modify its input', () => {
      const input = [field('host', 'a'), field('host', 'b')];
      resolveShadowedFields(input);
      expect(input).toHaveLength(2);
    });
  });

  describe('Value rendering', () => {
    it('renders strings bare unless they need quoting', () => {
      expect(render('plain')).toBe('plain');
      expect(render('two words')).toBe('"two words"');
      expect(render('')).toBe('""');
      expect(render('tab\there')).toBe('"tab\\there"');
      expect(render('line\nbreak')).toBe('"line\\nbreak"');
      expect(render('say "hi"')).toBe('"say \\"hi\\""');
      expect(render('a=b')).toBe('"a=b"');
    });

    it('quotes and escapes control characters', () => {
      expect(render('\x1b[2J')).toBe('"\\u001b[2J"');
      expect(render('bell\x07')).toBe('"bell\\u0007"');
      expect(render('del\x7f')).toBe('"del\\u007f"');
    });

    it('quotes keys the same way as values', () => {
      expect(renderFieldKey('host')).toBe('host');
      expect(renderFieldKey('a b')).toBe('"a b"');
      expect(renderFieldKey('k=v')).toBe('"k=v"');
      expect(renderFieldKey('')).toBe('""');
      expect(renderFieldKey('\x1bk')).toBe('"\\u001bk"');
    });

    it('renders numbers, booleans and null', () => {
      expect(render(3)).toBe('3');
      expect(render(-42)).toBe('-42');
      expect(render(3.14)).toBe('3.14');
      expect(render(12345678901234567890n)).toBe('12345678901234567890');
      expect(render(true)).toBe('true');
      expect(render(false)).toBe('false');
      expect(render(null)).toBe('null');
    });

    it('never uses exponent notation', () => {
      expect(render(1e21)).toBe('1000000000000000000000');
      expect(render(1e-7)).toBe('0.0000001');
      expect(render(-1.5e-7)).toBe('-0.00000015');
      expect(render(2.5e-10)).toBe('0.00000000025');
    });

    it('formats floats in stable decimal form', () => {
      expect(formatFloat(0.1 + 0.2)).toBe('0.30000000000000004');
      expect(formatFloat(1.5e300 / 1e290)).toBe(String(1.5e300 / 1e290));
      expect(formatFloat(1.234e22)).toBe('12340000000000000000000');
      expect(formatFloat(Number.NaN)).toBe('NaN');
      expect(formatFloat(Number.NEGATIVE_INFINITY)).toBe('-Infinity');
    });

    it('converts values for JSON output', () => {
      expect(fieldValueToJSON(field('k', 'x').value)).toBe('x');
      expect(fieldValueToJSON(field('k', 7).value)).toBe(7);
      expect(fieldValueToJSON(field('k', 7n).value)).toBe('7');
      expect(fieldValueToJSON(field('k', 1e21).value)).toBe('1000000000000000000000');
      expect(fieldValueToJSON(field('k', 0.5).value)).toBe(0.5);
      expect(fieldValueToJSON(field('k', Number.NaN).value)).toBe('NaN');
      expect(fieldValueToJSON(field('k', false).value)).toBe(false);
      expect(fieldValueToJSON(field('k', null).value)).toBeNull();
    });
  });
});
