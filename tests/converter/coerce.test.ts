import { describe, it, expect } from 'vitest';
import {
  convertValue,
  toTrait,
  normalizeTimestamp,
  formatEpochMillis,
} from '../../src/domain/converter/coerce.js';
import { ConversionError } from '../../src/domain/errors.js';

describe('convertValue', () => {
  it('should parse int text as an integer', () => {
    expect(convertValue('int', '10', 'size')).toBe(10);
    expect(convertValue('int', ' -42 ', 'size')).toBe(-42);
    expect(convertValue('int', '+7', 'size')).toBe(7);
  });

  it('should truncate numbers and map booleans for int', () => {
    expect(convertValue('int', 50, 'size')).toBe(50);
    expect(convertValue('int', 2.7, 'size')).toBe(2);
    expect(convertValue('int', -2.7, 'size')).toBe(-2);
    expect(convertValue('int', true, 'size')).toBe(1);
  });

  it('should carry integer text beyond the safe range exactly', () => {
    expect(convertValue('int', '9007199254740993', 'bytes')).toBe(9007199254740993n);
    expect(convertValue('int', ' -9007199254740993 ', 'bytes')).toBe(-9007199254740993n);
    expect(convertValue('int', '9007199254740991', 'bytes')).toBe(9007199254740991);
    expect(toTrait('bytes', 'int', '123456789012345678901')).toEqual({
      name: 'bytes',
      dtype: 'int',
      value: 123456789012345678901n,
    });
  });

  it('should reject numbers beyond the safe integer range', () => {
    expect(() => convertValue('int', 2 ** 53, 'bytes')).toThrow(
      'Cannot convert 9007199254740992 to int for bytes: number beyond the exact integer range, send it as text',
    );
    expect(() => convertValue('int', -1e20, 'bytes')).toThrow(ConversionError);
    expect(convertValue('int', Number.MAX_SAFE_INTEGER, 'bytes')).toBe(9007199254740991);
  });

  it.each(['abc', '10.5', '', '1e3', '0x10'])('should reject int text %j', (raw) => {
    expect(() => convertValue('int', raw, 'size')).toThrow(ConversionError);
  });

  it('should reject structured values for int', () => {
    expect(() => convertValue('int', { a: 1 }, 'size')).toThrow(ConversionError);
    expect(() => convertValue('int', [1], 'size')).toThrow(ConversionError);
  });

  it('should report the field, type and value in the error', () => {
    let caught: unknown;
    try {
      convertValue('int', 'abc', 'size');
    } catch (err: unknown) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(ConversionError);
    if (caught instanceof ConversionError) {
      expect(caught.field).toBe('size');
      expect(caught.targetType).toBe('int');
      expect(caught.value).toBe('abc');
      expect(caught.message).toBe('Cannot convert "abc" to int for size');
    }
  });

  it('should parse float text', () => {
    expect(convertValue('float', '10', 'load')).toBe(10);
    expect(convertValue('float', '1e3', 'load')).toBe(1000);
    expect(convertValue('float', '.5', 'load')).toBe(0.5);
    expect(convertValue('float', ' -3.25 ', 'load')).toBe(-3.25);
    expect(convertValue('float', 1.5, 'load')).toBe(1.5);
  });

  it.each(['abc', '', '1.2.3', '10 GB'])('should reject float text %j', (raw) => {
    expect(() => convertValue('float', raw, 'load')).toThrow(ConversionError);
  });

  it('should normalize datetime text to UTC', () => {
    expect(convertValue('datetime', '2013-08-08 21:05:37.123456', 'launched_at')).toBe(
      '2013-08-08T21:05:37.123456Z',
    );
  });

  it('should reject non-text datetimes', () => {
    expect(() => convertValue('datetime', 1375995937, 'launched_at')).toThrow(ConversionError);
    expect(() => convertValue('datetime', 'yesterday', 'launched_at')).toThrow(ConversionError);
  });

  it('should stringify text', () => {
    expect(convertValue('text', 10, 'name')).toBe('10');
    expect(convertValue('text', 'abc', 'name')).toBe('abc');
    expect(convertValue('text', false, 'name')).toBe('false');
    expect(convertValue('text', { a: [1, 2] }, 'name')).toBe('{"a":[1,2]}');
  });
});

describe('toTrait', () => {
  it('should tag the trait with its type', () => {
    expect(toTrait('memory_mb', 'int', '512')).toEqual({ name: 'memory_mb', dtype: 'int', value: 512 });
    expect(toTrait('host', 'text', 'host-1')).toEqual({ name: 'host', dtype: 'text', value: 'host-1' });
  });
});

describe('normalizeTimestamp', () => {
  it('should treat timestamps without an offset as UTC', () => {
    expect(normalizeTimestamp('2013-08-08 21:06:37.803826')).toBe('2013-08-08T21:06:37.803826Z');
    expect(normalizeTimestamp('2013-08-08T21:06:37')).toBe('2013-08-08T21:06:37.000000Z');
    expect(normalizeTimestamp('2013-08-08')).toBe('2013-08-08T00:00:00.000000Z');
  });

  it('should convert offsets to UTC', () => {
    expect(normalizeTimestamp('2013-08-08T21:05:37+02:00')).toBe('2013-08-08T19:05:37.000000Z');
    expect(normalizeTimestamp('2013-08-08T01:00:00-03:30')).toBe('2013-08-08T04:30:00.000000Z');
    expect(normalizeTimestamp('2013-08-08T21:05:37.5Z')).toBe('2013-08-08T21:05:37.500000Z');
    expect(normalizeTimestamp('2013-12-31T23:30:00-0100')).toBe('2014-01-01T00:30:00.000000Z');
  });

  it('should reject offsets that leave the four-digit year range', () => {
    expect(normalizeTimestamp('9999-12-31T23:30:00-01:00')).toBeNull();
    expect(normalizeTimestamp('0000-01-01T00:30:00+01:00')).toBeNull();
    expect(normalizeTimestamp('9999-12-31T23:30:00Z')).toBe('9999-12-31T23:30:00.000000Z');
  });

  it('should truncate fractions beyond microseconds', () => {
    expect(normalizeTimestamp('2013-08-08T21:05:37.1234567')).toBe('2013-08-08T21:05:37.123456Z');
  });

  it.each([
    'not a date',
    '2013-02-30 00:00:00',
    '2013-13-01',
    '2013-08-08 24:00:00',
    '2013-08-08 21:60:00',
    '08/08/2013',
    '',
  ])('should reject %j', (raw) => {
    expect(normalizeTimestamp(raw)).toBeNull();
  });
});

describe('formatEpochMillis', () => {
  it('should render milliseconds with microsecond padding', () => {
    expect(formatEpochMillis(Date.UTC(2026, 1, 18, 12, 0, 0, 5))).toBe('2026-02-18T12:00:00.005000Z');
  });
});
