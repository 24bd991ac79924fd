import type { DocumentValue } from '../document.js';
import type { Trait, TraitType } from '../event.js';
import { ConversionError } from '../errors.js';

const INTEGER = /^\s*[+-]?\d+\s*$/;
const MIN_SAFE = BigInt(Number.MIN_SAFE_INTEGER);
const MAX_SAFE = BigInt(Number.MAX_SAFE_INTEGER);
const DECIMAL = /^\s*[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?\s*$/;

/**
 * `YYYY-MM-DD[(T| )HH:MM[:SS[.ffffff]]][Z|±HH[:MM]]`
 *
 * Timestamps without an offset are taken as UTC.
 */
const ISO_TIMESTAMP =
  /^(\d{4})-(\d{2})-(\d{2})(?:[T ](\d{2}):(\d{2})(?::(\d{2})(?:[.,](\d+))?)?)?\s*(Z|[+-]\d{2}(?::?\d{2})?)?$/i;

function offsetMinutes(designator: string | undefined): number {
  if (designator === undefined || designator.toUpperCase() === 'Z') return 0;
  const sign = designator.startsWith('-') ? -1 : 1;
  const digits = designator.slice(1).replace(':', '');
  const hours = Number(digits.slice(0, 2));
  const minutes = digits.length > 2 ? Number(digits.slice(2, 4)) : 0;
  return sign * (hours * 60 + minutes);
}

/**
 * Parses an ISO-8601 timestamp and renders it in UTC with microsecond
 * precision, e.g. `2013-08-08T21:05:37.123456Z`.
 *
 * Returns `null` when the text is not a valid timestamp.
 */
export function normalizeTimestamp(text: string): string | null {
  const match = ISO_TIMESTAMP.exec(text.trim());
  if (match === null) return null;

  const [, y, mo, d, h = '0', mi = '0', s = '0', fraction = '', designator] = match;
  const year = Number(y);
  const month = Number(mo);
  const day = Number(d);
  const hour = Number(h);
  const minute = Number(mi);
  const second = Number(s);

  if (hour > 23 || minute > 59 || second > 59) return null;
  const offset = offsetMinutes(designator);
  if (Math.abs(offset) >= 24 * 60) return null;

  const date = new Date(0);
  date.setUTCFullYear(year, month - 1, day);
  date.setUTCHours(hour, minute, second, 0);

  // Date rolls invalid calendar days over (Feb 30 -> Mar 2); reject those.
  if (
    date.getUTCFullYear() !== year
    || date.getUTCMonth() !== month - 1
    || date.getUTCDate() !== day
  ) {
    return null;
  }

  date.setTime(date.getTime() - offset * 60_000);
  if (Number.isNaN(date.getTime())) return null;
  // Offsets can push a date out of the four-digit year range.
  const utcYear = date.getUTCFullYear();
  if (utcYear < 0 || utcYear > 9999) return null;

  const micros = fraction.slice(0, 6).padEnd(6, '0');
  return `${date.toISOString().slice(0, 19)}.${micros}Z`;
}

/** Current time in the same rendering as `normalizeTimestamp`. */
export function formatEpochMillis(epochMs: number): string {
  const iso = new Date(epochMs).toISOString();
  return `${iso.slice(0, 19)}.${iso.slice(20, 23)}000Z`;
}

function toText(value: DocumentValue): string {
  if (typeof value === 'string') return value;
  if (typeof value === 'object') return JSON.stringify(value);
  return String(value);
}

/**
 * Integer text of any length is exact: small values come back as numbers,
 * larger ones as bigint. A JSON number past 2^53 has already been rounded
 * by the decoder, so it is refused rather than stored wrong.
 */
function toInt(field: string, value: DocumentValue): number | bigint {
  if (typeof value === 'boolean') return value ? 1 : 0;
  if (typeof value === 'number' && Number.isFinite(value)) {
    const truncated = Math.trunc(value);
    if (Number.isSafeInteger(truncated)) return truncated;
    throw new ConversionError(field, 'int', value, 'number beyond the exact integer range, send it as text');
  }
  if (typeof value === 'string' && INTEGER.test(value)) {
    const parsed = BigInt(value.trim());
    return parsed >= MIN_SAFE && parsed <= MAX_SAFE ? Number(parsed) : parsed;
  }
  throw new ConversionError(field, 'int', value);
}

function toFloat(field: string, value: DocumentValue): number {
  if (typeof value === 'boolean') return value ? 1 : 0;
  if (typeof value === 'number' && Number.isFinite(value)) return value;
  if (typeof value === 'string' && DECIMAL.test(value)) {
    const parsed = Number(value.trim());
    if (Number.isFinite(parsed)) return parsed;
  }
  throw new ConversionError(field, 'float', value);
}

function toDatetime(field: string, value: DocumentValue): string {
  const normalized = typeof value === 'string' ? normalizeTimestamp(value) : null;
  if (normalized === null) {
    throw new ConversionError(field, 'datetime', value, 'expected an ISO-8601 timestamp');
  }
  return normalized;
}

/**
 * Coerces a raw document value to the declared trait type.
 *
 * @param field Name reported in the `ConversionError` when coercion fails.
 * @throws ConversionError
 */
export function convertValue(type: TraitType, value: DocumentValue, field: string): string | number | bigint {
  return toTrait(field, type, value).value;
}

/** Builds a typed trait from a raw value, coercing it to `type`. */
export function toTrait(name: string, type: TraitType, value: DocumentValue): Trait {
  switch (type) {
    case 'int':
      return { name, dtype: 'int', value: toInt(name, value) };
    case 'float':
      return { name, dtype: 'float', value: toFloat(name, value) };
    case 'datetime':
      return { name, dtype: 'datetime', value: toDatetime(name, value) };
    case 'text':
      return { name, dtype: 'text', value: toText(value) };
  }
}
