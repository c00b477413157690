/**
 * Typed decoding of single header/data tokens.
 *
 * Every decoder returns a tagged result:
 * - `value`: decoded successfully
 * - `none`: nothing to decode (blank or non-numeric sample); never an error by itself
 * - `error`: the token claims to be of the declared type but is malformed
 */

import type { FieldValue, LvmDate, LvmTime } from './types.js';

export type FieldType = 'number' | 'integer' | 'float' | 'options' | 'text' | 'date' | 'time' | 'bool';

export type Coerced<T = FieldValue> =
  | { kind: 'value'; value: T }
  | { kind: 'none' }
  | { kind: 'error'; message: string };

export interface CoercionContext {
  separator: string;
  decimalSeparator: string;
}

const NONE = { kind: 'none' } as const;

function ok<T>(value: T): Coerced<T> {
  return { kind: 'value', value };
}

function fail(message: string): Coerced<never> {
  return { kind: 'error', message };
}

const FLOAT_RE = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;
const SPECIAL_FLOAT_RE = /^([+-]?)(inf|infinity|nan)$/i;
const INTEGER_RE = /^[+-]?\d+$/;
const DATE_RE = /^(\d{4})\/(\d{1,2})\/(\d{1,2})$/;
const TIME_RE = /^(\d{1,2}):(\d{1,2}):(\d{1,2})$/;
const FRACTION_RE = /^\d{1,6}$/;

/**
 * Decimal-separator aware float parse. `''` and anything that is not a
 * number yield `none`.
 */
export function parseLvmFloat(raw: string, decimalSeparator: string): Coerced<number> {
  const s = (decimalSeparator === '' ? raw : raw.split(decimalSeparator).join('.')).trim();
  if (s === '') return NONE;
  if (FLOAT_RE.test(s)) return ok(Number(s));
  const special = SPECIAL_FLOAT_RE.exec(s);
  if (special) {
    if (special[2]?.toLowerCase() === 'nan') return ok(Number.NaN);
    return ok(special[1] === '-' ? Number.NEGATIVE_INFINITY : Number.POSITIVE_INFINITY);
  }
  return NONE;
}

export function parseLvmInteger(raw: string): Coerced<number> {
  const s = raw.trim();
  if (!INTEGER_RE.test(s)) return NONE;
  return ok(parseInt(s, 10));
}

/** `number` fields: float, narrowed to an integer when it has no fractional part. */
export function parseLvmNumber(raw: string, decimalSeparator: string): Coerced<number> {
  const parsed = parseLvmFloat(raw, decimalSeparator);
  if (parsed.kind !== 'value') return parsed;
  // -0 narrows to 0
  return parsed.value === 0 ? ok(0) : parsed;
}

/** Replaces `\XX` (hex code of the delimiter, either case) with the delimiter itself. */
export function unescapeText(raw: string, separator: string): string {
  const hex = separator.charCodeAt(0).toString(16).padStart(2, '0');
  return raw
    .split(`\\${hex.toUpperCase()}`).join(separator)
    .split(`\\${hex.toLowerCase()}`).join(separator);
}

function daysInMonth(year: number, month: number): number {
  return new Date(Date.UTC(year, month, 0)).getUTCDate();
}

export function parseLvmDate(raw: string): Coerced<LvmDate> {
  const m = DATE_RE.exec(raw);
  if (!m) return fail(`Invalid date "${raw}", expected YYYY/MM/DD`);
  const year = Number(m[1]);
  const month = Number(m[2]);
  const day = Number(m[3]);
  if (year < 1 || month < 1 || month > 12 || day < 1 || day > daysInMonth(year, month)) {
    return fail(`Invalid date "${raw}": out of range`);
  }
  return ok({ year, month, day });
}

export function parseLvmTime(raw: string, decimalSeparator: string): Coerced<LvmTime> {
  let clock = raw;
  let microsecond = 0;

  if (decimalSeparator !== '' && raw.includes(decimalSeparator)) {
    const parts = raw.split(decimalSeparator);
    if (parts.length !== 2) return fail(`Invalid time "${raw}", expected HH:MM:SS`);
    clock = parts[0] ?? '';
    const fraction = (parts[1] ?? '').slice(0, 6);
    if (!FRACTION_RE.test(fraction)) return fail(`Invalid fractional seconds in time "${raw}"`);
    microsecond = Number(fraction.padEnd(6, '0'));
  }

  const m = TIME_RE.exec(clock);
  if (!m) return fail(`Invalid time "${raw}", expected HH:MM:SS`);
  const hour = Number(m[1]);
  const minute = Number(m[2]);
  const second = Number(m[3]);
  if (hour > 23 || minute > 59 || second > 59) return fail(`Invalid time "${raw}": out of range`);
  return ok({ hour, minute, second, microsecond });
}

export function parseLvmBool(raw: string): Coerced<boolean> {
  if (raw === 'Yes') return ok(true);
  if (raw === 'No') return ok(false);
  return fail(`Invalid boolean "${raw}", expected Yes or No`);
}

export function coerceField(raw: string, type: FieldType | undefined, ctx: CoercionContext): Coerced {
  switch (type) {
    case 'number':
      return parseLvmNumber(raw, ctx.decimalSeparator);
    case 'integer':
      return parseLvmInteger(raw);
    case 'float':
      return parseLvmFloat(raw, ctx.decimalSeparator);
    case 'options':
      // membership is checked by the header validator
      return ok(raw);
    case 'text':
      return ok(unescapeText(raw, ctx.separator));
    case 'date':
      return parseLvmDate(raw);
    case 'time':
      return parseLvmTime(raw, ctx.decimalSeparator);
    case 'bool':
      return parseLvmBool(raw);
    case undefined:
      return ok('');
  }
}
