import { fieldCoercion } from './errors.js';
import type { HeaderValues } from './validate.js';
import type { ChannelValue, FieldValue, LvmDate, LvmTime } from './types.js';

type Guard<T extends FieldValue> = (value: FieldValue) => value is T;

export const isString: Guard<string> = (v): v is string => typeof v === 'string';
export const isNumber: Guard<number> = (v): v is number => typeof v === 'number';
export const isBoolean: Guard<boolean> = (v): v is boolean => typeof v === 'boolean';
export const isDate: Guard<LvmDate> = (v): v is LvmDate => typeof v === 'object' && 'year' in v;
export const isTime: Guard<LvmTime> = (v): v is LvmTime => typeof v === 'object' && 'hour' in v;

export function oneOf<T extends string>(options: readonly T[]): Guard<T> {
  return (v): v is T => typeof v === 'string' && options.some(o => o === v);
}

function wrongType(field: string, value: unknown, expected: string) {
  return fieldCoercion(`Header ${field} holds ${JSON.stringify(value)}, expected ${expected}`, { field, value });
}

/** A field that must hold exactly one value of the guarded type. */
export function scalarField<T extends FieldValue>(
  values: HeaderValues,
  field: string,
  guard: Guard<T>,
  expected: string,
): T {
  const value = values.get(field);
  if (value === undefined || Array.isArray(value) || !guard(value)) {
    throw wrongType(field, value, expected);
  }
  return value;
}

/** A field holding one value for all channels or one value per channel. */
export function channelField<T extends FieldValue>(
  values: HeaderValues,
  field: string,
  guard: Guard<T>,
  expected: string,
): ChannelValue<T> {
  const value = values.get(field);
  if (value === undefined) throw wrongType(field, value, expected);
  if (!Array.isArray(value)) {
    if (!guard(value)) throw wrongType(field, value, expected);
    return value;
  }
  const list: T[] = [];
  for (const v of value) {
    if (!guard(v)) throw wrongType(field, value, `a list of ${expected}`);
    list.push(v);
  }
  return list;
}
