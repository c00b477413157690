import { invalidOption, missingRequiredField } from './errors.js';
import type { HeaderSchema } from './format.js';
import type { FieldValue } from './types.js';

export type HeaderEntry = FieldValue | FieldValue[];
export type HeaderValues = Map<string, HeaderEntry>;

/** Header values seeded with the schema's literal defaults. */
export function headerDefaults(schema: HeaderSchema): HeaderValues {
  const values: HeaderValues = new Map();
  for (const [field, spec] of Object.entries(schema)) {
    if (!spec.required && 'default' in spec) values.set(field, spec.default);
  }
  return values;
}

/**
 * Throws on the first required field without a value, or the first options
 * field holding something outside its option set.
 */
export function validateHeader(values: HeaderValues, schema: HeaderSchema): void {
  for (const [field, spec] of Object.entries(schema)) {
    const value = values.get(field);
    if (spec.required && value === undefined) {
      throw missingRequiredField(field);
    }
    if (spec.type === 'options' && value !== undefined) {
      const options = spec.options ?? [];
      for (const v of Array.isArray(value) ? value : [value]) {
        if (typeof v !== 'string' || !options.includes(v)) throw invalidOption(field, v, options);
      }
    }
  }
}
