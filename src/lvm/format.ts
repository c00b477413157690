/**
 * LabVIEW Measurement File (.lvm) format constants and header schemas.
 *
 * Layout:
 *   LabVIEW Measurement          <- magic, column 0 of line 1
 *   <file header key/value lines>
 *   ***End_of_Header***
 *   (per segment)
 *   <segment header key/value(s) lines, one value per channel>
 *   ***End_of_Header***
 *   X_Value <sep> <label> ... <sep> Comment
 *   <data rows>
 *
 * ***Start_Special*** ... ***End_Special*** blocks may appear anywhere in a
 * header and are skipped.
 */

import { coerceField, type FieldType } from './coerce.js';
import type { FieldValue } from './types.js';

export const FILE_MAGIC_IDENTIFIER = 'LabVIEW Measurement';
export const END_OF_HEADER = '***End_of_Header***';
export const SPECIAL_BLOCK_START = '***Start_Special***';
export const SPECIAL_BLOCK_END = '***End_Special***';
export const SEPARATOR_KEY = 'Separator';
export const X_VALUE_COLUMN = 'X_Value';
export const COMMENT_COLUMN = 'Comment';

export const DEFAULT_SEPARATOR = '\t';

export const X_COLUMNS_OPTIONS = ['No', 'One', 'Multi'] as const;
export const TIME_PREF_OPTIONS = ['Absolute', 'Relative'] as const;

interface FieldSpecBase {
  type: FieldType;
  options?: readonly string[];
}

export type FieldSpec =
  | (FieldSpecBase & { required: true })
  | (FieldSpecBase & { required: false; default: FieldValue })
  // default is taken from another field once the header is complete
  | (FieldSpecBase & { required: false; defaultFrom: string });

export type HeaderSchema = Readonly<Record<string, FieldSpec>>;

export const FILE_HEADERS = {
  Date: { required: true, type: 'date' },
  Description: { required: false, type: 'text', default: '' },
  // Yes: every segment carries its own header
  Multi_Headings: { required: false, type: 'bool', default: false },
  Operator: { required: false, type: 'text', default: '' },
  Project: { required: false, type: 'text', default: '' },
  Reader_Version: { required: false, type: 'float', defaultFrom: 'Writer_Version' },
  Separator: { required: false, type: 'text', default: DEFAULT_SEPARATOR },
  Decimal_Separator: { required: false, type: 'text', default: ',' },
  // HH:MM:SS.XXX; fractional digits are optional and unbounded
  Time: { required: true, type: 'time' },
  // Absolute: seconds since 1904-01-01 GMT; Relative: seconds since Date/Time
  Time_Pref: { required: false, type: 'options', default: 'Relative', options: TIME_PREF_OPTIONS },
  Writer_Version: { required: true, type: 'float' },
  X_Columns: { required: false, type: 'options', default: 'One', options: X_COLUMNS_OPTIONS },
} as const satisfies HeaderSchema;

export const SEGMENT_HEADERS = {
  // must precede every field that has one value per channel
  Channels: { required: true, type: 'integer' },
  Date: { required: true, type: 'date' },
  Delta_X: { required: true, type: 'number' },
  Notes: { required: false, type: 'text', default: '' },
  Samples: { required: true, type: 'integer' },
  Test_Name: { required: false, type: 'text', default: '' },
  // ';'-separated, or ',' when the file separator is ';'
  Test_Numbers: { required: false, type: 'text', default: '' },
  Test_Series: { required: false, type: 'text', default: '' },
  Time: { required: true, type: 'time' },
  'UUT_M/N': { required: false, type: 'text', default: '' },
  UUT_Name: { required: false, type: 'text', default: '' },
  'UUT_S/N': { required: false, type: 'text', default: '' },
  X0: { required: true, type: 'number' },
  X_Dimension: { required: false, type: 'text', default: 'Time' },
  X_Unit_Label: { required: false, type: 'text', default: 'Default SI Unit' },
  Y_Dimension: { required: false, type: 'text', default: 'Electric Potential' },
  Y_Unit_Label: { required: false, type: 'text', default: 'Default SI Unit' },
} as const satisfies HeaderSchema;

export type FileHeaderField = keyof typeof FILE_HEADERS;
export type SegmentHeaderField = keyof typeof SEGMENT_HEADERS;

export function getFieldSpec(schema: HeaderSchema, key: string): FieldSpec | undefined {
  return Object.prototype.hasOwnProperty.call(schema, key) ? schema[key] : undefined;
}

function formatDefault(value: FieldValue): string | undefined {
  if (typeof value === 'string') return value;
  if (typeof value === 'boolean') return value ? 'Yes' : 'No';
  if (typeof value === 'number') return String(value);
  return undefined;
}

function sameDefault(a: FieldValue, b: FieldValue): boolean {
  return typeof a === 'object' || typeof b === 'object'
    ? JSON.stringify(a) === JSON.stringify(b)
    : a === b;
}

/**
 * Lists internal inconsistencies of a schema: defaults that do not decode as
 * their declared type, option defaults outside the option set, and derived
 * defaults that point at a missing field or a field of another type.
 */
export function checkSchema(name: string, schema: HeaderSchema): string[] {
  const problems: string[] = [];
  for (const [field, spec] of Object.entries(schema)) {
    if (spec.type === 'options' && (!spec.options || spec.options.length === 0)) {
      problems.push(`${name}.${field}: options field without options`);
    }
    if (spec.required) continue;

    if ('defaultFrom' in spec) {
      const source = getFieldSpec(schema, spec.defaultFrom);
      if (!source) {
        problems.push(`${name}.${field}: default refers to unknown field ${spec.defaultFrom}`);
      } else if (source.type !== spec.type) {
        problems.push(`${name}.${field}: default field ${spec.defaultFrom} is ${source.type}, expected ${spec.type}`);
      }
      continue;
    }

    const text = formatDefault(spec.default);
    const decoded = text === undefined
      ? { kind: 'error' as const, message: 'not representable as text' }
      : coerceField(text, spec.type, { separator: DEFAULT_SEPARATOR, decimalSeparator: '.' });
    if (decoded.kind !== 'value' || !sameDefault(decoded.value, spec.default)) {
      problems.push(`${name}.${field}: default ${JSON.stringify(spec.default)} is not a valid ${spec.type}`);
    }
    if (spec.options && typeof spec.default === 'string' && !spec.options.includes(spec.default)) {
      problems.push(`${name}.${field}: default ${spec.default} is not one of ${spec.options.join(', ')}`);
    }
  }
  return problems;
}

const schemaProblems = [
  ...checkSchema('FILE_HEADERS', FILE_HEADERS),
  ...checkSchema('SEGMENT_HEADERS', SEGMENT_HEADERS),
];
if (schemaProblems.length > 0) {
  throw new Error(`Inconsistent .lvm header schema:\n${schemaProblems.join('\n')}`);
}
