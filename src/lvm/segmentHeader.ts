import { coerceField } from './coerce.js';
import {
  channelCardinalityMismatch,
  fieldCoercion,
  malformedColumnRow,
  truncatedSegmentHeader,
  unknownField,
} from './errors.js';
import { channelField, isDate, isNumber, isString, isTime, scalarField } from './fieldAccess.js';
import {
  COMMENT_COLUMN,
  END_OF_HEADER,
  SEGMENT_HEADERS,
  SPECIAL_BLOCK_START,
  X_VALUE_COLUMN,
  getFieldSpec,
} from './format.js';
import { stripLineEnd, type LineCursor } from './lineCursor.js';
import { skipSpecialBlock } from './specialBlock.js';
import type { FieldValue, FileHeader, SegmentHeader } from './types.js';
import { headerDefaults, validateHeader, type HeaderValues } from './validate.js';

function buildSegmentHeader(values: HeaderValues, columns: string[]): SegmentHeader {
  const channels = scalarField(values, 'Channels', isNumber, 'an integer');
  if (channels < 1) {
    throw fieldCoercion(`Header Channels must be at least 1, got ${channels}`, { field: 'Channels', value: channels });
  }
  const text = (field: string) => channelField(values, field, isString, 'text');

  return {
    Channels: channels,
    Samples: channelField(values, 'Samples', isNumber, 'an integer'),
    Date: channelField(values, 'Date', isDate, 'a date'),
    Time: channelField(values, 'Time', isTime, 'a time'),
    X0: channelField(values, 'X0', isNumber, 'a number'),
    Delta_X: channelField(values, 'Delta_X', isNumber, 'a number'),
    Notes: text('Notes'),
    Test_Name: text('Test_Name'),
    Test_Numbers: text('Test_Numbers'),
    Test_Series: text('Test_Series'),
    'UUT_M/N': text('UUT_M/N'),
    UUT_Name: text('UUT_Name'),
    'UUT_S/N': text('UUT_S/N'),
    X_Dimension: text('X_Dimension'),
    X_Unit_Label: text('X_Unit_Label'),
    Y_Dimension: text('Y_Dimension'),
    Y_Unit_Label: text('Y_Unit_Label'),
    Columns: columns,
    Y_Labels: columns.filter(c => c !== X_VALUE_COLUMN && c !== COMMENT_COLUMN),
  };
}

function readColumnNames(lines: LineCursor, separator: string): string[] {
  const lineNumber = lines.lineNumber;
  const raw = lines.next();
  const row = raw === undefined ? undefined : stripLineEnd(raw);
  if (row === undefined || !row.startsWith(X_VALUE_COLUMN)) {
    throw malformedColumnRow(row, lineNumber);
  }
  return row.split(separator);
}

/**
 * Reads one segment header and its column-name row.
 *
 * Returns null when the input ends before any header content, which is how
 * the last segment of a file is detected.
 */
export function readSegmentHeader(lines: LineCursor, fileHeader: FileHeader): SegmentHeader | null {
  const separator = fileHeader.Separator;
  const ctx = { separator, decimalSeparator: fileHeader.Decimal_Separator };
  const values = headerDefaults(SEGMENT_HEADERS);
  let started = false;

  while (!lines.done) {
    const lineNumber = lines.lineNumber;
    const line = stripLineEnd(lines.next() ?? '');

    if (line.startsWith(END_OF_HEADER)) {
      validateHeader(values, SEGMENT_HEADERS);
      const columns = readColumnNames(lines, separator);
      return buildSegmentHeader(values, columns);
    }
    if (line === '' || line.startsWith(separator)) continue;

    started = true;
    if (line.startsWith(SPECIAL_BLOCK_START)) {
      skipSpecialBlock(lines);
      continue;
    }

    const [key = '', ...tokens] = line.split(separator);
    const spec = getFieldSpec(SEGMENT_HEADERS, key);
    if (!spec) throw unknownField(key, 'segment', lineNumber);

    const data: FieldValue[] = [];
    for (const token of tokens) {
      if (token === '') continue;
      const decoded = coerceField(token, spec.type, ctx);
      if (decoded.kind === 'error') {
        throw fieldCoercion(`${decoded.message} (${key}, line ${lineNumber})`, { field: key, value: token, lineNumber });
      }
      if (decoded.kind === 'value') data.push(decoded.value);
    }

    const channels = values.get('Channels');
    const [first] = data;
    if (first === undefined) {
      throw fieldCoercion(`Error parsing value of ${key} at line ${lineNumber}`, { field: key, line, lineNumber });
    } else if (data.length === 1) {
      values.set(key, first);
    } else if (typeof channels === 'number' && data.length === channels) {
      values.set(key, data);
    } else {
      throw channelCardinalityMismatch(key, typeof channels === 'number' ? channels : null, data);
    }
  }

  if (!started) return null;
  throw truncatedSegmentHeader(lines.lineNumber);
}
