import { coerceField } from './coerce.js';
import {
  fieldCoercion,
  magicMismatch,
  malformedHeaderLine,
  missingDelimiterDeclaration,
  truncatedFileHeader,
  unknownField,
} from './errors.js';
import { isBoolean, isDate, isNumber, isString, isTime, oneOf, scalarField } from './fieldAccess.js';
import {
  DEFAULT_SEPARATOR,
  END_OF_HEADER,
  FILE_HEADERS,
  FILE_MAGIC_IDENTIFIER,
  SEPARATOR_KEY,
  SPECIAL_BLOCK_START,
  TIME_PREF_OPTIONS,
  X_COLUMNS_OPTIONS,
  getFieldSpec,
} from './format.js';
import { stripLineEnd, type LineCursor } from './lineCursor.js';
import { skipSpecialBlock } from './specialBlock.js';
import type { FileHeader } from './types.js';
import { headerDefaults, validateHeader, type HeaderValues } from './validate.js';

/**
 * Looks ahead (without consuming) for the `Separator` declaration. The
 * delimiter is the character right after the keyword. Reaching the end of the
 * file header first means the default tab.
 */
export function findSeparator(lines: LineCursor): string {
  for (let offset = 0; ; offset++) {
    const line = lines.peek(offset);
    if (line === undefined) {
      throw missingDelimiterDeclaration('input ended before Separator or ***End_of_Header***');
    }
    if (line.startsWith(SEPARATOR_KEY)) {
      const separator = line.charAt(SEPARATOR_KEY.length);
      if (separator === '' || separator === '\r' || separator === '\n') {
        throw missingDelimiterDeclaration(`no delimiter character after ${SEPARATOR_KEY}`);
      }
      return separator;
    }
    if (line.startsWith(END_OF_HEADER)) return DEFAULT_SEPARATOR;
  }
}

function buildFileHeader(values: HeaderValues, separator: string): FileHeader {
  const writerVersion = scalarField(values, 'Writer_Version', isNumber, 'a float');
  return {
    Date: scalarField(values, 'Date', isDate, 'a date'),
    Time: scalarField(values, 'Time', isTime, 'a time'),
    Writer_Version: writerVersion,
    Reader_Version: values.has('Reader_Version')
      ? scalarField(values, 'Reader_Version', isNumber, 'a float')
      : writerVersion,
    Description: scalarField(values, 'Description', isString, 'text'),
    Operator: scalarField(values, 'Operator', isString, 'text'),
    Project: scalarField(values, 'Project', isString, 'text'),
    Multi_Headings: scalarField(values, 'Multi_Headings', isBoolean, 'Yes or No'),
    Separator: separator,
    Decimal_Separator: scalarField(values, 'Decimal_Separator', isString, 'text'),
    Time_Pref: scalarField(values, 'Time_Pref', oneOf(TIME_PREF_OPTIONS), TIME_PREF_OPTIONS.join('|')),
    X_Columns: scalarField(values, 'X_Columns', oneOf(X_COLUMNS_OPTIONS), X_COLUMNS_OPTIONS.join('|')),
  };
}

/**
 * Reads the file header through its ***End_of_Header*** line.
 */
export function readFileHeader(lines: LineCursor): FileHeader {
  const separator = findSeparator(lines);
  const values = headerDefaults(FILE_HEADERS);

  const identifier = lines.next();
  if (identifier === undefined || !identifier.startsWith(FILE_MAGIC_IDENTIFIER)) {
    throw magicMismatch(FILE_MAGIC_IDENTIFIER, identifier === undefined ? undefined : stripLineEnd(identifier));
  }

  while (!lines.done) {
    const lineNumber = lines.lineNumber;
    const line = stripLineEnd(lines.next() ?? '');

    if (line.startsWith(END_OF_HEADER)) {
      validateHeader(values, FILE_HEADERS);
      return buildFileHeader(values, separator);
    }
    if (line === '' || line.startsWith(separator)) continue;
    if (line.startsWith(SPECIAL_BLOCK_START)) {
      skipSpecialBlock(lines);
      continue;
    }

    const tokens = line.split(separator);
    const [key, value] = tokens;
    if (tokens.length !== 2 || key === undefined || value === undefined) {
      throw malformedHeaderLine(line, lineNumber, tokens.length);
    }
    const spec = getFieldSpec(FILE_HEADERS, key);
    if (!spec) throw unknownField(key, 'file', lineNumber);

    const decimalSeparator = scalarField(values, 'Decimal_Separator', isString, 'text');
    const decoded = coerceField(value, spec.type, { separator, decimalSeparator });
    if (decoded.kind === 'none') {
      throw fieldCoercion(`Error parsing value of ${key} at line ${lineNumber}`, { field: key, value, lineNumber });
    }
    if (decoded.kind === 'error') {
      throw fieldCoercion(`${decoded.message} (${key}, line ${lineNumber})`, { field: key, value, lineNumber });
    }
    values.set(key, decoded.value);
  }

  throw truncatedFileHeader(lines.lineNumber);
}
