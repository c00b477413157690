export type LvmFormatErrorKind =
  | 'MAGIC_MISMATCH'
  | 'MISSING_DELIMITER_DECLARATION'
  | 'MALFORMED_HEADER_LINE'
  | 'UNKNOWN_FIELD'
  | 'MISSING_REQUIRED_FIELD'
  | 'INVALID_OPTION'
  | 'FIELD_COERCION'
  | 'CHANNEL_CARDINALITY_MISMATCH'
  | 'TRUNCATED_FILE_HEADER'
  | 'TRUNCATED_SEGMENT_HEADER'
  | 'TRUNCATED_SEGMENT_DATA'
  | 'MALFORMED_COLUMN_ROW';

/**
 * A structural problem in an .lvm file. Every kind aborts the whole parse;
 * `data` carries what is needed to locate the problem (field, raw value, line).
 */
export class LvmFormatError extends Error {
  constructor(
    public kind: LvmFormatErrorKind,
    message: string,
    public data?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'LvmFormatError';
  }

  toJSON() {
    return {
      name: this.name,
      kind: this.kind,
      message: this.message,
      data: this.data,
    };
  }
}

export function magicMismatch(expected: string, found: string | undefined): LvmFormatError {
  return new LvmFormatError(
    'MAGIC_MISMATCH',
    `Did not find magic identifier "${expected}" at start of file`,
    { expected, found: found ?? null },
  );
}

export function missingDelimiterDeclaration(reason: string): LvmFormatError {
  return new LvmFormatError('MISSING_DELIMITER_DECLARATION', `Separator header not found: ${reason}`);
}

export function malformedHeaderLine(line: string, lineNumber: number, tokens: number): LvmFormatError {
  return new LvmFormatError(
    'MALFORMED_HEADER_LINE',
    `Error parsing key/value pair at line ${lineNumber}: expected 2 fields, got ${tokens}`,
    { line, lineNumber, tokens },
  );
}

export function unknownField(field: string, section: 'file' | 'segment', lineNumber: number): LvmFormatError {
  return new LvmFormatError(
    'UNKNOWN_FIELD',
    `Invalid ${section} header field: ${field}`,
    { field, section, lineNumber },
  );
}

export function missingRequiredField(field: string): LvmFormatError {
  return new LvmFormatError('MISSING_REQUIRED_FIELD', `Header ${field} not found`, { field });
}

export function invalidOption(field: string, value: unknown, options: readonly string[]): LvmFormatError {
  return new LvmFormatError(
    'INVALID_OPTION',
    `Header ${field} has no option ${String(value)}`,
    { field, value, options: [...options] },
  );
}

export function fieldCoercion(message: string, data: Record<string, unknown>): LvmFormatError {
  return new LvmFormatError('FIELD_COERCION', message, data);
}

export function channelCardinalityMismatch(
  field: string,
  channels: number | null,
  received: readonly unknown[],
): LvmFormatError {
  return new LvmFormatError(
    'CHANNEL_CARDINALITY_MISMATCH',
    `Mismatch between number of Channels (${channels ?? 'Not Found'}) and header ${field} data (${received.length})`,
    { field, channels, received: [...received] },
  );
}

export function truncatedFileHeader(lineNumber: number): LvmFormatError {
  return new LvmFormatError(
    'TRUNCATED_FILE_HEADER',
    'Input ended inside the file header before ***End_of_Header***',
    { lineNumber },
  );
}

export function truncatedSegmentHeader(lineNumber: number): LvmFormatError {
  return new LvmFormatError(
    'TRUNCATED_SEGMENT_HEADER',
    'Input ended inside a segment header before ***End_of_Header***',
    { lineNumber },
  );
}

export function truncatedSegmentData(rowsRead: number, rowsExpected: number): LvmFormatError {
  return new LvmFormatError(
    'TRUNCATED_SEGMENT_DATA',
    `Unexpected end of segment: read ${rowsRead} of ${rowsExpected} rows`,
    { rowsRead, rowsExpected },
  );
}

export function malformedColumnRow(found: string | undefined, lineNumber: number): LvmFormatError {
  return new LvmFormatError(
    'MALFORMED_COLUMN_ROW',
    'Failed to read column names: row does not begin with X_Value',
    { found: found ?? null, lineNumber },
  );
}
