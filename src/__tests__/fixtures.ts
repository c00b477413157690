import { LvmFormatError } from '../lvm/errors.js';
import type { FileHeader, SegmentHeader } from '../lvm/types.js';

export interface FileHeaderOptions {
  separator?: string;
  separatorName?: string;
  decimalSeparator?: string;
  multiHeadings?: 'Yes' | 'No';
  xColumns?: string;
  extra?: string[];
}

/** File header block, ending with the end-of-header line and one blank line. */
export function fileHeaderLines(opts: FileHeaderOptions = {}): string[] {
  const sep = opts.separator ?? '\t';
  const dec = opts.decimalSeparator ?? '.';
  return [
    `LabVIEW Measurement${sep}`,
    `Writer_Version${sep}2`,
    `Reader_Version${sep}2`,
    `Separator${sep}${opts.separatorName ?? 'Tab'}`,
    `Decimal_Separator${sep}${dec}`,
    `Multi_Headings${sep}${opts.multiHeadings ?? 'No'}`,
    `X_Columns${sep}${opts.xColumns ?? 'One'}`,
    `Time_Pref${sep}Relative`,
    `Operator${sep}Tester`,
    `Date${sep}2024/03/15`,
    `Time${sep}10:20:30${dec}125`,
    ...(opts.extra ?? []),
    `***End_of_Header***${sep}`,
    '',
  ];
}

export interface SegmentHeaderOptions {
  channels: number;
  samples: string | string[];
  x0: string | string[];
  deltaX: string | string[];
  columns: string[];
  separator?: string;
  extra?: string[];
}

/** Segment header block including its column-name row. */
export function segmentHeaderLines(opts: SegmentHeaderOptions): string[] {
  const sep = opts.separator ?? '\t';
  const perChannel = (v: string | string[]) => (Array.isArray(v) ? v.join(sep) : v);
  return [
    `Channels${sep}${opts.channels}${sep}`,
    `Samples${sep}${perChannel(opts.samples)}`,
    `Date${sep}2024/03/15`,
    `Time${sep}10:20:30`,
    `X0${sep}${perChannel(opts.x0)}`,
    `Delta_X${sep}${perChannel(opts.deltaX)}`,
    ...(opts.extra ?? []),
    `***End_of_Header***${sep}`,
    opts.columns.join(sep),
  ];
}

export function lvmText(...blocks: string[][]): string {
  return `${blocks.flat().join('\n')}\n`;
}

export function makeFileHeader(overrides: Partial<FileHeader> = {}): FileHeader {
  return {
    Date: { year: 2024, month: 3, day: 15 },
    Time: { hour: 10, minute: 20, second: 30, microsecond: 0 },
    Writer_Version: 2,
    Reader_Version: 2,
    Description: '',
    Operator: '',
    Project: '',
    Multi_Headings: false,
    Separator: '\t',
    Decimal_Separator: '.',
    Time_Pref: 'Relative',
    X_Columns: 'One',
    ...overrides,
  };
}

export function makeSegmentHeader(overrides: Partial<SegmentHeader> = {}): SegmentHeader {
  return {
    Channels: 1,
    Samples: 3,
    Date: { year: 2024, month: 3, day: 15 },
    Time: { hour: 10, minute: 20, second: 30, microsecond: 0 },
    X0: 0,
    Delta_X: 1,
    Notes: '',
    Test_Name: '',
    Test_Numbers: '',
    Test_Series: '',
    'UUT_M/N': '',
    UUT_Name: '',
    'UUT_S/N': '',
    X_Dimension: 'Time',
    X_Unit_Label: 'Default SI Unit',
    Y_Dimension: 'Electric Potential',
    Y_Unit_Label: 'Default SI Unit',
    Columns: ['X_Value', 'Untitled', 'Comment'],
    Y_Labels: ['Untitled'],
    ...overrides,
  };
}

/** Runs `fn` and returns the LvmFormatError it throws. */
export function captureFormatError(fn: () => unknown): LvmFormatError {
  try {
    fn();
  } catch (err) {
    if (err instanceof LvmFormatError) return err;
    throw err;
  }
  throw new Error('expected an LvmFormatError');
}
