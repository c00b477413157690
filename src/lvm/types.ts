/**
 * Parsed representation of a LabVIEW measurement (.lvm) file.
 *
 * Field names keep the spelling used inside the file (`Writer_Version`,
 * `X_Columns`, ...) so a header can be cross-checked against the raw text.
 */

export interface LvmDate {
  year: number;
  month: number;
  day: number;
}

export interface LvmTime {
  hour: number;
  minute: number;
  second: number;
  /** 0..999999; digits beyond the sixth are dropped when parsing. */
  microsecond: number;
}

export type FieldValue = string | number | boolean | LvmDate | LvmTime;

/**
 * A segment header field holds one value for every channel, or one value per
 * channel. Use `valueForChannel` to read it without caring which.
 */
export type ChannelValue<T> = T | T[];

export type XColumns = 'No' | 'One' | 'Multi';
export type TimePref = 'Absolute' | 'Relative';

export interface FileHeader {
  Date: LvmDate;
  Time: LvmTime;
  Writer_Version: number;
  Reader_Version: number;
  Description: string;
  Operator: string;
  Project: string;
  Multi_Headings: boolean;
  /** The literal delimiter character, not the textual header value. */
  Separator: string;
  Decimal_Separator: string;
  Time_Pref: TimePref;
  X_Columns: XColumns;
}

export interface SegmentHeader {
  Channels: number;
  Samples: ChannelValue<number>;
  Date: ChannelValue<LvmDate>;
  Time: ChannelValue<LvmTime>;
  X0: ChannelValue<number>;
  Delta_X: ChannelValue<number>;
  Notes: ChannelValue<string>;
  Test_Name: ChannelValue<string>;
  Test_Numbers: ChannelValue<string>;
  Test_Series: ChannelValue<string>;
  'UUT_M/N': ChannelValue<string>;
  UUT_Name: ChannelValue<string>;
  'UUT_S/N': ChannelValue<string>;
  X_Dimension: ChannelValue<string>;
  X_Unit_Label: ChannelValue<string>;
  Y_Dimension: ChannelValue<string>;
  Y_Unit_Label: ChannelValue<string>;
  /** The column-name row split on the delimiter; always starts with X_Value. */
  Columns: string[];
  /** Columns minus the X_Value and Comment tokens. */
  Y_Labels: string[];
}

export interface ChannelData {
  x: number[];
  y: number[];
}

export interface Segment {
  header: SegmentHeader;
  data: ChannelData[];
  /** One entry per row read, '' where the row carries no comment. */
  comments: string[];
}

export interface ParseResult {
  fileHeader: FileHeader;
  segments: Segment[];
}

export function valueForChannel<T>(value: ChannelValue<T>, channel: number): T | undefined {
  return Array.isArray(value) ? value[channel] : value;
}

/** The largest per-channel value of a numeric channel field. */
export function maxOverChannels(value: ChannelValue<number>): number {
  return Array.isArray(value) ? Math.max(...value) : value;
}
