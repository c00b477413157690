export { readLvm, readLvmLines, readLvmString, readSegment, continuationX } from './reader.js';
export { readLvmFile, readLvmText } from './readFile.js';
export type { ReadLvmFileOptions, ReadLvmFileResult } from './readFile.js';
export { readFileHeader, findSeparator } from './fileHeader.js';
export { readSegmentHeader } from './segmentHeader.js';
export { readSegmentData } from './segmentData.js';
export type { SegmentData } from './segmentData.js';
export { coerceField } from './coerce.js';
export type { Coerced, CoercionContext, FieldType } from './coerce.js';
export { validateHeader } from './validate.js';
export { LineCursor, splitLinesKeepEnds } from './lineCursor.js';
export { LvmFormatError } from './errors.js';
export type { LvmFormatErrorKind } from './errors.js';
export * from './format.js';
export { summarizeResult, summarizeSegment, sliceSegment } from './summary.js';
export type { ResultSummary, SegmentSummary, SegmentSlice, SliceOptions } from './summary.js';
export { valueForChannel, maxOverChannels } from './types.js';
export type {
  ChannelData,
  ChannelValue,
  FieldValue,
  FileHeader,
  LvmDate,
  LvmTime,
  ParseResult,
  Segment,
  SegmentHeader,
  TimePref,
  XColumns,
} from './types.js';
