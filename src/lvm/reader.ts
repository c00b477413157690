import { readFileHeader } from './fileHeader.js';
import { LineCursor } from './lineCursor.js';
import { readSegmentData } from './segmentData.js';
import { readSegmentHeader } from './segmentHeader.js';
import { valueForChannel, type FileHeader, type ParseResult, type Segment } from './types.js';

/**
 * Per channel, the last X value the segment produced, or the channel's X0
 * when the segment produced no samples for it.
 */
export function continuationX(segment: Segment): number[] {
  return segment.data.map((ch, i) => ch.x[ch.x.length - 1] ?? valueForChannel(segment.header.X0, i) ?? 0);
}

/**
 * Reads the next segment.
 *
 * With `Multi_Headings` = Yes (or for the first segment) a fresh header is
 * read, otherwise the previous header is reused. After the first segment,
 * computed X continues from where the previous segment stopped, whichever
 * header is in effect.
 *
 * Returns null at the end of the file.
 */
export function readSegment(lines: LineCursor, fileHeader: FileHeader, previous?: Segment): Segment | null {
  const reuse = previous !== undefined && !fileHeader.Multi_Headings;
  const header = reuse ? previous.header : readSegmentHeader(lines, fileHeader);
  if (!header) return null;

  const startLine = lines.lineNumber;
  const data = readSegmentData(lines, fileHeader, header, previous ? continuationX(previous) : undefined);
  if (!data) return null;
  // a reused header that consumed nothing would repeat forever
  if (reuse && lines.lineNumber === startLine) return null;

  return { header, data: data.data, comments: data.comments };
}

export function readLvm(lines: LineCursor): ParseResult {
  const fileHeader = readFileHeader(lines);
  const segments: Segment[] = [];

  for (let segment = readSegment(lines, fileHeader); segment; segment = readSegment(lines, fileHeader, segment)) {
    segments.push(segment);
  }

  return { fileHeader, segments };
}

/** Parses raw lines, each ending in its line terminator. */
export function readLvmLines(lines: readonly string[]): ParseResult {
  return readLvm(new LineCursor(lines));
}

/** Parses the full content of an .lvm file. */
export function readLvmString(text: string): ParseResult {
  return readLvm(LineCursor.fromText(text));
}
