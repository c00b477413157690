import { parseLvmFloat, type Coerced } from './coerce.js';
import { fieldCoercion, truncatedSegmentData } from './errors.js';
import { isBlankLine, stripLineEnd, type LineCursor } from './lineCursor.js';
import {
  maxOverChannels,
  valueForChannel,
  type ChannelData,
  type FileHeader,
  type SegmentHeader,
} from './types.js';

export interface SegmentData {
  data: ChannelData[];
  comments: string[];
}

interface ChannelState extends ChannelData {
  x0: number;
  deltaX: number;
}

/**
 * Column of the row comment:
 *   One / No : X, Y_0 .. Y_{n-1}, Comment
 *   Multi    : X_0, Y_0 .. X_{n-1}, Y_{n-1}, Comment
 */
export function commentColumn(fileHeader: FileHeader, channels: number): number {
  return fileHeader.X_Columns === 'Multi' ? channels * 2 : channels + 1;
}

/**
 * Reads the row table that follows a segment header.
 *
 * Rows are read until the largest declared `Samples` is reached or a blank
 * line ends the table early. A channel whose Y cell is empty or not a number
 * gets no sample for that row; the other channels are unaffected.
 *
 * `x0` replaces the header's X0 values (continuation of a previous segment).
 * It only matters when `X_Columns` is `No` and X is computed.
 *
 * Returns null when no data row follows.
 */
export function readSegmentData(
  lines: LineCursor,
  fileHeader: FileHeader,
  segHeader: SegmentHeader,
  x0?: readonly number[],
): SegmentData | null {
  // blank lines before the first row separate segments; they never yield an empty table
  for (let next = lines.peek(); next !== undefined && isBlankLine(next); next = lines.peek()) lines.next();
  if (lines.done) return null;

  const { Separator: separator, Decimal_Separator: decimalSeparator, X_Columns: xColumns } = fileHeader;
  const channels: ChannelState[] = Array.from({ length: segHeader.Channels }, (_, i) => ({
    x0: x0?.[i] ?? valueForChannel(segHeader.X0, i) ?? 0,
    deltaX: valueForChannel(segHeader.Delta_X, i) ?? 0,
    x: [],
    y: [],
  }));
  const commentAt = commentColumn(fileHeader, segHeader.Channels);
  const maxSamples = maxOverChannels(segHeader.Samples);
  const comments: string[] = [];

  let sample = 0;
  while (sample < maxSamples) {
    const lineNumber = lines.lineNumber;
    const line = lines.next();
    if (line === undefined) throw truncatedSegmentData(sample, maxSamples);
    if (isBlankLine(line)) break;

    const cells = stripLineEnd(line).split(separator);
    const cell = (column: number) => cells[column] ?? '';
    const sharedX = xColumns === 'One' ? parseLvmFloat(cell(0), decimalSeparator) : undefined;

    for (const [i, ch] of channels.entries()) {
      let x: Coerced<number>;
      let y: Coerced<number>;
      if (xColumns === 'Multi') {
        x = parseLvmFloat(cell(2 * i), decimalSeparator);
        y = parseLvmFloat(cell(2 * i + 1), decimalSeparator);
      } else {
        x = sharedX ?? { kind: 'value', value: ch.x0 + ch.deltaX * sample };
        y = parseLvmFloat(cell(i + 1), decimalSeparator);
      }

      // an empty Y cell ends this channel's series
      if (y.kind !== 'value') continue;
      if (x.kind !== 'value') {
        throw fieldCoercion(`Missing X value for channel ${i} at line ${lineNumber}`, {
          channel: i,
          line: stripLineEnd(line),
          lineNumber,
        });
      }
      ch.x.push(x.value);
      ch.y.push(y.value);
    }

    comments.push(cells.length > commentAt ? cell(commentAt) : '');
    sample += 1;
  }

  const trailing = lines.peek();
  if (sample === maxSamples && trailing !== undefined && isBlankLine(trailing)) lines.next();

  return {
    data: channels.map(ch => ({ x: ch.x, y: ch.y })),
    comments,
  };
}
