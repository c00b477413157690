import type { FileHeader, ParseResult, Segment, SegmentHeader } from './types.js';

export interface ChannelSummary {
  channel: number;
  label: string;
  samples: number;
  x_first: number | null;
  x_last: number | null;
  y_min: number | null;
  y_max: number | null;
}

export interface SegmentSummary {
  index: number;
  rows: number;
  header: SegmentHeader;
  channels: ChannelSummary[];
}

export interface ResultSummary {
  file_header: FileHeader;
  segment_count: number;
  segments: SegmentSummary[];
}

export interface SliceOptions {
  channel?: number;
  offset?: number;
  limit?: number;
}

export interface SegmentSlice {
  segment: number;
  offset: number;
  rows_total: number;
  channels: Array<{
    channel: number;
    label: string;
    samples_total: number;
    x: number[];
    y: number[];
  }>;
  comments: string[];
}

export const DEFAULT_SLICE_LIMIT = 1000;

function channelLabel(header: SegmentHeader, channel: number): string {
  return header.Y_Labels[channel] ?? `Channel ${channel}`;
}

function range(values: readonly number[]): { min: number | null; max: number | null } {
  let min: number | null = null;
  let max: number | null = null;
  for (const v of values) {
    if (Number.isNaN(v)) continue;
    if (min === null || v < min) min = v;
    if (max === null || v > max) max = v;
  }
  return { min, max };
}

export function summarizeSegment(segment: Segment, index: number): SegmentSummary {
  return {
    index,
    rows: segment.comments.length,
    header: segment.header,
    channels: segment.data.map((ch, i) => {
      const y = range(ch.y);
      return {
        channel: i,
        label: channelLabel(segment.header, i),
        samples: ch.y.length,
        x_first: ch.x[0] ?? null,
        x_last: ch.x[ch.x.length - 1] ?? null,
        y_min: y.min,
        y_max: y.max,
      };
    }),
  };
}

/** Headers and per-channel statistics, without the sample arrays. */
export function summarizeResult(result: ParseResult): ResultSummary {
  return {
    file_header: result.fileHeader,
    segment_count: result.segments.length,
    segments: result.segments.map(summarizeSegment),
  };
}

/**
 * A window of one segment's samples. Returns null when the segment or the
 * requested channel does not exist.
 */
export function sliceSegment(result: ParseResult, index: number, options: SliceOptions = {}): SegmentSlice | null {
  const segment = result.segments[index];
  if (!segment) return null;
  if (options.channel !== undefined && !segment.data[options.channel]) return null;

  const offset = options.offset ?? 0;
  const end = offset + (options.limit ?? DEFAULT_SLICE_LIMIT);

  return {
    segment: index,
    offset,
    rows_total: segment.comments.length,
    channels: segment.data
      .map((ch, i) => ({
        channel: i,
        label: channelLabel(segment.header, i),
        samples_total: ch.y.length,
        x: ch.x.slice(offset, end),
        y: ch.y.slice(offset, end),
      }))
      .filter(ch => options.channel === undefined || ch.channel === options.channel),
    comments: segment.comments.slice(offset, end),
  };
}
