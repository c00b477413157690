import { describe, it, expect } from 'vitest';
import { continuationX, readLvmLines, readLvmString } from '../lvm/reader.js';
import {
  captureFormatError,
  fileHeaderLines,
  lvmText,
  makeSegmentHeader,
  segmentHeaderLines,
  type SegmentHeaderOptions,
} from './fixtures.js';

const SINGLE: SegmentHeaderOptions = {
  channels: 1,
  samples: '3',
  x0: '0',
  deltaX: '1',
  columns: ['X_Value', 'Voltage', 'Comment'],
};

describe('readLvmString', () => {
  it('reads a one-channel file with an X column', () => {
    const result = readLvmString(lvmText(fileHeaderLines(), segmentHeaderLines(SINGLE), ['0\t1.0', '1\t2.0', '2\t3.0']));
    expect(result.fileHeader.Operator).toBe('Tester');
    expect(result.segments).toHaveLength(1);
    expect(result.segments[0]?.data).toEqual([{ x: [0, 1, 2], y: [1, 2, 3] }]);
    expect(result.segments[0]?.comments).toEqual(['', '', '']);
    expect(result.segments[0]?.header.Y_Labels).toEqual(['Voltage']);
  });

  it('computes X when the file has no X column', () => {
    const result = readLvmString(lvmText(
      fileHeaderLines({ xColumns: 'No' }),
      segmentHeaderLines({ ...SINGLE, x0: '10', deltaX: '5' }),
      ['\t1.0', '\t2.0', '\t3.0'],
    ));
    expect(result.segments[0]?.data).toEqual([{ x: [10, 15, 20], y: [1, 2, 3] }]);
  });

  it('continues X across segments that share one header', () => {
    const result = readLvmString(lvmText(
      fileHeaderLines({ xColumns: 'No', multiHeadings: 'No' }),
      segmentHeaderLines({ ...SINGLE, samples: '2', deltaX: '0.5' }),
      ['\t1', '\t2', '', '\t3', '\t4'],
    ));
    expect(result.segments).toHaveLength(2);
    expect(result.segments[0]?.data).toEqual([{ x: [0, 0.5], y: [1, 2] }]);
    expect(result.segments[1]?.data).toEqual([{ x: [0.5, 1], y: [3, 4] }]);
    expect(result.segments[1]?.header).toBe(result.segments[0]?.header);
  });

  it('reads a fresh header for every segment with Multi_Headings and still continues X', () => {
    const result = readLvmString(lvmText(
      fileHeaderLines({ xColumns: 'No', multiHeadings: 'Yes' }),
      segmentHeaderLines({ ...SINGLE, samples: '2' }),
      ['\t1', '\t2', ''],
      segmentHeaderLines({ ...SINGLE, samples: '2', x0: '10' }),
      ['\t3', '\t4'],
    ));
    expect(result.segments).toHaveLength(2);
    expect(result.segments[0]?.data[0]?.x).toEqual([0, 1]);
    expect(result.segments[1]?.data[0]?.x).toEqual([1, 2]);
    expect(result.segments[1]?.header.X0).toBe(10);
    expect(result.segments[1]?.header).not.toBe(result.segments[0]?.header);
  });

  it('continues X per channel into a freshly read header', () => {
    const twoChannels: SegmentHeaderOptions = {
      channels: 2,
      samples: '2',
      x0: ['0', '0'],
      deltaX: ['1', '1'],
      columns: ['X_Value', 'A', 'B', 'Comment'],
    };
    const result = readLvmString(lvmText(
      fileHeaderLines({ xColumns: 'No', multiHeadings: 'Yes' }),
      segmentHeaderLines(twoChannels),
      ['\t1\t5', '\t2\t6', ''],
      segmentHeaderLines({ ...twoChannels, x0: ['10', '10'] }),
      ['\t3\t7', '\t4\t8'],
    ));
    expect(result.segments[1]?.header.X0).toEqual([10, 10]);
    expect(result.segments[1]?.data).toEqual([
      { x: [1, 2], y: [3, 4] },
      { x: [1, 2], y: [7, 8] },
    ]);
  });

  it('gives channels with fewer samples shorter series', () => {
    const result = readLvmString(lvmText(
      fileHeaderLines(),
      segmentHeaderLines({ ...SINGLE, channels: 2, samples: ['1', '3'], columns: ['X_Value', 'A', 'B', 'Comment'] }),
      ['0\t1\t10', '1\t\t20', '2\t\t30'],
    ));
    expect(result.segments[0]?.data).toEqual([
      { x: [0], y: [1] },
      { x: [0, 1, 2], y: [10, 20, 30] },
    ]);
  });

  it('reads a comma-separated file', () => {
    const result = readLvmString(lvmText(
      fileHeaderLines({ separator: ',', separatorName: 'Comma' }),
      segmentHeaderLines({ ...SINGLE, samples: '1', separator: ',' }),
      ['0,1.5,note'],
    ));
    expect(result.fileHeader.Separator).toBe(',');
    expect(result.segments[0]?.data).toEqual([{ x: [0], y: [1.5] }]);
    expect(result.segments[0]?.comments).toEqual(['note']);
  });

  it('reads one X column per channel', () => {
    const result = readLvmString(lvmText(
      fileHeaderLines({ xColumns: 'Multi' }),
      segmentHeaderLines({ ...SINGLE, channels: 2, samples: '2', columns: ['X_Value', 'A', 'X_Value', 'B', 'Comment'] }),
      ['0\t1\t100\t5\tfirst', '1\t2\t101\t6'],
    ));
    expect(result.segments[0]?.data).toEqual([
      { x: [0, 1], y: [1, 2] },
      { x: [100, 101], y: [5, 6] },
    ]);
    expect(result.segments[0]?.comments).toEqual(['first', '']);
  });

  it('returns no segments for a header-only file', () => {
    expect(readLvmString(lvmText(fileHeaderLines())).segments).toEqual([]);
  });

  it('terminates on a shared header that declares no samples', () => {
    const result = readLvmString(lvmText(
      fileHeaderLines(),
      segmentHeaderLines({ ...SINGLE, samples: '0' }),
      ['0\t1'],
    ));
    expect(result.segments).toHaveLength(1);
    expect(result.segments[0]?.data).toEqual([{ x: [], y: [] }]);
  });

  it('propagates format errors from any stage', () => {
    const err = captureFormatError(() => readLvmString(lvmText(
      fileHeaderLines(),
      segmentHeaderLines(SINGLE),
      ['0\t1'],
    )));
    expect(err.kind).toBe('TRUNCATED_SEGMENT_DATA');
  });
});

describe('readLvmLines', () => {
  it('accepts CRLF-terminated lines', () => {
    const lines = [...fileHeaderLines(), ...segmentHeaderLines(SINGLE), '0\t1', '1\t2', '2\t3'].map(l => `${l}\r\n`);
    const result = readLvmLines(lines);
    expect(result.fileHeader.Time.microsecond).toBe(125000);
    expect(result.segments[0]?.data).toEqual([{ x: [0, 1, 2], y: [1, 2, 3] }]);
  });
});

describe('continuationX', () => {
  it('takes the last X per channel, or X0 for an empty channel', () => {
    const x = continuationX({
      header: makeSegmentHeader({ Channels: 2, X0: [7, 9] }),
      data: [{ x: [1, 2, 3], y: [0, 0, 0] }, { x: [], y: [] }],
      comments: ['', '', ''],
    });
    expect(x).toEqual([3, 9]);
  });
});
