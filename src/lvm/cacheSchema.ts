import { z } from 'zod';
import { TIME_PREF_OPTIONS, X_COLUMNS_OPTIONS } from './format.js';

// JSON has no NaN or Infinity; they are stored as strings.
const NON_FINITE = ['NaN', 'Infinity', '-Infinity'] as const;

export function encodeSample(value: number): number | (typeof NON_FINITE)[number] {
  if (Number.isNaN(value)) return 'NaN';
  if (value === Number.POSITIVE_INFINITY) return 'Infinity';
  if (value === Number.NEGATIVE_INFINITY) return '-Infinity';
  return value;
}

const SampleSchema = z.union([z.number(), z.enum(NON_FINITE).transform(v => Number(v))]);

const LvmDateSchema = z.object({
  year: z.number().int(),
  month: z.number().int().min(1).max(12),
  day: z.number().int().min(1).max(31),
});

const LvmTimeSchema = z.object({
  hour: z.number().int().min(0).max(23),
  minute: z.number().int().min(0).max(59),
  second: z.number().int().min(0).max(59),
  microsecond: z.number().int().min(0).max(999_999),
});

function channelValue<T extends z.ZodType>(schema: T) {
  return z.union([schema, z.array(schema)]);
}

const FileHeaderSchema = z.object({
  Date: LvmDateSchema,
  Time: LvmTimeSchema,
  Writer_Version: SampleSchema,
  Reader_Version: SampleSchema,
  Description: z.string(),
  Operator: z.string(),
  Project: z.string(),
  Multi_Headings: z.boolean(),
  Separator: z.string().length(1),
  Decimal_Separator: z.string(),
  Time_Pref: z.enum(TIME_PREF_OPTIONS),
  X_Columns: z.enum(X_COLUMNS_OPTIONS),
});

const SegmentHeaderSchema = z.object({
  Channels: z.number().int().min(1),
  Samples: channelValue(z.number().int()),
  Date: channelValue(LvmDateSchema),
  Time: channelValue(LvmTimeSchema),
  X0: channelValue(SampleSchema),
  Delta_X: channelValue(SampleSchema),
  Notes: channelValue(z.string()),
  Test_Name: channelValue(z.string()),
  Test_Numbers: channelValue(z.string()),
  Test_Series: channelValue(z.string()),
  'UUT_M/N': channelValue(z.string()),
  UUT_Name: channelValue(z.string()),
  'UUT_S/N': channelValue(z.string()),
  X_Dimension: channelValue(z.string()),
  X_Unit_Label: channelValue(z.string()),
  Y_Dimension: channelValue(z.string()),
  Y_Unit_Label: channelValue(z.string()),
  Columns: z.array(z.string()),
  Y_Labels: z.array(z.string()),
});

const SegmentSchema = z.object({
  header: SegmentHeaderSchema,
  data: z.array(z.object({
    x: z.array(SampleSchema),
    y: z.array(SampleSchema),
  })),
  comments: z.array(z.string()),
});

export const CACHE_FORMAT_VERSION = 1;

export const CachedResultSchema = z.object({
  format_version: z.literal(CACHE_FORMAT_VERSION),
  source: z.string(),
  result: z.object({
    fileHeader: FileHeaderSchema,
    segments: z.array(SegmentSchema),
  }),
});

export type CachedResult = z.output<typeof CachedResultSchema>;
