import * as path from 'path';
import { z } from 'zod';
import { zodToMcpInputSchema } from './mcpSchema.js';
import { getCacheDirFromEnv, isCacheDisabled } from '../lvm/cache.js';
import { readLvmFile } from '../lvm/readFile.js';
import { readLvmString } from '../lvm/reader.js';
import { sliceSegment, summarizeResult, DEFAULT_SLICE_LIMIT } from '../lvm/summary.js';
import { notFound } from '../shared/index.js';
import { getPackageVersion } from '../version.js';
import {
  LVM_INFO,
  LVM_READ_FILE,
  LVM_GET_SEGMENT,
  LVM_PARSE_TEXT,
  type LvmToolName,
} from '../constants.js';

export type ToolExposureMode = 'standard' | 'full';
export type ToolExposure = 'standard' | 'full';

export interface ToolHandlerContext {
  mode: ToolExposureMode;
}

export interface ToolSpec {
  name: LvmToolName;
  description: string;
  exposure: ToolExposure;
  zodSchema: z.ZodType;
  /** Validates `args` against `zodSchema` (throwing ZodError) and runs the handler. */
  run: (args: unknown, ctx: ToolHandlerContext) => Promise<unknown>;
}

interface ToolDefinition<TSchema extends z.ZodType> {
  name: LvmToolName;
  description: string;
  exposure: ToolExposure;
  zodSchema: TSchema;
  handler: (params: z.output<TSchema>, ctx: ToolHandlerContext) => Promise<unknown>;
}

function defineTool<TSchema extends z.ZodType>(def: ToolDefinition<TSchema>): ToolSpec {
  return {
    name: def.name,
    description: def.description,
    exposure: def.exposure,
    zodSchema: def.zodSchema,
    run: (args, ctx) => def.handler(def.zodSchema.parse(args), ctx),
  };
}

export function isToolExposed(spec: ToolSpec, mode: ToolExposureMode): boolean {
  return mode === 'full' ? true : spec.exposure === 'standard';
}

// ── Tool Schemas ──────────────────────────────────────────────────────────

const AbsolutePath = z.string().min(1)
  .refine(p => path.isAbsolute(p), { message: 'path must be absolute' })
  .describe('Absolute path of the .lvm file');

const LvmInfoSchema = z.object({});

const LvmReadFileSchema = z.object({
  path: AbsolutePath,
  use_cache: z.boolean().optional().default(true).describe('Use a cached parse newer than the file'),
  write_cache: z.boolean().optional().default(true).describe('Store the parse result in the cache'),
});

const LvmGetSegmentSchema = z.object({
  path: AbsolutePath,
  segment: z.number().int().min(0).describe('Zero-based segment index'),
  channel: z.number().int().min(0).optional().describe('Zero-based channel index (omit for all channels)'),
  offset: z.number().int().min(0).optional().default(0).describe('First sample to return'),
  limit: z.number().int().min(1).max(10_000).optional().default(DEFAULT_SLICE_LIMIT)
    .describe('Maximum samples per channel'),
  use_cache: z.boolean().optional().default(true),
});

const LvmParseTextSchema = z.object({
  content: z.string().min(1).describe('Full text of an .lvm file'),
});

// ── Tool Specs ────────────────────────────────────────────────────────────

export const TOOL_SPECS: ToolSpec[] = [
  defineTool({
    name: LVM_INFO,
    description: 'Server version, exposed tool mode and parse-cache configuration.',
    exposure: 'standard',
    zodSchema: LvmInfoSchema,
    handler: async (_params, ctx) => {
      const cacheDir = getCacheDirFromEnv();
      return {
        name: 'lvm-mcp',
        version: getPackageVersion(),
        tool_mode: ctx.mode,
        cache: {
          enabled: !isCacheDisabled(),
          location: cacheDir ?? 'beside source file',
        },
      };
    },
  }),
  defineTool({
    name: LVM_READ_FILE,
    description: 'Parse a LabVIEW measurement (.lvm) file. Returns the file header and, per segment, the segment header with per-channel sample counts, X range and Y range. Use lvm_get_segment for the samples themselves.',
    exposure: 'standard',
    zodSchema: LvmReadFileSchema,
    handler: async (params) => {
      const read = readLvmFile(params.path, { readFromCache: params.use_cache, writeCache: params.write_cache });
      return { path: params.path, source: read.source, ...summarizeResult(read.result) };
    },
  }),
  defineTool({
    name: LVM_GET_SEGMENT,
    description: 'Return X/Y samples and row comments of one segment of an .lvm file, optionally for a single channel, paged by offset/limit.',
    exposure: 'standard',
    zodSchema: LvmGetSegmentSchema,
    handler: async (params) => {
      const { result } = readLvmFile(params.path, { readFromCache: params.use_cache });
      const slice = sliceSegment(result, params.segment, {
        offset: params.offset,
        limit: params.limit,
        ...(params.channel !== undefined ? { channel: params.channel } : {}),
      });
      if (!slice) {
        const what = params.channel !== undefined
          ? `segment ${params.segment}, channel ${params.channel}`
          : `segment ${params.segment}`;
        throw notFound(`No ${what} in ${params.path}`, { segment_count: result.segments.length });
      }
      return slice;
    },
  }),
  defineTool({
    name: LVM_PARSE_TEXT,
    description: 'Parse .lvm content passed inline (no file access, no cache) and return the same summary as lvm_read_file.',
    exposure: 'full',
    zodSchema: LvmParseTextSchema,
    handler: async (params) => summarizeResult(readLvmString(params.content)),
  }),
];

// ── Exports ───────────────────────────────────────────────────────────────

export function getToolSpec(name: string): ToolSpec | undefined {
  return TOOL_SPECS.find(s => s.name === name);
}

export function getToolSpecs(mode: ToolExposureMode = 'standard'): ToolSpec[] {
  return mode === 'full' ? TOOL_SPECS : TOOL_SPECS.filter(s => s.exposure === 'standard');
}

export function getTools(mode: ToolExposureMode = 'standard'): Array<{
  name: string;
  description: string;
  inputSchema: Record<string, unknown>;
}> {
  return getToolSpecs(mode).map(s => ({
    name: s.name,
    description: s.description,
    inputSchema: zodToMcpInputSchema(s.zodSchema),
  }));
}
