import * as path from 'path';
import { readLvmFile } from '../lvm/readFile.js';
import { sliceSegment, summarizeResult } from '../lvm/summary.js';

interface ReadArgs {
  file?: string;
  cache: boolean;
  segment?: number;
  channel?: number;
}

function parseIndex(flag: string, raw: string | undefined): number {
  const value = raw === undefined ? NaN : Number(raw);
  if (!Number.isInteger(value) || value < 0) throw new Error(`${flag} expects a non-negative integer, got ${raw ?? '(missing)'}`);
  return value;
}

export function parseReadArgs(argv: string[]): ReadArgs {
  const out: ReadArgs = { cache: true };
  for (let index = 0; index < argv.length; index += 1) {
    const arg = argv[index];
    if (arg === '--no-cache') out.cache = false;
    else if (arg === '--segment') out.segment = parseIndex(arg, argv[++index]);
    else if (arg === '--channel') out.channel = parseIndex(arg, argv[++index]);
    else if (arg === '--help' || arg === '-h') throw new Error('help');
    else if (arg !== undefined && !arg.startsWith('-') && out.file === undefined) out.file = arg;
    else throw new Error(`Unknown arg: ${arg}`);
  }
  if (out.channel !== undefined && out.segment === undefined) throw new Error('--channel requires --segment');
  return out;
}

function usage(): string {
  return [
    'Usage:',
    '  lvm-mcp read <file.lvm> [--no-cache]',
    '  lvm-mcp read <file.lvm> --segment <n> [--channel <n>] [--no-cache]',
  ].join('\n');
}

/** Prints the summary of a file, or the samples of one segment, as JSON on stdout. */
export async function runReadCli(argv: string[]): Promise<void> {
  let args: ReadArgs;
  try {
    args = parseReadArgs(argv);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    if (message === 'help') {
      console.error(usage());
      return;
    }
    throw new Error(`${message}\n${usage()}`);
  }
  if (!args.file) throw new Error(`Missing file.\n${usage()}`);

  const filePath = path.resolve(args.file);
  const read = readLvmFile(filePath, { readFromCache: args.cache, writeCache: args.cache });
  console.error(`[lvm-mcp] ${read.source === 'cache' ? 'Loaded cached parse of' : 'Parsed'} ${filePath}`);

  let output: unknown;
  if (args.segment === undefined) {
    output = summarizeResult(read.result);
  } else {
    const slice = sliceSegment(read.result, args.segment, {
      limit: Number.MAX_SAFE_INTEGER,
      ...(args.channel !== undefined ? { channel: args.channel } : {}),
    });
    if (!slice) throw new Error(`No such segment/channel in ${filePath} (${read.result.segments.length} segment(s))`);
    output = slice;
  }
  process.stdout.write(`${JSON.stringify(output, null, 2)}\n`);
}
