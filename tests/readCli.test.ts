import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { fileURLToPath } from 'url';
import { parseReadArgs, runReadCli } from '../src/cli/readCli.js';
import { LVM_CACHE_ENV } from '../src/lvm/cache.js';
import { resolveToolMode } from '../src/index.js';

const MULTI_SEGMENT = fileURLToPath(new URL('./fixtures/multi_segment.lvm', import.meta.url));

describe('parseReadArgs', () => {
  it('reads the file and flags', () => {
    expect(parseReadArgs(['run.lvm', '--no-cache', '--segment', '1', '--channel', '0'])).toEqual({
      file: 'run.lvm',
      cache: false,
      segment: 1,
      channel: 0,
    });
  });

  it('rejects a bad index', () => {
    expect(() => parseReadArgs(['run.lvm', '--segment', '-1'])).toThrow('--segment expects a non-negative integer, got -1');
    expect(() => parseReadArgs(['run.lvm', '--segment'])).toThrow('--segment expects a non-negative integer, got (missing)');
  });

  it('requires --segment for --channel', () => {
    expect(() => parseReadArgs(['run.lvm', '--channel', '0'])).toThrow('--channel requires --segment');
  });

  it('rejects unknown flags and a second file', () => {
    expect(() => parseReadArgs(['run.lvm', '--verbose'])).toThrow('Unknown arg: --verbose');
    expect(() => parseReadArgs(['a.lvm', 'b.lvm'])).toThrow('Unknown arg: b.lvm');
  });
});

describe('runReadCli', () => {
  const originalEnv = { ...process.env };
  let stdout: string[];

  beforeEach(() => {
    process.env[LVM_CACHE_ENV] = 'off';
    stdout = [];
    vi.spyOn(process.stdout, 'write').mockImplementation((chunk: string | Uint8Array) => {
      stdout.push(String(chunk));
      return true;
    });
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    process.env = { ...originalEnv };
    vi.restoreAllMocks();
  });

  it('prints the summary as JSON', async () => {
    await runReadCli([MULTI_SEGMENT]);
    const output: unknown = JSON.parse(stdout.join(''));
    expect(output).toMatchObject({ segment_count: 2 });
    expect(console.error).toHaveBeenCalledWith(`[lvm-mcp] Parsed ${MULTI_SEGMENT}`);
  });

  it('prints all samples of one segment', async () => {
    await runReadCli([MULTI_SEGMENT, '--segment', '1']);
    expect(JSON.parse(stdout.join(''))).toEqual({
      segment: 1,
      offset: 0,
      rows_total: 2,
      channels: [{ channel: 0, label: 'Temperature', samples_total: 2, x: [1, 1.5], y: [22, 22.5] }],
      comments: ['', ''],
    });
  });

  it('fails on a segment the file does not have', async () => {
    await expect(runReadCli([MULTI_SEGMENT, '--segment', '2'])).rejects.toThrow('No such segment/channel');
  });

  it('fails without a file', async () => {
    await expect(runReadCli(['--no-cache'])).rejects.toThrow('Missing file.');
  });

  it('prints usage for --help', async () => {
    await runReadCli(['--help']);
    expect(stdout).toEqual([]);
    expect(console.error).toHaveBeenCalledWith(expect.stringContaining('lvm-mcp read <file.lvm>'));
  });
});

describe('resolveToolMode', () => {
  it('accepts full in any case and defaults to standard', () => {
    expect(resolveToolMode(' FULL ')).toBe('full');
    expect(resolveToolMode(undefined)).toBe('standard');
    expect(resolveToolMode('everything')).toBe('standard');
  });
});
