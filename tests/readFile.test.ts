import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { fileURLToPath } from 'url';
import { cachePathFor, LVM_CACHE_DIR_ENV, LVM_CACHE_ENV } from '../src/lvm/cache.js';
import { readLvmFile } from '../src/lvm/readFile.js';
import { McpError } from '../src/shared/index.js';

const FIXTURE = fileURLToPath(new URL('./fixtures/two_channel.lvm', import.meta.url));

describe('readLvmFile', () => {
  const originalEnv = { ...process.env };
  let tmpDir: string;
  let source: string;

  beforeEach(() => {
    delete process.env[LVM_CACHE_ENV];
    delete process.env[LVM_CACHE_DIR_ENV];
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'lvm-read-'));
    source = path.join(tmpDir, 'two_channel.lvm');
    fs.copyFileSync(FIXTURE, source);
    // keep the source strictly older than any cache written during the test
    const past = new Date(Date.now() - 60_000);
    fs.utimesSync(source, past, past);
  });

  afterEach(() => {
    process.env = { ...originalEnv };
    vi.restoreAllMocks();
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it('parses the file and its CRLF line endings', () => {
    const { result, source: from } = readLvmFile(source, { writeCache: false });
    expect(from).toBe('parsed');
    expect(result.fileHeader.Time).toEqual({ hour: 14, minute: 3, second: 7, microsecond: 250000 });
    expect(result.segments).toHaveLength(1);

    const [segment] = result.segments;
    expect(segment?.header.Samples).toEqual([4, 4]);
    expect(segment?.header.Y_Unit_Label).toEqual(['Volts', 'Amps']);
    expect(segment?.data[0]?.x).toEqual([0, 0.001, 0.002, 0.003]);
    expect(segment?.data[0]?.y).toEqual([1.25, 1.5, NaN, 2]);
    expect(segment?.data[1]?.y).toEqual([0.01, 0.02, 0.03, 0.04]);
    expect(segment?.comments).toEqual(['start', '', '', 'end']);
  });

  it('writes a cache beside the file and reads it back', () => {
    const first = readLvmFile(source);
    expect(first.source).toBe('parsed');
    expect(first.cachePath).toBe(`${source}.cache.json`);
    expect(fs.existsSync(`${source}.cache.json`)).toBe(true);

    const second = readLvmFile(source);
    expect(second.source).toBe('cache');
    expect(second.result).toEqual(first.result);
  });

  it('stores NaN samples in a form JSON can hold', () => {
    readLvmFile(source);
    const raw = fs.readFileSync(`${source}.cache.json`, 'utf-8');
    expect(raw).toContain('[1.25,1.5,"NaN",2]');
  });

  it('ignores a cache older than its source', () => {
    readLvmFile(source);
    const future = new Date(Date.now() + 60_000);
    fs.utimesSync(source, future, future);
    expect(readLvmFile(source).source).toBe('parsed');
  });

  it('parses again when asked not to read the cache', () => {
    readLvmFile(source);
    expect(readLvmFile(source, { readFromCache: false }).source).toBe('parsed');
  });

  it('falls back to parsing when the cache is not valid', () => {
    const log = vi.spyOn(console, 'error').mockImplementation(() => {});
    fs.writeFileSync(`${source}.cache.json`, JSON.stringify({ format_version: 99 }));
    const read = readLvmFile(source);
    expect(read.source).toBe('parsed');
    expect(read.result.segments).toHaveLength(1);
    expect(log).toHaveBeenCalledWith('[lvm-mcp] Ignoring invalid cache', `${source}.cache.json`, expect.any(Number), 'issue(s)');
  });

  it('neither reads nor writes a cache with LVM_CACHE=off', () => {
    process.env[LVM_CACHE_ENV] = 'off';
    const read = readLvmFile(source);
    expect(read.source).toBe('parsed');
    expect(read.cachePath).toBeUndefined();
    expect(fs.existsSync(`${source}.cache.json`)).toBe(false);
  });

  it('keeps caches in LVM_CACHE_DIR when set', () => {
    const cacheDir = path.join(tmpDir, 'cache');
    fs.mkdirSync(cacheDir);
    process.env[LVM_CACHE_DIR_ENV] = cacheDir;

    const read = readLvmFile(source);
    expect(read.cachePath).toBe(cachePathFor(source));
    expect(path.dirname(read.cachePath ?? '')).toBe(cacheDir);
    expect(path.basename(read.cachePath ?? '')).toMatch(/^two_channel\.lvm-[0-9a-f]{12}\.cache\.json$/);
    expect(readLvmFile(source).source).toBe('cache');
  });

  it('rejects a relative LVM_CACHE_DIR', () => {
    process.env[LVM_CACHE_DIR_ENV] = 'relative/cache';
    expect(() => readLvmFile(source)).toThrow(McpError);
    expect(() => readLvmFile(source)).toThrow('LVM_CACHE_DIR must be an absolute path');
  });

  it('strips a byte order mark', () => {
    const text = fs.readFileSync(source, 'utf-8');
    fs.writeFileSync(source, `\uFEFF${text}`);
    expect(readLvmFile(source, { writeCache: false }).result.segments).toHaveLength(1);
  });

  it('reports a missing file as NOT_FOUND', () => {
    const missing = path.join(tmpDir, 'missing.lvm');
    expect(() => readLvmFile(missing)).toThrow(expect.objectContaining({ code: 'NOT_FOUND' }));
  });

  it('rejects a directory', () => {
    expect(() => readLvmFile(tmpDir)).toThrow(`Not a file: ${tmpDir}`);
  });
});
