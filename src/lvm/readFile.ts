import * as fs from 'fs';
import * as path from 'path';
import { invalidParams, notFound } from '../shared/index.js';
import { cachePathFor, isCacheDisabled, isCacheFresh, loadCachedResult, storeCachedResult } from './cache.js';
import { readLvmString } from './reader.js';
import type { ParseResult } from './types.js';

export interface ReadLvmFileOptions {
  /** Use a fresh cache entry instead of parsing (default true). */
  readFromCache?: boolean;
  /** Store the result after parsing (default true). */
  writeCache?: boolean;
}

export interface ReadLvmFileResult {
  result: ParseResult;
  source: 'cache' | 'parsed';
  cachePath?: string;
}

export function readLvmText(filePath: string): string {
  const text = fs.readFileSync(filePath, 'utf-8');
  return text.charCodeAt(0) === 0xfeff ? text.slice(1) : text;
}

/**
 * Reads an .lvm file from disk. A cache entry newer than the file is used in
 * place of parsing; LVM_CACHE=off disables the cache entirely.
 */
export function readLvmFile(filePath: string, options: ReadLvmFileOptions = {}): ReadLvmFileResult {
  const resolved = path.resolve(filePath);
  const cacheEnabled = !isCacheDisabled();
  const readFromCache = cacheEnabled && (options.readFromCache ?? true);
  const writeCache = cacheEnabled && (options.writeCache ?? true);
  const cachePath = readFromCache || writeCache ? cachePathFor(resolved) : undefined;

  if (readFromCache && cachePath && isCacheFresh(resolved, cachePath)) {
    const cached = loadCachedResult(cachePath);
    if (cached) return { result: cached, source: 'cache', cachePath };
  }

  if (!fs.existsSync(resolved)) throw notFound(`File not found: ${resolved}`, { path: resolved });
  if (!fs.statSync(resolved).isFile()) throw invalidParams(`Not a file: ${resolved}`, { path: resolved });

  const result = readLvmString(readLvmText(resolved));
  if (writeCache && cachePath) {
    try {
      storeCachedResult(cachePath, resolved, result);
    } catch (err) {
      console.error('[lvm-mcp] Failed to write cache', cachePath, err instanceof Error ? err.message : String(err));
    }
  }
  return { result, source: 'parsed', ...(cachePath ? { cachePath } : {}) };
}
