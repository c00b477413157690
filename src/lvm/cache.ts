import * as crypto from 'crypto';
import * as fs from 'fs';
import * as path from 'path';
import { invalidParams } from '../shared/index.js';
import { CACHE_FORMAT_VERSION, CachedResultSchema, encodeSample } from './cacheSchema.js';
import type { ParseResult } from './types.js';

export const LVM_CACHE_DIR_ENV = 'LVM_CACHE_DIR';
export const LVM_CACHE_ENV = 'LVM_CACHE';

const CACHE_SUFFIX = '.cache.json';

export function isCacheDisabled(): boolean {
  return process.env[LVM_CACHE_ENV]?.trim().toLowerCase() === 'off';
}

export function getCacheDirFromEnv(): string | undefined {
  const raw = process.env[LVM_CACHE_DIR_ENV];
  if (!raw || raw.trim().length === 0) return undefined;

  const trimmed = raw.trim();
  if (!path.isAbsolute(trimmed)) {
    throw invalidParams(`${LVM_CACHE_DIR_ENV} must be an absolute path`, { env: LVM_CACHE_DIR_ENV, value: trimmed });
  }
  const resolved = path.resolve(trimmed);
  if (!fs.existsSync(resolved) || !fs.statSync(resolved).isDirectory()) {
    throw invalidParams(`${LVM_CACHE_DIR_ENV} must point to an existing directory`, {
      env: LVM_CACHE_DIR_ENV,
      value: resolved,
    });
  }
  return resolved;
}

/**
 * `<file>.cache.json` beside the source, or `<basename>-<hash>.cache.json`
 * inside LVM_CACHE_DIR so equally named files in different folders do not
 * collide.
 */
export function cachePathFor(sourcePath: string): string {
  const resolved = path.resolve(sourcePath);
  const cacheDir = getCacheDirFromEnv();
  if (!cacheDir) return `${resolved}${CACHE_SUFFIX}`;
  const digest = crypto.createHash('sha256').update(resolved).digest('hex').slice(0, 12);
  return path.join(cacheDir, `${path.basename(resolved)}-${digest}${CACHE_SUFFIX}`);
}

/** A cache is fresh when it is newer than its source, or the source is gone. */
export function isCacheFresh(sourcePath: string, cachePath: string): boolean {
  if (!fs.existsSync(cachePath)) return false;
  if (!fs.existsSync(sourcePath)) return true;
  return fs.statSync(cachePath).mtimeMs > fs.statSync(sourcePath).mtimeMs;
}

/**
 * Loads a cached parse result. Returns null when the file is missing or does
 * not hold a valid cache entry.
 */
export function loadCachedResult(cachePath: string): ParseResult | null {
  if (!fs.existsSync(cachePath)) return null;
  let json: unknown;
  try {
    json = JSON.parse(fs.readFileSync(cachePath, 'utf-8'));
  } catch (err) {
    console.error('[lvm-mcp] Ignoring unreadable cache', cachePath, err instanceof Error ? err.message : String(err));
    return null;
  }
  const parsed = CachedResultSchema.safeParse(json);
  if (!parsed.success) {
    console.error('[lvm-mcp] Ignoring invalid cache', cachePath, parsed.error.issues.length, 'issue(s)');
    return null;
  }
  return parsed.data.result;
}

/** Writes through a temporary file so readers never see a partial cache. */
export function storeCachedResult(cachePath: string, sourcePath: string, result: ParseResult): void {
  const payload = {
    format_version: CACHE_FORMAT_VERSION,
    source: path.resolve(sourcePath),
    result,
  };
  const text = JSON.stringify(payload, (_key, value: unknown) => (typeof value === 'number' ? encodeSample(value) : value));
  const tmpPath = `${cachePath}.tmp-${process.pid}-${Date.now()}`;
  try {
    fs.writeFileSync(tmpPath, text, 'utf-8');
    fs.renameSync(tmpPath, cachePath);
  } catch (err) {
    fs.rmSync(tmpPath, { force: true });
    throw err;
  }
}
