import * as fs from 'fs';
import { fileURLToPath } from 'url';

const UNKNOWN = 'unknown';
let cachedVersion: string | null = null;

function readPackageVersionFromDisk(): string | null {
  try {
    const packageJsonPath = fileURLToPath(new URL('../package.json', import.meta.url));
    const packageJson: unknown = JSON.parse(fs.readFileSync(packageJsonPath, 'utf-8'));
    const version = typeof packageJson === 'object' && packageJson !== null && 'version' in packageJson
      ? packageJson.version
      : undefined;
    return typeof version === 'string' && version.trim().length > 0 ? version.trim() : null;
  } catch (err) {
    console.error('[lvm-mcp] Could not read package version:', err instanceof Error ? err.message : String(err));
    return null;
  }
}

export function getPackageVersion(): string {
  if (cachedVersion) return cachedVersion;
  const fromEnv = process.env.npm_package_version?.trim();
  cachedVersion = fromEnv && fromEnv.length > 0 ? fromEnv : readPackageVersionFromDisk() ?? UNKNOWN;
  return cachedVersion;
}
