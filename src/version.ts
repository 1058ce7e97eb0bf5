import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';

function readVersion(relativePath: string): string | undefined {
  const pkgPath = new URL(relativePath, import.meta.url);
  const pkg: unknown = JSON.parse(readFileSync(fileURLToPath(pkgPath), 'utf-8'));
  if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
    return pkg.version;
  }
  return undefined;
}

/**
 * Package version (single source of truth)
 *
 * Reads from package.json, with optional env override. Resolved relative to
 * this file so it works from src/ (vitest) and dist/src/ (built).
 */
export const SERVICE_VERSION =
  process.env.SERVICE_VERSION ??
  ((): string => {
    try {
      return readVersion('../package.json') ?? '0.0.0';
    } catch {
      // dist/src/version.js sits one level deeper
      try {
        return readVersion('../../package.json') ?? '0.0.0';
      } catch {
        return '0.0.0';
      }
    }
  })();
