import { existsSync, readFileSync } from 'fs';
import { dirname, join } from 'path';
import { fileURLToPath } from 'url';

const FALLBACK_VERSION = '0.0.0';

/**
 * Get the package version.
 *
 * Walks up from this module to the nearest package.json, which is `../..` from
 * both `src/utils` and `dist/utils`. Reads it once and caches the result.
 */
let cachedVersion: string = '';

export function getVersion(): string {
  if (cachedVersion) {
    return cachedVersion;
  }

  cachedVersion = FALLBACK_VERSION;
  let dir = dirname(fileURLToPath(import.meta.url));
  for (;;) {
    const pkgPath = join(dir, 'package.json');
    if (existsSync(pkgPath)) {
      try {
        const pkg: unknown = JSON.parse(readFileSync(pkgPath, 'utf-8'));
        if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
          cachedVersion = pkg.version;
        }
      } catch {
        // Unreadable package.json: keep the fallback
      }
      break;
    }
    const parent = dirname(dir);
    if (parent === dir) break;
    dir = parent;
  }

  return cachedVersion;
}

export const VERSION: string = getVersion();
