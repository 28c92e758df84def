import { readFileSync, existsSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';

/**
 * Read the version from the nearest package.json, walking up from the
 * caller's location. Works from both src/cli/ (dev) and dist/cli/ (built).
 */
export function readPackageVersion(callerUrl: string): string {
  let dir = dirname(fileURLToPath(callerUrl));
  while (dir !== dirname(dir)) {
    const candidate = join(dir, 'package.json');
    if (existsSync(candidate)) {
      const pkg: unknown = JSON.parse(readFileSync(candidate, 'utf-8'));
      if (pkg && typeof pkg === 'object' && 'version' in pkg && typeof pkg.version === 'string') {
        return pkg.version;
      }
      return 'unknown';
    }
    dir = dirname(dir);
  }
  return 'unknown';
}
