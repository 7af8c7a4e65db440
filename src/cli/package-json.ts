import { readFileSync, existsSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';

/**
 * Version from the nearest package.json above the caller's location.
 * Works from both src/cli/ (tests) and dist/cli/ (installed bin).
 */
export function readPackageVersion(callerUrl: string): string {
  let dir = dirname(fileURLToPath(callerUrl));
  while (dir !== dirname(dir)) {
    const candidate = join(dir, 'package.json');
    if (existsSync(candidate)) {
      const parsed: unknown = JSON.parse(readFileSync(candidate, 'utf-8'));
      if (parsed && typeof parsed === 'object' && 'version' in parsed && typeof parsed.version === 'string') {
        return parsed.version;
      }
      return 'unknown';
    }
    dir = dirname(dir);
  }
  return 'unknown';
}
