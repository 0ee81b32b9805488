import { existsSync, readFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';

/**
 * Find the nearest package.json above `fromUrl` and return its version.
 *
 * Works from both the TypeScript sources and the compiled dist/ output.
 */
export function readPackageVersion(fromUrl: string = import.meta.url): string {
  let dir = dirname(fileURLToPath(fromUrl));

  for (;;) {
    const candidate = join(dir, 'package.json');
    if (existsSync(candidate)) {
      const parsed: unknown = JSON.parse(readFileSync(candidate, 'utf8'));
      if (typeof parsed === 'object' && parsed !== null && 'version' in parsed && typeof parsed.version === 'string') {
        return parsed.version;
      }
      throw new Error(`No version field in ${candidate}`);
    }

    const parent = dirname(dir);
    if (parent === dir) {
      throw new Error(`Could not find package.json above ${fromUrl}`);
    }
    dir = parent;
  }
}
