import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { pathToFileURL } from 'node:url';
import { describe, expect, it } from 'vitest';
import { readPackageVersion } from './packageInfo.js';

describe('readPackageVersion', () => {
  it('returns the version from the root package.json', async () => {
    const raw = await readFile(join(import.meta.dirname, '..', '..', 'package.json'), 'utf8');
    const { version }: { version: string } = JSON.parse(raw);

    expect(readPackageVersion()).toBe(version);
  });

  it('throws when no package.json exists above the path', () => {
    expect(() => readPackageVersion(pathToFileURL('/hello-names-missing/main.js').href)).toThrow(
      'Could not find package.json above file:///hello-names-missing/main.js'
    );
  });
});
