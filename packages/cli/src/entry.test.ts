import fs from 'fs/promises';
import path from 'path';
import { fileURLToPath } from 'url';
import { describe, expect, it } from 'vitest';

const rootDir = path.resolve(path.dirname(fileURLToPath(import.meta.url)), '..', '..', '..');

describe('cli entry point', () => {
  it('is runnable from source through the declared loader', async () => {
    const manifest: unknown = JSON.parse(await fs.readFile(path.join(rootDir, 'package.json'), 'utf8'));

    expect(manifest).toMatchObject({
      scripts: { cli: 'tsx packages/cli/src/index.ts' },
      devDependencies: { tsx: expect.any(String) },
    });
    await expect(fs.access(path.join(rootDir, 'packages', 'cli', 'src', 'index.ts'))).resolves.toBeUndefined();
  });
});
