import fs from 'fs/promises';
import { fileURLToPath } from 'url';
import { describe, expect, it } from 'vitest';

const root = fileURLToPath(new URL('../../../', import.meta.url));

async function readJson(relativePath: string): Promise<unknown> {
  return JSON.parse(await fs.readFile(`${root}${relativePath}`, 'utf8'));
}

describe('package layout', () => {
  it('resolves the built core from plain node and the sources under the source condition', async () => {
    expect(await readJson('packages/core/package.json')).toMatchObject({
      exports: {
        '.': {
          source: './src/index.ts',
          types: './dist/index.d.ts',
          default: './dist/index.js',
        },
      },
    });
  });

  it('points the binary at the compiled cli entry', async () => {
    expect(await readJson('packages/cli/package.json')).toMatchObject({ bin: { parlance: './dist/index.js' } });
    expect(await readJson('package.json')).toMatchObject({ bin: { parlance: 'packages/cli/dist/index.js' } });
    expect(await readJson('packages/cli/tsconfig.build.json')).toMatchObject({
      compilerOptions: { rootDir: 'src', outDir: 'dist', customConditions: [] },
    });
  });
});
