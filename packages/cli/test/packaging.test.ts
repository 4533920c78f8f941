import { existsSync, readFileSync } from 'node:fs';
import { join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { describe, expect, it } from 'vitest';
import { z } from 'zod';

const ROOT = fileURLToPath(new URL('../../../', import.meta.url));

const ManifestSchema = z.object({
  bin: z.record(z.string()).optional(),
  exports: z.object({
    '.': z.object({ source: z.string(), types: z.string(), default: z.string() }),
  }),
});

const BuildConfigSchema = z.object({
  compilerOptions: z.object({ rootDir: z.string(), outDir: z.string() }),
});

function readJson(path: string) {
  return JSON.parse(readFileSync(join(ROOT, path), 'utf-8'));
}

function emitted(sourcePath: string, extension: string) {
  return sourcePath.replace(/^\.\/src\//, './dist/').replace(/\.ts$/, extension);
}

describe.each(['schema', 'core', 'cli'])('the %s package', (name) => {
  const manifest = ManifestSchema.parse(readJson(`packages/${name}/package.json`));
  const entry = manifest.exports['.'];

  it('resolves to compiled JavaScript at run time', () => {
    expect(existsSync(join(ROOT, 'packages', name, entry.source))).toBe(true);
    expect(entry.default).toBe(emitted(entry.source, '.js'));
    expect(entry.types).toBe(emitted(entry.source, '.d.ts'));
  });

  it('builds its sources into dist', () => {
    expect(BuildConfigSchema.parse(readJson(`packages/${name}/tsconfig.build.json`)).compilerOptions).toEqual({
      rootDir: 'src',
      outDir: 'dist',
    });
  });
});

describe('the appsource binary', () => {
  it('runs the compiled CLI entry', () => {
    const cli = ManifestSchema.parse(readJson('packages/cli/package.json'));
    const root = z.object({ bin: z.record(z.string()) }).parse(readJson('package.json'));

    expect(cli.bin).toEqual({ appsource: './dist/index.js' });
    expect(existsSync(join(ROOT, 'packages/cli/src/index.ts'))).toBe(true);
    expect(root.bin).toEqual({ appsource: 'packages/cli/dist/index.js' });
  });
});
