/**
 * Tests that the published entry points line up with the per-package build
 */

import { existsSync, readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { describe, it, expect } from 'vitest';
import { z } from 'zod';

const ROOT = new URL('../../../', import.meta.url);
const WORKSPACES = ['contracts', 'logger', 'provider-ifind', 'app'];

const manifestSchema = z.object({
  main: z.string().optional(),
  bin: z.record(z.string()).optional(),
  exports: z
    .object({
      '.': z.object({
        'seatflow-source': z.string(),
        types: z.string(),
        default: z.string(),
      }),
    })
    .optional(),
});

const buildConfigSchema = z.object({
  compilerOptions: z.object({ rootDir: z.string(), outDir: z.string() }),
});

function readJson(path: string): unknown {
  return JSON.parse(readFileSync(fileURLToPath(new URL(path, ROOT)), 'utf8'));
}

/** Where the build writes the compiled form of a source file */
function emittedPath(pkg: string, source: string): string {
  const { compilerOptions } = buildConfigSchema.parse(readJson(`packages/${pkg}/tsconfig.build.json`));
  const relative = source.replace(/^\.\//, '').replace(`${compilerOptions.rootDir}/`, '');
  return `./${compilerOptions.outDir}/${relative.replace(/\.ts$/, '.js')}`;
}

describe('package entry points', () => {
  it.each(WORKSPACES)('should send Node to the compiled output of %s', (pkg) => {
    const manifest = manifestSchema.parse(readJson(`packages/${pkg}/package.json`));
    const entry = manifest.exports?.['.'];

    expect(entry?.['seatflow-source']).toBe('./src/index.ts');
    expect(entry?.default).toBe(emittedPath(pkg, './src/index.ts'));
    expect(manifest.main).toBe(entry?.default);
  });

  it('should point the bin at the compiled CLI', () => {
    const manifest = manifestSchema.parse(readJson('package.json'));

    expect(existsSync(fileURLToPath(new URL('packages/app/src/cli.ts', ROOT)))).toBe(true);
    expect(manifest.bin?.['seatflow']).toBe(`./packages/app${emittedPath('app', './src/cli.ts').slice(1)}`);
  });
});
