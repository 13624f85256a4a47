/**
 * Tests for the published package manifest
 */

import { readFileSync } from 'fs';
import { describe, it, expect } from 'vitest';
import { z } from 'zod';

const ManifestSchema = z.object({
  types: z.string().optional(),
  files: z.array(z.string()).optional(),
  exports: z.record(z.record(z.object({ types: z.string(), default: z.string() }))).optional(),
  scripts: z.record(z.string()).default({}),
});

function readManifest(relativePath: string): z.infer<typeof ManifestSchema> {
  const raw: unknown = JSON.parse(readFileSync(new URL(relativePath, import.meta.url), 'utf8'));
  return ManifestSchema.parse(raw);
}

describe('package manifest', () => {
  const sdk = readManifest('../../package.json');

  it('should point type entries at the built declarations', () => {
    expect(sdk.types).toBe('./dist/index.d.ts');
    expect(sdk.exports).toEqual({
      '.': {
        import: { types: './dist/index.d.ts', default: './dist/index.js' },
        require: { types: './dist/index.d.cts', default: './dist/index.cjs' },
      },
    });
  });

  it('should only reference files it publishes', () => {
    const entries = Object.values(sdk.exports ?? {}).flatMap((conditions) =>
      Object.values(conditions).flatMap((target) => [target.types, target.default])
    );

    expect(sdk.files).toEqual(['dist']);
    expect([sdk.types, ...entries].every((entry) => entry?.startsWith('./dist/'))).toBe(true);
  });

  it('should build the bundle from the workspace root', () => {
    const root = readManifest('../../../../package.json');

    expect(sdk.scripts.build).toBe('tsup');
    expect(root.scripts.build).toBe('npm run build --workspaces --if-present');
  });
});
