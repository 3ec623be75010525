import { describe, it, expect } from 'vitest';
import { existsSync, readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';

const rootDir = fileURLToPath(new URL('../../../', import.meta.url));

const RootManifest = z.object({
  scripts: z.record(z.string()),
  dependencies: z.record(z.string()),
});

describe('start script', () => {
  const manifest = RootManifest.parse(JSON.parse(readFileSync(`${rootDir}package.json`, 'utf-8')));

  it('runs the entry point from its TypeScript source through tsx', () => {
    expect(manifest.scripts.start).toBe('tsx packages/discord/src/main.ts');
    expect(existsSync(`${rootDir}packages/discord/src/main.ts`)).toBe(true);
  });

  it('installs tsx as a runtime dependency', () => {
    expect(manifest.dependencies.tsx).toBeDefined();
  });
});
