import { describe, it, expect } from 'vitest';
import { readFile } from 'node:fs/promises';
import { z } from 'zod';

const manifestSchema = z.object({
  scripts: z.record(z.string()),
});

async function readManifest(relativePath: string): Promise<z.infer<typeof manifestSchema>> {
  const text = await readFile(new URL(relativePath, import.meta.url), 'utf-8');
  return manifestSchema.parse(JSON.parse(text));
}

describe('server packaging', () => {
  it('should run the server from its TypeScript sources', async () => {
    const root = await readManifest('../../../package.json');
    const server = await readManifest('../package.json');

    expect(root.scripts.start).toBe('tsx apps/server/src/main.ts');
    expect(server.scripts.start).toBe('tsx src/main.ts');
  });

  it('should not emit server JavaScript that cannot resolve the core sources', async () => {
    const root = await readManifest('../../../package.json');

    expect(root.scripts.build).toBe('tsc --noEmit && npm run build:web');
  });
});
