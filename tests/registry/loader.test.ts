import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdir, writeFile, rm } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { randomUUID } from 'node:crypto';
import { fileURLToPath } from 'node:url';
import { loadElementRegistry } from '../../src/registry/loader.js';
import { RegistryFormatError } from '../../src/exception/errors.js';

const fixturePath = fileURLToPath(new URL('../fixtures/calc-registry.json', import.meta.url));

describe('loadElementRegistry', () => {
  let dir: string;

  beforeEach(async () => {
    dir = join(tmpdir(), `calc-registry-test-${randomUUID()}`);
    await mkdir(dir, { recursive: true });
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('loads the root state by default', async () => {
    const registry = await loadElementRegistry(fixturePath);
    expect(registry.size).toBe(19);
    expect(registry.resolve('=').id).toBe('H1_15');
  });

  it('loads a named state', async () => {
    const path = join(dir, 'fdom.json');
    await writeFile(
      path,
      JSON.stringify({
        states: {
          root: { nodes: {} },
          memory: { nodes: { MC: { g_icon_name: 'MC Button', bbox: [0, 0, 40, 20] } } },
        },
      }),
    );

    const registry = await loadElementRegistry(path, 'memory');
    expect(registry.list().map((d) => d.id)).toEqual(['MC']);
    expect(registry.get('MC')?.label).toBe('');
  });

  it('reports invalid JSON with the file path', async () => {
    const path = join(dir, 'broken.json');
    await writeFile(path, '{ "states": ');

    await expect(loadElementRegistry(path)).rejects.toThrow(RegistryFormatError);
    await expect(loadElementRegistry(path)).rejects.toMatchObject({ source: path, code: 'RegistryFormat' });
  });

  it('propagates a missing file', async () => {
    await expect(loadElementRegistry(join(dir, 'missing.json'))).rejects.toMatchObject({ code: 'ENOENT' });
  });
});
