import { mkdir, mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { describe, expect, it } from 'vitest';
import { ProtocolLibrary } from '../src/definition/protocol-library.js';
import { ProtocolRegistry } from '../src/definition/protocol-registry.js';
import { DefinitionNotFoundError, DefinitionValidationError, UnknownModelError } from '../src/errors.js';
import { FIXTURE_DEFINITIONS_DIR, minimalSource } from './helpers/definitions.js';

describe('ProtocolLibrary', () => {
  it('lists definition files as sorted model keys', async () => {
    const library = new ProtocolLibrary(FIXTURE_DEFINITIONS_DIR);
    expect(await library.listProtocols()).toEqual([
      'acme/amp1',
      'broken/badjson',
      'broken/invalid',
      'broken/mismatch',
    ]);
  });

  it('lists only files that can be loaded by their key', async () => {
    const root = await mkdtemp(join(tmpdir(), 'avemu-definitions-'));
    try {
      await mkdir(join(root, 'acme'));
      await mkdir(join(root, 'Zeta'));
      await writeFile(join(root, 'acme', 'amp2.json'), JSON.stringify(minimalSource({ model: 'acme/amp2' })));
      await writeFile(join(root, 'acme', 'AMP3.json'), JSON.stringify(minimalSource({ model: 'acme/amp3' })));
      await writeFile(join(root, 'acme', 'my amp.json'), JSON.stringify(minimalSource({ model: 'acme/my amp' })));
      await writeFile(join(root, 'acme', 'notes.txt'), 'not a definition');
      await writeFile(join(root, 'Zeta', 'z1.json'), JSON.stringify(minimalSource({ model: 'zeta/z1' })));

      const library = new ProtocolLibrary(root);
      const keys = await library.listProtocols();
      expect(keys).toEqual(['acme/amp2']);
      expect((await library.load('acme/amp2')).modelKey).toBe('acme/amp2');
    } finally {
      await rm(root, { recursive: true, force: true });
    }
  });

  it('loads by either spelling and caches the result', async () => {
    const library = new ProtocolLibrary(FIXTURE_DEFINITIONS_DIR);
    const first = await library.load('ACME_AMP1');
    expect(first.modelKey).toBe('acme/amp1');
    expect(await library.load('acme/amp1')).toBe(first);
    expect(library.registry.list()).toEqual(['acme/amp1']);
  });

  it('reports unknown models', async () => {
    const library = new ProtocolLibrary(FIXTURE_DEFINITIONS_DIR);
    await expect(library.load('acme/nothing')).rejects.toThrow(DefinitionNotFoundError);
    await expect(library.load('acme/nothing')).rejects.toThrow(
      "No protocol definition found for model 'acme/nothing'"
    );
    await expect(library.load('../acme/amp1')).rejects.toThrow(DefinitionNotFoundError);
    await expect(library.load('acme')).rejects.toThrow(DefinitionNotFoundError);
  });

  it('reports malformed and invalid files', async () => {
    const library = new ProtocolLibrary(FIXTURE_DEFINITIONS_DIR);
    await expect(library.load('broken/badjson')).rejects.toThrow(DefinitionValidationError);
    await expect(library.load('broken/badjson')).rejects.toThrow(/malformed JSON/);
    await expect(library.load('broken/invalid')).rejects.toThrow(
      "command 'level.get' response: placeholder '{volume}' matches no parameter or state variable"
    );
    await expect(library.load('broken/mismatch')).rejects.toThrow("file declares model 'acme/other'");
    expect(library.registry.has('broken/invalid')).toBe(false);
  });

  it('ships valid bundled definitions', async () => {
    const library = new ProtocolLibrary();
    const keys = await library.listProtocols();
    expect(keys).toEqual(['lyngdorf/cd2', 'mcintosh/mx160']);
    for (const key of keys) {
      expect((await library.load(key)).modelKey).toBe(key);
    }
  });
});

describe('ProtocolRegistry', () => {
  it('throws for unregistered models', () => {
    const registry = new ProtocolRegistry();
    expect(registry.has('acme_amp1')).toBe(false);
    expect(() => registry.lookup('Acme_Amp1')).toThrow(UnknownModelError);
    expect(() => registry.lookup('Acme_Amp1')).toThrow("Unknown model 'acme/amp1'");
  });
});
