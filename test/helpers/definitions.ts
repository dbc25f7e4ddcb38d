import { readFileSync } from 'node:fs';
import { join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { validateDefinitionSource } from '../../src/definition/definition-validator.js';
import { ProtocolDefinition } from '../../src/definition/protocol-definition.js';
import { BUNDLED_DEFINITIONS_DIR } from '../../src/definition/protocol-library.js';

export const FIXTURE_DEFINITIONS_DIR = fileURLToPath(new URL('../fixtures/definitions', import.meta.url));

export function compileDefinition(raw: unknown, origin: string = 'test/inline'): ProtocolDefinition {
  return ProtocolDefinition.fromSource(validateDefinitionSource(raw, origin));
}

function readDefinition(directory: string, key: string): ProtocolDefinition {
  const raw: unknown = JSON.parse(readFileSync(join(directory, `${key}.json`), 'utf8'));
  return compileDefinition(raw, key);
}

/** Test amplifier from the fixtures directory */
export function ampDefinition(): ProtocolDefinition {
  return readDefinition(FIXTURE_DEFINITIONS_DIR, 'acme/amp1');
}

export function bundledDefinition(key: 'mcintosh/mx160' | 'lyngdorf/cd2'): ProtocolDefinition {
  return readDefinition(BUNDLED_DEFINITIONS_DIR, key);
}

/** Smallest valid source; override pieces per test */
export function minimalSource(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    model: 'test/device',
    state: { level: { type: 'integer', min: 0, max: 10 } },
    commands: [{ name: 'level.get', pattern: 'LVL?', response: 'LVL={level}' }],
    ...overrides,
  };
}
