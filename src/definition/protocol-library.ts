// src/definition/protocol-library.ts

import { readdir, readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { fileURLToPath } from 'node:url';
import rootLogger from '../logger.js';
import { DefinitionNotFoundError, DefinitionValidationError } from '../errors.js';
import { normalizeModelKey } from '../utils/utils.js';
import { validateDefinitionSource } from './definition-validator.js';
import { ProtocolDefinition } from './protocol-definition.js';
import { ProtocolRegistry } from './protocol-registry.js';

const logger = rootLogger.createLogger('library');

const KEY_SEGMENT = /^[a-z0-9][a-z0-9._-]*$/;

/** Directory of the definitions bundled with the package */
export const BUNDLED_DEFINITIONS_DIR = fileURLToPath(new URL('../../definitions', import.meta.url));

function hasCode(error: unknown, code: string): boolean {
  return error instanceof Error && 'code' in error && error.code === code;
}

/**
 * Reads `<manufacturer>/<model>.json` files from a directory. Each definition
 * is validated once and then served from the registry.
 */
export class ProtocolLibrary {
  readonly directory: string;
  readonly registry: ProtocolRegistry;

  constructor(directory: string = BUNDLED_DEFINITIONS_DIR, registry: ProtocolRegistry = new ProtocolRegistry()) {
    this.directory = directory;
    this.registry = registry;
  }

  /**
   * Canonical keys of every definition file, sorted. Entries whose names
   * `load()` would not open (upper case, spaces) are skipped.
   */
  async listProtocols(): Promise<string[]> {
    const keys: string[] = [];
    const manufacturers = await readdir(this.directory, { withFileTypes: true });
    for (const manufacturer of manufacturers) {
      if (!manufacturer.isDirectory()) continue;
      if (!KEY_SEGMENT.test(manufacturer.name)) {
        logger.debug('Skipping definition directory', { entry: manufacturer.name });
        continue;
      }
      const files = await readdir(join(this.directory, manufacturer.name));
      for (const file of files) {
        if (!file.endsWith('.json')) continue;
        const model = file.slice(0, -'.json'.length);
        if (!KEY_SEGMENT.test(model)) {
          logger.debug('Skipping definition file', { entry: `${manufacturer.name}/${file}` });
          continue;
        }
        keys.push(`${manufacturer.name}/${model}`);
      }
    }
    return keys.sort();
  }

  /**
   * Loads a definition by model key in either spelling.
   * @throws DefinitionNotFoundError when no file exists for the key
   * @throws DefinitionValidationError when the file is not a valid definition
   */
  async load(modelKey: string): Promise<ProtocolDefinition> {
    const key = normalizeModelKey(modelKey);
    if (this.registry.has(key)) return this.registry.lookup(key);

    const segments = key.split('/');
    const [manufacturer, model] = segments;
    if (
      segments.length !== 2 ||
      manufacturer === undefined ||
      model === undefined ||
      !KEY_SEGMENT.test(manufacturer) ||
      !KEY_SEGMENT.test(model)
    ) {
      throw new DefinitionNotFoundError(key);
    }

    const file = join(this.directory, manufacturer, `${model}.json`);
    let text: string;
    try {
      text = await readFile(file, 'utf8');
    } catch (error: unknown) {
      if (hasCode(error, 'ENOENT') || hasCode(error, 'EISDIR')) throw new DefinitionNotFoundError(key);
      throw error;
    }

    let raw: unknown;
    try {
      raw = JSON.parse(text);
    } catch (error: unknown) {
      const detail = error instanceof Error ? error.message : String(error);
      throw new DefinitionValidationError(key, `malformed JSON: ${detail}`);
    }

    const definition = ProtocolDefinition.fromSource(validateDefinitionSource(raw, key));
    if (definition.modelKey !== key) {
      throw new DefinitionValidationError(key, `file declares model '${definition.modelKey}'`);
    }

    this.registry.register(definition);
    logger.debug('Definition loaded', {
      model: key,
      commands: definition.commands().length,
      variables: definition.stateVariables().length,
    });
    return definition;
  }
}
