// src/definition/protocol-registry.ts

import { UnknownModelError } from '../errors.js';
import { normalizeModelKey } from '../utils/utils.js';
import type { ProtocolDefinition } from './protocol-definition.js';

/**
 * Loaded definitions keyed by canonical model key.
 */
export class ProtocolRegistry {
  private readonly definitions = new Map<string, ProtocolDefinition>();

  register(definition: ProtocolDefinition): void {
    this.definitions.set(definition.modelKey, definition);
  }

  has(modelKey: string): boolean {
    return this.definitions.has(normalizeModelKey(modelKey));
  }

  /**
   * @throws UnknownModelError when no definition is registered under the key
   */
  lookup(modelKey: string): ProtocolDefinition {
    const key = normalizeModelKey(modelKey);
    const definition = this.definitions.get(key);
    if (!definition) throw new UnknownModelError(key);
    return definition;
  }

  list(): string[] {
    return Array.from(this.definitions.keys()).sort();
  }
}
