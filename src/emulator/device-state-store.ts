// src/emulator/device-state-store.ts

import { Mutex } from 'async-mutex';
import type { ProtocolDefinition } from '../definition/protocol-definition.js';
import { InvalidValueError, UnknownVariableError } from '../errors.js';
import type {
  DeviceStateStoreOptions,
  OutOfRangePolicy,
  StateSnapshot,
  StateValue,
} from '../types/emulator-types.js';
import { checkStateValue } from '../utils/values.js';

export type WriteRejection = InvalidValueError | UnknownVariableError;

export type WriteResult =
  | { ok: true; variable: string; value: StateValue; previous: StateValue }
  | { ok: false; error: WriteRejection };

export type WriteAllResult = { ok: true; values: StateSnapshot } | { ok: false; error: WriteRejection };

/**
 * Current values of one emulated device, shared by all of its sessions.
 *
 * Every declared variable always holds a value that satisfies its declaration: a
 * write is validated before it is stored and a rejected write changes
 * nothing. Callers that read, decide and write as one step do so inside
 * {@link DeviceStateStore.exclusive}.
 */
export class DeviceStateStore {
  readonly policy: OutOfRangePolicy;

  private readonly definition: ProtocolDefinition;
  private readonly values = new Map<string, StateValue>();
  private readonly mutex = new Mutex();

  constructor(definition: ProtocolDefinition, options: DeviceStateStoreOptions = {}) {
    this.definition = definition;
    this.policy = options.outOfRange ?? 'reject';
    this.reset();
  }

  /** Restores every variable to its declared default. */
  reset(): void {
    this.values.clear();
    for (const variable of this.definition.stateVariables()) {
      this.values.set(variable.name, variable.default);
    }
  }

  /**
   * @throws UnknownVariableError for a name the definition does not declare
   */
  read(name: string): StateValue {
    const value = this.values.get(name);
    if (value === undefined) throw new UnknownVariableError(name);
    return value;
  }

  write(name: string, value: StateValue): WriteResult {
    const checked = this.check(name, value);
    if (!checked.ok) return checked;

    const previous = this.read(name);
    this.values.set(name, checked.value);
    return { ok: true, variable: name, value: checked.value, previous };
  }

  /**
   * Validates every entry before storing any of them; one invalid entry
   * leaves the whole state untouched.
   */
  writeAll(entries: ReadonlyArray<readonly [string, StateValue]>): WriteAllResult {
    const accepted: Array<[string, StateValue]> = [];
    for (const [name, value] of entries) {
      const checked = this.check(name, value);
      if (!checked.ok) return checked;
      accepted.push([name, checked.value]);
    }

    const values: StateSnapshot = {};
    for (const [name, value] of accepted) {
      this.values.set(name, value);
      values[name] = value;
    }
    return { ok: true, values };
  }

  snapshot(): StateSnapshot {
    return Object.fromEntries(this.values);
  }

  /**
   * Runs `fn` holding the store lock. The lock is released however `fn` ends.
   */
  exclusive<T>(fn: () => T | Promise<T>): Promise<T> {
    return this.mutex.runExclusive(fn);
  }

  isLocked(): boolean {
    return this.mutex.isLocked();
  }

  private check(
    name: string,
    value: StateValue
  ): { ok: true; value: StateValue } | { ok: false; error: WriteRejection } {
    const spec = this.definition.variable(name);
    if (!spec) return { ok: false, error: new UnknownVariableError(name) };

    const result = checkStateValue(spec, value, this.policy);
    if (!result.ok) return { ok: false, error: new InvalidValueError(name, value, result.expected) };
    return result;
  }
}
