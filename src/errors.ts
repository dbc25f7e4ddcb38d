// src/errors.ts

import type { StateValue } from './types/emulator-types.js';

/**
 * Base class for all emulator errors
 */
export class EmulatorError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'EmulatorError';
  }
}

// --- Errors for definition loading ---

/**
 * No definition file exists for the requested model key
 */
export class DefinitionNotFoundError extends EmulatorError {
  modelKey: string;

  constructor(modelKey: string) {
    super(`No protocol definition found for model '${modelKey}'`);
    this.name = 'DefinitionNotFoundError';
    this.modelKey = modelKey;
  }
}

/**
 * Model key is not present in a registry of loaded definitions
 */
export class UnknownModelError extends EmulatorError {
  modelKey: string;

  constructor(modelKey: string) {
    super(`Unknown model '${modelKey}'`);
    this.name = 'UnknownModelError';
    this.modelKey = modelKey;
  }
}

/**
 * Definition content is malformed or inconsistent
 */
export class DefinitionValidationError extends EmulatorError {
  modelKey: string;
  detail: string;

  constructor(modelKey: string, detail: string) {
    super(`Invalid protocol definition '${modelKey}': ${detail}`);
    this.name = 'DefinitionValidationError';
    this.modelKey = modelKey;
    this.detail = detail;
  }
}

// --- Errors for device state ---

/**
 * State variable is not declared by the device definition
 */
export class UnknownVariableError extends EmulatorError {
  variable: string;

  constructor(variable: string) {
    super(`Unknown state variable: ${variable}`);
    this.name = 'UnknownVariableError';
    this.variable = variable;
  }
}

/**
 * Value does not satisfy the state variable's type or bounds
 */
export class InvalidValueError extends EmulatorError {
  variable: string;
  value: StateValue;

  constructor(variable: string, value: StateValue, expected: string) {
    super(`Invalid value for ${variable}: ${String(value)}, expected ${expected}`);
    this.name = 'InvalidValueError';
    this.variable = variable;
    this.value = value;
  }
}

// --- Errors for configuration and transport ---

/**
 * Invalid command line or process configuration
 */
export class ConfigError extends EmulatorError {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/**
 * listen() called on a server that is already accepting connections
 */
export class ServerAlreadyListeningError extends EmulatorError {
  constructor() {
    super('Emulator server is already listening');
    this.name = 'ServerAlreadyListeningError';
  }
}
