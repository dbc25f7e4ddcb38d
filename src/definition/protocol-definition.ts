// src/definition/protocol-definition.ts

import {
  BOOLEAN_FALSE_VALUES,
  BOOLEAN_LABELS,
  BOOLEAN_TRUE_VALUES,
  DEFAULT_COMMAND_EOL,
  DEFAULT_RESPONSE_EOL,
} from '../constants/constants.js';
import { DefinitionValidationError } from '../errors.js';
import type {
  CommandSource,
  CommandSpec,
  CompiledTemplate,
  DeviceInfo,
  FramingSpec,
  ParamSource,
  ParamSpec,
  ProtocolDefinitionSource,
  StateVariableSource,
  StateVariableSpec,
  WriteBinding,
  WriteBindingSource,
} from '../types/emulator-types.js';
import { normalizeModelKey } from '../utils/utils.js';
import { checkStateValue } from '../utils/values.js';
import { compilePattern } from './pattern-compiler.js';
import { compileTemplate, templateReads } from './template-compiler.js';

const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*$/;

function bound(binding: WriteBinding): WriteBinding {
  return Object.freeze(binding);
}

/**
 * Immutable, compiled command grammar of one device model.
 *
 * Everything the hot path needs (anchored pattern expressions, template
 * segments, resolved bindings) is prepared once in {@link ProtocolDefinition.fromSource};
 * matching and rendering never look at the source text again.
 */
export class ProtocolDefinition {
  readonly modelKey: string;
  readonly device: DeviceInfo;
  readonly defaultPort: number | null;
  readonly framing: FramingSpec;
  /** Response to lines that match no command; null means silence */
  readonly unrecognized: string | null;

  private readonly _commands: readonly CommandSpec[];
  private readonly _variables: ReadonlyMap<string, StateVariableSpec>;

  private constructor(
    modelKey: string,
    device: DeviceInfo,
    defaultPort: number | null,
    framing: FramingSpec,
    unrecognized: string | null,
    commands: readonly CommandSpec[],
    variables: ReadonlyMap<string, StateVariableSpec>
  ) {
    this.modelKey = modelKey;
    this.device = device;
    this.defaultPort = defaultPort;
    this.framing = framing;
    this.unrecognized = unrecognized;
    this._commands = commands;
    this._variables = variables;
    Object.freeze(this);
  }

  /** Commands in match priority order */
  commands(): readonly CommandSpec[] {
    return this._commands;
  }

  stateVariables(): StateVariableSpec[] {
    return Array.from(this._variables.values());
  }

  variable(name: string): StateVariableSpec | undefined {
    return this._variables.get(name);
  }

  command(name: string): CommandSpec | undefined {
    return this._commands.find(c => c.name === name);
  }

  /**
   * Compiles and cross-checks a validated definition source.
   * @throws DefinitionValidationError
   */
  static fromSource(source: ProtocolDefinitionSource): ProtocolDefinition {
    const modelKey = normalizeModelKey(source.model);
    const compiler = new DefinitionCompiler(modelKey);

    const variables = new Map<string, StateVariableSpec>();
    for (const [name, variable] of Object.entries(source.state)) {
      variables.set(name, compiler.variable(name, variable));
    }

    const framing: FramingSpec = Object.freeze({
      commandEol: source.framing?.commandEol ?? DEFAULT_COMMAND_EOL,
      responseEol: source.framing?.responseEol ?? DEFAULT_RESPONSE_EOL,
      caseInsensitive: source.framing?.caseInsensitive ?? false,
    });

    const commands: CommandSpec[] = [];
    for (const command of source.commands) {
      if (commands.some(c => c.name === command.name)) {
        throw compiler.invalid(`duplicate command name '${command.name}'`);
      }
      commands.push(compiler.command(command, variables, framing.caseInsensitive));
    }

    const device: DeviceInfo = Object.freeze({
      manufacturer: source.device?.manufacturer ?? modelKey.split('/')[0] ?? modelKey,
      model: source.device?.model ?? modelKey.split('/')[1] ?? modelKey,
      description: source.device?.description ?? '',
    });

    return new ProtocolDefinition(
      modelKey,
      device,
      source.connection?.port ?? null,
      framing,
      source.unrecognized ?? null,
      Object.freeze(commands),
      variables
    );
  }
}

class DefinitionCompiler {
  constructor(private readonly modelKey: string) {}

  invalid(detail: string): DefinitionValidationError {
    return new DefinitionValidationError(this.modelKey, detail);
  }

  /** Runs a compile step and reports its failure against the definition. */
  private step<T>(where: string, fn: () => T): T {
    try {
      return fn();
    } catch (error: unknown) {
      if (error instanceof DefinitionValidationError) throw error;
      const message = error instanceof Error ? error.message : String(error);
      throw this.invalid(`${where}: ${message}`);
    }
  }

  variable(name: string, source: StateVariableSource): StateVariableSpec {
    if (!IDENTIFIER.test(name)) throw this.invalid(`state variable name '${name}' is not an identifier`);

    const spec = buildVariable(name, source);
    const check = checkStateValue(spec, spec.default, 'reject');
    if (!check.ok) {
      throw this.invalid(`state.${name} default ${String(spec.default)} is not a valid ${check.expected}`);
    }
    return Object.freeze(spec);
  }

  param(name: string, source: ParamSource): ParamSpec {
    if (!IDENTIFIER.test(name)) throw this.invalid(`parameter name '${name}' is not an identifier`);

    let spec: ParamSpec;
    switch (source.type) {
      case 'integer':
        spec = { name, type: 'integer', min: source.min, max: source.max };
        break;
      case 'enum':
        spec = { name, type: 'enum', values: Object.freeze([...source.values]) };
        break;
      case 'boolean':
        spec = {
          name,
          type: 'boolean',
          trueValues: Object.freeze([...(source.true ?? BOOLEAN_TRUE_VALUES)]),
          falseValues: Object.freeze([...(source.false ?? BOOLEAN_FALSE_VALUES)]),
        };
        break;
      default:
        spec = { name, type: 'text' };
    }
    return Object.freeze(spec);
  }

  binding(
    where: string,
    variable: StateVariableSpec,
    source: WriteBindingSource,
    params: ReadonlyMap<string, ParamSpec>
  ): WriteBinding {
    if ('param' in source) {
      const param = params.get(source.param);
      if (!param) throw this.invalid(`${where} references unknown parameter '${source.param}'`);
      const compatible =
        param.type === variable.type || (param.type === 'text' && variable.type === 'enum');
      if (!compatible) {
        throw this.invalid(
          `${where} cannot store ${param.type} parameter '${param.name}' in ${variable.type} variable`
        );
      }
      return bound({ variable: variable.name, kind: 'param', param: source.param });
    }

    if ('value' in source) {
      const check = checkStateValue(variable, source.value, 'reject');
      if (!check.ok) {
        throw this.invalid(`${where} constant ${String(source.value)} is not a valid ${check.expected}`);
      }
      return bound({ variable: variable.name, kind: 'constant', value: source.value });
    }

    if ('step' in source) {
      if (variable.type !== 'integer') throw this.invalid(`${where} step needs an integer variable`);
      return bound({ variable: variable.name, kind: 'step', delta: source.step });
    }

    if (variable.type !== 'boolean') throw this.invalid(`${where} toggle needs a boolean variable`);
    return bound({ variable: variable.name, kind: 'toggle' });
  }

  command(
    source: CommandSource,
    variables: ReadonlyMap<string, StateVariableSpec>,
    caseInsensitive: boolean
  ): CommandSpec {
    const where = `command '${source.name}'`;

    const params = new Map<string, ParamSpec>();
    for (const [name, param] of Object.entries(source.params ?? {})) {
      params.set(name, this.param(name, param));
    }

    const pattern = this.step(where, () => compilePattern(source.pattern, params, caseInsensitive));

    const writes: WriteBinding[] = [];
    for (const [name, binding] of Object.entries(source.writes ?? {})) {
      const variable = variables.get(name);
      if (!variable) throw this.invalid(`${where} writes unknown state variable '${name}'`);
      writes.push(this.binding(`${where} write '${name}'`, variable, binding, params));
    }

    let response: CompiledTemplate | null = null;
    if (source.response !== undefined) {
      const template = source.response;
      response = this.step(`${where} response`, () => compileTemplate(template, params, variables));
    }

    let error: CompiledTemplate | null = null;
    if (source.error !== undefined) {
      if (writes.length === 0) throw this.invalid(`${where} has an error template but writes nothing`);
      const template = source.error;
      error = this.step(`${where} error`, () => compileTemplate(template, params, variables));
    }

    const spec: CommandSpec = {
      name: source.name,
      description: source.description ?? '',
      kind: writes.length > 0 ? 'set' : 'query',
      pattern,
      params,
      response,
      error,
      reads: Object.freeze(templateReads(response)),
      writes: Object.freeze(writes),
    };
    return Object.freeze(spec);
  }
}

/** Fills in the default a variable starts from when the file gives none. */
function buildVariable(name: string, source: StateVariableSource): StateVariableSpec {
  switch (source.type) {
    case 'integer': {
      // zero, pulled into the declared range
      let fallback = 0;
      if (source.min !== undefined && fallback < source.min) fallback = source.min;
      if (source.max !== undefined && fallback > source.max) fallback = source.max;
      return { name, type: 'integer', min: source.min, max: source.max, default: source.default ?? fallback };
    }
    case 'enum':
      return {
        name,
        type: 'enum',
        values: Object.freeze([...source.values]),
        default: source.default ?? source.values[0] ?? '',
      };
    case 'boolean': {
      const labels = source.labels ?? BOOLEAN_LABELS;
      return {
        name,
        type: 'boolean',
        default: source.default ?? false,
        labels: Object.freeze({ true: labels.true, false: labels.false }),
      };
    }
  }
}
