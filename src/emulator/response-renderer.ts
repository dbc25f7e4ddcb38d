// src/emulator/response-renderer.ts

import type { ProtocolDefinition } from '../definition/protocol-definition.js';
import type {
  CommandSpec,
  CompiledTemplate,
  MatchedParam,
  StateValue,
} from '../types/emulator-types.js';
import { formatParamValue, formatStateValue } from '../utils/values.js';

export type StateReader = (name: string) => StateValue;

/**
 * Substitutes matched parameters and current state into compiled templates.
 * Rendering has no side effects; a null result means the device stays silent.
 */
export class ResponseRenderer {
  constructor(private readonly definition: ProtocolDefinition) {}

  /** Response of a query, or of a set whose write was applied */
  response(
    command: CommandSpec,
    params: ReadonlyMap<string, MatchedParam>,
    readState: StateReader
  ): string | null {
    return command.response ? this.render(command.response, params, readState) : null;
  }

  /** Response of a set whose write was rejected */
  error(
    command: CommandSpec,
    params: ReadonlyMap<string, MatchedParam>,
    readState: StateReader
  ): string | null {
    return command.error ? this.render(command.error, params, readState) : null;
  }

  unrecognized(): string | null {
    return this.definition.unrecognized;
  }

  render(
    template: CompiledTemplate,
    params: ReadonlyMap<string, MatchedParam>,
    readState: StateReader
  ): string {
    let out = '';
    for (const segment of template.segments) {
      switch (segment.kind) {
        case 'literal':
          out += segment.text;
          break;
        case 'param': {
          const param = params.get(segment.name);
          if (!param) throw new Error(`Parameter '${segment.name}' was not matched`);
          out += formatParamValue(param, segment.format);
          break;
        }
        case 'state': {
          const spec = this.definition.variable(segment.name);
          if (!spec) throw new Error(`State variable '${segment.name}' is not declared`);
          out += formatStateValue(spec, readState(segment.name), segment.format);
          break;
        }
      }
    }
    return out;
  }
}
