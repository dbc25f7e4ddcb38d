// src/definition/template-compiler.ts

import type {
  CompiledTemplate,
  IntegerFormat,
  ParamSpec,
  StateVariableSpec,
  TemplateSegment,
} from '../types/emulator-types.js';
import { parseIntegerFormat } from '../utils/values.js';
import { tokenizePlaceholders } from './placeholders.js';

/**
 * Compiles a response template. A placeholder names a parameter of the
 * command first and a state variable second.
 * @throws Error when a placeholder resolves to nothing or carries a bad format
 */
export function compileTemplate(
  source: string,
  params: ReadonlyMap<string, ParamSpec>,
  variables: ReadonlyMap<string, StateVariableSpec>
): CompiledTemplate {
  const segments: TemplateSegment[] = tokenizePlaceholders(source).map((token): TemplateSegment => {
    if (token.kind === 'literal') return { kind: 'literal', text: token.text };

    const param = params.get(token.name);
    const variable = variables.get(token.name);
    if (!param && !variable) {
      throw new Error(`placeholder '{${token.name}}' matches no parameter or state variable`);
    }

    let format: IntegerFormat | null = null;
    if (token.format !== null) {
      format = parseIntegerFormat(token.format);
      if (!format) throw new Error(`invalid format '${token.format}' in '{${token.name}}'`);
      const type = param ? param.type : variable?.type;
      if (type !== 'integer') {
        throw new Error(`format on '{${token.name}}' applies to integers only`);
      }
    }

    return param
      ? { kind: 'param', name: token.name, format }
      : { kind: 'state', name: token.name, format };
  });

  return Object.freeze({ source, segments: Object.freeze(segments) });
}

/** State variables a compiled template reads, in order of first use */
export function templateReads(template: CompiledTemplate | null): string[] {
  if (!template) return [];
  const names: string[] = [];
  for (const segment of template.segments) {
    if (segment.kind === 'state' && !names.includes(segment.name)) names.push(segment.name);
  }
  return names;
}
