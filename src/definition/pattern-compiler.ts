// src/definition/pattern-compiler.ts

import type { CompiledPattern, ParamSpec } from '../types/emulator-types.js';
import { tokenizePlaceholders } from './placeholders.js';

export function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function alternatives(values: readonly string[]): string {
  // longest first so that HDMI10 is tried before HDMI1
  return [...values]
    .sort((a, b) => b.length - a.length)
    .map(escapeRegExp)
    .join('|');
}

function slotExpression(param: ParamSpec, isLast: boolean): string {
  switch (param.type) {
    case 'integer':
      return '[+-]?\\d+';
    case 'enum':
      return alternatives(param.values);
    case 'boolean':
      return alternatives([...param.trueValues, ...param.falseValues]);
    case 'text':
      return isLast ? '.+' : '.+?';
  }
}

/**
 * Compiles a command pattern such as `!VOL({level})` into an anchored
 * expression with one capture group per slot. Integer bounds and value
 * conversion are checked after the expression matches.
 * @throws Error when the pattern and its parameter specs disagree
 */
export function compilePattern(
  source: string,
  params: ReadonlyMap<string, ParamSpec>,
  caseInsensitive: boolean = false
): CompiledPattern {
  const tokens = tokenizePlaceholders(source);
  if (tokens.length === 0) throw new Error('pattern is empty');

  const slots: string[] = [];
  let expression = '^';

  tokens.forEach((token, index) => {
    if (token.kind === 'literal') {
      expression += escapeRegExp(token.text);
      return;
    }
    if (token.format !== null) {
      throw new Error(`slot '{${token.name}}' cannot carry a format`);
    }
    const param = params.get(token.name);
    if (!param) throw new Error(`slot '{${token.name}}' has no parameter spec`);
    if (slots.includes(token.name)) throw new Error(`slot '{${token.name}}' appears twice`);
    const previous = tokens[index - 1];
    if (previous && previous.kind === 'placeholder') {
      throw new Error(`slots '{${previous.name}}' and '{${token.name}}' need a literal between them`);
    }
    expression += `(${slotExpression(param, index === tokens.length - 1)})`;
    slots.push(token.name);
  });

  for (const name of params.keys()) {
    if (!slots.includes(name)) throw new Error(`parameter '${name}' is not used by the pattern`);
  }

  return Object.freeze({
    source,
    regex: new RegExp(`${expression}$`, caseInsensitive ? 'i' : ''),
    slots: Object.freeze(slots),
  });
}
