// src/emulator/command-matcher.ts

import type { ProtocolDefinition } from '../definition/protocol-definition.js';
import type { CommandSpec, MatchedParam, MatchResult } from '../types/emulator-types.js';
import { parseParamToken } from '../utils/values.js';

/**
 * Matches input lines against the commands of one definition.
 *
 * Commands are tried in definition order and the first full match wins. A
 * line whose token fails its slot type (say an integer out of the slot's
 * bounds) does not match that command, and the next one is tried.
 */
export class CommandMatcher {
  constructor(private readonly definition: ProtocolDefinition) {}

  match(line: string): MatchResult {
    const caseInsensitive = this.definition.framing.caseInsensitive;
    for (const command of this.definition.commands()) {
      const params = matchCommand(command, line, caseInsensitive);
      if (params) return { matched: true, command, params };
    }
    return { matched: false, input: line };
  }
}

/**
 * @returns extracted parameters, or null when the line is not this command
 */
export function matchCommand(
  command: CommandSpec,
  line: string,
  caseInsensitive: boolean = false
): Map<string, MatchedParam> | null {
  const match = command.pattern.regex.exec(line);
  if (!match) return null;

  const params = new Map<string, MatchedParam>();
  for (let i = 0; i < command.pattern.slots.length; i++) {
    const name = command.pattern.slots[i];
    const raw = match[i + 1];
    const param = name === undefined ? undefined : command.params.get(name);
    if (name === undefined || raw === undefined || !param) return null;

    const value = parseParamToken(param, raw, caseInsensitive);
    if (value === undefined) return null;
    params.set(name, { value, raw });
  }
  return params;
}
