// src/definition/placeholders.ts

export type PlaceholderToken =
  | { kind: 'literal'; text: string }
  | { kind: 'placeholder'; name: string; format: string | null };

const PLACEHOLDER_BODY = /^([A-Za-z_][A-Za-z0-9_]*)(?::([^{}]*))?$/;

/**
 * Splits a pattern or template into literal runs and `{name}` / `{name:format}`
 * placeholders. `{{` and `}}` stand for literal braces.
 * @throws Error describing the first syntax problem
 */
export function tokenizePlaceholders(source: string): PlaceholderToken[] {
  const tokens: PlaceholderToken[] = [];
  let literal = '';
  let i = 0;

  while (i < source.length) {
    const ch = source.charAt(i);

    if (ch === '{') {
      if (source.charAt(i + 1) === '{') {
        literal += '{';
        i += 2;
        continue;
      }
      const end = source.indexOf('}', i + 1);
      if (end < 0) throw new Error(`unterminated placeholder at offset ${i} in '${source}'`);
      const body = source.slice(i + 1, end);
      const match = PLACEHOLDER_BODY.exec(body);
      if (!match || match[1] === undefined) {
        throw new Error(`invalid placeholder '{${body}}' in '${source}'`);
      }
      if (literal) {
        tokens.push({ kind: 'literal', text: literal });
        literal = '';
      }
      tokens.push({ kind: 'placeholder', name: match[1], format: match[2] ?? null });
      i = end + 1;
      continue;
    }

    if (ch === '}') {
      if (source.charAt(i + 1) === '}') {
        literal += '}';
        i += 2;
        continue;
      }
      throw new Error(`unmatched '}' at offset ${i} in '${source}'`);
    }

    literal += ch;
    i++;
  }

  if (literal) tokens.push({ kind: 'literal', text: literal });
  return tokens;
}
