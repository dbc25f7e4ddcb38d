import { describe, expect, it } from 'vitest';
import { tokenizePlaceholders } from '../src/definition/placeholders.js';

describe('tokenizePlaceholders', () => {
  it('splits literals and placeholders', () => {
    expect(tokenizePlaceholders('A{b}C{d:+03}')).toEqual([
      { kind: 'literal', text: 'A' },
      { kind: 'placeholder', name: 'b', format: null },
      { kind: 'literal', text: 'C' },
      { kind: 'placeholder', name: 'd', format: '+03' },
    ]);
  });

  it('reads doubled braces as literal braces', () => {
    expect(tokenizePlaceholders('X {{v1}} Y')).toEqual([{ kind: 'literal', text: 'X {v1} Y' }]);
  });

  it('returns no tokens for an empty string', () => {
    expect(tokenizePlaceholders('')).toEqual([]);
  });

  it('rejects an unterminated placeholder', () => {
    expect(() => tokenizePlaceholders('!VOL({level')).toThrow(/unterminated placeholder at offset 5/);
  });

  it('rejects a stray closing brace', () => {
    expect(() => tokenizePlaceholders('A}B')).toThrow(/unmatched '}' at offset 1/);
  });

  it('rejects placeholder names that are not identifiers', () => {
    expect(() => tokenizePlaceholders('{1x}')).toThrow("invalid placeholder '{1x}'");
    expect(() => tokenizePlaceholders('{}')).toThrow("invalid placeholder '{}'");
  });
});
