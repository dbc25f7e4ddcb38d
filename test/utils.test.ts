import { describe, expect, it } from 'vitest';
import { commandStem, levenshtein, similarity, suggestCommands } from '../src/utils/suggest.js';
import { formatDataIntoColumns, normalizeModelKey, underscoreModelKey } from '../src/utils/utils.js';
import { bundledDefinition } from './helpers/definitions.js';

describe('normalizeModelKey', () => {
  it('accepts both spellings', () => {
    expect(normalizeModelKey(' McIntosh_MX160 ')).toBe('mcintosh/mx160');
    expect(normalizeModelKey('mcintosh/mx160')).toBe('mcintosh/mx160');
  });

  it('only reads the first underscore as the separator', () => {
    expect(normalizeModelKey('acme_amp_2')).toBe('acme/amp_2');
    expect(normalizeModelKey('acme/amp_2')).toBe('acme/amp_2');
  });

  it('converts back to the underscore spelling', () => {
    expect(underscoreModelKey('acme/amp_2')).toBe('acme_amp_2');
  });
});

describe('formatDataIntoColumns', () => {
  it('fills rows to the available width', () => {
    expect(formatDataIntoColumns(['a', 'b', 'c'], 60)).toBe(
      `${'a'.padEnd(30)}${'b'.padEnd(30)}\n${'c'.padEnd(30)}`
    );
  });

  it('puts at least one entry on each row', () => {
    expect(formatDataIntoColumns(['a', 'b'], 10)).toBe(`${'a'.padEnd(30)}\n${'b'.padEnd(30)}`);
    expect(formatDataIntoColumns([])).toBe('');
  });
});

describe('suggestions', () => {
  it('cuts commands at their first argument', () => {
    expect(commandStem('!VOL(-20)')).toBe('!VOL');
    expect(commandStem('!VOL({level})')).toBe('!VOL');
    expect(commandStem('!POWER?')).toBe('!POWER?');
    expect(commandStem('INPUT 3')).toBe('INPUT');
  });

  it('measures edit distance', () => {
    expect(levenshtein('kitten', 'sitting')).toBe(3);
    expect(levenshtein('', 'abc')).toBe(3);
    expect(similarity('abc', 'abc')).toBe(1);
    expect(similarity('abcd', 'abxy')).toBe(0.5);
  });

  it('suggests the closest command patterns in definition order', () => {
    const mx160 = bundledDefinition('mcintosh/mx160');
    expect(suggestCommands('!VOLUME(5)', mx160)).toEqual(['!VOL?', '!VOL({level})', '!VOL+']);
    expect(suggestCommands('(5)', mx160)).toEqual([]);
    expect(suggestCommands('#########', mx160)).toEqual([]);
  });
});
