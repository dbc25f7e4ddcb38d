import { describe, expect, it } from 'vitest';
import { CommandMatcher } from '../src/emulator/command-matcher.js';
import type { MatchResult } from '../src/types/emulator-types.js';
import { ampDefinition, bundledDefinition } from './helpers/definitions.js';

function commandName(result: MatchResult): string | null {
  return result.matched ? result.command.name : null;
}

describe('CommandMatcher', () => {
  const matcher = new CommandMatcher(ampDefinition());

  it('keeps query and set forms apart', () => {
    expect(commandName(matcher.match('VOL?'))).toBe('volume.get');
    expect(commandName(matcher.match('VOL=55'))).toBe('volume.set');
  });

  it('extracts typed parameters with their raw tokens', () => {
    const result = matcher.match('PRESET 2 VOL +030');
    expect(result.matched).toBe(true);
    if (!result.matched) return;
    expect(result.command.name).toBe('preset');
    expect(result.params.get('number')).toEqual({ value: 2, raw: '2' });
    expect(result.params.get('level')).toEqual({ value: 30, raw: '+030' });
  });

  it('maps declared boolean spellings', () => {
    const result = matcher.match('PWR=OFF');
    expect(commandName(result)).toBe('power.set');
    expect(result.matched && result.params.get('on')).toEqual({ value: false, raw: 'OFF' });
  });

  it('does not match a token outside the slot bounds', () => {
    expect(matcher.match('BAL=11')).toEqual({ matched: false, input: 'BAL=11' });
    expect(commandName(matcher.match('BAL=-10'))).toBe('balance.set');
  });

  it('requires the whole line to match', () => {
    expect(matcher.match('VOL?X').matched).toBe(false);
    expect(matcher.match('XVOL?').matched).toBe(false);
    expect(matcher.match('PWR=1').matched).toBe(false);
  });

  it('returns the unmatched result for malformed input', () => {
    expect(matcher.match('')).toEqual({ matched: false, input: '' });
    expect(matcher.match('\u0000ÿ{}(')).toEqual({ matched: false, input: '\u0000ÿ{}(' });
  });

  it('is deterministic', () => {
    const first = matcher.match('ECHO hi there');
    const second = matcher.match('ECHO hi there');
    expect(commandName(first)).toBe('echo');
    expect(commandName(second)).toBe('echo');
    expect(first.matched && first.params.get('message')?.value).toBe('hi there');
  });

  it('ignores case when the definition asks for it', () => {
    const cd2 = new CommandMatcher(bundledDefinition('lyngdorf/cd2'));
    expect(commandName(cd2.match('!play'))).toBe('play');
    expect(commandName(cd2.match('!Track?'))).toBe('track.get');
    expect(commandName(matcher.match('vol?'))).toBeNull();
  });
});
