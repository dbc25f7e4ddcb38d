// src/utils/suggest.ts

import type { ProtocolDefinition } from '../definition/protocol-definition.js';

const MAX_SUGGESTIONS = 3;
const MIN_SIMILARITY = 0.4;

/** Command text before its first argument: `!VOL(-20)` -> `!VOL` */
export function commandStem(text: string): string {
  return text.replace(/[({\d].*$/s, '').trim();
}

export function levenshtein(a: string, b: string): number {
  if (a === b) return 0;
  if (a.length === 0) return b.length;
  if (b.length === 0) return a.length;

  let previous = Array.from({ length: b.length + 1 }, (_, j) => j);
  for (let i = 1; i <= a.length; i++) {
    const current = [i];
    for (let j = 1; j <= b.length; j++) {
      const cost = a.charAt(i - 1) === b.charAt(j - 1) ? 0 : 1;
      current.push(
        Math.min((previous[j] ?? 0) + 1, (current[j - 1] ?? 0) + 1, (previous[j - 1] ?? 0) + cost)
      );
    }
    previous = current;
  }
  return previous[b.length] ?? 0;
}

/** 1 for equal strings, 0 for strings with nothing in common */
export function similarity(a: string, b: string): number {
  const length = Math.max(a.length, b.length);
  if (length === 0) return 1;
  return 1 - levenshtein(a, b) / length;
}

/**
 * Command patterns whose stem resembles the stem of an unrecognized line,
 * best first.
 */
export function suggestCommands(input: string, definition: ProtocolDefinition): string[] {
  const stem = commandStem(input).toUpperCase();
  if (!stem) return [];

  const scored: Array<{ pattern: string; score: number }> = [];
  for (const command of definition.commands()) {
    const pattern = command.pattern.source;
    if (scored.some(s => s.pattern === pattern)) continue;
    const score = similarity(stem, commandStem(pattern).toUpperCase());
    if (score >= MIN_SIMILARITY) scored.push({ pattern, score });
  }

  // stable sort keeps definition order between equal scores
  return scored
    .sort((a, b) => b.score - a.score)
    .slice(0, MAX_SUGGESTIONS)
    .map(s => s.pattern);
}
