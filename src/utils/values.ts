// src/utils/values.ts

import type {
  IntegerFormat,
  MatchedParam,
  OutOfRangePolicy,
  ParamSpec,
  StateValue,
  StateVariableSpec,
} from '../types/emulator-types.js';

export type ValueCheck = { ok: true; value: StateValue } | { ok: false; expected: string };

const INTEGER_TOKEN = /^[+-]?\d+$/;
const INTEGER_FORMAT = /^(\+)?(0)?(\d*)$/;

/** Declared spelling of `token`, folding case when the device ignores it */
export function findSpelling(
  candidates: readonly string[],
  token: string,
  caseInsensitive: boolean
): string | undefined {
  if (!caseInsensitive) return candidates.find(c => c === token);
  const folded = token.toUpperCase();
  return candidates.find(c => c.toUpperCase() === folded);
}

/**
 * Converts a captured slot token to its typed value.
 * @returns the value, or undefined when the token does not satisfy the parameter type
 */
export function parseParamToken(
  param: ParamSpec,
  token: string,
  caseInsensitive: boolean = false
): StateValue | undefined {
  switch (param.type) {
    case 'integer': {
      if (!INTEGER_TOKEN.test(token)) return undefined;
      const value = Number(token);
      if (!Number.isSafeInteger(value)) return undefined;
      if (param.min !== undefined && value < param.min) return undefined;
      if (param.max !== undefined && value > param.max) return undefined;
      return value;
    }
    case 'enum':
      return findSpelling(param.values, token, caseInsensitive);
    case 'boolean':
      if (findSpelling(param.trueValues, token, caseInsensitive) !== undefined) return true;
      if (findSpelling(param.falseValues, token, caseInsensitive) !== undefined) return false;
      return undefined;
    case 'text':
      return token.length > 0 ? token : undefined;
  }
}

export function describeExpected(spec: StateVariableSpec): string {
  switch (spec.type) {
    case 'integer':
      if (spec.min !== undefined && spec.max !== undefined) {
        return `integer between ${spec.min} and ${spec.max}`;
      }
      if (spec.min !== undefined) return `integer >= ${spec.min}`;
      if (spec.max !== undefined) return `integer <= ${spec.max}`;
      return 'integer';
    case 'enum':
      return `one of ${spec.values.join(', ')}`;
    case 'boolean':
      return 'boolean';
  }
}

/**
 * Checks a candidate value against a state variable spec. Under the `clamp`
 * policy an out-of-bounds integer is pulled to the nearest bound; any other
 * mismatch is rejected under both policies.
 */
export function checkStateValue(
  spec: StateVariableSpec,
  value: StateValue,
  policy: OutOfRangePolicy = 'reject'
): ValueCheck {
  switch (spec.type) {
    case 'integer': {
      if (typeof value !== 'number' || !Number.isSafeInteger(value)) {
        return { ok: false, expected: describeExpected(spec) };
      }
      const belowMin = spec.min !== undefined && value < spec.min;
      const aboveMax = spec.max !== undefined && value > spec.max;
      if (!belowMin && !aboveMax) return { ok: true, value };
      if (policy === 'reject') return { ok: false, expected: describeExpected(spec) };
      if (belowMin && spec.min !== undefined) return { ok: true, value: spec.min };
      if (aboveMax && spec.max !== undefined) return { ok: true, value: spec.max };
      return { ok: false, expected: describeExpected(spec) };
    }
    case 'enum':
      if (typeof value === 'string' && spec.values.includes(value)) return { ok: true, value };
      return { ok: false, expected: describeExpected(spec) };
    case 'boolean':
      if (typeof value === 'boolean') return { ok: true, value };
      return { ok: false, expected: describeExpected(spec) };
  }
}

/**
 * Parses a placeholder format such as `+`, `03` or `+03`.
 * @returns null when the format string is not recognised
 */
export function parseIntegerFormat(format: string): IntegerFormat | null {
  if (format === '') return null;
  const match = INTEGER_FORMAT.exec(format);
  if (!match) return null;
  return {
    sign: match[1] === '+',
    zeroPad: match[2] === '0',
    width: match[3] ? Number(match[3]) : 0,
  };
}

/**
 * Formats an integer with printf-like conventions: the width counts the sign,
 * zero padding goes between the sign and the digits.
 */
export function formatInteger(value: number, format: IntegerFormat): string {
  const digits = String(Math.abs(value));
  const sign = value < 0 ? '-' : format.sign ? '+' : '';
  if (format.zeroPad) {
    return sign + digits.padStart(Math.max(format.width - sign.length, 0), '0');
  }
  return (sign + digits).padStart(format.width, ' ');
}

export function formatStateValue(
  spec: StateVariableSpec,
  value: StateValue,
  format: IntegerFormat | null = null
): string {
  if (spec.type === 'boolean') return value === true ? spec.labels.true : spec.labels.false;
  if (typeof value === 'number' && format) return formatInteger(value, format);
  return String(value);
}

/** A parameter echoes its raw token unless an integer format is requested. */
export function formatParamValue(param: MatchedParam, format: IntegerFormat | null = null): string {
  if (format && typeof param.value === 'number') return formatInteger(param.value, format);
  return param.raw;
}
