// src/definition/definition-validator.ts

import { z } from 'zod';
import { DefinitionValidationError } from '../errors.js';
import type { ProtocolDefinitionSource } from '../types/emulator-types.js';

const PORT_RANGE = 'must be between 1 and 65535';
const NON_EMPTY_STRINGS = 'must be a non-empty array of non-empty strings';
const ONE_BINDING = 'must have exactly one of param, value, step, toggle';

/** Names the allowed `type` values when the discriminator does not match */
const typeErrorMap: z.ZodErrorMap = (issue, ctx) => {
  if (issue.code === z.ZodIssueCode.invalid_union_discriminator) {
    return { message: `must be one of ${issue.options.map(String).join(', ')}` };
  }
  return { message: ctx.defaultError };
};

const bindingErrorMap: z.ZodErrorMap = (issue, ctx) => {
  if (issue.code === z.ZodIssueCode.invalid_union) return { message: ONE_BINDING };
  return { message: ctx.defaultError };
};

const integer = z.number({ invalid_type_error: 'must be an integer' }).int('must be an integer');
const nonEmptyString = z.string().min(1, 'must be a non-empty string');
const nonEmptyStrings = z.array(nonEmptyString).min(1, NON_EMPTY_STRINGS);

function checkBounds(value: { type: string; min?: number; max?: number }, ctx: z.RefinementCtx): void {
  if (value.type !== 'integer' || value.min === undefined || value.max === undefined) return;
  if (value.min > value.max) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['min'],
      message: `min ${value.min} is greater than max ${value.max}`,
    });
  }
}

// ============================================
// State variables
// ============================================

const integerVariableSchema = z.object({
  type: z.literal('integer'),
  min: integer.optional(),
  max: integer.optional(),
  default: integer.optional(),
});

const enumVariableSchema = z.object({
  type: z.literal('enum'),
  values: nonEmptyStrings,
  default: z.string().optional(),
});

const booleanVariableSchema = z.object({
  type: z.literal('boolean'),
  default: z.boolean({ invalid_type_error: 'must be a boolean' }).optional(),
  labels: z.object({ true: z.string(), false: z.string() }).optional(),
});

const stateVariableSchema = z
  .discriminatedUnion('type', [integerVariableSchema, enumVariableSchema, booleanVariableSchema], {
    errorMap: typeErrorMap,
  })
  .superRefine(checkBounds);

// ============================================
// Command parameters and write bindings
// ============================================

const paramSchema = z
  .discriminatedUnion(
    'type',
    [
      z.object({ type: z.literal('integer'), min: integer.optional(), max: integer.optional() }),
      z.object({ type: z.literal('enum'), values: nonEmptyStrings }),
      z.object({ type: z.literal('boolean'), true: nonEmptyStrings.optional(), false: nonEmptyStrings.optional() }),
      z.object({ type: z.literal('text') }),
    ],
    { errorMap: typeErrorMap }
  )
  .superRefine(checkBounds);

const writeBindingSchema = z.union(
  [
    z.object({ param: nonEmptyString }).strict(ONE_BINDING),
    z.object({ value: z.union([z.number(), z.string(), z.boolean()]) }).strict(ONE_BINDING),
    z
      .object({ step: integer.refine(step => step !== 0, 'must be a non-zero integer') })
      .strict(ONE_BINDING),
    z.object({ toggle: z.literal(true) }).strict(ONE_BINDING),
  ],
  { errorMap: bindingErrorMap }
);

const commandSchema = z.object({
  name: nonEmptyString,
  description: z.string().optional(),
  pattern: nonEmptyString,
  params: z.record(paramSchema).optional(),
  response: z.string().optional(),
  error: z.string().optional(),
  writes: z.record(writeBindingSchema).optional(),
});

// ============================================
// Complete definition
// ============================================

const definitionSchema = z.object(
  {
    model: nonEmptyString,
    device: z
      .object({
        manufacturer: z.string().optional(),
        model: z.string().optional(),
        description: z.string().optional(),
      })
      .optional(),
    connection: z.object({ port: integer.min(1, PORT_RANGE).max(65535, PORT_RANGE).optional() }).optional(),
    framing: z
      .object({
        commandEol: z.string().optional(),
        responseEol: z.string().optional(),
        caseInsensitive: z.boolean({ invalid_type_error: 'must be a boolean' }).optional(),
      })
      .optional(),
    unrecognized: z.string().optional(),
    state: z.record(stateVariableSchema, { invalid_type_error: 'must be an object' }),
    commands: z.array(commandSchema).min(1, 'must be a non-empty array'),
  },
  { invalid_type_error: 'definition must be a JSON object' }
);

function formatPath(path: (string | number)[]): string {
  return path.reduce<string>((out, key) => {
    if (typeof key === 'number') return `${out}[${key}]`;
    return out === '' ? key : `${out}.${key}`;
  }, '');
}

function describeIssue(issue: z.ZodIssue): string {
  const path = formatPath(issue.path);
  return path === '' ? issue.message : `${path}: ${issue.message}`;
}

/**
 * Validates the structure of a parsed definition file. Cross references
 * (slots, placeholders, bindings) are checked when the definition compiles.
 * @param raw - Parsed JSON
 * @param origin - Model key or file name used in error messages
 * @throws DefinitionValidationError listing every structural problem
 */
export function validateDefinitionSource(raw: unknown, origin: string): ProtocolDefinitionSource {
  const result = definitionSchema.safeParse(raw);
  if (!result.success) {
    throw new DefinitionValidationError(origin, result.error.issues.map(describeIssue).join('; '));
  }
  return result.data;
}
