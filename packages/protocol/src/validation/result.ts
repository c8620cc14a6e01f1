// Shared parse result shape for protocol validators

import type { z } from 'zod';

/**
 * One problem found in an input value.
 */
export type FieldIssue = {
  /** Dotted path to the offending field, empty for the root */
  path: string;
  message: string;
};

export type ParseResult<T> =
  | { valid: true; value: T }
  | { valid: false; issues: FieldIssue[] };

/**
 * Run a zod schema and flatten its issues into FieldIssues.
 */
export function parseWith<TSchema extends z.ZodTypeAny>(
  schema: TSchema,
  input: unknown
): ParseResult<z.output<TSchema>> {
  const result = schema.safeParse(input);
  if (result.success) {
    return { valid: true, value: result.data };
  }
  return {
    valid: false,
    issues: result.error.issues.map((issue) => ({
      path: issue.path.join('.'),
      message: issue.message,
    })),
  };
}
