/**
 * Policy configuration parsing
 */

import { ValidationError } from '@streamplan/core';
import type { z } from 'zod';

/**
 * Parse policy settings, reporting the first rejected field
 */
export function parsePolicyConfig<TSchema extends z.ZodTypeAny>(
  schema: TSchema,
  input: unknown,
  policyName: string
): z.output<TSchema> {
  const result = schema.safeParse(input);
  if (!result.success) {
    const issue = result.error.issues[0];
    const field = issue && issue.path.length > 0 ? issue.path.join('.') : policyName;
    throw new ValidationError(field, issue?.message ?? 'invalid settings');
  }
  return result.data;
}
