import { z } from 'zod';

/**
 * Resolves a parameter that may arrive under its snake_case name or a
 * camelCase alias. Both spellings set to different values is an issue.
 */
export const preferParam = <T>(
  ctx: z.RefinementCtx,
  name: string,
  value: T | undefined,
  alias: string,
  aliasValue: T | undefined,
): T | undefined => {
  if (value !== undefined && aliasValue !== undefined && value !== aliasValue) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: [alias],
      message: `conflicts with ${name}`,
    });
  }
  return value ?? aliasValue;
};
