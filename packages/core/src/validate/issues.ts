import type { z } from 'zod';

/**
 * Group validation messages by the dotted path of the offending field
 */
export function issuesByField(error: z.ZodError): Record<string, string[]> {
  const errors: Record<string, string[]> = {};
  for (const issue of error.issues) {
    const field = issue.path.map(String).join(`.`) || `(root)`;
    (errors[field] ??= []).push(issue.message);
  }
  return errors;
}
