import type { z } from 'zod';
import { AppError } from '../../utils/errors.js';

export function parseToolInput<T extends z.ZodTypeAny>(
  toolName: string,
  schema: T,
  input: Record<string, unknown>
): z.infer<T> {
  const parsed = schema.safeParse(input);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map(issue => `${issue.path.join('.') || 'input'}: ${issue.message}`)
      .join('; ');
    throw AppError.validation(`Invalid input for ${toolName}: ${issues}`, parsed.error.issues);
  }
  return parsed.data;
}
