import { z } from 'zod';

export interface FieldIssue {
  path: string;
  message: string;
}

/**
 * Validates request fields against a Zod schema, flattening issues into
 * `{ path, message }` pairs for the error response.
 */
export function validateBody<T extends z.ZodType>(
  schema: T,
  body: unknown,
): { success: true; data: z.infer<T> } | { success: false; issues: FieldIssue[] } {
  const result = schema.safeParse(body);
  if (!result.success) {
    return {
      success: false,
      issues: result.error.issues.map((issue) => ({
        path: issue.path.join('.') || '(root)',
        message: issue.message,
      })),
    };
  }
  return { success: true, data: result.data };
}
