import { z } from 'zod';

export function formatZodError(error: z.ZodError): string {
  return error.issues
    .map(issue => (issue.path.length > 0 ? `${issue.path.join('.')} ${issue.message}` : issue.message))
    .join(', ');
}

// Environment variables and form fields arrive as strings; '' means "not provided"
export function blankAsUndefined<T extends z.ZodTypeAny>(schema: T) {
  return z.preprocess(value => (value === '' ? undefined : value), schema);
}
