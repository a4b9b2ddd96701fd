import type { z } from 'zod'

/** Flatten zod issues into "path: message" lines for ValidationError. */
export function formatZodIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
}
