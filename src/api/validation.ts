import { z } from 'zod';
import { ValidationError } from '../core/errors.js';

export const analyzeUrlSchema = z.object({
  url: z.string({ required_error: 'Missing required field: url', invalid_type_error: 'url must be a string' })
    .max(2048, 'url exceeds max length of 2048'),
});

export type AnalyzeUrlBody = z.infer<typeof analyzeUrlSchema>;

export function parseBody<T extends z.ZodTypeAny>(schema: T, body: unknown): z.infer<T> {
  if (!body || typeof body !== 'object') {
    throw new ValidationError('Request body must be JSON');
  }
  const parsed = schema.safeParse(body);
  if (!parsed.success) {
    throw new ValidationError(parsed.error.issues[0]?.message ?? 'Invalid request body');
  }
  return parsed.data;
}
