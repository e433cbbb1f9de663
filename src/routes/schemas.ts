import { z } from 'zod';
import { ValidationError } from '../errors.js';
import { MAX_LIMIT, DEFAULT_LIMIT } from '../services/catalog/content-query.service.js';

const intParam = z
  .string()
  .trim()
  .regex(/^-?\d+$/, 'must be an integer')
  .transform(Number);

// Used verbatim as a substring pattern; empty values are ignored by the query layer
const textParam = z.string().optional();

export const paginationSchema = z.object({
  limit: intParam.pipe(z.number().int().min(1).max(MAX_LIMIT)).default(String(DEFAULT_LIMIT)),
  offset: intParam.pipe(z.number().int().min(0)).default('0'),
});

export const contentListSchema = paginationSchema.extend({
  type: textParam,
  rating: textParam,
  release_year: intParam.optional(),
  country: textParam,
  category: textParam,
  title: textParam,
  director: textParam,
  cast: textParam,
});

export const searchSchema = paginationSchema.extend({
  q: z.string({ required_error: 'is required' }).min(1, 'must not be empty'),
});

export const contentIdSchema = z.object({
  id: intParam,
});

export const loadDataSchema = z.object({
  csv_path: z.string().trim().min(1).optional(),
});

export const registerSchema = z.object({
  username: z.string().trim().min(3).max(64),
  email: z.string().trim().email().optional(),
  password: z.string().min(8).max(128),
});

export const loginSchema = z.object({
  username: z.string().trim().min(1),
  password: z.string().min(1),
});

/**
 * Validate request input; failures become a ValidationError listing each field.
 */
export function parseInput<S extends z.ZodTypeAny>(schema: S, input: unknown): z.output<S> {
  const result = schema.safeParse(input);
  if (!result.success) {
    throw new ValidationError(
      'Invalid request parameters',
      result.error.errors.map((issue) => ({
        field: issue.path.join('.') || 'request',
        message: issue.message,
      }))
    );
  }
  return result.data;
}
