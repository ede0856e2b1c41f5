import { z } from 'zod';
import { ValidationError } from './errors';

export function validateSchema<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, data: unknown): T {
  const result = schema.safeParse(data);

  if (!result.success) {
    const errors = result.error.issues
      .map((err) => (err.path.length > 0 ? `${err.path.join('.')}: ${err.message}` : err.message))
      .join(', ');

    throw new ValidationError(`Validation failed: ${errors}`);
  }

  return result.data;
}
