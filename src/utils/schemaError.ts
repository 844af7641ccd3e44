import type { ZodError } from 'zod';

export const toValidationProblem = <T>(err: ZodError<T>) => ({
  error: 'Invalid payload',
  issues: err.flatten(),
});
