import { ZodError } from 'zod';

export class ValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ValidationError';
  }
}

export function errorMessage(err: unknown): string {
  if (err instanceof ZodError) {
    return err.issues.map((i) => `${i.path.join('.') || 'body'}: ${i.message}`).join('; ');
  }
  if (err instanceof Error) return err.message || 'Unknown error';
  return 'Unknown error';
}

export function isClientError(err: unknown): boolean {
  return err instanceof ValidationError || err instanceof ZodError;
}
