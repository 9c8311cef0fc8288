import type { Context } from 'hono';
import type { ContentfulStatusCode } from 'hono/utils/http-status';
import { ZodError } from 'zod';

export type ErrorCode =
  | 'INVALID_ARGUMENT'
  | 'INVALID_CATALOG'
  | 'NOT_FOUND'
  | 'INTERNAL';

export type ErrorResponse = {
  error: {
    code: ErrorCode;
    message: string;
  };
};

export class AppError extends Error {
  constructor(
    readonly status: ContentfulStatusCode,
    readonly code: ErrorCode,
    message: string,
  ) {
    super(message);
    this.name = 'AppError';
  }
}

export function formatZodError(err: ZodError): string {
  return err.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

export function toErrorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}

export function handleError(err: unknown, c: Context): Response {
  if (err instanceof AppError) {
    const body: ErrorResponse = { error: { code: err.code, message: err.message } };
    return c.json(body, err.status);
  }

  if (err instanceof ZodError) {
    const body: ErrorResponse = { error: { code: 'INVALID_ARGUMENT', message: formatZodError(err) } };
    return c.json(body, 400);
  }

  // Internals stay in the process log.
  console.error('status: unhandled error', err);
  const body: ErrorResponse = { error: { code: 'INTERNAL', message: 'Internal Server Error' } };
  return c.json(body, 500);
}

export function handleNotFound(c: Context): Response {
  const body: ErrorResponse = { error: { code: 'NOT_FOUND', message: 'Not Found' } };
  return c.json(body, 404);
}
