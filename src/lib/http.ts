import { NextResponse, type NextRequest } from 'next/server';
import { z } from 'zod';
import { InvalidRequestError, QuizError } from '@/lib/errors';

const idSchema = z
  .string()
  .regex(/^\d+$/)
  .pipe(z.coerce.number().int().positive());

/**
 * Turn a thrown error into a JSON response.
 * Quiz errors carry their own status; anything else is logged and reported as 500.
 */
export function errorResponse(error: unknown): NextResponse {
  if (error instanceof QuizError) {
    return NextResponse.json({ error: error.message, code: error.code }, { status: error.status });
  }

  console.error('Unhandled error while processing request:', error);
  return NextResponse.json(
    { error: 'Internal server error', code: 'INTERNAL_ERROR' },
    { status: 500 }
  );
}

/**
 * Parse a numeric route segment such as an attempt or answer id.
 */
export function parseId(value: string, name: string): number {
  const result = idSchema.safeParse(value);
  if (!result.success) {
    throw new InvalidRequestError(`${name} must be a positive integer`);
  }
  return result.data;
}

/**
 * Read the JSON body of a request and validate it against a schema.
 */
export async function parseBody<T extends z.ZodTypeAny>(
  request: NextRequest,
  schema: T
): Promise<z.output<T>> {
  let body: unknown;
  try {
    body = await request.json();
  } catch {
    throw new InvalidRequestError('Request body must be valid JSON');
  }

  const result = schema.safeParse(body);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
      .join('; ');
    throw new InvalidRequestError(details);
  }
  return result.data;
}
