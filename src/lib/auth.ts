import type { NextRequest } from 'next/server';
import { getConfig } from '@/lib/config';
import { UnauthorizedError } from '@/lib/errors';

/**
 * Resolve the current user id set by the authentication layer in front of the app.
 */
export function getCurrentUser(request: NextRequest): string | null {
  const userId = request.headers.get(getConfig().userHeader)?.trim();
  return userId ? userId : null;
}

export function requireUser(request: NextRequest): string {
  const userId = getCurrentUser(request);
  if (!userId) {
    throw new UnauthorizedError();
  }
  return userId;
}
