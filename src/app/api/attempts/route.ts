import { NextRequest, NextResponse } from 'next/server';
import { z } from 'zod';
import { listRecentAttempts } from '@/lib/attempts';
import { requireUser } from '@/lib/auth';
import { getDb } from '@/lib/db';
import { errorResponse, parseBody } from '@/lib/http';
import { startAttempt } from '@/lib/sampler';

const startAttemptSchema = z.object({
  categoryId: z.number().int().positive(),
});

/**
 * GET /api/attempts
 * Returns the current user's five most recently completed attempts.
 */
export async function GET(request: NextRequest) {
  try {
    const userId = requireUser(request);
    const attempts = listRecentAttempts(getDb(), userId);
    return NextResponse.json({ attempts });
  } catch (error) {
    return errorResponse(error);
  }
}

/**
 * POST /api/attempts
 * Starts a new quiz with up to 10 random questions from a category.
 *
 * Request body:
 * - categoryId: number
 */
export async function POST(request: NextRequest) {
  try {
    const userId = requireUser(request);
    const { categoryId } = await parseBody(request, startAttemptSchema);

    const attempt = startAttempt(getDb(), userId, categoryId);
    return NextResponse.json({ attempt }, { status: 201 });
  } catch (error) {
    return errorResponse(error);
  }
}
