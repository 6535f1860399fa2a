import { NextRequest, NextResponse } from 'next/server';
import { requireUser } from '@/lib/auth';
import { listCategories } from '@/lib/catalog';
import { getDb } from '@/lib/db';
import { errorResponse } from '@/lib/http';

/**
 * GET /api/categories
 * Returns all quiz categories, ordered by name.
 */
export async function GET(request: NextRequest) {
  try {
    requireUser(request);
    const categories = listCategories(getDb());
    return NextResponse.json({ categories });
  } catch (error) {
    return errorResponse(error);
  }
}
