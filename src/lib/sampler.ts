import type { Database } from 'better-sqlite3';
import { createAttempt } from '@/lib/attempts';
import { eligibleQuestions, getCategory } from '@/lib/catalog';
import { getConfig } from '@/lib/config';
import { NoQuestionsAvailableError } from '@/lib/errors';
import { sampleWithoutReplacement, type RandomSource } from '@/lib/random';
import type { Attempt } from '@/types/quiz';

export interface StartAttemptOptions {
  /** Defaults to Math.random */
  random?: RandomSource;
  maxQuestions?: number;
  passingScore?: number;
  timeLimit?: number;
}

/**
 * Start a new quiz attempt for a category.
 *
 * Picks up to `maxQuestions` distinct active questions uniformly at random and
 * stores the attempt with one empty, unflagged answer per question. The order
 * in which questions are drawn becomes the navigation order.
 */
export function startAttempt(
  db: Database,
  userId: string,
  categoryId: number,
  options: StartAttemptOptions = {}
): Attempt {
  const config = getConfig();
  const maxQuestions = options.maxQuestions ?? config.maxQuestions;
  if (!Number.isInteger(maxQuestions) || maxQuestions < 1) {
    throw new RangeError(`maxQuestions must be a positive integer, got ${maxQuestions}`);
  }

  const category = getCategory(db, categoryId);
  const pool = eligibleQuestions(db, categoryId);

  if (pool.length === 0) {
    throw new NoQuestionsAvailableError(category.name);
  }

  const count = Math.min(maxQuestions, pool.length);
  const selected = sampleWithoutReplacement(pool, count, options.random);

  return createAttempt(
    db,
    {
      user_id: userId,
      category_id: categoryId,
      total_questions: selected.length,
      passing_score: options.passingScore ?? config.passingScore,
      time_limit: options.timeLimit ?? config.timeLimitMinutes,
    },
    selected.map((question) => question.id)
  );
}
