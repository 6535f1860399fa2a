import path from 'path';
import { z } from 'zod';

const envSchema = z.object({
  QUIZ_DB_PATH: z.string().min(1).optional(),
  QUIZ_MAX_QUESTIONS: z.coerce.number().int().positive().default(10),
  QUIZ_PASSING_SCORE: z.coerce.number().int().min(0).max(100).default(70),
  QUIZ_TIME_LIMIT_MINUTES: z.coerce.number().int().positive().default(30),
  QUIZ_USER_HEADER: z.string().min(1).default('x-user-id'),
});

export interface QuizConfig {
  /** SQLite file path, or ':memory:' */
  dbPath: string;
  /** Upper bound on questions sampled into one attempt */
  maxQuestions: number;
  /** Default passing percentage for new attempts */
  passingScore: number;
  /** Default time limit in minutes for new attempts (informational) */
  timeLimitMinutes: number;
  /** Request header carrying the authenticated user id */
  userHeader: string;
}

let config: QuizConfig | null = null;

/**
 * Parse quiz settings from environment variables.
 * Throws if a variable is present but malformed.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): QuizConfig {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid quiz configuration: ${details}`);
  }

  const parsed = result.data;
  return {
    dbPath: parsed.QUIZ_DB_PATH ?? path.join(process.cwd(), 'data', 'quiz.db'),
    maxQuestions: parsed.QUIZ_MAX_QUESTIONS,
    passingScore: parsed.QUIZ_PASSING_SCORE,
    timeLimitMinutes: parsed.QUIZ_TIME_LIMIT_MINUTES,
    userHeader: parsed.QUIZ_USER_HEADER.toLowerCase(),
  };
}

/**
 * Get the process-wide configuration, loading it on first use.
 */
export function getConfig(): QuizConfig {
  if (!config) {
    config = loadConfig();
  }
  return config;
}
