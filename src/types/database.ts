/**
 * Types for database records
 */

import type { QuestionType } from '@/types/quiz';

/** A quiz category record */
export interface CategoryRow {
  id: number;
  name: string;
  description: string;
  created_at: string;
}

/** A question record. A non-null deleted_at marks a soft-deleted question. */
export interface QuestionRow {
  id: number;
  category_id: number;
  text: string;
  question_type: QuestionType;
  deleted_at: string | null;
  created_at: string;
}

/** An answer option record */
export interface OptionRow {
  id: number;
  question_id: number;
  text: string;
  is_correct: number;
}

/** A quiz attempt record */
export interface AttemptRow {
  id: number;
  user_id: string;
  category_id: number;
  total_questions: number;
  passing_score: number;
  time_limit: number;
  score: number | null;
  passed: number;
  started_at: string;
  completed_at: string | null;
}

/** A per-question answer record within an attempt */
export interface AnswerRow {
  id: number;
  attempt_id: number;
  question_id: number;
  is_flagged: number;
  answered_at: string;
}

/** Insert data for a new attempt */
export interface AttemptInsert {
  user_id: string;
  category_id: number;
  total_questions: number;
  passing_score: number;
  time_limit: number;
}
