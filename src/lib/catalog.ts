import type { Database } from 'better-sqlite3';
import { NotFoundError } from '@/lib/errors';
import type { CategoryRow, OptionRow, QuestionRow } from '@/types/database';
import type { Category, Option, Question, QuestionLifecycle } from '@/types/quiz';

export function toCategory(row: CategoryRow): Category {
  return {
    id: row.id,
    name: row.name,
    description: row.description,
    createdAt: row.created_at,
  };
}

export function toOption(row: OptionRow): Option {
  return {
    id: row.id,
    questionId: row.question_id,
    text: row.text,
    isCorrect: row.is_correct === 1,
  };
}

export function toLifecycle(row: Pick<QuestionRow, 'deleted_at'>): QuestionLifecycle {
  return row.deleted_at === null
    ? { state: 'active' }
    : { state: 'deleted', deletedAt: row.deleted_at };
}

export function toQuestion(row: QuestionRow, options: Option[]): Question {
  return {
    id: row.id,
    categoryId: row.category_id,
    text: row.text,
    type: row.question_type,
    lifecycle: toLifecycle(row),
    createdAt: row.created_at,
    options,
  };
}

/**
 * Get all categories, ordered by name.
 */
export function listCategories(db: Database): Category[] {
  return db
    .prepare<[], CategoryRow>('SELECT * FROM categories ORDER BY name')
    .all()
    .map(toCategory);
}

/**
 * Get a single category by ID.
 */
export function getCategory(db: Database, categoryId: number): Category {
  const row = db
    .prepare<[number], CategoryRow>('SELECT * FROM categories WHERE id = ?')
    .get(categoryId);

  if (!row) {
    throw new NotFoundError('Category', categoryId);
  }

  return toCategory(row);
}

/**
 * Get the questions of a category that can be put into a new attempt.
 * Soft-deleted questions are never returned. Options are preloaded.
 */
export function eligibleQuestions(db: Database, categoryId: number): Question[] {
  getCategory(db, categoryId);

  const questionRows = db
    .prepare<[number], QuestionRow>(
      `
      SELECT * FROM questions
      WHERE category_id = ? AND deleted_at IS NULL
      ORDER BY id
    `
    )
    .all(categoryId);

  const optionRows = db
    .prepare<[number], OptionRow>(
      `
      SELECT o.* FROM options o
      JOIN questions q ON q.id = o.question_id
      WHERE q.category_id = ? AND q.deleted_at IS NULL
      ORDER BY o.id
    `
    )
    .all(categoryId);

  const optionsByQuestion = new Map<number, Option[]>();
  for (const row of optionRows) {
    const options = optionsByQuestion.get(row.question_id) ?? [];
    options.push(toOption(row));
    optionsByQuestion.set(row.question_id, options);
  }

  return questionRows.map((row) => toQuestion(row, optionsByQuestion.get(row.id) ?? []));
}
