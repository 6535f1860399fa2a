import type { Database } from 'better-sqlite3';
import { AttemptCompletedError, NotFoundError } from '@/lib/errors';
import type { AnswerRow, AttemptInsert, AttemptRow } from '@/types/database';
import type { Attempt, AttemptOverview, RecentAttempt } from '@/types/quiz';

export function toAttempt(row: AttemptRow): Attempt {
  return {
    id: row.id,
    userId: row.user_id,
    categoryId: row.category_id,
    totalQuestions: row.total_questions,
    passingScore: row.passing_score,
    timeLimit: row.time_limit,
    score: row.score,
    passed: row.passed === 1,
    startedAt: row.started_at,
    completedAt: row.completed_at,
  };
}

/**
 * Insert an attempt together with one empty answer per question, in order.
 * Either everything is written or nothing is.
 */
export function createAttempt(
  db: Database,
  attempt: AttemptInsert,
  questionIds: number[]
): Attempt {
  const insertAttempt = db.prepare<[string, number, number, number, number]>(
    `
    INSERT INTO attempts (user_id, category_id, total_questions, passing_score, time_limit)
    VALUES (?, ?, ?, ?, ?)
  `
  );
  const insertAnswer = db.prepare<[number, number]>(
    'INSERT INTO answers (attempt_id, question_id) VALUES (?, ?)'
  );

  const run = db.transaction((): number => {
    const attemptId = Number(
      insertAttempt.run(
        attempt.user_id,
        attempt.category_id,
        attempt.total_questions,
        attempt.passing_score,
        attempt.time_limit
      ).lastInsertRowid
    );

    for (const questionId of questionIds) {
      insertAnswer.run(attemptId, questionId);
    }

    return attemptId;
  });

  return getAttempt(db, attempt.user_id, run());
}

/**
 * Load an attempt owned by the given user.
 * Attempts of other users are reported as missing.
 */
export function findOwnedAttempt(db: Database, userId: string, attemptId: number): AttemptRow {
  const row = db
    .prepare<[number, string], AttemptRow>('SELECT * FROM attempts WHERE id = ? AND user_id = ?')
    .get(attemptId, userId);

  if (!row) {
    throw new NotFoundError('Attempt', attemptId);
  }
  return row;
}

export function getAttempt(db: Database, userId: string, attemptId: number): Attempt {
  return toAttempt(findOwnedAttempt(db, userId, attemptId));
}

export function assertInProgress(row: AttemptRow): void {
  if (row.completed_at !== null) {
    throw new AttemptCompletedError(row.id);
  }
}

/**
 * Answer ids of an attempt in navigation (insertion) order.
 */
export function listAnswerIds(db: Database, attemptId: number): number[] {
  return db
    .prepare<[number], { id: number }>('SELECT id FROM answers WHERE attempt_id = ? ORDER BY id')
    .all(attemptId)
    .map((row) => row.id);
}

export function listAnswers(db: Database, attemptId: number): AnswerRow[] {
  return db
    .prepare<[number], AnswerRow>('SELECT * FROM answers WHERE attempt_id = ? ORDER BY id')
    .all(attemptId);
}

/**
 * Load an answer that belongs to the given attempt.
 */
export function findAttemptAnswer(db: Database, attemptId: number, answerId: number): AnswerRow {
  const row = db
    .prepare<[number, number], AnswerRow>('SELECT * FROM answers WHERE id = ? AND attempt_id = ?')
    .get(answerId, attemptId);

  if (!row) {
    throw new NotFoundError('Answer', answerId);
  }
  return row;
}

/**
 * Load an answer by id alone, resolving its attempt and checking ownership.
 */
export function findOwnedAnswer(
  db: Database,
  userId: string,
  answerId: number
): { answer: AnswerRow; attempt: AttemptRow } {
  const answer = db
    .prepare<[number], AnswerRow>('SELECT * FROM answers WHERE id = ?')
    .get(answerId);

  const attempt = answer
    ? db
        .prepare<[number, string], AttemptRow>(
          'SELECT * FROM attempts WHERE id = ? AND user_id = ?'
        )
        .get(answer.attempt_id, userId)
    : undefined;

  if (!answer || !attempt) {
    throw new NotFoundError('Answer', answerId);
  }
  return { answer, attempt };
}

/**
 * Selected option ids for each answer of an attempt.
 */
export function getSelections(db: Database, attemptId: number): Map<number, number[]> {
  const rows = db
    .prepare<[number], { answer_id: number; option_id: number }>(
      `
      SELECT ao.answer_id, ao.option_id
      FROM answer_options ao
      JOIN answers a ON a.id = ao.answer_id
      WHERE a.attempt_id = ?
      ORDER BY ao.option_id
    `
    )
    .all(attemptId);

  const selections = new Map<number, number[]>();
  for (const row of rows) {
    const selected = selections.get(row.answer_id) ?? [];
    selected.push(row.option_id);
    selections.set(row.answer_id, selected);
  }
  return selections;
}

export function getSelectedOptionIds(db: Database, answerId: number): number[] {
  return db
    .prepare<[number], { option_id: number }>(
      'SELECT option_id FROM answer_options WHERE answer_id = ? ORDER BY option_id'
    )
    .all(answerId)
    .map((row) => row.option_id);
}

/**
 * The attempt with its answer order, used to start or resume taking a quiz.
 */
export function getAttemptOverview(
  db: Database,
  userId: string,
  attemptId: number
): AttemptOverview {
  const attempt = getAttempt(db, userId, attemptId);
  const answerIds = listAnswerIds(db, attemptId);

  return {
    attempt,
    answerIds,
    currentAnswerId: answerIds[0] ?? null,
  };
}

/**
 * The user's completed attempts, most recently completed first.
 */
export function listRecentAttempts(db: Database, userId: string, limit = 5): RecentAttempt[] {
  const rows = db
    .prepare<[string, number], AttemptRow & { category_name: string }>(
      `
      SELECT a.*, c.name as category_name
      FROM attempts a
      JOIN categories c ON c.id = a.category_id
      WHERE a.user_id = ? AND a.completed_at IS NOT NULL
      ORDER BY a.completed_at DESC, a.id DESC
      LIMIT ?
    `
    )
    .all(userId, limit);

  return rows.map((row) => ({ ...toAttempt(row), categoryName: row.category_name }));
}
