import type { Database } from 'better-sqlite3';
import {
  assertInProgress,
  findAttemptAnswer,
  findOwnedAnswer,
  findOwnedAttempt,
  getSelectedOptionIds,
  getSelections,
  listAnswerIds,
} from '@/lib/attempts';
import { SQL_NOW } from '@/lib/db';
import { InvalidOptionError, NotFoundError } from '@/lib/errors';
import type { OptionRow, QuestionRow } from '@/types/database';
import type {
  AnswerNavigation,
  AnswerView,
  QuestionType,
  ReviewItem,
  ReviewSummary,
} from '@/types/quiz';

interface ReviewRow {
  answer_id: number;
  is_flagged: number;
  question_id: number;
  question_text: string;
  question_type: QuestionType;
}

/**
 * Locate an answer within the attempt's fixed order and derive its neighbours.
 */
export function buildNavigation(orderedIds: number[], answerId: number): AnswerNavigation {
  const index = orderedIds.indexOf(answerId);
  if (index === -1) {
    throw new NotFoundError('Answer', answerId);
  }

  const lastIndex = orderedIds.length - 1;
  return {
    position: index + 1,
    total: orderedIds.length,
    previousId: index > 0 ? orderedIds[index - 1] : null,
    nextId: index < lastIndex ? orderedIds[index + 1] : null,
    isFirst: index === 0,
    isLast: index === lastIndex,
  };
}

/**
 * Get one answer of the user's attempt with its question, options and
 * navigation metadata. Option correctness is not exposed.
 */
export function getAnswer(
  db: Database,
  userId: string,
  attemptId: number,
  answerId: number
): AnswerView {
  findOwnedAttempt(db, userId, attemptId);
  const answer = findAttemptAnswer(db, attemptId, answerId);

  const question = db
    .prepare<[number], QuestionRow>('SELECT * FROM questions WHERE id = ?')
    .get(answer.question_id);
  if (!question) {
    throw new NotFoundError('Question', answer.question_id);
  }

  const options = db
    .prepare<[number], Pick<OptionRow, 'id' | 'text'>>(
      'SELECT id, text FROM options WHERE question_id = ? ORDER BY id'
    )
    .all(question.id);

  const selectedOptionIds = getSelectedOptionIds(db, answer.id);

  return {
    id: answer.id,
    attemptId: answer.attempt_id,
    question: {
      id: question.id,
      text: question.text,
      type: question.question_type,
      options: options.map((o) => ({ id: o.id, text: o.text })),
    },
    selectedOptionIds,
    hasSelection: selectedOptionIds.length > 0,
    isFlagged: answer.is_flagged === 1,
    answeredAt: answer.answered_at,
    navigation: buildNavigation(listAnswerIds(db, attemptId), answer.id),
  };
}

/**
 * Replace the selected options of an answer.
 *
 * The new selection replaces the old one wholesale. Every id has to be an
 * option of the answer's question; otherwise nothing changes.
 */
export function setSelection(
  db: Database,
  userId: string,
  attemptId: number,
  answerId: number,
  optionIds: number[]
): AnswerView {
  const run = db.transaction(() => {
    const attempt = findOwnedAttempt(db, userId, attemptId);
    const answer = findAttemptAnswer(db, attemptId, answerId);
    assertInProgress(attempt);

    const validIds = new Set(
      db
        .prepare<[number], { id: number }>('SELECT id FROM options WHERE question_id = ?')
        .all(answer.question_id)
        .map((row) => row.id)
    );

    const selected = [...new Set(optionIds)];
    const invalid = selected.filter((id) => !validIds.has(id));
    if (invalid.length > 0) {
      throw new InvalidOptionError(invalid);
    }

    db.prepare<[number]>('DELETE FROM answer_options WHERE answer_id = ?').run(answer.id);
    const insert = db.prepare<[number, number]>(
      'INSERT INTO answer_options (answer_id, option_id) VALUES (?, ?)'
    );
    for (const optionId of selected) {
      insert.run(answer.id, optionId);
    }
    db.prepare<[number]>(`UPDATE answers SET answered_at = ${SQL_NOW} WHERE id = ?`).run(
      answer.id
    );
  });

  run.immediate();
  return getAnswer(db, userId, attemptId, answerId);
}

/**
 * Flip the review flag of an answer and return the new value.
 */
export function toggleFlag(db: Database, userId: string, answerId: number): boolean {
  const run = db.transaction((): boolean => {
    const { answer, attempt } = findOwnedAnswer(db, userId, answerId);
    assertInProgress(attempt);

    const flagged = answer.is_flagged !== 1;
    db.prepare<[number, number]>(
      `UPDATE answers SET is_flagged = ?, answered_at = ${SQL_NOW} WHERE id = ?`
    ).run(flagged ? 1 : 0, answer.id);

    return flagged;
  });

  return run.immediate();
}

/**
 * Overview of every question in the attempt: answered or not, flagged or not.
 * Correctness is withheld until the attempt is submitted.
 */
export function reviewSummary(db: Database, userId: string, attemptId: number): ReviewSummary {
  findOwnedAttempt(db, userId, attemptId);

  const rows = db
    .prepare<[number], ReviewRow>(
      `
      SELECT
        a.id as answer_id,
        a.is_flagged,
        q.id as question_id,
        q.text as question_text,
        q.question_type
      FROM answers a
      JOIN questions q ON q.id = a.question_id
      WHERE a.attempt_id = ?
      ORDER BY a.id
    `
    )
    .all(attemptId);

  const selections = getSelections(db, attemptId);

  const items: ReviewItem[] = rows.map((row, index) => ({
    answerId: row.answer_id,
    position: index + 1,
    question: {
      id: row.question_id,
      text: row.question_text,
      type: row.question_type,
    },
    hasSelection: (selections.get(row.answer_id)?.length ?? 0) > 0,
    isFlagged: row.is_flagged === 1,
  }));

  const answered = items.filter((item) => item.hasSelection).length;

  return {
    items,
    counts: {
      total: items.length,
      answered,
      unanswered: items.length - answered,
      flagged: items.filter((item) => item.isFlagged).length,
    },
  };
}
