import type { Database } from 'better-sqlite3';
import { findOwnedAttempt, getSelections, listAnswers, toAttempt } from '@/lib/attempts';
import { SQL_NOW } from '@/lib/db';
import { AttemptInProgressError, NotFoundError } from '@/lib/errors';
import type { OptionRow, QuestionRow } from '@/types/database';
import type { Attempt, AttemptResults, PublicOption, QuestionResult } from '@/types/quiz';

/**
 * An answer is correct when the selected options are exactly the correct
 * options of its question: nothing missing, nothing extra. The same rule
 * covers single- and multiple-answer questions.
 */
export function gradeAnswer(selectedIds: Iterable<number>, correctIds: Iterable<number>): boolean {
  const selected = new Set(selectedIds);
  const correct = new Set(correctIds);

  if (selected.size !== correct.size) {
    return false;
  }
  for (const id of selected) {
    if (!correct.has(id)) {
      return false;
    }
  }
  return true;
}

/**
 * Percentage of correct answers, rounded half-up to two decimals.
 * Computed on integers (hundredths of a percent) to avoid float drift,
 * so 1 of 32 gives 3.13.
 */
export function computeScore(correct: number, total: number): number {
  if (total === 0) {
    return 0;
  }
  const hundredths = Math.floor((20000 * correct + total) / (2 * total));
  return hundredths / 100;
}

interface GradedAnswer {
  answerId: number;
  questionId: number;
  selectedIds: number[];
  correctIds: number[];
  isCorrect: boolean;
}

/**
 * Grade every stored answer of an attempt, in navigation order.
 */
function gradeAttemptAnswers(db: Database, attemptId: number): GradedAnswer[] {
  const answers = listAnswers(db, attemptId);
  const selections = getSelections(db, attemptId);

  const correctRows = db
    .prepare<[number], Pick<OptionRow, 'id' | 'question_id'>>(
      `
      SELECT o.id, o.question_id
      FROM options o
      JOIN answers a ON a.question_id = o.question_id
      WHERE a.attempt_id = ? AND o.is_correct = 1
      ORDER BY o.id
    `
    )
    .all(attemptId);

  const correctByQuestion = new Map<number, number[]>();
  for (const row of correctRows) {
    const ids = correctByQuestion.get(row.question_id) ?? [];
    ids.push(row.id);
    correctByQuestion.set(row.question_id, ids);
  }

  return answers.map((answer) => {
    const selectedIds = selections.get(answer.id) ?? [];
    const correctIds = correctByQuestion.get(answer.question_id) ?? [];
    return {
      answerId: answer.id,
      questionId: answer.question_id,
      selectedIds,
      correctIds,
      isCorrect: gradeAnswer(selectedIds, correctIds),
    };
  });
}

/**
 * Submit an attempt: grade every answer, store score and pass/fail, and mark
 * it completed.
 *
 * The total is the number of stored answers, not the cached question count.
 * Submitting an attempt that is already completed returns it unchanged, and
 * only one of several concurrent submissions sets the completion time.
 */
export function submitAttempt(db: Database, userId: string, attemptId: number): Attempt {
  const finalize = db.transaction((): Attempt => {
    const attempt = findOwnedAttempt(db, userId, attemptId);
    if (attempt.completed_at !== null) {
      return toAttempt(attempt);
    }

    const graded = gradeAttemptAnswers(db, attemptId);
    const correct = graded.filter((answer) => answer.isCorrect).length;
    const score = computeScore(correct, graded.length);
    const passed = score >= attempt.passing_score;

    db.prepare<[number, number, number]>(
      `
      UPDATE attempts
      SET score = ?, passed = ?, completed_at = ${SQL_NOW}
      WHERE id = ? AND completed_at IS NULL
    `
    ).run(score, passed ? 1 : 0, attemptId);

    return toAttempt(findOwnedAttempt(db, userId, attemptId));
  });

  return finalize.immediate();
}

/**
 * Per-question outcome of a submitted attempt, in navigation order.
 */
export function getResults(db: Database, userId: string, attemptId: number): AttemptResults {
  const attempt = findOwnedAttempt(db, userId, attemptId);
  if (attempt.completed_at === null) {
    throw new AttemptInProgressError(attemptId);
  }

  const graded = gradeAttemptAnswers(db, attemptId);

  const questions = new Map(
    db
      .prepare<[number], QuestionRow>(
        `
        SELECT q.* FROM questions q
        JOIN answers a ON a.question_id = q.id
        WHERE a.attempt_id = ?
      `
      )
      .all(attemptId)
      .map((row) => [row.id, row])
  );

  const optionText = new Map(
    db
      .prepare<[number], Pick<OptionRow, 'id' | 'text'>>(
        `
        SELECT o.id, o.text FROM options o
        JOIN answers a ON a.question_id = o.question_id
        WHERE a.attempt_id = ?
      `
      )
      .all(attemptId)
      .map((row) => [row.id, row.text])
  );

  const toPublic = (ids: number[]): PublicOption[] =>
    ids.flatMap((id): PublicOption[] => {
      const text = optionText.get(id);
      return text === undefined ? [] : [{ id, text }];
    });

  const results: QuestionResult[] = graded.map((answer) => {
    const question = questions.get(answer.questionId);
    if (!question) {
      throw new NotFoundError('Question', answer.questionId);
    }
    return {
      answerId: answer.answerId,
      question: {
        id: question.id,
        text: question.text,
        type: question.question_type,
      },
      selectedOptions: toPublic(answer.selectedIds),
      correctOptions: toPublic(answer.correctIds),
      isCorrect: answer.isCorrect,
    };
  });

  return {
    attempt: toAttempt(attempt),
    correctCount: results.filter((result) => result.isCorrect).length,
    results,
  };
}
