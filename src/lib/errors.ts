export type QuizErrorCode =
  | 'NOT_FOUND'
  | 'NO_QUESTIONS_AVAILABLE'
  | 'INVALID_OPTION'
  | 'ATTEMPT_COMPLETED'
  | 'ATTEMPT_IN_PROGRESS'
  | 'INVALID_REQUEST'
  | 'UNAUTHORIZED';

/**
 * Base class for caller and input errors.
 * These are reported to the client as-is and never retried.
 */
export class QuizError extends Error {
  readonly code: QuizErrorCode;
  readonly status: number;

  constructor(message: string, code: QuizErrorCode, status: number) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.status = status;
  }
}

/**
 * A missing entity, or one owned by another user.
 */
export class NotFoundError extends QuizError {
  constructor(entity: string, id: number | string) {
    super(`${entity} ${id} not found`, 'NOT_FOUND', 404);
  }
}

export class NoQuestionsAvailableError extends QuizError {
  constructor(categoryName: string) {
    super(`No questions available for ${categoryName}`, 'NO_QUESTIONS_AVAILABLE', 422);
  }
}

export class InvalidOptionError extends QuizError {
  readonly optionIds: number[];

  constructor(optionIds: number[]) {
    super(
      `Options ${optionIds.join(', ')} do not belong to this question`,
      'INVALID_OPTION',
      422
    );
    this.optionIds = optionIds;
  }
}

export class AttemptCompletedError extends QuizError {
  constructor(attemptId: number) {
    super(`Attempt ${attemptId} has already been submitted`, 'ATTEMPT_COMPLETED', 409);
  }
}

export class AttemptInProgressError extends QuizError {
  constructor(attemptId: number) {
    super(`Attempt ${attemptId} has not been submitted yet`, 'ATTEMPT_IN_PROGRESS', 409);
  }
}

export class InvalidRequestError extends QuizError {
  constructor(message: string) {
    super(message, 'INVALID_REQUEST', 400);
  }
}

export class UnauthorizedError extends QuizError {
  constructor() {
    super('Authentication required', 'UNAUTHORIZED', 401);
  }
}
