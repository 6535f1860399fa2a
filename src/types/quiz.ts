/**
 * Types for categories, questions and quiz attempts
 */

/** How many options a question expects to be selected */
export type QuestionType = 'single' | 'multiple';

/** Soft-delete lifecycle of a question */
export type QuestionLifecycle =
  | { state: 'active' }
  | { state: 'deleted'; deletedAt: string };

/** A subject that owns questions (e.g. "Networking") */
export interface Category {
  id: number;
  name: string;
  description: string;
  createdAt: string;
}

/** A single answer option for a question */
export interface Option {
  id: number;
  questionId: number;
  text: string;
  isCorrect: boolean;
}

/** An option as shown while the attempt is in progress (correctness withheld) */
export interface PublicOption {
  id: number;
  text: string;
}

/** A multiple-choice question with its options in creation order */
export interface Question {
  id: number;
  categoryId: number;
  text: string;
  type: QuestionType;
  lifecycle: QuestionLifecycle;
  createdAt: string;
  options: Option[];
}

/** Question fields shared by review and results projections */
export interface QuestionSummary {
  id: number;
  text: string;
  type: QuestionType;
}

/** One user's run through a category quiz */
export interface Attempt {
  id: number;
  userId: string;
  categoryId: number;
  totalQuestions: number;
  /** Percentage needed to pass (inclusive) */
  passingScore: number;
  /** Minutes; informational only, never enforced */
  timeLimit: number;
  /** Percentage with two decimals, null until submitted */
  score: number | null;
  /** Only meaningful once completedAt is set */
  passed: boolean;
  startedAt: string;
  completedAt: string | null;
}

/** A completed attempt as listed on the dashboard */
export interface RecentAttempt extends Attempt {
  categoryName: string;
}

/** Position of an answer within its attempt's fixed question order */
export interface AnswerNavigation {
  /** 1-based */
  position: number;
  total: number;
  previousId: number | null;
  nextId: number | null;
  isFirst: boolean;
  isLast: boolean;
}

/** An answer as presented while taking the quiz */
export interface AnswerView {
  id: number;
  attemptId: number;
  question: QuestionSummary & { options: PublicOption[] };
  selectedOptionIds: number[];
  hasSelection: boolean;
  isFlagged: boolean;
  answeredAt: string;
  navigation: AnswerNavigation;
}

/** One row of the pre-submission review panel */
export interface ReviewItem {
  answerId: number;
  position: number;
  question: QuestionSummary;
  hasSelection: boolean;
  isFlagged: boolean;
}

export interface ReviewSummary {
  items: ReviewItem[];
  counts: {
    total: number;
    answered: number;
    unanswered: number;
    flagged: number;
  };
}

/** Graded outcome for a single question */
export interface QuestionResult {
  answerId: number;
  question: QuestionSummary;
  selectedOptions: PublicOption[];
  correctOptions: PublicOption[];
  isCorrect: boolean;
}

export interface AttemptResults {
  attempt: Attempt;
  correctCount: number;
  results: QuestionResult[];
}

/** Entry point for taking a quiz: the attempt and its answer order */
export interface AttemptOverview {
  attempt: Attempt;
  answerIds: number[];
  currentAnswerId: number | null;
}
