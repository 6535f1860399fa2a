import type { Database } from 'better-sqlite3';
import { reviewSummary } from '@/lib/answers';
import { eligibleQuestions, listCategories } from '@/lib/catalog';
import { openDb } from '@/lib/db';
import { seedCatalog, type CatalogSeed } from '@/lib/seed';
import type { Category, Question } from '@/types/quiz';

export const SAMPLE_CATALOG: CatalogSeed = {
  categories: [
    {
      name: 'Programming Basics',
      description: 'Small sample category',
      questions: [
        {
          text: 'Which keyword declares a constant?',
          type: 'single',
          options: [
            { text: 'let', isCorrect: false },
            { text: 'const', isCorrect: true },
            { text: 'var', isCorrect: false },
            { text: 'static', isCorrect: false },
          ],
        },
        {
          text: 'Which of the following are mutable data types?',
          type: 'multiple',
          options: [
            { text: 'List', isCorrect: true },
            { text: 'Tuple', isCorrect: false },
            { text: 'Dictionary', isCorrect: true },
            { text: 'String', isCorrect: false },
          ],
        },
        {
          text: 'What does 7 % 3 evaluate to?',
          type: 'single',
          options: [
            { text: '1', isCorrect: true },
            { text: '2', isCorrect: false },
            { text: '3', isCorrect: false },
            { text: '0', isCorrect: false },
          ],
        },
        {
          text: 'Which status code means Not Found?',
          type: 'single',
          options: [
            { text: '200', isCorrect: false },
            { text: '301', isCorrect: false },
            { text: '404', isCorrect: true },
            { text: '500', isCorrect: false },
          ],
        },
      ],
    },
    {
      name: 'Empty Category',
      description: 'Has no questions',
      questions: [],
    },
    {
      name: 'Large Pool',
      description: 'More questions than fit in one attempt',
      questions: Array.from({ length: 12 }, (_, i) => ({
        text: `Pool question ${i + 1}`,
        type: 'single' as const,
        options: [
          { text: 'Right', isCorrect: true },
          { text: 'Wrong', isCorrect: false },
        ],
      })),
    },
  ],
};

export interface SampleCategories {
  basics: Category;
  empty: Category;
  large: Category;
}

export function createTestDb(): Database {
  return openDb(':memory:');
}

export function seedSample(db: Database): SampleCategories {
  seedCatalog(db, SAMPLE_CATALOG);
  const byName = (name: string): Category => {
    const category = listCategories(db).find((c) => c.name === name);
    if (!category) {
      throw new Error(`Sample category ${name} missing`);
    }
    return category;
  };

  return {
    basics: byName('Programming Basics'),
    empty: byName('Empty Category'),
    large: byName('Large Pool'),
  };
}

export function findQuestion(db: Database, categoryId: number, text: string): Question {
  const question = eligibleQuestions(db, categoryId).find((q) => q.text === text);
  if (!question) {
    throw new Error(`Question "${text}" not found`);
  }
  return question;
}

export function optionId(question: Question, text: string): number {
  const option = question.options.find((o) => o.text === text);
  if (!option) {
    throw new Error(`Option "${text}" not found on "${question.text}"`);
  }
  return option.id;
}

/**
 * Answer ids of an attempt keyed by question text.
 */
export function answerIdsByQuestion(
  db: Database,
  userId: string,
  attemptId: number
): Map<string, number> {
  return new Map(
    reviewSummary(db, userId, attemptId).items.map((item) => [item.question.text, item.answerId])
  );
}

export function answerIdFor(
  answers: Map<string, number>,
  questionText: string
): number {
  const answerId = answers.get(questionText);
  if (answerId === undefined) {
    throw new Error(`No answer for "${questionText}"`);
  }
  return answerId;
}
