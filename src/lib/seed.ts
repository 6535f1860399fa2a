import fs from 'fs';
import type { Database } from 'better-sqlite3';
import { z } from 'zod';
import { SQL_NOW } from '@/lib/db';
import { NotFoundError } from '@/lib/errors';

const optionSeedSchema = z.object({
  text: z.string().min(1),
  isCorrect: z.boolean().default(false),
});

const questionSeedSchema = z
  .object({
    text: z.string().min(1),
    type: z.enum(['single', 'multiple']).default('single'),
    options: z.array(optionSeedSchema).min(2),
  })
  .refine((q) => q.options.some((o) => o.isCorrect), {
    message: 'A question needs at least one correct option',
    path: ['options'],
  })
  .refine((q) => q.type === 'multiple' || q.options.filter((o) => o.isCorrect).length === 1, {
    message: 'A single-answer question needs exactly one correct option',
    path: ['options'],
  });

const categorySeedSchema = z.object({
  name: z.string().min(1),
  description: z.string().default(''),
  questions: z.array(questionSeedSchema).default([]),
});

export const catalogSeedSchema = z.object({
  categories: z.array(categorySeedSchema),
});

export type CatalogSeed = z.input<typeof catalogSeedSchema>;

export interface SeedReport {
  categoriesCreated: number;
  categoriesExisting: number;
  questionsCreated: number;
  questionsExisting: number;
  optionsCreated: number;
}

/**
 * Load a catalog seed file from disk and validate it.
 */
export function readCatalogSeed(filePath: string): CatalogSeed {
  const data = fs.readFileSync(filePath, 'utf-8');
  return catalogSeedSchema.parse(JSON.parse(data));
}

/**
 * Insert categories, questions and options that don't exist yet.
 *
 * Categories are matched by name and questions by text within their category,
 * so running the same seed twice creates nothing new. Options are only written
 * together with a newly created question.
 */
export function seedCatalog(db: Database, seed: CatalogSeed): SeedReport {
  const catalog = catalogSeedSchema.parse(seed);

  const findCategory = db.prepare<[string], { id: number }>(
    'SELECT id FROM categories WHERE name = ?'
  );
  const insertCategory = db.prepare<[string, string]>(
    'INSERT INTO categories (name, description) VALUES (?, ?)'
  );
  const findQuestion = db.prepare<[number, string], { id: number }>(
    'SELECT id FROM questions WHERE category_id = ? AND text = ?'
  );
  const insertQuestion = db.prepare<[number, string, string]>(
    'INSERT INTO questions (category_id, text, question_type) VALUES (?, ?, ?)'
  );
  const insertOption = db.prepare<[number, string, number]>(
    'INSERT INTO options (question_id, text, is_correct) VALUES (?, ?, ?)'
  );

  const run = db.transaction((): SeedReport => {
    const report: SeedReport = {
      categoriesCreated: 0,
      categoriesExisting: 0,
      questionsCreated: 0,
      questionsExisting: 0,
      optionsCreated: 0,
    };

    for (const category of catalog.categories) {
      let categoryId: number;
      const existingCategory = findCategory.get(category.name);
      if (existingCategory) {
        categoryId = existingCategory.id;
        report.categoriesExisting++;
      } else {
        categoryId = Number(insertCategory.run(category.name, category.description).lastInsertRowid);
        report.categoriesCreated++;
      }

      for (const question of category.questions) {
        if (findQuestion.get(categoryId, question.text)) {
          report.questionsExisting++;
          continue;
        }

        const questionId = Number(
          insertQuestion.run(categoryId, question.text, question.type).lastInsertRowid
        );
        report.questionsCreated++;

        for (const option of question.options) {
          insertOption.run(questionId, option.text, option.isCorrect ? 1 : 0);
          report.optionsCreated++;
        }
      }
    }

    return report;
  });

  return run();
}

/**
 * Soft delete a question: it stays referenced by past attempts but is no
 * longer eligible for new ones. Deleting an already deleted question keeps
 * its first deletion time.
 */
export function softDeleteQuestion(db: Database, questionId: number): string {
  const run = db.transaction((): string => {
    db.prepare<[number]>(
      `UPDATE questions SET deleted_at = ${SQL_NOW} WHERE id = ? AND deleted_at IS NULL`
    ).run(questionId);

    const row = db
      .prepare<[number], { deleted_at: string | null }>(
        'SELECT deleted_at FROM questions WHERE id = ?'
      )
      .get(questionId);

    if (!row || row.deleted_at === null) {
      throw new NotFoundError('Question', questionId);
    }
    return row.deleted_at;
  });

  return run();
}
