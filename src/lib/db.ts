import Database from 'better-sqlite3';
import fs from 'fs';
import path from 'path';
import { getConfig } from '@/lib/config';

/** SQL expression for the current UTC time with millisecond precision */
export const SQL_NOW = "strftime('%Y-%m-%dT%H:%M:%fZ', 'now')";

let db: Database.Database | null = null;

/**
 * Get or create the shared database connection.
 * Creates the database file and schema if they don't exist.
 */
export function getDb(): Database.Database {
  if (db) {
    return db;
  }

  db = openDb(getConfig().dbPath);
  return db;
}

/**
 * Open a new connection with the schema in place.
 * Pass ':memory:' for a throwaway database.
 */
export function openDb(filename: string): Database.Database {
  if (filename !== ':memory:') {
    fs.mkdirSync(path.dirname(filename), { recursive: true });
  }

  const database = new Database(filename);

  // Enable WAL mode for better performance
  database.pragma('journal_mode = WAL');
  database.pragma('foreign_keys = ON');

  initSchema(database);

  return database;
}

/**
 * Initialize the database schema.
 */
function initSchema(database: Database.Database): void {
  // Catalog tables - read-only to the quiz engine
  database.exec(`
    CREATE TABLE IF NOT EXISTS categories (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      name TEXT NOT NULL UNIQUE,
      description TEXT NOT NULL DEFAULT '',
      created_at TEXT NOT NULL DEFAULT (${SQL_NOW})
    );

    CREATE TABLE IF NOT EXISTS questions (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      category_id INTEGER NOT NULL REFERENCES categories(id) ON DELETE CASCADE,
      text TEXT NOT NULL,
      question_type TEXT NOT NULL DEFAULT 'single'
        CHECK (question_type IN ('single', 'multiple')),
      deleted_at TEXT,
      created_at TEXT NOT NULL DEFAULT (${SQL_NOW})
    );

    CREATE TABLE IF NOT EXISTS options (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      question_id INTEGER NOT NULL REFERENCES questions(id) ON DELETE CASCADE,
      text TEXT NOT NULL,
      is_correct INTEGER NOT NULL DEFAULT 0
    );
  `);

  // Attempt tables. Catalog rows referenced by an attempt cannot be hard-deleted,
  // so graded history survives catalog edits.
  database.exec(`
    CREATE TABLE IF NOT EXISTS attempts (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      user_id TEXT NOT NULL,
      category_id INTEGER NOT NULL REFERENCES categories(id) ON DELETE RESTRICT,
      total_questions INTEGER NOT NULL,
      passing_score INTEGER NOT NULL DEFAULT 70,
      time_limit INTEGER NOT NULL DEFAULT 30,
      score REAL,
      passed INTEGER NOT NULL DEFAULT 0,
      started_at TEXT NOT NULL DEFAULT (${SQL_NOW}),
      completed_at TEXT
    );

    CREATE TABLE IF NOT EXISTS answers (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      attempt_id INTEGER NOT NULL REFERENCES attempts(id) ON DELETE CASCADE,
      question_id INTEGER NOT NULL REFERENCES questions(id) ON DELETE RESTRICT,
      is_flagged INTEGER NOT NULL DEFAULT 0,
      answered_at TEXT NOT NULL DEFAULT (${SQL_NOW}),
      UNIQUE (attempt_id, question_id)
    );

    CREATE TABLE IF NOT EXISTS answer_options (
      answer_id INTEGER NOT NULL REFERENCES answers(id) ON DELETE CASCADE,
      option_id INTEGER NOT NULL REFERENCES options(id) ON DELETE RESTRICT,
      PRIMARY KEY (answer_id, option_id)
    );
  `);

  // Create indexes for common queries
  database.exec(`
    CREATE INDEX IF NOT EXISTS idx_questions_category_id ON questions(category_id);
    CREATE INDEX IF NOT EXISTS idx_options_question_id ON options(question_id);
    CREATE INDEX IF NOT EXISTS idx_attempts_user_id ON attempts(user_id, completed_at);
    CREATE INDEX IF NOT EXISTS idx_answers_attempt_id ON answers(attempt_id);
  `);
}

/**
 * Close the shared database connection.
 * Call this when shutting down the application.
 */
export function closeDb(): void {
  if (db) {
    db.close();
    db = null;
  }
}
