import type { MigrationDefinition } from './types.ts';

export const normalizationSchemaMigration: MigrationDefinition = {
  id: 2,
  name: '002-normalization-schema',
  up: (db) => {
    db.exec(`
      ALTER TABLE movie ADD COLUMN worldwide_gross_num REAL;

      CREATE TABLE IF NOT EXISTS movie_country (
        movie_id TEXT NOT NULL REFERENCES movie(id) ON DELETE CASCADE,
        position INTEGER NOT NULL CHECK (position >= 1),
        country TEXT NOT NULL,
        PRIMARY KEY (movie_id, position)
      );

      CREATE TABLE IF NOT EXISTS stg_movie_country (
        movie_id TEXT NOT NULL,
        position INTEGER NOT NULL CHECK (position >= 1),
        country TEXT NOT NULL,
        PRIMARY KEY (movie_id, position)
      );

      CREATE TABLE IF NOT EXISTS movie_language (
        movie_id TEXT NOT NULL REFERENCES movie(id) ON DELETE CASCADE,
        position INTEGER NOT NULL CHECK (position >= 1),
        language TEXT NOT NULL,
        PRIMARY KEY (movie_id, position)
      );

      CREATE TABLE IF NOT EXISTS stg_movie_language (
        movie_id TEXT NOT NULL,
        position INTEGER NOT NULL CHECK (position >= 1),
        language TEXT NOT NULL,
        PRIMARY KEY (movie_id, position)
      );

      CREATE TABLE IF NOT EXISTS normalization_runs (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        status TEXT NOT NULL CHECK (status IN ('completed', 'completed_with_warnings', 'failed')),
        started_at TEXT NOT NULL,
        finished_at TEXT NOT NULL,
        gross_parsed INTEGER NOT NULL DEFAULT 0 CHECK (gross_parsed >= 0),
        gross_absent INTEGER NOT NULL DEFAULT 0 CHECK (gross_absent >= 0),
        gross_invalid INTEGER NOT NULL DEFAULT 0 CHECK (gross_invalid >= 0),
        country_rows INTEGER NOT NULL DEFAULT 0 CHECK (country_rows >= 0),
        language_rows INTEGER NOT NULL DEFAULT 0 CHECK (language_rows >= 0),
        standardized_json TEXT NOT NULL DEFAULT '{}',
        options_json TEXT NOT NULL DEFAULT '{}',
        error_code TEXT,
        error_message TEXT
      );

      CREATE INDEX IF NOT EXISTS idx_movie_country_country
        ON movie_country(country);

      CREATE INDEX IF NOT EXISTS idx_movie_language_language
        ON movie_language(language);

      CREATE INDEX IF NOT EXISTS idx_normalization_runs_started
        ON normalization_runs(started_at);
    `);
  },
};
