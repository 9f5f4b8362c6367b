import type { MigrationDefinition } from './types.ts';

export const movieDatasetSchemaMigration: MigrationDefinition = {
  id: 1,
  name: '001-movie-dataset-schema',
  up: (db) => {
    db.exec(`
      CREATE TABLE IF NOT EXISTS movie (
        id TEXT PRIMARY KEY,
        title TEXT NOT NULL,
        year INTEGER,
        date_published TEXT,
        duration INTEGER CHECK (duration IS NULL OR duration >= 0),
        country TEXT,
        worldwide_gross_income TEXT,
        languages TEXT,
        production_company TEXT
      );

      CREATE TRIGGER IF NOT EXISTS trg_movie_id_immutable
      BEFORE UPDATE OF id ON movie
      WHEN NEW.id IS NOT OLD.id
      BEGIN
        SELECT RAISE(ABORT, 'movie.id is immutable');
      END;

      CREATE TABLE IF NOT EXISTS names (
        id TEXT PRIMARY KEY,
        name TEXT NOT NULL,
        height INTEGER,
        date_of_birth TEXT,
        known_for_movies TEXT
      );

      CREATE TABLE IF NOT EXISTS genre (
        movie_id TEXT NOT NULL REFERENCES movie(id) ON DELETE CASCADE,
        genre TEXT NOT NULL,
        PRIMARY KEY (movie_id, genre)
      );

      CREATE TABLE IF NOT EXISTS director_mapping (
        movie_id TEXT NOT NULL REFERENCES movie(id) ON DELETE CASCADE,
        name_id TEXT NOT NULL REFERENCES names(id) ON DELETE CASCADE,
        PRIMARY KEY (movie_id, name_id)
      );

      CREATE TABLE IF NOT EXISTS role_mapping (
        movie_id TEXT NOT NULL REFERENCES movie(id) ON DELETE CASCADE,
        name_id TEXT NOT NULL REFERENCES names(id) ON DELETE CASCADE,
        category TEXT NOT NULL CHECK (category IN ('actor', 'actress')),
        PRIMARY KEY (movie_id, name_id)
      );

      CREATE TABLE IF NOT EXISTS ratings (
        movie_id TEXT PRIMARY KEY REFERENCES movie(id) ON DELETE CASCADE,
        avg_rating REAL CHECK (avg_rating IS NULL OR (avg_rating >= 0 AND avg_rating <= 10)),
        total_votes INTEGER CHECK (total_votes IS NULL OR total_votes >= 0),
        median_rating INTEGER CHECK (median_rating IS NULL OR (median_rating >= 0 AND median_rating <= 10))
      );

      CREATE INDEX IF NOT EXISTS idx_movie_year_published
        ON movie(year, date_published);

      CREATE INDEX IF NOT EXISTS idx_genre_genre
        ON genre(genre);

      CREATE INDEX IF NOT EXISTS idx_director_mapping_name
        ON director_mapping(name_id);

      CREATE INDEX IF NOT EXISTS idx_role_mapping_name
        ON role_mapping(name_id);
    `);
  },
};
