import type Database from 'better-sqlite3';

/** Forward-only schema step, applied once and recorded in `schema_migrations`. */
export interface MigrationDefinition {
  readonly id: number;
  /** Sortable unique name, e.g. `001-movie-dataset-schema`. */
  readonly name: string;
  readonly up: (db: Database.Database) => void;
}
