import type Database from 'better-sqlite3';
import { AppError, err, ok, toError, type Result } from '@reelstats/shared';
import { movieDatasetSchemaMigration } from './001-movie-dataset-schema.ts';
import { normalizationSchemaMigration } from './002-normalization-schema.ts';
import type { MigrationDefinition } from './types.ts';

export type { MigrationDefinition } from './types.ts';

export interface RunMigrationsResult {
  applied: string[];
  alreadyApplied: string[];
}

export interface RunMigrationsOptions {
  now?: () => Date;
}

export const MIGRATIONS: ReadonlyArray<MigrationDefinition> = [
  movieDatasetSchemaMigration,
  normalizationSchemaMigration,
];

function ensureMigrationsTable(db: Database.Database): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS schema_migrations (
      id INTEGER PRIMARY KEY,
      name TEXT NOT NULL UNIQUE,
      applied_at TEXT NOT NULL
    );
  `);
}

export function runMigrations(
  db: Database.Database,
  options: RunMigrationsOptions = {},
): Result<RunMigrationsResult, AppError> {
  const now = options.now ?? (() => new Date());
  const applied: string[] = [];
  const alreadyApplied: string[] = [];
  let currentMigration: string | null = null;

  try {
    ensureMigrationsTable(db);

    const appliedRows = db
      .prepare<[], { id: number; name: string }>(
        `
          SELECT id, name
          FROM schema_migrations
          ORDER BY id ASC
        `,
      )
      .all();

    const appliedNames = new Set(appliedRows.map((row) => row.name));

    const insertMigration = db.prepare<{ id: number; name: string; appliedAt: string }>(
      `
        INSERT INTO schema_migrations (id, name, applied_at)
        VALUES (@id, @name, @appliedAt)
      `,
    );

    for (const migration of MIGRATIONS) {
      if (appliedNames.has(migration.name)) {
        alreadyApplied.push(migration.name);
        continue;
      }

      currentMigration = migration.name;
      const applyMigrationTx = db.transaction(() => {
        migration.up(db);
        insertMigration.run({
          id: migration.id,
          name: migration.name,
          appliedAt: now().toISOString(),
        });
      });

      applyMigrationTx();
      applied.push(migration.name);
    }

    return ok({ applied, alreadyApplied });
  } catch (cause) {
    return err(
      AppError.create(
        'DB_MIGRATION_FAILED',
        'Database migrations failed.',
        'error',
        { failedMigration: currentMigration, applied },
        toError(cause),
      ),
    );
  }
}
