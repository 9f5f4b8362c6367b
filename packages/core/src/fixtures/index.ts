import fs from 'node:fs';
import type Database from 'better-sqlite3';
import { AppError, err, ok, toError, type Result } from '@reelstats/shared';
import { runInTransaction } from '../database.ts';
import { createDatasetRepository } from '../repositories/dataset-repository.ts';
import { DatasetFixtureSchema, type DatasetFixture, type SeedDatasetResult } from './types.ts';

export { DatasetFixtureSchema, type DatasetFixture, type SeedDatasetResult } from './types.ts';

export function parseDatasetFixture(value: unknown, source: string): Result<DatasetFixture, AppError> {
  const parsed = DatasetFixtureSchema.safeParse(value);
  if (!parsed.success) {
    return err(
      AppError.create('DATASET_INVALID', 'Dataset file has an invalid format.', 'error', {
        source,
        issues: parsed.error.issues.map((issue) => ({
          path: issue.path.join('.'),
          message: issue.message,
        })),
      }),
    );
  }
  return ok(parsed.data);
}

export function loadDatasetFixtureFromFile(filePath: string): Result<DatasetFixture, AppError> {
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(filePath, 'utf8'));
  } catch (cause) {
    return err(
      AppError.create(
        'DATASET_READ_FAILED',
        'Could not read the dataset file.',
        'error',
        { filePath },
        toError(cause),
      ),
    );
  }

  return parseDatasetFixture(raw, filePath);
}

/**
 * Loads the dataset into the base tables in one transaction. Parents go first
 * so the foreign keys on the mapping tables hold.
 */
export function seedDatabaseFromDataset(
  db: Database.Database,
  fixture: DatasetFixture,
): Result<SeedDatasetResult, AppError> {
  const repository = createDatasetRepository(db);

  return runInTransaction(db, 'dataset.seed', () => {
    const steps = [
      () => repository.upsertMovies(fixture.movies),
      () => repository.upsertNames(fixture.names),
      () => repository.insertGenres(fixture.genres),
      () => repository.insertDirectorMappings(fixture.directorMappings),
      () => repository.upsertRoleMappings(fixture.roleMappings),
      () => repository.upsertRatings(fixture.ratings),
    ];

    for (const step of steps) {
      const result = step();
      if (!result.ok) {
        return result;
      }
    }

    return ok({
      moviesInserted: fixture.movies.length,
      namesInserted: fixture.names.length,
      genresInserted: fixture.genres.length,
      directorMappingsInserted: fixture.directorMappings.length,
      roleMappingsInserted: fixture.roleMappings.length,
      ratingsInserted: fixture.ratings.length,
    });
  });
}
