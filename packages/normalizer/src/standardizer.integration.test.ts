import {
  createDatabaseConnection,
  createDatasetRepository,
  runMigrations,
  type DatabaseConnection,
  type MovieInput,
} from '@reelstats/core';
import { describe, expect, it } from 'vitest';
import { isMissingText } from './sentinels.ts';
import { standardizeMissingValues } from './standardizer.ts';

const baseMovie: MovieInput = {
  id: 'tt1',
  title: 'Placeholder',
  year: 2020,
  datePublished: '2020-01-01',
  duration: 90,
  country: null,
  worldwideGrossIncome: null,
  languages: null,
  productionCompany: null,
};

function createConnectionWithMovies(movies: MovieInput[]): DatabaseConnection {
  const connectionResult = createDatabaseConnection();
  expect(connectionResult.ok).toBe(true);
  if (!connectionResult.ok) {
    throw new Error(connectionResult.error.message);
  }
  expect(runMigrations(connectionResult.value.db).ok).toBe(true);
  expect(createDatasetRepository(connectionResult.value.db).upsertMovies(movies).ok).toBe(true);
  return connectionResult.value;
}

describe('standardizeMissingValues', () => {
  it('replaces NULL and whitespace-only text with Unknown', () => {
    const connection = createConnectionWithMovies([
      { ...baseMovie, id: 'tt1', country: '\t\n', languages: ' \r\n ', productionCompany: '' },
    ]);

    const result = standardizeMissingValues(connection.db);
    expect(result.ok).toBe(true);
    if (!result.ok) {
      return;
    }
    expect(result.value['movie.country']).toBe(1);
    expect(result.value['movie.worldwide_gross_income']).toBe(1);
    expect(result.value['movie.worldwide_gross_num']).toBe(1);
    expect(result.value['ratings.avg_rating']).toBe(0);

    const movie = createDatasetRepository(connection.db).getMovie('tt1');
    expect(movie.ok && movie.value).toMatchObject({
      country: 'Unknown',
      languages: 'Unknown',
      productionCompany: 'Unknown',
      worldwideGrossIncome: 'Unknown',
      worldwideGrossNum: 0,
    });

    connection.close();
  });

  it('agrees with isMissingText on which whitespace counts as blank', () => {
    const connection = createConnectionWithMovies([
      { ...baseMovie, id: 'tt1', country: '\u00A0', languages: ' \t\r\n', productionCompany: '\u00A0 ' },
    ]);

    expect(standardizeMissingValues(connection.db).ok).toBe(true);

    const movie = createDatasetRepository(connection.db).getMovie('tt1');
    expect(movie.ok).toBe(true);
    if (!movie.ok || movie.value === null) {
      throw new Error('tt1 missing');
    }
    expect(movie.value).toMatchObject({ country: '\u00A0', languages: 'Unknown', productionCompany: '\u00A0 ' });
    expect(isMissingText('\u00A0')).toBe(false);
    expect(isMissingText(' \t\r\n')).toBe(true);
    expect(isMissingText('\u00A0 ')).toBe(false);

    connection.close();
  });

  it('never alters present values', () => {
    const connection = createConnectionWithMovies([
      {
        ...baseMovie,
        id: 'tt2',
        country: ' USA ',
        languages: 'English,',
        productionCompany: 'Harbor & Sons',
        worldwideGrossIncome: 'not a number',
      },
    ]);
    connection.db.prepare(`UPDATE movie SET worldwide_gross_num = 12.5 WHERE id = 'tt2'`).run();

    const result = standardizeMissingValues(connection.db);
    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(Object.values(result.value).every((count) => count === 0)).toBe(true);
    }

    const movie = createDatasetRepository(connection.db).getMovie('tt2');
    expect(movie.ok && movie.value).toMatchObject({
      country: ' USA ',
      languages: 'English,',
      productionCompany: 'Harbor & Sons',
      worldwideGrossIncome: 'not a number',
      worldwideGrossNum: 12.5,
    });

    connection.close();
  });

  it('reports the field whose update failed', () => {
    const connection = createConnectionWithMovies([baseMovie]);

    const result = standardizeMissingValues(connection.db, {
      rules: [
        { table: 'movie', column: 'country', kind: 'text' },
        { table: 'movie', column: 'missing_column', kind: 'numeric' },
      ],
    });
    expect(result.ok).toBe(false);
    if (result.ok) {
      return;
    }
    expect(result.error.code).toBe('NORMALIZER_STANDARDIZATION_FAILED');
    expect(result.error.context).toEqual({ field: 'movie.missing_column' });

    const movie = createDatasetRepository(connection.db).getMovie('tt1');
    expect(movie.ok && movie.value?.country).toBeNull();

    connection.close();
  });
});
