import { fileURLToPath } from 'node:url';
import {
  createAnalyticsQueries,
  createDatabaseConnection,
  createDatasetRepository,
  loadDatasetFixtureFromFile,
  runMigrations,
  seedDatabaseFromDataset,
  type DatabaseConnection,
  type MembershipKind,
} from '@reelstats/core';
import { createLogger, type LogEntry } from '@reelstats/shared';
import { describe, expect, it } from 'vitest';
import { runNormalization } from './normalization-runner.ts';

const fixturePath = fileURLToPath(new URL('../../../fixtures/imdb-sample.json', import.meta.url));
const fixedNow = () => new Date('2026-02-01T12:00:00.000Z');

function createSeededConnection(): DatabaseConnection {
  const connectionResult = createDatabaseConnection();
  expect(connectionResult.ok).toBe(true);
  if (!connectionResult.ok) {
    throw new Error(connectionResult.error.message);
  }
  const connection = connectionResult.value;

  expect(runMigrations(connection.db).ok).toBe(true);
  const fixtureResult = loadDatasetFixtureFromFile(fixturePath);
  expect(fixtureResult.ok).toBe(true);
  if (!fixtureResult.ok) {
    throw new Error(fixtureResult.error.message);
  }
  expect(seedDatabaseFromDataset(connection.db, fixtureResult.value).ok).toBe(true);
  return connection;
}

function readMemberships(connection: DatabaseConnection, kind: MembershipKind): string[] {
  const result = createDatasetRepository(connection.db).listMemberships(kind);
  expect(result.ok).toBe(true);
  if (!result.ok) {
    return [];
  }
  return result.value.map((row) => `${row.movieId}#${String(row.position)}=${row.value}`);
}

describe('Normalization runner integration', () => {
  it('normalizes the sample dataset and reports per-stage counts', () => {
    const connection = createSeededConnection();

    const result = runNormalization({ db: connection.db, now: fixedNow });
    expect(result.ok).toBe(true);
    if (!result.ok) {
      return;
    }

    expect(result.value).toMatchObject({
      runId: 1,
      status: 'completed_with_warnings',
      startedAt: '2026-02-01T12:00:00.000Z',
      finishedAt: '2026-02-01T12:00:00.000Z',
      parsedGrossIncome: 5,
      absentGrossIncome: 2,
      invalidGrossIncome: 1,
      countryRows: 12,
      languageRows: 12,
      standardized: {
        'movie.country': 1,
        'movie.languages': 1,
        'movie.production_company': 2,
        'movie.worldwide_gross_income': 2,
        'movie.worldwide_gross_num': 3,
        'ratings.avg_rating': 1,
        'ratings.total_votes': 1,
        'ratings.median_rating': 1,
      },
    });
    expect(result.value.warnings).toHaveLength(1);
    expect(result.value.warnings[0]?.code).toBe('NORMALIZER_GROSS_INCOME_UNPARSEABLE');
    expect(result.value.warnings[0]?.severity).toBe('warning');
    expect(result.value.warnings[0]?.context).toEqual({
      movieId: 'tt0100006',
      raw: '$ 12.3.4',
      reason: 'not_numeric',
    });

    connection.close();
  });

  it('writes parsed gross values and sentinels into the movie table', () => {
    const connection = createSeededConnection();
    expect(runNormalization({ db: connection.db, now: fixedNow }).ok).toBe(true);

    const rows = connection.db
      .prepare<[], { id: string; gross: string; grossNum: number; country: string; company: string }>(
        `
          SELECT
            id,
            worldwide_gross_income AS gross,
            worldwide_gross_num AS grossNum,
            country,
            production_company AS company
          FROM movie
          ORDER BY id ASC
        `,
      )
      .all();

    expect(rows.map((row) => row.grossNum)).toEqual([1234567.89, 500000, 2500000, 0, 0, 0, 750000, 1000000.5]);
    expect(rows[0]).toEqual({
      id: 'tt0100001',
      gross: '$ 1,234,567.89',
      grossNum: 1234567.89,
      country: 'USA, UK, France, Germany',
      company: 'Northwind Pictures',
    });
    expect(rows[3]).toMatchObject({ gross: 'Unknown', company: 'Unknown' });
    expect(rows[4]).toMatchObject({ gross: 'Unknown', country: 'Unknown', company: 'Unknown' });
    expect(rows[5]).toMatchObject({ gross: '$ 12.3.4', grossNum: 0 });

    const rating = createDatasetRepository(connection.db).getRating('tt0100005');
    expect(rating).toEqual({
      ok: true,
      value: { movieId: 'tt0100005', avgRating: 0, totalVotes: 0, medianRating: 0 },
    });

    connection.close();
  });

  it('caps memberships at three tokens and keeps blank tokens', () => {
    const connection = createSeededConnection();
    expect(runNormalization({ db: connection.db, now: fixedNow }).ok).toBe(true);

    expect(readMemberships(connection, 'country')).toEqual([
      'tt0100001#1=USA',
      'tt0100001#2=UK',
      'tt0100001#3=France',
      'tt0100002#1=India',
      'tt0100003#1=USA',
      'tt0100004#1=France',
      'tt0100004#2=Belgium',
      'tt0100006#1=UK',
      'tt0100006#2=USA',
      'tt0100007#1=USA',
      'tt0100007#2=',
      'tt0100008#1=Canada',
    ]);

    expect(readMemberships(connection, 'language')).toEqual([
      'tt0100001#1=English',
      'tt0100001#2=French',
      'tt0100002#1=Hindi',
      'tt0100002#2=English',
      'tt0100003#1=English',
      'tt0100004#1=French',
      'tt0100006#1=English',
      'tt0100006#2=Spanish',
      'tt0100006#3=German',
      'tt0100007#1=English',
      'tt0100008#1=English',
      'tt0100008#2=French',
    ]);

    const staged = connection.db
      .prepare<[], { total: number }>(
        'SELECT (SELECT COUNT(*) FROM stg_movie_country) + (SELECT COUNT(*) FROM stg_movie_language) AS total',
      )
      .get();
    expect(staged?.total).toBe(0);

    connection.close();
  });

  it('drops blank tokens when configured', () => {
    const connection = createSeededConnection();
    const result = runNormalization({
      db: connection.db,
      now: fixedNow,
      options: { emitBlankTokens: false },
    });
    expect(result.ok).toBe(true);
    if (!result.ok) {
      return;
    }

    expect(result.value.countryRows).toBe(11);
    expect(readMemberships(connection, 'country')).not.toContain('tt0100007#2=');

    connection.close();
  });

  it('produces identical tables when run twice', () => {
    const connection = createSeededConnection();
    const first = runNormalization({ db: connection.db, now: fixedNow });
    expect(first.ok).toBe(true);

    const countriesAfterFirst = readMemberships(connection, 'country');
    const languagesAfterFirst = readMemberships(connection, 'language');
    const moviesAfterFirst = createDatasetRepository(connection.db).listMovies();

    const second = runNormalization({ db: connection.db, now: fixedNow });
    expect(second.ok).toBe(true);
    if (!second.ok) {
      return;
    }

    expect(second.value).toMatchObject({
      runId: 2,
      parsedGrossIncome: 5,
      absentGrossIncome: 2,
      invalidGrossIncome: 1,
      countryRows: 12,
      languageRows: 12,
      standardized: {
        'movie.country': 0,
        'movie.languages': 0,
        'movie.production_company': 0,
        'movie.worldwide_gross_income': 0,
        'movie.worldwide_gross_num': 3,
        'ratings.avg_rating': 0,
        'ratings.total_votes': 0,
        'ratings.median_rating': 0,
      },
    });
    expect(readMemberships(connection, 'country')).toEqual(countriesAfterFirst);
    expect(readMemberships(connection, 'language')).toEqual(languagesAfterFirst);
    expect(createDatasetRepository(connection.db).listMovies()).toEqual(moviesAfterFirst);

    connection.close();
  });

  it('clears a stale gross value when a re-seeded movie loses its gross income', () => {
    const connection = createSeededConnection();
    const repository = createDatasetRepository(connection.db);
    expect(runNormalization({ db: connection.db, now: fixedNow }).ok).toBe(true);

    const before = repository.getMovie('tt0100001');
    expect(before.ok).toBe(true);
    if (!before.ok || before.value === null) {
      throw new Error('tt0100001 missing after the first run');
    }
    expect(before.value.worldwideGrossNum).toBe(1234567.89);

    expect(repository.upsertMovies([{ ...before.value, worldwideGrossIncome: null }]).ok).toBe(true);
    const second = runNormalization({ db: connection.db, now: fixedNow });
    expect(second.ok).toBe(true);
    if (!second.ok) {
      return;
    }
    expect(second.value.absentGrossIncome).toBe(3);

    const after = repository.getMovie('tt0100001');
    expect(after.ok).toBe(true);
    if (!after.ok || after.value === null) {
      throw new Error('tt0100001 missing after the second run');
    }
    expect(after.value.worldwideGrossIncome).toBe('Unknown');
    expect(after.value.worldwideGrossNum).toBe(0);

    connection.close();
  });

  it('records each run in normalization_runs', () => {
    const connection = createSeededConnection();
    expect(runNormalization({ db: connection.db, now: fixedNow }).ok).toBe(true);

    const runs = connection.db
      .prepare<
        [],
        {
          status: string;
          startedAt: string;
          grossParsed: number;
          grossInvalid: number;
          countryRows: number;
          optionsJson: string;
          errorCode: string | null;
        }
      >(
        `
          SELECT
            status,
            started_at AS startedAt,
            gross_parsed AS grossParsed,
            gross_invalid AS grossInvalid,
            country_rows AS countryRows,
            options_json AS optionsJson,
            error_code AS errorCode
          FROM normalization_runs
          ORDER BY id ASC
        `,
      )
      .all();

    expect(runs).toEqual([
      {
        status: 'completed_with_warnings',
        startedAt: '2026-02-01T12:00:00.000Z',
        grossParsed: 5,
        grossInvalid: 1,
        countryRows: 12,
        optionsJson: '{"tokenLimit":3,"emitBlankTokens":true}',
        errorCode: null,
      },
    ]);

    connection.close();
  });

  it('records a failed run when a stage fails', () => {
    const connection = createSeededConnection();
    connection.db.exec('DROP TABLE stg_movie_language');

    const result = runNormalization({ db: connection.db, now: fixedNow });
    expect(result.ok).toBe(false);
    if (result.ok) {
      return;
    }
    expect(result.error.code).toBe('NORMALIZER_MEMBERSHIP_REBUILD_FAILED');
    expect(result.error.context).toEqual({ kind: 'language', stage: 'staging' });

    const run = connection.db
      .prepare<[], { status: string; countryRows: number; errorCode: string | null }>(
        `
          SELECT status, country_rows AS countryRows, error_code AS errorCode
          FROM normalization_runs
        `,
      )
      .get();
    expect(run).toEqual({
      status: 'failed',
      countryRows: 12,
      errorCode: 'NORMALIZER_MEMBERSHIP_REBUILD_FAILED',
    });

    connection.close();
  });

  it('rejects invalid options before touching the database', () => {
    const connection = createSeededConnection();

    const result = runNormalization({ db: connection.db, options: { tokenLimit: -1 } });
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.code).toBe('NORMALIZER_OPTIONS_INVALID');
    }

    const runs = connection.db.prepare<[], { total: number }>('SELECT COUNT(*) AS total FROM normalization_runs').get();
    expect(runs?.total).toBe(0);

    connection.close();
  });

  it('logs each stage', () => {
    const connection = createSeededConnection();
    const entries: LogEntry[] = [];
    const logger = createLogger({
      writer: (entry) => {
        entries.push(entry);
      },
      now: () => '2026-02-01T12:00:00.000Z',
      minLevel: 'info',
    });

    expect(runNormalization({ db: connection.db, now: fixedNow, logger }).ok).toBe(true);

    expect(entries.map((entry) => `${entry.level}:${entry.message}`)).toEqual([
      'info:normalization started',
      'warning:Gross income value could not be parsed.',
      'info:gross income coerced',
      'info:membership table rebuilt',
      'info:membership table rebuilt',
      'info:missing values standardized',
      'info:normalization finished',
    ]);
    expect(entries[1]?.context).toMatchObject({ component: 'normalizer', stage: 'gross-income', movieId: 'tt0100006' });
    expect(entries[4]?.context).toMatchObject({ kind: 'language', table: 'movie_language', rows: 12 });

    connection.close();
  });

  it('feeds the analytical queries that depend on normalized columns', () => {
    const connection = createSeededConnection();
    expect(runNormalization({ db: connection.db, now: fixedNow }).ok).toBe(true);
    const queries = createAnalyticsQueries(connection.db);

    const batch = queries.runAll();
    expect(batch.ok).toBe(true);
    if (batch.ok) {
      expect(batch.value.filter((outcome) => outcome.status === 'failed')).toEqual([]);
    }

    const topGrossing = queries.runQuery('Q12');
    expect(topGrossing.ok && topGrossing.value.rows).toEqual([
      { year: 2017, title: 'Copper Tide', worldwide_gross_num: 750000 },
      { year: 2018, title: 'Paper Comets', worldwide_gross_num: 2500000 },
      { year: 2019, title: 'Harbor Lights', worldwide_gross_num: 1234567.89 },
    ]);

    const language = queries.runQuery('Q14');
    expect(language.ok && language.value.rows).toEqual([{ language: 'English', movie_count: 6 }]);

    const companies = queries.runQuery('Q18');
    expect(companies.ok).toBe(true);
    if (companies.ok) {
      expect(companies.value.rows.map((row) => row.production_company)).toEqual([
        'Northwind Pictures',
        'Ridgeline Films',
        'Lotus Frame Studios',
      ]);
      expect(companies.value.rows[0]?.total_gross).toBeCloseTo(4734568.39, 2);
    }

    const countries = queries.runQuery('Q20');
    expect(countries.ok && countries.value.rows).toEqual([
      { country: 'USA', total_movies: 4 },
      { country: 'France', total_movies: 2 },
      { country: 'UK', total_movies: 2 },
      { country: '', total_movies: 1 },
      { country: 'Belgium', total_movies: 1 },
    ]);

    const perYear = queries.runQuery('Q43');
    expect(perYear.ok).toBe(true);
    if (perYear.ok) {
      expect(perYear.value.rows.map((row) => row.year)).toEqual([2017, 2018, 2019]);
      expect(perYear.value.rows[1]?.total_gross).toBeCloseTo(3500000.5, 2);
      expect(perYear.value.rows[2]?.total_gross).toBeCloseTo(1734567.89, 2);
    }

    connection.close();
  });
});
