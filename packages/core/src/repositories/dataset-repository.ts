import type Database from 'better-sqlite3';
import { AppError, err, mapResult, ok, type Result } from '@reelstats/shared';
import { z } from 'zod/v4';
import { MEMBERSHIP_TABLES, type MembershipKind } from './membership-tables.ts';
import type {
  DirectorMappingInput,
  GenreInput,
  MembershipRecord,
  MovieInput,
  MovieRecord,
  NameInput,
  RatingInput,
  RatingRecord,
  RoleMappingInput,
} from './types.ts';

export interface DatasetRepository {
  upsertMovies: (inputs: readonly MovieInput[]) => Result<void, AppError>;
  upsertNames: (inputs: readonly NameInput[]) => Result<void, AppError>;
  insertGenres: (inputs: readonly GenreInput[]) => Result<void, AppError>;
  insertDirectorMappings: (inputs: readonly DirectorMappingInput[]) => Result<void, AppError>;
  upsertRoleMappings: (inputs: readonly RoleMappingInput[]) => Result<void, AppError>;
  upsertRatings: (inputs: readonly RatingInput[]) => Result<void, AppError>;
  getMovie: (movieId: string) => Result<MovieRecord | null, AppError>;
  listMovies: () => Result<MovieRecord[], AppError>;
  getRating: (movieId: string) => Result<RatingRecord | null, AppError>;
  listMemberships: (kind: MembershipKind) => Result<MembershipRecord[], AppError>;
}

const MovieRowSchema = z.object({
  id: z.string().min(1),
  title: z.string(),
  year: z.number().int().nullable(),
  datePublished: z.string().nullable(),
  duration: z.number().int().nullable(),
  country: z.string().nullable(),
  worldwideGrossIncome: z.string().nullable(),
  languages: z.string().nullable(),
  productionCompany: z.string().nullable(),
  worldwideGrossNum: z.number().nullable(),
});

const RatingRowSchema = z.object({
  movieId: z.string().min(1),
  avgRating: z.number().nullable(),
  totalVotes: z.number().int().nullable(),
  medianRating: z.number().int().nullable(),
});

const MembershipRowSchema = z.object({
  movieId: z.string().min(1),
  position: z.number().int().positive(),
  value: z.string(),
});

const MOVIE_COLUMNS = `
  id,
  title,
  year,
  date_published AS datePublished,
  duration,
  country,
  worldwide_gross_income AS worldwideGrossIncome,
  languages,
  production_company AS productionCompany,
  worldwide_gross_num AS worldwideGrossNum
`;

function parseRows<T>(
  rows: readonly unknown[],
  schema: z.ZodType<T>,
  table: string,
): Result<T[], AppError> {
  const parsedRows: T[] = [];
  for (let index = 0; index < rows.length; index += 1) {
    const parsed = schema.safeParse(rows[index]);
    if (!parsed.success) {
      return err(
        AppError.create('DATASET_READ_BACK_FAILED', 'Stored row does not match the expected shape.', 'error', {
          table,
          rowIndex: index,
          issues: parsed.error.issues,
        }),
      );
    }
    parsedRows.push(parsed.data);
  }
  return ok(parsedRows);
}

function runWrite<T>(
  write: (inputs: readonly T[]) => void,
  inputs: readonly T[],
  table: string,
): Result<void, AppError> {
  try {
    write(inputs);
    return ok(undefined);
  } catch (cause) {
    return err(
      AppError.fromCause('DATASET_WRITE_FAILED', `Could not write rows to ${table}.`, { table, items: inputs.length }, cause),
    );
  }
}

function runRead<T>(read: () => Result<T, AppError>, table: string, context: Record<string, unknown>): Result<T, AppError> {
  try {
    return read();
  } catch (cause) {
    return err(
      AppError.fromCause('DATASET_READ_BACK_FAILED', `Could not read rows from ${table}.`, { table, ...context }, cause),
    );
  }
}

export function createDatasetRepository(db: Database.Database): DatasetRepository {
  // id is left out of the update set: a movie identifier never changes once stored.
  const upsertMovieStmt = db.prepare<MovieInput>(
    `
      INSERT INTO movie (
        id, title, year, date_published, duration, country,
        worldwide_gross_income, languages, production_company
      )
      VALUES (
        @id, @title, @year, @datePublished, @duration, @country,
        @worldwideGrossIncome, @languages, @productionCompany
      )
      ON CONFLICT(id) DO UPDATE SET
        title = excluded.title,
        year = excluded.year,
        date_published = excluded.date_published,
        duration = excluded.duration,
        country = excluded.country,
        worldwide_gross_income = excluded.worldwide_gross_income,
        languages = excluded.languages,
        production_company = excluded.production_company
    `,
  );

  const upsertNameStmt = db.prepare<NameInput>(
    `
      INSERT INTO names (id, name, height, date_of_birth, known_for_movies)
      VALUES (@id, @name, @height, @dateOfBirth, @knownForMovies)
      ON CONFLICT(id) DO UPDATE SET
        name = excluded.name,
        height = excluded.height,
        date_of_birth = excluded.date_of_birth,
        known_for_movies = excluded.known_for_movies
    `,
  );

  const insertGenreStmt = db.prepare<GenreInput>(
    `
      INSERT INTO genre (movie_id, genre)
      VALUES (@movieId, @genre)
      ON CONFLICT(movie_id, genre) DO NOTHING
    `,
  );

  const insertDirectorMappingStmt = db.prepare<DirectorMappingInput>(
    `
      INSERT INTO director_mapping (movie_id, name_id)
      VALUES (@movieId, @nameId)
      ON CONFLICT(movie_id, name_id) DO NOTHING
    `,
  );

  const upsertRoleMappingStmt = db.prepare<RoleMappingInput>(
    `
      INSERT INTO role_mapping (movie_id, name_id, category)
      VALUES (@movieId, @nameId, @category)
      ON CONFLICT(movie_id, name_id) DO UPDATE SET
        category = excluded.category
    `,
  );

  const upsertRatingStmt = db.prepare<RatingInput>(
    `
      INSERT INTO ratings (movie_id, avg_rating, total_votes, median_rating)
      VALUES (@movieId, @avgRating, @totalVotes, @medianRating)
      ON CONFLICT(movie_id) DO UPDATE SET
        avg_rating = excluded.avg_rating,
        total_votes = excluded.total_votes,
        median_rating = excluded.median_rating
    `,
  );

  const getMovieStmt = db.prepare<{ movieId: string }, unknown>(
    `
      SELECT ${MOVIE_COLUMNS}
      FROM movie
      WHERE id = @movieId
      LIMIT 1
    `,
  );

  const listMoviesStmt = db.prepare<[], unknown>(
    `
      SELECT ${MOVIE_COLUMNS}
      FROM movie
      ORDER BY id ASC
    `,
  );

  const getRatingStmt = db.prepare<{ movieId: string }, unknown>(
    `
      SELECT
        movie_id AS movieId,
        avg_rating AS avgRating,
        total_votes AS totalVotes,
        median_rating AS medianRating
      FROM ratings
      WHERE movie_id = @movieId
      LIMIT 1
    `,
  );

  const listMembershipStmts = {
    country: db.prepare<[], unknown>(
      `
        SELECT movie_id AS movieId, position, ${MEMBERSHIP_TABLES.country.valueColumn} AS value
        FROM ${MEMBERSHIP_TABLES.country.table}
        ORDER BY movie_id ASC, position ASC
      `,
    ),
    language: db.prepare<[], unknown>(
      `
        SELECT movie_id AS movieId, position, ${MEMBERSHIP_TABLES.language.valueColumn} AS value
        FROM ${MEMBERSHIP_TABLES.language.table}
        ORDER BY movie_id ASC, position ASC
      `,
    ),
  } satisfies Record<MembershipKind, unknown>;

  const upsertMoviesTx = db.transaction((inputs: readonly MovieInput[]) => {
    for (const input of inputs) {
      upsertMovieStmt.run(input);
    }
  });

  const upsertNamesTx = db.transaction((inputs: readonly NameInput[]) => {
    for (const input of inputs) {
      upsertNameStmt.run(input);
    }
  });

  const insertGenresTx = db.transaction((inputs: readonly GenreInput[]) => {
    for (const input of inputs) {
      insertGenreStmt.run(input);
    }
  });

  const insertDirectorMappingsTx = db.transaction((inputs: readonly DirectorMappingInput[]) => {
    for (const input of inputs) {
      insertDirectorMappingStmt.run(input);
    }
  });

  const upsertRoleMappingsTx = db.transaction((inputs: readonly RoleMappingInput[]) => {
    for (const input of inputs) {
      upsertRoleMappingStmt.run(input);
    }
  });

  const upsertRatingsTx = db.transaction((inputs: readonly RatingInput[]) => {
    for (const input of inputs) {
      upsertRatingStmt.run(input);
    }
  });

  return {
    upsertMovies: (inputs) => runWrite(upsertMoviesTx, inputs, 'movie'),
    upsertNames: (inputs) => runWrite(upsertNamesTx, inputs, 'names'),
    insertGenres: (inputs) => runWrite(insertGenresTx, inputs, 'genre'),
    insertDirectorMappings: (inputs) => runWrite(insertDirectorMappingsTx, inputs, 'director_mapping'),
    upsertRoleMappings: (inputs) => runWrite(upsertRoleMappingsTx, inputs, 'role_mapping'),
    upsertRatings: (inputs) => runWrite(upsertRatingsTx, inputs, 'ratings'),

    getMovie: (movieId) =>
      runRead(
        () => {
          const row = getMovieStmt.get({ movieId });
          if (row === undefined) {
            return ok(null);
          }
          return mapResult(parseRows([row], MovieRowSchema, 'movie'), (rows) => rows[0] ?? null);
        },
        'movie',
        { movieId },
      ),

    listMovies: () => runRead(() => parseRows(listMoviesStmt.all(), MovieRowSchema, 'movie'), 'movie', {}),

    getRating: (movieId) =>
      runRead(
        () => {
          const row = getRatingStmt.get({ movieId });
          if (row === undefined) {
            return ok(null);
          }
          return mapResult(parseRows([row], RatingRowSchema, 'ratings'), (rows) => rows[0] ?? null);
        },
        'ratings',
        { movieId },
      ),

    listMemberships: (kind) =>
      runRead(
        () => parseRows(listMembershipStmts[kind].all(), MembershipRowSchema, MEMBERSHIP_TABLES[kind].table),
        MEMBERSHIP_TABLES[kind].table,
        { kind },
      ),
  };
}
