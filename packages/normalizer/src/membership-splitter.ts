import {
  MEMBERSHIP_TABLES,
  runInTransaction,
  type DatabaseConnection,
  type MembershipKind,
  type MembershipRecord,
} from '@reelstats/core';
import {
  AppError,
  DEFAULT_MEMBERSHIP_TOKEN_LIMIT,
  createSilentLogger,
  err,
  ok,
  type Logger,
  type Result,
} from '@reelstats/shared';
import { z } from 'zod/v4';
import { isMissingText, trimBlank } from './sentinels.ts';

const TOKEN_DELIMITER = ',';

export interface MembershipSplitOptions {
  /** Highest position kept per movie. */
  tokenLimit: number;
  /** Keep empty tokens produced by trailing or doubled delimiters. */
  emitBlankTokens: boolean;
}

export const DEFAULT_MEMBERSHIP_SPLIT_OPTIONS: MembershipSplitOptions = {
  tokenLimit: DEFAULT_MEMBERSHIP_TOKEN_LIMIT,
  emitBlankTokens: true,
};

const MembershipSplitOptionsSchema = z.object({
  tokenLimit: z.number().int().min(1).max(100),
  emitBlankTokens: z.boolean(),
});

export function resolveMembershipSplitOptions(
  options: Partial<MembershipSplitOptions> = {},
): Result<MembershipSplitOptions, AppError> {
  const parsed = MembershipSplitOptionsSchema.safeParse({ ...DEFAULT_MEMBERSHIP_SPLIT_OPTIONS, ...options });
  if (!parsed.success) {
    return err(
      AppError.create('NORMALIZER_OPTIONS_INVALID', 'Membership split options are invalid.', 'error', {
        issues: parsed.error.issues.map((issue) => ({
          path: issue.path.join('.'),
          message: issue.message,
        })),
      }),
    );
  }
  return ok(parsed.data);
}

/**
 * Splits a comma-delimited field into ordered membership rows. Only the first
 * `tokenLimit` segments are considered. With blank tokens filtered out, the
 * remaining tokens are renumbered from 1.
 */
export function splitMembershipField(
  movieId: string,
  raw: string | null | undefined,
  options: MembershipSplitOptions = DEFAULT_MEMBERSHIP_SPLIT_OPTIONS,
): MembershipRecord[] {
  if (raw === null || raw === undefined || isMissingText(raw)) {
    return [];
  }

  const segments = raw
    .split(TOKEN_DELIMITER)
    .slice(0, Math.max(0, options.tokenLimit))
    .map((segment) => trimBlank(segment));
  const tokens = options.emitBlankTokens ? segments : segments.filter((segment) => segment !== '');

  return tokens.map((value, index) => ({ movieId, position: index + 1, value }));
}

export interface MembershipRebuildSummary {
  kind: MembershipKind;
  sourceMovies: number;
  insertedRows: number;
  /** Movies whose source had more segments than the token limit. */
  truncatedMovies: number;
  blankTokens: number;
}

export interface RebuildMembershipOptions extends Partial<MembershipSplitOptions> {
  logger?: Logger;
}

const MembershipSourceRowSchema = z.object({
  movieId: z.string().min(1),
  raw: z.string().nullable(),
});

function countSegments(raw: string | null): number {
  if (isMissingText(raw) || raw === null) {
    return 0;
  }
  return raw.split(TOKEN_DELIMITER).length;
}

function createRebuildError(kind: MembershipKind, stage: string, cause: unknown): AppError {
  return AppError.fromCause(
    'NORMALIZER_MEMBERSHIP_REBUILD_FAILED',
    'Membership table rebuild failed.',
    { kind, stage },
    cause,
  );
}

/**
 * Fills the staging table for `kind` from the movie source column, replacing
 * whatever was staged before. The live table is not touched.
 */
export function stageMembershipTable(
  db: DatabaseConnection['db'],
  kind: MembershipKind,
  splitOptions: MembershipSplitOptions,
): Result<MembershipRebuildSummary, AppError> {
  const tables = MEMBERSHIP_TABLES[kind];

  return runInTransaction(db, `normalizer.membership.${kind}.stage`, () => {
    try {
      const sourceRows = db
        .prepare<[], unknown>(
          `
            SELECT id AS movieId, ${tables.sourceColumn} AS raw
            FROM movie
            ORDER BY id ASC
          `,
        )
        .all();

      db.prepare(`DELETE FROM ${tables.stagingTable}`).run();
      const insertStagingStmt = db.prepare<MembershipRecord>(
        `
          INSERT INTO ${tables.stagingTable} (movie_id, position, ${tables.valueColumn})
          VALUES (@movieId, @position, @value)
        `,
      );

      const summary: MembershipRebuildSummary = {
        kind,
        sourceMovies: sourceRows.length,
        insertedRows: 0,
        truncatedMovies: 0,
        blankTokens: 0,
      };

      for (const row of sourceRows) {
        const source = MembershipSourceRowSchema.safeParse(row);
        if (!source.success) {
          return err(
            AppError.create('NORMALIZER_MEMBERSHIP_REBUILD_FAILED', 'Movie row has an unexpected shape.', 'error', {
              kind,
              stage: 'staging',
              issues: source.error.issues,
            }),
          );
        }

        const records = splitMembershipField(source.data.movieId, source.data.raw, splitOptions);
        for (const record of records) {
          insertStagingStmt.run(record);
          if (record.value === '') {
            summary.blankTokens += 1;
          }
        }
        summary.insertedRows += records.length;
        if (countSegments(source.data.raw) > splitOptions.tokenLimit) {
          summary.truncatedMovies += 1;
        }
      }

      return ok(summary);
    } catch (cause) {
      return err(createRebuildError(kind, 'staging', cause));
    }
  });
}

/**
 * Replaces the live table for `kind` with the staged rows and clears staging,
 * in one transaction. Returns the number of published rows.
 */
export function publishMembershipTable(db: DatabaseConnection['db'], kind: MembershipKind): Result<number, AppError> {
  const tables = MEMBERSHIP_TABLES[kind];

  return runInTransaction(db, `normalizer.membership.${kind}.publish`, () => {
    try {
      db.prepare(`DELETE FROM ${tables.table}`).run();
      const inserted = db
        .prepare(
          `
            INSERT INTO ${tables.table} (movie_id, position, ${tables.valueColumn})
            SELECT movie_id, position, ${tables.valueColumn}
            FROM ${tables.stagingTable}
            ORDER BY movie_id ASC, position ASC
          `,
        )
        .run();
      db.prepare(`DELETE FROM ${tables.stagingTable}`).run();
      return ok(inserted.changes);
    } catch (cause) {
      return err(createRebuildError(kind, 'publish', cause));
    }
  });
}

/** Stages, then publishes, a membership table. */
export function rebuildMembershipTable(
  db: DatabaseConnection['db'],
  kind: MembershipKind,
  options: RebuildMembershipOptions = {},
): Result<MembershipRebuildSummary, AppError> {
  const { logger: providedLogger, ...splitInput } = options;
  const logger = (providedLogger ?? createSilentLogger()).withContext({ stage: 'membership', kind });

  const splitOptionsResult = resolveMembershipSplitOptions(splitInput);
  if (!splitOptionsResult.ok) {
    return splitOptionsResult;
  }

  const stagedResult = stageMembershipTable(db, kind, splitOptionsResult.value);
  if (!stagedResult.ok) {
    return stagedResult;
  }

  const publishResult = publishMembershipTable(db, kind);
  if (!publishResult.ok) {
    return publishResult;
  }

  logger.info('membership table rebuilt', {
    table: MEMBERSHIP_TABLES[kind].table,
    rows: publishResult.value,
    truncatedMovies: stagedResult.value.truncatedMovies,
    blankTokens: stagedResult.value.blankTokens,
  });

  return ok({ ...stagedResult.value, insertedRows: publishResult.value });
}
