import type { DatabaseConnection } from '@reelstats/core';
import { runInTransaction } from '@reelstats/core';
import { AppError, createSilentLogger, err, ok, type Logger, type Result } from '@reelstats/shared';
import { z } from 'zod/v4';
import { isMissingText, trimBlank } from './sentinels.ts';

const CURRENCY_MARKERS = /\$|INR/g;
const THOUSANDS_SEPARATORS = /,/g;
const DECIMAL_PATTERN = /^(\d*)(?:\.(\d*))?$/;
// DECIMAL(15,2): thirteen integer digits, two fractional.
const MAX_INTEGER_DIGITS = 13;

export type GrossIncomeInvalidReason = 'not_numeric' | 'too_many_digits';

export type GrossIncomeParseOutcome =
  | { kind: 'absent' }
  | { kind: 'parsed'; value: number; cents: number }
  | { kind: 'invalid'; raw: string; reason: GrossIncomeInvalidReason };

/**
 * Parses a reported gross such as `$ 1,234,567.89` or `INR 500,000`.
 * Currency markers and thousands separators are dropped; fractional digits
 * past the second are rounded half-up.
 */
export function parseGrossIncome(raw: string | null | undefined): GrossIncomeParseOutcome {
  if (raw === null || raw === undefined || isMissingText(raw)) {
    return { kind: 'absent' };
  }

  const cleaned = trimBlank(raw.replace(CURRENCY_MARKERS, '').replace(THOUSANDS_SEPARATORS, ''));
  const match = DECIMAL_PATTERN.exec(cleaned);
  const integerDigits = match?.[1] ?? '';
  const fractionDigits = match?.[2] ?? '';
  if (!match || (integerDigits === '' && fractionDigits === '')) {
    return { kind: 'invalid', raw, reason: 'not_numeric' };
  }

  const significantDigits = integerDigits.replace(/^0+/, '');
  if (significantDigits.length > MAX_INTEGER_DIGITS) {
    return { kind: 'invalid', raw, reason: 'too_many_digits' };
  }

  const paddedFraction = fractionDigits.padEnd(3, '0');
  const roundUp = Number(paddedFraction.charAt(2)) >= 5 ? 1 : 0;
  const cents = Number(significantDigits || '0') * 100 + Number(paddedFraction.slice(0, 2)) + roundUp;

  return { kind: 'parsed', value: cents / 100, cents };
}

export interface GrossIncomeCoercionSummary {
  parsed: number;
  absent: number;
  invalid: number;
  /** One warning per unparseable source value. */
  warnings: AppError[];
}

export interface CoerceGrossIncomeOptions {
  logger?: Logger;
}

const GrossIncomeSourceRowSchema = z.object({
  movieId: z.string().min(1),
  rawGross: z.string().nullable(),
});

/**
 * Fills `movie.worldwide_gross_num` from the raw text column. Absent and
 * unparseable values are written as NULL so a later standardization sets them
 * to zero; unparseable ones are also reported as warnings.
 */
export function coerceGrossIncome(
  db: DatabaseConnection['db'],
  options: CoerceGrossIncomeOptions = {},
): Result<GrossIncomeCoercionSummary, AppError> {
  const logger = (options.logger ?? createSilentLogger()).withContext({ stage: 'gross-income' });

  return runInTransaction(db, 'normalizer.gross-income', () => {
    try {
      const rows = db
        .prepare<[], unknown>(
          `
            SELECT id AS movieId, worldwide_gross_income AS rawGross
            FROM movie
            ORDER BY id ASC
          `,
        )
        .all();

      const updateStmt = db.prepare<{ movieId: string; value: number | null }>(
        `
          UPDATE movie
          SET worldwide_gross_num = @value
          WHERE id = @movieId
        `,
      );

      const summary: GrossIncomeCoercionSummary = { parsed: 0, absent: 0, invalid: 0, warnings: [] };

      for (const row of rows) {
        const source = GrossIncomeSourceRowSchema.safeParse(row);
        if (!source.success) {
          return err(
            AppError.create('NORMALIZER_COERCION_FAILED', 'Movie row has an unexpected shape.', 'error', {
              issues: source.error.issues,
            }),
          );
        }

        const { movieId, rawGross } = source.data;
        const outcome = parseGrossIncome(rawGross);
        switch (outcome.kind) {
          case 'absent':
            updateStmt.run({ movieId, value: null });
            summary.absent += 1;
            break;
          case 'parsed':
            updateStmt.run({ movieId, value: outcome.value });
            summary.parsed += 1;
            break;
          case 'invalid': {
            updateStmt.run({ movieId, value: null });
            summary.invalid += 1;
            const warning = AppError.warning(
              'NORMALIZER_GROSS_INCOME_UNPARSEABLE',
              'Gross income value could not be parsed.',
              { movieId, raw: outcome.raw, reason: outcome.reason },
            );
            summary.warnings.push(warning);
            logger.warning(warning.message, warning.context);
            break;
          }
        }
      }

      return ok(summary);
    } catch (cause) {
      return err(AppError.fromCause('NORMALIZER_COERCION_FAILED', 'Gross income coercion failed.', {}, cause));
    }
  });
}
