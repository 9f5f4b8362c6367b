import { runInTransaction, type DatabaseConnection } from '@reelstats/core';
import { AppError, createSilentLogger, err, ok, type Logger, type Result } from '@reelstats/shared';
import { NUMERIC_SENTINEL, TEXT_SENTINEL } from './sentinels.ts';

export interface StandardizationRule {
  table: 'movie' | 'ratings';
  column: string;
  kind: 'text' | 'numeric';
}

export const STANDARDIZATION_RULES: ReadonlyArray<StandardizationRule> = [
  { table: 'movie', column: 'country', kind: 'text' },
  { table: 'movie', column: 'languages', kind: 'text' },
  { table: 'movie', column: 'production_company', kind: 'text' },
  { table: 'movie', column: 'worldwide_gross_income', kind: 'text' },
  { table: 'movie', column: 'worldwide_gross_num', kind: 'numeric' },
  { table: 'ratings', column: 'avg_rating', kind: 'numeric' },
  { table: 'ratings', column: 'total_votes', kind: 'numeric' },
  { table: 'ratings', column: 'median_rating', kind: 'numeric' },
];

/** Updated row count keyed by `table.column`. */
export type StandardizationSummary = Record<string, number>;

export interface StandardizeMissingValuesOptions {
  logger?: Logger;
  rules?: ReadonlyArray<StandardizationRule>;
}

function ruleKey(rule: StandardizationRule): string {
  return `${rule.table}.${rule.column}`;
}

function buildStatement(rule: StandardizationRule): string {
  if (rule.kind === 'text') {
    // Blank means empty after trimming space, tab, newline and carriage return.
    return `
      UPDATE ${rule.table}
      SET ${rule.column} = @sentinel
      WHERE ${rule.column} IS NULL
        OR TRIM(${rule.column}, char(32, 9, 10, 13)) = ''
    `;
  }
  return `
    UPDATE ${rule.table}
    SET ${rule.column} = @sentinel
    WHERE ${rule.column} IS NULL
  `;
}

/**
 * Replaces missing values with sentinels: `Unknown` for text, `0` for
 * numbers. Non-empty values are never touched.
 */
export function standardizeMissingValues(
  db: DatabaseConnection['db'],
  options: StandardizeMissingValuesOptions = {},
): Result<StandardizationSummary, AppError> {
  const logger = (options.logger ?? createSilentLogger()).withContext({ stage: 'standardization' });
  const rules = options.rules ?? STANDARDIZATION_RULES;

  const result = runInTransaction(db, 'normalizer.standardize', () => {
    const summary: StandardizationSummary = {};
    for (const rule of rules) {
      const field = ruleKey(rule);
      try {
        const sentinel = rule.kind === 'text' ? TEXT_SENTINEL : NUMERIC_SENTINEL;
        const info = db.prepare<{ sentinel: string | number }>(buildStatement(rule)).run({ sentinel });
        summary[field] = info.changes;
      } catch (cause) {
        return err(
          AppError.fromCause('NORMALIZER_STANDARDIZATION_FAILED', 'Missing value standardization failed.', { field }, cause),
        );
      }
    }
    return ok(summary);
  });

  if (result.ok) {
    logger.info('missing values standardized', { updated: result.value });
  }
  return result;
}
