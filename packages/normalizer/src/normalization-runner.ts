import type { DatabaseConnection } from '@reelstats/core';
import { AppError, createSilentLogger, err, ok, type Logger, type Result } from '@reelstats/shared';
import { coerceGrossIncome } from './gross-income.ts';
import {
  rebuildMembershipTable,
  resolveMembershipSplitOptions,
  type MembershipSplitOptions,
} from './membership-splitter.ts';
import { standardizeMissingValues, type StandardizationSummary } from './standardizer.ts';

export type NormalizationRunStatus = 'completed' | 'completed_with_warnings' | 'failed';

export interface RunNormalizationInput {
  db: DatabaseConnection['db'];
  options?: Partial<MembershipSplitOptions>;
  logger?: Logger;
  now?: () => Date;
}

export interface NormalizationRunSummary {
  runId: number;
  status: Exclude<NormalizationRunStatus, 'failed'>;
  startedAt: string;
  finishedAt: string;
  parsedGrossIncome: number;
  absentGrossIncome: number;
  invalidGrossIncome: number;
  countryRows: number;
  languageRows: number;
  standardized: StandardizationSummary;
  warnings: AppError[];
}

interface NormalizationRunRecord {
  status: NormalizationRunStatus;
  startedAt: string;
  finishedAt: string;
  grossParsed: number;
  grossAbsent: number;
  grossInvalid: number;
  countryRows: number;
  languageRows: number;
  standardizedJson: string;
  optionsJson: string;
  errorCode: string | null;
  errorMessage: string | null;
}

function recordRun(db: DatabaseConnection['db'], record: NormalizationRunRecord): Result<number, AppError> {
  try {
    const info = db
      .prepare<NormalizationRunRecord>(
        `
          INSERT INTO normalization_runs (
            status,
            started_at,
            finished_at,
            gross_parsed,
            gross_absent,
            gross_invalid,
            country_rows,
            language_rows,
            standardized_json,
            options_json,
            error_code,
            error_message
          )
          VALUES (
            @status,
            @startedAt,
            @finishedAt,
            @grossParsed,
            @grossAbsent,
            @grossInvalid,
            @countryRows,
            @languageRows,
            @standardizedJson,
            @optionsJson,
            @errorCode,
            @errorMessage
          )
        `,
      )
      .run(record);
    return ok(Number(info.lastInsertRowid));
  } catch (cause) {
    return err(
      AppError.fromCause(
        'NORMALIZER_LINEAGE_FAILED',
        'Could not record the normalization run.',
        { status: record.status },
        cause,
      ),
    );
  }
}

/**
 * Runs the normalizer stages in their fixed order: gross income coercion,
 * country and language membership rebuilds, then missing value
 * standardization. Every run, failed ones included, is recorded in
 * `normalization_runs`.
 */
export function runNormalization(input: RunNormalizationInput): Result<NormalizationRunSummary, AppError> {
  const now = input.now ?? (() => new Date());
  const logger = (input.logger ?? createSilentLogger()).withContext({ component: 'normalizer' });

  const optionsResult = resolveMembershipSplitOptions(input.options);
  if (!optionsResult.ok) {
    return optionsResult;
  }
  const options = optionsResult.value;

  const startedAt = now().toISOString();
  const progress: NormalizationRunRecord = {
    status: 'failed',
    startedAt,
    finishedAt: startedAt,
    grossParsed: 0,
    grossAbsent: 0,
    grossInvalid: 0,
    countryRows: 0,
    languageRows: 0,
    standardizedJson: '{}',
    optionsJson: JSON.stringify(options),
    errorCode: null,
    errorMessage: null,
  };

  const fail = (error: AppError): Result<NormalizationRunSummary, AppError> => {
    logger.error('normalization failed', { code: error.code, message: error.message, context: error.context });
    const lineageResult = recordRun(input.db, {
      ...progress,
      status: 'failed',
      finishedAt: now().toISOString(),
      errorCode: error.code,
      errorMessage: error.message,
    });
    if (!lineageResult.ok) {
      logger.error('failed run was not recorded', { code: lineageResult.error.code, cause: lineageResult.error.cause });
    }
    return err(error);
  };

  logger.info('normalization started', { options });

  const grossResult = coerceGrossIncome(input.db, { logger });
  if (!grossResult.ok) {
    return fail(grossResult.error);
  }
  progress.grossParsed = grossResult.value.parsed;
  progress.grossAbsent = grossResult.value.absent;
  progress.grossInvalid = grossResult.value.invalid;
  logger.info('gross income coerced', {
    parsed: grossResult.value.parsed,
    absent: grossResult.value.absent,
    invalid: grossResult.value.invalid,
  });

  const countryResult = rebuildMembershipTable(input.db, 'country', { ...options, logger });
  if (!countryResult.ok) {
    return fail(countryResult.error);
  }
  progress.countryRows = countryResult.value.insertedRows;

  const languageResult = rebuildMembershipTable(input.db, 'language', { ...options, logger });
  if (!languageResult.ok) {
    return fail(languageResult.error);
  }
  progress.languageRows = languageResult.value.insertedRows;

  const standardizedResult = standardizeMissingValues(input.db, { logger });
  if (!standardizedResult.ok) {
    return fail(standardizedResult.error);
  }
  progress.standardizedJson = JSON.stringify(standardizedResult.value);

  const warnings = grossResult.value.warnings;
  const status = warnings.length > 0 ? 'completed_with_warnings' : 'completed';
  const finishedAt = now().toISOString();

  const runIdResult = recordRun(input.db, { ...progress, status, finishedAt });
  if (!runIdResult.ok) {
    return runIdResult;
  }

  logger.info('normalization finished', { runId: runIdResult.value, status, warnings: warnings.length });

  return ok({
    runId: runIdResult.value,
    status,
    startedAt,
    finishedAt,
    parsedGrossIncome: grossResult.value.parsed,
    absentGrossIncome: grossResult.value.absent,
    invalidGrossIncome: grossResult.value.invalid,
    countryRows: countryResult.value.insertedRows,
    languageRows: languageResult.value.insertedRows,
    standardized: standardizedResult.value,
    warnings,
  });
}
