import fs from 'node:fs';
import path from 'node:path';
import {
  createAnalyticsQueries,
  resolveQueryParams,
  type DatabaseConnection,
  type QueryBatchOutcome,
  type QueryParams,
} from '@reelstats/core';
import {
  AppError,
  createSilentLogger,
  err,
  ok,
  toError,
  type AppErrorDTO,
  type Logger,
  type Result,
} from '@reelstats/shared';
import { z } from 'zod/v4';
import { buildQueryErrorCsv, buildQueryResultCsv } from './csv.ts';

export const REPORT_FORMATS = ['csv', 'json'] as const;
export type ReportFormat = (typeof REPORT_FORMATS)[number];

const ExportQueryReportInputSchema = z.object({
  exportDir: z.string().min(1),
  formats: z.array(z.enum(REPORT_FORMATS)).min(1).default(['csv', 'json']),
});

const ExportedFileSchema = z.object({
  kind: z.string().min(1),
  path: z.string().min(1),
  sizeBytes: z.number().int().nonnegative(),
});

export type ExportedFile = z.infer<typeof ExportedFileSchema>;

export const QueryReportExportResultSchema = z.object({
  generatedAt: z.iso.datetime(),
  exportDir: z.string().min(1),
  files: z.array(ExportedFileSchema),
  succeeded: z.number().int().nonnegative(),
  failed: z.number().int().nonnegative(),
});

export type QueryReportExportResult = z.infer<typeof QueryReportExportResultSchema>;

export interface ExportQueryReportInput {
  db: DatabaseConnection['db'];
  exportDir: string;
  formats?: ReportFormat[];
  params?: Partial<QueryParams>;
  logger?: Logger;
  now?: () => Date;
}

interface ManifestEntry {
  id: string;
  segment: number;
  label: string;
  status: QueryBatchOutcome['status'];
  rowCount: number | null;
  file: string | null;
  error: AppErrorDTO | null;
}

function sanitizeTimestamp(value: string): string {
  return value.replaceAll(':', '-').replaceAll('.', '-');
}

function writeExportFile(exportDir: string, fileName: string, content: string): Result<ExportedFile, AppError> {
  const filePath = path.join(exportDir, fileName);
  try {
    fs.writeFileSync(filePath, content, 'utf8');
    return ok({
      kind: fileName,
      path: filePath,
      sizeBytes: Buffer.byteLength(content, 'utf8'),
    });
  } catch (cause) {
    return err(
      AppError.create('REPORT_EXPORT_WRITE_FAILED', 'Could not write the report file.', 'error', { filePath }, toError(cause)),
    );
  }
}

function toManifestEntry(outcome: QueryBatchOutcome, csvWritten: boolean): ManifestEntry {
  const base = {
    id: outcome.definition.id,
    segment: outcome.definition.segment,
    label: outcome.definition.label,
    status: outcome.status,
  };
  const file = csvWritten ? `${outcome.definition.id}.csv` : null;
  if (outcome.status === 'ok') {
    return { ...base, rowCount: outcome.result.rows.length, file, error: null };
  }
  return { ...base, rowCount: null, file, error: outcome.error.toDTO() };
}

/**
 * Runs the full query catalog and writes the results into a timestamped
 * directory: `Qnn.csv` per query, `results.json` with every successful
 * result, and `manifest.json` listing the outcome of each query. A failing
 * query gets an `error,query` CSV and a manifest entry; it does not stop the
 * export.
 */
export function exportQueryReport(input: ExportQueryReportInput): Result<QueryReportExportResult, AppError> {
  const parsedInput = ExportQueryReportInputSchema.safeParse({
    exportDir: input.exportDir,
    formats: input.formats,
  });
  if (!parsedInput.success) {
    return err(
      AppError.create('REPORT_EXPORT_INVALID_INPUT', 'Report export parameters are invalid.', 'error', {
        issues: parsedInput.error.issues.map((issue) => ({
          path: issue.path.join('.'),
          message: issue.message,
        })),
      }),
    );
  }

  const paramsResult = resolveQueryParams(input.params);
  if (!paramsResult.ok) {
    return paramsResult;
  }
  const params = paramsResult.value;

  const logger = (input.logger ?? createSilentLogger()).withContext({ component: 'query-report' });
  const queries = createAnalyticsQueries(input.db, { logger });
  const batchResult = queries.runAll(params);
  if (!batchResult.ok) {
    return batchResult;
  }
  const outcomes = batchResult.value;

  const generatedAt = (input.now ?? (() => new Date()))().toISOString();
  const reportDir = path.join(path.resolve(parsedInput.data.exportDir), `queries-${sanitizeTimestamp(generatedAt)}`);

  try {
    fs.mkdirSync(reportDir, { recursive: true });
  } catch (cause) {
    return err(
      AppError.create(
        'REPORT_EXPORT_DIR_CREATE_FAILED',
        'Could not prepare the report export directory.',
        'error',
        { reportDir },
        toError(cause),
      ),
    );
  }

  const files: ExportedFile[] = [];
  const selectedFormats = Array.from(new Set(parsedInput.data.formats));
  const writeCsv = selectedFormats.includes('csv');

  if (writeCsv) {
    for (const outcome of outcomes) {
      const content =
        outcome.status === 'ok'
          ? buildQueryResultCsv(outcome.result)
          : buildQueryErrorCsv(outcome.error.cause ?? outcome.error.message, outcome.definition.sql);
      const csvFile = writeExportFile(reportDir, `${outcome.definition.id}.csv`, content);
      if (!csvFile.ok) {
        return csvFile;
      }
      files.push(csvFile.value);
    }
  }

  if (selectedFormats.includes('json')) {
    const results = outcomes.flatMap((outcome) => (outcome.status === 'ok' ? [outcome.result] : []));
    const resultsJson = writeExportFile(
      reportDir,
      'results.json',
      JSON.stringify({ generatedAt, params, results }, null, 2),
    );
    if (!resultsJson.ok) {
      return resultsJson;
    }
    files.push(resultsJson.value);
  }

  const manifest = {
    generatedAt,
    params,
    formats: selectedFormats,
    queries: outcomes.map((outcome) => toManifestEntry(outcome, writeCsv)),
  };
  const manifestFile = writeExportFile(reportDir, 'manifest.json', JSON.stringify(manifest, null, 2));
  if (!manifestFile.ok) {
    return manifestFile;
  }
  files.push(manifestFile.value);

  const failed = outcomes.filter((outcome) => outcome.status === 'failed').length;
  logger.info('query report exported', { reportDir, files: files.length, failed });

  const parsedOutput = QueryReportExportResultSchema.safeParse({
    generatedAt,
    exportDir: reportDir,
    files,
    succeeded: outcomes.length - failed,
    failed,
  });
  if (!parsedOutput.success) {
    return err(
      AppError.create('REPORT_EXPORT_INVALID_OUTPUT', 'Report export result has an invalid format.', 'error', {
        issues: parsedOutput.error.issues,
      }),
    );
  }

  return ok(parsedOutput.data);
}
