import type Database from 'better-sqlite3';
import { AppError, createSilentLogger, err, ok, type Logger, type Result } from '@reelstats/shared';
import { ANALYTICAL_QUERIES } from './catalog/index.ts';
import {
  DEFAULT_QUERY_PARAMS,
  QueryParamsSchema,
  QueryRowSchema,
  type AnalyticalQueryDefinition,
  type QueryParams,
  type QueryResult,
  type QueryRow,
} from './types.ts';

export type QueryBatchOutcome =
  | { status: 'ok'; definition: AnalyticalQueryDefinition; result: QueryResult }
  | { status: 'failed'; definition: AnalyticalQueryDefinition; error: AppError };

export interface AnalyticsQueries {
  listDefinitions: () => ReadonlyArray<AnalyticalQueryDefinition>;
  runQuery: (queryId: string, params?: Partial<QueryParams>) => Result<QueryResult, AppError>;
  /** Runs every catalog query; one failing query does not stop the batch. */
  runAll: (params?: Partial<QueryParams>) => Result<QueryBatchOutcome[], AppError>;
}

export interface CreateAnalyticsQueriesOptions {
  logger?: Logger;
  definitions?: ReadonlyArray<AnalyticalQueryDefinition>;
}

export function resolveQueryParams(params: Partial<QueryParams> = {}): Result<QueryParams, AppError> {
  const parsed = QueryParamsSchema.safeParse({ ...DEFAULT_QUERY_PARAMS, ...params });
  if (!parsed.success) {
    return err(
      AppError.create('QUERY_PARAMS_INVALID', 'Query parameters are invalid.', 'error', {
        issues: parsed.error.issues.map((issue) => ({
          path: issue.path.join('.'),
          message: issue.message,
        })),
      }),
    );
  }
  return ok(parsed.data);
}

function buildBindings(definition: AnalyticalQueryDefinition, params: QueryParams): Record<string, string | number> {
  const bindings: Record<string, string | number> = {};
  for (const name of definition.parameters) {
    bindings[name] = params[name];
  }
  return bindings;
}

function parseQueryRows(definition: AnalyticalQueryDefinition, rows: readonly unknown[]): Result<QueryRow[], AppError> {
  const parsedRows: QueryRow[] = [];
  for (let index = 0; index < rows.length; index += 1) {
    const parsed = QueryRowSchema.safeParse(rows[index]);
    if (!parsed.success) {
      return err(
        AppError.create('QUERY_ROW_INVALID', 'Query returned a value that cannot be exported.', 'error', {
          queryId: definition.id,
          rowIndex: index,
          issues: parsed.error.issues,
        }),
      );
    }
    parsedRows.push(parsed.data);
  }
  return ok(parsedRows);
}

export function createAnalyticsQueries(
  db: Database.Database,
  options: CreateAnalyticsQueriesOptions = {},
): AnalyticsQueries {
  const logger = (options.logger ?? createSilentLogger()).withContext({ component: 'analytics-queries' });
  const definitions = options.definitions ?? ANALYTICAL_QUERIES;
  const definitionsById = new Map(definitions.map((definition) => [definition.id, definition]));
  const statements = new Map<string, Database.Statement>();

  const getStatement = (definition: AnalyticalQueryDefinition): Database.Statement => {
    const cached = statements.get(definition.id);
    if (cached) {
      return cached;
    }
    const statement = db.prepare(definition.sql);
    statements.set(definition.id, statement);
    return statement;
  };

  const execute = (definition: AnalyticalQueryDefinition, params: QueryParams): Result<QueryResult, AppError> => {
    const startedAt = Date.now();
    try {
      const statement = getStatement(definition);
      const rawRows =
        definition.parameters.length === 0 ? statement.all() : statement.all(buildBindings(definition, params));
      const rowsResult = parseQueryRows(definition, rawRows);
      if (!rowsResult.ok) {
        return rowsResult;
      }

      logger.debug('query executed', {
        queryId: definition.id,
        rows: rowsResult.value.length,
        durationMs: Date.now() - startedAt,
      });

      return ok({
        id: definition.id,
        segment: definition.segment,
        label: definition.label,
        columns: statement.columns().map((column) => column.name),
        rows: rowsResult.value,
      });
    } catch (cause) {
      return err(
        AppError.fromCause(
          'QUERY_FAILED',
          'Analytical query failed.',
          { queryId: definition.id, label: definition.label },
          cause,
        ),
      );
    }
  };

  return {
    listDefinitions: () => definitions,

    runQuery: (queryId, params) => {
      const definition = definitionsById.get(queryId);
      if (!definition) {
        return err(AppError.create('QUERY_UNKNOWN', 'No analytical query with this id.', 'error', { queryId }));
      }

      const paramsResult = resolveQueryParams(params);
      if (!paramsResult.ok) {
        return paramsResult;
      }

      return execute(definition, paramsResult.value);
    },

    runAll: (params) => {
      const paramsResult = resolveQueryParams(params);
      if (!paramsResult.ok) {
        return paramsResult;
      }

      const outcomes: QueryBatchOutcome[] = [];
      for (const definition of definitions) {
        const result = execute(definition, paramsResult.value);
        if (result.ok) {
          outcomes.push({ status: 'ok', definition, result: result.value });
          continue;
        }

        logger.warning('query failed', { queryId: definition.id, code: result.error.code, cause: result.error.cause });
        outcomes.push({ status: 'failed', definition, error: result.error });
      }

      logger.info('query batch finished', {
        total: outcomes.length,
        failed: outcomes.filter((outcome) => outcome.status === 'failed').length,
      });
      return ok(outcomes);
    },
  };
}
