import { parseArgs } from 'node:util';
import { z } from 'zod/v4';
import {
  createDatabaseConnection,
  loadDatasetFixtureFromFile,
  runMigrations,
  seedDatabaseFromDataset,
} from '../packages/core/src/index.ts';
import { runNormalization } from '../packages/normalizer/src/index.ts';
import { REPORT_FORMATS, exportQueryReport } from '../packages/reports/src/index.ts';
import {
  AppError,
  createLogger,
  err,
  loadAppConfig,
  ok,
  type AppConfig,
  type Logger,
  type Result,
} from '../packages/shared/src/index.ts';

const CliArgsSchema = z.object({
  dataset: z.string().min(1).optional(),
  db: z.string().min(1).optional(),
  exportDir: z.string().min(1).optional(),
  formats: z.array(z.enum(REPORT_FORMATS)).min(1),
  skipSetup: z.boolean(),
});

type CliArgs = z.infer<typeof CliArgsSchema>;

function parseCliArgs(argv: string[]): Result<CliArgs, AppError> {
  let values: ReturnType<typeof readArgv>;
  try {
    values = readArgv(argv);
  } catch (cause) {
    return err(AppError.fromCause('CLI_ARGS_INVALID', 'Unrecognized command line arguments.', { argv }, cause));
  }

  const parsed = CliArgsSchema.safeParse({
    dataset: values.dataset,
    db: values.db,
    exportDir: values['export-dir'],
    formats: (values.formats ?? 'csv,json')
      .split(',')
      .map((format) => format.trim())
      .filter((format) => format !== ''),
    skipSetup: values['skip-setup'] ?? false,
  });
  if (!parsed.success) {
    return err(
      AppError.create('CLI_ARGS_INVALID', 'Command line arguments are invalid.', 'error', {
        issues: parsed.error.issues.map((issue) => ({
          path: issue.path.join('.'),
          message: issue.message,
        })),
      }),
    );
  }
  return ok(parsed.data);
}

function readArgv(argv: string[]) {
  return parseArgs({
    args: argv,
    options: {
      dataset: { type: 'string' },
      db: { type: 'string' },
      'export-dir': { type: 'string' },
      formats: { type: 'string' },
      'skip-setup': { type: 'boolean' },
    },
    strict: true,
    allowPositionals: false,
  }).values;
}

function logFailure(logger: Logger, error: AppError): void {
  logger.log(error.severity === 'fatal' ? 'fatal' : 'error', error.message, {
    code: error.code,
    context: error.context,
    cause: error.cause,
  });
}

function run(config: AppConfig, args: CliArgs, logger: Logger): Result<void, AppError> {
  const connectionResult = createDatabaseConnection({ filename: args.db ?? config.dbPath });
  if (!connectionResult.ok) {
    return connectionResult;
  }
  const connection = connectionResult.value;

  const outcome = ((): Result<void, AppError> => {
    const migrationResult = runMigrations(connection.db);
    if (!migrationResult.ok) {
      return migrationResult;
    }
    logger.info('migrations applied', { applied: migrationResult.value.applied });

    if (!args.skipSetup) {
      const datasetPath = args.dataset ?? config.datasetPath;
      if (!datasetPath) {
        return err(
          AppError.create('CLI_ARGS_INVALID', 'A dataset path is required unless --skip-setup is given.', 'error', {
            option: '--dataset',
          }),
        );
      }

      const fixtureResult = loadDatasetFixtureFromFile(datasetPath);
      if (!fixtureResult.ok) {
        return fixtureResult;
      }
      const seedResult = seedDatabaseFromDataset(connection.db, fixtureResult.value);
      if (!seedResult.ok) {
        return seedResult;
      }
      logger.info('dataset loaded', { datasetPath, ...seedResult.value });

      const normalizationResult = runNormalization({
        db: connection.db,
        options: config.membership,
        logger,
      });
      if (!normalizationResult.ok) {
        return normalizationResult;
      }
    }

    const exportResult = exportQueryReport({
      db: connection.db,
      exportDir: args.exportDir ?? config.exportDir,
      formats: args.formats,
      logger,
    });
    if (!exportResult.ok) {
      return exportResult;
    }

    logger.info('report ready', {
      exportDir: exportResult.value.exportDir,
      succeeded: exportResult.value.succeeded,
      failed: exportResult.value.failed,
    });
    return ok(undefined);
  })();

  const closeResult = connection.close();
  if (!outcome.ok) {
    return outcome;
  }
  return closeResult;
}

function main(): void {
  const configResult = loadAppConfig(process.env);
  if (!configResult.ok) {
    logFailure(createLogger(), configResult.error);
    process.exitCode = 1;
    return;
  }
  const config = configResult.value;
  const logger = createLogger({ baseContext: { app: 'reelstats' }, minLevel: config.logLevel });

  const argsResult = parseCliArgs(process.argv.slice(2));
  if (!argsResult.ok) {
    logFailure(logger, argsResult.error);
    process.exitCode = 1;
    return;
  }

  const result = run(config, argsResult.value, logger);
  if (!result.ok) {
    logFailure(logger, result.error);
    process.exitCode = 1;
  }
}

main();
