import Database from 'better-sqlite3';
import { AppError, err, ok, toError, type Result } from '@reelstats/shared';

export interface CreateDatabaseInput {
  filename?: string;
  readonly?: boolean;
  fileMustExist?: boolean;
  timeoutMs?: number;
}

export interface DatabaseConnection {
  readonly db: Database.Database;
  close: () => Result<void, AppError>;
}

export function createDatabaseConnection(input: CreateDatabaseInput = {}): Result<DatabaseConnection, AppError> {
  const filename = input.filename ?? ':memory:';
  const timeoutMs = input.timeoutMs ?? 5_000;

  try {
    const db = new Database(filename, {
      readonly: input.readonly ?? false,
      fileMustExist: input.fileMustExist ?? false,
      timeout: timeoutMs,
    });

    db.pragma('foreign_keys = ON');
    db.pragma(`busy_timeout = ${String(timeoutMs)}`);

    // WAL keeps readers on the last committed snapshot while a rebuild is in flight.
    if (!db.memory && !db.readonly) {
      db.pragma('journal_mode = WAL');
    }

    return ok({
      db,
      close: () => closeDatabaseConnection(db),
    });
  } catch (cause) {
    return err(
      AppError.create(
        'DB_OPEN_FAILED',
        'Could not open the database.',
        'error',
        { filename, timeoutMs },
        toError(cause),
      ),
    );
  }
}

export function closeDatabaseConnection(db: Database.Database): Result<void, AppError> {
  try {
    if (db.open) {
      db.close();
    }
    return ok(undefined);
  } catch (cause) {
    return err(
      AppError.create(
        'DB_CLOSE_FAILED',
        'Could not close the database.',
        'error',
        { databaseName: db.name },
        toError(cause),
      ),
    );
  }
}

class TransactionRollback extends Error {
  constructor(readonly appError: AppError) {
    super(appError.message);
  }
}

/**
 * Runs `work` inside a single transaction. A thrown error or an Err result
 * rolls everything back.
 */
export function runInTransaction<T>(
  db: Database.Database,
  operationName: string,
  work: () => Result<T, AppError>,
): Result<T, AppError> {
  const tx = db.transaction((): T => {
    const outcome = work();
    if (!outcome.ok) {
      throw new TransactionRollback(outcome.error);
    }
    return outcome.value;
  });

  try {
    return ok(tx());
  } catch (cause) {
    if (cause instanceof TransactionRollback) {
      return err(cause.appError);
    }
    return err(
      AppError.create(
        'DB_TRANSACTION_FAILED',
        'Database transaction failed.',
        'error',
        { operationName },
        toError(cause),
      ),
    );
  }
}
