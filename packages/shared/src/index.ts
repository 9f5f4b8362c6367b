// Types
export {
  type Result,
  type Ok,
  type Err,
  ok,
  err,
  mapResult,
} from './types/result.ts';

// Errors
export {
  AppError,
  AppErrorSchema,
  ERROR_CODES,
  SEVERITY,
  toError,
  type AppErrorCode,
  type AppErrorContext,
  type AppErrorDTO,
  type Severity,
} from './errors/app-error.ts';

// Logger
export {
  createLogger,
  createSilentLogger,
  LOG_LEVELS,
  type Logger,
  type LogEntry,
  type LogLevel,
  type LogContext,
  type LogWriter,
  type Clock,
  type CreateLoggerOptions,
} from './logger/index.ts';

// Config
export {
  DEFAULT_MEMBERSHIP_TOKEN_LIMIT,
  loadAppConfig,
  type AppConfig,
  type EnvSource,
  type LoadAppConfigOptions,
  type MembershipConfig,
} from './config/index.ts';
