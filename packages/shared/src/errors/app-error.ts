import { z } from 'zod/v4';

export const SEVERITY = ['fatal', 'error', 'warning', 'info'] as const;
export type Severity = (typeof SEVERITY)[number];

export const ERROR_CODES = [
  'CONFIG_INVALID',
  'CLI_ARGS_INVALID',
  'DB_OPEN_FAILED',
  'DB_CLOSE_FAILED',
  'DB_TRANSACTION_FAILED',
  'DB_MIGRATION_FAILED',
  'DATASET_READ_FAILED',
  'DATASET_INVALID',
  'DATASET_WRITE_FAILED',
  'DATASET_READ_BACK_FAILED',
  'NORMALIZER_GROSS_INCOME_UNPARSEABLE',
  'NORMALIZER_COERCION_FAILED',
  'NORMALIZER_MEMBERSHIP_REBUILD_FAILED',
  'NORMALIZER_STANDARDIZATION_FAILED',
  'NORMALIZER_LINEAGE_FAILED',
  'NORMALIZER_OPTIONS_INVALID',
  'QUERY_UNKNOWN',
  'QUERY_PARAMS_INVALID',
  'QUERY_FAILED',
  'QUERY_ROW_INVALID',
  'REPORT_EXPORT_INVALID_INPUT',
  'REPORT_EXPORT_DIR_CREATE_FAILED',
  'REPORT_EXPORT_WRITE_FAILED',
  'REPORT_EXPORT_INVALID_OUTPUT',
] as const;
export type AppErrorCode = (typeof ERROR_CODES)[number];

export const AppErrorSchema = z.object({
  code: z.enum(ERROR_CODES),
  message: z.string(),
  severity: z.enum(SEVERITY),
  context: z.record(z.string(), z.unknown()).optional(),
  timestamp: z.iso.datetime(),
  cause: z.string().optional(),
});

export type AppErrorDTO = z.infer<typeof AppErrorSchema>;

export type AppErrorContext = Record<string, unknown>;

export function toError(cause: unknown): Error {
  if (cause instanceof Error) {
    return cause;
  }
  return new Error(String(cause));
}

export class AppError {
  readonly code: AppErrorCode;
  readonly message: string;
  readonly severity: Severity;
  readonly context: AppErrorContext;
  readonly timestamp: string;
  readonly cause?: string;

  private constructor(params: {
    code: AppErrorCode;
    message: string;
    severity: Severity;
    context?: AppErrorContext;
    cause?: Error;
  }) {
    this.code = params.code;
    this.message = params.message;
    this.severity = params.severity;
    this.context = params.context ?? {};
    this.timestamp = new Date().toISOString();
    this.cause = params.cause?.message;
  }

  static create(
    code: AppErrorCode,
    message: string,
    severity: Severity = 'error',
    context?: AppErrorContext,
    cause?: Error,
  ): AppError {
    return new AppError({ code, message, severity, context, cause });
  }

  /** Wraps a thrown value (usually from better-sqlite3) as an `error` severity AppError. */
  static fromCause(code: AppErrorCode, message: string, context: AppErrorContext, cause: unknown): AppError {
    return new AppError({ code, message, severity: 'error', context, cause: toError(cause) });
  }

  static fatal(code: AppErrorCode, message: string, context?: AppErrorContext): AppError {
    return new AppError({ code, message, severity: 'fatal', context });
  }

  static warning(code: AppErrorCode, message: string, context?: AppErrorContext): AppError {
    return new AppError({ code, message, severity: 'warning', context });
  }

  toDTO(): AppErrorDTO {
    return {
      code: this.code,
      message: this.message,
      severity: this.severity,
      context: this.context,
      timestamp: this.timestamp,
      cause: this.cause,
    };
  }

  toString(): string {
    return `[${this.severity.toUpperCase()}] ${this.code}: ${this.message}`;
  }
}
