import path from 'node:path';
import { z } from 'zod/v4';
import { AppError } from '../errors/app-error.ts';
import { LOG_LEVELS, type LogLevel } from '../logger/index.ts';
import { err, ok, type Result } from '../types/result.ts';

export const DEFAULT_MEMBERSHIP_TOKEN_LIMIT = 3;
const IN_MEMORY_DB_PATH = ':memory:';

const booleanFlagSchema = z
  .enum(['true', 'false', '1', '0'])
  .transform((value) => value === 'true' || value === '1');

const EnvSchema = z.object({
  REELSTATS_DB_PATH: z.string().min(1).default(IN_MEMORY_DB_PATH),
  REELSTATS_DATASET_PATH: z.string().min(1).optional(),
  REELSTATS_EXPORT_DIR: z.string().min(1).default(path.join('exports', 'queries')),
  REELSTATS_LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
  REELSTATS_MEMBERSHIP_TOKEN_LIMIT: z.coerce
    .number()
    .int()
    .min(1)
    .max(32)
    .default(DEFAULT_MEMBERSHIP_TOKEN_LIMIT),
  REELSTATS_EMIT_BLANK_TOKENS: booleanFlagSchema.default(true),
});

export interface MembershipConfig {
  tokenLimit: number;
  emitBlankTokens: boolean;
}

export interface AppConfig {
  dbPath: string;
  datasetPath: string | null;
  exportDir: string;
  logLevel: LogLevel;
  membership: MembershipConfig;
}

export interface LoadAppConfigOptions {
  /** Base directory for relative paths. Defaults to `process.cwd()`. */
  cwd?: string;
}

export type EnvSource = Readonly<Record<string, string | undefined>>;

function resolvePath(value: string, cwd: string): string {
  if (value === IN_MEMORY_DB_PATH || path.isAbsolute(value)) {
    return value;
  }
  return path.resolve(cwd, value);
}

function pickDefinedEnv(env: EnvSource): Record<string, string> {
  const picked: Record<string, string> = {};
  for (const key of Object.keys(EnvSchema.shape)) {
    const value = env[key]?.trim();
    if (value) {
      picked[key] = value;
    }
  }
  return picked;
}

export function loadAppConfig(env: EnvSource, options: LoadAppConfigOptions = {}): Result<AppConfig, AppError> {
  const cwd = options.cwd ?? process.cwd();
  const parsed = EnvSchema.safeParse(pickDefinedEnv(env));
  if (!parsed.success) {
    return err(
      AppError.fatal('CONFIG_INVALID', 'Environment configuration is invalid.', {
        issues: parsed.error.issues.map((issue) => ({
          path: issue.path.join('.'),
          message: issue.message,
        })),
      }),
    );
  }

  const data = parsed.data;
  return ok({
    dbPath: resolvePath(data.REELSTATS_DB_PATH, cwd),
    datasetPath: data.REELSTATS_DATASET_PATH ? resolvePath(data.REELSTATS_DATASET_PATH, cwd) : null,
    exportDir: resolvePath(data.REELSTATS_EXPORT_DIR, cwd),
    logLevel: data.REELSTATS_LOG_LEVEL,
    membership: {
      tokenLimit: data.REELSTATS_MEMBERSHIP_TOKEN_LIMIT,
      emitBlankTokens: data.REELSTATS_EMIT_BLANK_TOKENS,
    },
  });
}
