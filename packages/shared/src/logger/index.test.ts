import { describe, expect, it } from 'vitest';
import { createLogger, createSilentLogger, type LogEntry } from './index.ts';

const FIXED_NOW = () => '2026-01-01T00:00:00.000Z';

describe('createLogger', () => {
  it('writes structured entry with level and merged context', () => {
    const entries: LogEntry[] = [];
    const logger = createLogger({
      baseContext: { module: 'normalizer' },
      now: FIXED_NOW,
      writer: (entry) => entries.push(entry),
    });

    logger.info('membership rebuilt', { kind: 'country', rows: 12 });

    expect(entries).toEqual([
      {
        timestamp: '2026-01-01T00:00:00.000Z',
        level: 'info',
        message: 'membership rebuilt',
        context: {
          module: 'normalizer',
          kind: 'country',
          rows: 12,
        },
      },
    ]);
  });

  it('supports withContext for child loggers', () => {
    const entries: LogEntry[] = [];
    const root = createLogger({
      baseContext: { app: 'cli' },
      now: FIXED_NOW,
      writer: (entry) => entries.push(entry),
    });

    const child = root.withContext({ runId: 3 });
    child.warning('unparseable gross income', { movieId: 'tt0100006' });

    expect(entries).toEqual([
      {
        timestamp: '2026-01-01T00:00:00.000Z',
        level: 'warning',
        message: 'unparseable gross income',
        context: {
          app: 'cli',
          runId: 3,
          movieId: 'tt0100006',
        },
      },
    ]);
  });

  it('exposes all level helpers', () => {
    const levels: string[] = [];
    const logger = createLogger({
      now: FIXED_NOW,
      writer: (entry) => levels.push(entry.level),
    });

    logger.debug('d');
    logger.info('i');
    logger.warning('w');
    logger.error('e');
    logger.fatal('f');

    expect(levels).toEqual(['debug', 'info', 'warning', 'error', 'fatal']);
  });

  it('drops entries below minLevel, also in child loggers', () => {
    const levels: string[] = [];
    const logger = createLogger({
      now: FIXED_NOW,
      minLevel: 'warning',
      writer: (entry) => levels.push(entry.level),
    });

    logger.debug('d');
    logger.info('i');
    logger.withContext({ stage: 'standardize' }).info('child info');
    logger.warning('w');
    logger.withContext({ stage: 'standardize' }).error('child error');

    expect(levels).toEqual(['warning', 'error']);
  });
});

describe('createSilentLogger', () => {
  it('accepts calls without writing', () => {
    const logger = createSilentLogger();
    expect(() => {
      logger.info('nothing');
      logger.withContext({ a: 1 }).error('still nothing');
    }).not.toThrow();
  });
});
