import path from 'node:path';
import { describe, expect, it } from 'vitest';
import { loadAppConfig } from './index.ts';

const CWD = path.resolve('/srv/reelstats');

describe('loadAppConfig', () => {
  it('applies defaults for an empty environment', () => {
    const result = loadAppConfig({}, { cwd: CWD });
    expect(result).toEqual({
      ok: true,
      value: {
        dbPath: ':memory:',
        datasetPath: null,
        exportDir: path.join(CWD, 'exports', 'queries'),
        logLevel: 'info',
        membership: {
          tokenLimit: 3,
          emitBlankTokens: true,
        },
      },
    });
  });

  it('resolves relative paths and parses typed values', () => {
    const result = loadAppConfig(
      {
        REELSTATS_DB_PATH: 'data/movies.db',
        REELSTATS_DATASET_PATH: 'fixtures/imdb-sample.json',
        REELSTATS_EXPORT_DIR: '/var/exports',
        REELSTATS_LOG_LEVEL: 'warning',
        REELSTATS_MEMBERSHIP_TOKEN_LIMIT: '5',
        REELSTATS_EMIT_BLANK_TOKENS: 'false',
      },
      { cwd: CWD },
    );

    expect(result.ok).toBe(true);
    if (!result.ok) {
      return;
    }
    expect(result.value.dbPath).toBe(path.join(CWD, 'data', 'movies.db'));
    expect(result.value.datasetPath).toBe(path.join(CWD, 'fixtures', 'imdb-sample.json'));
    expect(result.value.exportDir).toBe('/var/exports');
    expect(result.value.logLevel).toBe('warning');
    expect(result.value.membership).toEqual({ tokenLimit: 5, emitBlankTokens: false });
  });

  it('treats blank variables as unset', () => {
    const result = loadAppConfig({ REELSTATS_LOG_LEVEL: '   ', REELSTATS_DB_PATH: '' }, { cwd: CWD });
    expect(result.ok).toBe(true);
    if (!result.ok) {
      return;
    }
    expect(result.value.logLevel).toBe('info');
    expect(result.value.dbPath).toBe(':memory:');
  });

  it('returns CONFIG_INVALID with issue paths', () => {
    const result = loadAppConfig(
      {
        REELSTATS_LOG_LEVEL: 'verbose',
        REELSTATS_MEMBERSHIP_TOKEN_LIMIT: '0',
      },
      { cwd: CWD },
    );

    expect(result.ok).toBe(false);
    if (result.ok) {
      return;
    }
    expect(result.error.code).toBe('CONFIG_INVALID');
    expect(result.error.severity).toBe('fatal');
    expect(result.error.context).toEqual({
      issues: expect.arrayContaining([
        expect.objectContaining({ path: 'REELSTATS_LOG_LEVEL' }),
        expect.objectContaining({ path: 'REELSTATS_MEMBERSHIP_TOKEN_LIMIT' }),
      ]),
    });
  });
});
