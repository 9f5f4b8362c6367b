import { describe, it, expect } from 'vitest';
import { err, mapResult, ok } from './result.ts';
import type { Result } from './result.ts';

function halve(value: number): Result<number, string> {
  return value % 2 === 0 ? ok(value / 2) : err(`odd: ${String(value)}`);
}

describe('Result type', () => {
  describe('ok() / err()', () => {
    it('creates an Ok result', () => {
      const result = ok({ movieId: 'tt0100001', rows: 3 });
      expect(result.ok).toBe(true);
      expect(result.value).toEqual({ movieId: 'tt0100001', rows: 3 });
    });

    it('creates an Err result', () => {
      const result = err('parse failed');
      expect(result.ok).toBe(false);
      expect(result.error).toBe('parse failed');
    });
  });

  describe('mapResult()', () => {
    it('maps the Ok value', () => {
      expect(mapResult(halve(8), (value) => value * 25)).toEqual({ ok: true, value: 100 });
    });

    it('passes Err through unchanged', () => {
      expect(mapResult(halve(7), (value) => value * 25)).toEqual({ ok: false, error: 'odd: 7' });
    });
  });
});
