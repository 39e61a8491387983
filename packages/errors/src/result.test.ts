import { describe, it, expect } from 'vitest';
import { Result } from './result.mjs';

describe('Result', () => {
  describe('ok / err', () => {
    it('creates a successful Result', () => {
      expect(Result.ok(42)).toEqual({ success: true, data: 42 });
    });

    it('creates a failed Result', () => {
      expect(Result.err('error message')).toEqual({ success: false, error: 'error message' });
    });
  });

  describe('map', () => {
    it('transforms successful Result data', () => {
      const mapped = Result.map((x: number) => x * 2)(Result.ok(5));
      expect(mapped).toEqual({ success: true, data: 10 });
    });

    it('passes through failed Results unchanged', () => {
      const mapped = Result.map((x: number) => x * 2)(Result.err<number>('error'));
      expect(mapped).toEqual({ success: false, error: 'error' });
    });
  });

  describe('flatMap', () => {
    const halve = (x: number): Result<number> =>
      x % 2 === 0 ? Result.ok(x / 2) : Result.err('odd');

    it('chains successful Result operations', () => {
      expect(Result.flatMap(halve)(Result.ok(10))).toEqual({ success: true, data: 5 });
    });

    it('short-circuits on first error', () => {
      expect(Result.flatMap(halve)(Result.ok(3))).toEqual({ success: false, error: 'odd' });
      expect(Result.flatMap(halve)(Result.err('first'))).toEqual({
        success: false,
        error: 'first',
      });
    });
  });

  describe('mapError', () => {
    it('transforms the error of a failure', () => {
      const mapped = Result.mapError((e: Error) => e.message)(Result.err(new Error('boom')));
      expect(mapped).toEqual({ success: false, error: 'boom' });
    });

    it('leaves successes alone', () => {
      const mapped = Result.mapError((e: Error) => e.message)(Result.ok<number, Error>(1));
      expect(mapped).toEqual({ success: true, data: 1 });
    });
  });

  describe('unwrapOr', () => {
    it('returns the data or the default', () => {
      expect(Result.unwrapOr(0)(Result.ok(7))).toBe(7);
      expect(Result.unwrapOr(0)(Result.err<number>('nope'))).toBe(0);
    });
  });

  describe('isOk / isErr', () => {
    it('narrows each branch', () => {
      const good: Result<number> = Result.ok(1);
      const bad: Result<number> = Result.err('bad');
      expect(Result.isOk(good)).toBe(true);
      expect(Result.isErr(good)).toBe(false);
      expect(Result.isOk(bad)).toBe(false);
      expect(Result.isErr(bad)).toBe(true);
    });
  });
});
