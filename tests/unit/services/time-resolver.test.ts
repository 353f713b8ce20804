/**
 * Tests for time expression resolution
 */

import { describe, it, expect } from 'vitest';
import { parseInstant, parseRange, resolveInterval, startOfDay } from '../../../src/services/time/resolver.js';
import { UnknownInterval, UnparseableTime } from '../../../src/utils/errors.js';
import { HOUR, MINUTE, at, utc } from '../../helpers.js';

// Tuesday 2 January 2024, 10:00
const NOW = at(2024, 1, 2, 10, 0);

describe('Time resolver', () => {
  describe('startOfDay', () => {
    it('returns local midnight', () => {
      expect(startOfDay(NOW)).toBe(at(2024, 1, 2));
      expect(startOfDay(NOW, 1)).toBe(at(2024, 1, 3));
    });

    it('crosses month boundaries', () => {
      expect(startOfDay(at(2024, 3, 1, 5), -1)).toBe(at(2024, 2, 29));
    });
  });

  describe('parseInstant', () => {
    it('resolves now', () => {
      expect(parseInstant('now', NOW)).toBe(NOW);
    });

    it('resolves day words with and without a clock time', () => {
      expect(parseInstant('yesterday 14:00', NOW)).toBe(at(2024, 1, 1, 14, 0));
      expect(parseInstant('Yesterday   14:00', NOW)).toBe(at(2024, 1, 1, 14, 0));
      expect(parseInstant('today', NOW)).toBe(at(2024, 1, 2));
      expect(parseInstant('tomorrow 9', NOW)).toBe(at(2024, 1, 3, 9));
    });

    it('resolves clock times to the most recent occurrence by default', () => {
      expect(parseInstant('9:30', NOW)).toBe(at(2024, 1, 2, 9, 30));
      expect(parseInstant('9', NOW)).toBe(at(2024, 1, 2, 9));
      expect(parseInstant('10:00', NOW)).toBe(NOW);
      expect(parseInstant('14:00', NOW)).toBe(at(2024, 1, 1, 14, 0));
    });

    it('resolves clock times to the next occurrence searching forward', () => {
      expect(parseInstant('14:00', NOW, 'forward')).toBe(at(2024, 1, 2, 14, 0));
      expect(parseInstant('9:00', NOW, 'forward')).toBe(at(2024, 1, 3, 9, 0));
    });

    it('resolves relative expressions', () => {
      expect(parseInstant('3 hours ago', NOW)).toBe(NOW - 3 * HOUR);
      expect(parseInstant('in 20m', NOW)).toBe(NOW + 20 * MINUTE);
      expect(parseInstant('90 minutes ago', NOW, 'forward')).toBe(NOW - 90 * MINUTE);
    });

    it('reads bare durations in the search direction', () => {
      expect(parseInstant('2h', NOW)).toBe(NOW - 2 * HOUR);
      expect(parseInstant('2h', NOW, 'forward')).toBe(NOW + 2 * HOUR);
      expect(parseInstant('1:30h', NOW)).toBe(NOW - 90 * MINUTE);
    });

    it('resolves local ISO dates and times', () => {
      expect(parseInstant('2024-01-01', NOW)).toBe(at(2024, 1, 1));
      expect(parseInstant('2024-01-01T08:15', NOW)).toBe(at(2024, 1, 1, 8, 15));
      expect(parseInstant('2024-01-01 08:15:30', NOW)).toBe(at(2024, 1, 1, 8, 15, 30));
    });

    it('honours an explicit zone', () => {
      expect(parseInstant('2024-01-01T08:00:00Z', NOW)).toBe(utc(2024, 1, 1, 8));
      expect(parseInstant('2024-01-01T08:00:00+02:00', NOW)).toBe(utc(2024, 1, 1, 6));
      expect(parseInstant('2024-01-01T08:00-0130', NOW)).toBe(utc(2024, 1, 1, 9, 30));
    });

    it('rejects zoned dates in the first century', () => {
      expect(() => parseInstant('0050-01-01T00:00Z', NOW)).toThrow(UnparseableTime);
      expect(() => parseInstant('0050-01-01T00:00', NOW)).toThrow(UnparseableTime);
    });

    it('rejects durations too large to resolve', () => {
      expect(() => parseInstant(`${'9'.repeat(400)}h`, NOW)).toThrow(UnparseableTime);
      expect(() => resolveInterval(`${'9'.repeat(400)}h`, NOW)).toThrow(UnknownInterval);
    });

    it('resolves a day of the month', () => {
      expect(parseInstant('1 9:00', NOW)).toBe(at(2024, 1, 1, 9));
      expect(parseInstant('5 9:00', NOW)).toBe(at(2023, 12, 5, 9));
      expect(parseInstant('31 9:00', NOW)).toBe(at(2023, 12, 31, 9));
      expect(parseInstant('5 9:00', NOW, 'forward')).toBe(at(2024, 1, 5, 9));
    });

    it('resolves a day and month', () => {
      expect(parseInstant('25-12 18:00', NOW)).toBe(at(2023, 12, 25, 18));
      expect(parseInstant('25-12 18:00', NOW, 'forward')).toBe(at(2024, 12, 25, 18));
    });

    it('skips years without the requested date', () => {
      expect(parseInstant('29-2 12:00', NOW)).toBe(at(2020, 2, 29, 12));
    });

    it('rejects what it cannot read', () => {
      expect(() => parseInstant('banana', NOW)).toThrow('Invalid time specifier: "banana"');
      expect(() => parseInstant('', NOW)).toThrow(UnparseableTime);
      expect(() => parseInstant('25:00', NOW)).toThrow(UnparseableTime);
      expect(() => parseInstant('9:60', NOW)).toThrow(UnparseableTime);
      expect(() => parseInstant('2024-13-01', NOW)).toThrow(UnparseableTime);
      expect(() => parseInstant('2024-02-30', NOW)).toThrow(UnparseableTime);
      expect(() => parseInstant('0h', NOW)).toThrow(UnparseableTime);
    });
  });

  describe('parseRange', () => {
    it('returns null without a separator', () => {
      expect(parseRange('9:00', NOW)).toBeNull();
      expect(parseRange('9:00-10:00', NOW)).toBeNull();
    });

    it('resolves both ends', () => {
      expect(parseRange('9:00 - 9:30', NOW)).toEqual({ start: at(2024, 1, 2, 9), end: at(2024, 1, 2, 9, 30) });
    });

    it('swaps an inverted range', () => {
      expect(parseRange('9:30 - 9:00', NOW)).toEqual({ start: at(2024, 1, 2, 9), end: at(2024, 1, 2, 9, 30) });
    });
  });

  describe('resolveInterval', () => {
    it('resolves today and yesterday to whole local days', () => {
      expect(resolveInterval('today', NOW)).toEqual({ start: at(2024, 1, 2), end: at(2024, 1, 3) });
      expect(resolveInterval('yesterday', NOW)).toEqual({ start: at(2024, 1, 1), end: at(2024, 1, 2) });
    });

    it('resolves week to the seven days ending today', () => {
      expect(resolveInterval('week', NOW)).toEqual({ start: at(2023, 12, 27), end: at(2024, 1, 3) });
    });

    it('resolves month and year to calendar periods', () => {
      expect(resolveInterval('month', NOW)).toEqual({ start: at(2024, 1, 1), end: at(2024, 2, 1) });
      expect(resolveInterval('month', at(2023, 12, 15, 12))).toEqual({
        start: at(2023, 12, 1),
        end: at(2024, 1, 1),
      });
      expect(resolveInterval('year', NOW)).toEqual({ start: at(2024, 1, 1), end: at(2025, 1, 1) });
    });

    it('ignores case and surrounding space', () => {
      expect(resolveInterval('  TODAY ', NOW)).toEqual(resolveInterval('today', NOW));
    });

    it('resolves explicit ranges', () => {
      expect(resolveInterval('9:00 - 9:30', NOW)).toEqual({ start: at(2024, 1, 2, 9), end: at(2024, 1, 2, 9, 30) });
      expect(resolveInterval('yesterday 9 - yesterday 17', NOW)).toEqual({
        start: at(2024, 1, 1, 9),
        end: at(2024, 1, 1, 17),
      });
    });

    it('reads a single time as the span until now', () => {
      expect(resolveInterval('2h', NOW)).toEqual({ start: NOW - 2 * HOUR, end: NOW });
      expect(resolveInterval('9:00', NOW)).toEqual({ start: at(2024, 1, 2, 9), end: NOW });
    });

    it('always returns start <= end', () => {
      for (const text of ['today', 'yesterday', 'week', 'month', 'year', '11 - 9', 'tomorrow', 'in 2h']) {
        const interval = resolveInterval(text, NOW);
        expect(interval.start).toBeLessThanOrEqual(interval.end);
      }
    });

    it('rejects unknown keywords', () => {
      expect(() => resolveInterval('fortnight', NOW)).toThrow(UnknownInterval);
      expect(() => resolveInterval('9 - 10 - 11', NOW)).toThrow(UnknownInterval);
    });

    it('reports a bad range end as a bad time', () => {
      expect(() => resolveInterval('banana - 9', NOW)).toThrow('Invalid time specifier: "banana"');
    });
  });
});
