/**
 * Tests for duration parsing
 */

import { describe, it, expect } from 'vitest';
import { parseDuration } from '../../../src/services/time/duration.js';
import { UnparseableDuration } from '../../../src/utils/errors.js';

describe('parseDuration', () => {
  it('parses single units', () => {
    expect(parseDuration('90s')).toBe(90);
    expect(parseDuration('45m')).toBe(2700);
    expect(parseDuration('2h')).toBe(7200);
    expect(parseDuration('1 day')).toBe(86400);
  });

  it('accepts long unit names and any case', () => {
    expect(parseDuration('3 hours')).toBe(10800);
    expect(parseDuration('1 minute')).toBe(60);
    expect(parseDuration('2H')).toBe(7200);
  });

  it('sums several tokens with or without spaces', () => {
    expect(parseDuration('2h 30m')).toBe(9000);
    expect(parseDuration('2h30m')).toBe(9000);
    expect(parseDuration('1d 1h 1m 1s')).toBe(90061);
  });

  it('accepts fractional quantities', () => {
    expect(parseDuration('1.5 hours')).toBe(5400);
    expect(parseDuration('0.5m')).toBe(30);
  });

  it('rejects empty input', () => {
    expect(() => parseDuration('   ')).toThrow('Invalid duration "   ": duration cannot be empty');
  });

  it('rejects a bare number', () => {
    expect(() => parseDuration('120')).toThrow(UnparseableDuration);
  });

  it('rejects text without a quantity', () => {
    expect(() => parseDuration('abc')).toThrow(
      'Invalid duration "abc": expected a quantity followed by a unit, e.g. "2h 30m"'
    );
    expect(() => parseDuration('-5m')).toThrow(UnparseableDuration);
  });

  it('rejects unknown units', () => {
    expect(() => parseDuration('5 weeks')).toThrow('Invalid duration "5 weeks": unknown unit "weeks"');
  });

  it('rejects quantities too large to count in seconds', () => {
    expect(() => parseDuration(`${'9'.repeat(400)}h`)).toThrow('quantity is too large');
    expect(() => parseDuration(`${'9'.repeat(20)}d`)).toThrow('duration is too large');
  });

  it('rejects zero and sub-second durations', () => {
    expect(() => parseDuration('0m')).toThrow('quantity must be positive');
    expect(() => parseDuration('0.4s')).toThrow('duration must be at least one second');
  });
});
