/**
 * Duration parsing
 *
 * Accepts one or more quantity+unit tokens: "90s", "45m", "2h 30m", "2h30m",
 * "1.5 hours", "1 day". A bare number has no unit and is rejected.
 */

import type { Duration } from '../../types/index.js';
import { UnparseableDuration } from '../../utils/errors.js';

export const SECONDS_PER_MINUTE = 60;
export const SECONDS_PER_HOUR = 3600;
export const SECONDS_PER_DAY = 86400;

const UNIT_SECONDS = new Map<string, number>([
  ['s', 1],
  ['sec', 1],
  ['secs', 1],
  ['second', 1],
  ['seconds', 1],
  ['m', SECONDS_PER_MINUTE],
  ['min', SECONDS_PER_MINUTE],
  ['mins', SECONDS_PER_MINUTE],
  ['minute', SECONDS_PER_MINUTE],
  ['minutes', SECONDS_PER_MINUTE],
  ['h', SECONDS_PER_HOUR],
  ['hr', SECONDS_PER_HOUR],
  ['hrs', SECONDS_PER_HOUR],
  ['hour', SECONDS_PER_HOUR],
  ['hours', SECONDS_PER_HOUR],
  ['d', SECONDS_PER_DAY],
  ['day', SECONDS_PER_DAY],
  ['days', SECONDS_PER_DAY],
]);

const TOKEN = /^(\d+(?:\.\d+)?)\s*([a-z]+)\s*/;

/**
 * Parse a duration into whole seconds
 */
export function parseDuration(input: string): Duration {
  const trimmed = input.trim().toLowerCase();
  if (!trimmed) {
    throw new UnparseableDuration(input, 'duration cannot be empty');
  }

  let rest = trimmed;
  let total = 0;
  while (rest.length > 0) {
    const match = TOKEN.exec(rest);
    if (!match) {
      throw new UnparseableDuration(input, 'expected a quantity followed by a unit, e.g. "2h 30m"');
    }

    const [token, quantityText = '', unitText = ''] = match;
    const unit = UNIT_SECONDS.get(unitText);
    if (unit === undefined) {
      throw new UnparseableDuration(input, `unknown unit "${unitText}"`);
    }

    const quantity = parseFloat(quantityText);
    if (!Number.isFinite(quantity)) {
      throw new UnparseableDuration(input, 'quantity is too large');
    }
    if (!(quantity > 0)) {
      throw new UnparseableDuration(input, 'quantity must be positive');
    }

    total += quantity * unit;
    rest = rest.slice(token.length);
  }

  const seconds = Math.round(total);
  if (!Number.isSafeInteger(seconds)) {
    throw new UnparseableDuration(input, 'duration is too large');
  }
  if (seconds <= 0) {
    throw new UnparseableDuration(input, 'duration must be at least one second');
  }
  return seconds;
}
