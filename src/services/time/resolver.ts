/**
 * Time expression resolution
 *
 * Turns what the user types ("9:30", "yesterday 14:00", "3 hours ago",
 * "2024-01-02T09:00", "today", "9 - 11:30") into instants and intervals.
 * Calendar arithmetic happens in the local time zone of the process.
 */

import type { Instant, Interval, SearchDirection } from '../../types/index.js';
import { UnknownInterval, UnparseableDuration, UnparseableTime } from '../../utils/errors.js';
import { SECONDS_PER_HOUR, SECONDS_PER_MINUTE, parseDuration } from './duration.js';

interface ClockTime {
  hours: number;
  minutes: number;
  seconds: number;
}

const CLOCK = '(\\d{1,2})(?::(\\d{1,2}))?(?::(\\d{2}))?';

const ISO_PATTERN =
  /^(\d{4})-(\d{2})-(\d{2})(?:[t ](\d{2}):(\d{2})(?::(\d{2}))?(z|[+-]\d{2}:?\d{2})?)?$/;
const CLOCK_PATTERN = new RegExp(`^${CLOCK}$`);
const DAY_WORD_PATTERN = new RegExp(`^(today|yesterday|tomorrow)(?: ${CLOCK})?$`);
const DAY_OF_MONTH_PATTERN = new RegExp(`^(\\d{1,2}) ${CLOCK}$`);
const DAY_MONTH_PATTERN = new RegExp(`^(\\d{1,2})-(\\d{1,2}) ${CLOCK}$`);
// "1:30h" is one hour and thirty minutes, read in the search direction
const HOURS_MINUTES_PATTERN = /^(\d{1,2}):(\d{2})h$/;
const RANGE_SEPARATOR = /\s+-\s+/;

const DAY_OFFSETS: Record<string, number> = { yesterday: -1, today: 0, tomorrow: 1 };

// Dates that do not exist (February 30th) are skipped while searching
const MAX_MONTH_STEPS = 12;
const MAX_YEAR_STEPS = 8;

function toDate(instant: Instant): Date {
  return new Date(instant * 1000);
}

function toInstant(date: Date): Instant {
  return Math.floor(date.getTime() / 1000);
}

function num(text: string | undefined): number {
  return text === undefined ? 0 : parseInt(text, 10);
}

function normalize(text: string): string {
  return text.trim().replace(/\s+/g, ' ').toLowerCase();
}

/**
 * Local midnight of the day holding `instant`, shifted by whole days
 */
export function startOfDay(instant: Instant, offsetDays = 0): Instant {
  const date = toDate(instant);
  date.setHours(0, 0, 0, 0);
  date.setDate(date.getDate() + offsetDays);
  return toInstant(date);
}

function readClock(hours?: string, minutes?: string, seconds?: string): ClockTime | null {
  const clock = { hours: num(hours), minutes: num(minutes), seconds: num(seconds) };
  if (clock.hours > 23 || clock.minutes > 59 || clock.seconds > 59) {
    return null;
  }
  return clock;
}

/**
 * Local instant for a calendar date and clock time, or null when the date
 * does not exist
 */
function localInstant(year: number, month: number, day: number, clock: ClockTime): Instant | null {
  const date = new Date(year, month - 1, day, clock.hours, clock.minutes, clock.seconds);
  if (date.getFullYear() !== year || date.getMonth() !== month - 1 || date.getDate() !== day) {
    return null;
  }
  return toInstant(date);
}

function atClock(dayStart: Instant, clock: ClockTime): Instant {
  const date = toDate(dayStart);
  date.setHours(clock.hours, clock.minutes, clock.seconds, 0);
  return toInstant(date);
}

function parseIso(match: RegExpExecArray): Instant | null {
  const [, year, month, day, hours, minutes, seconds, zone] = match;
  const clock = readClock(hours, minutes, seconds);
  if (!clock) return null;

  if (zone === undefined) {
    return localInstant(num(year), num(month), num(day), clock);
  }

  // Same wall-clock reading, interpreted at the given offset instead
  const utcMs = Date.UTC(num(year), num(month) - 1, num(day), clock.hours, clock.minutes, clock.seconds);
  const utc = new Date(utcMs);
  // Date.UTC maps years 0-99 to 1900-1999
  if (utc.getUTCFullYear() !== num(year) || utc.getUTCMonth() !== num(month) - 1 || utc.getUTCDate() !== num(day)) {
    return null;
  }
  if (zone === 'z') return Math.floor(utcMs / 1000);

  const sign = zone.startsWith('-') ? -1 : 1;
  const digits = zone.slice(1).replace(':', '');
  const offsetHours = num(digits.slice(0, 2));
  const offsetMinutes = num(digits.slice(2));
  if (offsetHours > 23 || offsetMinutes > 59) return null;
  const offsetSeconds = sign * (offsetHours * SECONDS_PER_HOUR + offsetMinutes * SECONDS_PER_MINUTE);
  return Math.floor(utcMs / 1000) - offsetSeconds;
}

/**
 * Today's occurrence of a clock time, moved a day back (backward) or forward
 * (forward) when it lies on the wrong side of now
 */
function resolveClock(clock: ClockTime, now: Instant, direction: SearchDirection): Instant {
  const today = atClock(startOfDay(now), clock);
  if (direction === 'backward') {
    return today > now ? atClock(startOfDay(now, -1), clock) : today;
  }
  return today < now ? atClock(startOfDay(now, 1), clock) : today;
}

function resolveDayOfMonth(day: number, clock: ClockTime, now: Instant, direction: SearchDirection): Instant | null {
  if (day < 1 || day > 31) return null;
  const current = toDate(now);
  const step = direction === 'backward' ? -1 : 1;

  for (let i = 0; i <= MAX_MONTH_STEPS; i++) {
    const month = new Date(current.getFullYear(), current.getMonth() + i * step, 1);
    const candidate = localInstant(month.getFullYear(), month.getMonth() + 1, day, clock);
    if (candidate === null) continue;
    if (direction === 'backward' ? candidate <= now : candidate >= now) {
      return candidate;
    }
  }
  return null;
}

function resolveDayMonth(
  day: number,
  month: number,
  clock: ClockTime,
  now: Instant,
  direction: SearchDirection
): Instant | null {
  if (month < 1 || month > 12 || day < 1 || day > 31) return null;
  const year = toDate(now).getFullYear();
  const step = direction === 'backward' ? -1 : 1;

  for (let i = 0; i <= MAX_YEAR_STEPS; i++) {
    const candidate = localInstant(year + i * step, month, day, clock);
    if (candidate === null) continue;
    if (direction === 'backward' ? candidate <= now : candidate >= now) {
      return candidate;
    }
  }
  return null;
}

/**
 * Relative expressions: "3 hours ago", "in 20m", "2h", "1:30h"
 */
function parseRelative(text: string, now: Instant, direction: SearchDirection): Instant | null {
  let sign = direction === 'backward' ? -1 : 1;
  let body = text;
  if (body.endsWith(' ago')) {
    sign = -1;
    body = body.slice(0, -' ago'.length);
  } else if (body.startsWith('in ')) {
    sign = 1;
    body = body.slice('in '.length);
  }

  const hoursMinutes = HOURS_MINUTES_PATTERN.exec(body);
  if (hoursMinutes) {
    const [, hours, minutes] = hoursMinutes;
    if (num(minutes) > 59) return null;
    const seconds = num(hours) * SECONDS_PER_HOUR + num(minutes) * SECONDS_PER_MINUTE;
    return seconds > 0 ? now + sign * seconds : null;
  }

  try {
    return now + sign * parseDuration(body);
  } catch (error) {
    if (error instanceof UnparseableDuration) return null;
    throw error;
  }
}

/**
 * Resolve a time expression to an instant, anchored at `now`
 *
 * Ambiguous expressions (a clock time, a day of the month) resolve to the
 * most recent matching moment when searching backward and to the next one
 * when searching forward.
 */
export function parseInstant(text: string, now: Instant, direction: SearchDirection = 'backward'): Instant {
  const input = normalize(text);
  const resolved = resolveInstant(input, now, direction);
  if (resolved === null) {
    throw new UnparseableTime(text);
  }
  return resolved;
}

function resolveInstant(input: string, now: Instant, direction: SearchDirection): Instant | null {
  if (input === 'now') return now;

  const iso = ISO_PATTERN.exec(input);
  if (iso) return parseIso(iso);

  const dayWord = DAY_WORD_PATTERN.exec(input);
  if (dayWord) {
    const [, word = 'today', hours, minutes, seconds] = dayWord;
    const dayStart = startOfDay(now, DAY_OFFSETS[word] ?? 0);
    if (hours === undefined) return dayStart;
    const clock = readClock(hours, minutes, seconds);
    return clock ? atClock(dayStart, clock) : null;
  }

  const clockMatch = CLOCK_PATTERN.exec(input);
  if (clockMatch) {
    const [, hours, minutes, seconds] = clockMatch;
    const clock = readClock(hours, minutes, seconds);
    return clock ? resolveClock(clock, now, direction) : null;
  }

  const dayOfMonth = DAY_OF_MONTH_PATTERN.exec(input);
  if (dayOfMonth) {
    const [, day, hours, minutes, seconds] = dayOfMonth;
    const clock = readClock(hours, minutes, seconds);
    return clock ? resolveDayOfMonth(num(day), clock, now, direction) : null;
  }

  const dayMonth = DAY_MONTH_PATTERN.exec(input);
  if (dayMonth) {
    const [, day, month, hours, minutes, seconds] = dayMonth;
    const clock = readClock(hours, minutes, seconds);
    return clock ? resolveDayMonth(num(day), num(month), clock, now, direction) : null;
  }

  return parseRelative(input, now, direction);
}

function ordered(a: Instant, b: Instant): Interval {
  return a <= b ? { start: a, end: b } : { start: b, end: a };
}

/**
 * Parse an explicit "<start> - <end>" range, or return null when the text
 * has no range separator. Inverted ranges are swapped.
 */
export function parseRange(text: string, now: Instant): Interval | null {
  const parts = text.trim().split(RANGE_SEPARATOR);
  if (parts.length !== 2) return null;
  const [from = '', to = ''] = parts;
  return ordered(parseInstant(from, now, 'backward'), parseInstant(to, now, 'backward'));
}

/**
 * Resolve an interval keyword, explicit range or single time into [start, end)
 *
 * - today / yesterday: local midnight to midnight
 * - week: the seven days ending with today
 * - month / year: the calendar month / year holding now
 * - "<a> - <b>": both sides through parseInstant
 * - a single time: from that time until now
 */
export function resolveInterval(text: string, now: Instant): Interval {
  const input = normalize(text);
  const current = toDate(now);

  switch (input) {
    case 'today':
      return { start: startOfDay(now), end: startOfDay(now, 1) };
    case 'yesterday':
      return { start: startOfDay(now, -1), end: startOfDay(now) };
    case 'week':
      return { start: startOfDay(now, -6), end: startOfDay(now, 1) };
    case 'month':
      return {
        start: toInstant(new Date(current.getFullYear(), current.getMonth(), 1)),
        end: toInstant(new Date(current.getFullYear(), current.getMonth() + 1, 1)),
      };
    case 'year':
      return {
        start: toInstant(new Date(current.getFullYear(), 0, 1)),
        end: toInstant(new Date(current.getFullYear() + 1, 0, 1)),
      };
  }

  if (RANGE_SEPARATOR.test(input)) {
    const range = parseRange(input, now);
    if (!range) throw new UnknownInterval(text);
    return range;
  }

  const instant = resolveInstant(input, now, 'backward');
  if (instant === null) {
    throw new UnknownInterval(text);
  }
  return ordered(instant, now);
}
