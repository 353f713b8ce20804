/**
 * Duration and instant formatting for terminal output
 */

import type { Duration, Instant, TimeFormat } from '../../types/index.js';

// Remainder (in minutes) above which hours round up to the next half / whole hour
const HALF_HOUR_THRESHOLD = 15;
const HOUR_THRESHOLD = 30;

// Minutes round up to a multiple of this
const MINUTE_STEP = 15;

const TIME_FORMAT_ALIASES = new Map<string, TimeFormat>([
  ['m', 'minutes'],
  ['minutes', 'minutes'],
  ['ma', 'minutes-approx'],
  ['minutes-approx', 'minutes-approx'],
  ['h', 'hours'],
  ['hours', 'hours'],
  ['hr', 'human-readable'],
  ['human-readable', 'human-readable'],
]);

export function parseTimeFormat(value: string): TimeFormat | null {
  return TIME_FORMAT_ALIASES.get(value.trim().toLowerCase()) ?? null;
}

export function wholeMinutes(seconds: Duration): number {
  return Math.floor(Math.max(0, seconds) / 60);
}

/**
 * Hours rounded to the half hour: 2h25m gives 2.5, 31m gives 1, 14m gives 0
 */
export function approximateHours(seconds: Duration): number {
  const minutes = wholeMinutes(seconds);
  const hours = Math.floor(minutes / 60);
  const remainder = minutes - hours * 60;
  if (remainder > HOUR_THRESHOLD) return hours + 1;
  if (remainder > HALF_HOUR_THRESHOLD) return hours + 0.5;
  return hours;
}

/**
 * Minutes rounded up to a multiple of fifteen: 16m gives 30, 15m stays 15
 */
export function approximateMinutes(seconds: Duration): number {
  const minutes = wholeMinutes(seconds);
  const remainder = minutes % MINUTE_STEP;
  return remainder === 0 ? minutes : minutes + (MINUTE_STEP - remainder);
}

function unit(count: number, singular: string): string {
  return count === 1 ? `1 ${singular}` : `${count} ${singular}s`;
}

/**
 * "2 hours and 5 minutes", "1 hour", "Less than a minute"
 */
export function humanReadable(seconds: Duration): string {
  const minutes = wholeMinutes(seconds);
  const hours = Math.floor(minutes / 60);
  const rest = minutes % 60;

  if (hours === 0 && rest === 0) return 'Less than a minute';
  if (hours === 0) return unit(rest, 'minute');
  if (rest === 0) return unit(hours, 'hour');
  return `${unit(hours, 'hour')} and ${unit(rest, 'minute')}`;
}

export function formatTime(format: TimeFormat, seconds: Duration): string {
  switch (format) {
    case 'minutes':
      return String(wholeMinutes(seconds));
    case 'minutes-approx':
      return String(approximateMinutes(seconds));
    case 'hours':
      return String(approximateHours(seconds));
    case 'human-readable':
      return humanReadable(seconds);
  }
}

function pad(value: number): string {
  return value.toString().padStart(2, '0');
}

/**
 * Local "YYYY-MM-DD HH:MM"
 */
export function formatInstant(instant: Instant): string {
  const date = new Date(instant * 1000);
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}`
  );
}
