/**
 * Time aggregation
 *
 * Folds the event log into per-project totals for an interval. Pure: the
 * same events, interval and now always give the same summary.
 */

import type {
  DetailedSummary,
  Duration,
  Instant,
  Interval,
  ProjectBreakdown,
  ProjectSummary,
  StartEvent,
  WorkEvent,
} from '../../types/index.js';

/**
 * Length of the part of [start, end) that lies inside the interval
 */
export function overlap(start: Instant, end: Instant, interval: Interval): Duration {
  return Math.max(0, Math.min(end, interval.end) - Math.max(start, interval.start));
}

/**
 * Visit every start/stop pair with a positive overlap, in log order
 *
 * A trailing start is still running and counts until min(now, interval.end).
 * A start directly followed by another start ends where the next begins; a
 * stop with no start before it is ignored.
 */
function forEachWorkedSpan(
  events: readonly WorkEvent[],
  interval: Interval,
  now: Instant,
  visit: (start: StartEvent, seconds: Duration) => void
): void {
  if (interval.end <= interval.start) return;

  const close = (start: StartEvent, end: Instant): void => {
    const seconds = overlap(start.timestamp, end, interval);
    if (seconds > 0) visit(start, seconds);
  };

  let open: StartEvent | null = null;
  for (const event of events) {
    if (event.kind === 'start') {
      if (open) close(open, event.timestamp);
      open = event;
    } else if (open) {
      close(open, event.timestamp);
      open = null;
    }
  }

  if (open) {
    close(open, Math.min(now, interval.end));
  }
}

/**
 * Total worked time per project within the interval
 */
export function summarize(events: readonly WorkEvent[], interval: Interval, now: Instant): ProjectSummary {
  const totals = new Map<string, Duration>();
  forEachWorkedSpan(events, interval, now, (start, seconds) => {
    totals.set(start.project, (totals.get(start.project) ?? 0) + seconds);
  });
  return totals;
}

/**
 * Like summarize, with each project broken down by description
 */
export function summarizeDetailed(events: readonly WorkEvent[], interval: Interval, now: Instant): DetailedSummary {
  const projects = new Map<string, ProjectBreakdown>();
  forEachWorkedSpan(events, interval, now, (start, seconds) => {
    const breakdown = projects.get(start.project) ?? { total: 0, descriptions: new Map<string, Duration>() };
    const description = start.description ?? '';
    breakdown.total += seconds;
    breakdown.descriptions.set(description, (breakdown.descriptions.get(description) ?? 0) + seconds);
    projects.set(start.project, breakdown);
  });
  return projects;
}
