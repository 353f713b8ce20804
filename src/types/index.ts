/**
 * worklog - Type Definitions
 */

// Whole seconds since the Unix epoch
export type Instant = number;

// Whole seconds
export type Duration = number;

export interface StartEvent {
  kind: 'start';
  timestamp: Instant;
  project: string;
  description?: string | undefined;
}

// A stop belongs to the project of the start before it
export interface StopEvent {
  kind: 'stop';
  timestamp: Instant;
}

export type WorkEvent = StartEvent | StopEvent;

// Half-open range [start, end)
export interface Interval {
  start: Instant;
  end: Instant;
}

// Iteration order is first-seen order of projects with positive time
export type ProjectSummary = ReadonlyMap<string, Duration>;

export interface ProjectBreakdown {
  total: Duration;
  // Keyed by description, '' when the start had none
  descriptions: Map<string, Duration>;
}

export type DetailedSummary = ReadonlyMap<string, ProjectBreakdown>;

// Which way an ambiguous time expression is searched from "now"
export type SearchDirection = 'backward' | 'forward';

export type TimeFormat = 'minutes' | 'minutes-approx' | 'hours' | 'human-readable';

export type ReportFormat = 'text' | 'csv' | 'json';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface WorkConfig {
  logPath: string;
  logLevel: LogLevel;
  timeFormat: TimeFormat;
  shell: string;
}

// Command responses
export interface CommandResult {
  exitCode: 0 | 1;
  output?: string | undefined;
}
