/**
 * Event model and the line codec of the work log
 *
 * One event per line:
 *   2024-01-02T09:00:00Z start website fix the header
 *   2024-01-02T10:30:00Z stop
 */

import { z } from 'zod';
import type { Instant, StartEvent, WorkEvent } from '../../types/index.js';
import { UsageError } from '../../utils/errors.js';

// 9999-12-31T23:59:59Z, the last instant with a four digit year
const MAX_TIMESTAMP = 253402300799;

const TIMESTAMP_PATTERN = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}Z$/;
const LINE_PATTERN = /^(\S+) (start|stop)(?: (\S+)(?: (.*))?)?$/;

export const timestampSchema = z
  .number()
  .int('Timestamp must be whole seconds')
  .min(0, 'Timestamp cannot precede 1970')
  .max(MAX_TIMESTAMP, 'Timestamp is past year 9999');

export const projectSchema = z
  .string({ required_error: 'Project is required' })
  .min(1, 'Project is required')
  .regex(/^\S+$/, 'Project cannot contain whitespace');

export const descriptionSchema = z
  .string()
  .regex(/^[^\r\n]*$/, 'Description must be a single line')
  .transform((value) => value.trim())
  .transform((value) => (value.length > 0 ? value : undefined))
  .optional();

export const eventSchema = z.discriminatedUnion('kind', [
  z.object({
    kind: z.literal('start'),
    timestamp: timestampSchema,
    project: projectSchema,
    description: descriptionSchema,
  }),
  z.object({
    kind: z.literal('stop'),
    timestamp: timestampSchema,
  }),
]);

export type DecodeResult = { success: true; event: WorkEvent } | { success: false; error: string };

function describeIssues(error: z.ZodError): string {
  return error.issues.map((issue) => issue.message).join('; ');
}

/**
 * Validate and normalize an event before it is written
 */
export function validateEvent(input: unknown): WorkEvent {
  const result = eventSchema.safeParse(input);
  if (!result.success) {
    throw new UsageError(`Invalid event: ${describeIssues(result.error)}`);
  }
  return result.data;
}

/**
 * ISO-8601 UTC with second precision, always 20 characters
 */
export function formatTimestamp(instant: Instant): string {
  return new Date(instant * 1000).toISOString().replace(/\.\d{3}Z$/, 'Z');
}

export function parseTimestamp(text: string): Instant | null {
  if (!TIMESTAMP_PATTERN.test(text)) return null;
  const ms = Date.parse(text);
  if (Number.isNaN(ms)) return null;
  const instant = Math.floor(ms / 1000);
  // Date.parse rolls over impossible dates such as 2024-02-30
  return formatTimestamp(instant) === text ? instant : null;
}

export function encodeEvent(event: WorkEvent): string {
  const timestamp = formatTimestamp(event.timestamp);
  if (event.kind === 'stop') {
    return `${timestamp} stop`;
  }
  return event.description
    ? `${timestamp} start ${event.project} ${event.description}`
    : `${timestamp} start ${event.project}`;
}

export function decodeEvent(line: string): DecodeResult {
  const match = LINE_PATTERN.exec(line);
  if (!match) {
    return { success: false, error: 'expected "<timestamp> start <project> [description]" or "<timestamp> stop"' };
  }

  const [, timestampText = '', kind, project, description] = match;
  const timestamp = parseTimestamp(timestampText);
  if (timestamp === null) {
    return { success: false, error: `invalid timestamp "${timestampText}"` };
  }

  if (kind === 'stop' && project !== undefined) {
    return { success: false, error: 'stop events carry no project' };
  }

  const candidate =
    kind === 'start' ? { kind, timestamp, project, description } : { kind, timestamp };
  const result = eventSchema.safeParse(candidate);
  if (!result.success) {
    return { success: false, error: describeIssues(result.error) };
  }
  return { success: true, event: result.data };
}

/**
 * "project - description" as shown by status
 */
export function describeStart(event: StartEvent): string {
  return event.description ? `${event.project} - ${event.description}` : event.project;
}
