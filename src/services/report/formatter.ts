/**
 * Summary rendering for the `of` command
 */

import type { DetailedSummary, ProjectSummary, TimeFormat } from '../../types/index.js';
import { formatTime } from './time-format.js';

const NO_DESCRIPTION = '(no description)';

const CSV_HEADER = 'Project,Description,Time Spent';

function csvField(value: string): string {
  if (!/[",\r\n]/.test(value)) return value;
  return `"${value.replace(/"/g, '""')}"`;
}

function descriptionLabel(description: string): string {
  return description === '' ? NO_DESCRIPTION : description;
}

/**
 * One "<project> => <time>" line per project
 */
export function renderText(summary: ProjectSummary, timeFormat: TimeFormat): string {
  return [...summary]
    .map(([project, seconds]) => `${project} => ${formatTime(timeFormat, seconds)}`)
    .join('\n');
}

export function renderCsv(summary: DetailedSummary, timeFormat: TimeFormat): string {
  const rows = [CSV_HEADER];
  for (const [project, breakdown] of summary) {
    for (const [description, seconds] of breakdown.descriptions) {
      rows.push(
        [project, descriptionLabel(description), formatTime(timeFormat, seconds)].map(csvField).join(',')
      );
    }
  }
  return rows.join('\n');
}

/**
 * { "<project>": { "<description>": "<time>" } }, with "" for work logged
 * without a description
 */
export function renderJson(summary: DetailedSummary, timeFormat: TimeFormat): string {
  const output = Object.fromEntries(
    [...summary].map(([project, breakdown]) => [
      project,
      Object.fromEntries(
        [...breakdown.descriptions].map(([description, seconds]) => [description, formatTime(timeFormat, seconds)])
      ),
    ])
  );
  return JSON.stringify(output, null, 2);
}
