/**
 * Append-only work log storage
 *
 * The store is the only writer of the log. It checks every append against
 * the last event (kinds alternate starting with a start, timestamps never go
 * backwards) and refuses to read a log that breaks the same rules.
 */

import { open, readFile, mkdir } from 'fs/promises';
import type { FileHandle } from 'fs/promises';
import { dirname } from 'path';
import type { WorkEvent } from '../../types/index.js';
import {
  AlternationViolation,
  LogAccessError,
  LogUnreadable,
  NonMonotonicTimestamp,
  WorkError,
} from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import { decodeEvent, encodeEvent, validateEvent } from './event.js';

/**
 * Storage capability handed to commands
 */
export interface LogStore {
  readonly path: string;
  append(event: WorkEvent): Promise<void>;
  readAll(): Promise<readonly WorkEvent[]>;
  last(): Promise<WorkEvent | null>;
  isOpen(): Promise<boolean>;
  close(): Promise<void>;
}

/**
 * Throws if `next` may not follow `last` in the log
 */
export function checkAppend(last: WorkEvent | null, next: WorkEvent): void {
  if (next.kind === 'stop' && (last === null || last.kind === 'stop')) {
    throw new AlternationViolation('Unable to stop, no work in progress!');
  }
  if (next.kind === 'start' && last?.kind === 'start') {
    throw new AlternationViolation('Please stop the current work before starting new work.');
  }
  if (last && next.timestamp < last.timestamp) {
    throw new NonMonotonicTimestamp(next.timestamp, last.timestamp);
  }
}

/**
 * Decode a whole log, failing on the first bad line
 */
export function parseLog(content: string, path: string): WorkEvent[] {
  const lines = content.split('\n');
  if (lines[lines.length - 1] === '') {
    lines.pop();
  }

  const events: WorkEvent[] = [];
  lines.forEach((raw, index) => {
    const lineNumber = index + 1;
    const decoded = decodeEvent(raw.replace(/\r$/, ''));
    if (!decoded.success) {
      throw new LogUnreadable(path, lineNumber, decoded.error);
    }
    try {
      checkAppend(events[events.length - 1] ?? null, decoded.event);
    } catch (error) {
      if (error instanceof WorkError) {
        throw new LogUnreadable(path, lineNumber, error.message);
      }
      throw error;
    }
    events.push(decoded.event);
  });
  return events;
}

function errnoCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

function toAccessError(error: unknown, path: string): WorkError {
  switch (errnoCode(error)) {
    case 'EACCES':
    case 'EPERM':
      return new LogAccessError(`Invalid permissions for work log ${path}`);
    case 'EISDIR':
      return new LogAccessError(`Work log ${path} is a directory`);
    case 'ENOTDIR':
      return new LogAccessError(`A parent of work log ${path} is not a directory`);
    default: {
      const reason = error instanceof Error ? error.message : String(error);
      return new LogAccessError(`Unable to write/read to/from work log ${path}: ${reason}`);
    }
  }
}

/**
 * Log store backed by a single text file
 *
 * The file is read once and cached; the append handle is opened on the first
 * write so read-only commands never create the file.
 */
export class FileLogStore implements LogStore {
  private events: WorkEvent[] | null = null;
  private handle: FileHandle | null = null;
  private closed = false;

  constructor(readonly path: string) {}

  async readAll(): Promise<readonly WorkEvent[]> {
    const events = await this.load();
    return [...events];
  }

  async last(): Promise<WorkEvent | null> {
    const events = await this.load();
    return events[events.length - 1] ?? null;
  }

  async isOpen(): Promise<boolean> {
    const last = await this.last();
    return last?.kind === 'start';
  }

  async append(event: WorkEvent): Promise<void> {
    const valid = validateEvent(event);
    const events = await this.load();
    checkAppend(events[events.length - 1] ?? null, valid);

    const handle = await this.acquireHandle();
    let size: number | null = null;
    try {
      size = (await handle.stat()).size;
      await handle.appendFile(`${encodeEvent(valid)}\n`, 'utf-8');
      await handle.sync();
    } catch (error) {
      if (size !== null) {
        await this.rollback(handle, size);
      }
      throw toAccessError(error, this.path);
    }

    events.push(valid);
    logger.debug(`Appended ${valid.kind} event`, { path: this.path, timestamp: valid.timestamp });
  }

  async close(): Promise<void> {
    this.closed = true;
    this.events = null;
    if (this.handle) {
      const handle = this.handle;
      this.handle = null;
      await handle.close();
    }
  }

  // Cut off whatever part of a failed append reached the file
  private async rollback(handle: FileHandle, size: number): Promise<void> {
    try {
      await handle.truncate(size);
      await handle.sync();
    } catch (error) {
      logger.error(`Unable to remove a partial write from ${this.path}`, error);
    }
  }

  private ensureUsable(): void {
    if (this.closed) {
      throw new Error(`Log store for ${this.path} is closed`);
    }
  }

  private async load(): Promise<WorkEvent[]> {
    this.ensureUsable();
    if (this.events) return this.events;

    let content: string;
    try {
      content = await readFile(this.path, 'utf-8');
    } catch (error) {
      if (errnoCode(error) === 'ENOENT') {
        logger.debug(`No work log at ${this.path}, starting empty`);
        this.events = [];
        return this.events;
      }
      throw toAccessError(error, this.path);
    }

    this.events = parseLog(content, this.path);
    logger.debug(`Read ${this.events.length} events`, { path: this.path });
    return this.events;
  }

  private async acquireHandle(): Promise<FileHandle> {
    this.ensureUsable();
    if (this.handle) return this.handle;
    try {
      await mkdir(dirname(this.path), { recursive: true });
      this.handle = await open(this.path, 'a');
    } catch (error) {
      throw toAccessError(error, this.path);
    }
    return this.handle;
  }
}

/**
 * Open a store for the duration of `fn` and always close it afterwards
 */
export async function withLogStore<T>(path: string, fn: (store: LogStore) => Promise<T>): Promise<T> {
  const store = new FileLogStore(path);
  try {
    return await fn(store);
  } finally {
    await store.close();
  }
}
