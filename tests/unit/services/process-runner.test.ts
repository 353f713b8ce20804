/**
 * Tests for the shell runner behind `work while`
 */

import { describe, it, expect } from 'vitest';
import { createShellRunner } from '../../../src/services/process/runner.js';
import { ProcessFailed } from '../../../src/utils/errors.js';

function addedListener(signal: NodeJS.Signals, before: readonly unknown[]): Function {
  const added = process.listeners(signal).filter((listener) => !before.includes(listener));
  expect(added).toHaveLength(1);
  const [listener] = added;
  if (!listener) throw new Error(`No ${signal} listener was added`);
  return listener;
}

describe('createShellRunner', () => {
  const run = createShellRunner('sh');

  it('reports the exit code', async () => {
    expect(await run('exit 0')).toEqual({ code: 0, signal: null });
    expect(await run('exit 3')).toEqual({ code: 3, signal: null });
  });

  it('reports the signal that ended the command', async () => {
    expect(await run('kill -TERM $$')).toEqual({ code: null, signal: 'SIGTERM' });
  });

  it('fails when the shell cannot be started', async () => {
    const pending = createShellRunner('/nonexistent/shell')('true');
    await expect(pending).rejects.toThrow(ProcessFailed);
    await expect(pending).rejects.toThrow(/^Failed to start \/nonexistent\/shell: /);
  });

  it('holds signal listeners only while the command runs', async () => {
    const sigint = process.listenerCount('SIGINT');
    const sigterm = process.listenerCount('SIGTERM');

    const pending = run('exit 0');
    expect(process.listenerCount('SIGINT')).toBe(sigint + 1);
    expect(process.listenerCount('SIGTERM')).toBe(sigterm + 1);

    await pending;
    expect(process.listenerCount('SIGINT')).toBe(sigint);
    expect(process.listenerCount('SIGTERM')).toBe(sigterm);

    await createShellRunner('/nonexistent/shell')('true').catch(() => undefined);
    expect(process.listenerCount('SIGINT')).toBe(sigint);
    expect(process.listenerCount('SIGTERM')).toBe(sigterm);
  });

  it('passes SIGTERM on to the command', async () => {
    const before = process.listeners('SIGTERM');
    const pending = run('exec sleep 5');
    addedListener('SIGTERM', before)('SIGTERM');

    expect(await pending).toEqual({ code: null, signal: 'SIGTERM' });
  });

  it('leaves SIGINT to the command', async () => {
    const before = process.listeners('SIGINT');
    const pending = run('exec sleep 0.1');
    addedListener('SIGINT', before)('SIGINT');

    expect(await pending).toEqual({ code: 0, signal: null });
  });
});
