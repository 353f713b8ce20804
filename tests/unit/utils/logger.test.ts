/**
 * Tests for the logger
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { logger } from '../../../src/utils/logger.js';

describe('logger', () => {
  let lines: string[];

  beforeEach(() => {
    lines = [];
    logger.setSink((line) => {
      lines.push(line);
    });
  });

  afterEach(() => {
    logger.setLevel('warn');
    logger.setSink((line) => {
      process.stderr.write(`${line}\n`);
    });
  });

  it('drops messages below the level', () => {
    logger.setLevel('info');
    logger.debug('hidden');
    logger.info('shown');
    expect(lines).toHaveLength(1);
    expect(lines[0]).toMatch(/^\[\d{4}-\d{2}-\d{2}T[\d:.]+Z\] \[INFO\] shown$/);
  });

  it('appends metadata as JSON', () => {
    logger.setLevel('debug');
    logger.warn('with meta', { path: '/tmp/work.log' });
    expect(lines[0]).toMatch(/\[WARN\] with meta \{"path":"\/tmp\/work\.log"\}$/);
  });

  it('describes errors by name and message', () => {
    logger.setLevel('error');
    logger.error('failed', new TypeError('bad input'));
    expect(lines[0]).toMatch(/\[ERROR\] failed \{"name":"TypeError","message":"bad input"\}$/);
  });
});
