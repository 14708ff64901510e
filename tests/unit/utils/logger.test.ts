/**
 * Logger tests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { logger } from '../../../src/utils/logger.js';

describe('logger', () => {
  let lines: string[];

  beforeEach(() => {
    lines = [];
    logger.setSink((line) => lines.push(line));
  });

  afterEach(() => {
    logger.setSink(null);
    logger.setLevel('warn');
  });

  it('drops messages below the level', () => {
    logger.setLevel('warn');
    logger.debug('quiet');
    logger.info('quiet');
    logger.warn('loud');
    expect(lines).toHaveLength(1);
    expect(lines[0]).toMatch(/^\[\d{4}-\d{2}-\d{2}T[\d:.]+Z\] \[WARN\] loud$/);
  });

  it('appends metadata as JSON and errors by message', () => {
    logger.setLevel('debug');
    logger.debug('with meta', { entries: 2 });
    logger.error('failed', new Error('disk full'));
    expect(lines[0]?.endsWith('[DEBUG] with meta {"entries":2}')).toBe(true);
    expect(lines[1]?.endsWith('[ERROR] failed disk full')).toBe(true);
  });
});
