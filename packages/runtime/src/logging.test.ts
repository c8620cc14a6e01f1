// Tests for store logging

import { describe, it, expect } from 'vitest';
import { createCapturingLogger, createLevelLogger } from './logging.js';

describe('createLevelLogger', () => {
  it('drops entries below the minimum level', () => {
    const base = createCapturingLogger();
    const logger = createLevelLogger(base, 'warn');

    logger.debug('d');
    logger.info('i');
    logger.warn('w', { attempt: 2 });
    logger.error('e');

    expect(base.entries.map((e) => [e.level, e.message])).toEqual([
      ['warn', 'w'],
      ['error', 'e'],
    ]);
    expect(base.entries[0]?.data).toEqual({ attempt: 2 });
  });

  it('passes everything at debug', () => {
    const base = createCapturingLogger();
    const logger = createLevelLogger(base, 'debug');

    logger.debug('d');
    logger.info('i');

    expect(base.entries).toHaveLength(2);
  });
});
