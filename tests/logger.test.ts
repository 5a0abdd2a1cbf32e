/**
 * Tests for Logger
 */

import { describe, it, expect } from 'vitest';
import { LogLevel, parseLogLevel } from '../src/utils/logger.js';
import { recordingLogger } from './helpers/logger.js';

describe('Logger', () => {
  it('should drop messages below the configured level', () => {
    const { logger, lines } = recordingLogger(LogLevel.WARN);

    logger.debug('cycle took 12ms');
    logger.info('sampling every 2000ms');
    logger.warn('process table unavailable');
    logger.error('restore aborted');

    expect(lines.map(line => line.slice(line.indexOf(' ') + 1))).toEqual([
      'WARN process table unavailable',
      'ERROR restore aborted',
    ]);
  });

  it('should prefix nested component scopes', () => {
    const { logger, lines } = recordingLogger(LogLevel.INFO);

    logger.child('monitor').child('cycle').info('started');

    expect(lines[0]?.endsWith(' INFO [monitor:cycle] started')).toBe(true);
  });

  it('should report which levels are enabled', () => {
    const { logger } = recordingLogger(LogLevel.INFO);

    expect(logger.isEnabled(LogLevel.WARN)).toBe(true);
    expect(logger.isEnabled(LogLevel.DEBUG)).toBe(false);
  });
});

describe('parseLogLevel', () => {
  it('should accept level names in any case', () => {
    expect(parseLogLevel('DEBUG')).toBe(LogLevel.DEBUG);
    expect(parseLogLevel('warn')).toBe(LogLevel.WARN);
  });

  it('should fall back for unknown or missing values', () => {
    expect(parseLogLevel('loud')).toBe(LogLevel.INFO);
    expect(parseLogLevel(undefined, LogLevel.ERROR)).toBe(LogLevel.ERROR);
  });
});
