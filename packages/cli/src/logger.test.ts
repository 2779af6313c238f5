import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { Logger, parseLogLevel, resolveLogLevel } from './logger.js';

describe('parseLogLevel', () => {
  it('parses every level case-insensitively', () => {
    expect(parseLogLevel('debug')).toBe('debug');
    expect(parseLogLevel('Info')).toBe('info');
    expect(parseLogLevel('WARN')).toBe('warn');
    expect(parseLogLevel('error')).toBe('error');
  });

  it('returns undefined for unknown values', () => {
    expect(parseLogLevel('verbose')).toBeUndefined();
    expect(parseLogLevel('')).toBeUndefined();
  });
});

describe('resolveLogLevel', () => {
  const originalEnv = process.env.NOTIQD_LOG_LEVEL;

  beforeEach(() => {
    delete process.env.NOTIQD_LOG_LEVEL;
  });

  afterEach(() => {
    if (originalEnv === undefined) {
      delete process.env.NOTIQD_LOG_LEVEL;
    }
    else {
      process.env.NOTIQD_LOG_LEVEL = originalEnv;
    }
  });

  it('defaults to info', () => {
    expect(resolveLogLevel()).toBe('info');
  });

  it('uses the config level', () => {
    expect(resolveLogLevel('debug')).toBe('debug');
  });

  it('prefers the environment variable over config', () => {
    process.env.NOTIQD_LOG_LEVEL = 'error';
    expect(resolveLogLevel('debug')).toBe('error');
  });

  it('falls back to config when the environment variable is invalid', () => {
    process.env.NOTIQD_LOG_LEVEL = 'loud';
    expect(resolveLogLevel('warn')).toBe('warn');
  });

  it('falls back to info when both are invalid', () => {
    process.env.NOTIQD_LOG_LEVEL = 'loud';
    expect(resolveLogLevel('louder')).toBe('info');
  });
});

describe('Logger', () => {
  it('writes prefixed lines at or above the configured level', () => {
    const output: string[] = [];
    const logger = new Logger({
      level: 'info',
      writeFn: msg => output.push(msg),
    });

    logger.debug('debug msg');
    logger.info('info msg');
    logger.warn('warn msg');
    logger.error('error msg');

    expect(output).toEqual([
      '[notiqd] info: info msg\n',
      '[notiqd] warn: warn msg\n',
      '[notiqd] error: error msg\n',
    ]);
  });

  it('writes everything at debug level', () => {
    const output: string[] = [];
    const logger = new Logger({
      level: 'debug',
      writeFn: msg => output.push(msg),
    });

    logger.debug('d');
    logger.error('e');

    expect(output).toEqual(['[notiqd] debug: d\n', '[notiqd] error: e\n']);
  });

  it('writes to stderr by default', () => {
    const spy = vi
      .spyOn(process.stderr, 'write')
      .mockImplementation(() => true);
    try {
      new Logger().warn('careful');
      expect(spy).toHaveBeenCalledWith('[notiqd] warn: careful\n');
    }
    finally {
      spy.mockRestore();
    }
  });
});
