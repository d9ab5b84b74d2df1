/**
 * Logger Tests
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import { Logger, LogLevel, parseLevel } from '@/shared/utils/logger';

function createLogger(level: LogLevel): Logger {
  const logger = new Logger();
  logger.setLevel(level);
  logger.setColors(false);
  return logger;
}

describe('Logger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should write level, message and metadata on one line', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);

    createLogger(LogLevel.DEBUG).warn('Protocol violation', { code: 'unexpected_audio' });

    expect(warn).toHaveBeenCalledTimes(1);
    expect(warn.mock.calls[0]?.[0]).toMatch(
      /^\d{4}-\d{2}-\d{2}T\S+Z WARN  Protocol violation \{"code":"unexpected_audio"\}$/
    );
  });

  it('should drop messages below the configured level', () => {
    const info = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const logger = createLogger(LogLevel.WARN);

    logger.info('Device connected');
    logger.error('Pipeline failed');

    expect(info).not.toHaveBeenCalled();
    expect(error).toHaveBeenCalledTimes(1);
  });

  it('should summarize byte buffers in metadata', () => {
    const debug = vi.spyOn(console, 'debug').mockImplementation(() => undefined);

    createLogger(LogLevel.DEBUG).debug('Frame', { frame: new Uint8Array([1, 2, 3]) });

    expect(debug.mock.calls[0]?.[0]).toMatch(/ \{"frame":"<3 bytes>"\}$/);
  });

  it('should merge plain metadata passed to error', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);

    createLogger(LogLevel.ERROR).error('Send failed', { sessionId: 's1' });

    expect(error.mock.calls[0]?.[0]).toMatch(/ERROR Send failed \{"sessionId":"s1"\}$/);
  });

  it('should describe Error instances passed to error', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);

    createLogger(LogLevel.ERROR).error('Crashed', new TypeError('boom'));

    expect(error.mock.calls[0]?.[0]).toContain('"error":{"name":"TypeError","message":"boom","stack":');
  });
});

describe('parseLevel', () => {
  it('should accept known levels in any case', () => {
    expect(parseLevel('DEBUG')).toBe(LogLevel.DEBUG);
    expect(parseLevel('warn')).toBe(LogLevel.WARN);
    expect(parseLevel('error')).toBe(LogLevel.ERROR);
  });

  it('should fall back to info', () => {
    expect(parseLevel(undefined)).toBe(LogLevel.INFO);
    expect(parseLevel('verbose')).toBe(LogLevel.INFO);
  });
});
