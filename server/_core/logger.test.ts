import { afterEach, describe, expect, it, vi } from 'vitest';
import { LogLevel, Logger, parseLogLevel, scopedLog } from './logger';

afterEach(() => {
  vi.restoreAllMocks();
});

describe('parseLogLevel', () => {
  it('accepts the usual spellings', () => {
    expect(parseLogLevel('debug')).toBe(LogLevel.DEBUG);
    expect(parseLogLevel(' WARNING ')).toBe(LogLevel.WARN);
    expect(parseLogLevel('Error')).toBe(LogLevel.ERROR);
  });

  it('falls back to info', () => {
    expect(parseLogLevel('')).toBe(LogLevel.INFO);
    expect(parseLogLevel('verbose')).toBe(LogLevel.INFO);
  });
});

describe('Logger', () => {
  it('drops messages below its level', () => {
    const info = vi.spyOn(console, 'info').mockImplementation(() => {});
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const log = new Logger({ level: LogLevel.WARN });

    log.info('quiet');
    log.warn('loud', 'Proxy');

    expect(info).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledTimes(1);
    expect(warn.mock.calls[0][0]).toMatch(/^\d{4}-\d{2}-\d{2}T[\d:.]+Z \[WARN\] \[Proxy\] loud$/);
  });

  it('writes nothing to the console when told not to', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});
    new Logger({ console: false }).error('hidden');

    expect(error).not.toHaveBeenCalled();
  });
});

describe('scopedLog', () => {
  it('tags lines with the context and passes the cause along', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});
    const debug = vi.spyOn(console, 'debug').mockImplementation(() => {});
    const target = new Logger({ level: LogLevel.DEBUG });
    const log = scopedLog('Settings', target);
    const cause = new Error('disk full');

    log.debug('loaded');
    log.error('save failed', cause);
    log.error('no cause');

    expect(debug.mock.calls[0][0]).toMatch(/\[DEBUG\] \[Settings\] loaded$/);
    expect(error.mock.calls[0]).toHaveLength(2);
    expect(error.mock.calls[0][1]).toBe(cause);
    expect(error.mock.calls[1]).toHaveLength(1);
  });
});
