import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { initLoggerFromEnv, validateLoggerEnv } from '../env.schema.js';
import { flushLoggers, getLogger, initLogger, isEnabled, type Sink } from '../logger.js';
import { ConsoleSink } from '../sinks/console.js';
import { MemorySink } from '../sinks/memory.js';

describe('Logger', () => {
  beforeEach(() => {
    initLogger({ sinks: [] });
  });

  it('should stay silent until a sink is configured', () => {
    const consoleSpy = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const logger = getLogger('money');

    logger.info('not written');
    logger.error('not written either');

    expect(consoleSpy).not.toHaveBeenCalled();
    consoleSpy.mockRestore();
  });

  it('should deliver entries with level, category and message', () => {
    const sink = new MemorySink();
    initLogger({ level: 'debug', sinks: [sink] });

    getLogger('currency').debug('Unknown currency code requested');

    expect(sink.entries).toHaveLength(1);
    expect(sink.entries[0]?.level).toBe('debug');
    expect(sink.entries[0]?.category).toBe('currency');
    expect(sink.entries[0]?.msg).toBe('Unknown currency code requested');
    expect(sink.entries[0]?.context).toBeUndefined();
  });

  it('should drop entries below the configured level', () => {
    const sink = new MemorySink();
    initLogger({ level: 'warn', sinks: [sink] });
    const logger = getLogger('money');

    logger.trace('trace');
    logger.debug('debug');
    logger.info('info');
    logger.warn('warn');
    logger.error('error');

    expect(sink.entries.map((e) => e.level)).toEqual(['warn', 'error']);
  });

  it('should serialize bigint amounts and errors in context', () => {
    const sink = new MemorySink();
    initLogger({ level: 'info', sinks: [sink] });

    getLogger('money').info({ amount: 123456789012345678901234567890n, cause: new Error('boom') }, 'context test');

    const context = sink.entries[0]?.context;
    expect(context?.['amount']).toBe('123456789012345678901234567890');
    expect(context?.['cause']).toMatchObject({ name: 'Error', message: 'boom' });
  });

  it('should mark circular references', () => {
    const sink = new MemorySink();
    initLogger({ level: 'info', sinks: [sink] });
    const node: Record<string, unknown> = { code: 'EUR' };
    node['self'] = node;

    getLogger('money').info({ node }, 'circular');

    expect(sink.entries[0]?.context?.['node']).toEqual({ code: 'EUR', self: '[Circular]' });
  });

  it('should let loggers created before initLogger pick up the new configuration', () => {
    const early = getLogger('early');
    const sink = new MemorySink();

    early.info('before');
    initLogger({ level: 'info', sinks: [sink] });
    early.info('after');

    expect(sink.entries.map((e) => e.msg)).toEqual(['after']);
  });

  it('should cache loggers per category until re-initialised', () => {
    const a = getLogger('money');
    expect(getLogger('money')).toBe(a);
    expect(getLogger('currency')).not.toBe(a);

    initLogger({ sinks: [] });
    expect(getLogger('money')).not.toBe(a);
  });

  it('should flush every sink', () => {
    const flushA = vi.fn();
    const flushB = vi.fn();
    const sinks: Sink[] = [
      { write: () => undefined, flush: flushA },
      { write: () => undefined, flush: flushB },
    ];
    initLogger({ sinks });

    flushLoggers();

    expect(flushA).toHaveBeenCalledOnce();
    expect(flushB).toHaveBeenCalledOnce();
  });

  it('should order levels from trace to error', () => {
    expect(isEnabled('error', 'warn')).toBe(true);
    expect(isEnabled('warn', 'warn')).toBe(true);
    expect(isEnabled('info', 'warn')).toBe(false);
    expect(isEnabled('trace', 'trace')).toBe(true);
  });
});

describe('ConsoleSink', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should format entries as time, padded level, category, message and context', () => {
    const sink = new ConsoleSink();

    const line = sink.format({
      level: 'info',
      category: 'money',
      timestamp: new Date(2024, 0, 1, 9, 5, 7),
      msg: 'Sub-minor remainder truncated',
      context: { currency: 'EUR', units: '199' },
    });

    expect(line).toBe('[09:05:07] INFO  [money] Sub-minor remainder truncated {currency="EUR", units="199"}');
  });

  it('should wrap the level in ANSI colors when enabled', () => {
    const sink = new ConsoleSink({ color: true });

    const line = sink.format({ level: 'error', category: 'c', timestamp: new Date(2024, 0, 1, 0, 0, 0), msg: 'm' });

    expect(line).toBe('[00:00:00] \x1b[31mERROR\x1b[0m [c] m');
  });

  it('should route warn and error to the matching console methods', () => {
    const logSpy = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const sink = new ConsoleSink();

    sink.write({ level: 'debug', category: 'c', timestamp: new Date(), msg: 'debug message' });
    sink.write({ level: 'warn', category: 'c', timestamp: new Date(), msg: 'warn message' });
    sink.write({ level: 'error', category: 'c', timestamp: new Date(), msg: 'error message' });

    expect(logSpy).toHaveBeenCalledWith(expect.stringContaining('debug message'));
    expect(warnSpy).toHaveBeenCalledWith(expect.stringContaining('warn message'));
    expect(errorSpy).toHaveBeenCalledWith(expect.stringContaining('error message'));
  });
});

describe('Logger environment', () => {
  beforeEach(() => {
    initLogger({ sinks: [] });
  });

  it('should apply defaults when nothing is set', () => {
    expect(validateLoggerEnv({})).toEqual({
      MINORUNIT_LOG_COLOR: false,
      MINORUNIT_LOG_CONSOLE: false,
      MINORUNIT_LOG_LEVEL: 'info',
    });
  });

  it('should normalise the level and parse flags', () => {
    const config = validateLoggerEnv({ MINORUNIT_LOG_LEVEL: ' DEBUG ', MINORUNIT_LOG_CONSOLE: 'true' });

    expect(config.MINORUNIT_LOG_LEVEL).toBe('debug');
    expect(config.MINORUNIT_LOG_CONSOLE).toBe(true);
  });

  it('should reject an unknown level', () => {
    expect(() => validateLoggerEnv({ MINORUNIT_LOG_LEVEL: 'verbose' })).toThrow(
      'Logger environment validation failed:\n  - MINORUNIT_LOG_LEVEL: Invalid log level, expected one of: trace, debug, info, warn, error'
    );
  });

  it('should install a console sink when enabled', () => {
    const logSpy = vi.spyOn(console, 'log').mockImplementation(() => undefined);

    initLoggerFromEnv({ MINORUNIT_LOG_CONSOLE: 'true', MINORUNIT_LOG_LEVEL: 'debug' });
    getLogger('money').debug('visible');

    expect(logSpy).toHaveBeenCalledOnce();
    expect(logSpy).toHaveBeenCalledWith(expect.stringContaining('DEBUG [money] visible'));
    logSpy.mockRestore();
  });
});
