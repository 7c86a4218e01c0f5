/**
 * Tests for the leveled logger
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import { createLogger, silentLogger, type LogSink } from './logger';

describe('createLogger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('drops messages below the threshold', () => {
    const log = vi.fn<LogSink>();
    const logger = createLogger({ level: 'warn', log });

    logger.debug('a');
    logger.info('b');
    logger.warn('c');
    logger.error('d', { code: 1 });

    expect(log.mock.calls).toEqual([
      ['warn', '[graphseed] c', undefined],
      ['error', '[graphseed] d', { code: 1 }],
    ]);
  });

  it('defaults to info', () => {
    const log = vi.fn<LogSink>();
    const logger = createLogger({ log });

    logger.debug('hidden');
    logger.info('shown');

    expect(log).toHaveBeenCalledTimes(1);
    expect(log).toHaveBeenCalledWith('info', '[graphseed] shown', undefined);
  });

  it('uses a custom prefix, or none', () => {
    const log = vi.fn<LogSink>();

    createLogger({ log, prefix: '[seed]' }).info('one');
    createLogger({ log, prefix: '' }).info('two');

    expect(log.mock.calls.map(([, message]) => message)).toEqual(['[seed] one', 'two']);
  });

  it('writes to the console by default', () => {
    const info = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const logger = createLogger();

    logger.info('ready');
    logger.error('failed', { entity: 'job' });

    expect(info).toHaveBeenCalledWith('[graphseed] ready');
    expect(error).toHaveBeenCalledWith('[graphseed] failed', { entity: 'job' });
  });
});

describe('silentLogger', () => {
  it('writes nothing', () => {
    const spy = vi.spyOn(console, 'log').mockImplementation(() => undefined);

    silentLogger.info('nothing');

    expect(spy).not.toHaveBeenCalled();
    spy.mockRestore();
  });
});
