import { describe, it, expect, vi, afterEach } from 'vitest';
import { createLogger, setLogLevel } from '../../src/utils/logger.js';

describe('createLogger', () => {
  afterEach(() => {
    setLogLevel('info');
    vi.restoreAllMocks();
  });

  it('prefixes lines with the tag', () => {
    const info = vi.spyOn(console, 'log').mockImplementation(() => {});
    createLogger('Monitor').info('Running stock check...', 3);
    expect(info).toHaveBeenCalledWith('[Monitor] Running stock check...', 3);
  });

  it('drops messages below the configured level', () => {
    const info = vi.spyOn(console, 'log').mockImplementation(() => {});
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const debug = vi.spyOn(console, 'debug').mockImplementation(() => {});
    setLogLevel('warn');

    const log = createLogger('Test');
    log.debug('hidden');
    log.info('hidden');
    log.warn('shown');

    expect(debug).not.toHaveBeenCalled();
    expect(info).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledWith('[Test] shown');
  });
});
