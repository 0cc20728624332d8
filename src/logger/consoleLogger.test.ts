import { afterEach, describe, expect, it, vi } from 'vitest';
import { ConsoleLogger } from './consoleLogger.js';

describe('ConsoleLogger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('prefixes debug lines and passes data through', () => {
    const debugSpy = vi.spyOn(console, 'debug').mockImplementation(() => {});

    new ConsoleLogger().debug('sending request', { method: 'GET' });

    expect(debugSpy).toHaveBeenCalledWith('[toggl-rest-client] [DEBUG] sending request', { method: 'GET' });
  });

  it('omits data when none is given', () => {
    const warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    const infoSpy = vi.spyOn(console, 'info').mockImplementation(() => {});
    const logger = new ConsoleLogger();

    logger.warn('slow');
    logger.error('broken');
    logger.info('ready');

    expect(warnSpy).toHaveBeenCalledWith('[toggl-rest-client] slow');
    expect(errorSpy).toHaveBeenCalledWith('[toggl-rest-client] broken');
    expect(infoSpy).toHaveBeenCalledWith('[toggl-rest-client] ready');
  });
});
