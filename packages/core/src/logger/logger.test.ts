import { createLogger, isLogLevel } from './logger';

describe('Logger', () => {
  let logSpy: jest.SpyInstance;
  let warnSpy: jest.SpyInstance;
  let errorSpy: jest.SpyInstance;

  beforeEach(() => {
    logSpy = jest.spyOn(console, 'log').mockImplementation();
    warnSpy = jest.spyOn(console, 'warn').mockImplementation();
    errorSpy = jest.spyOn(console, 'error').mockImplementation();
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('should prefix messages and forward extra arguments', () => {
    const logger = createLogger('[Test] ', 'debug');

    logger.info('hello', 42);

    expect(logSpy).toHaveBeenCalledWith('[Test] hello', 42);
  });

  it('should drop messages below the configured level', () => {
    const logger = createLogger('', 'warn');

    logger.debug('debug');
    logger.info('info');
    logger.warn('warn');
    logger.error('error');

    expect(logSpy).not.toHaveBeenCalled();
    expect(warnSpy).toHaveBeenCalledWith('warn');
    expect(errorSpy).toHaveBeenCalledWith('error');
  });

  it('should print nothing when silent', () => {
    const logger = createLogger('', 'silent');

    logger.error('error');

    expect(errorSpy).not.toHaveBeenCalled();
  });

  it('should be silent by default under NODE_ENV=test', () => {
    const logger = createLogger('');

    logger.info('info');

    expect(logSpy).not.toHaveBeenCalled();
  });

  it('should recognize log levels', () => {
    expect(isLogLevel('debug')).toBe(true);
    expect(isLogLevel('verbose')).toBe(false);
    expect(isLogLevel(undefined)).toBe(false);
  });
});
