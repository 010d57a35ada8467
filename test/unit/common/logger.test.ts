import { createLogger, HarnessLogger, isLogLevel, silentLogger } from '../../../src/common/logger';

describe('HarnessLogger', () => {
  let errorSpy: jest.SpyInstance;

  beforeEach(() => {
    errorSpy = jest.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    errorSpy.mockRestore();
  });

  it('should write level-prefixed lines to standard error', () => {
    const logger = new HarnessLogger({ enableTestMode: false });

    logger.info('Waiting for client connection...');

    expect(errorSpy).toHaveBeenCalledWith('[INFO] Waiting for client connection...');
  });

  it('should pass extra arguments through', () => {
    const logger = new HarnessLogger({ enableTestMode: false });

    logger.error('Server error', 42);

    expect(errorSpy).toHaveBeenCalledWith('[ERROR] Server error', 42);
  });

  it('should drop messages below the minimum level', () => {
    const logger = new HarnessLogger({ level: 'warn', enableTestMode: false });

    logger.debug('hidden');
    logger.info('hidden');
    logger.warn('shown');

    expect(errorSpy).toHaveBeenCalledTimes(1);
    expect(errorSpy).toHaveBeenCalledWith('[WARN] shown');
  });

  it('should nest scopes in child loggers', () => {
    const logger = createLogger({ scope: 'cli', enableTestMode: false });

    logger.child('server').info('ready');

    expect(errorSpy).toHaveBeenCalledWith('[INFO] [cli:server] ready');
  });

  it('should stay silent in test mode', () => {
    const logger = new HarnessLogger();

    logger.error('not shown');

    expect(logger.isEnabled('error')).toBe(false);
    expect(errorSpy).not.toHaveBeenCalled();
  });

  it('should expose a silent logger', () => {
    silentLogger.info('nothing');

    expect(errorSpy).not.toHaveBeenCalled();
  });

  it('should recognize log levels', () => {
    expect(isLogLevel('debug')).toBe(true);
    expect(isLogLevel('trace')).toBe(false);
    expect(isLogLevel(3)).toBe(false);
  });
});
