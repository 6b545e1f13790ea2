import { AppLogger } from './app-logger.service';
import { LogCategory } from './log-levels';

const LOG_VARIABLES = ['LOG_LEVEL', 'LOG_FORMAT', 'LOG_CATEGORY_LEVELS', 'LOG_INCLUDE_PAYLOADS', 'LOG_INCLUDE_STACKS', 'LOG_MAX_PAYLOAD_SIZE'];

describe('AppLogger', () => {
  let stdoutSpy: jest.SpyInstance;
  let stderrSpy: jest.SpyInstance;
  const saved: Record<string, string | undefined> = {};

  function createLogger(env: Record<string, string> = {}): AppLogger {
    Object.assign(process.env, { LOG_LEVEL: 'TRACE', LOG_FORMAT: 'json' }, env);
    return new AppLogger();
  }

  /** Every JSON line written so far, stdout first. */
  function entries(): Array<Record<string, unknown>> {
    return [...stdoutSpy.mock.calls, ...stderrSpy.mock.calls].map(call => JSON.parse(String(call[0])));
  }

  beforeEach(() => {
    for (const key of LOG_VARIABLES) saved[key] = process.env[key];
    stdoutSpy = jest.spyOn(process.stdout, 'write').mockImplementation(() => true);
    stderrSpy = jest.spyOn(process.stderr, 'write').mockImplementation(() => true);
  });

  afterEach(() => {
    stdoutSpy.mockRestore();
    stderrSpy.mockRestore();
    for (const key of LOG_VARIABLES) {
      const value = saved[key];
      if (value === undefined) delete process.env[key];
      else process.env[key] = value;
    }
  });

  it('should write INFO lines to stdout and WARN lines to stderr as JSON', () => {
    const logger = createLogger();

    logger.info(LogCategory.GENERAL, 'hello');
    logger.warn(LogCategory.AUTH, 'careful');

    expect(stdoutSpy).toHaveBeenCalledTimes(1);
    expect(stderrSpy).toHaveBeenCalledTimes(1);
    expect(JSON.parse(String(stdoutSpy.mock.calls[0][0]))).toMatchObject({ level: 'INFO', category: 'general', message: 'hello' });
  });

  it('should drop entries below the global level', () => {
    const logger = createLogger({ LOG_LEVEL: 'WARN' });

    logger.info(LogCategory.GENERAL, 'ignored');

    expect(entries()).toEqual([]);
  });

  it('should let a category override the global level', () => {
    const logger = createLogger({ LOG_LEVEL: 'ERROR', LOG_CATEGORY_LEVELS: 'oauth=DEBUG' });

    logger.debug(LogCategory.OAUTH, 'signed request');
    logger.debug(LogCategory.ITEMS, 'not this one');

    expect(entries().map(entry => entry.category)).toEqual(['oauth']);
  });

  it('should redact secret-looking keys', () => {
    const logger = createLogger();

    logger.info(LogCategory.OAUTH, 'exchange', {
      oauth_token_secret: 'test-secret',
      verifier: 'abc',
      username: 'usos_1',
    });

    expect(entries()[0].data).toEqual({
      oauth_token_secret: '[REDACTED]',
      verifier: '[REDACTED]',
      username: 'usos_1',
    });
  });

  it('should omit body payloads when payload logging is off', () => {
    const logger = createLogger({ LOG_INCLUDE_PAYLOADS: 'false' });

    logger.trace(LogCategory.HTTP, 'Request body', { body: { name: 'Lab 101' } });

    expect(entries()[0].data).toEqual({ body: '[omitted]' });
  });

  it('should truncate long string values', () => {
    const logger = createLogger({ LOG_MAX_PAYLOAD_SIZE: '4' });

    logger.info(LogCategory.GENERAL, 'long', { note: 'abcdefgh' });

    expect(entries()[0].data).toEqual({ note: 'abcd...[truncated 4B]' });
  });

  it('should stamp entries with the active correlation context', () => {
    const logger = createLogger();

    logger.runWithContext({ requestId: 'req-1', method: 'GET', path: '/items/', principalId: 7 }, () => {
      logger.info(LogCategory.ITEMS, 'listed');
    });

    expect(entries()[0]).toMatchObject({ requestId: 'req-1', method: 'GET', path: '/items/', principalId: 7 });
  });

  it('should only enrich a running context', () => {
    const logger = createLogger();

    logger.enrichContext({ principalId: 1 });
    expect(logger.getContext()).toBeUndefined();

    logger.runWithContext({ requestId: 'req-2' }, () => {
      logger.enrichContext({ principalId: 3, authType: 'token' });
      expect(logger.getContext()).toEqual({ requestId: 'req-2', principalId: 3, authType: 'token' });
    });
  });

  it('should record error details and drop stacks when disabled', () => {
    const logger = createLogger({ LOG_INCLUDE_STACKS: 'false' });

    logger.error(LogCategory.DATABASE, 'query failed', new Error('boom'));

    expect(entries()[0].error).toEqual({ message: 'boom', name: 'Error' });
  });
});
