import { ErrorCode } from '../src/types';
import {
  ConfigurationError,
  ErrorHandler,
  RoverDidNotLandError,
  RoverError,
} from '../src/utils/error-handler';
import { Logger } from '../src/utils/logger';

describe('ErrorHandler', () => {
  test('should format rover errors with their code', () => {
    expect(ErrorHandler.formatError(new RoverDidNotLandError())).toBe(
      '[ROVER_DID_NOT_LAND] Rover did not land'
    );
    expect(ErrorHandler.formatError(new Error('plain'))).toBe('plain');
  });

  test('should classify errors', () => {
    const landing = new RoverDidNotLandError();
    const config = new ConfigurationError(['a', 'b']);

    expect(ErrorHandler.isRoverError(landing)).toBe(true);
    expect(ErrorHandler.isRoverError(new Error('x'))).toBe(false);
    expect(ErrorHandler.isLandingError(landing)).toBe(true);
    expect(ErrorHandler.isLandingError(config)).toBe(false);
    expect(ErrorHandler.isLandingError(new RoverError(ErrorCode.RoverDidNotLand, 'custom'))).toBe(true);
  });

  test('should keep configuration messages', () => {
    const error = new ConfigurationError(['first', 'second']);
    expect(error.code).toBe(ErrorCode.InvalidConfig);
    expect(error.errors).toEqual(['first', 'second']);
    expect(error.message).toBe('Invalid rover configuration: first; second');
  });
});

describe('Logger', () => {
  const originalDebug = process.env.DEBUG;
  let logSpy: jest.SpyInstance;
  let errorSpy: jest.SpyInstance;

  beforeEach(() => {
    logSpy = jest.spyOn(console, 'log').mockImplementation(() => {});
    errorSpy = jest.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    if (originalDebug === undefined) {
      delete process.env.DEBUG;
    } else {
      process.env.DEBUG = originalDebug;
    }
    jest.restoreAllMocks();
  });

  test('should tag messages with the context', () => {
    const logger = new Logger('Rover');
    logger.info('landed', 42);

    expect(logSpy).toHaveBeenCalledWith(expect.stringContaining('[Rover]'), 'landed', 42);
  });

  test('should print error details', () => {
    const logger = new Logger('Rover');
    const details = new Error('boom');
    logger.error('failed', details);

    expect(errorSpy).toHaveBeenNthCalledWith(1, expect.stringContaining('[Rover]'), 'failed');
    expect(errorSpy).toHaveBeenNthCalledWith(2, expect.stringContaining('Error details:'), details);
  });

  test('should only print debug output when DEBUG is set', () => {
    const logger = new Logger('Rover');
    delete process.env.DEBUG;
    logger.debug('hidden');
    expect(logSpy).not.toHaveBeenCalled();

    process.env.DEBUG = '1';
    logger.debug('shown');
    expect(logSpy).toHaveBeenCalledWith(expect.stringContaining('[Rover]'), 'shown');
  });
});
