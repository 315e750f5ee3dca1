import pino from 'pino';
import { getEnvironment } from '../config/environment.js';
import { FetchFailure } from '../types/edgar.types.js';

let _logger: pino.Logger | undefined;

/**
 * `error` carries thrown errors (AppError code and details included) and
 * `failure` a FetchFailure, logged as one readable line.
 */
export const logSerializers = {
  error: pino.stdSerializers.err,
  failure: (failure: FetchFailure): string =>
    `${failure.message} (${failure.reason}) after ${failure.attempts} attempts`,
};

export function createLogger(destination?: pino.DestinationStream): pino.Logger {
  const env = getEnvironment();

  const options: pino.LoggerOptions = {
    name: 'edgar-exhibits',
    level: env.LOG_LEVEL,
    serializers: logSerializers,
    transport:
      env.NODE_ENV === 'development' && !destination
        ? {
            target: 'pino-pretty',
            options: {
              colorize: true,
              translateTime: 'HH:MM:ss',
              ignore: 'pid,hostname',
            },
          }
        : undefined,
  };

  _logger = destination ? pino(options, destination) : pino(options);

  return _logger;
}

export function getLogger(): pino.Logger {
  if (!_logger) {
    throw new Error('Logger not initialized. Call createLogger() first.');
  }
  return _logger;
}
