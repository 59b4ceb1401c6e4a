import pino, { type Logger, type LoggerOptions } from 'pino';

export type { Logger } from 'pino';

/**
 * Options shared by the worker logger and the Fastify logger so both emit
 * the same line shape.
 */
export function loggerOptions(level: string, serviceName = 'directory-sync'): LoggerOptions {
  return {
    level,
    base: { service: serviceName },
    timestamp: pino.stdTimeFunctions.isoTime,
    formatters: {
      level: (label) => ({ level: label }),
    },
    redact: {
      paths: ['private_key_jwk', 'privateKey', 'accessToken', 'clientAssertion', '*.private_key_jwk'],
      censor: '***REDACTED***',
    },
  };
}

export function createLogger(level: string): Logger {
  return pino(loggerOptions(level));
}

/** Logger that discards everything; used by tests and scripts. */
export function silentLogger(): Logger {
  return pino({ level: 'silent' });
}
