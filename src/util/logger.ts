import pino, { type Logger, type LoggerOptions } from 'pino';
import process from 'node:process';

// stdout carries command output; logs go to stderr.
const STDERR = 2;

function createRootLogger(): Logger {
  const options: LoggerOptions = {
    name: 'card-speech',
    level: process.env.LOG_LEVEL || 'info',
    redact: {
      paths: ['apiKey', 'token', 'secret', '*.apiKey', '*.token', '*.secret', 'headers.authorization'],
      censor: '***REDACTED***',
    },
    serializers: {
      err: pino.stdSerializers.err,
      error: pino.stdSerializers.err,
    },
  };

  if (process.env.LOG_PRETTY === 'true') {
    return pino({
      ...options,
      transport: {
        target: 'pino-pretty',
        options: {
          destination: STDERR,
          colorize: true,
          translateTime: 'HH:MM:ss.l',
          ignore: 'pid,hostname,name',
        },
      },
    });
  }

  // sync: commands may exit right after logging
  return pino(options, pino.destination({ dest: STDERR, sync: true }));
}

export const logger = createRootLogger();

export function createChildLogger(component: string): Logger {
  return logger.child({ component });
}
