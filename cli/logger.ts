import pino, { type Logger, type LoggerOptions } from 'pino';

const options: LoggerOptions = {
  level: process.env.LOG_LEVEL || (process.env.VITEST ? 'silent' : 'info'),
  timestamp: pino.stdTimeFunctions.isoTime,
  redact: {
    paths: [
      '*.authorization',
      '*.Authorization',
      '*.apiKey',
      '*.apiToken',
      '*.token',
      '*.password',
      '*.clientSecret',
    ],
    censor: '[redacted]',
  },
};

// stdout carries command output such as get-* records and write reports, so log lines go to stderr
const logger: Logger = process.env.NODE_ENV !== 'production' && !process.env.VITEST
  ? pino({
    ...options,
    transport: { target: 'pino-pretty', options: { colorize: true, destination: 2 } },
  })
  : pino(options, pino.destination(2));

export type { Logger };

export function createLogger(module: string): Logger {
  return logger.child({ module });
}
