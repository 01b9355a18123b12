import { pino, type DestinationStream, type Logger, type LoggerOptions } from 'pino';

// Anything that might carry the bearer token is removed before it is written.
const REDACT_PATHS = [
  'headers.Authorization',
  'headers.authorization',
  'request.headers.Authorization',
  'request.headers.authorization',
  'apiKey',
];

export function createLogger(level: string, destination?: DestinationStream): Logger {
  const options: LoggerOptions = {
    level,
    base: {
      service: 'chat-completions-client',
    },
    redact: {
      paths: REDACT_PATHS,
      remove: true,
    },
  };

  return destination ? pino(options, destination) : pino(options);
}

export const logger = createLogger(process.env.LOG_LEVEL ?? 'info');

export type { Logger };
