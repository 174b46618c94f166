import winston from 'winston';

export type Logger = winston.Logger;

export interface LoggerOptions {
  level?: string;
  silent?: boolean;
}

const { combine, timestamp, printf, errors } = winston.format;

const logFormat = printf(
  ({ level, message, timestamp, stack }) => `${timestamp} [${level}] ${stack || message}`
);

/**
 * Console logger with `<timestamp> [level] message` lines
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  return winston.createLogger({
    level: options.level ?? 'info',
    silent: options.silent ?? false,
    format: combine(errors({ stack: true }), timestamp(), logFormat),
    transports: [new winston.transports.Console()]
  });
}

export const logger = createLogger({ level: process.env.LOG_LEVEL ?? 'info' });
