import { createLogger as createWinstonLogger, format, transports } from 'winston';
import { LogLevel } from '../config/DemoConfig';
import { LoggerWrapper } from './LoggerWrapper';

export interface LoggerOptions {
  level?: LogLevel;
  silent?: boolean;
}

// Everything goes to stderr; stdout carries the demo output
const STDERR_LEVELS = ['error', 'warn', 'info', 'debug'];

/**
 * Create the winston logger used by the demo runner and CLI
 */
export function createLogger(options: LoggerOptions = {}): LoggerWrapper {
  const logger = createWinstonLogger({
    level: options.level ?? 'info',
    silent: options.silent ?? false,
    format: format.combine(
      format.timestamp(),
      format.printf(({ timestamp, level, message, ...meta }) => {
        const context = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';
        return `${String(timestamp)} [${level}] ${String(message)}${context}`;
      }),
    ),
    transports: [new transports.Console({ stderrLevels: STDERR_LEVELS })],
  });

  return new LoggerWrapper(logger);
}
