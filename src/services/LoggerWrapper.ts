import { Logger } from 'winston';
import { LogLevel } from '../config/DemoConfig';

export type LogMeta = Record<string, unknown>;

export class LoggerWrapper {
  constructor(private readonly logger: Logger) {}

  error(message: string, meta?: LogMeta): void {
    this.write('error', message, meta);
  }

  warn(message: string, meta?: LogMeta): void {
    this.write('warn', message, meta);
  }

  info(message: string, meta?: LogMeta): void {
    this.write('info', message, meta);
  }

  debug(message: string, meta?: LogMeta): void {
    this.write('debug', message, meta);
  }

  child(options: LogMeta): LoggerWrapper {
    return new LoggerWrapper(this.logger.child(options));
  }

  private write(level: LogLevel, message: string, meta?: LogMeta): void {
    this.logger.log({ ...meta, level, message });
  }
}
