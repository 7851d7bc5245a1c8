import pino, { type Logger } from 'pino';

import type { LogLevel } from './config';

const isPlainRecord = (value: unknown): value is Record<string, unknown> =>
  value !== null && typeof value === 'object' && !Array.isArray(value) && !(value instanceof Error);

export class LoggerService {
  constructor(private readonly logger: Logger = pino({ name: 'dapp-runner' })) {}

  static create(options: { level?: LogLevel; name?: string } = {}): LoggerService {
    return new LoggerService(pino({ name: options.name ?? 'dapp-runner', level: options.level ?? 'info' }));
  }

  /** A logger discarding everything, for tests and embedding. */
  static silent(): LoggerService {
    return LoggerService.create({ level: 'silent' });
  }

  child(bindings: Record<string, unknown>): LoggerService {
    return new LoggerService(this.logger.child(bindings));
  }

  info(message: string, ...optionalParams: unknown[]) {
    this.logger.info(this.context(optionalParams), message);
  }

  debug(message: string, ...optionalParams: unknown[]) {
    this.logger.debug(this.context(optionalParams), message);
  }

  warn(message: string, ...optionalParams: unknown[]) {
    this.logger.warn(this.context(optionalParams), message);
  }

  error(message: string, ...optionalParams: unknown[]) {
    this.logger.error(this.context(optionalParams), message);
  }

  private context(params: unknown[]): Record<string, unknown> {
    if (params.length === 0) return {};
    const [first] = params;
    if (params.length === 1 && isPlainRecord(first)) return first;
    if (params.length === 1 && first instanceof Error) return { err: first };
    return { context: params };
  }
}
