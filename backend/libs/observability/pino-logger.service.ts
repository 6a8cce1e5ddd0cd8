import type { LoggerService } from '@nestjs/common';
import type { Level, Logger } from 'pino';
import { logger as rootLogger } from './logger';

/**
 * Routes NestJS `Logger` output through pino.
 *
 * Nest appends the logger context as the last parameter; for `error` a stack
 * trace may precede it. The context becomes a `context` field on a cached
 * child logger.
 *
 * @example
 * app.useLogger(new PinoLoggerService());
 */
export class PinoLoggerService implements LoggerService {
  private readonly children = new Map<string, Logger>();

  constructor(private readonly root: Logger = rootLogger) {}

  log(message: unknown, ...optionalParams: unknown[]) {
    this.write('info', message, optionalParams);
  }

  error(message: unknown, ...optionalParams: unknown[]) {
    this.write('error', message, optionalParams);
  }

  warn(message: unknown, ...optionalParams: unknown[]) {
    this.write('warn', message, optionalParams);
  }

  debug(message: unknown, ...optionalParams: unknown[]) {
    this.write('debug', message, optionalParams);
  }

  verbose(message: unknown, ...optionalParams: unknown[]) {
    this.write('trace', message, optionalParams);
  }

  fatal(message: unknown, ...optionalParams: unknown[]) {
    this.write('fatal', message, optionalParams);
  }

  private write(level: Level, message: unknown, optionalParams: unknown[]) {
    const params = optionalParams.filter((param) => param !== undefined);
    const last = params[params.length - 1];
    const context =
      params.length > 0 && typeof last === 'string' ? last : undefined;
    if (context !== undefined) {
      params.pop();
    }

    const target = this.loggerFor(context);
    const stack = params.find(
      (param): param is string => typeof param === 'string',
    );

    if (message instanceof Error) {
      target[level]({ err: message }, message.message);
    } else if (typeof message === 'object' && message !== null) {
      target[level](message);
    } else if (stack !== undefined) {
      target[level]({ stack }, String(message));
    } else {
      target[level](String(message));
    }
  }

  private loggerFor(context: string | undefined): Logger {
    if (context === undefined) {
      return this.root;
    }

    let child = this.children.get(context);
    if (!child) {
      child = this.root.child({ context });
      this.children.set(context, child);
    }
    return child;
  }
}
