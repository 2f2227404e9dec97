import { Injectable, LoggerService } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import pino, { Level, Logger } from 'pino';
import { AppConfig } from '../../config/configuration';

@Injectable()
export class PinoLoggerService implements LoggerService {
  private logger: Logger;
  private context?: string;

  constructor(private readonly configService: ConfigService<AppConfig>) {
    const logLevel = this.configService.get('logLevel', { infer: true }) || 'info';
    const nodeEnv = this.configService.get('nodeEnv', { infer: true });

    this.logger = pino({
      level: logLevel,
      ...(nodeEnv === 'development' && {
        transport: {
          target: 'pino-pretty',
          options: {
            colorize: true,
            translateTime: 'HH:MM:ss Z',
            ignore: 'pid,hostname',
          },
        },
      }),
      formatters: {
        level: (label) => ({ level: label }),
      },
      base: {
        service: 'export-service',
        env: nodeEnv,
      },
    });
  }

  setContext(context: string): void {
    this.context = context;
  }

  /**
   * NestJS `Logger` calls arrive as (message, ...params, context); direct
   * structured calls as (fields, message).
   */
  log(message: unknown, ...optionalParams: unknown[]): void {
    this.write('info', message, optionalParams);
  }

  info(message: string): void;
  info(obj: Record<string, unknown>, message: string): void;
  info(objOrMessage: Record<string, unknown> | string, message?: string): void {
    this.write('info', objOrMessage, message === undefined ? [] : [message]);
  }

  error(message: unknown, ...optionalParams: unknown[]): void {
    this.write('error', message, optionalParams);
  }

  warn(message: unknown, ...optionalParams: unknown[]): void {
    this.write('warn', message, optionalParams);
  }

  debug(message: unknown, ...optionalParams: unknown[]): void {
    this.write('debug', message, optionalParams);
  }

  verbose(message: unknown, ...optionalParams: unknown[]): void {
    this.write('trace', message, optionalParams);
  }

  fatal(message: unknown, ...optionalParams: unknown[]): void {
    this.write('fatal', message, optionalParams);
  }

  child(bindings: Record<string, unknown>): PinoLoggerService {
    const childLogger: PinoLoggerService = Object.create(this);
    childLogger.logger = this.logger.child(bindings);
    return childLogger;
  }

  withJobId(jobId: string): PinoLoggerService {
    return this.child({ jobId });
  }

  private write(level: Level, message: unknown, params: unknown[]): void {
    if (isFields(message)) {
      const msg = params.find((param): param is string => typeof param === 'string') ?? '';
      this.logger[level]({ ...message, context: this.context }, msg);
      return;
    }

    const rest = [...params];
    const last = rest[rest.length - 1];
    const context = rest.length > 0 && typeof last === 'string' ? String(rest.pop()) : this.context;

    const fields: Record<string, unknown> = { context };
    for (const param of rest) {
      if (param instanceof Error) {
        fields.err = param;
      } else if (typeof param === 'string') {
        fields.trace = param;
      } else if (param !== undefined) {
        fields.details = param;
      }
    }

    if (message instanceof Error) {
      this.logger[level]({ ...fields, err: message }, message.message);
    } else {
      this.logger[level](fields, String(message));
    }
  }
}

function isFields(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !(value instanceof Error);
}
