import {
  ArgumentsHost,
  Catch,
  ExceptionFilter,
  HttpException,
  HttpStatus,
  Logger,
} from '@nestjs/common';
import { FastifyReply } from 'fastify';
import { AuthorizationDeniedError, ExportError } from '../../domain/errors/export.errors';

/**
 * Maps export errors to HTTP answers.
 *
 * Authorization failures become a bare 401 so policy names and reasons never
 * reach the client. Unexpected errors are logged and answered with a generic 500.
 */
@Catch()
export class DomainExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(DomainExceptionFilter.name);

  catch(exception: unknown, host: ArgumentsHost): void {
    const reply = host.switchToHttp().getResponse<FastifyReply>();

    if (exception instanceof AuthorizationDeniedError) {
      reply.status(HttpStatus.UNAUTHORIZED).send();
      return;
    }

    if (exception instanceof ExportError) {
      reply.status(exception.statusCode).send({
        statusCode: exception.statusCode,
        error: exception.code,
        message: exception.message,
      });
      return;
    }

    if (exception instanceof HttpException) {
      const status = exception.getStatus();
      if (status === HttpStatus.UNAUTHORIZED || status === HttpStatus.FORBIDDEN) {
        reply.status(status).send();
        return;
      }
      reply.status(status).send(exception.getResponse());
      return;
    }

    this.logger.error('Unhandled error', exception instanceof Error ? exception : String(exception));
    reply.status(HttpStatus.INTERNAL_SERVER_ERROR).send({
      statusCode: HttpStatus.INTERNAL_SERVER_ERROR,
      message: 'Internal server error',
    });
  }
}
