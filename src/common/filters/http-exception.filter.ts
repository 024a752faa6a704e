import {
  ArgumentsHost,
  Catch,
  ExceptionFilter,
  HttpException,
  HttpStatus,
  Logger,
} from '@nestjs/common';
import { Request, Response } from 'express';

@Catch()
export class HttpExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(HttpExceptionFilter.name);

  catch(exception: unknown, host: ArgumentsHost) {
    const ctx = host.switchToHttp();
    const response = ctx.getResponse<Response>();
    const request = ctx.getRequest<Request>();

    const status =
      exception instanceof HttpException
        ? exception.getStatus()
        : HttpStatus.INTERNAL_SERVER_ERROR;

    const errorResponse: string | object =
      exception instanceof HttpException
        ? exception.getResponse()
        : {
            statusCode: status,
            message: 'Internal server error',
          };

    let message: unknown = 'Error';
    let code: string | undefined;
    let details: unknown;

    if (typeof errorResponse === 'string') {
      message = errorResponse;
    } else {
      if ('message' in errorResponse) message = errorResponse.message;
      if ('code' in errorResponse && typeof errorResponse.code === 'string') code = errorResponse.code;
      if ('details' in errorResponse) details = errorResponse.details;
    }

    const summary = `${request.method} ${request.url} -> ${status} | ${code ?? ''} ${String(message)}`;
    if (status >= HttpStatus.INTERNAL_SERVER_ERROR) {
      this.logger.error(summary, exception instanceof Error ? exception.stack : undefined);
    } else {
      this.logger.warn(summary);
    }

    response.status(status).json({
      path: request.url,
      timestamp: new Date().toISOString(),
      statusCode: status,
      message,
      ...(code ? { code } : {}),
      ...(details !== undefined ? { details } : {}),
    });
  }
}
