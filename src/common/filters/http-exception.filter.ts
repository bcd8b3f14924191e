import {
  ArgumentsHost,
  Catch,
  ExceptionFilter,
  HttpException,
  HttpStatus,
  Logger,
} from '@nestjs/common';
import { Request, Response } from 'express';

interface ErrorBody {
  error: string;
  message: string | string[];
}

function describeException(exception: unknown): ErrorBody {
  if (!(exception instanceof HttpException)) {
    return { error: 'InternalServerError', message: 'Internal server error' };
  }

  const body = exception.getResponse();
  if (typeof body === 'string') {
    return { error: exception.name, message: body };
  }

  // ValidationPipe responds with { message: string[] }
  const message = 'message' in body ? body.message : undefined;
  return {
    error: exception.name,
    message:
      typeof message === 'string' || Array.isArray(message) ? message : exception.message,
  };
}

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
    const { error, message } = describeException(exception);

    const line = `${request.method} ${request.url} -> ${status} | ${error}: ${String(message)}`;
    if (status >= 500) {
      this.logger.error(line, exception instanceof Error ? exception.stack : undefined);
    } else {
      this.logger.warn(line);
    }

    response.status(status).json({
      path: request.url,
      timestamp: new Date().toISOString(),
      statusCode: status,
      error,
      message,
    });
  }
}
