import {
  ArgumentsHost,
  Catch,
  ExceptionFilter,
  HttpException,
  HttpStatus,
} from '@nestjs/common';
import type { Request, Response } from 'express';
import { createLogger } from '../utils/logger';
import { isRecord } from '../utils/object.utils';
import {
  BACKEND_ERROR_MESSAGE,
  INVALID_PAYLOAD_MESSAGE,
  TOO_MANY_REQUESTS_MESSAGE,
} from '../constants/error-messages.constants';

interface ErrorBody {
  ok: false;
  message: string;
  code?: string;
  requestId?: string;
}

@Catch()
export class HttpExceptionFilter implements ExceptionFilter {
  private readonly logger = createLogger(HttpExceptionFilter.name);

  catch(exception: unknown, host: ArgumentsHost): void {
    const ctx = host.switchToHttp();
    const response = ctx.getResponse<Response>();
    const request = ctx.getRequest<Request>();

    const status =
      exception instanceof HttpException
        ? exception.getStatus()
        : HttpStatus.INTERNAL_SERVER_ERROR;

    if (status >= 500) {
      this.logger.error(
        'Unhandled exception',
        exception instanceof Error ? exception : undefined,
        {
          path: request.path,
          requestId: request.requestId,
        },
      );
    }

    const body: ErrorBody = {
      ok: false,
      message:
        exception instanceof HttpException && status < 500
          ? this.safeHttpMessage(exception)
          : BACKEND_ERROR_MESSAGE,
      requestId: request.requestId,
    };

    const code = exception instanceof HttpException ? this.errorCode(exception) : undefined;
    if (code !== undefined) {
      body.code = code;
    }

    response.status(status).json(body);
  }

  private safeHttpMessage(exception: HttpException): string {
    const response = exception.getResponse();

    if (typeof response === 'string') {
      return response;
    }

    if (isRecord(response) && typeof response.message === 'string') {
      return response.message;
    }

    if (exception.getStatus() === HttpStatus.TOO_MANY_REQUESTS) {
      return TOO_MANY_REQUESTS_MESSAGE;
    }

    return INVALID_PAYLOAD_MESSAGE;
  }

  private errorCode(exception: HttpException): string | undefined {
    const response = exception.getResponse();
    if (isRecord(response) && typeof response.code === 'string') {
      return response.code;
    }

    return undefined;
  }
}
