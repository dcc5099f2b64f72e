import {
  ArgumentsHost,
  Catch,
  ExceptionFilter,
  HttpException,
  HttpStatus,
  Logger,
} from '@nestjs/common';
import { Request, Response } from 'express';
import { randomUUID } from 'node:crypto';
import {
  currentTraceId,
  type RequestState,
} from '@app/common/tracing/request-trace';

interface ErrorBody {
  code: string;
  message: string;
}

function readBody(res: string | object, fallback: ErrorBody): ErrorBody {
  if (typeof res === 'string') {
    return { ...fallback, message: res };
  }
  const message = 'message' in res ? res.message : undefined;
  const code = 'code' in res ? res.code : 'error' in res ? res.error : undefined;
  return {
    code: typeof code === 'string' ? code : fallback.code,
    message:
      typeof message === 'string'
        ? message
        : Array.isArray(message)
          ? message.join(', ')
          : fallback.message,
  };
}

@Catch()
export class HttpExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(HttpExceptionFilter.name);

  catch(exception: unknown, host: ArgumentsHost) {
    const ctx = host.switchToHttp();
    const response = ctx.getResponse<Response>();
    const request = ctx.getRequest<Request & RequestState>();

    let status = HttpStatus.INTERNAL_SERVER_ERROR;
    let body: ErrorBody = {
      code: 'INTERNAL_SERVER_ERROR',
      message: 'Internal server error',
    };
    let stack: string | undefined;

    if (exception instanceof HttpException) {
      status = exception.getStatus();
      body = readBody(exception.getResponse(), {
        code: body.code,
        message: exception.message,
      });
      stack = exception.stack;
    } else if (exception instanceof Error) {
      stack = exception.stack;
    }

    const traceId = request.txId ?? currentTraceId() ?? randomUUID();

    if (status >= HttpStatus.INTERNAL_SERVER_ERROR) {
      this.logger.error(
        `traceId=${traceId} status=${status} code=${body.code} message=${body.message}`,
        stack,
      );
    } else {
      this.logger.warn(
        `traceId=${traceId} status=${status} code=${body.code} message=${body.message}`,
      );
    }

    if (response.headersSent) {
      response.end();
      return;
    }

    response.status(status).json({
      success: false,
      error: body,
      traceId,
    });
  }
}
