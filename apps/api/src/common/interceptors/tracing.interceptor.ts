import {
  CallHandler,
  ExecutionContext,
  HttpException,
  Injectable,
  Logger,
  NestInterceptor,
} from '@nestjs/common';
import { Request, Response } from 'express';
import { randomUUID } from 'node:crypto';
import { Observable, throwError } from 'rxjs';
import { catchError, finalize, tap } from 'rxjs/operators';
import { CART_SESSION_COOKIE } from '@app/common/decorators/cart-session.decorator';
import {
  requestTraceStorage,
  type RequestState,
} from '@app/common/tracing/request-trace';

function statusOf(error: unknown): number {
  if (error instanceof HttpException) {
    return error.getStatus();
  }
  if (error && typeof error === 'object') {
    if ('status' in error && typeof error.status === 'number') {
      return error.status;
    }
    if ('statusCode' in error && typeof error.statusCode === 'number') {
      return error.statusCode;
    }
  }
  return 500;
}

@Injectable()
export class TracingInterceptor implements NestInterceptor {
  private readonly logger = new Logger(TracingInterceptor.name);

  intercept(context: ExecutionContext, next: CallHandler): Observable<unknown> {
    const httpContext = context.switchToHttp();
    const request = httpContext.getRequest<Request & RequestState>();
    const response = httpContext.getResponse<Response>();

    const txId = request.txId ?? randomUUID();
    request.txId = txId;
    response.setHeader('x-trace-id', txId);

    // the cart session decorator runs later; read the raw cookie here
    const cookie: unknown = request.cookies?.[CART_SESSION_COOKIE];
    const sessionId = typeof cookie === 'string' ? cookie : 'new';
    const { method, originalUrl } = request;

    this.logger.log(
      `traceId=${txId} session=${sessionId} start method=${method} url=${originalUrl}`,
    );

    const startTime = Date.now();

    return requestTraceStorage.run({ traceId: txId, sessionId }, () => {
      let finalStatus: number | undefined;
      let capturedError: unknown;

      return next.handle().pipe(
        tap(() => {
          finalStatus = response.statusCode;
        }),
        catchError((error: unknown) => {
          capturedError = error;
          finalStatus = statusOf(error);
          return throwError(() => error);
        }),
        finalize(() => {
          const durationMs = Date.now() - startTime;
          const status = finalStatus ?? response.statusCode;
          const baseLog = `traceId=${txId} method=${method} url=${originalUrl} status=${status} durationMs=${durationMs}`;
          if (capturedError && status >= 500) {
            this.logger.error(
              baseLog,
              capturedError instanceof Error ? capturedError.stack : undefined,
            );
          } else {
            this.logger.log(baseLog);
          }
        }),
      );
    });
  }
}
