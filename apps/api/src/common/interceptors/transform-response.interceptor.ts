import {
  CallHandler,
  ExecutionContext,
  Injectable,
  NestInterceptor,
  StreamableFile,
} from '@nestjs/common';
import { Observable } from 'rxjs';
import { map } from 'rxjs/operators';

export interface SuccessEnvelope<T = unknown> {
  success: true;
  data: T;
}

@Injectable()
export class TransformResponseInterceptor implements NestInterceptor {
  intercept(
    _context: ExecutionContext,
    next: CallHandler,
  ): Observable<SuccessEnvelope | StreamableFile> {
    return next.handle().pipe(
      map((data: unknown) => {
        // file downloads are written as-is
        if (data instanceof StreamableFile) {
          return data;
        }
        return {
          success: true as const,
          data,
        };
      }),
    );
  }
}
