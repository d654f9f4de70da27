import { CallHandler, ExecutionContext, Injectable, Logger, NestInterceptor } from '@nestjs/common';
import { Response } from 'express';
import { Observable, throwError } from 'rxjs';
import { catchError, tap } from 'rxjs/operators';
import { describeError } from '@marketplace/shared';
import { AuthenticatedRequest } from '../common/guards/role.guard';
import { EngineException } from '../common/errors/engine.exception';

export function correlationIdOf(request: AuthenticatedRequest): string {
  const header = request.headers['correlation-id'];
  return (Array.isArray(header) ? header[0] : header) ?? 'unknown';
}

@Injectable()
export class LoggingInterceptor implements NestInterceptor {
  private readonly logger = new Logger(LoggingInterceptor.name);

  intercept(context: ExecutionContext, next: CallHandler): Observable<unknown> {
    const http = context.switchToHttp();
    const request = http.getRequest<AuthenticatedRequest>();
    const response = http.getResponse<Response>();
    const { method, url } = request;
    const correlationId = correlationIdOf(request);
    const startTime = Date.now();

    this.logger.log(`Incoming ${method} ${url}`, {
      correlationId,
      role: request.caller?.role,
      userId: request.caller?.userId,
    });

    return next.handle().pipe(
      tap(() => {
        const processingTime = Date.now() - startTime;
        this.logger.log(`Completed ${method} ${url} in ${processingTime}ms`, {
          correlationId,
          statusCode: response.statusCode,
          processingTime,
        });
      }),
      catchError((error: unknown) => {
        const processingTime = Date.now() - startTime;
        this.logger.warn(`Failed ${method} ${url} in ${processingTime}ms`, {
          correlationId,
          code: error instanceof EngineException ? error.code : undefined,
          error: describeError(error),
          processingTime,
        });
        return throwError(() => error);
      }),
    );
  }
}
