import { ArgumentsHost, Catch, ExceptionFilter, HttpException, HttpStatus, Logger } from '@nestjs/common';
import { Response } from 'express';
import { describeError } from '@marketplace/shared';
import { EngineException, ErrorKind } from '../common/errors/engine.exception';
import { AuthenticatedRequest } from '../common/guards/role.guard';
import { correlationIdOf } from '../interceptors/logging.interceptor';

export interface ErrorResponseBody {
  statusCode: number;
  kind: ErrorKind | 'INTERNAL';
  code: string;
  message: string;
  details: Record<string, unknown>;
  retryable: boolean;
  path: string;
  correlationId: string;
  timestamp: string;
}

const KIND_BY_STATUS: Partial<Record<number, ErrorKind>> = {
  [HttpStatus.BAD_REQUEST]: ErrorKind.VALIDATION,
  [HttpStatus.UNAUTHORIZED]: ErrorKind.AUTHORIZATION,
  [HttpStatus.FORBIDDEN]: ErrorKind.AUTHORIZATION,
  [HttpStatus.NOT_FOUND]: ErrorKind.NOT_FOUND,
  [HttpStatus.CONFLICT]: ErrorKind.STATE_CONFLICT,
};

function messageOf(exception: HttpException): { message: string; details: Record<string, unknown> } {
  const payload = exception.getResponse();
  if (typeof payload === 'string') {
    return { message: payload, details: {} };
  }
  if ('message' in payload && Array.isArray(payload.message)) {
    // class-validator reports one entry per failed constraint
    const violations = payload.message.map((entry: unknown) => String(entry));
    return { message: violations.join('; '), details: { violations } };
  }
  return { message: exception.message, details: {} };
}

@Catch()
export class EngineExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(EngineExceptionFilter.name);

  catch(exception: unknown, host: ArgumentsHost): void {
    const ctx = host.switchToHttp();
    const response = ctx.getResponse<Response>();
    const request = ctx.getRequest<AuthenticatedRequest>();
    const body = this.toBody(exception, request);

    if (body.statusCode >= HttpStatus.INTERNAL_SERVER_ERROR) {
      this.logger.error(`${request.method} ${request.url} failed: ${body.message}`, {
        correlationId: body.correlationId,
        code: body.code,
        status: body.statusCode,
        error: describeError(exception),
      });
    } else {
      this.logger.warn(`${request.method} ${request.url} rejected with ${body.code}`, {
        correlationId: body.correlationId,
        status: body.statusCode,
      });
    }

    response.status(body.statusCode).json(body);
  }

  toBody(exception: unknown, request: AuthenticatedRequest): ErrorResponseBody {
    const common = {
      path: request.url,
      correlationId: correlationIdOf(request),
      timestamp: new Date().toISOString(),
    };

    if (exception instanceof EngineException) {
      return { statusCode: exception.getStatus(), ...exception.toBody(), ...common };
    }

    if (exception instanceof HttpException) {
      const statusCode = exception.getStatus();
      const { message, details } = messageOf(exception);
      return {
        statusCode,
        kind: KIND_BY_STATUS[statusCode] ?? 'INTERNAL',
        code: statusCode === HttpStatus.BAD_REQUEST ? 'INVALID_REQUEST' : HttpStatus[statusCode] ?? 'HTTP_ERROR',
        message,
        details,
        retryable: false,
        ...common,
      };
    }

    return {
      statusCode: HttpStatus.INTERNAL_SERVER_ERROR,
      kind: 'INTERNAL',
      code: 'INTERNAL_ERROR',
      message: 'Internal server error',
      details: {},
      retryable: false,
      ...common,
    };
  }
}
